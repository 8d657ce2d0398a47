import { IsString } from 'class-validator';

export class ValidateValueDto {
  @IsString()
  value!: string;
}
