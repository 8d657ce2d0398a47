import { Transform, Type } from 'class-transformer';
import {
  ArrayMaxSize,
  ArrayMinSize,
  IsArray,
  IsBoolean,
  IsIn,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';

import { VALIDATION_TYPES, ValidationType } from '../interfaces';
import { toOptionalBoolean } from './validate-identity-number.dto';

export const MAX_BATCH_ITEMS = 50;

export class ValidationItemDto {
  @IsIn([...VALIDATION_TYPES])
  type!: ValidationType;

  @IsString()
  value!: string;

  @IsOptional()
  @Transform(toOptionalBoolean)
  @IsBoolean()
  onlyNif?: boolean;
}

export class ValidateBatchDto {
  @IsArray()
  @ArrayMinSize(1, { message: 'Please include at least one value.' })
  @ArrayMaxSize(MAX_BATCH_ITEMS, {
    message: `A batch can include at most ${MAX_BATCH_ITEMS} values.`,
  })
  @ValidateNested({ each: true })
  @Type(() => ValidationItemDto)
  items!: ValidationItemDto[];
}
