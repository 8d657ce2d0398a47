import { Transform } from 'class-transformer';
import { IsBoolean, IsOptional } from 'class-validator';

import { ValidateValueDto } from './validate-value.dto';

// Anything but a boolean or its string form is passed through for @IsBoolean to reject.
export const toOptionalBoolean = ({ value }: { value: unknown }): unknown => {
  if (value === undefined || value === null) return undefined;
  if (value === 'true' || value === true) return true;
  if (value === 'false' || value === false) return false;
  return value;
};

export class ValidateIdentityNumberDto extends ValidateValueDto {
  @IsOptional()
  @Transform(toOptionalBoolean)
  @IsBoolean()
  onlyNif?: boolean;
}
