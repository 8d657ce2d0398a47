import type { ChecksumKind, InvalidReasonCode } from '../../../common/utils';

export type ValidationType = 'identity' | 'bankAccount' | 'postalCode' | 'phoneNumber';

export const VALIDATION_TYPES: readonly ValidationType[] = [
  'identity',
  'bankAccount',
  'postalCode',
  'phoneNumber',
];

export interface ValidationResponse {
  type: ValidationType;
  valid: boolean;
  value: string | null;
  kind: ChecksumKind | null;
  reason: InvalidReasonCode | null;
  message: string | null;
}

export interface ValidatorOptions {
  onlyNifByDefault: boolean;
}
