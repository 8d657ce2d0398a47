import type { InvalidReason } from '../../common/utils';

export const ValidationMessages = {
  invalid: 'Please enter a valid NIF, NIE, or CIF.',
  invalidOnlyNif: 'Please enter a valid NIF or NIE.',
  invalidNif: 'Invalid checksum for NIF.',
  invalidNie: 'Invalid checksum for NIE.',
  invalidCif: 'Invalid checksum for CIF.',
  invalidBankAccount:
    'Please enter a valid bank account number in format XXXX-XXXX-XX-XXXXXXXXXX.',
  invalidBankAccountChecksum: 'Invalid checksum for bank account number.',
  invalidPostalCode: 'Enter a valid postal code in the range and format 01XXX - 52XXX.',
  invalidPhoneNumber:
    'Enter a valid phone number in one of the formats 6XXXXXXXX, 7XXXXXXXX, 8XXXXXXXX or 9XXXXXXXX.',
} as const;

const checksumMessages = {
  NIF: ValidationMessages.invalidNif,
  NIE: ValidationMessages.invalidNie,
  CIF: ValidationMessages.invalidCif,
  CCC: ValidationMessages.invalidBankAccountChecksum,
} as const;

export const identityNumberMessage = (reason: InvalidReason, onlyNif: boolean): string => {
  switch (reason.code) {
    case 'checksum_mismatch':
      return checksumMessages[reason.kind];
    case 'kind_disallowed':
      return ValidationMessages.invalidOnlyNif;
    case 'malformed':
      return onlyNif ? ValidationMessages.invalidOnlyNif : ValidationMessages.invalid;
  }
};

export const bankAccountMessage = (reason: InvalidReason): string =>
  reason.code === 'checksum_mismatch'
    ? checksumMessages[reason.kind]
    : ValidationMessages.invalidBankAccount;
