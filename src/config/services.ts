export const VALIDATOR_OPTIONS = 'VALIDATOR_OPTIONS';

export const ValidatorSubjects = {
  identity: 'validator.identity',
  bankAccount: 'validator.bankAccount',
  postalCode: 'validator.postalCode',
  phoneNumber: 'validator.phoneNumber',
  batch: 'validator.batch',
  health: 'validator.health.check',
} as const;
