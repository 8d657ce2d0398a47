import { cccCheckDigits, parseBankAccount } from './ccc';
import { checksumMismatch, malformed, valid, ValidationResult } from './validation-result';

/**
 * Validates a 20 digit Spanish bank account code. Groups may be separated by a single
 * space or hyphen; the canonical form is the bare digits.
 */
export function validateBankAccount(raw: string | null | undefined): ValidationResult<'CCC'> {
  const ccc = parseBankAccount(raw);
  if (!ccc) {
    return malformed();
  }

  if (cccCheckDigits(ccc) !== ccc.check) {
    return checksumMismatch('CCC');
  }

  return valid('CCC', `${ccc.entity}${ccc.office}${ccc.check}${ccc.account}`);
}
