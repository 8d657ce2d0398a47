import { cifChecksumDigit, isCifCheckCharacter } from './cif';
import { classifyIdentifier, ParsedIdentifier } from './identifier';
import { nieToNifDigits, nifChecksumLetter } from './nif';
import { normalizeTaxId } from './taxid';
import {
  checksumMismatch,
  IdentifierKind,
  kindDisallowed,
  malformed,
  valid,
  ValidationResult,
} from './validation-result';

const checkNif = ({ digits, suffix }: ParsedIdentifier): boolean =>
  suffix === nifChecksumLetter(digits);

const checkNie = ({ prefix, digits, suffix }: ParsedIdentifier): boolean => {
  const payload = prefix ? nieToNifDigits(prefix, digits) : null;
  return payload !== null && suffix === nifChecksumLetter(payload);
};

const checkCif = ({ digits, suffix }: ParsedIdentifier): boolean => {
  // Without a trailing letter the last digit is the check character.
  const body = suffix ? digits : digits.slice(0, -1);
  const check = suffix ?? digits.slice(-1);
  return isCifCheckCharacter(check, cifChecksumDigit(body));
};

const checks: Record<IdentifierKind, (parsed: ParsedIdentifier) => boolean> = {
  NIF: checkNif,
  NIE: checkNie,
  CIF: checkCif,
};

/**
 * Validates a NIF, NIE or CIF. Spaces and hyphens are ignored and letters may be lower case.
 *
 * @param onlyNif - reject company numbers (CIF) with `kind_disallowed`
 *
 * @example
 * validateIdentityNumber('12345678-z') // { valid: true, kind: 'NIF', canonical: '12345678Z' }
 * validateIdentityNumber('B12345674', true) // { valid: false, reason: { code: 'kind_disallowed' } }
 */
export function validateIdentityNumber(
  raw: string | null | undefined,
  onlyNif = false,
): ValidationResult<IdentifierKind> {
  const value = normalizeTaxId(raw);
  const classification = classifyIdentifier(value, { onlyNif });

  if (!classification.ok) {
    return classification.reason === 'kind_disallowed' ? kindDisallowed() : malformed();
  }

  const { kind, parsed } = classification;
  return checks[kind](parsed) ? valid(kind, value) : checksumMismatch(kind);
}

export const isValidSpanishTaxId = (value: string | null | undefined): boolean =>
  validateIdentityNumber(value).valid;
