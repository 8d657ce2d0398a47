import { CCC_WEIGHTS } from './alphabets';

/**
 * Código Cuenta Cliente split into its four groups: EEEE-OOOO-CC-AAAAAAAAAA.
 */
export interface CccComponents {
  readonly entity: string;
  readonly office: string;
  readonly check: string;
  readonly account: string;
}

const cccRegex = /^(\d{4})[ -]?(\d{4})[ -]?(\d{2})[ -]?(\d{10})$/;

export const parseBankAccount = (raw: string | null | undefined): CccComponents | null => {
  const match = cccRegex.exec((raw ?? '').trim());
  if (!match) {
    return null;
  }

  const [, entity, office, check, account] = match;
  return Object.freeze({ entity, office, check, account });
};

/**
 * Check digit of a segment of up to 10 digits (left-padded with zeros).
 * Each digit is weighted by 1, 2, 4, 8, 5, 10, 9, 7, 3, 6; the result is
 * 11 - (sum mod 11), where 10 becomes 1 and 11 becomes 0.
 */
export const cccChecksum = (segment: string): number => {
  const padded = segment.padStart(CCC_WEIGHTS.length, '0');
  const sum = padded
    .split('')
    .reduce((total, digit, index) => total + Number(digit) * CCC_WEIGHTS[index], 0);

  const checksum = 11 - (sum % 11);
  if (checksum === 10) return 1;
  if (checksum === 11) return 0;
  return checksum;
};

export const cccCheckDigits = ({ entity, office, account }: CccComponents): string =>
  `${cccChecksum(`00${entity}${office}`)}${cccChecksum(account)}`;
