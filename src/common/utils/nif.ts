import { NIE_PREFIX_DIGITS, NIF_CONTROL_ALPHABET } from './alphabets';

/**
 * `int(digits) mod m`, folded one digit at a time so payloads of any length stay exact.
 */
export const digitsModulo = (digits: string, modulus: number): number => {
  let remainder = 0;
  for (const digit of digits) {
    remainder = (remainder * 10 + Number(digit)) % modulus;
  }
  return remainder;
};

export const nifChecksumLetter = (digits: string): string =>
  NIF_CONTROL_ALPHABET[digitsModulo(digits, 23)];

/**
 * Builds the NIF payload of a NIE by replacing its type letter with a leading digit.
 * Returns null for a letter that is not a NIE type.
 */
export const nieToNifDigits = (prefix: string, digits: string): string | null => {
  const leading = NIE_PREFIX_DIGITS[prefix];
  return leading === undefined ? null : leading + digits;
};
