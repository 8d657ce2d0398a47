import { CIF_CONTROL_ALPHABET } from './alphabets';

const sumOfDigits = (value: number): number =>
  String(value)
    .split('')
    .reduce((total, digit) => total + Number(digit), 0);

/**
 * Control value of a CIF body (the digits before the check character).
 *
 * Digits at odd positions count as they are; digits at even positions are doubled and
 * the digits of the product summed, so 8 contributes 1 + 6 = 7.
 */
export const cifChecksumDigit = (body: string): number => {
  let oddSum = 0;
  let evenSum = 0;

  body.split('').forEach((digit, position) => {
    if (position % 2) {
      oddSum += Number(digit);
    } else {
      evenSum += sumOfDigits(Number(digit) * 2);
    }
  });

  return (10 - ((oddSum + evenSum) % 10)) % 10;
};

// Which company types use a letter and which a digit is not reliably documented, so both pass.
export const isCifCheckCharacter = (check: string, checksum: number): boolean =>
  check === String(checksum) || check === CIF_CONTROL_ALPHABET[checksum];
