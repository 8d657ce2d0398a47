export const NIF_CONTROL_ALPHABET = 'TRWAGMYFPDXBNJZSQVHLCKE';
export const CIF_CONTROL_ALPHABET = 'JABCDEFGHI';
export const CIF_TYPES = 'ABCDEFGHJKLMNPQS';
export const NIE_TYPES = 'XYZ';

// NIE type letter -> leading digit of the NIF payload
export const NIE_PREFIX_DIGITS: Readonly<Record<string, string>> = {
  X: '0',
  Y: '1',
  Z: '2',
};

export const CCC_WEIGHTS: readonly number[] = [1, 2, 4, 8, 5, 10, 9, 7, 3, 6];
