import { CIF_CONTROL_ALPHABET, NIF_CONTROL_ALPHABET } from './alphabets';
import { isValidSpanishTaxId, validateIdentityNumber } from './identity-number';

const malformed = { valid: false, reason: { code: 'malformed' } };
const mismatch = (kind: string) => ({ valid: false, reason: { code: 'checksum_mismatch', kind } });

describe('validateIdentityNumber', () => {
  describe('NIF', () => {
    it('accepts the matching control letter', () => {
      expect(validateIdentityNumber('12345678Z')).toEqual({
        valid: true,
        kind: 'NIF',
        canonical: '12345678Z',
      });
    });

    it('rejects every other control letter', () => {
      const others = NIF_CONTROL_ALPHABET.split('').filter((letter) => letter !== 'Z');
      expect(others).toHaveLength(22);

      for (const letter of others) {
        expect(validateIdentityNumber(`12345678${letter}`)).toEqual(mismatch('NIF'));
      }
    });

    it('accepts short and long numbers', () => {
      expect(validateIdentityNumber('1234567L')).toMatchObject({ valid: true, kind: 'NIF' });
      expect(validateIdentityNumber('0012345678Z')).toMatchObject({ valid: true, kind: 'NIF' });
    });

    it('treats a letter outside the NIF table as a NIF checksum failure', () => {
      expect(validateIdentityNumber('12345678I')).toEqual(mismatch('NIF'));
    });
  });

  describe('NIE', () => {
    it.each([
      ['X1234567L', 'X1234567L'],
      ['y1234567x', 'Y1234567X'],
      ['Z-1234567-R', 'Z1234567R'],
      ['X12345678Z', 'X12345678Z'],
    ])('accepts %p', (raw, canonical) => {
      expect(validateIdentityNumber(raw)).toEqual({ valid: true, kind: 'NIE', canonical });
    });

    it('substitutes the type letter before computing the control letter', () => {
      expect(validateIdentityNumber('X1234567T')).toEqual(mismatch('NIE'));
      // Y -> 1 gives 11234567, whose letter is X rather than the L of X1234567
      expect(validateIdentityNumber('Y1234567L')).toEqual(mismatch('NIE'));
    });
  });

  describe('CIF', () => {
    it('accepts the digit and the letter form of the control character', () => {
      expect(validateIdentityNumber('B12345674')).toEqual({
        valid: true,
        kind: 'CIF',
        canonical: 'B12345674',
      });
      expect(validateIdentityNumber('b-1234567-d')).toEqual({
        valid: true,
        kind: 'CIF',
        canonical: 'B1234567D',
      });
    });

    it('rejects the nine other digits and letters', () => {
      for (const digit of '0123456789'.split('').filter((value) => value !== '4')) {
        expect(validateIdentityNumber(`B1234567${digit}`)).toEqual(mismatch('CIF'));
      }
      for (const letter of CIF_CONTROL_ALPHABET.split('').filter((value) => value !== 'D')) {
        expect(validateIdentityNumber(`B1234567${letter}`)).toEqual(mismatch('CIF'));
      }
    });

    it('sums the digits of doubled values', () => {
      expect(validateIdentityNumber('A58818501')).toMatchObject({ valid: true, kind: 'CIF' });
      expect(validateIdentityNumber('A5881850A')).toMatchObject({ valid: true, kind: 'CIF' });
      expect(validateIdentityNumber('A58818502')).toEqual(mismatch('CIF'));
    });

    it('uses the last digit as control character of a seven digit number', () => {
      expect(validateIdentityNumber('A1234569')).toMatchObject({ valid: true, kind: 'CIF' });
      expect(validateIdentityNumber('A1234567')).toEqual(mismatch('CIF'));
    });

    it('rejects a NIF control letter on a company number', () => {
      expect(validateIdentityNumber('B1234567Z')).toEqual(mismatch('CIF'));
    });
  });

  describe('onlyNif', () => {
    it('disallows a CIF whatever its checksum', () => {
      const disallowed = { valid: false, reason: { code: 'kind_disallowed' } };
      expect(validateIdentityNumber('B12345674', true)).toEqual(disallowed);
      expect(validateIdentityNumber('B12345675', true)).toEqual(disallowed);
    });

    it.each(['12345678Z', '12345678A', 'X1234567L', 'X1234567T', 'ABC'])(
      'gives the same result for %p',
      (value) => {
        expect(validateIdentityNumber(value, true)).toEqual(validateIdentityNumber(value, false));
      },
    );
  });

  it.each(['ABCDEF', '', '   ', '12345678', 'A123456', 'A123456789', '12.345.678Z', 'X1234567'])(
    'reports %p as malformed',
    (value) => {
      expect(validateIdentityNumber(value)).toEqual(malformed);
    },
  );

  it('reports a missing value as malformed', () => {
    expect(validateIdentityNumber(null)).toEqual(malformed);
    expect(validateIdentityNumber(undefined)).toEqual(malformed);
  });

  it('ignores surrounding tabs and line breaks', () => {
    expect(validateIdentityNumber('12345678Z\n')).toEqual({
      valid: true,
      kind: 'NIF',
      canonical: '12345678Z',
    });
    expect(validateIdentityNumber('\t\n')).toEqual(malformed);
  });

  it('ignores separators between the parts', () => {
    expect(validateIdentityNumber('12 345 678 - z')).toEqual(validateIdentityNumber('12345678Z'));
  });
});

describe('isValidSpanishTaxId', () => {
  it('is true only for valid identifiers', () => {
    expect(isValidSpanishTaxId('12345678Z')).toBe(true);
    expect(isValidSpanishTaxId('B12345674')).toBe(true);
    expect(isValidSpanishTaxId('12345678A')).toBe(false);
    expect(isValidSpanishTaxId(undefined)).toBe(false);
  });
});
