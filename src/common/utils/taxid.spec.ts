import { normalizeTaxId } from './taxid';

describe('normalizeTaxId', () => {
  it('removes spaces and hyphens and upper-cases letters', () => {
    expect(normalizeTaxId(' x-1234567 l ')).toBe('X1234567L');
  });

  it('keeps other separators', () => {
    expect(normalizeTaxId('12.345.678/z')).toBe('12.345.678/Z');
  });

  it('is idempotent', () => {
    const once = normalizeTaxId('b 1234567-d');
    expect(normalizeTaxId(once)).toBe(once);
  });

  it('returns an empty string for blank input', () => {
    expect(normalizeTaxId('   ')).toBe('');
    expect(normalizeTaxId('')).toBe('');
    expect(normalizeTaxId(null)).toBe('');
    expect(normalizeTaxId(undefined)).toBe('');
  });

  it('trims tabs and line breaks around the value', () => {
    expect(normalizeTaxId('\t\n')).toBe('');
    expect(normalizeTaxId('\t12345678z\n')).toBe('12345678Z');
  });
});
