/**
 * Trims surrounding whitespace, strips spaces and hyphens and upper-cases the rest.
 * Blank input comes back as an empty string; whether that is acceptable is up to the caller.
 */
export function normalizeTaxId(raw: string | null | undefined): string {
  if (!raw) return '';
  return raw.trim().replace(/[ -]/g, '').toUpperCase();
}
