export type IdentifierKind = 'NIF' | 'NIE' | 'CIF';
export type ChecksumKind = IdentifierKind | 'CCC';

export type InvalidReason =
  | { code: 'malformed' }
  | { code: 'checksum_mismatch'; kind: ChecksumKind }
  | { code: 'kind_disallowed' };

export type InvalidReasonCode = InvalidReason['code'];

export interface ValidResult<K extends ChecksumKind> {
  readonly valid: true;
  readonly kind: K;
  readonly canonical: string;
}

export interface InvalidResult {
  readonly valid: false;
  readonly reason: InvalidReason;
}

export type ValidationResult<K extends ChecksumKind> = ValidResult<K> | InvalidResult;

export const valid = <K extends ChecksumKind>(kind: K, canonical: string): ValidResult<K> => ({
  valid: true,
  kind,
  canonical,
});

export const malformed = (): InvalidResult => ({ valid: false, reason: { code: 'malformed' } });

export const checksumMismatch = (kind: ChecksumKind): InvalidResult => ({
  valid: false,
  reason: { code: 'checksum_mismatch', kind },
});

export const kindDisallowed = (): InvalidResult => ({
  valid: false,
  reason: { code: 'kind_disallowed' },
});
