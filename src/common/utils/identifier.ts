import {
  CIF_CONTROL_ALPHABET,
  CIF_TYPES,
  NIE_TYPES,
  NIF_CONTROL_ALPHABET,
} from './alphabets';
import type { IdentifierKind } from './validation-result';

export interface ParsedIdentifier {
  readonly prefix: string | null;
  readonly digits: string;
  readonly suffix: string | null;
}

export interface ClassifierConfig {
  onlyNif: boolean;
}

export type Classification =
  | { readonly ok: true; readonly kind: IdentifierKind; readonly parsed: ParsedIdentifier }
  | { readonly ok: false; readonly reason: 'malformed' | 'kind_disallowed' };

const identifierRegex = new RegExp(
  `^([${CIF_TYPES}${NIE_TYPES}]?)(\\d+)([${NIF_CONTROL_ALPHABET}${CIF_CONTROL_ALPHABET}]?)$`,
);

export const parseIdentifier = (value: string): ParsedIdentifier | null => {
  const match = identifierRegex.exec(value);
  if (!match) {
    return null;
  }

  const [, prefix, digits, suffix] = match;
  return Object.freeze({
    prefix: prefix || null,
    digits,
    suffix: suffix || null,
  });
};

/**
 * Decides which kind of identifier a normalized value is shaped like.
 * Rules are tried in order: NIF, NIE, CIF. A CIF-shaped value is reported as
 * `kind_disallowed` when only NIF/NIE are accepted.
 */
export const classifyIdentifier = (value: string, config: ClassifierConfig): Classification => {
  const parsed = parseIdentifier(value);
  if (!parsed) {
    return { ok: false, reason: 'malformed' };
  }

  const { prefix, digits, suffix } = parsed;

  if (!prefix && suffix) {
    return { ok: true, kind: 'NIF', parsed };
  }

  if (prefix && NIE_TYPES.includes(prefix) && suffix) {
    return { ok: true, kind: 'NIE', parsed };
  }

  if (prefix && CIF_TYPES.includes(prefix) && (digits.length === 7 || digits.length === 8)) {
    if (config.onlyNif) {
      return { ok: false, reason: 'kind_disallowed' };
    }
    return { ok: true, kind: 'CIF', parsed };
  }

  return { ok: false, reason: 'malformed' };
};
