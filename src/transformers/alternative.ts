/**
 * Alternative transformer - converts _xmppconnect TXT records to AlternativeRecord DTOs.
 * Record format (XEP-0156): "_xmpp-client-<method>=<url>".
 */
import type { AlternativeRecord } from '../types/dto.js';

/** Key prefix of client connection methods, matched case-insensitively */
export const ALTERNATIVE_PREFIX = '_xmpp-client-';

export type ParsedAlternative =
  | { kind: 'alternative'; alternative: AlternativeRecord }
  | { kind: 'ignored' }
  | { kind: 'malformed'; raw: string };

/**
 * Parse a single TXT record.
 * Splits on the first '='; the value may itself contain '='.
 * Records for other prefixes (e.g. _xmpp-server-) are ignored.
 * A matching key without '=' is malformed.
 */
export function parseAlternative(raw: string): ParsedAlternative {
  const separator = raw.indexOf('=');
  const key = separator === -1 ? raw : raw.slice(0, separator);

  if (!key.toLowerCase().startsWith(ALTERNATIVE_PREFIX)) {
    return { kind: 'ignored' };
  }
  if (separator === -1) {
    return { kind: 'malformed', raw };
  }

  return {
    kind: 'alternative',
    alternative: {
      name: key.slice(ALTERNATIVE_PREFIX.length),
      value: raw.slice(separator + 1),
    },
  };
}

/**
 * Total order over alternatives: name, then value.
 */
export function compareAlternatives(a: AlternativeRecord, b: AlternativeRecord): number {
  if (a.name !== b.name) {
    return a.name < b.name ? -1 : 1;
  }
  if (a.value !== b.value) {
    return a.value < b.value ? -1 : 1;
  }
  return 0;
}

export interface AlternativesResult {
  /** Matching records, sorted */
  alternatives: AlternativeRecord[];
  /** Matching keys without a value */
  malformed: string[];
}

/**
 * Transform TXT records into a compacted, sorted list of alternatives.
 */
export function transformAlternatives(records: string[]): AlternativesResult {
  const alternatives: AlternativeRecord[] = [];
  const malformed: string[] = [];

  for (const raw of records) {
    const parsed = parseAlternative(raw);
    if (parsed.kind === 'alternative') {
      alternatives.push(parsed.alternative);
    } else if (parsed.kind === 'malformed') {
      malformed.push(parsed.raw);
    }
  }

  return { alternatives: alternatives.sort(compareAlternatives), malformed };
}
