/**
 * ETag computation and conditional request evaluation (RFC 9110 Section 13).
 *
 * Responses carry no Last-Modified time, so If-Modified-Since and
 * If-Unmodified-Since never apply; freshness is decided by ETag alone.
 */
import type { IncomingHttpHeaders } from 'node:http';
import { crc64Iso } from './crc64.js';

export type PreconditionResult = 'send' | 'not-modified' | 'precondition-failed';

interface EntityTag {
  weak: boolean;
  opaque: string;
}

const ENTITY_TAG_RE = /(W\/)?"([^"]*)"/g;

/**
 * Strong ETag over the body bytes: the lowercase hex CRC-64, quoted.
 */
export function computeEtag(body: string): string {
  const checksum = crc64Iso(Buffer.from(body, 'utf8'));
  return `"${checksum.toString(16)}"`;
}

function parseEntityTag(etag: string): EntityTag | null {
  const match = /^(W\/)?"([^"]*)"$/.exec(etag);
  if (!match) {
    return null;
  }
  return { weak: match[1] !== undefined, opaque: match[2] };
}

function parseEntityTagList(header: string): EntityTag[] {
  return Array.from(header.matchAll(ENTITY_TAG_RE), (match) => ({
    weak: match[1] !== undefined,
    opaque: match[2],
  }));
}

/**
 * Whether a list header (If-Match / If-None-Match) matches the current ETag.
 * Strong comparison requires both tags to be strong.
 */
function listMatches(header: string, current: EntityTag, strong: boolean): boolean {
  if (header.trim() === '*') {
    return true;
  }
  return parseEntityTagList(header).some((candidate) => {
    if (strong && (candidate.weak || current.weak)) {
      return false;
    }
    return candidate.opaque === current.opaque;
  });
}

/**
 * Evaluate request preconditions against the response ETag.
 *
 * 1. If-Match present and not matching -> 412
 * 2. If-None-Match present and matching -> 304
 * 3. Otherwise send the representation
 */
export function evaluatePreconditions(headers: IncomingHttpHeaders, etag: string): PreconditionResult {
  const current = parseEntityTag(etag);
  if (!current) {
    return 'send';
  }

  const ifMatch = headers['if-match'];
  if (ifMatch !== undefined && !listMatches(ifMatch, current, true)) {
    return 'precondition-failed';
  }

  const ifNoneMatch = headers['if-none-match'];
  if (ifNoneMatch !== undefined && listMatches(ifNoneMatch, current, false)) {
    return 'not-modified';
  }

  return 'send';
}
