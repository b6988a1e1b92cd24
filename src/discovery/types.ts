/**
 * XMPP DNS discovery types
 * Boundary between the lookup orchestration and the DNS resolver
 */

import type { XmppRecords } from '../types/dto.js';

/**
 * Raw SRV answer as returned by the resolver
 */
export interface SrvAnswer {
  target: string;
  port: number;
  priority: number;
  weight: number;
}

/**
 * Outcome of a single DNS query.
 * 'not-found' is the resolver reporting that the name (or record type) does not exist;
 * 'error' is any other failure.
 */
export type LookupOutcome<T> =
  | { status: 'found'; records: T[] }
  | { status: 'not-found' }
  | { status: 'error'; error: Error };

/**
 * DNS client operations needed for XMPP discovery
 */
export interface DnsLookup {
  lookupSrv(service: string, protocol: string, domain: string): Promise<LookupOutcome<SrvAnswer>>;
  /** Each TXT record is returned as a single string */
  lookupTxt(name: string): Promise<LookupOutcome<string>>;
}

export type RecordType = 'srv' | 'txt';

export type XmppLookupResult =
  | ({ status: 'found' } & XmppRecords)
  | { status: 'not-found' };

export class ResolutionError extends Error {
  constructor(
    message: string,
    public readonly domain: string,
    public readonly recordType: RecordType,
    public readonly cause: Error
  ) {
    super(message);
    this.name = 'ResolutionError';
  }
}
