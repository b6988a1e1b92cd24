/**
 * Discovery orchestrator - combines SRV and _xmppconnect TXT lookups
 * Provides high-level API to resolve XMPP connection metadata for a domain
 */

import type { Logger } from '../config/logger.js';
import { transformServers } from '../transformers/server.js';
import { transformAlternatives } from '../transformers/alternative.js';
import {
  DnsLookup,
  LookupOutcome,
  RecordType,
  ResolutionError,
  XmppLookupResult,
} from './types.js';

export const SRV_SERVICE = 'xmpp-client';
export const SRV_PROTOCOL = 'tcp';
export const TXT_SUBDOMAIN = '_xmppconnect';

/**
 * Return the records of a lookup, or [] when not found.
 * @throws ResolutionError on any other failure
 */
function recordsOf<T>(outcome: LookupOutcome<T>, domain: string, recordType: RecordType): T[] {
  switch (outcome.status) {
    case 'found':
      return outcome.records;
    case 'not-found':
      return [];
    case 'error':
      throw new ResolutionError(
        `Error resolving ${recordType.toUpperCase()} records for ${domain}: ${outcome.error.message}`,
        domain,
        recordType,
        outcome.error
      );
  }
}

/**
 * Resolve XMPP connection metadata for a domain.
 *
 * Stages:
 * 1. SRV lookup for _xmpp-client._tcp.{domain} and TXT lookup for _xmppconnect.{domain}, concurrently
 * 2. Any resolver failure aborts (SRV checked first)
 * 3. Both names missing -> not-found
 * 4. Transform and sort both lists; both empty -> not-found
 *
 * The domain is used as given (no case folding or hostname validation).
 *
 * @param domain Domain name (e.g., "example.com")
 * @param lookup DNS client
 * @param logger Logger for skipped records
 * @throws ResolutionError if either lookup fails for a reason other than non-existence
 */
export async function resolveXmppRecords(
  domain: string,
  lookup: DnsLookup,
  logger: Logger
): Promise<XmppLookupResult> {
  const [srv, txt] = await Promise.all([
    lookup.lookupSrv(SRV_SERVICE, SRV_PROTOCOL, domain),
    lookup.lookupTxt(`${TXT_SUBDOMAIN}.${domain}`),
  ]);

  const srvAnswers = recordsOf(srv, domain, 'srv');
  const txtRecords = recordsOf(txt, domain, 'txt');

  if (srv.status === 'not-found' && txt.status === 'not-found') {
    return { status: 'not-found' };
  }

  const servers = transformServers(srvAnswers);
  const { alternatives, malformed } = transformAlternatives(txtRecords);

  for (const raw of malformed) {
    logger.warn({ domain, record: raw }, 'Skipping TXT record without value');
  }

  if (servers.length === 0 && alternatives.length === 0) {
    return { status: 'not-found' };
  }

  return { status: 'found', servers, alternatives };
}
