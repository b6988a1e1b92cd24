/**
 * DNS client for XMPP discovery, backed by node:dns
 * RFC 6120 Section 3.2.1 (SRV) and XEP-0156 (TXT _xmppconnect)
 */

import { promises as dns } from 'node:dns';
import type { DnsLookup, LookupOutcome, SrvAnswer } from './types.js';

export interface DnsLookupOptions {
  /** Upstream nameservers (e.g. ["1.1.1.1", "[2606:4700::1111]:53"]); system resolvers when omitted */
  servers?: string[];
}

/**
 * Resolver error codes meaning "no such record".
 * ENOTFOUND is NXDOMAIN, ENODATA is an existing name without records of the queried type.
 */
const NOT_FOUND_CODES = new Set(['ENOTFOUND', 'ENODATA']);

function isNotFound(error: unknown): boolean {
  return (
    error !== null &&
    typeof error === 'object' &&
    'code' in error &&
    typeof error.code === 'string' &&
    NOT_FOUND_CODES.has(error.code)
  );
}

/**
 * Run a resolver query and classify its outcome.
 */
async function classify<T>(query: () => Promise<T[]>): Promise<LookupOutcome<T>> {
  try {
    const records = await query();
    return { status: 'found', records };
  } catch (error) {
    if (isNotFound(error)) {
      return { status: 'not-found' };
    }
    return {
      status: 'error',
      error: error instanceof Error ? error : new Error(String(error)),
    };
  }
}

/**
 * Create a DnsLookup using a dedicated node:dns Resolver.
 */
export function createDnsLookup(options: DnsLookupOptions = {}): DnsLookup {
  const resolver = new dns.Resolver();
  if (options.servers && options.servers.length > 0) {
    resolver.setServers(options.servers);
  }

  return {
    lookupSrv(service, protocol, domain) {
      return classify<SrvAnswer>(async () => {
        const records = await resolver.resolveSrv(`_${service}._${protocol}.${domain}`);
        return records.map((record) => ({
          target: record.name,
          port: record.port,
          priority: record.priority,
          weight: record.weight,
        }));
      });
    },

    lookupTxt(name) {
      // A TXT record may be split into several character-strings; join them back
      return classify<string>(async () => {
        const records = await resolver.resolveTxt(name);
        return records.map((chunks) => chunks.join(''));
      });
    },
  };
}
