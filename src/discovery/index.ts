/**
 * XMPP DNS discovery module
 * Exports the DNS client, lookup types, and high-level orchestration
 */

// Types
export {
  type DnsLookup,
  type LookupOutcome,
  type SrvAnswer,
  type RecordType,
  type XmppLookupResult,
  ResolutionError,
} from './types.js';

// Low-level DNS client
export { createDnsLookup, type DnsLookupOptions } from './dns.js';

// High-level orchestration
export { resolveXmppRecords } from './orchestrator.js';
