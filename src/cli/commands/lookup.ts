/**
 * Lookup command - resolve a domain once and print the response envelope.
 * Output is the exact body the HTTP API would return for GET /<domain>.
 */
import { loadConfig } from '../../config/schema.js';
import { createLogger } from '../../config/logger.js';
import { createDnsLookup, resolveXmppRecords, ResolutionError } from '../../discovery/index.js';
import {
  encodeEnvelope,
  successEnvelope,
  INTERNAL_SERVER_ERROR_BODY,
  NOT_FOUND_BODY,
} from '../../http/envelope.js';

/** Exit codes of the lookup command */
export const LOOKUP_EXIT_CODES = {
  found: 0,
  resolutionError: 1,
  notFound: 2,
} as const;

/**
 * Run a single lookup and write the envelope to stdout.
 * Sets process.exitCode according to the outcome.
 */
export async function runLookup(domain: string): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.LOG_LEVEL);
  const lookup = createDnsLookup({ servers: config.XMPP_RESOLVER_DNS_SERVERS });

  try {
    const result = await resolveXmppRecords(domain, lookup, logger);

    if (result.status === 'not-found') {
      process.stdout.write(`${NOT_FOUND_BODY}\n`);
      process.exitCode = LOOKUP_EXIT_CODES.notFound;
      return;
    }

    process.stdout.write(encodeEnvelope(successEnvelope(result)));
    process.exitCode = LOOKUP_EXIT_CODES.found;
  } catch (error) {
    if (!(error instanceof ResolutionError)) {
      throw error;
    }
    logger.error(
      { domain, recordType: error.recordType, err: error.cause },
      `Error resolving ${error.recordType.toUpperCase()} records`
    );
    process.stdout.write(`${INTERNAL_SERVER_ERROR_BODY}\n`);
    process.exitCode = LOOKUP_EXIT_CODES.resolutionError;
  }
}
