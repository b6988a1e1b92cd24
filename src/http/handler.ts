/**
 * Request handler for GET /<domain>.
 *
 * Request flow:
 *   1. Reject methods other than GET (plain-text 405, before any DNS work)
 *   2. Take the domain from the path
 *   3. Set JSON, caching and CORS headers
 *   4. Resolve SRV and TXT records
 *   5. 500 / 404 fixed envelopes, or the encoded data with an ETag
 *   6. Conditional request evaluation (304 / 412 / 200)
 */

import type { IncomingMessage, ServerResponse } from 'node:http';
import type { Logger } from '../config/logger.js';
import {
  resolveXmppRecords,
  ResolutionError,
  type DnsLookup,
  type XmppLookupResult,
} from '../discovery/index.js';
import { EncodingError } from '../errors.js';
import { computeEtag, evaluatePreconditions } from './conditional.js';
import {
  encodeEnvelope,
  successEnvelope,
  INTERNAL_SERVER_ERROR_BODY,
  NOT_FOUND_BODY,
} from './envelope.js';

/** Dependencies injected into the handler */
export interface LookupHandlerDeps {
  lookup: DnsLookup;
  logger: Logger;
  /** Terminates the process after a fatal defect; defaults to process.exit */
  exit?: (code: number) => void;
}

/** Seconds clients and shared caches may reuse a response */
export const CACHE_MAX_AGE = 900;

/**
 * Send a plain-text protocol error (not a JSON envelope).
 */
function sendText(res: ServerResponse, statusCode: number, text: string): void {
  res.writeHead(statusCode, {
    'Content-Type': 'text/plain; charset=utf-8',
    'X-Content-Type-Options': 'nosniff',
  });
  res.end(`${text}\n`);
}

/**
 * Write a pre-serialized error envelope followed by a newline.
 * Relies on the headers already set on the response.
 */
function sendErrorBody(res: ServerResponse, statusCode: number, body: string): void {
  res.statusCode = statusCode;
  res.end(`${body}\n`);
}

/**
 * Domain from the request target: the decoded path without its leading '/'.
 * The path is taken verbatim; '//' and dot segments are not resolved.
 * Returns null if the path cannot be decoded.
 */
export function extractDomain(target: string): string | null {
  const queryStart = target.indexOf('?');
  const path = queryStart === -1 ? target : target.slice(0, queryStart);
  try {
    return decodeURIComponent(path).slice(1);
  } catch {
    return null;
  }
}

function sendRecords(req: IncomingMessage, res: ServerResponse, body: string): void {
  const etag = computeEtag(body);
  res.setHeader('ETag', etag);

  switch (evaluatePreconditions(req.headers, etag)) {
    case 'not-modified':
      res.removeHeader('Content-Type');
      res.statusCode = 304;
      res.end();
      return;
    case 'precondition-failed':
      res.statusCode = 412;
      res.end();
      return;
    case 'send':
      res.setHeader('Content-Length', Buffer.byteLength(body));
      res.statusCode = 200;
      res.end(body);
      return;
  }
}

async function handleLookup(
  req: IncomingMessage,
  res: ServerResponse,
  domain: string,
  deps: LookupHandlerDeps
): Promise<void> {
  let result: XmppLookupResult;
  try {
    result = await resolveXmppRecords(domain, deps.lookup, deps.logger);
  } catch (error) {
    if (error instanceof ResolutionError) {
      deps.logger.error(
        { domain, recordType: error.recordType, err: error.cause },
        `Error resolving ${error.recordType.toUpperCase()} records`
      );
      sendErrorBody(res, 500, INTERNAL_SERVER_ERROR_BODY);
      return;
    }
    throw error;
  }

  if (result.status === 'not-found') {
    sendErrorBody(res, 404, NOT_FOUND_BODY);
    return;
  }

  sendRecords(req, res, encodeEnvelope(successEnvelope(result)));
}

/**
 * Create the lookup request handler.
 *
 * Returns a `(req, res) => void` function that can be attached to an HTTP
 * server's 'request' event.
 */
export function createLookupHandler(
  deps: LookupHandlerDeps
): (req: IncomingMessage, res: ServerResponse) => void {
  const { logger } = deps;
  const exit = deps.exit ?? ((code: number) => process.exit(code));

  return (req: IncomingMessage, res: ServerResponse): void => {
    const method = req.method ?? 'GET';
    let domain: string | null = null;

    res.on('finish', () => {
      logger.debug({ method, domain, status: res.statusCode }, 'Request completed');
    });

    if (method !== 'GET') {
      res.setHeader('Allow', 'GET');
      sendText(res, 405, `This resource does not accept ${method} requests.`);
      return;
    }

    domain = extractDomain(req.url ?? '/');
    if (domain === null) {
      sendText(res, 400, 'Bad Request');
      return;
    }
    const lookupDomain = domain;

    res.setHeader('Content-Type', 'application/json; charset=utf-8');
    res.setHeader('Cache-Control', `public, max-age=${CACHE_MAX_AGE}`);
    res.setHeader('Access-Control-Allow-Origin', '*');

    handleLookup(req, res, lookupDomain, deps).catch((error: unknown) => {
      if (error instanceof EncodingError) {
        logger.fatal({ domain: lookupDomain, err: error.cause }, 'Error encoding response envelope');
        exit(1);
        return;
      }

      logger.error({ domain: lookupDomain, err: error }, 'Unexpected error handling request');
      if (res.headersSent) {
        res.destroy();
        return;
      }
      sendErrorBody(res, 500, INTERNAL_SERVER_ERROR_BODY);
    });
  };
}
