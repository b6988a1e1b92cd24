/**
 * HTTP server for the XMPP lookup API.
 * Binds node:http to the configured address and shuts down on SIGINT/SIGTERM.
 */
import { createServer, type Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import { loadConfig } from '../config/schema.js';
import { createLogger, type Logger } from '../config/logger.js';
import { createDnsLookup } from '../discovery/index.js';
import { formatStartupError } from '../errors.js';
import { createLookupHandler, type LookupHandlerDeps } from './handler.js';

/** Server version (matches package.json) */
export const SERVER_VERSION = '0.1.0';

export interface ServeOptions {
  /** Overrides XMPP_RESOLVER_HOST */
  host?: string;
  /** Overrides XMPP_RESOLVER_PORT */
  port?: number;
}

export function createHttpServer(deps: LookupHandlerDeps): Server {
  return createServer(createLookupHandler(deps));
}

/**
 * Start listening; resolves with the bound address.
 */
export function listen(server: Server, port: number, host: string): Promise<AddressInfo> {
  return new Promise((resolve, reject) => {
    const onError = (error: Error) => reject(error);
    server.once('error', onError);
    server.listen(port, host, () => {
      server.off('error', onError);
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error(`Unexpected server address: ${String(address)}`));
        return;
      }
      resolve(address);
    });
  });
}

export function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
    server.closeIdleConnections();
  });
}

/**
 * Close the server on SIGINT/SIGTERM.
 */
function registerShutdown(server: Server, logger: Logger): void {
  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'Shutting down');
    closeServer(server).then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ err: error }, 'Error closing server');
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

/**
 * Start the HTTP API.
 * Exits with code 1 on startup failure.
 */
export async function startServer(options: ServeOptions = {}): Promise<void> {
  let address: string | undefined;
  let logger: Logger | undefined;

  try {
    // Step 1: Load and validate configuration
    const config = loadConfig();
    const host = options.host ?? config.XMPP_RESOLVER_HOST;
    const port = options.port ?? config.XMPP_RESOLVER_PORT;
    address = `${host}:${port}`;

    // Step 2: Initialize logger
    logger = createLogger(config.LOG_LEVEL);
    logger.info({ version: SERVER_VERSION }, 'Starting xmpp-resolver');

    // Step 3: Create DNS client and HTTP server
    const lookup = createDnsLookup({ servers: config.XMPP_RESOLVER_DNS_SERVERS });
    const server = createHttpServer({ lookup, logger });

    // Step 4: Bind
    const bound = await listen(server, port, host);
    logger.info({ host: bound.address, port: bound.port }, 'HTTP server listening');

    registerShutdown(server, logger);
  } catch (error) {
    const errorMessage = formatStartupError(
      error instanceof Error ? error : new Error(String(error)),
      address
    );

    if (logger) {
      logger.fatal({ err: error }, 'Startup failed');
    }
    process.stderr.write(`\n${errorMessage}\n`);
    process.exit(1);
  }
}
