import { ZodError } from 'zod';

export { ResolutionError } from './discovery/types.js';

/**
 * Raised when a response envelope cannot be serialized.
 * Envelopes are built internally, so this is a defect, not a request error.
 */
export class EncodingError extends Error {
  constructor(
    message: string,
    public readonly cause: unknown
  ) {
    super(message);
    this.name = 'EncodingError';
  }
}

function errorCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

export function formatStartupError(error: Error, address?: string): string {
  // Handle Zod validation errors
  if (error instanceof ZodError) {
    const issues = error.issues.map((issue) => {
      const field = issue.path.join('.');
      return `  ${field}: ${issue.message}`;
    });
    return [
      'Configuration validation failed:',
      ...issues,
      '',
      'Fix: Check your environment variables.',
      'Listener: XMPP_RESOLVER_HOST, XMPP_RESOLVER_PORT (0-65535)',
      'Resolver: XMPP_RESOLVER_DNS_SERVERS (comma-separated addresses)',
      'Logging: LOG_LEVEL (fatal, error, warn, info, debug, trace)',
    ].join('\n');
  }

  const addressContext = address ? ` ${address}` : '';
  const code = errorCode(error);

  if (code === 'EADDRINUSE') {
    return [
      `Address${addressContext} is already in use.`,
      '',
      'Fix: Stop the other process or choose another port with XMPP_RESOLVER_PORT.',
    ].join('\n');
  }

  if (code === 'EACCES') {
    return [
      `Permission denied binding${addressContext}.`,
      '',
      'Fix: Use a port above 1023 with XMPP_RESOLVER_PORT, or run with the required privileges.',
    ].join('\n');
  }

  if (code === 'EADDRNOTAVAIL') {
    return [
      `Address${addressContext} is not available on this host.`,
      '',
      'Fix: Set XMPP_RESOLVER_HOST to a local interface address.',
    ].join('\n');
  }

  // DNS server list rejected by node:dns
  if (code === 'ERR_INVALID_IP_ADDRESS') {
    return [
      `Invalid DNS server address: ${error.message}`,
      '',
      'Fix: XMPP_RESOLVER_DNS_SERVERS must list IP addresses, optionally with a port.',
    ].join('\n');
  }

  // Fallback
  return [
    `Unexpected error: ${error.message}`,
    '',
    'Fix: Check your configuration and try again.',
  ].join('\n');
}
