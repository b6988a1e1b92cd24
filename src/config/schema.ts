import { z } from 'zod';

/**
 * Environment configuration schema.
 * Defaults bind the HTTP API to the loopback interface on port 8080.
 */
export const envSchema = z.object({
  XMPP_RESOLVER_HOST: z.string().min(1).default('127.0.0.1'),
  XMPP_RESOLVER_PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  // Comma-separated nameserver addresses; system resolvers when unset
  XMPP_RESOLVER_DNS_SERVERS: z
    .string()
    .optional()
    .transform((value) =>
      (value ?? '')
        .split(',')
        .map((server) => server.trim())
        .filter((server) => server.length > 0)
    ),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),
});

export type Config = z.infer<typeof envSchema>;

/**
 * Load and validate configuration from environment variables.
 * @throws ZodError if the environment is invalid
 */
export function loadConfig(): Config {
  return envSchema.parse(process.env);
}
