/**
 * CLI entry point using Commander.js.
 * Routes between the HTTP server (default) and one-shot lookups.
 */
import { Command, InvalidArgumentError } from 'commander';
import { startServer, SERVER_VERSION } from '../http/server.js';

/**
 * Parse a --port value.
 * @throws InvalidArgumentError if not an integer in 0-65535
 */
export function parsePort(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('Port must be an integer.');
  }
  const port = parseInt(value, 10);
  if (port > 65535) {
    throw new InvalidArgumentError('Port must be between 0 and 65535.');
  }
  return port;
}

interface ServeCommandOptions {
  host?: string;
  port?: number;
}

/**
 * Create and configure the CLI program.
 * @returns Configured Commander program
 */
export function createCLI(): Command {
  const program = new Command();

  program
    .name('xmpp-resolver')
    .description('HTTP API resolving XMPP connection metadata from DNS')
    .version(SERVER_VERSION);

  // Default action: start HTTP server (no subcommand)
  program
    .option('-H, --host <host>', 'listen address (overrides XMPP_RESOLVER_HOST)')
    .option('-p, --port <port>', 'listen port (overrides XMPP_RESOLVER_PORT)', parsePort)
    .action(async (options: ServeCommandOptions) => {
      await startServer(options);
    });

  program
    .command('lookup')
    .description('Resolve a domain once and print the JSON envelope')
    .argument('<domain>', 'domain to resolve (e.g. example.com)')
    .action(async (domain: string) => {
      const { runLookup } = await import('./commands/lookup.js');
      await runLookup(domain);
    });

  return program;
}

/**
 * Run the CLI program.
 * Uses parseAsync for proper async action handling.
 */
export async function runCLI(argv: string[] = process.argv): Promise<void> {
  const program = createCLI();
  await program.parseAsync(argv);
}
