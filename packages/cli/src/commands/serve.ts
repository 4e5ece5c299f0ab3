import { Command, InvalidArgumentError } from 'commander';
import { formatError } from '../output/formatter.js';

interface ServeOptions {
  port?: number;
  host?: string;
  config?: string;
}

export function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidArgumentError('Port must be an integer between 1 and 65535.');
  }
  return port;
}

/** Flags win over the config file and the environment. */
export function serveOverrides(options: ServeOptions): Record<string, unknown> {
  const server: Record<string, unknown> = {};
  if (options.port !== undefined) server.port = options.port;
  if (options.host !== undefined) server.host = options.host;
  return Object.keys(server).length > 0 ? { server } : {};
}

export const serveCommand = new Command('serve')
  .description('Start the Tally HTTP API server')
  .option('-p, --port <port>', 'Server port', parsePort)
  .option('-H, --host <host>', 'Server host')
  .option('-c, --config <path>', 'Config file (default: search for tally.config.*)')
  .action(async (options: ServeOptions) => {
    // Dynamic import to avoid loading server deps for other commands
    const { ConfigManager, startServer } = await import('@tally/server');

    try {
      const config = await new ConfigManager().load({
        configPath: options.config,
        overrides: serveOverrides(options),
      });
      const running = startServer(config);

      const shutdown = () => {
        running.close().then(
          () => process.exit(0),
          (err: unknown) => {
            console.error(`Error during shutdown: ${formatError(err)}`);
            process.exit(1);
          },
        );
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);
    } catch (err) {
      console.error(`Error: ${formatError(err)}`);
      process.exit(1);
    }
  });
