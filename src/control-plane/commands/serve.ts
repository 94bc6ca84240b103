import { Command } from 'commander';
import { z } from 'zod';
import { getConfig } from '../../config/index.js';
import { getServerManager } from '../../provisioning/server-manager.js';
import { startServer } from '../../server/index.js';
import { createLogger } from '../../utils/logger.js';
import {
  print,
  printError,
  formatError,
  formatValidationErrors,
  formatWarning,
  bold,
  cyan,
} from '../formatter.js';

const logger = createLogger('cli:serve');

/**
 * Schema for serve command options.
 * Port and host fall back to configuration when not given.
 */
const serveOptionsSchema = z.object({
  port: z.coerce.number().int().min(1).max(65535).optional(),
  host: z.string().min(1).optional(),
  corsOrigin: z.string().optional(),
});

type ServeOptions = z.infer<typeof serveOptionsSchema>;

/**
 * Create the serve command.
 */
export function createServeCommand(): Command {
  const command = new Command('serve')
    .description('Start the craftfleet HTTP server')
    .option('-p, --port <port>', 'Port to listen on (default: CRAFTFLEET_PORT or 8000)')
    .option('-H, --host <host>', 'Host to bind to (default: CRAFTFLEET_HOST or 0.0.0.0)')
    .option('--cors-origin <origin>', 'CORS origin to allow (can specify multiple with comma)')
    .action(async (options: Record<string, unknown>) => {
      try {
        await executeServe(options);
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

/**
 * Execute the serve command.
 */
async function executeServe(rawOptions: Record<string, unknown>): Promise<void> {
  // Validate options
  const optionsResult = serveOptionsSchema.safeParse(rawOptions);
  if (!optionsResult.success) {
    printError(
      formatValidationErrors(
        optionsResult.error.errors.map((e) => ({
          path: e.path.join('.'),
          message: e.message,
        }))
      )
    );
    process.exitCode = 1;
    return;
  }

  const options: ServeOptions = optionsResult.data;
  const config = getConfig();

  if (!config.apiKey) {
    printError(formatError('CRAFTFLEET_API_KEY must be set before serving the API'));
    process.exitCode = 1;
    return;
  }

  const port = options.port ?? config.port;
  const host = options.host ?? config.host;

  // Parse CORS origins
  const corsOrigins = options.corsOrigin
    ? options.corsOrigin.split(',').map((o) => o.trim())
    : ['*'];

  print(`Starting craftfleet server...`);
  print('');
  print(`${bold('Namespace:')} ${cyan(config.namespace)}`);
  print(`${bold('Domain:')} ${cyan(config.gameDomain)}`);
  print(`${bold('Port:')} ${cyan(String(port))}`);
  print(`${bold('Host:')} ${cyan(host)}`);
  print(`${bold('CORS Origins:')} ${cyan(corsOrigins.join(', '))}`);
  print('');

  logger.info({ namespace: config.namespace, domain: config.gameDomain }, 'Starting API');

  // One connectivity check; the API still starts when the cluster is unreachable
  const manager = getServerManager();
  const health = await manager.checkHealth();
  if (health.status === 'healthy') {
    logger.info('Kubernetes API reachable');
  } else {
    logger.warn({ kubernetes: health.kubernetes }, 'Kubernetes API not reachable at startup');
    print(formatWarning(`Kubernetes API not reachable: ${health.kubernetes}`));
  }

  // Start the server
  const server = await startServer({
    port,
    host,
    corsOrigins,
    apiKey: config.apiKey,
    serverManager: manager,
  });

  // Handle shutdown signals
  const shutdown = (): void => {
    print('');
    print('Shutting down server...');
    server.close().then(() => {
      print('Server stopped');
      process.exit(0);
    }).catch((err: unknown) => {
      printError(formatError(err instanceof Error ? err.message : String(err)));
      process.exit(1);
    });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  print(`Server is running at ${cyan(`http://${host}:${port}`)}`);
  print('');
  print('Available endpoints:');
  print(`  ${cyan('GET')}    /health                                   - Cluster connectivity`);
  print(`  ${cyan('GET')}    /health/live                              - Liveness check`);
  print(`  ${cyan('POST')}   /api/v1/servers                           - Create a server`);
  print(`  ${cyan('POST')}   /api/v1/servers/:serverName/pause         - Pause a server`);
  print(`  ${cyan('DELETE')} /api/v1/servers/:serverName/:storageName  - Delete server and data`);
  print(`  ${cyan('GET')}    /api/v1/volumes                           - List data volumes`);
  print(`  ${cyan('DELETE')} /api/v1/volumes/:storageName              - Delete a data volume`);
  print('');
  print('Press Ctrl+C to stop the server');
}
