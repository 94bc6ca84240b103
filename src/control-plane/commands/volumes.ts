import { Command } from 'commander';
import { z } from 'zod';
import { getServerManager, type ServerManager } from '../../provisioning/server-manager.js';
import {
  print,
  printError,
  formatError,
  formatJson,
  formatVolumeList,
  formatValidationErrors,
} from '../formatter.js';

/**
 * Schema for volumes command options
 */
const volumesOptionsSchema = z.object({
  json: z.boolean().default(false),
});

/**
 * Create the volumes command.
 * The manager is resolved lazily so configuration is only read when the command runs.
 */
export function createVolumesCommand(
  getManager: () => ServerManager = getServerManager
): Command {
  const command = new Command('volumes')
    .description('List the data volumes managed by craftfleet')
    .option('--json', 'Output as JSON', false)
    .action(async (options: Record<string, unknown>) => {
      try {
        await executeVolumes(options, getManager);
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

/**
 * Execute the volumes command.
 */
async function executeVolumes(
  rawOptions: Record<string, unknown>,
  getManager: () => ServerManager
): Promise<void> {
  const optionsResult = volumesOptionsSchema.safeParse(rawOptions);
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

  const volumes = await getManager().listVolumes();

  if (optionsResult.data.json) {
    print(formatJson(volumes));
    return;
  }

  print(formatVolumeList(volumes));
}
