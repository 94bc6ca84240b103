/**
 * craftfleet Configuration Module
 *
 * Centralizes all configuration reading from environment variables
 * with validation and defaults.
 */

import { z } from 'zod';
import { createLogger } from '../utils/logger.js';

const log = createLogger('config');

/**
 * Kubernetes quantity string (e.g. "2", "500m", "4Gi")
 */
export const quantitySchema = z
  .string()
  .regex(/^\d+(\.\d+)?(m|k|Ki|M|Mi|G|Gi|T|Ti)?$/, 'Invalid Kubernetes quantity');

/**
 * Default sizing applied to a server when the request leaves a field out
 */
const workloadDefaultsSchema = z.object({
  memoryLimit: quantitySchema.default('4Gi'),
  memoryRequest: quantitySchema.default('2Gi'),
  cpuLimit: quantitySchema.default('2'),
  cpuRequest: quantitySchema.default('1'),
  storageCapacity: quantitySchema.default('10Gi'),
});

export type WorkloadDefaults = z.infer<typeof workloadDefaultsSchema>;

/**
 * Wait timing for asynchronous platform transitions
 */
const waitConfigSchema = z.object({
  /** Poll interval in milliseconds (100ms - 1min) */
  pollIntervalMs: z.coerce.number().int().min(100).max(60000).default(2000),
  /** Deadline for a claim to become Bound (1s - 30min) */
  claimTimeoutMs: z.coerce.number().int().min(1000).max(1800000).default(60000),
  /** Deadline for the directory task to finish (1s - 30min) */
  taskTimeoutMs: z.coerce.number().int().min(1000).max(1800000).default(60000),
  /** Pause after deleting a stale directory task before recreating it */
  staleTaskGraceMs: z.coerce.number().int().min(0).max(60000).default(2000),
});

export type WaitConfig = z.infer<typeof waitConfigSchema>;

/**
 * Configuration schema with validation
 */
const configSchema = z.object({
  // Cluster
  namespace: z.string().min(1).default('minecraft-servers'),
  gameDomain: z.string().min(1).default('mc.example.com'),
  storageLabel: z.string().min(1).default('minecraft-storage'),
  priorityClassName: z.string().min(1).default('high-priority-customer'),

  // Shared storage
  nfsServer: z.string().min(1, 'CRAFTFLEET_NFS_SERVER is required'),
  nfsBasePath: z.string().startsWith('/').default('/mnt/nfs-minecraft'),

  // Images
  serverImage: z.string().min(1).default('itzg/minecraft-server:latest'),
  helperImage: z.string().min(1).default('busybox:1.35'),

  // Secrets
  proxySecret: z.string().min(1, 'CRAFTFLEET_PROXY_SECRET is required'),
  apiKey: z.string().min(1).optional(),

  // Server
  port: z.coerce.number().int().min(1).max(65535).default(8000),
  host: z.string().default('0.0.0.0'),

  workloadDefaults: workloadDefaultsSchema,
  wait: waitConfigSchema,
});

export type CraftfleetConfig = z.infer<typeof configSchema>;

/**
 * Load configuration from environment variables
 */
export function loadConfig(): CraftfleetConfig {
  const raw = {
    namespace: process.env.CRAFTFLEET_NAMESPACE,
    gameDomain: process.env.CRAFTFLEET_GAME_DOMAIN,
    storageLabel: process.env.CRAFTFLEET_STORAGE_LABEL,
    priorityClassName: process.env.CRAFTFLEET_PRIORITY_CLASS,
    nfsServer: process.env.CRAFTFLEET_NFS_SERVER,
    nfsBasePath: process.env.CRAFTFLEET_NFS_BASE_PATH,
    serverImage: process.env.CRAFTFLEET_SERVER_IMAGE,
    helperImage: process.env.CRAFTFLEET_HELPER_IMAGE,
    proxySecret: process.env.CRAFTFLEET_PROXY_SECRET,
    apiKey: process.env.CRAFTFLEET_API_KEY,
    port: process.env.CRAFTFLEET_PORT,
    host: process.env.CRAFTFLEET_HOST,
    workloadDefaults: {
      memoryLimit: process.env.CRAFTFLEET_MEMORY_LIMIT,
      memoryRequest: process.env.CRAFTFLEET_MEMORY_REQUEST,
      cpuLimit: process.env.CRAFTFLEET_CPU_LIMIT,
      cpuRequest: process.env.CRAFTFLEET_CPU_REQUEST,
      storageCapacity: process.env.CRAFTFLEET_STORAGE_CAPACITY,
    },
    wait: {
      pollIntervalMs: process.env.CRAFTFLEET_POLL_INTERVAL_MS,
      claimTimeoutMs: process.env.CRAFTFLEET_CLAIM_TIMEOUT_MS,
      taskTimeoutMs: process.env.CRAFTFLEET_TASK_TIMEOUT_MS,
      staleTaskGraceMs: process.env.CRAFTFLEET_STALE_TASK_GRACE_MS,
    },
  };

  const result = configSchema.safeParse(raw);

  if (!result.success) {
    log.error({ errors: result.error.errors }, 'Invalid configuration');
    throw new Error(`Configuration validation failed: ${result.error.message}`);
  }

  // Never log the secrets themselves
  log.info(
    {
      namespace: result.data.namespace,
      gameDomain: result.data.gameDomain,
      nfsServer: result.data.nfsServer,
      nfsBasePath: result.data.nfsBasePath,
      apiKeySet: result.data.apiKey !== undefined,
    },
    'Configuration loaded'
  );

  return result.data;
}

/**
 * Singleton configuration instance
 */
let configInstance: CraftfleetConfig | null = null;

/**
 * Get the configuration singleton
 */
export function getConfig(): CraftfleetConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset configuration (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}
