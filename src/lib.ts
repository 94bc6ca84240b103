/**
 * Library entry point.
 *
 * Embedders build a ServerManager over their own ClusterApi, or use the
 * Kubernetes-backed one configured from the environment.
 */

export * from './cluster/index.js';
export * from './provisioning/index.js';
export {
  loadConfig,
  getConfig,
  resetConfig,
  type CraftfleetConfig,
  type WorkloadDefaults,
  type WaitConfig,
} from './config/index.js';
export { createApp, startServer, stopServer, type AppConfig } from './server/index.js';
export type * from './types/index.js';
export { createLogger } from './utils/logger.js';
