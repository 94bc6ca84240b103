/**
 * Server Manager
 *
 * Boundary object the HTTP API and CLI call. Sanitizes raw identities,
 * applies sizing defaults, and delegates to the orchestrator.
 */

import { KubernetesClient } from '../cluster/kubernetes-client.js';
import type { ClusterApi } from '../cluster/types.js';
import { getConfig, type CraftfleetConfig, type WorkloadDefaults } from '../config/index.js';
import type {
  ClusterHealth,
  PauseResult,
  ProvisionRequest,
  ProvisionResult,
  StorageDeleteResult,
  StorageSummary,
  TeardownResult,
  WorkloadSpec,
} from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import type { ManifestContext } from './manifests.js';
import { toIdentity } from './names.js';
import { ProvisioningOrchestrator, type ProvisionOptions } from './orchestrator.js';

const log = createLogger('provisioning:server-manager');

export interface ServerManagerOptions {
  orchestrator: ProvisioningOrchestrator;
  defaults: WorkloadDefaults;
}

export class ServerManager {
  private readonly orchestrator: ProvisioningOrchestrator;
  private readonly defaults: WorkloadDefaults;

  constructor(options: ServerManagerOptions) {
    this.orchestrator = options.orchestrator;
    this.defaults = options.defaults;
  }

  /**
   * Provision a server, reusing its storage when it already exists.
   */
  async createServer(request: ProvisionRequest, options?: ProvisionOptions): Promise<ProvisionResult> {
    const server = toIdentity(request.serverName);
    const storage = toIdentity(request.storageName);
    const spec: WorkloadSpec = Object.freeze({
      apiKey: request.apiKey,
      memoryLimit: request.memoryLimit ?? this.defaults.memoryLimit,
      memoryRequest: request.memoryRequest ?? this.defaults.memoryRequest,
      cpuLimit: request.cpuLimit ?? this.defaults.cpuLimit,
      cpuRequest: request.cpuRequest ?? this.defaults.cpuRequest,
      storageCapacity: request.storageCapacity ?? this.defaults.storageCapacity,
    });

    log.info({ server, storage }, 'Create server requested');
    try {
      const result = await this.orchestrator.provision(server, storage, spec, options);
      log.info({ server, gameAddress: result.gameAddress }, 'Server created');
      return result;
    } catch (error) {
      log.error({ server, storage, err: error }, 'Server creation failed');
      throw error;
    }
  }

  async pauseServer(serverName: string): Promise<PauseResult> {
    const server = toIdentity(serverName);
    log.info({ server }, 'Pause requested');
    return this.orchestrator.pause(server);
  }

  async deleteServer(serverName: string, storageName: string): Promise<TeardownResult> {
    const server = toIdentity(serverName);
    const storage = toIdentity(storageName);
    log.warn({ server, storage }, 'Full deletion requested');
    try {
      return await this.orchestrator.fullTeardown(server, storage);
    } catch (error) {
      log.error({ server, storage, err: error }, 'Full deletion failed');
      throw error;
    }
  }

  async deleteServerData(storageName: string): Promise<StorageDeleteResult> {
    const storage = toIdentity(storageName);
    log.warn({ storage }, 'Data deletion requested');
    return this.orchestrator.deleteStorage(storage);
  }

  async listVolumes(): Promise<StorageSummary[]> {
    return this.orchestrator.listStorage();
  }

  async checkHealth(): Promise<ClusterHealth> {
    return this.orchestrator.healthProbe();
  }
}

/**
 * Derive the manifest settings from configuration.
 */
export function manifestContextFrom(config: CraftfleetConfig): ManifestContext {
  return {
    namespace: config.namespace,
    gameDomain: config.gameDomain,
    storageLabel: config.storageLabel,
    priorityClassName: config.priorityClassName,
    nfsServer: config.nfsServer,
    nfsBasePath: config.nfsBasePath,
    serverImage: config.serverImage,
    helperImage: config.helperImage,
    proxySecret: config.proxySecret,
  };
}

/**
 * Build a ServerManager from configuration and a cluster.
 */
export function createServerManager(config: CraftfleetConfig, cluster: ClusterApi): ServerManager {
  const orchestrator = new ProvisioningOrchestrator({
    cluster,
    context: manifestContextFrom(config),
    timing: config.wait,
  });
  return new ServerManager({ orchestrator, defaults: config.workloadDefaults });
}

let managerInstance: ServerManager | null = null;

/**
 * Get the process-wide ServerManager, connecting to the configured cluster on first use.
 */
export function getServerManager(): ServerManager {
  if (!managerInstance) {
    const config = getConfig();
    managerInstance = createServerManager(config, new KubernetesClient(config.namespace));
  }
  return managerInstance;
}

/**
 * Reset the singleton (for testing).
 */
export function resetServerManager(): void {
  managerInstance = null;
}
