/**
 * Provisioning Orchestrator
 *
 * Sequences storage, shared config and the ephemeral set into provision,
 * pause and teardown workflows. Each provision runs as a saga: on failure the
 * ephemeral set is deleted and the original error re-thrown. Storage is never
 * undone by a failed provision.
 *
 * Every workflow holds a per-identity lock, so two calls touching the same
 * server or storage never interleave.
 */

import type { ClusterApi } from '../cluster/types.js';
import type {
  ClusterHealth,
  PauseResult,
  ProvisionResult,
  StorageDeleteResult,
  StorageSummary,
  TeardownResult,
  WorkloadSpec,
} from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import { EphemeralManager } from './ephemeral-manager.js';
import { KeyedLock } from './keyed-lock.js';
import type { ManifestContext } from './manifests.js';
import { Saga } from './saga.js';
import { SharedConfigManager } from './shared-config-manager.js';
import { ProvisionEvent, ProvisionState, ProvisioningStateMachine } from './state-machine.js';
import { StorageManager, type StorageTiming } from './storage-manager.js';

const log = createLogger('provisioning:orchestrator');

/** Compensation id shared by every step that leaves ephemeral objects behind */
const EPHEMERAL_COMPENSATION = 'delete-ephemeral-set';

export interface OrchestratorOptions {
  cluster: ClusterApi;
  context: ManifestContext;
  timing: StorageTiming;
  /** Shared lock table; pass one in to serialize across orchestrators */
  locks?: KeyedLock;
}

export interface ProvisionOptions {
  /** Cancels in-flight waits */
  signal?: AbortSignal;
}

function serverLock(server: string): string {
  return `server:${server}`;
}

function storageLock(storage: string): string {
  return `storage:${storage}`;
}

export class ProvisioningOrchestrator {
  readonly storage: StorageManager;
  readonly ephemeral: EphemeralManager;
  readonly sharedConfig: SharedConfigManager;

  private readonly cluster: ClusterApi;
  private readonly context: ManifestContext;
  private readonly locks: KeyedLock;

  constructor(options: OrchestratorOptions) {
    this.cluster = options.cluster;
    this.context = options.context;
    this.locks = options.locks ?? new KeyedLock();
    this.storage = new StorageManager(options);
    this.ephemeral = new EphemeralManager(options);
    this.sharedConfig = new SharedConfigManager(options);
  }

  /**
   * Bring up `server` backed by `storage`. Identities must already be sanitized.
   */
  async provision(
    server: string,
    storage: string,
    spec: WorkloadSpec,
    options: ProvisionOptions = {}
  ): Promise<ProvisionResult> {
    return this.locks.withLocks([serverLock(server), storageLock(storage)], () =>
      this.runProvision(server, storage, spec, options)
    );
  }

  /**
   * Remove the ephemeral set of `server`. Data is untouched.
   */
  async pause(server: string): Promise<PauseResult> {
    return this.locks.withLock(serverLock(server), async () => {
      const deleted = await this.ephemeral.deleteSet(server);
      log.info({ server, deleted }, 'Server paused');
      return { status: 'paused', serverName: server, deleted };
    });
  }

  /**
   * Remove the ephemeral set and irreversibly delete the data of `storage`.
   * Deletes already issued are not undone if a later one fails.
   */
  async fullTeardown(server: string, storage: string): Promise<TeardownResult> {
    return this.locks.withLocks([serverLock(server), storageLock(storage)], async () => {
      log.warn({ server, storage }, 'Full teardown started');
      await this.ephemeral.deleteSet(server);
      await this.storage.deleteStorage(storage);
      log.info({ server, storage }, 'Full teardown completed');
      return { status: 'cleaned', serverName: server, storageName: storage };
    });
  }

  /**
   * Irreversibly delete the data of `storage` only.
   */
  async deleteStorage(storage: string): Promise<StorageDeleteResult> {
    return this.locks.withLock(storageLock(storage), async () => {
      await this.storage.deleteStorage(storage);
      return { status: 'persistent_data_deleted', storageName: storage };
    });
  }

  /**
   * List the claims carrying the managed-storage label.
   */
  async listStorage(): Promise<StorageSummary[]> {
    const claims = await this.cluster.listClaims(`type=${this.context.storageLabel}`);

    return claims.map((claim) => ({
      name: claim.metadata?.name ?? '',
      namespace: claim.metadata?.namespace ?? this.cluster.namespace,
      createdAt: claim.metadata?.creationTimestamp
        ? new Date(claim.metadata.creationTimestamp).toISOString()
        : null,
      phase: claim.status?.phase ?? 'Unknown',
      capacity: claim.status?.capacity?.['storage'] ?? 'N/A',
    }));
  }

  /**
   * Check API connectivity by listing at most one pod. Never throws.
   */
  async healthProbe(): Promise<ClusterHealth> {
    try {
      await this.cluster.listPods({ limit: 1 });
      return { status: 'healthy', kubernetes: 'connected' };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.warn({ err: error }, 'Cluster health probe failed');
      return { status: 'unhealthy', kubernetes: `error: ${message}` };
    }
  }

  private async runProvision(
    server: string,
    storage: string,
    spec: WorkloadSpec,
    options: ProvisionOptions
  ): Promise<ProvisionResult> {
    const machine = new ProvisioningStateMachine(server);
    const saga = new Saga(`provision:${server}`, log);
    const deleteEphemeral = {
      id: EPHEMERAL_COMPENSATION,
      run: async (): Promise<void> => {
        await this.ephemeral.deleteSet(server);
      },
    };

    log.info({ server, storage }, 'Provisioning started');

    try {
      await saga.run({
        name: 'cleanup-stale-ephemeral',
        run: () => this.ephemeral.deleteSet(server),
      });
      machine.apply(ProvisionEvent.EPHEMERAL_CLEANED);

      await saga.run({
        name: 'ensure-shared-config',
        run: () => this.sharedConfig.ensureSharedConfig(),
      });
      machine.apply(ProvisionEvent.SHARED_CONFIG_ENSURED);

      await saga.run({
        name: 'create-server-config',
        run: () => this.ephemeral.createConfig(server, spec.apiKey),
        compensation: deleteEphemeral,
      });
      machine.apply(ProvisionEvent.SERVER_CONFIG_CREATED);

      const storageOutcome = await saga.run({
        name: 'ensure-storage',
        run: () => this.storage.ensureStorage(storage, spec.storageCapacity, options.signal),
      });
      machine.apply(ProvisionEvent.STORAGE_ENSURED);

      const endpoints = await saga.run({
        name: 'create-workload',
        run: () => this.ephemeral.createWorkload(server, storage, spec),
        compensation: deleteEphemeral,
      });
      machine.apply(ProvisionEvent.WORKLOAD_CREATED);

      machine.apply(ProvisionEvent.COMPLETED);
      log.info({ server, storage, reused: storageOutcome.reused }, 'Provisioning completed');

      return {
        status: 'success',
        serverName: server,
        storageName: storage,
        ...endpoints,
        storageReused: storageOutcome.reused,
        state: machine.state,
        log: saga.log,
      };
    } catch (error) {
      const compensate = machine.requiresCompensation;
      machine.apply(ProvisionEvent.STEP_FAILED);

      if (compensate) {
        log.warn({ server, err: error }, 'Provisioning failed, rolling back ephemeral resources');
        await saga.compensate();
      } else {
        log.error({ server, err: error }, 'Provisioning failed before any resource was created');
      }

      if (machine.state === ProvisionState.ROLLED_BACK) {
        log.info({ server, log: saga.log }, 'Rollback finished');
      }
      throw error;
    }
  }
}
