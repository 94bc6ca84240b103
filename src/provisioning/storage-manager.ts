/**
 * Storage Lifecycle Manager
 *
 * Ensures the durable volume pair for a storage identity exists exactly once.
 * Existing claims are reused as-is; this manager never resizes or repairs.
 */

import type { V1Job, V1PersistentVolumeClaim } from '@kubernetes/client-node';
import { ResourceNotFoundError, TaskFailedError } from '../cluster/errors.js';
import { ResourceKind, type ClusterApi } from '../cluster/types.js';
import type { StorageOutcome } from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import {
  buildDirectoryJob,
  buildPersistentVolume,
  buildPersistentVolumeClaim,
  type ManifestContext,
} from './manifests.js';
import { claimName, directoryTaskName, volumeName } from './names.js';
import { deleteIfPresent, resourceExists } from './probe.js';
import { sleep, waitUntil } from './wait.js';

const log = createLogger('provisioning:storage');

/**
 * Timing for the asynchronous parts of storage setup.
 */
export interface StorageTiming {
  pollIntervalMs: number;
  claimTimeoutMs: number;
  taskTimeoutMs: number;
  /** Pause after removing a stale task so its name is free again */
  staleTaskGraceMs: number;
}

export interface StorageManagerOptions {
  cluster: ClusterApi;
  context: ManifestContext;
  timing: StorageTiming;
}

export class StorageManager {
  private readonly cluster: ClusterApi;
  private readonly context: ManifestContext;
  private readonly timing: StorageTiming;

  constructor(options: StorageManagerOptions) {
    this.cluster = options.cluster;
    this.context = options.context;
    this.timing = options.timing;
  }

  /**
   * Make sure the claim for `storage` exists and is bound.
   */
  async ensureStorage(
    storage: string,
    capacity: string,
    signal?: AbortSignal
  ): Promise<StorageOutcome> {
    const claim = claimName(storage);
    const volume = volumeName(storage);

    if (await resourceExists(this.cluster, ResourceKind.PERSISTENT_VOLUME_CLAIM, claim)) {
      log.info({ claim }, 'Reusing existing claim');
      return { claimName: claim, volumeName: volume, reused: true };
    }

    log.info({ storage, capacity }, 'Provisioning new storage');

    await this.runDirectoryTask(storage, signal);
    await this.ensureVolume(storage, capacity);
    await this.createClaim(storage, capacity, signal);

    return { claimName: claim, volumeName: volume, reused: false };
  }

  /**
   * Irreversibly delete the claim and then its volume. Absence is fine.
   */
  async deleteStorage(storage: string): Promise<void> {
    log.warn({ storage }, 'Deleting persistent data');
    await deleteIfPresent(this.cluster, ResourceKind.PERSISTENT_VOLUME_CLAIM, claimName(storage));
    await deleteIfPresent(this.cluster, ResourceKind.PERSISTENT_VOLUME, volumeName(storage));
  }

  /**
   * Run the directory-creation Job to completion.
   */
  private async runDirectoryTask(storage: string, signal?: AbortSignal): Promise<void> {
    const taskName = directoryTaskName(storage);

    // A Job from an earlier attempt would make create fail with a conflict
    const hadStale = await this.deleteStaleTask(taskName);
    if (hadStale && this.timing.staleTaskGraceMs > 0) {
      await sleep(this.timing.staleTaskGraceMs, signal);
    }

    log.info({ taskName }, 'Starting directory task');
    await this.cluster.create(ResourceKind.JOB, buildDirectoryJob(this.context, storage));

    await waitUntil(
      async () => {
        const job = await this.cluster.read(ResourceKind.JOB, taskName);
        if (isJobSucceeded(job)) {
          return true;
        }
        if (isJobFailed(job)) {
          const logs = await this.fetchTaskLogs(taskName);
          throw new TaskFailedError(taskName, logs);
        }
        return false;
      },
      {
        intervalMs: this.timing.pollIntervalMs,
        timeoutMs: this.timing.taskTimeoutMs,
        description: `Job '${taskName}' to complete`,
        signal,
      }
    );

    log.info({ taskName }, 'Directory task completed');
  }

  private async deleteStaleTask(taskName: string): Promise<boolean> {
    try {
      await this.cluster.delete(ResourceKind.JOB, taskName, { propagationPolicy: 'Background' });
      log.info({ taskName }, 'Deleted stale directory task');
      return true;
    } catch (error) {
      if (error instanceof ResourceNotFoundError) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Best-effort capture of the failed task's output. Never throws.
   */
  private async fetchTaskLogs(taskName: string): Promise<string | null> {
    try {
      const pods = await this.cluster.listPods({ labelSelector: `job-name=${taskName}` });
      const podName = pods[0]?.metadata?.name;
      if (!podName) {
        log.warn({ taskName }, 'No pod found for failed task');
        return null;
      }
      const logs = await this.cluster.readPodLog(podName);
      log.error({ taskName, podName, logs }, 'Directory task failed');
      return logs;
    } catch (error) {
      log.warn({ taskName, err: error }, 'Could not fetch logs of failed task');
      return null;
    }
  }

  /**
   * Create the PersistentVolume unless one with the derived name already exists.
   */
  private async ensureVolume(storage: string, capacity: string): Promise<void> {
    const volume = volumeName(storage);

    // The existing volume's backing path is not compared against ours
    if (await resourceExists(this.cluster, ResourceKind.PERSISTENT_VOLUME, volume)) {
      log.info({ volume }, 'Volume already exists, not recreating');
      return;
    }

    log.info({ volume }, 'Creating volume');
    await this.cluster.create(
      ResourceKind.PERSISTENT_VOLUME,
      buildPersistentVolume(this.context, storage, capacity)
    );
  }

  private async createClaim(storage: string, capacity: string, signal?: AbortSignal): Promise<void> {
    const claim = claimName(storage);

    log.info({ claim }, 'Creating claim');
    await this.cluster.create(
      ResourceKind.PERSISTENT_VOLUME_CLAIM,
      buildPersistentVolumeClaim(this.context, storage, capacity)
    );

    await waitUntil(
      async () => isClaimBound(await this.cluster.read(ResourceKind.PERSISTENT_VOLUME_CLAIM, claim)),
      {
        intervalMs: this.timing.pollIntervalMs,
        timeoutMs: this.timing.claimTimeoutMs,
        description: `claim '${claim}' to bind`,
        signal,
      }
    );

    log.info({ claim }, 'Claim bound');
  }
}

function isJobSucceeded(job: V1Job): boolean {
  return (job.status?.succeeded ?? 0) > 0;
}

/**
 * Failed as soon as any pod of the Job has failed. Waiting for the
 * controller to exhaust its retries would outlast the task deadline.
 */
function isJobFailed(job: V1Job): boolean {
  if ((job.status?.failed ?? 0) > 0) {
    return true;
  }
  return (
    job.status?.conditions?.some(
      (condition) => condition.type === 'Failed' && condition.status === 'True'
    ) ?? false
  );
}

function isClaimBound(claim: V1PersistentVolumeClaim): boolean {
  return claim.status?.phase === 'Bound';
}
