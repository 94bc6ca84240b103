/**
 * Domain types shared by provisioning, the HTTP API and the CLI.
 */

import type { SagaLogEntry } from '../provisioning/saga.js';
import type { ProvisionState } from '../provisioning/state-machine.js';

/**
 * Desired resource shape of one server. Quantities use Kubernetes notation.
 */
export interface WorkloadSpec {
  /** Key injected into the management plugin config */
  readonly apiKey: string;
  readonly memoryLimit: string;
  readonly memoryRequest: string;
  readonly cpuLimit: string;
  readonly cpuRequest: string;
  readonly storageCapacity: string;
}

/**
 * Raw provisioning request before identities are sanitized.
 * Sizing fields fall back to configured defaults.
 */
export interface ProvisionRequest {
  serverName: string;
  storageName: string;
  apiKey: string;
  memoryLimit?: string;
  memoryRequest?: string;
  cpuLimit?: string;
  cpuRequest?: string;
  storageCapacity?: string;
}

/**
 * Addresses a provisioned server answers on.
 */
export interface ServerEndpoints {
  /** Host players connect to */
  gameAddress: string;
  /** Base URL of the management API */
  managementUrl: string;
}

/**
 * Outcome of storage setup.
 */
export interface StorageOutcome {
  claimName: string;
  volumeName: string;
  /** True when an existing claim was found and nothing was created */
  reused: boolean;
}

/**
 * Result of a successful provision.
 */
export interface ProvisionResult extends ServerEndpoints {
  status: 'success';
  serverName: string;
  storageName: string;
  storageReused: boolean;
  state: ProvisionState;
  log: readonly SagaLogEntry[];
}

export interface PauseResult {
  status: 'paused';
  serverName: string;
  /** Kinds whose delete was actually issued */
  deleted: string[];
}

export interface TeardownResult {
  status: 'cleaned';
  serverName: string;
  storageName: string;
}

export interface StorageDeleteResult {
  status: 'persistent_data_deleted';
  storageName: string;
}

/**
 * A managed data volume as reported by listStorage.
 */
export interface StorageSummary {
  name: string;
  namespace: string;
  createdAt: string | null;
  phase: string;
  capacity: string;
}

/**
 * Cluster connectivity report. Never raised as an error.
 */
export interface ClusterHealth {
  status: 'healthy' | 'unhealthy';
  kubernetes: string;
}
