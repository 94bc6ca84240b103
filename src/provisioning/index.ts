/**
 * Provisioning Module
 *
 * Exports the orchestrator, its managers and the naming contract.
 */

export * from './names.js';
export { waitUntil, sleep, type WaitOptions, type WaitResult } from './wait.js';
export { resourceExists, deleteIfPresent } from './probe.js';
export { Mutex, KeyedLock } from './keyed-lock.js';
export { Saga, type SagaStep, type SagaLogEntry, type SagaLogStatus } from './saga.js';
export {
  ProvisionState,
  ProvisionEvent,
  ProvisioningStateMachine,
  InvalidTransitionError,
  isTerminalState,
  getNextState,
  type ProvisionTransition,
} from './state-machine.js';
export * from './manifests.js';
export { StorageManager, type StorageTiming } from './storage-manager.js';
export { EphemeralManager, EPHEMERAL_KINDS, ephemeralNames, type EphemeralKind } from './ephemeral-manager.js';
export { SharedConfigManager, type SharedConfigOutcome } from './shared-config-manager.js';
export { ProvisioningOrchestrator, type OrchestratorOptions, type ProvisionOptions } from './orchestrator.js';
export {
  ServerManager,
  createServerManager,
  getServerManager,
  resetServerManager,
  manifestContextFrom,
} from './server-manager.js';
