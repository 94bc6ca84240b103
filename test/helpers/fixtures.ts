/**
 * Shared test fixtures.
 */

import type { CraftfleetConfig } from '../../src/config/index.js';
import { createServerManager, type ServerManager } from '../../src/provisioning/server-manager.js';
import { InMemoryCluster } from './in-memory-cluster.js';

export function testConfig(overrides: Partial<CraftfleetConfig> = {}): CraftfleetConfig {
  return {
    namespace: 'test-ns',
    gameDomain: 'mc.example.com',
    storageLabel: 'minecraft-storage',
    priorityClassName: 'high-priority-customer',
    nfsServer: '10.0.0.5',
    nfsBasePath: '/mnt/nfs-minecraft',
    serverImage: 'itzg/minecraft-server:latest',
    helperImage: 'busybox:1.35',
    proxySecret: 'test-secret',
    apiKey: 'test-api-key',
    port: 8000,
    host: '127.0.0.1',
    workloadDefaults: {
      memoryLimit: '4Gi',
      memoryRequest: '2Gi',
      cpuLimit: '2',
      cpuRequest: '1',
      storageCapacity: '10Gi',
    },
    wait: {
      pollIntervalMs: 5,
      claimTimeoutMs: 80,
      taskTimeoutMs: 80,
      staleTaskGraceMs: 0,
    },
    ...overrides,
  };
}

/**
 * A ServerManager over a fresh in-memory cluster.
 */
export function createTestManager(
  overrides: Partial<CraftfleetConfig> = {}
): { cluster: InMemoryCluster; manager: ServerManager } {
  const config = testConfig(overrides);
  const cluster = new InMemoryCluster(config.namespace);
  return { cluster, manager: createServerManager(config, cluster) };
}
