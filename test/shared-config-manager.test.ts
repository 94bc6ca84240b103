/**
 * Shared Config Manager Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ResourceKind } from '../src/cluster/types.js';
import { renderSharedConfig, type ManifestContext } from '../src/provisioning/manifests.js';
import { SharedConfigManager } from '../src/provisioning/shared-config-manager.js';
import { InMemoryCluster } from './helpers/in-memory-cluster.js';

const ctx: ManifestContext = {
  namespace: 'test-ns',
  gameDomain: 'mc.example.com',
  storageLabel: 'minecraft-storage',
  priorityClassName: 'high-priority-customer',
  nfsServer: '10.0.0.5',
  nfsBasePath: '/mnt/nfs-minecraft',
  serverImage: 'itzg/minecraft-server:latest',
  helperImage: 'busybox:1.35',
  proxySecret: 'test-secret',
};

describe('SharedConfigManager', () => {
  let cluster: InMemoryCluster;
  let manager: SharedConfigManager;

  beforeEach(() => {
    cluster = new InMemoryCluster();
    manager = new SharedConfigManager({ cluster, context: ctx });
  });

  it('should create the shared config when absent', async () => {
    await expect(manager.ensureSharedConfig()).resolves.toBe('created');

    const configMap = cluster.get(ResourceKind.CONFIG_MAP, 'paper-global-config');
    expect(configMap?.data).toEqual({ 'paper-global.yml': renderSharedConfig('test-secret') });
  });

  it('should merge its key into an existing config and keep the other keys', async () => {
    cluster.seed(ResourceKind.CONFIG_MAP, {
      metadata: { name: 'paper-global-config' },
      data: { 'paper-global.yml': 'old', 'extra.yml': 'kept' },
    });

    await expect(manager.ensureSharedConfig()).resolves.toBe('updated');

    expect(cluster.get(ResourceKind.CONFIG_MAP, 'paper-global-config')?.data).toEqual({
      'paper-global.yml': renderSharedConfig('test-secret'),
      'extra.yml': 'kept',
    });
    expect(cluster.callsOf('create')).toHaveLength(0);
  });

  it('should create once when called concurrently', async () => {
    cluster.latencyMs = 5;

    const outcomes = await Promise.all([
      manager.ensureSharedConfig(),
      manager.ensureSharedConfig(),
      manager.ensureSharedConfig(),
    ]);

    expect(outcomes).toEqual(['created', 'updated', 'updated']);
    expect(cluster.callsOf('create', ResourceKind.CONFIG_MAP)).toHaveLength(1);
  });
});
