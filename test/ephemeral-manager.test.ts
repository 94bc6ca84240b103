/**
 * Ephemeral Resource Set Manager Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { PlatformFaultError } from '../src/cluster/errors.js';
import { ResourceKind } from '../src/cluster/types.js';
import { EphemeralManager, ephemeralNames } from '../src/provisioning/ephemeral-manager.js';
import type { ManifestContext } from '../src/provisioning/manifests.js';
import type { WorkloadSpec } from '../src/types/index.js';
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

const spec: WorkloadSpec = {
  apiKey: 'test-key',
  memoryLimit: '4Gi',
  memoryRequest: '2Gi',
  cpuLimit: '2',
  cpuRequest: '1',
  storageCapacity: '10Gi',
};

function seedSet(cluster: InMemoryCluster, server: string): void {
  const names = ephemeralNames(server);
  cluster.seed(ResourceKind.DEPLOYMENT, { metadata: { name: names.Deployment } });
  cluster.seed(ResourceKind.SERVICE, { metadata: { name: names.Service } });
  cluster.seed(ResourceKind.INGRESS, { metadata: { name: names.Ingress } });
  cluster.seed(ResourceKind.CONFIG_MAP, { metadata: { name: names.ConfigMap } });
}

describe('EphemeralManager', () => {
  let cluster: InMemoryCluster;
  let manager: EphemeralManager;

  beforeEach(() => {
    cluster = new InMemoryCluster();
    manager = new EphemeralManager({ cluster, context: ctx });
  });

  describe('deleteSet()', () => {
    it('should delete all four objects in order', async () => {
      seedSet(cluster, 'alpha');

      const deleted = await manager.deleteSet('alpha');

      expect(deleted).toEqual(['Deployment', 'Service', 'Ingress', 'ConfigMap']);
      expect(cluster.callsOf('delete').map((c) => c.name)).toEqual([
        'alpha',
        'alpha-svc',
        'servertap-alpha-ingress',
        'servertap-config-alpha',
      ]);
    });

    it('should skip objects that are already gone', async () => {
      cluster.seed(ResourceKind.SERVICE, { metadata: { name: 'alpha-svc' } });

      await expect(manager.deleteSet('alpha')).resolves.toEqual(['Service']);
    });

    it('should never touch the shared config', async () => {
      seedSet(cluster, 'alpha');
      cluster.seed(ResourceKind.CONFIG_MAP, { metadata: { name: 'paper-global-config' } });

      await manager.deleteSet('alpha');

      expect(cluster.names(ResourceKind.CONFIG_MAP)).toEqual(['paper-global-config']);
    });

    it('should leave other servers alone', async () => {
      seedSet(cluster, 'alpha');
      seedSet(cluster, 'beta');

      await manager.deleteSet('alpha');

      expect(cluster.names(ResourceKind.DEPLOYMENT)).toEqual(['beta']);
    });

    it('should attempt every object and rethrow a single platform fault', async () => {
      seedSet(cluster, 'alpha');
      cluster.failOn('delete', ResourceKind.SERVICE);

      await expect(manager.deleteSet('alpha')).rejects.toBeInstanceOf(PlatformFaultError);
      expect(cluster.has(ResourceKind.DEPLOYMENT, 'alpha')).toBe(false);
      expect(cluster.has(ResourceKind.SERVICE, 'alpha-svc')).toBe(true);
      expect(cluster.has(ResourceKind.INGRESS, 'servertap-alpha-ingress')).toBe(false);
      expect(cluster.has(ResourceKind.CONFIG_MAP, 'servertap-config-alpha')).toBe(false);
    });

    it('should report several failures together', async () => {
      seedSet(cluster, 'alpha');
      cluster.failOn('delete', ResourceKind.DEPLOYMENT);
      cluster.failOn('delete', ResourceKind.INGRESS);

      try {
        await manager.deleteSet('alpha');
        expect.fail('expected AggregateError');
      } catch (error) {
        expect(error).toBeInstanceOf(AggregateError);
        if (error instanceof AggregateError) {
          expect(error.message).toBe("Failed to delete 2 ephemeral objects of 'alpha'");
          expect(error.errors).toHaveLength(2);
        }
      }
      expect(cluster.has(ResourceKind.SERVICE, 'alpha-svc')).toBe(false);
      expect(cluster.has(ResourceKind.CONFIG_MAP, 'servertap-config-alpha')).toBe(false);
    });
  });

  describe('createConfig() and createWorkload()', () => {
    it('should create the per-server config with the management key', async () => {
      await manager.createConfig('alpha', 'test-key');

      const configMap = cluster.get(ResourceKind.CONFIG_MAP, 'servertap-config-alpha');
      expect(configMap?.data?.['config.yml']).toContain('key: test-key');
    });

    it('should create deployment, service and ingress and return the endpoints', async () => {
      const endpoints = await manager.createWorkload('alpha', 'world1', spec);

      expect(endpoints).toEqual({
        gameAddress: 'alpha.mc.example.com',
        managementUrl: 'http://alpha-api.mc.example.com',
      });
      expect(cluster.callsOf('create').map((c) => c.kind)).toEqual([
        'Deployment',
        'Service',
        'Ingress',
      ]);
      expect(cluster.callsOf('read')).toHaveLength(0);
    });

    it('should fail on a conflicting leftover object', async () => {
      cluster.seed(ResourceKind.DEPLOYMENT, { metadata: { name: 'alpha' } });

      await expect(manager.createWorkload('alpha', 'world1', spec)).rejects.toThrow(
        "Failed to create Deployment 'alpha' (HTTP 409): AlreadyExists"
      );
    });
  });

  describe('recreate()', () => {
    it('should replace an existing set', async () => {
      seedSet(cluster, 'alpha');

      await manager.recreate('alpha', 'world1', spec);

      const deployment = cluster.get(ResourceKind.DEPLOYMENT, 'alpha');
      expect(deployment?.spec?.template.spec?.volumes?.[0]?.persistentVolumeClaim?.claimName).toBe(
        'world1'
      );
      expect(cluster.callsOf('delete')).toHaveLength(4);
      expect(cluster.callsOf('create')).toHaveLength(4);
    });
  });
});
