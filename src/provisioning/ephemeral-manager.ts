/**
 * Ephemeral Resource Set Manager
 *
 * Owns the Deployment, Service, Ingress and per-server ConfigMap of a server.
 * These hold no data and are only ever deleted and recreated, never patched.
 */

import { ResourceKind, type ClusterApi } from '../cluster/types.js';
import type { ServerEndpoints, WorkloadSpec } from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import {
  buildDeployment,
  buildIngress,
  buildServerConfigMap,
  buildService,
  type ManifestContext,
} from './manifests.js';
import {
  deploymentName,
  gameAddress,
  ingressName,
  managementUrl,
  serverConfigName,
  serviceName,
} from './names.js';
import { deleteIfPresent } from './probe.js';

const log = createLogger('provisioning:ephemeral');

export interface EphemeralManagerOptions {
  cluster: ClusterApi;
  context: ManifestContext;
}

/**
 * The kinds making up an ephemeral set, in deletion order.
 */
export const EPHEMERAL_KINDS = [
  ResourceKind.DEPLOYMENT,
  ResourceKind.SERVICE,
  ResourceKind.INGRESS,
  ResourceKind.CONFIG_MAP,
] as const;

export type EphemeralKind = (typeof EPHEMERAL_KINDS)[number];

/**
 * Name of each ephemeral object for a server.
 */
export function ephemeralNames(server: string): Record<EphemeralKind, string> {
  return {
    [ResourceKind.DEPLOYMENT]: deploymentName(server),
    [ResourceKind.SERVICE]: serviceName(server),
    [ResourceKind.INGRESS]: ingressName(server),
    [ResourceKind.CONFIG_MAP]: serverConfigName(server),
  };
}

export class EphemeralManager {
  private readonly cluster: ClusterApi;
  private readonly context: ManifestContext;

  constructor(options: EphemeralManagerOptions) {
    this.cluster = options.cluster;
    this.context = options.context;
  }

  /**
   * Delete every ephemeral object of `server`. Objects already gone are skipped.
   * Every kind is attempted even after a failure; the failures are thrown once
   * all deletes have run (a single error as-is, several as an AggregateError).
   * Returns the kinds whose delete was issued.
   */
  async deleteSet(server: string): Promise<EphemeralKind[]> {
    log.info({ server }, 'Cleaning up ephemeral resources');
    const names = ephemeralNames(server);
    const deleted: EphemeralKind[] = [];
    const failures: unknown[] = [];

    for (const kind of EPHEMERAL_KINDS) {
      try {
        if (await deleteIfPresent(this.cluster, kind, names[kind])) {
          deleted.push(kind);
        }
      } catch (error) {
        log.error({ server, kind, err: error }, 'Failed to delete ephemeral object');
        failures.push(error);
      }
    }

    const [first] = failures;
    if (failures.length === 1) {
      throw first;
    }
    if (failures.length > 1) {
      throw new AggregateError(
        failures,
        `Failed to delete ${failures.length} ephemeral objects of '${server}'`
      );
    }

    // The shared ConfigMap is used by every server and is left alone
    return deleted;
  }

  /**
   * Create the per-server ConfigMap carrying the management API key.
   */
  async createConfig(server: string, apiKey: string): Promise<void> {
    log.info({ server, configMap: serverConfigName(server) }, 'Creating server config');
    await this.cluster.create(
      ResourceKind.CONFIG_MAP,
      buildServerConfigMap(this.context, server, apiKey)
    );
  }

  /**
   * Create the Deployment, Service and Ingress. Assumes a clean slate:
   * a conflict with an existing object is fatal.
   */
  async createWorkload(server: string, storage: string, spec: WorkloadSpec): Promise<ServerEndpoints> {
    log.info({ server, deployment: deploymentName(server) }, 'Creating deployment');
    await this.cluster.create(
      ResourceKind.DEPLOYMENT,
      buildDeployment(this.context, server, storage, spec)
    );

    log.info({ server, service: serviceName(server) }, 'Creating service');
    await this.cluster.create(ResourceKind.SERVICE, buildService(this.context, server));

    log.info({ server, ingress: ingressName(server) }, 'Creating ingress');
    await this.cluster.create(ResourceKind.INGRESS, buildIngress(this.context, server));

    return this.endpoints(server);
  }

  /**
   * Destroy and rebuild the whole set.
   */
  async recreate(server: string, storage: string, spec: WorkloadSpec): Promise<ServerEndpoints> {
    await this.deleteSet(server);
    await this.createConfig(server, spec.apiKey);
    return this.createWorkload(server, storage, spec);
  }

  endpoints(server: string): ServerEndpoints {
    return {
      gameAddress: gameAddress(server, this.context.gameDomain),
      managementUrl: managementUrl(server, this.context.gameDomain),
    };
  }
}
