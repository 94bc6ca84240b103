/**
 * In-process ClusterApi stand-in.
 *
 * Keeps objects in maps, applies the same error contract as the Kubernetes
 * client, and records every call. Jobs and claims settle according to the
 * configurable `jobOutcome` and `claimPhase`.
 */

import { setTimeout as delay } from 'node:timers/promises';
import type {
  V1ConfigMap,
  V1JobStatus,
  V1ObjectMeta,
  V1PersistentVolumeClaim,
  V1Pod,
} from '@kubernetes/client-node';
import { PlatformFaultError, ResourceNotFoundError } from '../../src/cluster/errors.js';
import {
  ResourceKind,
  type ClusterApi,
  type DeleteOptions,
  type ResourceHandler,
  type ResourceTypes,
} from '../../src/cluster/types.js';

export type ClusterOperation = 'read' | 'create' | 'delete' | 'patch' | 'list' | 'logs';

export interface ClusterCall {
  operation: ClusterOperation;
  kind: ResourceKind | 'Pod';
  name: string;
  options?: DeleteOptions;
}

export type JobOutcome = 'succeeded' | 'failed' | 'running';

type HandlerTable = { [K in ResourceKind]: ResourceHandler<ResourceTypes[K]> };

interface Named {
  metadata?: V1ObjectMeta;
}

function nameOf(body: Named): string {
  return body.metadata?.name ?? '';
}

function matchesSelector(labels: Record<string, string> | undefined, selector: string): boolean {
  if (!selector) {
    return true;
  }
  return selector.split(',').every((term) => {
    const [key, value] = term.split('=');
    return key !== undefined && labels?.[key] === value;
  });
}

function jobStatusFor(outcome: JobOutcome): V1JobStatus {
  switch (outcome) {
    case 'succeeded':
      return { succeeded: 1 };
    case 'failed':
      return { failed: 1 };
    case 'running':
      return { active: 1 };
  }
}

export class InMemoryCluster implements ClusterApi {
  readonly namespace: string;
  readonly calls: ClusterCall[] = [];

  /** Status every Job reports once created */
  jobOutcome: JobOutcome = 'succeeded';
  /** Phase given to claims created through the API */
  claimPhase = 'Bound';
  /** Delay applied to every call */
  latencyMs = 0;
  /** Log text returned per pod name */
  readonly podLogs = new Map<string, string>();
  /** Observer invoked before each call is executed */
  onCall: ((call: ClusterCall) => void) | null = null;

  private readonly deployments = new Map<string, ResourceTypes['Deployment']>();
  private readonly services = new Map<string, ResourceTypes['Service']>();
  private readonly ingresses = new Map<string, ResourceTypes['Ingress']>();
  private readonly configMaps = new Map<string, ResourceTypes['ConfigMap']>();
  private readonly volumes = new Map<string, ResourceTypes['PersistentVolume']>();
  private readonly claims = new Map<string, ResourceTypes['PersistentVolumeClaim']>();
  private readonly jobs = new Map<string, ResourceTypes['Job']>();
  private readonly pods = new Map<string, V1Pod>();
  private readonly faults = new Map<string, Error>();
  private readonly handlers: HandlerTable;

  constructor(namespace = 'test-ns') {
    this.namespace = namespace;
    this.handlers = {
      Deployment: this.handler(ResourceKind.DEPLOYMENT, this.deployments),
      Service: this.handler(ResourceKind.SERVICE, this.services),
      Ingress: this.handler(ResourceKind.INGRESS, this.ingresses),
      ConfigMap: this.handler(ResourceKind.CONFIG_MAP, this.configMaps),
      PersistentVolume: this.handler(ResourceKind.PERSISTENT_VOLUME, this.volumes),
      PersistentVolumeClaim: this.handler(ResourceKind.PERSISTENT_VOLUME_CLAIM, this.claims, {
        onCreate: (claim) => ({ ...claim, status: { ...claim.status, phase: this.claimPhase } }),
      }),
      Job: this.handler(ResourceKind.JOB, this.jobs, {
        onCreate: (job) => {
          const jobName = nameOf(job);
          const podName = `${jobName}-pod`;
          this.pods.set(podName, {
            metadata: { name: podName, labels: { 'job-name': jobName } },
          });
          return job;
        },
        onRead: (job) => ({ ...job, status: jobStatusFor(this.jobOutcome) }),
        onDelete: (jobName) => {
          for (const [podName, pod] of this.pods) {
            if (pod.metadata?.labels?.['job-name'] === jobName) {
              this.pods.delete(podName);
            }
          }
        },
      }),
    };
  }

  /**
   * Make every `operation` on `kind` fail until cleared.
   */
  failOn(operation: ClusterOperation, kind: ResourceKind | 'Pod', error?: Error): void {
    this.faults.set(
      `${operation}:${kind}`,
      error ?? new PlatformFaultError(kind, '*', operation, 500, new Error('injected fault'))
    );
  }

  clearFaults(): void {
    this.faults.clear();
  }

  /**
   * Store an object directly, bypassing hooks and call recording.
   */
  seed<K extends ResourceKind>(kind: K, body: ResourceTypes[K]): void {
    this.storeFor(kind).set(nameOf(body), structuredClone(body));
  }

  has(kind: ResourceKind, name: string): boolean {
    return this.storeFor(kind).has(name);
  }

  /**
   * Stored object, without read hooks applied.
   */
  get<K extends ResourceKind>(kind: K, name: string): ResourceTypes[K] | undefined {
    const store: Map<string, ResourceTypes[K]> = this.storeFor(kind);
    return store.get(name);
  }

  names(kind: ResourceKind): string[] {
    return [...this.storeFor(kind).keys()].sort();
  }

  podNames(): string[] {
    return [...this.pods.keys()].sort();
  }

  /**
   * Calls matching an operation and, optionally, a kind.
   */
  callsOf(operation: ClusterOperation, kind?: ResourceKind | 'Pod'): ClusterCall[] {
    return this.calls.filter(
      (call) => call.operation === operation && (kind === undefined || call.kind === kind)
    );
  }

  async read<K extends ResourceKind>(kind: K, name: string): Promise<ResourceTypes[K]> {
    const handler: ResourceHandler<ResourceTypes[K]> = this.handlers[kind];
    await this.enter('read', kind, name);
    return handler.read(name);
  }

  async create<K extends ResourceKind>(kind: K, body: ResourceTypes[K]): Promise<ResourceTypes[K]> {
    const handler: ResourceHandler<ResourceTypes[K]> = this.handlers[kind];
    await this.enter('create', kind, nameOf(body));
    return handler.create(body);
  }

  async delete(kind: ResourceKind, name: string, options?: DeleteOptions): Promise<void> {
    await this.enter('delete', kind, name, options);
    await this.handlers[kind].delete(name, options);
  }

  async patchConfigMapData(name: string, data: Record<string, string>): Promise<V1ConfigMap> {
    await this.enter('patch', ResourceKind.CONFIG_MAP, name);
    const existing = this.configMaps.get(name);
    if (!existing) {
      throw new ResourceNotFoundError(ResourceKind.CONFIG_MAP, name);
    }
    const patched: V1ConfigMap = { ...existing, data: { ...existing.data, ...data } };
    this.configMaps.set(name, patched);
    return structuredClone(patched);
  }

  async listClaims(labelSelector: string): Promise<V1PersistentVolumeClaim[]> {
    await this.enter('list', ResourceKind.PERSISTENT_VOLUME_CLAIM, labelSelector);
    return [...this.claims.values()]
      .filter((claim) => matchesSelector(claim.metadata?.labels, labelSelector))
      .map((claim) => structuredClone(claim));
  }

  async listPods(options: { labelSelector?: string; limit?: number }): Promise<V1Pod[]> {
    await this.enter('list', 'Pod', options.labelSelector ?? '*');
    const matching = [...this.pods.values()].filter((pod) =>
      matchesSelector(pod.metadata?.labels, options.labelSelector ?? '')
    );
    return options.limit === undefined ? matching : matching.slice(0, options.limit);
  }

  async readPodLog(name: string): Promise<string> {
    await this.enter('logs', 'Pod', name);
    if (!this.pods.has(name)) {
      throw new ResourceNotFoundError('Pod', name);
    }
    return this.podLogs.get(name) ?? '';
  }

  private storeFor<K extends ResourceKind>(kind: K): Map<string, ResourceTypes[K]>;
  private storeFor(kind: ResourceKind): Map<string, Named> {
    switch (kind) {
      case ResourceKind.DEPLOYMENT:
        return this.deployments;
      case ResourceKind.SERVICE:
        return this.services;
      case ResourceKind.INGRESS:
        return this.ingresses;
      case ResourceKind.CONFIG_MAP:
        return this.configMaps;
      case ResourceKind.PERSISTENT_VOLUME:
        return this.volumes;
      case ResourceKind.PERSISTENT_VOLUME_CLAIM:
        return this.claims;
      case ResourceKind.JOB:
        return this.jobs;
    }
  }

  private async enter(
    operation: ClusterOperation,
    kind: ResourceKind | 'Pod',
    name: string,
    options?: DeleteOptions
  ): Promise<void> {
    const call: ClusterCall = options ? { operation, kind, name, options } : { operation, kind, name };
    this.calls.push(call);
    this.onCall?.(call);
    if (this.latencyMs > 0) {
      await delay(this.latencyMs);
    }
    const fault = this.faults.get(`${operation}:${kind}`);
    if (fault) {
      throw fault;
    }
  }

  private handler<T extends Named>(
    kind: ResourceKind,
    store: Map<string, T>,
    hooks: {
      onCreate?: (body: T) => T;
      onRead?: (body: T) => T;
      onDelete?: (name: string) => void;
    } = {}
  ): ResourceHandler<T> {
    return {
      read: async (name) => {
        const found = store.get(name);
        if (!found) {
          throw new ResourceNotFoundError(kind, name);
        }
        const copy = structuredClone(found);
        return hooks.onRead ? hooks.onRead(copy) : copy;
      },
      create: async (body) => {
        const name = nameOf(body);
        if (store.has(name)) {
          throw new PlatformFaultError(kind, name, 'create', 409, new Error('AlreadyExists'));
        }
        const stored = hooks.onCreate ? hooks.onCreate(structuredClone(body)) : structuredClone(body);
        store.set(name, stored);
        return structuredClone(stored);
      },
      delete: async (name) => {
        if (!store.delete(name)) {
          throw new ResourceNotFoundError(kind, name);
        }
        hooks.onDelete?.(name);
      },
    };
  }
}
