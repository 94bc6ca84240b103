/**
 * Cluster API types
 *
 * The narrow surface of the Kubernetes API that provisioning depends on.
 * Every object is addressed by name inside one fixed namespace, except
 * PersistentVolumes which are cluster-scoped.
 */

import type {
  V1ConfigMap,
  V1Deployment,
  V1Ingress,
  V1Job,
  V1PersistentVolume,
  V1PersistentVolumeClaim,
  V1Pod,
  V1Service,
} from '@kubernetes/client-node';

/**
 * Object kinds managed by craftfleet.
 */
export const ResourceKind = {
  DEPLOYMENT: 'Deployment',
  SERVICE: 'Service',
  INGRESS: 'Ingress',
  CONFIG_MAP: 'ConfigMap',
  PERSISTENT_VOLUME: 'PersistentVolume',
  PERSISTENT_VOLUME_CLAIM: 'PersistentVolumeClaim',
  JOB: 'Job',
} as const;

export type ResourceKind = (typeof ResourceKind)[keyof typeof ResourceKind];

/**
 * Maps each kind to its Kubernetes object type.
 */
export interface ResourceTypes {
  Deployment: V1Deployment;
  Service: V1Service;
  Ingress: V1Ingress;
  ConfigMap: V1ConfigMap;
  PersistentVolume: V1PersistentVolume;
  PersistentVolumeClaim: V1PersistentVolumeClaim;
  Job: V1Job;
}

/**
 * Options accepted by delete calls.
 */
export interface DeleteOptions {
  /** Kubernetes propagation policy for dependents */
  propagationPolicy?: 'Background' | 'Foreground' | 'Orphan';
}

/**
 * Read/create/delete operations for one kind.
 */
export interface ResourceHandler<T> {
  read(name: string): Promise<T>;
  create(body: T): Promise<T>;
  delete(name: string, options?: DeleteOptions): Promise<void>;
}

/**
 * The cluster operations provisioning needs.
 *
 * Implementations must throw ResourceNotFoundError when the named object
 * does not exist and PlatformFaultError for every other API failure.
 */
export interface ClusterApi {
  /** Namespace all namespaced objects live in */
  readonly namespace: string;

  read<K extends ResourceKind>(kind: K, name: string): Promise<ResourceTypes[K]>;
  create<K extends ResourceKind>(kind: K, body: ResourceTypes[K]): Promise<ResourceTypes[K]>;
  delete(kind: ResourceKind, name: string, options?: DeleteOptions): Promise<void>;

  /** Merge-patch the data of a ConfigMap, leaving other keys untouched */
  patchConfigMapData(name: string, data: Record<string, string>): Promise<V1ConfigMap>;

  listClaims(labelSelector: string): Promise<V1PersistentVolumeClaim[]>;
  listPods(options: { labelSelector?: string; limit?: number }): Promise<V1Pod[]>;
  readPodLog(name: string): Promise<string>;
}
