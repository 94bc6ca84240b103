/**
 * Kubernetes Client
 *
 * Wrapper around @kubernetes/client-node that implements ClusterApi.
 * Translates every library exception into ResourceNotFoundError or
 * PlatformFaultError so callers never see raw HTTP errors.
 */

import * as k8s from '@kubernetes/client-node';
import { createLogger } from '../utils/logger.js';
import { PlatformFaultError, ResourceNotFoundError, statusCodeOf } from './errors.js';
import {
  ResourceKind,
  type ClusterApi,
  type DeleteOptions,
  type ResourceHandler,
  type ResourceTypes,
} from './types.js';

const logger = createLogger('cluster:kubernetes-client');

type HandlerTable = { [K in ResourceKind]: ResourceHandler<ResourceTypes[K]> };

/**
 * Load cluster credentials.
 * Prefers the in-cluster service account, falling back to the local kubeconfig.
 */
export function loadKubeConfig(): k8s.KubeConfig {
  const kc = new k8s.KubeConfig();

  if (process.env.KUBERNETES_SERVICE_HOST) {
    kc.loadFromCluster();
    logger.info('Loaded in-cluster Kubernetes config');
  } else {
    kc.loadFromDefault();
    logger.info({ context: kc.getCurrentContext() }, 'Loaded local kubeconfig');
  }

  return kc;
}

/**
 * Convert a client exception into the cluster error taxonomy.
 */
function translateError(
  error: unknown,
  kind: ResourceKind | 'Pod',
  name: string,
  operation: string
): Error {
  const statusCode = statusCodeOf(error);
  // A 404 on create means the namespace is gone, which is not "absent"
  if (statusCode === 404 && operation !== 'create') {
    return new ResourceNotFoundError(kind, name);
  }
  return new PlatformFaultError(kind, name, operation, statusCode, error);
}

/**
 * ClusterApi backed by a live Kubernetes API server.
 */
export class KubernetesClient implements ClusterApi {
  readonly namespace: string;

  private readonly coreApi: k8s.CoreV1Api;
  private readonly appsApi: k8s.AppsV1Api;
  private readonly networkingApi: k8s.NetworkingV1Api;
  private readonly batchApi: k8s.BatchV1Api;
  private readonly handlers: HandlerTable;

  constructor(namespace: string, kubeConfig: k8s.KubeConfig = loadKubeConfig()) {
    this.namespace = namespace;
    this.coreApi = kubeConfig.makeApiClient(k8s.CoreV1Api);
    this.appsApi = kubeConfig.makeApiClient(k8s.AppsV1Api);
    this.networkingApi = kubeConfig.makeApiClient(k8s.NetworkingV1Api);
    this.batchApi = kubeConfig.makeApiClient(k8s.BatchV1Api);
    this.handlers = this.buildHandlers();
  }

  async read<K extends ResourceKind>(kind: K, name: string): Promise<ResourceTypes[K]> {
    const handler: ResourceHandler<ResourceTypes[K]> = this.handlers[kind];
    try {
      return await handler.read(name);
    } catch (error) {
      throw translateError(error, kind, name, 'read');
    }
  }

  async create<K extends ResourceKind>(
    kind: K,
    body: ResourceTypes[K]
  ): Promise<ResourceTypes[K]> {
    const handler: ResourceHandler<ResourceTypes[K]> = this.handlers[kind];
    const name = body.metadata?.name ?? '<unnamed>';
    try {
      const created = await handler.create(body);
      logger.debug({ kind, name }, 'Resource created');
      return created;
    } catch (error) {
      throw translateError(error, kind, name, 'create');
    }
  }

  async delete(kind: ResourceKind, name: string, options?: DeleteOptions): Promise<void> {
    try {
      await this.handlers[kind].delete(name, options);
      logger.debug({ kind, name }, 'Resource delete requested');
    } catch (error) {
      throw translateError(error, kind, name, 'delete');
    }
  }

  async patchConfigMapData(
    name: string,
    data: Record<string, string>
  ): Promise<k8s.V1ConfigMap> {
    try {
      return await this.coreApi.patchNamespacedConfigMap(
        { name, namespace: this.namespace, body: { data } },
        k8s.setHeaderOptions('Content-Type', k8s.PatchStrategy.MergePatch)
      );
    } catch (error) {
      throw translateError(error, ResourceKind.CONFIG_MAP, name, 'patch');
    }
  }

  async listClaims(labelSelector: string): Promise<k8s.V1PersistentVolumeClaim[]> {
    try {
      const list = await this.coreApi.listNamespacedPersistentVolumeClaim({
        namespace: this.namespace,
        labelSelector,
      });
      return list.items;
    } catch (error) {
      throw translateError(error, ResourceKind.PERSISTENT_VOLUME_CLAIM, labelSelector, 'list');
    }
  }

  async listPods(options: { labelSelector?: string; limit?: number }): Promise<k8s.V1Pod[]> {
    try {
      const list = await this.coreApi.listNamespacedPod({
        namespace: this.namespace,
        labelSelector: options.labelSelector,
        limit: options.limit,
      });
      return list.items;
    } catch (error) {
      throw translateError(error, 'Pod', options.labelSelector ?? '*', 'list');
    }
  }

  async readPodLog(name: string): Promise<string> {
    try {
      return await this.coreApi.readNamespacedPodLog({ name, namespace: this.namespace });
    } catch (error) {
      throw translateError(error, 'Pod', name, 'read logs of');
    }
  }

  private buildHandlers(): HandlerTable {
    const namespace = this.namespace;

    return {
      Deployment: {
        read: (name) => this.appsApi.readNamespacedDeployment({ name, namespace }),
        create: (body) => this.appsApi.createNamespacedDeployment({ namespace, body }),
        delete: async (name, options) => {
          await this.appsApi.deleteNamespacedDeployment({
            name,
            namespace,
            propagationPolicy: options?.propagationPolicy,
          });
        },
      },
      Service: {
        read: (name) => this.coreApi.readNamespacedService({ name, namespace }),
        create: (body) => this.coreApi.createNamespacedService({ namespace, body }),
        delete: async (name, options) => {
          await this.coreApi.deleteNamespacedService({
            name,
            namespace,
            propagationPolicy: options?.propagationPolicy,
          });
        },
      },
      Ingress: {
        read: (name) => this.networkingApi.readNamespacedIngress({ name, namespace }),
        create: (body) => this.networkingApi.createNamespacedIngress({ namespace, body }),
        delete: async (name, options) => {
          await this.networkingApi.deleteNamespacedIngress({
            name,
            namespace,
            propagationPolicy: options?.propagationPolicy,
          });
        },
      },
      ConfigMap: {
        read: (name) => this.coreApi.readNamespacedConfigMap({ name, namespace }),
        create: (body) => this.coreApi.createNamespacedConfigMap({ namespace, body }),
        delete: async (name, options) => {
          await this.coreApi.deleteNamespacedConfigMap({
            name,
            namespace,
            propagationPolicy: options?.propagationPolicy,
          });
        },
      },
      PersistentVolume: {
        read: (name) => this.coreApi.readPersistentVolume({ name }),
        create: (body) => this.coreApi.createPersistentVolume({ body }),
        delete: async (name, options) => {
          await this.coreApi.deletePersistentVolume({
            name,
            propagationPolicy: options?.propagationPolicy,
          });
        },
      },
      PersistentVolumeClaim: {
        read: (name) => this.coreApi.readNamespacedPersistentVolumeClaim({ name, namespace }),
        create: (body) => this.coreApi.createNamespacedPersistentVolumeClaim({ namespace, body }),
        delete: async (name, options) => {
          await this.coreApi.deleteNamespacedPersistentVolumeClaim({
            name,
            namespace,
            propagationPolicy: options?.propagationPolicy,
          });
        },
      },
      Job: {
        read: (name) => this.batchApi.readNamespacedJob({ name, namespace }),
        create: (body) => this.batchApi.createNamespacedJob({ namespace, body }),
        delete: async (name, options) => {
          await this.batchApi.deleteNamespacedJob({
            name,
            namespace,
            propagationPolicy: options?.propagationPolicy,
          });
        },
      },
    };
  }
}
