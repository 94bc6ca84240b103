/**
 * Cluster Module
 *
 * Exports the platform seam used by provisioning and its Kubernetes implementation.
 */

export {
  ResourceKind,
  type ResourceTypes,
  type ResourceHandler,
  type DeleteOptions,
  type ClusterApi,
} from './types.js';

export {
  ResourceNotFoundError,
  PlatformFaultError,
  WaitTimeoutError,
  WaitAbortedError,
  TaskFailedError,
  statusCodeOf,
  isNotFound,
} from './errors.js';

export { KubernetesClient, loadKubeConfig } from './kubernetes-client.js';
