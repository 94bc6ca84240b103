/**
 * Error types raised while talking to the cluster and while waiting on it.
 */

import type { ResourceKind } from './types.js';

/**
 * The named object does not exist. Benign on reads and deletes.
 */
export class ResourceNotFoundError extends Error {
  override readonly name = 'ResourceNotFoundError';
  readonly kind: ResourceKind | 'Pod';
  readonly resourceName: string;

  constructor(kind: ResourceKind | 'Pod', resourceName: string) {
    super(`${kind} '${resourceName}' not found`);
    this.kind = kind;
    this.resourceName = resourceName;
    Object.setPrototypeOf(this, ResourceNotFoundError.prototype);
  }
}

/**
 * Any other failure of the platform API. Always fatal.
 */
export class PlatformFaultError extends Error {
  override readonly name = 'PlatformFaultError';
  readonly kind: ResourceKind | 'Pod';
  readonly resourceName: string;
  readonly operation: string;
  readonly statusCode: number | null;

  constructor(
    kind: ResourceKind | 'Pod',
    resourceName: string,
    operation: string,
    statusCode: number | null,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    const status = statusCode !== null ? ` (HTTP ${statusCode})` : '';
    super(`Failed to ${operation} ${kind} '${resourceName}'${status}: ${reason}`, { cause });
    this.kind = kind;
    this.resourceName = resourceName;
    this.operation = operation;
    this.statusCode = statusCode;
    Object.setPrototypeOf(this, PlatformFaultError.prototype);
  }
}

/**
 * A wait exceeded its deadline before the condition held.
 */
export class WaitTimeoutError extends Error {
  override readonly name = 'WaitTimeoutError';
  readonly description: string;
  readonly timeoutMs: number;

  constructor(description: string, timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms waiting for ${description}`);
    this.description = description;
    this.timeoutMs = timeoutMs;
    Object.setPrototypeOf(this, WaitTimeoutError.prototype);
  }
}

/**
 * A wait was cancelled through its AbortSignal.
 */
export class WaitAbortedError extends Error {
  override readonly name = 'WaitAbortedError';
  readonly description: string;

  constructor(description: string) {
    super(`Aborted while waiting for ${description}`);
    this.description = description;
    Object.setPrototypeOf(this, WaitAbortedError.prototype);
  }
}

/**
 * A one-shot provisioning task reached its failed terminal state.
 */
export class TaskFailedError extends Error {
  override readonly name = 'TaskFailedError';
  readonly taskName: string;
  /** Output captured from the task's pod, when it could be fetched */
  readonly logs: string | null;

  constructor(taskName: string, logs: string | null) {
    super(`Job '${taskName}' failed`);
    this.taskName = taskName;
    this.logs = logs;
    Object.setPrototypeOf(this, TaskFailedError.prototype);
  }
}

/**
 * Extract an HTTP status code from an error thrown by the Kubernetes client.
 *
 * Current client releases throw ApiException with a numeric `code`; older
 * ones attach `response.statusCode` or `statusCode`.
 */
export function statusCodeOf(error: unknown): number | null {
  if (typeof error !== 'object' || error === null) {
    return null;
  }
  if ('code' in error && typeof error.code === 'number') {
    return error.code;
  }
  if ('statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  if (
    'response' in error &&
    typeof error.response === 'object' &&
    error.response !== null &&
    'statusCode' in error.response &&
    typeof error.response.statusCode === 'number'
  ) {
    return error.response.statusCode;
  }
  return null;
}

/**
 * Check whether an error means the object is absent.
 */
export function isNotFound(error: unknown): boolean {
  return error instanceof ResourceNotFoundError;
}
