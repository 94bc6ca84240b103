/**
 * Resource Existence Probe
 *
 * Read-then-classify: absence is a normal answer, every other read failure
 * is fatal and propagates.
 */

import { ResourceNotFoundError } from '../cluster/errors.js';
import type { ClusterApi, ResourceKind } from '../cluster/types.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('provisioning:probe');

/**
 * Check whether a named object exists.
 */
export async function resourceExists(
  cluster: ClusterApi,
  kind: ResourceKind,
  name: string
): Promise<boolean> {
  try {
    await cluster.read(kind, name);
    log.debug({ kind, name }, 'Resource exists');
    return true;
  } catch (error) {
    if (error instanceof ResourceNotFoundError) {
      log.debug({ kind, name }, 'Resource not found');
      return false;
    }
    throw error;
  }
}

/**
 * Delete a named object, treating absence as success.
 * Returns whether a delete was actually issued.
 */
export async function deleteIfPresent(
  cluster: ClusterApi,
  kind: ResourceKind,
  name: string
): Promise<boolean> {
  try {
    await cluster.delete(kind, name);
    log.info({ kind, name }, 'Resource delete requested');
    return true;
  } catch (error) {
    if (error instanceof ResourceNotFoundError) {
      log.debug({ kind, name }, 'Resource already absent');
      return false;
    }
    log.error({ kind, name, err: error }, 'Resource delete failed');
    throw error;
  }
}
