/**
 * Shared Config Manager
 *
 * Upserts the single ConfigMap every server mounts. Creation and patching
 * are serialized so concurrent provisions of different servers do not race
 * on the create-vs-patch decision.
 */

import { ResourceKind, type ClusterApi } from '../cluster/types.js';
import { createLogger } from '../utils/logger.js';
import { Mutex } from './keyed-lock.js';
import { buildSharedConfigMap, type ManifestContext } from './manifests.js';
import { SHARED_CONFIG_NAME } from './names.js';
import { resourceExists } from './probe.js';

const log = createLogger('provisioning:shared-config');

export interface SharedConfigManagerOptions {
  cluster: ClusterApi;
  context: ManifestContext;
}

export type SharedConfigOutcome = 'created' | 'updated';

export class SharedConfigManager {
  private readonly cluster: ClusterApi;
  private readonly context: ManifestContext;
  private readonly mutex = new Mutex();

  constructor(options: SharedConfigManagerOptions) {
    this.cluster = options.cluster;
    this.context = options.context;
  }

  /**
   * Create the shared ConfigMap, or merge our key into the existing one.
   */
  async ensureSharedConfig(): Promise<SharedConfigOutcome> {
    return this.mutex.runExclusive(async () => {
      const desired = buildSharedConfigMap(this.context);

      if (await resourceExists(this.cluster, ResourceKind.CONFIG_MAP, SHARED_CONFIG_NAME)) {
        log.info({ configMap: SHARED_CONFIG_NAME }, 'Updating shared config');
        await this.cluster.patchConfigMapData(SHARED_CONFIG_NAME, desired.data ?? {});
        return 'updated';
      }

      log.info({ configMap: SHARED_CONFIG_NAME }, 'Creating shared config');
      await this.cluster.create(ResourceKind.CONFIG_MAP, desired);
      return 'created';
    });
  }
}
