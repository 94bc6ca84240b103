/**
 * Deterministic resource naming.
 *
 * Every component derives dependent object names from an identity through
 * these functions; nothing is looked up at runtime. The formats are part of
 * the external contract and must not change.
 */

/** Shared ConfigMap consumed by every server */
export const SHARED_CONFIG_NAME = 'paper-global-config';

/** Key inside the shared ConfigMap */
export const SHARED_CONFIG_KEY = 'paper-global.yml';

/** Key inside each per-server ConfigMap */
export const SERVER_CONFIG_KEY = 'config.yml';

/** Read-only claim holding cached plugin jars */
export const PLUGIN_CACHE_CLAIM = 'plugins-cache';

/**
 * Raised when a raw name normalizes to nothing.
 */
export class InvalidIdentityError extends Error {
  override readonly name = 'InvalidIdentityError';
  readonly raw: string;

  constructor(raw: string) {
    super(`'${raw}' does not contain any character usable in a resource name`);
    this.raw = raw;
    Object.setPrototypeOf(this, InvalidIdentityError.prototype);
  }
}

/**
 * Normalize user input into a Kubernetes-safe identity.
 * Lowercases, drops anything outside [a-z0-9-], trims dashes and collapses dash runs.
 */
export function sanitizeName(raw: string): string {
  return raw
    .toLowerCase()
    .replace(/[^a-z0-9-]/g, '')
    .replace(/^-+|-+$/g, '')
    .replace(/-+/g, '-');
}

/**
 * Sanitize and reject identities that end up empty.
 */
export function toIdentity(raw: string): string {
  const identity = sanitizeName(raw);
  if (identity.length === 0) {
    throw new InvalidIdentityError(raw);
  }
  return identity;
}

export function deploymentName(server: string): string {
  return server;
}

export function serviceName(server: string): string {
  return `${server}-svc`;
}

export function ingressName(server: string): string {
  return `servertap-${server}-ingress`;
}

export function serverConfigName(server: string): string {
  return `servertap-config-${server}`;
}

export function volumeName(storage: string): string {
  return `pv-${storage}`;
}

export function claimName(storage: string): string {
  return storage;
}

export function directoryTaskName(storage: string): string {
  return `create-nfs-dir-${storage}`;
}

export function gameAddress(server: string, domain: string): string {
  return `${server}.${domain}`;
}

export function managementHost(server: string, domain: string): string {
  return `${server}-api.${domain}`;
}

export function managementUrl(server: string, domain: string): string {
  return `http://${managementHost(server, domain)}`;
}

/**
 * Directory on the shared NFS export backing a storage identity.
 */
export function storagePath(basePath: string, storage: string): string {
  return `${basePath.replace(/\/+$/, '')}/${storage}`;
}
