/**
 * Manifest builders.
 *
 * Pure functions producing the Kubernetes objects for one server. Names come
 * from ./names.js only.
 */

import type {
  V1ConfigMap,
  V1Container,
  V1Deployment,
  V1Ingress,
  V1Job,
  V1PersistentVolume,
  V1PersistentVolumeClaim,
  V1Service,
} from '@kubernetes/client-node';
import type { WorkloadSpec } from '../types/index.js';
import {
  PLUGIN_CACHE_CLAIM,
  SERVER_CONFIG_KEY,
  SHARED_CONFIG_KEY,
  SHARED_CONFIG_NAME,
  claimName,
  deploymentName,
  directoryTaskName,
  ingressName,
  managementHost,
  serverConfigName,
  serviceName,
  storagePath,
  volumeName,
} from './names.js';

export const GAME_PORT = 25565;
export const MANAGEMENT_PORT = 4567;

/** UID/GID the game server runs as and owns its data directory with */
const SERVER_UID = 1000;

const STORAGE_CLASS = 'manual';
const DATA_VOLUME = 'minecraft-data';

/**
 * Cluster-wide settings the builders need.
 */
export interface ManifestContext {
  namespace: string;
  gameDomain: string;
  storageLabel: string;
  priorityClassName: string;
  nfsServer: string;
  nfsBasePath: string;
  serverImage: string;
  helperImage: string;
  proxySecret: string;
}

/**
 * Shared proxy-forwarding config, identical for every server.
 */
export function renderSharedConfig(secret: string): string {
  return `
proxies:
  velocity:
    enabled: true
    online-mode: false
    secret: '${secret}'
`;
}

/**
 * Management plugin config for one server.
 */
export function renderServerConfig(apiKey: string): string {
  return `
port: ${MANAGEMENT_PORT}
debug: false
useKeyAuth: true
key: ${apiKey}
normalizeMessages: true
tls:
  enabled: false
corsOrigins:
  - "*"
websocketConsoleBuffer: 1000
disable-swagger: false
blocked-paths: []
`;
}

export function buildSharedConfigMap(ctx: ManifestContext): V1ConfigMap {
  return {
    apiVersion: 'v1',
    kind: 'ConfigMap',
    metadata: { name: SHARED_CONFIG_NAME, namespace: ctx.namespace },
    data: { [SHARED_CONFIG_KEY]: renderSharedConfig(ctx.proxySecret) },
  };
}

export function buildServerConfigMap(
  ctx: ManifestContext,
  server: string,
  apiKey: string
): V1ConfigMap {
  return {
    apiVersion: 'v1',
    kind: 'ConfigMap',
    metadata: { name: serverConfigName(server), namespace: ctx.namespace },
    data: { [SERVER_CONFIG_KEY]: renderServerConfig(apiKey) },
  };
}

export function buildPersistentVolume(
  ctx: ManifestContext,
  storage: string,
  capacity: string
): V1PersistentVolume {
  return {
    apiVersion: 'v1',
    kind: 'PersistentVolume',
    metadata: { name: volumeName(storage), labels: { app: storage } },
    spec: {
      capacity: { storage: capacity },
      volumeMode: 'Filesystem',
      accessModes: ['ReadWriteOnce'],
      persistentVolumeReclaimPolicy: 'Retain',
      storageClassName: STORAGE_CLASS,
      nfs: { server: ctx.nfsServer, path: storagePath(ctx.nfsBasePath, storage) },
    },
  };
}

export function buildPersistentVolumeClaim(
  ctx: ManifestContext,
  storage: string,
  capacity: string
): V1PersistentVolumeClaim {
  return {
    apiVersion: 'v1',
    kind: 'PersistentVolumeClaim',
    metadata: {
      name: claimName(storage),
      namespace: ctx.namespace,
      labels: { app: storage, type: ctx.storageLabel },
    },
    spec: {
      storageClassName: STORAGE_CLASS,
      accessModes: ['ReadWriteOnce'],
      resources: { requests: { storage: capacity } },
      volumeName: volumeName(storage),
    },
  };
}

/**
 * One-shot Job that creates the data directory on the NFS export.
 */
export function buildDirectoryJob(ctx: ManifestContext, storage: string): V1Job {
  const name = directoryTaskName(storage);
  const path = storagePath(ctx.nfsBasePath, storage);

  return {
    apiVersion: 'batch/v1',
    kind: 'Job',
    metadata: { name, namespace: ctx.namespace },
    spec: {
      ttlSecondsAfterFinished: 60,
      backoffLimit: 3,
      template: {
        metadata: { labels: { job: name } },
        spec: {
          restartPolicy: 'Never',
          containers: [
            {
              name: 'nfs-dir-creator',
              image: ctx.helperImage,
              command: ['sh', '-c'],
              args: [
                `mkdir -p ${path} && ` +
                  `chmod 755 ${path} && ` +
                  `chown ${SERVER_UID}:${SERVER_UID} ${path} && ` +
                  `echo 'Directory created: ${path}'`,
              ],
              volumeMounts: [{ name: 'nfs-root', mountPath: ctx.nfsBasePath }],
            },
          ],
          volumes: [
            { name: 'nfs-root', nfs: { server: ctx.nfsServer, path: ctx.nfsBasePath } },
          ],
        },
      },
    },
  };
}

function copyContainer(
  ctx: ManifestContext,
  name: string,
  script: string,
  sourceVolume: string,
  sourceMount: string
): V1Container {
  return {
    name,
    image: ctx.helperImage,
    command: ['sh', '-c'],
    args: [script],
    volumeMounts: [
      { name: DATA_VOLUME, mountPath: '/data' },
      { name: sourceVolume, mountPath: sourceMount, readOnly: true },
    ],
    securityContext: { runAsUser: SERVER_UID, runAsGroup: SERVER_UID },
  };
}

/**
 * Setup phases run before the game server starts.
 * Plugin copy is best effort; both config copies must succeed.
 */
function buildInitContainers(ctx: ManifestContext): V1Container[] {
  return [
    copyContainer(
      ctx,
      'copy-plugins-from-cache',
      'set -e; ' +
        'mkdir -p /data/plugins; ' +
        'cp /plugins-cache/*.jar /data/plugins/ 2>/dev/null || true; ' +
        'chmod 644 /data/plugins/*.jar 2>/dev/null || true; ' +
        "echo 'Plugins copied from cache:'; " +
        'ls -lh /data/plugins/',
      'plugins-cache',
      '/plugins-cache'
    ),
    copyContainer(
      ctx,
      'copy-servertap-config',
      'set -e; mkdir -p /data/plugins/ServerTap; ' +
        `cp /config/${SERVER_CONFIG_KEY} /data/plugins/ServerTap/config.yml; ` +
        'chmod 644 /data/plugins/ServerTap/config.yml; ' +
        "echo 'ServerTap config copied successfully.'",
      'servertap-config',
      '/config'
    ),
    copyContainer(
      ctx,
      'copy-paper-config',
      'set -e; mkdir -p /data/config; ' +
        `cp /paper-config/${SHARED_CONFIG_KEY} /data/config/paper-global.yml; ` +
        'chmod 644 /data/config/paper-global.yml; ' +
        "echo 'Paper config copied successfully.'",
      'paper-config',
      '/paper-config'
    ),
  ];
}

export function buildDeployment(
  ctx: ManifestContext,
  server: string,
  storage: string,
  spec: WorkloadSpec
): V1Deployment {
  const labels = { app: server, type: 'minecraft-server' };

  return {
    apiVersion: 'apps/v1',
    kind: 'Deployment',
    metadata: { name: deploymentName(server), namespace: ctx.namespace, labels },
    spec: {
      replicas: 1,
      selector: { matchLabels: labels },
      template: {
        metadata: { labels },
        spec: {
          priorityClassName: ctx.priorityClassName,
          initContainers: buildInitContainers(ctx),
          containers: [
            {
              name: 'minecraft',
              image: ctx.serverImage,
              ports: [
                { containerPort: GAME_PORT, name: 'minecraft' },
                { containerPort: MANAGEMENT_PORT, name: 'servertap' },
              ],
              env: [
                { name: 'EULA', value: 'TRUE' },
                { name: 'TYPE', value: 'PAPER' },
                { name: 'VERSION', value: '1.21.1' },
                { name: 'MEMORY', value: '2G' },
                { name: 'ONLINE_MODE', value: 'FALSE' },
                { name: 'MAX_TICK_TIME', value: '-1' },
                { name: 'CFG_PAPER_PROXIES_VELOCITY_ENABLED', value: 'true' },
                { name: 'CFG_PAPER_PROXIES_VELOCITY_ONLINE_MODE', value: 'false' },
                { name: 'CFG_PAPER_PROXIES_VELOCITY_SECRET', value: ctx.proxySecret },
              ],
              resources: {
                limits: { cpu: spec.cpuLimit, memory: spec.memoryLimit },
                requests: { cpu: spec.cpuRequest, memory: spec.memoryRequest },
              },
              securityContext: {
                runAsNonRoot: true,
                runAsUser: SERVER_UID,
                runAsGroup: SERVER_UID,
                allowPrivilegeEscalation: false,
              },
              volumeMounts: [{ name: DATA_VOLUME, mountPath: '/data' }],
              // Cold starts are slow; liveness failures restart the container
              readinessProbe: {
                tcpSocket: { port: GAME_PORT },
                initialDelaySeconds: 60,
                periodSeconds: 5,
                failureThreshold: 20,
              },
              livenessProbe: {
                tcpSocket: { port: GAME_PORT },
                initialDelaySeconds: 180,
                periodSeconds: 30,
                failureThreshold: 3,
              },
            },
          ],
          volumes: [
            { name: DATA_VOLUME, persistentVolumeClaim: { claimName: claimName(storage) } },
            {
              name: 'plugins-cache',
              persistentVolumeClaim: { claimName: PLUGIN_CACHE_CLAIM, readOnly: true },
            },
            { name: 'servertap-config', configMap: { name: serverConfigName(server) } },
            { name: 'paper-config', configMap: { name: SHARED_CONFIG_NAME } },
          ],
          securityContext: { fsGroup: SERVER_UID, runAsNonRoot: true },
          restartPolicy: 'Always',
        },
      },
    },
  };
}

export function buildService(ctx: ManifestContext, server: string): V1Service {
  return {
    apiVersion: 'v1',
    kind: 'Service',
    metadata: {
      name: serviceName(server),
      namespace: ctx.namespace,
      labels: { app: server, 'minecraft-server': 'true', subdomain: server },
    },
    spec: {
      selector: { app: server },
      type: 'ClusterIP',
      ports: [
        { name: 'minecraft', port: GAME_PORT, targetPort: GAME_PORT },
        { name: 'api', port: MANAGEMENT_PORT, targetPort: MANAGEMENT_PORT },
      ],
    },
  };
}

export function buildIngress(ctx: ManifestContext, server: string): V1Ingress {
  const backendService = serviceName(server);

  return {
    apiVersion: 'networking.k8s.io/v1',
    kind: 'Ingress',
    metadata: {
      name: ingressName(server),
      namespace: ctx.namespace,
      annotations: {
        'nginx.ingress.kubernetes.io/websocket-services': backendService,
      },
    },
    spec: {
      ingressClassName: 'nginx',
      rules: [
        {
          host: managementHost(server, ctx.gameDomain),
          http: {
            paths: [
              {
                path: '/',
                pathType: 'Prefix',
                backend: {
                  service: { name: backendService, port: { number: MANAGEMENT_PORT } },
                },
              },
            ],
          },
        },
      ],
    },
  };
}
