/**
 * Health Routes Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { createApp } from '../src/server/app.js';
import { VERSION } from '../src/server/types.js';
import { resetConfig } from '../src/config/index.js';
import { resetServerManager } from '../src/provisioning/server-manager.js';
import type { InMemoryCluster } from './helpers/in-memory-cluster.js';
import { createTestManager } from './helpers/fixtures.js';

describe('Health Routes', () => {
  let app: FastifyInstance;
  let cluster: InMemoryCluster;

  beforeEach(async () => {
    const test = createTestManager();
    cluster = test.cluster;
    app = await createApp({
      enableLogging: false,
      apiKey: 'test-api-key',
      serverManager: test.manager,
    });
  });

  afterEach(async () => {
    await app.close();
  });

  it('GET / should describe the service', async () => {
    const response = await app.inject({ method: 'GET', url: '/' });

    expect(response.statusCode).toBe(200);
    expect(response.json().data).toEqual({
      service: 'craftfleet',
      version: VERSION,
      docs: 'Send requests to /api/v1 with the X-API-Key header',
    });
  });

  it('GET /health should report a reachable cluster', async () => {
    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    const data = response.json().data;
    expect(data.status).toBe('healthy');
    expect(data.kubernetes).toBe('connected');
    expect(data.version).toBe(VERSION);
    expect(Number.isNaN(Date.parse(data.timestamp))).toBe(false);
    expect(cluster.callsOf('list', 'Pod')).toHaveLength(1);
  });

  it('GET /health should return 503 when the cluster is unreachable', async () => {
    cluster.failOn('list', 'Pod');

    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(503);
    const body = response.json();
    expect(body.success).toBe(true);
    expect(body.data.status).toBe('unhealthy');
    expect(body.data.kubernetes).toBe("error: Failed to list Pod '*' (HTTP 500): injected fault");
  });

  it('GET /health/live should not touch the cluster', async () => {
    const response = await app.inject({ method: 'GET', url: '/health/live' });

    expect(response.statusCode).toBe(200);
    expect(response.json().data.alive).toBe(true);
    expect(cluster.calls).toHaveLength(0);
  });
});

describe('Health Routes without an injected manager', () => {
  let app: FastifyInstance;

  beforeEach(() => {
    resetConfig();
    resetServerManager();
  });

  afterEach(async () => {
    await app.close();
    vi.unstubAllEnvs();
    resetConfig();
    resetServerManager();
  });

  it('GET /health should return 503 when the manager cannot be configured', async () => {
    vi.stubEnv('CRAFTFLEET_NFS_SERVER', '');
    vi.stubEnv('CRAFTFLEET_PROXY_SECRET', '');
    app = await createApp({ enableLogging: false });

    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(503);
    const body = response.json();
    expect(body.success).toBe(true);
    expect(body.data.status).toBe('unhealthy');
    expect(body.data.kubernetes).toMatch(/^error: Configuration validation failed/);
  });
});
