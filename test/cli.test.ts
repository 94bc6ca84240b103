/**
 * CLI Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createProgram } from '../src/control-plane/cli.js';
import { createVolumesCommand } from '../src/control-plane/commands/volumes.js';
import {
  formatError,
  formatRelativeTime,
  formatVolumeList,
  truncate,
} from '../src/control-plane/formatter.js';
import { ResourceKind } from '../src/cluster/types.js';
import type { ServerManager } from '../src/provisioning/server-manager.js';
import type { StorageSummary } from '../src/types/index.js';
import type { InMemoryCluster } from './helpers/in-memory-cluster.js';
import { createTestManager } from './helpers/fixtures.js';

const NOW = Date.parse('2026-03-01T12:00:00.000Z');

beforeEach(() => {
  vi.stubEnv('NO_COLOR', '1');
});

afterEach(() => {
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
  process.exitCode = undefined;
});

describe('formatter', () => {
  it('should describe relative times', () => {
    expect(formatRelativeTime(new Date(NOW - 30_000), NOW)).toBe('just now');
    expect(formatRelativeTime(new Date(NOW - 60_000), NOW)).toBe('1 minute ago');
    expect(formatRelativeTime(new Date(NOW - 2 * 3_600_000), NOW)).toBe('2 hours ago');
    expect(formatRelativeTime(new Date(NOW - 3 * 86_400_000), NOW)).toBe('3 days ago');
  });

  it('should truncate long values with an ellipsis', () => {
    expect(truncate('world1', 8)).toBe('world1');
    expect(truncate('a-very-long-storage-name', 10)).toBe('a-very-...');
  });

  it('should render volumes as a table', () => {
    const volumes: StorageSummary[] = [
      {
        name: 'world1',
        namespace: 'games',
        createdAt: new Date(NOW - 2 * 3_600_000).toISOString(),
        phase: 'Bound',
        capacity: '10Gi',
      },
      {
        name: 'world2',
        namespace: 'games',
        createdAt: null,
        phase: 'Pending',
        capacity: 'N/A',
      },
    ];

    const lines = formatVolumeList(volumes, NOW).split('\n');

    expect(lines).toHaveLength(4);
    expect(lines[0]).toBe(
      ['NAME'.padEnd(24), 'PHASE'.padEnd(8), 'CAPACITY', 'CREATED'.padEnd(16)].join('  ')
    );
    expect(lines[1]).toBe(
      ['-'.repeat(24), '-'.repeat(8), '-'.repeat(8), '-'.repeat(16)].join('  ')
    );
    expect(lines[2]).toBe(
      ['world1'.padEnd(24), 'Bound'.padEnd(8), '    10Gi', '2 hours ago'.padEnd(16)].join('  ')
    );
    expect(lines[3]).toBe(
      ['world2'.padEnd(24), 'Pending'.padEnd(8), '     N/A', '-'.padEnd(16)].join('  ')
    );
  });

  it('should report an empty volume list', () => {
    expect(formatVolumeList([], NOW)).toBe('No volumes found.');
  });
});

describe('volumes command', () => {
  let cluster: InMemoryCluster;
  let manager: ServerManager;

  beforeEach(() => {
    ({ cluster, manager } = createTestManager());
  });

  it('should print volumes as JSON', async () => {
    await manager.createServer({ serverName: 'alpha', storageName: 'world1', apiKey: 'k' });
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    await createVolumesCommand(() => manager).parseAsync(['--json'], { from: 'user' });

    expect(log).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(log.mock.calls[0]?.[0]))).toEqual([
      {
        name: 'world1',
        namespace: 'test-ns',
        createdAt: null,
        phase: 'Bound',
        capacity: 'N/A',
      },
    ]);
  });

  it('should print a table by default', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    await createVolumesCommand(() => manager).parseAsync([], { from: 'user' });

    expect(log).toHaveBeenCalledWith('No volumes found.');
  });

  it('should report cluster failures and set the exit code', async () => {
    cluster.failOn('list', ResourceKind.PERSISTENT_VOLUME_CLAIM);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    await createVolumesCommand(() => manager).parseAsync([], { from: 'user' });

    expect(error).toHaveBeenCalledWith(
      formatError("Failed to list PersistentVolumeClaim '*' (HTTP 500): injected fault")
    );
    expect(process.exitCode).toBe(1);
  });
});

describe('createProgram', () => {
  it('should register the serve and volumes commands', () => {
    const program = createProgram();

    expect(program.name()).toBe('craftfleet');
    expect(program.commands.map((c) => c.name())).toEqual(['serve', 'volumes']);
  });
});
