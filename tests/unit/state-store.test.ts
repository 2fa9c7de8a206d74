/**
 * Unit Tests: Operator context persistence
 *
 * Covers:
 * - YAML round trip of a full context
 * - Atomic save and load
 * - Corrupt, foreign and missing state files
 */

import { existsSync } from 'node:fs';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { StateFileError } from '../../src/errors.js';
import { snapshotContext, type ContextSnapshot } from '../../src/reconcilers/context.js';
import { loadContext, parseContext, saveContext, serializeContext } from '../../src/state/store.js';
import { CLUSTER_SELF, KAFKA_READY, MemoryWorkload, changed, createHarness } from '../fixtures/index.js';

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'karapace-state-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

async function bootstrappedSnapshot(): Promise<ContextSnapshot> {
  const harness = createHarness();
  await harness.run(CLUSTER_SELF, changed('certificates', 'tls-provider'), KAFKA_READY);
  return snapshotContext(harness.context);
}

describe('serializeContext / parseContext', () => {
  it('should round-trip a full context', async () => {
    const snapshot = await bootstrappedSnapshot();

    const content = serializeContext(snapshot);

    expect(content.startsWith('# Managed by karapace-lifecycle\n# DO NOT EDIT MANUALLY\n')).toBe(true);
    expect(parseContext(content)).toEqual(snapshot);
  });

  it('should reject another layout version', () => {
    expect(() => parseContext('version: 2\nunit: karapace/0\n', 'state.yaml')).toThrow(
      'Failed to load operator state from state.yaml: unsupported state version 2, expected 1'
    );
  });

  it('should reject undeclared relations', () => {
    const content = [
      'version: 1',
      'unit: karapace/0',
      'relations:',
      '  - relationName: zookeeper',
      '    status: active',
      '    updatedAt: "2024-05-01T12:00:00.000Z"',
      'status:',
      '  level: active',
      '  message: ""',
    ].join('\n');

    expect(() => parseContext(content)).toThrow('relations[0].relationName "zookeeper" is not a declared relation');
  });

  it('should report malformed YAML as a state file error', () => {
    expect(() => parseContext('version: [1', 'state.yaml')).toThrow(StateFileError);
  });

  it('should report wrongly typed fields', () => {
    expect(() => parseContext('version: 1\nunit: 7\n')).toThrow('unit must be a string');
  });
});

describe('saveContext / loadContext', () => {
  it('should return undefined when no state exists', async () => {
    expect(await loadContext(join(dir, 'missing.yaml'))).toBeUndefined();
  });

  it('should save atomically and load the same snapshot', async () => {
    const snapshot = await bootstrappedSnapshot();
    const path = join(dir, 'nested', 'state.yaml');

    await saveContext(path, snapshot);

    expect(existsSync(`${path}.tmp`)).toBe(false);
    expect(await loadContext(path, 'karapace/0')).toEqual(snapshot);
  });

  it('should refuse state written for another unit', async () => {
    const path = join(dir, 'state.yaml');
    await saveContext(path, await bootstrappedSnapshot());

    await expect(loadContext(path, 'karapace/1')).rejects.toThrow(
      `Failed to load operator state from ${path}: state belongs to unit karapace/0, not karapace/1`
    );
  });

  it('should refuse a corrupt state file', async () => {
    const path = join(dir, 'state.yaml');
    await writeFile(path, '- just\n- a list\n', 'utf-8');

    await expect(loadContext(path)).rejects.toBeInstanceOf(StateFileError);
  });

  it('should resume without repeating applied work', async () => {
    const path = join(dir, 'state.yaml');
    const first = createHarness();
    await first.run(CLUSTER_SELF, KAFKA_READY);
    await saveContext(path, snapshotContext(first.context));

    const snapshot = await loadContext(path, 'karapace/0');
    const resumed = createHarness({ snapshot, workload: new MemoryWorkload() });
    const result = await resumed.handle({ type: 'config-changed' });

    expect(result.applied).toEqual([]);
    expect(resumed.workload.calls).toEqual([]);
    expect(resumed.context.secrets.get('operator')).toEqual(first.context.secrets.get('operator'));
  });
});
