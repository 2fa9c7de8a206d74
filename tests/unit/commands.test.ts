/**
 * Unit Tests: Commands
 *
 * Covers:
 * - Event decoding from flags and files
 * - handle, status and action commands against a persisted state file
 */

import { existsSync } from 'node:fs';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  describeResults,
  getPasswordCommand,
  handleCommand,
  parseEvent,
  parseEventDocument,
  resolveEvents,
  setPasswordCommand,
  setTlsPrivateKeyCommand,
  statusCommand,
  type PassDependencies,
} from '../../src/commands/index.js';
import type { CommandContext, UnitIdentity } from '../../src/types.js';
import { createSilentLogger } from '../../src/workload/logger.js';
import { MemoryWorkload, TEST_RETRY, createClock, kafkaData } from '../fixtures/index.js';

let dir: string;
let workload: MemoryWorkload;
let deps: PassDependencies;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'karapace-commands-'));
  workload = new MemoryWorkload();
  deps = {
    workload,
    logger: createSilentLogger(),
    now: createClock().now,
    fqdn: 'karapace-0.example.internal',
  };
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

function createContext(unit: Partial<UnitIdentity> = {}): CommandContext {
  return {
    options: { json: true, verbose: false },
    outputFormat: 'json',
    settings: {
      unit: { name: 'karapace/0', host: '10.0.0.10', isLeader: true, ...unit },
      stateFile: join(dir, 'state.yaml'),
      confDir: '/srv/karapace',
      serviceName: 'karapace',
      retry: TEST_RETRY,
      restartLockTimeoutMs: 300_000,
      serviceLogLevel: 'INFO',
      logLevel: 'error',
      logJson: false,
    },
    sources: {},
  };
}

async function writeEvents(events: unknown): Promise<string> {
  const path = join(dir, 'events.json');
  await writeFile(path, JSON.stringify(events), 'utf-8');
  return path;
}

const BOOTSTRAP_EVENTS = [
  { type: 'relation-changed', relation: 'cluster', peer: 'karapace/0' },
  { type: 'relation-changed', relation: 'kafka', peer: 'kafka', data: kafkaData() },
];

// =============================================================================
// Event decoding
// =============================================================================

describe('parseEvent', () => {
  it('should decode relation events with string data', () => {
    expect(parseEvent({ type: 'relation-changed', relation: 'kafka', peer: 'kafka', data: { topic: '_schemas' } })).toEqual(
      { type: 'relation-changed', relation: 'kafka', peer: 'kafka', data: { topic: '_schemas' } }
    );
    expect(parseEvent({ type: 'relation-departed', relation: 'karapace', peer: 'orders' })).toEqual({
      type: 'relation-departed',
      relation: 'karapace',
      peer: 'orders',
    });
  });

  it('should decode actions', () => {
    expect(parseEvent({ type: 'action', action: { name: 'set-password', password: 'test-secret' } })).toEqual({
      type: 'action',
      action: { name: 'set-password', password: 'test-secret' },
    });
  });

  it('should reject malformed events', () => {
    expect(() => parseEvent({ type: 'restart' })).toThrow(
      'Unknown event type "restart". Expected one of: relation-changed, relation-departed, config-changed, leader-elected, update-status, action'
    );
    expect(() => parseEvent({ type: 'relation-changed', relation: 'kafka' })).toThrow(
      'Event field "peer" must be a non-empty string'
    );
    expect(() => parseEvent({ type: 'relation-changed', relation: 'kafka', peer: 'kafka', data: { port: 9092 } })).toThrow(
      'Relation data "port" must be a string'
    );
    expect(() => parseEvent({ type: 'action', action: { name: 'reboot' } })).toThrow('Unknown action "reboot"');
  });
});

describe('parseEventDocument', () => {
  it('should accept one event or a list', () => {
    expect(parseEventDocument('{"type":"update-status"}')).toEqual([{ type: 'update-status' }]);
    expect(parseEventDocument('[{"type":"config-changed"},{"type":"leader-elected"}]')).toEqual([
      { type: 'config-changed' },
      { type: 'leader-elected' },
    ]);
  });

  it('should reject invalid JSON', () => {
    expect(() => parseEventDocument('{')).toThrow(/^Events are not valid JSON: /);
  });
});

describe('resolveEvents', () => {
  it('should build one event from flags', async () => {
    await expect(
      resolveEvents({ event: 'relation-changed', relation: 'kafka', peer: 'kafka', data: '{"topic":"_schemas"}' })
    ).resolves.toEqual([{ type: 'relation-changed', relation: 'kafka', peer: 'kafka', data: { topic: '_schemas' } }]);
  });

  it('should read events from a file', async () => {
    const path = await writeEvents(BOOTSTRAP_EVENTS);

    const events = await resolveEvents({ eventsFile: path });

    expect(events.map((event) => event.type)).toEqual(['relation-changed', 'relation-changed']);
  });

  it('should reject conflicting or missing options', async () => {
    await expect(resolveEvents({})).rejects.toThrow('An event type or --events-file is required');
    await expect(resolveEvents({ event: 'config-changed', eventsFile: 'events.json' })).rejects.toThrow(
      'Give either an event type or --events-file, not both'
    );
    await expect(resolveEvents({ event: 'relation-changed', data: 'nope' })).rejects.toThrow(
      '--data must be a JSON object'
    );
  });
});

describe('describeResults', () => {
  it('should report an empty batch', () => {
    expect(describeResults([])).toBe('No events processed');
  });
});

// =============================================================================
// Commands
// =============================================================================

describe('handleCommand', () => {
  it('should run every event and persist the context', async () => {
    const ctx = createContext();
    const eventsFile = await writeEvents(BOOTSTRAP_EVENTS);

    const result = await handleCommand(ctx, { eventsFile }, deps);

    expect(result.success).toBe(true);
    expect(result.message).toBe('2 passes completed (active)');
    expect(result.errors).toBeUndefined();
    expect(workload.running).toBe(true);
    expect(existsSync(ctx.settings.stateFile)).toBe(true);
  });

  it('should resume from the state file', async () => {
    const ctx = createContext();
    await handleCommand(ctx, { eventsFile: await writeEvents(BOOTSTRAP_EVENTS) }, deps);
    workload.reset();

    const result = await handleCommand(ctx, { event: 'config-changed' }, deps);

    expect(result.message).toBe('1 pass completed (active)');
    expect(workload.calls).toEqual([]);
  });

  it('should report failed passes', async () => {
    const ctx = createContext();
    await handleCommand(ctx, { event: 'relation-changed', relation: 'cluster', peer: 'karapace/0' }, deps);
    workload.failNext('write', 4);

    const result = await handleCommand(
      ctx,
      { event: 'relation-changed', relation: 'kafka', peer: 'kafka', data: JSON.stringify(kafkaData()) },
      deps
    );

    expect(result.success).toBe(false);
    expect(result.message).toBe(
      '1 pass, 1 failed (blocked: kafka relation broken: write-file config failed: write rejected)'
    );
    expect(result.errors).toEqual(['write rejected']);
  });
});

describe('statusCommand', () => {
  it('should report the persisted state without touching the service', async () => {
    const ctx = createContext();
    await handleCommand(ctx, { eventsFile: await writeEvents(BOOTSTRAP_EVENTS) }, deps);
    workload.reset();

    const result = await statusCommand(ctx, {}, deps);

    expect(result.message).toBe('karapace/0 is active');
    expect(result.data?.credentials.map((credential) => credential.principal)).toEqual(['operator']);
    expect(result.data?.running).toBe(true);
    expect(result.data?.pendingIntents).toBe(0);
    expect(result.data?.audit).toBeUndefined();
    expect(workload.calls).toEqual([]);
  });
});

describe('Action commands', () => {
  it('should set and read back the admin password', async () => {
    const ctx = createContext();
    await handleCommand(ctx, { eventsFile: await writeEvents(BOOTSTRAP_EVENTS) }, deps);

    const set = await setPasswordCommand(ctx, { password: 'test-secret' }, deps);
    const get = await getPasswordCommand(ctx, {}, deps);

    expect(set.success).toBe(true);
    expect(set.message).toBe('set-password completed');
    expect(set.data?.data).toEqual({ username: 'operator', password: 'test-secret', version: 2 });
    expect(get.data?.data).toEqual({ username: 'operator', password: 'test-secret' });
  });

  it('should fail on a non-leader unit', async () => {
    const ctx = createContext({ name: 'karapace/1', isLeader: false });

    const result = await setPasswordCommand(ctx, { password: 'test-secret' }, deps);

    expect(result.success).toBe(false);
    expect(result.message).toBe('set-password failed');
    expect(result.errors).toEqual(['set-password must be called on the leader unit']);
  });

  it('should refuse both an inline key and a key file', async () => {
    await expect(
      setTlsPrivateKeyCommand(createContext(), { key: 'inline', keyFile: 'key.pem' }, deps)
    ).rejects.toThrow('Give either --key or --key-file, not both');
  });
});
