/**
 * Unit Tests: Rolling restart lock
 */

import { describe, it, expect } from 'vitest';
import { RestartLock, restartLockFields } from '../../src/reconcilers/restart.js';
import { createClock } from '../fixtures/index.js';

const TIMEOUT = 60_000;

function heldSince(since: string): Record<string, string> {
  return { 'restart-lock': 'held', 'restart-lock-since': since };
}

describe('RestartLock.decide', () => {
  it('should restart at once without restart peers', () => {
    const clock = createClock();
    const lock = new RestartLock({}, 'karapace/0', TIMEOUT, clock.now);

    expect(lock.decide([])).toBe('restart');
    expect(lock.decide([['karapace/0', {}]])).toBe('restart');
    expect(lock.held()).toBe(false);
  });

  it('should take and announce a free lock, then restart on the next decision', () => {
    const clock = createClock();
    const lock = new RestartLock({}, 'karapace/0', TIMEOUT, clock.now);
    const peers = [['karapace/1', {}]] as const;

    expect(lock.decide(peers)).toBe('announce');
    expect(lock.fields()).toEqual(heldSince('2024-05-01T12:00:00.000Z'));

    expect(lock.decide(peers)).toBe('restart');
  });

  it('should wait while a peer holds a fresh lock', () => {
    const clock = createClock();
    const lock = new RestartLock({}, 'karapace/0', TIMEOUT, clock.now);

    expect(lock.decide([['karapace/1', heldSince(clock.now().toISOString())]])).toBe('wait');
    expect(lock.snapshot()).toEqual({});
  });

  it('should ignore a stale peer lock', () => {
    const clock = createClock();
    const since = clock.now().toISOString();
    clock.advance(TIMEOUT);
    const lock = new RestartLock({}, 'karapace/0', TIMEOUT, clock.now);

    expect(lock.heldBy([['karapace/1', heldSince(since)]])).toBeUndefined();
    expect(lock.decide([['karapace/1', heldSince(since)]])).toBe('announce');
  });

  it('should give way to an older claim and drop its own', () => {
    const clock = createClock();
    const older = clock.now().toISOString();
    clock.advance(1000);
    const lock = new RestartLock({}, 'karapace/0', TIMEOUT, clock.now);
    lock.decide([['karapace/1', {}]]);

    expect(lock.decide([['karapace/1', heldSince(older)]])).toBe('wait');
    expect(lock.fields()).toEqual({});
  });

  it('should keep its claim against a younger one', () => {
    const clock = createClock();
    const lock = new RestartLock({}, 'karapace/1', TIMEOUT, clock.now);
    lock.decide([['karapace/0', {}]]);
    clock.advance(1000);

    expect(lock.decide([['karapace/0', heldSince(clock.now().toISOString())]])).toBe('restart');
  });

  it('should break ties by unit name', () => {
    const clock = createClock();
    const since = clock.now().toISOString();
    const lower = new RestartLock({}, 'karapace/0', TIMEOUT, clock.now);
    const higher = new RestartLock({}, 'karapace/1', TIMEOUT, clock.now);
    lower.decide([['karapace/1', {}]]);
    higher.decide([['karapace/0', {}]]);

    expect(lower.decide([['karapace/1', heldSince(since)]])).toBe('restart');
    expect(higher.decide([['karapace/0', heldSince(since)]])).toBe('wait');
  });

  it('should announce again once its own lock has gone stale', () => {
    const clock = createClock();
    const lock = new RestartLock({}, 'karapace/0', TIMEOUT, clock.now);
    lock.decide([['karapace/1', {}]]);
    clock.advance(TIMEOUT);

    expect(lock.held()).toBe(false);
    expect(lock.decide([['karapace/1', {}]])).toBe('announce');
    expect(lock.snapshot()).toEqual({ holder: 'karapace/0', acquiredAt: '2024-05-01T12:01:00.000Z' });
  });
});

describe('restartLockFields', () => {
  it('should only describe a lock held by the given unit', () => {
    const state = { holder: 'karapace/0', acquiredAt: '2024-05-01T12:00:00.000Z' };

    expect(restartLockFields(state, 'karapace/0')).toEqual(heldSince('2024-05-01T12:00:00.000Z'));
    expect(restartLockFields(state, 'karapace/1')).toEqual({});
    expect(restartLockFields({}, 'karapace/0')).toEqual({});
  });
});
