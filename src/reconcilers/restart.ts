/**
 * Rolling restart lock
 *
 * Units announce a held lock over the `restart` peer relation. A unit with
 * restart peers takes the lock and announces it in one pass, then restarts
 * on a later pass while no other unit announces an older fresh lock.
 * Announcements older than the lock timeout are ignored.
 */

import type { RelationFields } from '../relations/types.js';
import { FIELDS } from './literals.js';

/** Default time after which a held lock is considered stale */
export const DEFAULT_RESTART_LOCK_TIMEOUT_MS = 5 * 60 * 1000;

export interface RestartLockState {
  holder?: string;
  acquiredAt?: string;
}

/**
 * What a pending restart may do this pass
 *
 * - `restart`: restart now
 * - `announce`: the lock was just taken; restart once peers have seen it
 * - `wait`: another unit holds the lock
 */
export type RestartDecision = 'restart' | 'announce' | 'wait';

type RestartPeers = ReadonlyArray<readonly [string, RelationFields]>;

/**
 * Relation data announcing a lock held by `unit`
 */
export function restartLockFields(state: RestartLockState, unit: string): RelationFields {
  if (state.holder !== unit || !state.acquiredAt) {
    return {};
  }
  return { [FIELDS.restart.lock]: 'held', [FIELDS.restart.since]: state.acquiredAt };
}

export class RestartLock {
  private state: RestartLockState;

  constructor(
    state: RestartLockState,
    private readonly unit: string,
    private readonly timeoutMs: number = DEFAULT_RESTART_LOCK_TIMEOUT_MS,
    private readonly now: () => Date = () => new Date()
  ) {
    this.state = { ...state };
  }

  private fresh(since: string | undefined): boolean {
    if (!since) {
      return false;
    }
    const acquired = Date.parse(since);
    return Number.isFinite(acquired) && this.now().getTime() - acquired < this.timeoutMs;
  }

  // Older claims win; equal timestamps go to the lower unit name
  private outranks(peer: string, since: string): boolean {
    if (!this.held() || this.state.acquiredAt === undefined) {
      return true;
    }
    const theirs = Date.parse(since);
    const ours = Date.parse(this.state.acquiredAt);
    return theirs < ours || (theirs === ours && peer < this.unit);
  }

  /**
   * Another unit holding a fresh lock that takes precedence over ours, if any
   */
  heldBy(peers: RestartPeers): string | undefined {
    for (const [peer, fields] of peers) {
      if (peer === this.unit) continue;
      const since = fields[FIELDS.restart.since];
      if (fields[FIELDS.restart.lock] === 'held' && since && this.fresh(since) && this.outranks(peer, since)) {
        return peer;
      }
    }
    return undefined;
  }

  /**
   * Decide whether a pending restart may run, taking the lock when it is free
   */
  decide(peers: RestartPeers): RestartDecision {
    if (!peers.some(([peer]) => peer !== this.unit)) {
      return 'restart';
    }
    if (this.heldBy(peers) !== undefined) {
      this.release();
      return 'wait';
    }
    if (this.held()) {
      return 'restart';
    }
    this.state = { holder: this.unit, acquiredAt: this.now().toISOString() };
    return 'announce';
  }

  release(): void {
    this.state = {};
  }

  /**
   * Whether this unit holds a lock that has not gone stale
   */
  held(): boolean {
    return this.state.holder === this.unit && this.fresh(this.state.acquiredAt);
  }

  /**
   * Relation data announcing this unit's lock, empty when not held
   */
  fields(): RelationFields {
    return restartLockFields(this.state, this.unit);
  }

  snapshot(): RestartLockState {
    return { ...this.state };
  }
}
