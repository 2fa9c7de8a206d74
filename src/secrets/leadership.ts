/**
 * Leadership capability
 *
 * Secret origination is reachable only through a LeaderToken. Tokens can only
 * be obtained for a unit that currently holds leadership.
 */

import { LeadershipRequired } from '../errors.js';
import type { UnitIdentity } from '../types.js';

/**
 * Proof that the holder runs on the leader unit
 */
export class LeaderToken {
  private constructor(readonly unit: string) {}

  /**
   * Issue a token for a unit, or undefined when it is not the leader
   */
  static issue(unit: UnitIdentity): LeaderToken | undefined {
    return unit.isLeader ? new LeaderToken(unit.name) : undefined;
  }
}

/**
 * Try to obtain a leader token
 */
export function acquireLeadership(unit: UnitIdentity): LeaderToken | undefined {
  return LeaderToken.issue(unit);
}

/**
 * Obtain a leader token or fail the operation
 *
 * @throws LeadershipRequired on non-leader units
 */
export function requireLeadership(unit: UnitIdentity, operation: string): LeaderToken {
  const token = LeaderToken.issue(unit);
  if (!token) {
    throw new LeadershipRequired(operation);
  }
  return token;
}
