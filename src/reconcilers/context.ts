/**
 * Operator context
 *
 * Everything a pass reads and writes, passed explicitly into every pass.
 * Created at process start, persisted between passes.
 */

import { RelationTracker, fromRelationSnapshot } from '../relations/tracker.js';
import type { RelationSnapshot } from '../relations/types.js';
import { SecretManager } from '../secrets/manager.js';
import type { SecretSnapshot } from '../secrets/types.js';
import type { UnitIdentity } from '../types.js';
import type { OperatorLogger } from '../workload/logger.js';
import type { RestartLockState } from './restart.js';
import { statusOf, type UnitStatus } from './status.js';
import type { AppliedState, ClusterConfig } from './types.js';

/** Version of the persisted context layout */
export const CONTEXT_VERSION = 1;

export interface OperatorContext {
  unit: UnitIdentity;
  relations: RelationTracker;
  secrets: SecretManager;
  applied: AppliedState;
  /** Derived from kafka relation data; undefined until it is complete */
  clusterConfig?: ClusterConfig;
  restartLock: RestartLockState;
  status: UnitStatus;
}

/**
 * Persisted form of the context
 */
export interface ContextSnapshot {
  version: number;
  unit: string;
  relations: RelationSnapshot[];
  secrets: SecretSnapshot;
  applied: AppliedState;
  clusterConfig?: ClusterConfig;
  restartLock: RestartLockState;
  status: UnitStatus;
}

export interface ContextOptions {
  now?: () => Date;
  logger?: OperatorLogger;
}

export function emptyAppliedState(): AppliedState {
  return { files: {}, running: false, restartPending: false };
}

/**
 * Create a context, restoring a snapshot when one is given
 */
export function createOperatorContext(
  unit: UnitIdentity,
  options: ContextOptions = {},
  snapshot?: ContextSnapshot
): OperatorContext {
  const now = options.now ?? (() => new Date());
  return {
    unit: { ...unit },
    relations: new RelationTracker((snapshot?.relations ?? []).map(fromRelationSnapshot), now),
    secrets: new SecretManager({ actor: unit.name, now, logger: options.logger }, snapshot?.secrets),
    applied: snapshot
      ? {
          files: { ...snapshot.applied.files },
          running: snapshot.applied.running,
          restartPending: snapshot.applied.restartPending,
        }
      : emptyAppliedState(),
    clusterConfig: snapshot?.clusterConfig,
    restartLock: { ...(snapshot?.restartLock ?? {}) },
    status: snapshot ? { ...snapshot.status } : statusOf('NO_PEER_RELATION').status,
  };
}

/**
 * Persisted form of a context
 */
export function snapshotContext(context: OperatorContext): ContextSnapshot {
  return {
    version: CONTEXT_VERSION,
    unit: context.unit.name,
    relations: context.relations.snapshot(),
    secrets: context.secrets.snapshot(),
    applied: {
      files: { ...context.applied.files },
      running: context.applied.running,
      restartPending: context.applied.restartPending,
    },
    clusterConfig: context.clusterConfig,
    restartLock: { ...context.restartLock },
    status: { ...context.status },
  };
}
