/**
 * Plan application
 *
 * Executes plan actions in order against the workload, each with bounded
 * retries, and records every acknowledged action in the applied state.
 * Stops at the first action whose retries are exhausted.
 */

import type { RelationTracker } from '../relations/tracker.js';
import type { RelationFields } from '../relations/types.js';
import type { OperatorLogger } from '../workload/logger.js';
import { withRetry, type RetryPolicy } from '../workload/retry.js';
import type { Workload } from '../workload/types.js';
import { digest, summarize } from './diff.js';
import type { RestartLock } from './restart.js';
import type { AppliedState, PlanAction } from './types.js';

export interface ApplyOptions {
  workload: Workload;
  relations: RelationTracker;
  applied: AppliedState;
  lock: RestartLock;
  /** Restart relation data of all units */
  restartPeers: ReadonlyArray<readonly [string, RelationFields]>;
  retry: RetryPolicy;
  logger: OperatorLogger;
}

export interface ApplyFailure {
  action: PlanAction;
  error: Error;
  attempts: number;
}

export interface ApplyOutcome {
  applied: PlanAction[];
  deferred: PlanAction[];
  failure?: ApplyFailure;
}

async function execute(action: PlanAction, workload: Workload, signal: AbortSignal): Promise<void> {
  switch (action.kind) {
    case 'write-file':
      await workload.write(workload.paths[action.file], action.content, signal);
      return;
    case 'remove-file':
      await workload.remove(workload.paths[action.file]);
      return;
    case 'start':
      await workload.start(signal);
      return;
    case 'stop':
      await workload.stop(signal);
      return;
    case 'restart':
      await workload.restart(signal);
      return;
    case 'publish':
      return;
  }
}

function record(action: PlanAction, options: ApplyOptions): void {
  const { applied } = options;
  switch (action.kind) {
    case 'write-file':
      applied.files[action.file] = digest(action.content);
      break;
    case 'remove-file':
      delete applied.files[action.file];
      break;
    case 'start':
      applied.running = true;
      applied.restartPending = false;
      break;
    case 'stop':
      applied.running = false;
      applied.restartPending = false;
      break;
    case 'restart':
      applied.restartPending = false;
      break;
    case 'publish':
      options.relations.publish(action.relation, action.peer, action.fields);
      break;
  }
}

/**
 * Apply a plan in order
 */
export async function applyPlan(plan: PlanAction[], options: ApplyOptions): Promise<ApplyOutcome> {
  const outcome: ApplyOutcome = { applied: [], deferred: [] };
  const log = options.logger;

  for (const action of plan) {
    const { kind, target } = summarize(action);

    // Relation data is local until delivered with the result
    if (action.kind === 'publish') {
      record(action, options);
      outcome.applied.push(action);
      continue;
    }

    if (action.kind === 'restart') {
      const decision = options.lock.decide(options.restartPeers);
      if (decision !== 'restart') {
        options.applied.restartPending = true;
        outcome.deferred.push(action);
        log.info(
          decision === 'announce'
            ? 'Restart deferred, announcing the restart lock'
            : 'Restart deferred, another unit holds the restart lock'
        );
        continue;
      }
    }

    const result = await withRetry((signal) => execute(action, options.workload, signal), {
      ...options.retry,
      operation: `${kind} ${target}`,
      logger: log,
    });

    if (action.kind === 'restart') {
      options.lock.release();
    }

    if (!result.success) {
      const error = result.error ?? new Error(`${kind} ${target} failed`);
      log.error(`Failed to ${kind} ${target}`, error, { attempts: result.attempts });
      outcome.failure = { action, error, attempts: result.attempts };
      return outcome;
    }

    record(action, options);
    outcome.applied.push(action);
    log.debug(`Applied ${kind} ${target}`, { attempts: result.attempts });
  }

  return outcome;
}
