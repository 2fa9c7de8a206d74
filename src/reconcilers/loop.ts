/**
 * Reconciliation loop
 *
 * `handle(event)` is the single entry point. Each call is a full pass:
 *
 * 1. roll back intents left by an interrupted pass; on update-status and
 *    config-changed, retry relations broken by a failed apply
 * 2. ingest the event's relation data
 * 3. leader: originate credentials and TLS keys; others: apply replicated ones
 * 4. attach signed certificates, run the requested action
 * 5. evaluate relations, clean up removed ones, compute readiness
 * 6. compute desired state, diff against applied state, apply the delta
 * 7. announce or withdraw the restart lock
 * 8. commit intents and promote relations, or roll back and mark broken
 */

import {
  CardinalityViolation,
  TimeoutError,
  TransientBackendFailure,
  ValidationFailure,
  isOperatorError,
  toError,
} from '../errors.js';
import { fieldsEqual } from '../relations/tracker.js';
import { acquireLeadership } from '../secrets/leadership.js';
import { logger as defaultLogger, type OperatorLogger } from '../workload/logger.js';
import { resolvePolicy, withRetry, type RetryPolicy } from '../workload/retry.js';
import type { Workload } from '../workload/types.js';
import { runAction } from './actions.js';
import { applyPlan, type ApplyFailure } from './apply.js';
import type { OperatorContext } from './context.js';
import { computeDesiredState, type ServiceLogLevel } from './desired.js';
import { diffState, summarize } from './diff.js';
import {
  acceptSignedCertificates,
  certificateSubject,
  cleanupRelations,
  evaluateReadiness,
  evaluateRelations,
  ingestEvent,
  markBrokenRelations,
  originateSecrets,
  promoteRelations,
  replicateFromLeader,
  usableKafkaConnection,
} from './lifecycle.js';
import { DEFAULT_RESTART_LOCK_TIMEOUT_MS, RestartLock } from './restart.js';
import { statusOf, type StatusEntry } from './status.js';
import type {
  ActionResult,
  DesiredPublications,
  OperatorEvent,
  PassFailure,
  PlanAction,
  ReconciliationResult,
  RelationSummary,
} from './types.js';

// =============================================================================
// Types
// =============================================================================

export interface ReconcilerOptions {
  workload: Workload;
  /** Backoff policy for workload operations */
  retry?: RetryPolicy;
  restartLockTimeoutMs?: number;
  serviceLogLevel?: ServiceLogLevel;
  logger?: OperatorLogger;
  now?: () => Date;
  /** Fully qualified host name added to certificate requests */
  fqdn?: string;
}

interface PassRecord {
  failures: PassFailure[];
  rolledBack: number;
  action?: ActionResult;
  applied: PlanAction[];
  deferred: PlanAction[];
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Describe any error as a pass failure
 */
export function toPassFailure(error: unknown, attempts?: number): PassFailure {
  if (!isOperatorError(error)) {
    return { code: 'UNKNOWN', message: toError(error).message, attempts };
  }
  const failure: PassFailure = { code: error.code, message: error.message, attempts };
  if (error instanceof ValidationFailure || error instanceof CardinalityViolation) {
    failure.relation = error.relationName;
  }
  if (error instanceof TransientBackendFailure || error instanceof TimeoutError) {
    failure.operation = error.operation;
  }
  return failure;
}

function collectPublished(applied: PlanAction[]): DesiredPublications {
  const published: DesiredPublications = {};
  for (const action of applied) {
    if (action.kind !== 'publish') continue;
    published[action.relation] = { ...(published[action.relation] ?? {}), [action.peer]: { ...action.fields } };
  }
  return published;
}

// =============================================================================
// Reconciler
// =============================================================================

export class Reconciler {
  private readonly log: OperatorLogger;
  private readonly retry: Required<RetryPolicy>;
  private readonly now: () => Date;

  constructor(
    readonly context: OperatorContext,
    private readonly options: ReconcilerOptions
  ) {
    this.log = (options.logger ?? defaultLogger).child({ unit: context.unit.name });
    this.retry = resolvePolicy(options.retry);
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Run one reconciliation pass for an event
   */
  async handle(event: OperatorEvent): Promise<ReconciliationResult> {
    const started = Date.now();
    const log = this.log.child({ event: event.type });
    const context = this.context;
    const pass: PassRecord = { failures: [], rolledBack: 0, applied: [], deferred: [] };

    if (context.secrets.pendingIntents().length > 0) {
      pass.rolledBack += context.secrets.rollback();
      log.warn('Recovered from an interrupted pass', { rolledBack: pass.rolledBack });
    }

    if (event.type === 'update-status' || event.type === 'config-changed') {
      const rearmed = context.relations.rearm();
      if (rearmed.length > 0) {
        log.info('Retrying relations broken by a failed apply', { relations: rearmed });
      }
    }

    try {
      ingestEvent(context, event);
      const subject = certificateSubject(context, this.options.fqdn);
      const token = acquireLeadership(context.unit);
      if (token) {
        originateSecrets(context, context.secrets.writer(token), subject);
      } else {
        replicateFromLeader(context);
      }
      acceptSignedCertificates(context);
      if (event.type === 'action') {
        pass.action = runAction(context, event.action, subject);
        log.info(`Action ${event.action.name} completed`);
      }
    } catch (error) {
      // Programming errors and backend failures are not terminal pass outcomes
      if (!isOperatorError(error) || error.retryable) {
        throw error;
      }
      pass.rolledBack += context.secrets.rollback();
      pass.failures.push(toPassFailure(error));
      if (event.type === 'action') {
        pass.action = { name: event.action.name, success: false, error: error.message };
      }
      log.error('Pass stopped', error);
      this.setStatus(evaluateReadiness(context), log);
      return this.result(event, pass, started);
    }

    const evaluations = evaluateRelations(context);
    markBrokenRelations(context, evaluations, log);
    cleanupRelations(context, log);
    context.clusterConfig = usableKafkaConnection(context)?.cluster;

    let readiness = evaluateReadiness(context);
    const desired = computeDesiredState(context, readiness, {
      paths: this.options.workload.paths,
      serviceLogLevel: this.options.serviceLogLevel,
    });
    const plan = diffState(desired, context.applied, context.relations);
    if (plan.length > 0) {
      log.debug('Computed plan', { actions: plan.map(summarize) });
    }

    const lock = new RestartLock(
      context.restartLock,
      context.unit.name,
      this.options.restartLockTimeoutMs ?? DEFAULT_RESTART_LOCK_TIMEOUT_MS,
      this.now
    );
    const restartPeers = context.relations
      .peers('restart')
      .map((peer) => [peer, context.relations.fields('restart', peer)] as const);

    const outcome = await applyPlan(plan, {
      workload: this.options.workload,
      relations: context.relations,
      applied: context.applied,
      lock,
      restartPeers,
      retry: this.retry,
      logger: log,
    });
    if (!context.applied.restartPending) {
      lock.release();
    }
    context.restartLock = lock.snapshot();
    pass.applied = outcome.applied;
    pass.deferred = outcome.deferred;
    const announcement = this.announceRestartLock(lock);
    if (announcement) {
      pass.applied.push(announcement);
    }

    if (outcome.failure) {
      const rolledBack = context.secrets.rollback();
      pass.rolledBack += rolledBack;
      this.breakSources(outcome.failure, log);
      pass.failures.push(toPassFailure(outcome.failure.error, outcome.failure.attempts));
      // The action's secret changes did not survive the failed apply
      if (pass.action?.success && rolledBack > 0) {
        pass.action = {
          name: pass.action.name,
          success: false,
          error: `Rolled back: ${outcome.failure.error.message}`,
        };
      }
      readiness = evaluateReadiness(context);
    } else {
      context.secrets.commit();
      const promoted = promoteRelations(context, evaluations);
      if (promoted.length > 0) {
        log.info('Relations active', { relations: promoted });
      }
      if (event.type === 'update-status' && readiness.status.level === 'active') {
        readiness = await this.checkService(readiness, pass, log);
      }
    }

    this.setStatus(readiness, log);
    return this.result(event, pass, started);
  }

  /**
   * Publish this unit's restart lock to its peers when it changed
   */
  private announceRestartLock(lock: RestartLock): PlanAction | undefined {
    const relations = this.context.relations;
    const unit = this.context.unit.name;
    if (!relations.has('restart')) {
      return undefined;
    }
    const fields = lock.fields();
    const current = relations.published('restart', unit) ?? {};
    if (fieldsEqual(current, fields)) {
      return undefined;
    }
    relations.publish('restart', unit, fields);
    return { kind: 'publish', relation: 'restart', peer: unit, fields, sources: ['restart'] };
  }

  /**
   * Mark the relations feeding a failed action as broken
   */
  private breakSources(failure: ApplyFailure, log: OperatorLogger): void {
    const { kind, target } = summarize(failure.action);
    const reason = `${kind} ${target} failed: ${failure.error.message}`;
    for (const source of failure.action.sources) {
      if (this.context.relations.has(source)) {
        this.context.relations.setStatus(source, 'broken', reason, { retryable: true });
        log.warn('Relation broken by failed apply', { relation: source, reason });
      }
    }
  }

  private async checkService(
    readiness: StatusEntry,
    pass: PassRecord,
    log: OperatorLogger
  ): Promise<StatusEntry> {
    const result = await withRetry((signal) => this.options.workload.active(signal), {
      ...this.retry,
      operation: 'service health check',
      logger: log,
    });
    if (!result.success) {
      pass.failures.push(toPassFailure(result.error, result.attempts));
      return statusOf('SERVICE_NOT_RUNNING');
    }
    return result.data ? readiness : statusOf('SERVICE_NOT_RUNNING');
  }

  private setStatus(entry: StatusEntry, log: OperatorLogger): void {
    const { level, message } = entry.status;
    if (level !== this.context.status.level || message !== this.context.status.message) {
      log.log(entry.logLevel, `Status ${level}${message ? `: ${message}` : ''}`);
    }
    this.context.status = { ...entry.status };
  }

  private relationSummaries(): RelationSummary[] {
    return this.context.relations.list().map((state) => ({
      name: state.relationName,
      status: state.status,
      peers: [...state.peerUnitIds].sort(),
      reason: state.reason,
    }));
  }

  private result(event: OperatorEvent, pass: PassRecord, started: number): ReconciliationResult {
    return {
      event: event.type,
      success: pass.failures.length === 0,
      status: { ...this.context.status },
      relations: this.relationSummaries(),
      applied: pass.applied.map(summarize),
      deferred: pass.deferred.map(summarize),
      failures: pass.failures,
      published: collectPublished(pass.applied),
      action: pass.action,
      rolledBack: pass.rolledBack,
      restartPending: this.context.applied.restartPending,
      durationMs: Date.now() - started,
    };
  }
}
