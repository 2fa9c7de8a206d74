/**
 * Shared pass runner for commands
 *
 * Loads the persisted context, runs one pass per event and saves the context
 * again, also when a pass throws. Intents left behind by a throwing pass are
 * rolled back at the start of the next one.
 */

import { hostname } from 'node:os';
import { createOperatorContext, snapshotContext, type OperatorContext } from '../reconcilers/context.js';
import { Reconciler } from '../reconcilers/loop.js';
import type { OperatorEvent, ReconciliationResult } from '../reconcilers/types.js';
import { loadContext, saveContext } from '../state/store.js';
import type { CommandContext } from '../types.js';
import { FileWorkload } from '../workload/client.js';
import { createLogger, type OperatorLogger } from '../workload/logger.js';
import type { Workload } from '../workload/types.js';

/**
 * Collaborators a command may substitute, mainly for tests
 */
export interface PassDependencies {
  workload?: Workload;
  logger?: OperatorLogger;
  now?: () => Date;
  fqdn?: string;
}

/**
 * Logger configured from the resolved settings
 */
export function commandLogger(ctx: CommandContext, deps: PassDependencies = {}): OperatorLogger {
  return deps.logger ?? createLogger({ level: ctx.settings.logLevel, json: ctx.settings.logJson });
}

/**
 * Restore the operator context from the state file
 */
export async function openContext(ctx: CommandContext, deps: PassDependencies = {}): Promise<OperatorContext> {
  const { settings } = ctx;
  const snapshot = await loadContext(settings.stateFile, settings.unit.name);
  return createOperatorContext(settings.unit, { now: deps.now, logger: commandLogger(ctx, deps) }, snapshot);
}

/**
 * Run events through the reconciler in order and persist the result
 */
export async function runPasses(
  ctx: CommandContext,
  events: OperatorEvent[],
  deps: PassDependencies = {}
): Promise<ReconciliationResult[]> {
  const { settings } = ctx;
  const log = commandLogger(ctx, deps);
  const context = await openContext(ctx, { ...deps, logger: log });

  const workload =
    deps.workload ??
    new FileWorkload({
      confDir: settings.confDir,
      serviceCommand: settings.serviceCommand,
      serviceName: settings.serviceName,
      logger: log,
    });

  const reconciler = new Reconciler(context, {
    workload,
    retry: settings.retry,
    restartLockTimeoutMs: settings.restartLockTimeoutMs,
    serviceLogLevel: settings.serviceLogLevel,
    logger: log,
    now: deps.now,
    fqdn: deps.fqdn ?? hostname(),
  });

  const results: ReconciliationResult[] = [];
  try {
    for (const event of events) {
      results.push(await reconciler.handle(event));
    }
  } finally {
    await saveContext(settings.stateFile, snapshotContext(context));
  }
  return results;
}
