/**
 * handle command - Run reconciliation passes for external events
 */

import { readFile } from 'node:fs/promises';
import { ValidationFailure } from '../errors.js';
import type { OperatorEvent, ReconciliationResult } from '../reconcilers/types.js';
import type { CommandContext, CommandResult } from '../types.js';
import { printReconciliation, verbose } from '../utils/output.js';
import { parseEvent, parseEventDocument, parseRelationData } from './events.js';
import { runPasses, type PassDependencies } from './session.js';

export interface HandleOptions {
  /** Event type given on the command line */
  event?: string;
  relation?: string;
  peer?: string;
  /** Relation data as a JSON object */
  data?: string;
  /** JSON file holding one event or a list of events */
  eventsFile?: string;
}

/**
 * Build the events to process from command options
 */
export async function resolveEvents(options: HandleOptions): Promise<OperatorEvent[]> {
  if (options.eventsFile) {
    if (options.event) {
      throw new ValidationFailure('Give either an event type or --events-file, not both');
    }
    return parseEventDocument(await readFile(options.eventsFile, 'utf-8'));
  }
  if (!options.event) {
    throw new ValidationFailure('An event type or --events-file is required');
  }

  let data: unknown;
  if (options.data !== undefined) {
    try {
      data = JSON.parse(options.data);
    } catch {
      throw new ValidationFailure('--data must be a JSON object', undefined, 'data');
    }
  }

  return [
    parseEvent({
      type: options.event,
      relation: options.relation,
      peer: options.peer,
      data: parseRelationData(data),
    }),
  ];
}

/**
 * Summarize a batch of passes in one line
 */
export function describeResults(results: ReconciliationResult[]): string {
  const last = results[results.length - 1];
  if (!last) {
    return 'No events processed';
  }
  const status = last.status.message ? `${last.status.level}: ${last.status.message}` : last.status.level;
  const failed = results.filter((result) => !result.success).length;
  const passes = `${results.length} pass${results.length === 1 ? '' : 'es'}`;
  return failed > 0 ? `${passes}, ${failed} failed (${status})` : `${passes} completed (${status})`;
}

/**
 * Execute the handle command
 */
export async function handleCommand(
  ctx: CommandContext,
  options: HandleOptions,
  deps: PassDependencies = {}
): Promise<CommandResult<ReconciliationResult[]>> {
  const { options: globalOpts, outputFormat } = ctx;
  const events = await resolveEvents(options);
  verbose(`Processing ${events.length} event(s) for ${ctx.settings.unit.name}`, globalOpts.verbose);

  const results = await runPasses(ctx, events, deps);
  if (outputFormat === 'human') {
    results.forEach(printReconciliation);
  }

  const errors = results.flatMap((result) => result.failures.map((failure) => failure.message));
  return {
    success: errors.length === 0,
    message: describeResults(results),
    data: results,
    errors: errors.length > 0 ? errors : undefined,
  };
}
