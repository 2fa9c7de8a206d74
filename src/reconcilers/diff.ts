/**
 * Desired/applied diff
 *
 * Produces the minimal ordered plan: TLS files, config, authfile, then the
 * service run state, then relation data.
 */

import { createHash } from 'node:crypto';
import { RELATION_NAMES } from '../relations/metadata.js';
import { fieldsEqual, type RelationTracker } from '../relations/tracker.js';
import type { RelationFields, RelationName } from '../relations/types.js';
import {
  SERVICE_FILES,
  type AppliedState,
  type DesiredState,
  type PlanAction,
  type PlanSummary,
} from './types.js';

/** Relations whose loss stops the service */
const SERVICE_SOURCES: RelationName[] = ['kafka'];

/**
 * SHA-256 digest recorded for applied file content
 */
export function digest(content: string): string {
  return createHash('sha256').update(content, 'utf-8').digest('hex');
}

function serviceActions(desired: DesiredState, applied: AppliedState, filesChanged: boolean): PlanAction[] {
  if (desired.running && !applied.running) {
    return [{ kind: 'start', sources: SERVICE_SOURCES }];
  }
  if (!desired.running && applied.running) {
    return [{ kind: 'stop', sources: SERVICE_SOURCES }];
  }
  if (desired.running && (filesChanged || applied.restartPending)) {
    return [{ kind: 'restart', sources: SERVICE_SOURCES }];
  }
  return [];
}

function publishActions(desired: DesiredState, relations: RelationTracker): PlanAction[] {
  const actions: PlanAction[] = [];
  for (const relation of RELATION_NAMES) {
    const wanted = desired.published[relation] ?? {};
    const current = relations.get(relation)?.publishedFields ?? new Map<string, RelationFields>();
    const peers = new Set([...Object.keys(wanted), ...current.keys()]);

    for (const peer of [...peers].sort()) {
      const fields = wanted[peer] ?? {};
      if (!fieldsEqual(current.get(peer) ?? {}, fields)) {
        actions.push({ kind: 'publish', relation, peer, fields, sources: [relation] });
      }
    }
  }
  return actions;
}

/**
 * Compute the actions that bring the service and relations to the desired state
 */
export function diffState(
  desired: DesiredState,
  applied: AppliedState,
  relations: RelationTracker
): PlanAction[] {
  const plan: PlanAction[] = [];

  for (const file of SERVICE_FILES) {
    const content = desired.files[file];
    const sources = desired.fileSources[file] ?? [];
    if (content === undefined) continue;
    if (content === null) {
      if (applied.files[file] !== undefined) {
        plan.push({ kind: 'remove-file', file, sources });
      }
    } else if (applied.files[file] !== digest(content)) {
      plan.push({ kind: 'write-file', file, content, sources });
    }
  }

  plan.push(...serviceActions(desired, applied, plan.length > 0));
  plan.push(...publishActions(desired, relations));
  return plan;
}

/**
 * Secret-free description of an action
 */
export function summarize(action: PlanAction): PlanSummary {
  switch (action.kind) {
    case 'write-file':
    case 'remove-file':
      return { kind: action.kind, target: action.file };
    case 'publish':
      return { kind: action.kind, target: `${action.relation}:${action.peer}` };
    default:
      return { kind: action.kind, target: 'service' };
  }
}
