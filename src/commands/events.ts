/**
 * Event decoding for the `handle` command
 *
 * Events arrive as JSON, either inline or from a file holding one event or a
 * list of events to process in order.
 */

import { ValidationFailure } from '../errors.js';
import type { RelationFields } from '../relations/types.js';
import type { OperatorAction, OperatorEvent } from '../reconcilers/types.js';

/** Event types that carry no payload */
const BARE_EVENTS = ['config-changed', 'leader-elected', 'update-status'] as const;

/** Every event type accepted on the command line */
export const EVENT_TYPES = ['relation-changed', 'relation-departed', ...BARE_EVENTS] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(value: unknown, field: string): string {
  if (typeof value !== 'string' || value === '') {
    throw new ValidationFailure(`Event field "${field}" must be a non-empty string`, undefined, field);
  }
  return value;
}

function optionalString(value: unknown, field: string): string | undefined {
  return value === undefined || value === null ? undefined : requireString(value, field);
}

/**
 * Decode relation data, which is always string-valued
 */
export function parseRelationData(value: unknown): RelationFields {
  if (value === undefined || value === null) {
    return {};
  }
  if (!isRecord(value)) {
    throw new ValidationFailure('Relation data must be an object of string values', undefined, 'data');
  }
  const data: RelationFields = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry !== 'string') {
      throw new ValidationFailure(`Relation data "${key}" must be a string`, undefined, key);
    }
    data[key] = entry;
  }
  return data;
}

function parseAction(value: unknown): OperatorAction {
  if (!isRecord(value)) {
    throw new ValidationFailure('Action event requires an "action" object', undefined, 'action');
  }
  switch (value.name) {
    case 'set-password':
      return {
        name: 'set-password',
        username: optionalString(value.username, 'username'),
        password: optionalString(value.password, 'password'),
      };
    case 'get-password':
      return { name: 'get-password', username: optionalString(value.username, 'username') };
    case 'set-tls-private-key':
      return { name: 'set-tls-private-key', key: optionalString(value.key, 'key') };
    default:
      throw new ValidationFailure(`Unknown action "${String(value.name)}"`, undefined, 'action');
  }
}

/**
 * Decode one event object
 *
 * @throws ValidationFailure for unknown types or missing fields
 */
export function parseEvent(value: unknown): OperatorEvent {
  if (!isRecord(value)) {
    throw new ValidationFailure('Event must be a JSON object');
  }
  switch (value.type) {
    case 'relation-changed':
      return {
        type: 'relation-changed',
        relation: requireString(value.relation, 'relation'),
        peer: requireString(value.peer, 'peer'),
        data: parseRelationData(value.data),
      };
    case 'relation-departed':
      return {
        type: 'relation-departed',
        relation: requireString(value.relation, 'relation'),
        peer: requireString(value.peer, 'peer'),
      };
    case 'config-changed':
      return { type: 'config-changed' };
    case 'leader-elected':
      return { type: 'leader-elected' };
    case 'update-status':
      return { type: 'update-status' };
    case 'action':
      return { type: 'action', action: parseAction(value.action) };
    default:
      throw new ValidationFailure(
        `Unknown event type "${String(value.type)}". Expected one of: ${[...EVENT_TYPES, 'action'].join(', ')}`,
        undefined,
        'type'
      );
  }
}

/**
 * Decode a JSON document holding one event or a list of events
 */
export function parseEventDocument(content: string): OperatorEvent[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ValidationFailure(`Events are not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  return Array.isArray(parsed) ? parsed.map(parseEvent) : [parseEvent(parsed)];
}
