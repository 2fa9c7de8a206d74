/**
 * Relation State Tracker
 *
 * Records which relations are established, pending or broken, together with
 * the data exchanged with each peer. Every read returns a copy; only the
 * reconciliation pass that owns the tracker changes it.
 */

import { CardinalityViolation, ValidationFailure } from '../errors.js';
import { getRelationDeclaration } from './metadata.js';
import type {
  RelationFields,
  RelationName,
  RelationSnapshot,
  RelationState,
  RelationStatus,
} from './types.js';

/**
 * Merge field updates into existing data; an empty value deletes the key
 */
export function mergeFields(current: RelationFields, updates: RelationFields): RelationFields {
  const merged: RelationFields = { ...current };
  for (const [key, value] of Object.entries(updates)) {
    if (value === '') {
      delete merged[key];
    } else {
      merged[key] = value;
    }
  }
  return merged;
}

/**
 * Whether two field maps hold the same keys and values
 */
export function fieldsEqual(a: RelationFields, b: RelationFields): boolean {
  const aKeys = Object.keys(a);
  if (aKeys.length !== Object.keys(b).length) {
    return false;
  }
  return aKeys.every((key) => b[key] === a[key]);
}

function cloneRelation(state: RelationState): RelationState {
  return {
    ...state,
    peerUnitIds: new Set(state.peerUnitIds),
    exchangedFields: new Map(
      [...state.exchangedFields].map(([peer, fields]) => [peer, { ...fields }])
    ),
    publishedFields: new Map(
      [...state.publishedFields].map(([peer, fields]) => [peer, { ...fields }])
    ),
  };
}

/**
 * Convert a relation into its persisted form
 */
export function toRelationSnapshot(state: RelationState): RelationSnapshot {
  const peers: Record<string, RelationFields> = {};
  for (const peer of [...state.peerUnitIds].sort()) {
    peers[peer] = { ...(state.exchangedFields.get(peer) ?? {}) };
  }
  const published: Record<string, RelationFields> = {};
  for (const [peer, fields] of state.publishedFields) {
    published[peer] = { ...fields };
  }
  return {
    relationName: state.relationName,
    status: state.status,
    peers,
    published,
    reason: state.reason,
    retryable: state.retryable,
    updatedAt: state.updatedAt,
  };
}

/**
 * Rebuild a relation from its persisted form
 */
export function fromRelationSnapshot(snapshot: RelationSnapshot): RelationState {
  const declared = getRelationDeclaration(snapshot.relationName);
  return {
    relationName: declared.name,
    interfaceName: declared.interfaceName,
    kind: declared.kind,
    status: snapshot.status,
    peerUnitIds: new Set(Object.keys(snapshot.peers)),
    exchangedFields: new Map(Object.entries(snapshot.peers).map(([peer, f]) => [peer, { ...f }])),
    publishedFields: new Map(Object.entries(snapshot.published).map(([peer, f]) => [peer, { ...f }])),
    reason: snapshot.reason,
    retryable: snapshot.retryable,
    updatedAt: snapshot.updatedAt,
  };
}

/**
 * Tracks every declared relation of this unit
 */
export class RelationTracker {
  private readonly relations = new Map<RelationName, RelationState>();

  constructor(
    initial: RelationState[] = [],
    private readonly now: () => Date = () => new Date()
  ) {
    for (const state of initial) {
      this.relations.set(state.relationName, cloneRelation(state));
    }
  }

  /**
   * Current state of a relation, or undefined when it was never observed
   */
  get(relationName: string): RelationState | undefined {
    const state = this.relations.get(getRelationDeclaration(relationName).name);
    return state ? cloneRelation(state) : undefined;
  }

  /**
   * Whether a relation is currently tracked with at least one peer
   */
  has(relationName: RelationName): boolean {
    const state = this.relations.get(relationName);
    return state !== undefined && state.status !== 'absent' && state.peerUnitIds.size > 0;
  }

  /**
   * All tracked relations
   */
  list(): RelationState[] {
    return [...this.relations.values()].map(cloneRelation);
  }

  /**
   * Sorted peer ids of a relation
   */
  peers(relationName: RelationName): string[] {
    return [...(this.relations.get(relationName)?.peerUnitIds ?? [])].sort();
  }

  /**
   * Data received from one peer
   */
  fields(relationName: RelationName, peerId: string): RelationFields {
    return { ...(this.relations.get(relationName)?.exchangedFields.get(peerId) ?? {}) };
  }

  /**
   * Record data received from a peer
   *
   * @throws CardinalityViolation when a new peer would exceed the declared limit
   */
  update(relationName: string, peerId: string, fields: RelationFields): RelationState {
    const declared = getRelationDeclaration(relationName);
    if (!peerId) {
      throw new ValidationFailure(`Relation "${declared.name}" update is missing a peer id`, declared.name);
    }

    const existing = this.relations.get(declared.name);
    const isNewPeer = !existing?.peerUnitIds.has(peerId);

    if (declared.limit !== undefined && isNewPeer && (existing?.peerUnitIds.size ?? 0) >= declared.limit) {
      throw new CardinalityViolation(declared.name, declared.limit, peerId);
    }

    const state: RelationState = existing ?? {
      relationName: declared.name,
      interfaceName: declared.interfaceName,
      kind: declared.kind,
      status: 'absent',
      peerUnitIds: new Set(),
      exchangedFields: new Map(),
      publishedFields: new Map(),
      updatedAt: this.now().toISOString(),
    };

    const current = state.exchangedFields.get(peerId) ?? {};
    const merged = mergeFields(current, fields);
    const changed = isNewPeer || !fieldsEqual(current, merged);

    state.peerUnitIds.add(peerId);
    state.exchangedFields.set(peerId, merged);

    // New data re-arms a relation that failed while its peers stayed;
    // a failed workload operation is retried on any update
    if (state.status === 'absent' || (state.status === 'broken' && (changed || state.retryable))) {
      state.status = 'joining';
      state.reason = undefined;
      state.retryable = undefined;
    }
    if (changed) {
      state.updatedAt = this.now().toISOString();
    }

    this.relations.set(declared.name, state);
    return cloneRelation(state);
  }

  /**
   * Drop a peer; the relation becomes broken once no peers remain
   */
  remove(relationName: string, peerId: string): RelationState | undefined {
    const declared = getRelationDeclaration(relationName);
    const state = this.relations.get(declared.name);
    if (!state || !state.peerUnitIds.has(peerId)) {
      return state ? cloneRelation(state) : undefined;
    }

    state.peerUnitIds.delete(peerId);
    state.exchangedFields.delete(peerId);
    state.publishedFields.delete(peerId);
    state.updatedAt = this.now().toISOString();

    if (state.peerUnitIds.size === 0) {
      state.status = 'broken';
      state.reason = 'relation removed';
    }

    return cloneRelation(state);
  }

  /**
   * Move a relation to a new lifecycle status
   */
  setStatus(
    relationName: RelationName,
    status: RelationStatus,
    reason?: string,
    options: { retryable?: boolean } = {}
  ): void {
    const state = this.relations.get(relationName);
    if (!state) {
      return;
    }
    state.retryable = status === 'broken' && options.retryable ? true : undefined;
    if (state.status !== status || state.reason !== reason) {
      state.status = status;
      state.reason = reason;
      state.updatedAt = this.now().toISOString();
    }
  }

  /**
   * Return relations broken by a failed workload operation to joining
   *
   * @returns names of the re-armed relations
   */
  rearm(): RelationName[] {
    const rearmed: RelationName[] = [];
    for (const state of this.relations.values()) {
      if (state.status !== 'broken' || !state.retryable || state.peerUnitIds.size === 0) continue;
      state.status = 'joining';
      state.reason = undefined;
      state.retryable = undefined;
      state.updatedAt = this.now().toISOString();
      rearmed.push(state.relationName);
    }
    return rearmed;
  }

  /**
   * Replace the data this unit publishes towards a peer
   *
   * On peer relations the key is this unit's own name (its unit data bag).
   * Publishing an empty field set withdraws the data.
   */
  publish(relationName: RelationName, peerId: string, fields: RelationFields): void {
    const state = this.relations.get(relationName);
    if (!state) {
      return;
    }
    if (Object.keys(fields).length === 0) {
      state.publishedFields.delete(peerId);
    } else {
      state.publishedFields.set(peerId, { ...fields });
    }
  }

  /**
   * Data this unit currently publishes towards a peer
   */
  published(relationName: RelationName, peerId: string): RelationFields | undefined {
    const fields = this.relations.get(relationName)?.publishedFields.get(peerId);
    return fields ? { ...fields } : undefined;
  }

  /**
   * Stop tracking a relation entirely (status becomes absent)
   */
  forget(relationName: RelationName): void {
    this.relations.delete(relationName);
  }

  /**
   * Lifecycle status, `absent` when untracked
   */
  status(relationName: RelationName): RelationStatus {
    return this.relations.get(relationName)?.status ?? 'absent';
  }

  /**
   * Persisted form of every tracked relation
   */
  snapshot(): RelationSnapshot[] {
    return [...this.relations.values()].map(toRelationSnapshot);
  }
}
