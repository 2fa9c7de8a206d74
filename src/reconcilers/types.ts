/**
 * Types for the reconciliation loop
 *
 * A pass turns one external event into a desired state, diffs it against what
 * the managed service last acknowledged and applies only the delta.
 */

import type { OperatorErrorCode } from '../errors.js';
import type { RelationFields, RelationName, RelationStatus } from '../relations/types.js';
import type { UnitStatus } from './status.js';

// =============================================================================
// Events
// =============================================================================

/**
 * Operator-initiated commands, delivered as events
 */
export type OperatorAction =
  | { name: 'set-password'; username?: string; password?: string }
  | { name: 'get-password'; username?: string }
  | { name: 'set-tls-private-key'; key?: string };

export type OperatorActionName = OperatorAction['name'];

/**
 * External events a pass can be triggered by
 */
export type OperatorEvent =
  | { type: 'relation-changed'; relation: string; peer: string; data: RelationFields }
  | { type: 'relation-departed'; relation: string; peer: string }
  | { type: 'config-changed' }
  | { type: 'leader-elected' }
  | { type: 'update-status' }
  | { type: 'action'; action: OperatorAction };

export type OperatorEventType = OperatorEvent['type'];

// =============================================================================
// Cluster configuration
// =============================================================================

/**
 * Broker-side settings advertised over the kafka relation
 */
export interface ClusterConstraints {
  tls: boolean;
  topic: string;
  consumerGroupPrefix?: string;
}

/**
 * Kafka deployment the registry runs against
 */
export interface ClusterConfig {
  /** Sorted, de-duplicated `host:port` endpoints */
  brokerEndpoints: string[];
  /** Number of brokers; caps the schemas topic replication factor */
  desiredUnitCount: number;
  constraints: ClusterConstraints;
}

/**
 * Parsed and validated kafka relation data
 */
export interface KafkaConnection {
  cluster: ClusterConfig;
  username: string;
  password: string;
  /** Broker CA, when the broker advertises one */
  brokerCa?: string;
}

// =============================================================================
// Relation evaluation
// =============================================================================

/**
 * Outcome of checking one relation's required fields
 */
export type RelationEvaluation =
  | { state: 'ready' }
  | { state: 'pending'; missing: string[] }
  | { state: 'invalid'; reason: string };

// =============================================================================
// Service state
// =============================================================================

/**
 * Files of the managed service, named like ServicePaths keys
 */
export type ServiceFile = 'sslKeyfile' | 'sslCertfile' | 'sslCafile' | 'config' | 'authfile';

/** Apply order of service files */
export const SERVICE_FILES: readonly ServiceFile[] = [
  'sslKeyfile',
  'sslCertfile',
  'sslCafile',
  'config',
  'authfile',
];

/**
 * What the managed service last acknowledged
 */
export interface AppliedState {
  /** SHA-256 digest of each file as written */
  files: Partial<Record<ServiceFile, string>>;
  running: boolean;
  /** A restart was needed but deferred by the restart lock */
  restartPending: boolean;
}

/**
 * Desired file content: a string to write, null to remove, absent to keep
 */
export type DesiredFiles = Partial<Record<ServiceFile, string | null>>;

/**
 * Desired data to publish, by relation and peer
 */
export type DesiredPublications = Partial<Record<RelationName, Record<string, RelationFields>>>;

/**
 * What the managed service and relations should look like
 */
export interface DesiredState {
  files: DesiredFiles;
  /** Relations each file is derived from */
  fileSources: Partial<Record<ServiceFile, RelationName[]>>;
  running: boolean;
  published: DesiredPublications;
}

// =============================================================================
// Plan
// =============================================================================

export type PlanAction =
  | { kind: 'write-file'; file: ServiceFile; content: string; sources: RelationName[] }
  | { kind: 'remove-file'; file: ServiceFile; sources: RelationName[] }
  | { kind: 'start' | 'stop' | 'restart'; sources: RelationName[] }
  | {
      kind: 'publish';
      relation: RelationName;
      peer: string;
      fields: RelationFields;
      sources: RelationName[];
    };

export type PlanActionKind = PlanAction['kind'];

/**
 * Secret-free description of a plan action, used in results
 */
export interface PlanSummary {
  kind: PlanActionKind;
  target: string;
}

// =============================================================================
// Results
// =============================================================================

/**
 * A failure recorded during a pass
 */
export interface PassFailure {
  code: OperatorErrorCode | 'UNKNOWN';
  message: string;
  relation?: string;
  operation?: string;
  attempts?: number;
}

/**
 * Result of an operator action
 */
export interface ActionResult {
  name: OperatorActionName;
  success: boolean;
  data?: Record<string, string | number>;
  error?: string;
}

export interface RelationSummary {
  name: RelationName;
  status: RelationStatus;
  peers: string[];
  reason?: string;
}

/**
 * Outcome of one reconciliation pass
 */
export interface ReconciliationResult {
  event: OperatorEventType;
  success: boolean;
  status: UnitStatus;
  relations: RelationSummary[];
  /** Actions applied to the service and relations */
  applied: PlanSummary[];
  /** Actions postponed to a later pass */
  deferred: PlanSummary[];
  failures: PassFailure[];
  /** Relation data changed in this pass, to deliver to peers */
  published: DesiredPublications;
  action?: ActionResult;
  /** Intents rolled back (recovery at start, or failure at end) */
  rolledBack: number;
  restartPending: boolean;
  durationMs: number;
}
