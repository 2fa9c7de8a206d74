/**
 * Types for relation tracking
 *
 * A relation is a declared integration point carrying key/value data in both
 * directions. Peer, requires and provides relations share one storage shape;
 * only their reconciliation triggers differ.
 */

/**
 * Direction of a relation
 */
export type RelationKind = 'peer' | 'requires' | 'provides';

/**
 * Lifecycle status of a relation
 *
 * absent → joining → active → broken → absent
 */
export type RelationStatus = 'absent' | 'joining' | 'active' | 'broken';

/**
 * Relations this controller declares
 */
export type RelationName =
  | 'cluster'
  | 'restart'
  | 'kafka'
  | 'certificates'
  | 'karapace'
  | 'cos-agent';

/**
 * Key/value data exchanged over a relation
 */
export type RelationFields = Record<string, string>;

/**
 * Static declaration of a relation
 */
export interface RelationDeclaration {
  name: RelationName;
  /** Interface name, e.g. `kafka_client` */
  interfaceName: string;
  kind: RelationKind;
  /** Maximum number of remote peers */
  limit?: number;
  /** Whether the service can run without it */
  optional?: boolean;
}

/**
 * Observed state of a single relation
 */
export interface RelationState {
  relationName: RelationName;
  interfaceName: string;
  kind: RelationKind;
  status: RelationStatus;
  /** Remote peers (units for peer relations, applications otherwise) */
  peerUnitIds: Set<string>;
  /** Data received from each peer */
  exchangedFields: Map<string, RelationFields>;
  /** Data this unit published towards each peer */
  publishedFields: Map<string, RelationFields>;
  /** Why the relation is broken, when it is */
  reason?: string;
  /** Broken by a failed workload operation rather than by its data */
  retryable?: boolean;
  /** ISO 8601 timestamp of the last change */
  updatedAt: string;
}

/**
 * Plain-object form of a relation, used for persistence and output
 */
export interface RelationSnapshot {
  relationName: RelationName;
  status: RelationStatus;
  peers: Record<string, RelationFields>;
  published: Record<string, RelationFields>;
  reason?: string;
  retryable?: boolean;
  updatedAt: string;
}
