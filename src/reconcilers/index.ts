/**
 * Reconciliation loop exports
 */

export type {
  ActionResult,
  AppliedState,
  ClusterConfig,
  ClusterConstraints,
  DesiredFiles,
  DesiredPublications,
  DesiredState,
  KafkaConnection,
  OperatorAction,
  OperatorActionName,
  OperatorEvent,
  OperatorEventType,
  PassFailure,
  PlanAction,
  PlanActionKind,
  PlanSummary,
  ReconciliationResult,
  RelationEvaluation,
  RelationSummary,
  ServiceFile,
} from './types.js';
export { SERVICE_FILES } from './types.js';

export * from './literals.js';
export { STATUS, kafkaBroken, statusOf, type StatusEntry, type StatusKey, type StatusLevel, type UnitStatus } from './status.js';
export {
  CONTEXT_VERSION,
  createOperatorContext,
  emptyAppliedState,
  snapshotContext,
  type ContextOptions,
  type ContextSnapshot,
  type OperatorContext,
} from './context.js';
export {
  DEFAULT_RESTART_LOCK_TIMEOUT_MS,
  RestartLock,
  restartLockFields,
  type RestartDecision,
  type RestartLockState,
} from './restart.js';
export {
  acceptSignedCertificates,
  certificateSubject,
  checkKafkaConnection,
  cleanupRelations,
  clientRequests,
  evaluateReadiness,
  evaluateRelations,
  ingestEvent,
  markBrokenRelations,
  originateSecrets,
  parseClientRequest,
  parseEndpoints,
  parseKafkaConnection,
  promoteRelations,
  replicateFromLeader,
  replicationFields,
  tlsEnabled,
  tlsReady,
  usableKafkaConnection,
  type ClientRequest,
  type ClientRole,
  type KafkaCheck,
} from './lifecycle.js';
export {
  aclsFor,
  buildAuthfile,
  buildServiceConfig,
  computeDesiredState,
  registryEndpoints,
  type Authfile,
  type AuthfilePermission,
  type AuthfileUser,
  type DesiredStateOptions,
  type ServiceLogLevel,
} from './desired.js';
export { diffState, digest, summarize } from './diff.js';
export { applyPlan, type ApplyFailure, type ApplyOptions, type ApplyOutcome } from './apply.js';
export { getPassword, runAction, setPassword, setTlsPrivateKey } from './actions.js';
export { Reconciler, toPassFailure, type ReconcilerOptions } from './loop.js';
