/**
 * Operator context persistence
 *
 * The context is stored as YAML between passes. Loading decodes every field
 * explicitly; a file that does not decode is reported as a StateFileError
 * rather than silently replaced.
 */

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import * as yaml from 'yaml';
import { StateFileError } from '../errors.js';
import { isRelationName } from '../relations/metadata.js';
import type { RelationFields, RelationSnapshot, RelationStatus } from '../relations/types.js';
import { CONTEXT_VERSION, type ContextSnapshot } from '../reconcilers/context.js';
import type { RestartLockState } from '../reconcilers/restart.js';
import type { StatusLevel, UnitStatus } from '../reconcilers/status.js';
import { SERVICE_FILES, type AppliedState, type ClusterConfig } from '../reconcilers/types.js';
import type {
  AuditAction,
  AuditRecord,
  Credential,
  IntentRecord,
  SecretSnapshot,
  TLSMaterial,
} from '../secrets/types.js';

const HEADER = `# Managed by karapace-lifecycle
# DO NOT EDIT MANUALLY

`;

// =============================================================================
// Decoding helpers
// =============================================================================

type Fields = Record<string, unknown>;

class DecodeError extends Error {}

function isRecord(value: unknown): value is Fields {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function record(value: unknown, path: string): Fields {
  if (!isRecord(value)) {
    throw new DecodeError(`${path} must be a mapping`);
  }
  return value;
}

function list(value: unknown, path: string): unknown[] {
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new DecodeError(`${path} must be a list`);
  }
  return value;
}

function str(value: unknown, path: string): string {
  if (typeof value !== 'string') {
    throw new DecodeError(`${path} must be a string`);
  }
  return value;
}

function optStr(value: unknown, path: string): string | undefined {
  return value === undefined || value === null ? undefined : str(value, path);
}

function num(value: unknown, path: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new DecodeError(`${path} must be a number`);
  }
  return value;
}

function bool(value: unknown, path: string): boolean {
  if (typeof value !== 'boolean') {
    throw new DecodeError(`${path} must be a boolean`);
  }
  return value;
}

function oneOf<T extends string>(value: unknown, allowed: readonly T[], path: string): T {
  const found = allowed.find((candidate) => candidate === value);
  if (found === undefined) {
    throw new DecodeError(`${path} must be one of ${allowed.join(', ')}`);
  }
  return found;
}

function stringMap(value: unknown, path: string): RelationFields {
  const result: RelationFields = {};
  for (const [key, entry] of Object.entries(record(value ?? {}, path))) {
    result[key] = str(entry, `${path}.${key}`);
  }
  return result;
}

function nestedStringMap(value: unknown, path: string): Record<string, RelationFields> {
  const result: Record<string, RelationFields> = {};
  for (const [key, entry] of Object.entries(record(value ?? {}, path))) {
    result[key] = stringMap(entry, `${path}.${key}`);
  }
  return result;
}

// =============================================================================
// Decoders
// =============================================================================

const RELATION_STATUSES: readonly RelationStatus[] = ['absent', 'joining', 'active', 'broken'];
const STATUS_LEVELS: readonly StatusLevel[] = ['active', 'blocked', 'waiting', 'maintenance'];
const AUDIT_ACTIONS: readonly AuditAction[] = [
  'create',
  'rotate',
  'revoke',
  'issue-tls-key',
  'accept-certificate',
  'rollback',
];

function decodeRelation(value: unknown, path: string): RelationSnapshot {
  const fields = record(value, path);
  const name = str(fields.relationName, `${path}.relationName`);
  if (!isRelationName(name)) {
    throw new DecodeError(`${path}.relationName "${name}" is not a declared relation`);
  }
  return {
    relationName: name,
    status: oneOf(fields.status, RELATION_STATUSES, `${path}.status`),
    peers: nestedStringMap(fields.peers, `${path}.peers`),
    published: nestedStringMap(fields.published, `${path}.published`),
    reason: optStr(fields.reason, `${path}.reason`),
    retryable: fields.retryable === undefined ? undefined : bool(fields.retryable, `${path}.retryable`),
    updatedAt: str(fields.updatedAt, `${path}.updatedAt`),
  };
}

function decodeCredential(value: unknown, path: string): Credential {
  const fields = record(value, path);
  return {
    principal: str(fields.principal, `${path}.principal`),
    secretValue: str(fields.secretValue, `${path}.secretValue`),
    salt: str(fields.salt, `${path}.salt`),
    version: num(fields.version, `${path}.version`),
    createdAt: str(fields.createdAt, `${path}.createdAt`),
    rotatedBy: str(fields.rotatedBy, `${path}.rotatedBy`),
  };
}

function decodeMaterial(value: unknown, path: string): TLSMaterial {
  const fields = record(value, path);
  return {
    issuerRelationId: str(fields.issuerRelationId, `${path}.issuerRelationId`),
    privateKey: str(fields.privateKey, `${path}.privateKey`),
    certificateSigningRequest: str(fields.certificateSigningRequest, `${path}.certificateSigningRequest`),
    signedCertificate: optStr(fields.signedCertificate, `${path}.signedCertificate`),
    caCertificate: optStr(fields.caCertificate, `${path}.caCertificate`),
    version: num(fields.version, `${path}.version`),
  };
}

function decodeIntent(value: unknown, path: string): IntentRecord {
  const fields = record(value, path);
  const base = {
    id: str(fields.id, `${path}.id`),
    principal: str(fields.principal, `${path}.principal`),
    createdAt: str(fields.createdAt, `${path}.createdAt`),
  };
  const kind = oneOf(fields.kind, ['credential', 'tls'], `${path}.kind`);
  const optional = <T>(entry: unknown, decode: (v: unknown, p: string) => T, p: string): T | undefined =>
    entry === undefined || entry === null ? undefined : decode(entry, p);

  if (kind === 'credential') {
    return {
      ...base,
      kind,
      previous: optional(fields.previous, decodeCredential, `${path}.previous`),
      next: optional(fields.next, decodeCredential, `${path}.next`),
    };
  }
  return {
    ...base,
    kind,
    previous: optional(fields.previous, decodeMaterial, `${path}.previous`),
    next: optional(fields.next, decodeMaterial, `${path}.next`),
  };
}

function decodeAudit(value: unknown, path: string): AuditRecord {
  const fields = record(value, path);
  return {
    action: oneOf(fields.action, AUDIT_ACTIONS, `${path}.action`),
    principal: str(fields.principal, `${path}.principal`),
    version: num(fields.version, `${path}.version`),
    actor: str(fields.actor, `${path}.actor`),
    timestamp: str(fields.timestamp, `${path}.timestamp`),
  };
}

function decodeSecrets(value: unknown): SecretSnapshot {
  const fields = record(value ?? {}, 'secrets');
  return {
    credentials: list(fields.credentials, 'secrets.credentials').map((v, i) =>
      decodeCredential(v, `secrets.credentials[${i}]`)
    ),
    tls: list(fields.tls, 'secrets.tls').map((v, i) => decodeMaterial(v, `secrets.tls[${i}]`)),
    intents: list(fields.intents, 'secrets.intents').map((v, i) => decodeIntent(v, `secrets.intents[${i}]`)),
    audit: list(fields.audit, 'secrets.audit').map((v, i) => decodeAudit(v, `secrets.audit[${i}]`)),
  };
}

function decodeApplied(value: unknown): AppliedState {
  const fields = record(value ?? {}, 'applied');
  const files = record(fields.files ?? {}, 'applied.files');
  const applied: AppliedState = {
    files: {},
    running: bool(fields.running ?? false, 'applied.running'),
    restartPending: bool(fields.restartPending ?? false, 'applied.restartPending'),
  };
  for (const file of SERVICE_FILES) {
    const entry = optStr(files[file], `applied.files.${file}`);
    if (entry !== undefined) {
      applied.files[file] = entry;
    }
  }
  return applied;
}

function decodeClusterConfig(value: unknown): ClusterConfig | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  const fields = record(value, 'clusterConfig');
  const constraints = record(fields.constraints, 'clusterConfig.constraints');
  return {
    brokerEndpoints: list(fields.brokerEndpoints, 'clusterConfig.brokerEndpoints').map((v, i) =>
      str(v, `clusterConfig.brokerEndpoints[${i}]`)
    ),
    desiredUnitCount: num(fields.desiredUnitCount, 'clusterConfig.desiredUnitCount'),
    constraints: {
      tls: bool(constraints.tls, 'clusterConfig.constraints.tls'),
      topic: str(constraints.topic, 'clusterConfig.constraints.topic'),
      consumerGroupPrefix: optStr(constraints.consumerGroupPrefix, 'clusterConfig.constraints.consumerGroupPrefix'),
    },
  };
}

function decodeRestartLock(value: unknown): RestartLockState {
  const fields = record(value ?? {}, 'restartLock');
  return {
    holder: optStr(fields.holder, 'restartLock.holder'),
    acquiredAt: optStr(fields.acquiredAt, 'restartLock.acquiredAt'),
  };
}

function decodeStatus(value: unknown): UnitStatus {
  const fields = record(value, 'status');
  return {
    level: oneOf(fields.level, STATUS_LEVELS, 'status.level'),
    message: str(fields.message ?? '', 'status.message'),
  };
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Serialize a context snapshot to YAML
 */
export function serializeContext(snapshot: ContextSnapshot): string {
  return HEADER + yaml.stringify(snapshot, { indent: 2 });
}

/**
 * Parse a context snapshot from YAML
 *
 * @throws StateFileError when the document does not decode
 */
export function parseContext(content: string, path = '<memory>'): ContextSnapshot {
  try {
    const root = record(yaml.parse(content), 'document');
    const version = num(root.version, 'version');
    if (version !== CONTEXT_VERSION) {
      throw new DecodeError(`unsupported state version ${version}, expected ${CONTEXT_VERSION}`);
    }
    return {
      version,
      unit: str(root.unit, 'unit'),
      relations: list(root.relations, 'relations').map((v, i) => decodeRelation(v, `relations[${i}]`)),
      secrets: decodeSecrets(root.secrets),
      applied: decodeApplied(root.applied),
      clusterConfig: decodeClusterConfig(root.clusterConfig),
      restartLock: decodeRestartLock(root.restartLock),
      status: decodeStatus(root.status),
    };
  } catch (error) {
    if (error instanceof DecodeError || error instanceof yaml.YAMLError) {
      throw new StateFileError(path, error.message);
    }
    throw error;
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Load the context snapshot stored at a path
 *
 * @returns undefined when no state file exists yet
 * @throws StateFileError for unreadable or foreign state
 */
export async function loadContext(path: string, unitName?: string): Promise<ContextSnapshot | undefined> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) {
      return undefined;
    }
    throw new StateFileError(path, error instanceof Error ? error.message : String(error));
  }

  const snapshot = parseContext(content, path);
  if (unitName !== undefined && snapshot.unit !== unitName) {
    throw new StateFileError(path, `state belongs to unit ${snapshot.unit}, not ${unitName}`);
  }
  return snapshot;
}

/**
 * Persist a context snapshot, replacing the file atomically
 */
export async function saveContext(path: string, snapshot: ContextSnapshot): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const temporary = `${path}.tmp`;
  await writeFile(temporary, serializeContext(snapshot), { encoding: 'utf-8', mode: 0o600 });
  await rename(temporary, path);
}
