/**
 * Relation lifecycle
 *
 * Per-relation state machine driven by every pass:
 *
 *   absent → joining → active → broken → absent
 *
 * - absent → joining: relation data first observed (tracker)
 * - joining → active: required fields valid and the pass applied cleanly
 * - active → broken: peer removed, required field gone, or apply failed
 * - broken → absent: cleanup finished in the pass that saw the last peer go
 */

import { ValidationFailure } from '../errors.js';
import { RELATION_NAMES } from '../relations/metadata.js';
import type { RelationFields, RelationName } from '../relations/types.js';
import { csrCommonName, unitSubject } from '../secrets/tls.js';
import type { SecretWriter, TlsSubject } from '../secrets/types.js';
import type { OperatorLogger } from '../workload/logger.js';
import type { OperatorContext } from './context.js';
import {
  ADMIN_USER,
  CLIENT_PRINCIPAL_PREFIX,
  FIELDS,
  KAFKA_TOPIC,
  clientPrincipal,
  passwordField,
  passwordVersionField,
} from './literals.js';
import { kafkaBroken, statusOf, type StatusEntry } from './status.js';
import type { ClusterConfig, KafkaConnection, OperatorEvent, RelationEvaluation } from './types.js';

// =============================================================================
// Event ingestion
// =============================================================================

/**
 * Record relation data carried by an event
 *
 * @returns the relation the event touched, if any
 * @throws CardinalityViolation or ValidationFailure, leaving existing relations untouched
 */
export function ingestEvent(context: OperatorContext, event: OperatorEvent): RelationName | undefined {
  switch (event.type) {
    case 'relation-changed':
      return context.relations.update(event.relation, event.peer, event.data).relationName;
    case 'relation-departed':
      return context.relations.remove(event.relation, event.peer)?.relationName;
    default:
      return undefined;
  }
}

// =============================================================================
// Kafka relation data
// =============================================================================

const REQUIRED_KAFKA_FIELDS = [
  FIELDS.kafka.endpoints,
  FIELDS.kafka.username,
  FIELDS.kafka.password,
  FIELDS.kafka.topic,
];

const ENDPOINT = /^([A-Za-z0-9.-]+|\[[0-9A-Fa-f:.]+\]):(\d{1,5})$/;

/**
 * Outcome of reading kafka relation data
 */
export type KafkaCheck =
  | { ok: true; connection: KafkaConnection }
  | { ok: false; missing: string[]; reason: string; field?: string };

function checkEndpoints(raw: string): { endpoints: string[] } | { reason: string } {
  const entries = raw
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);

  if (entries.length === 0) {
    return { reason: 'kafka endpoints are empty' };
  }

  for (const entry of entries) {
    const match = ENDPOINT.exec(entry);
    const port = match ? Number(match[2]) : 0;
    if (!match || port < 1 || port > 65535) {
      return { reason: `invalid kafka endpoint "${entry}", expected host:port` };
    }
  }

  return { endpoints: [...new Set(entries)].sort() };
}

/**
 * Parse a comma separated `host:port` list into a sorted, de-duplicated list
 *
 * @throws ValidationFailure when an entry is not `host:port`
 */
export function parseEndpoints(raw: string): string[] {
  const result = checkEndpoints(raw);
  if ('reason' in result) {
    throw new ValidationFailure(result.reason, 'kafka', FIELDS.kafka.endpoints);
  }
  return result.endpoints;
}

/**
 * Required kafka fields absent from relation data
 */
export function missingKafkaFields(fields: RelationFields): string[] {
  return REQUIRED_KAFKA_FIELDS.filter((key) => !fields[key]);
}

/**
 * Validate kafka relation data and derive the connection settings
 */
export function checkKafkaConnection(fields: RelationFields): KafkaCheck {
  const missing = missingKafkaFields(fields);
  if (missing.length > 0) {
    return { ok: false, missing, reason: `kafka relation is missing ${missing.join(', ')}`, field: missing[0] };
  }

  const tls = fields[FIELDS.kafka.tls];
  if (tls !== undefined && tls !== 'enabled' && tls !== 'disabled') {
    return { ok: false, missing: [], reason: `invalid kafka tls flag "${tls}"`, field: FIELDS.kafka.tls };
  }

  const endpoints = checkEndpoints(fields[FIELDS.kafka.endpoints] ?? '');
  if ('reason' in endpoints) {
    return { ok: false, missing: [], reason: endpoints.reason, field: FIELDS.kafka.endpoints };
  }

  const cluster: ClusterConfig = {
    brokerEndpoints: endpoints.endpoints,
    desiredUnitCount: endpoints.endpoints.length,
    constraints: {
      tls: tls === 'enabled',
      topic: fields[FIELDS.kafka.topic] ?? KAFKA_TOPIC,
      consumerGroupPrefix: fields[FIELDS.kafka.consumerGroupPrefix],
    },
  };

  // Brokers on older providers send `enabled` in place of a CA
  const ca = fields[FIELDS.kafka.tlsCa];
  return {
    ok: true,
    connection: {
      cluster,
      username: fields[FIELDS.kafka.username] ?? '',
      password: fields[FIELDS.kafka.password] ?? '',
      brokerCa: ca && ca !== 'enabled' ? ca : undefined,
    },
  };
}

/**
 * Build the connection settings from complete kafka relation data
 *
 * @throws ValidationFailure for incomplete or malformed data
 */
export function parseKafkaConnection(fields: RelationFields): KafkaConnection {
  const check = checkKafkaConnection(fields);
  if (!check.ok) {
    throw new ValidationFailure(check.reason, 'kafka', check.field);
  }
  return check.connection;
}

/**
 * The kafka peer's data, when a peer is related
 */
export function kafkaFields(context: OperatorContext): RelationFields | undefined {
  const [peer] = context.relations.peers('kafka');
  return peer === undefined ? undefined : context.relations.fields('kafka', peer);
}

/**
 * Usable kafka connection: data complete, valid, and the relation not broken
 */
export function usableKafkaConnection(context: OperatorContext): KafkaConnection | undefined {
  const fields = kafkaFields(context);
  if (!fields || context.relations.status('kafka') === 'broken') {
    return undefined;
  }
  const check = checkKafkaConnection(fields);
  return check.ok ? check.connection : undefined;
}

// =============================================================================
// Client requirers
// =============================================================================

export type ClientRole = 'admin' | 'user';

export interface ClientRequest {
  peer: string;
  principal: string;
  subject: string;
  role: ClientRole;
}

function isClientRole(value: string): value is ClientRole {
  return value === 'admin' || value === 'user';
}

function requestedRole(fields: RelationFields): string {
  return fields[FIELDS.karapace.extraUserRoles] || 'user';
}

/**
 * Parse the request of one karapace requirer
 *
 * @returns undefined while the subject has not been published yet
 * @throws ValidationFailure for an unsupported role
 */
export function parseClientRequest(peer: string, fields: RelationFields): ClientRequest | undefined {
  const subject = fields[FIELDS.karapace.subject];
  if (!subject) {
    return undefined;
  }
  const role = requestedRole(fields);
  if (!isClientRole(role)) {
    throw new ValidationFailure(
      `unsupported extra-user-roles "${role}" requested by ${peer}`,
      'karapace',
      FIELDS.karapace.extraUserRoles
    );
  }
  return { peer, principal: clientPrincipal(peer), subject, role };
}

/**
 * Valid requests of all karapace requirers, sorted by peer
 *
 * Requirers with an unsupported role are left out; evaluateRelations reports them.
 */
export function clientRequests(context: OperatorContext): ClientRequest[] {
  const requests: ClientRequest[] = [];
  for (const peer of context.relations.peers('karapace')) {
    const fields = context.relations.fields('karapace', peer);
    const subject = fields[FIELDS.karapace.subject];
    const role = requestedRole(fields);
    if (subject && isClientRole(role)) {
      requests.push({ peer, principal: clientPrincipal(peer), subject, role });
    }
  }
  return requests;
}

// =============================================================================
// TLS
// =============================================================================

/**
 * Peer id of the certificates relation, if related
 */
export function certificatesPeer(context: OperatorContext): string | undefined {
  return context.relations.peers('certificates')[0];
}

/**
 * Whether TLS is enabled on this side (a certificates relation exists)
 */
export function tlsEnabled(context: OperatorContext): boolean {
  return context.relations.has('certificates');
}

/**
 * Whether the current key is still waiting for a signature while the
 * previously applied certificate keeps serving
 */
export function tlsRekeying(context: OperatorContext): boolean {
  const peer = certificatesPeer(context);
  const material = peer === undefined ? undefined : context.secrets.tlsMaterial(peer);
  return (
    material !== undefined &&
    material.signedCertificate === undefined &&
    context.applied.files.sslCertfile !== undefined
  );
}

/**
 * Whether TLS files can be served: signed, or re-keying on top of signed files
 */
export function tlsReady(context: OperatorContext): boolean {
  const peer = certificatesPeer(context);
  const material = peer === undefined ? undefined : context.secrets.tlsMaterial(peer);
  return material?.signedCertificate !== undefined || tlsRekeying(context);
}

/**
 * Addresses of the other units in the cluster, sorted
 */
export function peerAddresses(context: OperatorContext): string[] {
  const addresses = new Set<string>();
  for (const peer of context.relations.peers('cluster')) {
    if (peer === context.unit.name) continue;
    const address = context.relations.fields('cluster', peer)[FIELDS.cluster.unitAddress];
    if (address) {
      addresses.add(address);
    }
  }
  return [...addresses].sort();
}

/**
 * Certificate subject for this unit, with the other units' addresses as SANs
 */
export function certificateSubject(context: OperatorContext, fqdn?: string): TlsSubject {
  const subject = unitSubject(context.unit.name, context.unit.host, fqdn);
  const dnsNames = new Set(subject.dnsNames ?? []);
  const ipAddresses = new Set(subject.ipAddresses ?? []);
  for (const address of peerAddresses(context)) {
    if (/^[0-9.]+$/.test(address) || address.includes(':')) {
      ipAddresses.add(address);
    } else {
      dnsNames.add(address);
    }
  }
  return { commonName: subject.commonName, dnsNames: [...dnsNames], ipAddresses: [...ipAddresses] };
}

// =============================================================================
// Secret origination and replication
// =============================================================================

/**
 * Leader-side secret origination for the current relations
 *
 * - the internal admin credential once the peer relation exists
 * - one credential per karapace requirer that published a subject
 * - revocation of credentials whose requirer departed
 * - a TLS key and CSR when a certificates relation has none yet
 */
export function originateSecrets(
  context: OperatorContext,
  writer: SecretWriter,
  subject: TlsSubject
): void {
  if (context.relations.has('cluster')) {
    writer.ensure(ADMIN_USER);
  }

  const requests = clientRequests(context);
  for (const request of requests) {
    writer.ensure(request.principal);
  }

  const related = new Set(context.relations.peers('karapace').map(clientPrincipal));
  for (const principal of context.secrets.principals()) {
    if (principal.startsWith(CLIENT_PRINCIPAL_PREFIX) && !related.has(principal)) {
      writer.revoke(principal);
    }
  }

  const peer = certificatesPeer(context);
  if (peer === undefined) {
    return;
  }
  const material = context.secrets.tlsMaterial(peer);
  if (!material) {
    writer.issueTlsKey(peer, undefined, subject);
  } else if (csrCommonName(material.certificateSigningRequest) !== subject.commonName) {
    // The unit address changed: request a certificate for it with the same key
    writer.issueTlsKey(peer, material.privateKey, subject);
  }
}

/**
 * Fields the leader replicates to the other units over `cluster`
 */
export function replicationFields(context: OperatorContext): RelationFields {
  const fields: RelationFields = {};
  for (const principal of context.secrets.principals()) {
    const credential = context.secrets.get(principal);
    if (credential) {
      fields[passwordField(principal)] = credential.secretValue;
      fields[passwordVersionField(principal)] = String(credential.version);
    }
  }

  const peer = certificatesPeer(context);
  const material = peer === undefined ? undefined : context.secrets.tlsMaterial(peer);
  if (peer !== undefined && material) {
    fields[FIELDS.cluster.tlsRelation] = peer;
    fields[FIELDS.cluster.tlsPrivateKey] = material.privateKey;
    fields[FIELDS.cluster.tlsCsr] = material.certificateSigningRequest;
    fields[FIELDS.cluster.tlsVersion] = String(material.version);
  }
  return fields;
}

/**
 * Data published by the leader over `cluster`, if a leader published any
 */
function leaderFields(context: OperatorContext): RelationFields | undefined {
  for (const peer of context.relations.peers('cluster')) {
    if (peer === context.unit.name) continue;
    const fields = context.relations.fields('cluster', peer);
    if (fields[passwordField(ADMIN_USER)]) {
      return fields;
    }
  }
  return undefined;
}

/**
 * Apply secrets replicated by the leader (non-leader units only)
 *
 * @returns whether any local secret changed
 */
export function replicateFromLeader(context: OperatorContext): boolean {
  if (context.unit.isLeader) {
    return false;
  }
  const fields = leaderFields(context);
  if (!fields) {
    return false;
  }

  let changed = false;
  const replicated = new Set<string>();
  for (const [key, value] of Object.entries(fields)) {
    if (!key.endsWith('-password') || !value) continue;
    const principal = key.slice(0, -'-password'.length);
    const version = Number.parseInt(fields[passwordVersionField(principal)] ?? '1', 10);
    replicated.add(principal);
    changed = context.secrets.observe(principal, value, Number.isInteger(version) ? version : 1) || changed;
  }
  for (const principal of context.secrets.principals()) {
    if (!replicated.has(principal)) {
      changed = context.secrets.observeRemoval(principal) || changed;
    }
  }

  const relationId = fields[FIELDS.cluster.tlsRelation];
  const privateKey = fields[FIELDS.cluster.tlsPrivateKey];
  const csr = fields[FIELDS.cluster.tlsCsr];
  if (relationId && privateKey && csr && relationId === certificatesPeer(context)) {
    const version = Number.parseInt(fields[FIELDS.cluster.tlsVersion] ?? '1', 10);
    changed = context.secrets.observeTls(relationId, privateKey, csr, Number.isInteger(version) ? version : 1) || changed;
  }
  return changed;
}

/**
 * Attach a certificate the provider signed for the current CSR
 */
export function acceptSignedCertificates(context: OperatorContext): boolean {
  const peer = certificatesPeer(context);
  if (peer === undefined) {
    return false;
  }
  const fields = context.relations.fields('certificates', peer);
  const csr = fields[FIELDS.certificates.csr];
  const certificate = fields[FIELDS.certificates.certificate];
  if (!csr || !certificate) {
    return false;
  }
  const before = context.secrets.tlsMaterial(peer);
  const after = context.secrets.acceptCertificate(csr, certificate, fields[FIELDS.certificates.ca]);
  return after !== undefined && after.signedCertificate !== before?.signedCertificate;
}

// =============================================================================
// Relation evaluation
// =============================================================================

function evaluateKafka(context: OperatorContext): RelationEvaluation {
  const check = checkKafkaConnection(kafkaFields(context) ?? {});
  if (check.ok) {
    return { state: 'ready' };
  }
  return check.missing.length > 0
    ? { state: 'pending', missing: check.missing }
    : { state: 'invalid', reason: check.reason };
}

function evaluateCertificates(context: OperatorContext): RelationEvaluation {
  const peer = certificatesPeer(context);
  const material = peer === undefined ? undefined : context.secrets.tlsMaterial(peer);
  if (!material) {
    return { state: 'pending', missing: ['private key'] };
  }
  return tlsReady(context) ? { state: 'ready' } : { state: 'pending', missing: [FIELDS.certificates.certificate] };
}

function evaluateCluster(context: OperatorContext): RelationEvaluation {
  const missing = context.relations
    .peers('cluster')
    .filter((peer) => peer !== context.unit.name)
    .filter((peer) => !context.relations.fields('cluster', peer)[FIELDS.cluster.unitAddress])
    .map((peer) => `${FIELDS.cluster.unitAddress} (${peer})`);
  return missing.length > 0 ? { state: 'pending', missing } : { state: 'ready' };
}

function evaluateKarapace(context: OperatorContext): RelationEvaluation {
  const missing: string[] = [];
  for (const peer of context.relations.peers('karapace')) {
    const fields = context.relations.fields('karapace', peer);
    const role = requestedRole(fields);
    if (fields[FIELDS.karapace.subject] && !isClientRole(role)) {
      return { state: 'invalid', reason: `unsupported extra-user-roles "${role}" requested by ${peer}` };
    }
    const request = parseClientRequest(peer, fields);
    if (!request) {
      // A requirer that was served and then dropped its subject
      if (context.relations.published('karapace', peer)) {
        return { state: 'invalid', reason: `required field subject missing for ${peer}` };
      }
      missing.push(`${FIELDS.karapace.subject} (${peer})`);
    } else if (!context.secrets.get(request.principal)) {
      missing.push(`credential (${peer})`);
    }
  }
  return missing.length > 0 ? { state: 'pending', missing } : { state: 'ready' };
}

/**
 * Check the required fields of every tracked relation with peers
 */
export function evaluateRelations(context: OperatorContext): Map<RelationName, RelationEvaluation> {
  const evaluations = new Map<RelationName, RelationEvaluation>();
  for (const name of RELATION_NAMES) {
    if (!context.relations.has(name)) continue;
    switch (name) {
      case 'kafka':
        evaluations.set(name, evaluateKafka(context));
        break;
      case 'certificates':
        evaluations.set(name, evaluateCertificates(context));
        break;
      case 'cluster':
        evaluations.set(name, evaluateCluster(context));
        break;
      case 'karapace':
        evaluations.set(name, evaluateKarapace(context));
        break;
      case 'restart':
      case 'cos-agent':
        evaluations.set(name, { state: 'ready' });
        break;
    }
  }
  return evaluations;
}

/** Relations that break when an active one loses a required field */
const STRICT_RELATIONS: ReadonlySet<RelationName> = new Set(['kafka', 'certificates']);

/**
 * Move relations to broken for invalid data or lost required fields
 *
 * @returns relations broken by this call
 */
export function markBrokenRelations(
  context: OperatorContext,
  evaluations: Map<RelationName, RelationEvaluation>,
  log: OperatorLogger
): RelationName[] {
  const broken: RelationName[] = [];
  for (const [name, evaluation] of evaluations) {
    const status = context.relations.status(name);
    if (status === 'broken') continue;

    if (evaluation.state === 'invalid') {
      context.relations.setStatus(name, 'broken', evaluation.reason);
      log.warn('Relation data failed validation', { relation: name, reason: evaluation.reason });
      broken.push(name);
    } else if (evaluation.state === 'pending' && status === 'active' && STRICT_RELATIONS.has(name)) {
      const reason = `required field missing: ${evaluation.missing.join(', ')}`;
      context.relations.setStatus(name, 'broken', reason);
      log.warn('Relation lost required data', { relation: name, reason });
      broken.push(name);
    }
  }
  return broken;
}

/**
 * Finish teardown of relations whose last peer left, and drop TLS material
 * that no longer belongs to the certificates relation
 *
 * @returns relations forgotten by this call
 */
export function cleanupRelations(context: OperatorContext, log: OperatorLogger): RelationName[] {
  const forgotten: RelationName[] = [];
  for (const state of context.relations.list()) {
    if (state.status !== 'broken' || state.peerUnitIds.size > 0) continue;
    context.relations.forget(state.relationName);
    forgotten.push(state.relationName);
    log.info('Relation removed', { relation: state.relationName });
  }

  const current = certificatesPeer(context);
  for (const relationId of context.secrets.tlsRelations()) {
    if (relationId !== current) {
      context.secrets.revokeTls(relationId);
      log.info('Removed TLS material', { relation: relationId });
    }
  }
  return forgotten;
}

/**
 * Promote ready joining relations once the pass applied cleanly
 */
export function promoteRelations(
  context: OperatorContext,
  evaluations: Map<RelationName, RelationEvaluation>
): RelationName[] {
  const promoted: RelationName[] = [];
  for (const [name, evaluation] of evaluations) {
    if (evaluation.state === 'ready' && context.relations.status(name) === 'joining') {
      context.relations.setStatus(name, 'active');
      promoted.push(name);
    }
  }
  return promoted;
}

// =============================================================================
// Readiness
// =============================================================================

/**
 * Evaluate unit readiness; the service runs only when this is active
 */
export function evaluateReadiness(context: OperatorContext): StatusEntry {
  if (!context.relations.has('cluster')) {
    return statusOf('NO_PEER_RELATION');
  }
  const fields = kafkaFields(context);
  if (!fields || !context.relations.has('kafka')) {
    return statusOf('KAFKA_NOT_RELATED');
  }
  if (missingKafkaFields(fields).length > 0) {
    return statusOf('KAFKA_NO_DATA');
  }
  if (context.relations.status('kafka') === 'broken') {
    return kafkaBroken(context.relations.get('kafka')?.reason ?? 'unknown reason');
  }
  const kafkaTls = fields[FIELDS.kafka.tls] === 'enabled';
  if (kafkaTls !== tlsEnabled(context)) {
    return statusOf('KAFKA_TLS_MISMATCH');
  }
  if (tlsEnabled(context) && !tlsReady(context)) {
    return statusOf('NO_CERT');
  }
  if (!context.secrets.get(ADMIN_USER)) {
    return statusOf('NO_CREDS');
  }
  return statusOf('ACTIVE');
}
