/**
 * Desired state computation
 *
 * Derives every service file and every piece of published relation data from
 * the context alone. The same context always yields byte-identical output,
 * which keeps re-runs free of workload calls.
 */

import type { RelationFields, RelationName } from '../relations/types.js';
import { hashPassword } from '../secrets/passwords.js';
import type { ServicePaths } from '../workload/types.js';
import type { OperatorContext } from './context.js';
import {
  ADMIN_USER,
  COMPATIBILITY,
  FIELDS,
  KAFKA_CONSUMER_GROUP,
  KAFKA_TOPIC,
  MAX_REPLICATION_FACTOR,
  METRICS_PORT,
  PORT,
  STATSD_PORT,
  unitNumber,
} from './literals.js';
import {
  certificatesPeer,
  clientRequests,
  peerAddresses,
  replicationFields,
  tlsEnabled,
  usableKafkaConnection,
  type ClientRole,
} from './lifecycle.js';
import { restartLockFields } from './restart.js';
import type { StatusEntry } from './status.js';
import type { DesiredFiles, DesiredPublications, DesiredState, KafkaConnection, ServiceFile } from './types.js';

export type ServiceLogLevel = 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR';

export interface DesiredStateOptions {
  paths: ServicePaths;
  serviceLogLevel?: ServiceLogLevel;
}

// =============================================================================
// Service configuration
// =============================================================================

/**
 * Registry configuration document
 */
export function buildServiceConfig(
  context: OperatorContext,
  connection: KafkaConnection,
  options: DesiredStateOptions
): Record<string, unknown> {
  const tls = tlsEnabled(context);
  const bootstrap = connection.cluster.brokerEndpoints.join(',');
  const { host } = context.unit;

  return {
    // Active services
    karapace_rest: false,
    karapace_registry: true,
    // Replication
    advertised_hostname: host,
    advertised_protocol: 'http',
    advertised_port: null,
    client_id: `sr-${unitNumber(context.unit.name)}`,
    master_eligibility: true,
    // REST server
    host,
    port: PORT,
    server_tls_certfile: null,
    server_tls_keyfile: null,
    access_logs_debug: false,
    rest_authorization: false,
    compatibility: COMPATIBILITY,
    log_level: options.serviceLogLevel ?? 'INFO',
    protobuf_runtime_directory: 'runtime',
    session_timeout_ms: 10000,
    // Kafka connection
    topic_name: KAFKA_TOPIC,
    group_id: KAFKA_CONSUMER_GROUP,
    replication_factor: Math.min(MAX_REPLICATION_FACTOR, connection.cluster.desiredUnitCount),
    security_protocol: tls ? 'SASL_SSL' : 'SASL_PLAINTEXT',
    ssl_cafile: tls ? options.paths.sslCafile : null,
    ssl_certfile: tls ? options.paths.sslCertfile : null,
    ssl_keyfile: tls ? options.paths.sslKeyfile : null,
    bootstrap_uri: bootstrap,
    sasl_bootstrap_uri: bootstrap,
    sasl_mechanism: 'SCRAM-SHA-512',
    sasl_plain_username: connection.username,
    sasl_plain_password: connection.password,
    // Auth
    registry_authfile: options.paths.authfile,
    registry_ca: null,
    // Metrics
    statsd_host: host,
    statsd_port: STATSD_PORT,
  };
}

// =============================================================================
// Authfile
// =============================================================================

export interface AuthfileUser {
  username: string;
  algorithm: 'sha512';
  salt: string;
  password_hash: string;
}

export interface AuthfilePermission {
  username: string;
  operation: 'Read' | 'Write';
  resource: string;
}

export interface Authfile {
  users: AuthfileUser[];
  permissions: AuthfilePermission[];
}

/**
 * ACLs granted to a role
 */
export function aclsFor(username: string, role: ClientRole, subject: string): AuthfilePermission[] {
  if (role === 'admin') {
    return [{ username, operation: 'Write', resource: '.*' }];
  }
  return [
    { username, operation: 'Read', resource: 'Config:' },
    { username, operation: 'Read', resource: `Subject:${subject}.*` },
  ];
}

/**
 * Users and permissions for every held credential with a known role
 *
 * @returns undefined when no credential exists yet
 */
export function buildAuthfile(context: OperatorContext): Authfile | undefined {
  const grants = new Map<string, { role: ClientRole; subject: string }>();
  if (context.secrets.get(ADMIN_USER)) {
    grants.set(ADMIN_USER, { role: 'admin', subject: '.*' });
  }
  for (const request of clientRequests(context)) {
    if (context.secrets.get(request.principal)) {
      grants.set(request.principal, { role: request.role, subject: request.subject });
    }
  }
  if (grants.size === 0) {
    return undefined;
  }

  const authfile: Authfile = { users: [], permissions: [] };
  for (const username of [...grants.keys()].sort()) {
    const credential = context.secrets.get(username);
    const grant = grants.get(username);
    if (!credential || !grant) continue;
    authfile.users.push({
      username,
      algorithm: 'sha512',
      salt: credential.salt,
      password_hash: hashPassword(credential.secretValue, credential.salt),
    });
    authfile.permissions.push(...aclsFor(username, grant.role, grant.subject));
  }
  return authfile;
}

// =============================================================================
// TLS files
// =============================================================================

function desiredTlsFiles(context: OperatorContext, connection: KafkaConnection | undefined): DesiredFiles {
  const none: DesiredFiles = { sslKeyfile: null, sslCertfile: null, sslCafile: null };
  const peer = certificatesPeer(context);
  if (peer === undefined || !tlsEnabled(context)) {
    return none;
  }
  const material = context.secrets.tlsMaterial(peer);
  if (!material) {
    return none;
  }
  if (!material.signedCertificate) {
    // Re-keying: keep serving the files already in place until the new certificate arrives
    return context.applied.files.sslCertfile !== undefined ? {} : none;
  }
  const ca = connection?.brokerCa ?? material.caCertificate;
  return {
    sslKeyfile: material.privateKey,
    sslCertfile: material.signedCertificate,
    sslCafile: ca ?? null,
  };
}

// =============================================================================
// Relation data
// =============================================================================

/**
 * Endpoints of every registry unit, sorted
 */
export function registryEndpoints(context: OperatorContext): string {
  const hosts = new Set([context.unit.host, ...peerAddresses(context)]);
  return [...hosts]
    .sort()
    .map((host) => `${host}:${PORT}`)
    .join(',');
}

function clusterFields(context: OperatorContext): RelationFields {
  const fields: RelationFields = { [FIELDS.cluster.unitAddress]: context.unit.host };
  const credential = context.secrets.get(ADMIN_USER);
  if (credential) {
    fields[FIELDS.cluster.credentialVersion] = String(credential.version);
  }
  return context.unit.isLeader ? { ...fields, ...replicationFields(context) } : fields;
}

function desiredPublications(context: OperatorContext, running: boolean): DesiredPublications {
  const published: DesiredPublications = {};
  const add = (relation: RelationName, peer: string, fields: RelationFields): void => {
    published[relation] = { ...(published[relation] ?? {}), [peer]: fields };
  };

  if (context.relations.has('cluster')) {
    add('cluster', context.unit.name, clusterFields(context));
  }

  if (context.unit.isLeader) {
    for (const peer of context.relations.peers('kafka')) {
      add('kafka', peer, {
        [FIELDS.kafka.topic]: KAFKA_TOPIC,
        [FIELDS.kafka.extraUserRoles]: 'admin',
        [FIELDS.kafka.consumerGroupPrefix]: KAFKA_CONSUMER_GROUP,
      });
    }
  }

  const lockFields = restartLockFields(context.restartLock, context.unit.name);
  if (context.relations.has('restart') && Object.keys(lockFields).length > 0) {
    add('restart', context.unit.name, lockFields);
  }

  const peer = certificatesPeer(context);
  const material = peer === undefined ? undefined : context.secrets.tlsMaterial(peer);
  if (peer !== undefined && material) {
    add('certificates', peer, { [FIELDS.certificates.csr]: material.certificateSigningRequest });
  }

  // Clients are only handed credentials for a running registry
  if (context.unit.isLeader && running) {
    const endpoints = registryEndpoints(context);
    const tls = tlsEnabled(context) ? 'enabled' : 'disabled';
    for (const request of clientRequests(context)) {
      const credential = context.secrets.get(request.principal);
      if (!credential) continue;
      add('karapace', request.peer, {
        [FIELDS.karapace.endpoints]: endpoints,
        [FIELDS.karapace.username]: request.principal,
        [FIELDS.karapace.password]: credential.secretValue,
        [FIELDS.karapace.tls]: tls,
        [FIELDS.karapace.subject]: request.subject,
      });
    }
  }

  const metricsTarget = `${context.unit.host}:${METRICS_PORT}`;
  for (const agent of context.relations.peers('cos-agent')) {
    add('cos-agent', agent, {
      [FIELDS.cosAgent.metricsEndpoint]: `http://${metricsTarget}/metrics`,
      [FIELDS.cosAgent.scrapeJobs]: JSON.stringify([
        { metrics_path: '/metrics', static_configs: [{ targets: [metricsTarget] }] },
      ]),
    });
  }

  return published;
}

// =============================================================================
// Desired state
// =============================================================================

const FILE_SOURCES: Record<ServiceFile, RelationName[]> = {
  sslKeyfile: ['certificates'],
  sslCertfile: ['certificates'],
  sslCafile: ['certificates'],
  config: ['kafka'],
  authfile: ['karapace'],
};

/**
 * Compute the desired service files, run state and relation data
 */
export function computeDesiredState(
  context: OperatorContext,
  readiness: StatusEntry,
  options: DesiredStateOptions
): DesiredState {
  const connection = usableKafkaConnection(context);
  const running = readiness.status.level === 'active';
  const authfile = buildAuthfile(context);

  const files: DesiredFiles = {
    ...desiredTlsFiles(context, connection),
    config: connection ? JSON.stringify(buildServiceConfig(context, connection, options), null, 2) : null,
    authfile: authfile ? JSON.stringify(authfile, null, 2) : null,
  };

  return {
    files,
    fileSources: FILE_SOURCES,
    running,
    published: desiredPublications(context, running),
  };
}
