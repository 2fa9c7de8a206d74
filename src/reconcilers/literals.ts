/**
 * Constants shared by the reconciliation loop
 */

/** Schema registry REST port */
export const PORT = 8081;

/** Port of the statsd listener the registry reports to */
export const STATSD_PORT = 8125;

/** Port the statsd exporter serves Prometheus metrics on */
export const METRICS_PORT = 9102;

/** Topic the registry stores schemas in */
export const KAFKA_TOPIC = '_schemas';

/** Consumer group of the registry */
export const KAFKA_CONSUMER_GROUP = 'schema-registry';

/** Internal admin user */
export const ADMIN_USER = 'operator';

/** Users whose passwords may be set through the set-password action */
export const INTERNAL_USERS: readonly string[] = [ADMIN_USER];

/** Principal prefix of client application credentials */
export const CLIENT_PRINCIPAL_PREFIX = 'relation-';

/** Compatibility level configured on the registry */
export const COMPATIBILITY = 'FULL';

/** Cap on the schemas topic replication factor */
export const MAX_REPLICATION_FACTOR = 3;

/**
 * Field names exchanged over relations
 */
export const FIELDS = {
  kafka: {
    endpoints: 'endpoints',
    username: 'username',
    password: 'password',
    topic: 'topic',
    tls: 'tls',
    tlsCa: 'tls-ca',
    extraUserRoles: 'extra-user-roles',
    consumerGroupPrefix: 'consumer-group-prefix',
  },
  certificates: {
    csr: 'certificate_signing_request',
    certificate: 'signed_certificate',
    ca: 'ca_certificate',
  },
  karapace: {
    subject: 'subject',
    extraUserRoles: 'extra-user-roles',
    endpoints: 'endpoints',
    username: 'username',
    password: 'password',
    tls: 'tls',
  },
  cluster: {
    unitAddress: 'unit_address',
    credentialVersion: 'internal_credential_version',
    tlsRelation: 'tls-relation',
    tlsPrivateKey: 'tls-private-key',
    tlsCsr: 'tls-csr',
    tlsVersion: 'tls-version',
  },
  restart: {
    lock: 'restart-lock',
    since: 'restart-lock-since',
  },
  cosAgent: {
    metricsEndpoint: 'metrics_endpoint',
    scrapeJobs: 'scrape_jobs',
  },
} as const;

/**
 * Cluster field carrying a replicated password
 */
export function passwordField(principal: string): string {
  return `${principal}-password`;
}

/**
 * Cluster field carrying the version of a replicated password
 */
export function passwordVersionField(principal: string): string {
  return `${principal}-password-version`;
}

/**
 * Principal of a client application related over `karapace`
 */
export function clientPrincipal(peerId: string): string {
  return `${CLIENT_PRINCIPAL_PREFIX}${peerId}`;
}

/**
 * Numeric suffix of a unit name (`karapace/2` → 2)
 */
export function unitNumber(unitName: string): number {
  const suffix = unitName.split('/')[1];
  const parsed = suffix === undefined ? NaN : Number.parseInt(suffix, 10);
  return Number.isInteger(parsed) && parsed >= 0 ? parsed : 0;
}
