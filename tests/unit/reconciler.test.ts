/**
 * Unit Tests: Reconciliation Loop
 *
 * Drives full passes against the in-memory workload:
 * - bootstrap and convergence regardless of event order
 * - idempotent re-runs
 * - bounded retries and broken relations on backend failure
 * - password and TLS key actions
 * - replication to non-leader units
 * - rolling restart lock
 */

import { describe, it, expect } from 'vitest';
import { LeaderToken } from '../../src/secrets/leadership.js';
import type { Authfile } from '../../src/reconcilers/desired.js';
import type { OperatorEvent } from '../../src/reconcilers/types.js';
import {
  CLUSTER_SELF,
  KAFKA_READY,
  MemoryWorkload,
  changed,
  createHarness,
  departed,
  kafkaData,
  type Harness,
} from '../fixtures/index.js';

const CERT = '-----BEGIN CERTIFICATE-----\nTESTCERT\n-----END CERTIFICATE-----';
const CA = '-----BEGIN CERTIFICATE-----\nTESTCA\n-----END CERTIFICATE-----';

function readAuthfile(workload: MemoryWorkload): Authfile {
  const content = workload.files.get(workload.paths.authfile);
  if (content === undefined) {
    throw new Error('authfile not written');
  }
  return JSON.parse(content);
}

function readConfig(workload: MemoryWorkload): Record<string, unknown> {
  const content = workload.files.get(workload.paths.config);
  if (content === undefined) {
    throw new Error('config not written');
  }
  return JSON.parse(content);
}

async function bootstrap(): Promise<Harness> {
  const harness = createHarness();
  await harness.run(CLUSTER_SELF, KAFKA_READY);
  harness.workload.reset();
  return harness;
}

// =============================================================================
// Bootstrap
// =============================================================================

describe('Reconciler bootstrap', () => {
  it('should create the admin credential once the peer relation exists', async () => {
    const { handle, context, workload } = createHarness();

    const result = await handle(CLUSTER_SELF);

    expect(result.success).toBe(true);
    expect(result.status).toEqual({ level: 'blocked', message: 'missing required kafka relation' });
    expect(result.applied).toEqual([
      { kind: 'write-file', target: 'authfile' },
      { kind: 'publish', target: 'cluster:karapace/0' },
    ]);
    expect(workload.calls).toEqual(['write:/srv/karapace/authfile.json']);
    expect(context.secrets.get('operator')?.version).toBe(1);
    expect(context.relations.status('cluster')).toBe('active');
    expect(context.secrets.pendingIntents()).toEqual([]);
  });

  it('should publish unit address and replicated credentials over the peer relation', async () => {
    const { handle, context } = createHarness();

    const result = await handle(CLUSTER_SELF);
    const password = context.secrets.get('operator')?.secretValue;

    expect(result.published.cluster?.['karapace/0']).toEqual({
      unit_address: '10.0.0.10',
      internal_credential_version: '1',
      'operator-password': password,
      'operator-password-version': '1',
    });
  });

  it('should start the service once kafka data is complete', async () => {
    const { handle, workload, context } = createHarness();
    await handle(CLUSTER_SELF);
    workload.reset();

    const result = await handle(KAFKA_READY);

    expect(result.status).toEqual({ level: 'active', message: '' });
    expect(workload.calls).toEqual(['write:/srv/karapace/karapace.config.json', 'start']);
    expect(result.published.kafka).toEqual({
      kafka: { topic: '_schemas', 'extra-user-roles': 'admin', 'consumer-group-prefix': 'schema-registry' },
    });
    expect(context.relations.status('kafka')).toBe('active');
    expect(context.clusterConfig?.brokerEndpoints).toEqual(['broker-0:9092', 'broker-1:9092']);
  });

  it('should write the registry configuration from kafka data', async () => {
    const { workload } = await bootstrap();
    const config = readConfig(workload);

    expect(config.bootstrap_uri).toBe('broker-0:9092,broker-1:9092');
    expect(config.sasl_plain_username).toBe('relation-11');
    expect(config.sasl_plain_password).toBe('kafka-secret');
    expect(config.security_protocol).toBe('SASL_PLAINTEXT');
    expect(config.replication_factor).toBe(2);
    expect(config.client_id).toBe('sr-0');
    expect(config.registry_authfile).toBe('/srv/karapace/authfile.json');
    expect(config.ssl_cafile).toBeNull();
  });

  it('should grant the admin user write access in the authfile', async () => {
    const { workload, context } = await bootstrap();
    const authfile = readAuthfile(workload);
    const salt = context.secrets.get('operator')?.salt;

    expect(authfile.users).toHaveLength(1);
    expect(authfile.users[0]).toMatchObject({ username: 'operator', algorithm: 'sha512', salt });
    expect(authfile.permissions).toEqual([{ username: 'operator', operation: 'Write', resource: '.*' }]);
  });

  it('should wait for the peer relation before running', async () => {
    const { handle, workload } = createHarness();

    const result = await handle(KAFKA_READY);

    expect(result.status).toEqual({ level: 'maintenance', message: 'no peer relation yet' });
    expect(workload.callsOf('start')).toEqual([]);
  });
});

// =============================================================================
// Convergence and idempotence
// =============================================================================

describe('Reconciler convergence', () => {
  it('should reach the same state whichever relation arrives first', async () => {
    const first = createHarness();
    await first.run(CLUSTER_SELF, KAFKA_READY);
    const second = createHarness();
    await second.run(KAFKA_READY, CLUSTER_SELF);

    expect(second.context.status).toEqual(first.context.status);
    expect(second.workload.running).toBe(true);
    expect([...second.workload.files.keys()].sort()).toEqual([...first.workload.files.keys()].sort());
    expect(readConfig(second.workload)).toEqual(readConfig(first.workload));
    expect(readAuthfile(second.workload).permissions).toEqual(readAuthfile(first.workload).permissions);
    expect(second.context.relations.status('kafka')).toBe('active');
    expect(second.context.relations.status('cluster')).toBe('active');
  });

  it('should make no workload calls when nothing changed', async () => {
    const { handle, workload } = await bootstrap();

    const result = await handle({ type: 'config-changed' });

    expect(result.applied).toEqual([]);
    expect(result.success).toBe(true);
    expect(workload.calls).toEqual([]);
  });

  it('should ignore repeated relation data', async () => {
    const { handle, workload } = await bootstrap();

    const result = await handle(KAFKA_READY);

    expect(result.applied).toEqual([]);
    expect(workload.calls).toEqual([]);
  });

  it('should only check the service on update-status', async () => {
    const { handle, workload } = await bootstrap();

    const result = await handle({ type: 'update-status' });

    expect(workload.calls).toEqual(['active']);
    expect(result.status).toEqual({ level: 'active', message: '' });
  });

  it('should report a stopped service on update-status', async () => {
    const { handle, workload } = await bootstrap();
    workload.running = false;

    const result = await handle({ type: 'update-status' });

    expect(result.status).toEqual({ level: 'blocked', message: 'karapace service not running' });
  });
});

// =============================================================================
// Failures
// =============================================================================

describe('Reconciler failure handling', () => {
  it('should retry a rejected write three times, then break the source relation', async () => {
    const { handle, workload, context } = createHarness();
    await handle(CLUSTER_SELF);
    workload.reset();
    workload.failNext('write', 4);

    const result = await handle(KAFKA_READY);

    expect(workload.calls).toEqual(new Array<string>(4).fill('write:/srv/karapace/karapace.config.json'));
    expect(result.success).toBe(false);
    expect(result.failures).toEqual([
      {
        code: 'TRANSIENT_BACKEND_FAILURE',
        message: 'write rejected',
        operation: 'write',
        attempts: 4,
      },
    ]);
    expect(context.relations.status('kafka')).toBe('broken');
    expect(result.status).toEqual({
      level: 'blocked',
      message: 'kafka relation broken: write-file config failed: write rejected',
    });
    expect(workload.running).toBe(false);
  });

  it('should succeed when a retry gets through', async () => {
    const { handle, workload } = createHarness();
    await handle(CLUSTER_SELF);
    workload.failNext('start', 2);

    const result = await handle(KAFKA_READY);

    expect(result.success).toBe(true);
    expect(workload.callsOf('start')).toHaveLength(3);
    expect(result.status.level).toBe('active');
  });

  it('should re-arm a broken relation when new data arrives', async () => {
    const { handle, workload, context } = createHarness();
    await handle(CLUSTER_SELF);
    workload.failNext('write', 4);
    await handle(KAFKA_READY);

    const result = await handle(changed('kafka', 'kafka', { password: 'kafka-secret-2' }));

    expect(result.status).toEqual({ level: 'active', message: '' });
    expect(context.relations.status('kafka')).toBe('active');
    expect(readConfig(workload).sasl_plain_password).toBe('kafka-secret-2');
  });

  it('should retry a relation broken by a failed write on update-status', async () => {
    const { handle, workload, context } = createHarness();
    await handle(CLUSTER_SELF);
    workload.failNext('write', 4);
    await handle(KAFKA_READY);

    const result = await handle({ type: 'update-status' });

    expect(result.success).toBe(true);
    expect(result.status).toEqual({ level: 'active', message: '' });
    expect(context.relations.status('kafka')).toBe('active');
    expect(workload.running).toBe(true);
  });

  it('should retry a relation broken by a failed write when the same data arrives again', async () => {
    const { handle, workload, context } = createHarness();
    await handle(CLUSTER_SELF);
    workload.failNext('write', 4);
    await handle(KAFKA_READY);

    const result = await handle(KAFKA_READY);

    expect(result.status).toEqual({ level: 'active', message: '' });
    expect(context.relations.status('kafka')).toBe('active');
    expect(readConfig(workload).sasl_plain_password).toBe('kafka-secret');
  });

  it('should reject a second kafka provider and keep the first', async () => {
    const { handle, context, workload } = await bootstrap();

    const result = await handle(changed('kafka', 'kafka-two', kafkaData()));

    expect(result.success).toBe(false);
    expect(result.failures).toMatchObject([{ code: 'CARDINALITY_VIOLATION', relation: 'kafka' }]);
    expect(context.relations.peers('kafka')).toEqual(['kafka']);
    expect(context.relations.status('kafka')).toBe('active');
    expect(workload.calls).toEqual([]);
  });

  it('should stop the service when kafka drops a required field', async () => {
    const { handle, workload, context } = await bootstrap();

    const result = await handle(changed('kafka', 'kafka', { password: '' }));

    expect(context.relations.status('kafka')).toBe('broken');
    expect(context.relations.get('kafka')?.reason).toBe('required field missing: password');
    expect(result.status).toEqual({ level: 'waiting', message: 'kafka credentials not created yet' });
    expect(workload.calls).toEqual(['remove:/srv/karapace/karapace.config.json', 'stop']);
  });

  it('should break the kafka relation on malformed endpoints', async () => {
    const { handle, context } = createHarness();
    await handle(CLUSTER_SELF);

    const result = await handle(changed('kafka', 'kafka', kafkaData({ endpoints: 'broker-0' })));

    expect(context.relations.status('kafka')).toBe('broken');
    expect(result.status).toEqual({
      level: 'blocked',
      message: 'kafka relation broken: invalid kafka endpoint "broker-0", expected host:port',
    });
  });

  it('should keep a relation with invalid data broken on update-status', async () => {
    const { handle, context } = createHarness();
    await handle(CLUSTER_SELF);
    await handle(changed('kafka', 'kafka', kafkaData({ endpoints: 'broker-0' })));

    const result = await handle({ type: 'update-status' });

    expect(context.relations.status('kafka')).toBe('broken');
    expect(context.relations.get('kafka')?.retryable).toBeUndefined();
    expect(result.status).toEqual({
      level: 'blocked',
      message: 'kafka relation broken: invalid kafka endpoint "broker-0", expected host:port',
    });
  });

  it('should block when only kafka has TLS enabled', async () => {
    const { run, workload } = createHarness();

    const result = await run(CLUSTER_SELF, changed('kafka', 'kafka', kafkaData({ tls: 'enabled' })));

    expect(result.status).toEqual({ level: 'blocked', message: 'tls must be enabled on both karapace and kafka' });
    expect(workload.running).toBe(false);
  });

  it('should roll back secret changes left by an interrupted pass', async () => {
    const { handle, context, workload } = await bootstrap();
    const token = LeaderToken.issue(context.unit);
    if (!token) throw new Error('expected a leader token');
    context.secrets.writer(token).rotate('operator', 'test-secret');

    const result = await handle({ type: 'config-changed' });

    expect(result.rolledBack).toBe(1);
    expect(context.secrets.get('operator')?.version).toBe(1);
    expect(context.secrets.auditLog('operator').map((entry) => entry.action)).toEqual([
      'create',
      'rotate',
      'rollback',
    ]);
    expect(workload.calls).toEqual([]);
  });
});

// =============================================================================
// Actions
// =============================================================================

describe('Reconciler actions', () => {
  it('should set the admin password and apply it', async () => {
    const { handle, workload, context } = await bootstrap();

    const result = await handle({ type: 'action', action: { name: 'set-password', password: 'test-secret' } });

    expect(result.action).toEqual({
      name: 'set-password',
      success: true,
      data: { username: 'operator', password: 'test-secret', version: 2 },
    });
    expect(workload.calls).toEqual(['write:/srv/karapace/authfile.json', 'restart']);
    expect(context.secrets.authenticate('operator', 'test-secret')).toBe(true);
    expect(result.published.cluster?.['karapace/0']?.['operator-password-version']).toBe('2');
  });

  it('should report a failed set-password when the restart fails', async () => {
    const { handle, workload, context } = await bootstrap();
    const previous = context.secrets.get('operator')?.secretValue;
    workload.failNext('restart', 4);

    const result = await handle({ type: 'action', action: { name: 'set-password', password: 'test-secret' } });

    expect(result.success).toBe(false);
    expect(result.rolledBack).toBe(1);
    expect(result.action).toEqual({
      name: 'set-password',
      success: false,
      error: 'Rolled back: restart rejected',
    });
    expect(context.secrets.authenticate('operator', 'test-secret')).toBe(false);

    const get = await handle({ type: 'action', action: { name: 'get-password' } });

    expect(get.action?.data).toEqual({ username: 'operator', password: previous });
  });

  it('should generate a password when none is given', async () => {
    const { handle } = await bootstrap();

    const result = await handle({ type: 'action', action: { name: 'set-password' } });

    expect(result.action?.success).toBe(true);
    expect(String(result.action?.data?.password)).toMatch(/^[A-Za-z0-9]{32}$/);
    expect(result.action?.data?.version).toBe(2);
  });

  it('should return the current password', async () => {
    const { handle } = await bootstrap();
    await handle({ type: 'action', action: { name: 'set-password', password: 'test-secret' } });

    const result = await handle({ type: 'action', action: { name: 'get-password' } });

    expect(result.action).toEqual({
      name: 'get-password',
      success: true,
      data: { username: 'operator', password: 'test-secret' },
    });
  });

  it('should refuse to reuse the current password', async () => {
    const { handle, workload, context } = await bootstrap();
    await handle({ type: 'action', action: { name: 'set-password', password: 'test-secret' } });
    workload.reset();

    const result = await handle({ type: 'action', action: { name: 'set-password', password: 'test-secret' } });

    expect(result.success).toBe(false);
    expect(result.action).toEqual({
      name: 'set-password',
      success: false,
      error: 'Password already exists, please choose a different password.',
    });
    expect(context.secrets.get('operator')?.version).toBe(2);
    expect(workload.calls).toEqual([]);
  });

  it('should refuse users other than the internal admin', async () => {
    const { handle } = await bootstrap();

    const result = await handle({ type: 'action', action: { name: 'set-password', username: 'admin' } });

    expect(result.action?.error).toBe('Can only update internal users: operator, not admin.');
  });

  it('should refuse password changes on non-leader units', async () => {
    const { handle } = createHarness({ unit: { name: 'karapace/1', isLeader: false } });

    const result = await handle({ type: 'action', action: { name: 'set-password', password: 'test-secret' } });

    expect(result.failures).toMatchObject([{ code: 'LEADERSHIP_REQUIRED' }]);
    expect(result.action?.error).toBe('set-password must be called on the leader unit');
  });

  it('should report a missing credential on get-password', async () => {
    const { handle } = createHarness();

    const result = await handle({ type: 'action', action: { name: 'get-password' } });

    expect(result.action?.error).toBe('No credential for operator yet: internal credentials not yet added');
  });
});

// =============================================================================
// Client requirers
// =============================================================================

describe('Reconciler client requirers', () => {
  it('should create a credential and publish it to a requirer', async () => {
    const { handle, workload, context } = await bootstrap();

    const result = await handle(changed('karapace', 'orders-app', { subject: 'orders' }));
    const credential = context.secrets.get('relation-orders-app');

    expect(credential?.version).toBe(1);
    expect(result.published.karapace).toEqual({
      'orders-app': {
        endpoints: '10.0.0.10:8081',
        username: 'relation-orders-app',
        password: credential?.secretValue,
        tls: 'disabled',
        subject: 'orders',
      },
    });
    expect(readAuthfile(workload).permissions).toEqual([
      { username: 'operator', operation: 'Write', resource: '.*' },
      { username: 'relation-orders-app', operation: 'Read', resource: 'Config:' },
      { username: 'relation-orders-app', operation: 'Read', resource: 'Subject:orders.*' },
    ]);
    expect(context.relations.status('karapace')).toBe('active');
  });

  it('should grant admin requirers write access', async () => {
    const { handle, workload } = await bootstrap();

    await handle(changed('karapace', 'tooling', { subject: 'any', 'extra-user-roles': 'admin' }));

    expect(readAuthfile(workload).permissions).toContainEqual({
      username: 'relation-tooling',
      operation: 'Write',
      resource: '.*',
    });
  });

  it('should break the relation for an unsupported role', async () => {
    const { handle, context } = await bootstrap();

    await handle(changed('karapace', 'tooling', { subject: 'any', 'extra-user-roles': 'superuser' }));

    expect(context.relations.status('karapace')).toBe('broken');
    expect(context.relations.get('karapace')?.reason).toBe(
      'unsupported extra-user-roles "superuser" requested by tooling'
    );
  });

  it('should revoke the credential when the requirer departs', async () => {
    const { handle, context, workload } = await bootstrap();
    await handle(changed('karapace', 'orders-app', { subject: 'orders' }));
    workload.reset();

    await handle(departed('karapace', 'orders-app'));

    expect(context.secrets.get('relation-orders-app')).toBeUndefined();
    expect(context.relations.get('karapace')).toBeUndefined();
    expect(readAuthfile(workload).users.map((user) => user.username)).toEqual(['operator']);
    expect(workload.calls).toEqual(['write:/srv/karapace/authfile.json', 'restart']);
    expect(context.secrets.auditLog('relation-orders-app').map((entry) => entry.action)).toEqual([
      'create',
      'revoke',
    ]);
  });
});

// =============================================================================
// Replication
// =============================================================================

describe('Reconciler replication', () => {
  const leaderData = {
    unit_address: '10.0.0.10',
    internal_credential_version: '3',
    'operator-password': 'test-secret',
    'operator-password-version': '3',
  };

  it('should apply credentials replicated by the leader', async () => {
    const { run, context, workload } = createHarness({
      unit: { name: 'karapace/1', host: '10.0.0.11', isLeader: false },
    });

    const result = await run(changed('cluster', 'karapace/1'), changed('cluster', 'karapace/0', leaderData));

    expect(context.secrets.get('operator')).toMatchObject({
      secretValue: 'test-secret',
      version: 3,
      rotatedBy: 'replication',
    });
    expect(result.published.cluster?.['karapace/1']).toEqual({
      unit_address: '10.0.0.11',
      internal_credential_version: '3',
    });
    expect(readAuthfile(workload).users.map((user) => user.username)).toEqual(['operator']);
  });

  it('should not originate credentials on a non-leader unit', async () => {
    const { handle, context } = createHarness({
      unit: { name: 'karapace/1', host: '10.0.0.11', isLeader: false },
    });

    const result = await handle(changed('cluster', 'karapace/1'));

    expect(context.secrets.principals()).toEqual([]);
    expect(result.status).toEqual({ level: 'blocked', message: 'missing required kafka relation' });
  });

  it('should run without publishing to kafka on a non-leader unit', async () => {
    const { run, workload } = createHarness({
      unit: { name: 'karapace/1', host: '10.0.0.11', isLeader: false },
    });

    const result = await run(changed('cluster', 'karapace/1'), changed('cluster', 'karapace/0', leaderData), KAFKA_READY);

    expect(result.status).toEqual({ level: 'active', message: '' });
    expect(result.published.kafka).toBeUndefined();
    expect(readConfig(workload).client_id).toBe('sr-1');
  });
});

// =============================================================================
// TLS
// =============================================================================

describe('Reconciler TLS', () => {
  const TLS_KAFKA = changed('kafka', 'kafka', kafkaData({ tls: 'enabled', 'tls-ca': 'enabled' }));

  async function withCertificates(): Promise<Harness> {
    const harness = createHarness();
    await harness.run(CLUSTER_SELF, changed('certificates', 'tls-provider'), TLS_KAFKA);
    return harness;
  }

  function csrOf(harness: Harness): string {
    const csr = harness.context.secrets.tlsMaterial('tls-provider')?.certificateSigningRequest;
    if (!csr) throw new Error('no CSR issued');
    return csr;
  }

  it('should issue a key and publish a CSR, then wait for the certificate', async () => {
    const harness = await withCertificates();
    const material = harness.context.secrets.tlsMaterial('tls-provider');

    expect(material?.version).toBe(1);
    expect(material?.privateKey).toContain('BEGIN PRIVATE KEY');
    expect(harness.context.relations.published('certificates', 'tls-provider')).toEqual({
      certificate_signing_request: material?.certificateSigningRequest,
    });
    expect(harness.context.status).toEqual({ level: 'waiting', message: 'unit waiting for signed certificates' });
    expect(harness.workload.running).toBe(false);
  });

  it('should write TLS files and start once the certificate is signed', async () => {
    const harness = await withCertificates();
    harness.workload.reset();

    const result = await harness.handle(
      changed('certificates', 'tls-provider', {
        certificate_signing_request: csrOf(harness),
        signed_certificate: CERT,
        ca_certificate: CA,
      })
    );

    const { paths, files } = harness.workload;
    expect(result.status).toEqual({ level: 'active', message: '' });
    expect(harness.workload.calls).toEqual([
      `write:${paths.sslKeyfile}`,
      `write:${paths.sslCertfile}`,
      `write:${paths.sslCafile}`,
      'start',
    ]);
    expect(files.get(paths.sslCertfile)).toBe(CERT);
    expect(files.get(paths.sslCafile)).toBe(CA);
    expect(readConfig(harness.workload).security_protocol).toBe('SASL_SSL');
    expect(harness.context.relations.status('certificates')).toBe('active');
  });

  it('should drop TLS files and material when the certificates relation departs', async () => {
    const harness = await withCertificates();
    await harness.handle(
      changed('certificates', 'tls-provider', {
        certificate_signing_request: csrOf(harness),
        signed_certificate: CERT,
        ca_certificate: CA,
      })
    );

    const departure = await harness.handle(departed('certificates', 'tls-provider'));

    const { paths, files } = harness.workload;
    expect(files.has(paths.sslKeyfile)).toBe(false);
    expect(files.has(paths.sslCertfile)).toBe(false);
    expect(files.has(paths.sslCafile)).toBe(false);
    expect(readConfig(harness.workload).security_protocol).toBe('SASL_PLAINTEXT');
    expect(readConfig(harness.workload).ssl_certfile).toBeNull();
    expect(harness.context.relations.get('certificates')).toBeUndefined();
    expect(harness.context.secrets.tlsMaterial('tls-provider')).toBeUndefined();
    expect(departure.status).toEqual({ level: 'blocked', message: 'tls must be enabled on both karapace and kafka' });

    const result = await harness.handle(changed('kafka', 'kafka', { tls: 'disabled', 'tls-ca': '' }));

    expect(result.status).toEqual({ level: 'active', message: '' });
    expect(harness.workload.running).toBe(true);
  });

  it('should keep serving the old certificate while a new key is signed', async () => {
    const harness = await withCertificates();
    await harness.handle(
      changed('certificates', 'tls-provider', {
        certificate_signing_request: csrOf(harness),
        signed_certificate: CERT,
        ca_certificate: CA,
      })
    );
    const previousCsr = csrOf(harness);
    harness.workload.reset();

    const result = await harness.handle({ type: 'action', action: { name: 'set-tls-private-key' } });

    expect(result.action).toEqual({
      name: 'set-tls-private-key',
      success: true,
      data: { relation: 'tls-provider', version: 2 },
    });
    expect(csrOf(harness)).not.toBe(previousCsr);
    expect(result.status).toEqual({ level: 'active', message: '' });
    expect(harness.workload.calls).toEqual([]);
  });

  it('should reject malformed key material', async () => {
    const harness = await withCertificates();

    const result = await harness.handle({ type: 'action', action: { name: 'set-tls-private-key', key: '!!!' } });

    expect(result.failures).toMatchObject([{ code: 'INVALID_KEY_MATERIAL' }]);
    expect(result.action?.error).toBe('Invalid private key material: expected PEM or base64-encoded PEM');
    expect(harness.context.secrets.tlsMaterial('tls-provider')?.version).toBe(1);
  });

  it('should ignore certificates for an unknown CSR', async () => {
    const harness = await withCertificates();

    await harness.handle(
      changed('certificates', 'tls-provider', {
        certificate_signing_request: '-----BEGIN CERTIFICATE REQUEST-----\nOTHER\n-----END CERTIFICATE REQUEST-----',
        signed_certificate: CERT,
      })
    );

    expect(harness.context.secrets.tlsMaterial('tls-provider')?.signedCertificate).toBeUndefined();
    expect(harness.context.status.message).toBe('unit waiting for signed certificates');
  });

  it('should require a certificates relation for set-tls-private-key', async () => {
    const { handle } = await bootstrap();

    const result = await handle({ type: 'action', action: { name: 'set-tls-private-key' } });

    expect(result.action?.error).toBe('set-tls-private-key requires a certificates relation');
  });
});

// =============================================================================
// Rolling restart
// =============================================================================

describe('Reconciler restart lock', () => {
  const SET_PASSWORD: OperatorEvent = { type: 'action', action: { name: 'set-password', password: 'test-secret' } };

  it('should defer a restart while another unit holds the lock', async () => {
    const harness = await bootstrap();
    await harness.handle(
      changed('restart', 'karapace/1', {
        'restart-lock': 'held',
        'restart-lock-since': harness.clock.now().toISOString(),
      })
    );
    harness.workload.reset();

    const result = await harness.handle(SET_PASSWORD);

    expect(result.deferred).toEqual([{ kind: 'restart', target: 'service' }]);
    expect(result.restartPending).toBe(true);
    expect(result.published.restart).toBeUndefined();
    expect(harness.workload.calls).toEqual(['write:/srv/karapace/authfile.json']);
  });

  it('should announce the lock to its peers before restarting', async () => {
    const harness = await bootstrap();
    await harness.handle(changed('restart', 'karapace/1'));
    harness.workload.reset();

    const announced = await harness.handle(SET_PASSWORD);

    const since = harness.clock.now().toISOString();
    expect(announced.deferred).toEqual([{ kind: 'restart', target: 'service' }]);
    expect(announced.published.restart).toEqual({
      'karapace/0': { 'restart-lock': 'held', 'restart-lock-since': since },
    });
    expect(harness.context.restartLock).toEqual({ holder: 'karapace/0', acquiredAt: since });
    expect(harness.workload.calls).toEqual(['write:/srv/karapace/authfile.json']);

    harness.workload.reset();
    const restarted = await harness.handle({ type: 'config-changed' });

    expect(harness.workload.calls).toEqual(['restart']);
    expect(restarted.restartPending).toBe(false);
    expect(restarted.published.restart).toEqual({ 'karapace/0': {} });
    expect(harness.context.relations.published('restart', 'karapace/0')).toBeUndefined();
    expect(harness.context.restartLock).toEqual({});
  });

  it('should make a second unit wait for the announced lock', async () => {
    const first = await bootstrap();
    await first.handle(changed('restart', 'karapace/1'));
    const announced = await first.handle(SET_PASSWORD);
    const lock = announced.published.restart?.['karapace/0'] ?? {};

    const second = createHarness({ unit: { name: 'karapace/1', host: '10.0.0.11' } });
    await second.run(changed('cluster', 'karapace/1'), KAFKA_READY, changed('restart', 'karapace/0', lock));
    second.workload.reset();

    const waiting = await second.handle(SET_PASSWORD);

    expect(waiting.deferred).toEqual([{ kind: 'restart', target: 'service' }]);
    expect(waiting.published.restart).toBeUndefined();
    expect(second.workload.calls).toEqual(['write:/srv/karapace/authfile.json']);

    const released = await first.handle({ type: 'config-changed' });
    expect(released.published.restart).toEqual({ 'karapace/0': {} });

    const withdrawn = await second.handle(
      changed('restart', 'karapace/0', { 'restart-lock': '', 'restart-lock-since': '' })
    );

    expect(withdrawn.deferred).toEqual([{ kind: 'restart', target: 'service' }]);
    expect(withdrawn.published.restart).toEqual({
      'karapace/1': { 'restart-lock': 'held', 'restart-lock-since': second.clock.now().toISOString() },
    });
  });

  it('should restart once the lock has gone stale', async () => {
    const harness = await bootstrap();
    await harness.handle(
      changed('restart', 'karapace/1', {
        'restart-lock': 'held',
        'restart-lock-since': harness.clock.now().toISOString(),
      })
    );
    await harness.handle(SET_PASSWORD);
    harness.clock.advance(5 * 60 * 1000 + 1);

    const announced = await harness.handle({ type: 'config-changed' });
    harness.workload.reset();
    const result = await harness.handle({ type: 'config-changed' });

    expect(announced.deferred).toEqual([{ kind: 'restart', target: 'service' }]);
    expect(harness.workload.calls).toEqual(['restart']);
    expect(result.restartPending).toBe(false);
    expect(result.deferred).toEqual([]);
  });
});
