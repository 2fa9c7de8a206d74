/**
 * Secret Manager
 *
 * Owns every credential and TLS key of the deployment. Any unit can read and
 * apply replicated material; origination (ensure, rotate, revoke, issue) goes
 * through a writer that requires a LeaderToken.
 *
 * Every mutation is preceded by an intent record. The reconciliation pass
 * commits intents once the managed service acknowledged the change, or rolls
 * them back to the previous values when it did not.
 */

import { randomUUID } from 'node:crypto';
import { ValidationFailure } from '../errors.js';
import { logger as defaultLogger, type OperatorLogger } from '../workload/logger.js';
import { AuditLog, DEFAULT_AUDIT_LIMIT } from './audit.js';
import type { LeaderToken } from './leadership.js';
import { generatePassword, generateSalt, secretsEqual } from './passwords.js';
import { createCsr, generatePrivateKey, parsePrivateKey, samePem } from './tls.js';
import type {
  AuditAction,
  AuditRecord,
  Credential,
  IntentRecord,
  SecretSnapshot,
  SecretWriter,
  TLSMaterial,
  TlsSubject,
} from './types.js';

// =============================================================================
// Types
// =============================================================================

export interface SecretManagerOptions {
  /** Unit name recorded as actor of originated changes */
  actor: string;
  now?: () => Date;
  logger?: OperatorLogger;
  auditLimit?: number;
}

/** Actor recorded for material received from the leader */
export const REPLICATION_ACTOR = 'replication';

const DUPLICATE_PASSWORD_MESSAGE = 'Password already exists, please choose a different password.';

function copyCredential(credential: Credential): Credential {
  return { ...credential };
}

function copyMaterial(material: TLSMaterial): TLSMaterial {
  return { ...material };
}

function copyIntent(intent: IntentRecord): IntentRecord {
  if (intent.kind === 'credential') {
    return {
      ...intent,
      previous: intent.previous && copyCredential(intent.previous),
      next: intent.next && copyCredential(intent.next),
    };
  }
  return {
    ...intent,
    previous: intent.previous && copyMaterial(intent.previous),
    next: intent.next && copyMaterial(intent.next),
  };
}

// =============================================================================
// Secret Manager
// =============================================================================

export class SecretManager {
  private readonly credentials = new Map<string, Credential>();
  private readonly tls = new Map<string, TLSMaterial>();
  private intents: IntentRecord[] = [];
  private readonly audit: AuditLog;
  private readonly actor: string;
  private readonly now: () => Date;
  private readonly log: OperatorLogger;

  constructor(options: SecretManagerOptions, snapshot?: SecretSnapshot) {
    this.actor = options.actor;
    this.now = options.now ?? (() => new Date());
    this.log = (options.logger ?? defaultLogger).child({ component: 'secrets' });
    this.audit = new AuditLog(snapshot?.audit ?? [], options.auditLimit ?? DEFAULT_AUDIT_LIMIT);

    for (const credential of snapshot?.credentials ?? []) {
      this.credentials.set(credential.principal, copyCredential(credential));
    }
    for (const material of snapshot?.tls ?? []) {
      this.tls.set(material.issuerRelationId, copyMaterial(material));
    }
    this.intents = (snapshot?.intents ?? []).map(copyIntent);
  }

  // ===========================================================================
  // Read side
  // ===========================================================================

  /**
   * Active credential of a principal
   */
  get(principal: string): Credential | undefined {
    const credential = this.credentials.get(principal);
    return credential && copyCredential(credential);
  }

  /**
   * Principals holding a credential, sorted
   */
  principals(): string[] {
    return [...this.credentials.keys()].sort();
  }

  /**
   * Check a presented secret against the active version only
   */
  authenticate(principal: string, value: string): boolean {
    const credential = this.credentials.get(principal);
    return credential !== undefined && secretsEqual(credential.secretValue, value);
  }

  /**
   * TLS material of a certificates relation
   */
  tlsMaterial(relationId: string): TLSMaterial | undefined {
    const material = this.tls.get(relationId);
    return material && copyMaterial(material);
  }

  /**
   * Relation ids with TLS material, sorted
   */
  tlsRelations(): string[] {
    return [...this.tls.keys()].sort();
  }

  /**
   * Apply a credential replicated by the leader
   *
   * @returns whether the local credential changed
   */
  observe(principal: string, value: string, version: number): boolean {
    const current = this.credentials.get(principal);
    if (current && current.version === version && current.secretValue === value) {
      return false;
    }
    const next: Credential = {
      principal,
      secretValue: value,
      salt: current?.secretValue === value ? current.salt : generateSalt(),
      version,
      createdAt: this.now().toISOString(),
      rotatedBy: REPLICATION_ACTOR,
    };
    this.putCredential(principal, next);
    this.log.debug('Applied replicated credential', { principal, version });
    return true;
  }

  /**
   * Drop a credential the leader no longer replicates
   */
  observeRemoval(principal: string): boolean {
    if (!this.credentials.has(principal)) {
      return false;
    }
    this.putCredential(principal, undefined);
    return true;
  }

  /**
   * Apply TLS key material replicated by the leader
   *
   * @returns whether the local material changed
   */
  observeTls(relationId: string, privateKey: string, csr: string, version: number): boolean {
    const current = this.tls.get(relationId);
    if (
      current &&
      current.version === version &&
      samePem(current.privateKey, privateKey) &&
      samePem(current.certificateSigningRequest, csr)
    ) {
      return false;
    }
    const sameRequest = current !== undefined && samePem(current.certificateSigningRequest, csr);
    this.putTls(relationId, {
      issuerRelationId: relationId,
      privateKey,
      certificateSigningRequest: csr,
      signedCertificate: sameRequest ? current.signedCertificate : undefined,
      caCertificate: sameRequest ? current.caCertificate : undefined,
      version,
    });
    return true;
  }

  /**
   * Attach a signed certificate to the material whose CSR it answers
   *
   * @returns the updated material, or undefined for an unknown CSR
   */
  acceptCertificate(csr: string, certificate: string, ca: string | undefined): TLSMaterial | undefined {
    const material = [...this.tls.values()].find((m) => samePem(m.certificateSigningRequest, csr));
    if (!material) {
      this.log.warn("Can't use certificate, found unknown CSR");
      return undefined;
    }
    if (samePem(material.signedCertificate, certificate) && material.caCertificate === ca) {
      return copyMaterial(material);
    }
    const next: TLSMaterial = { ...material, signedCertificate: certificate, caCertificate: ca };
    this.putTls(material.issuerRelationId, next);
    this.recordAudit('accept-certificate', material.issuerRelationId, next.version, this.actor);
    return copyMaterial(next);
  }

  /**
   * Remove the TLS material of a certificates relation
   */
  revokeTls(relationId: string): boolean {
    const material = this.tls.get(relationId);
    if (!material) {
      return false;
    }
    this.putTls(relationId, undefined);
    this.recordAudit('revoke', relationId, material.version, this.actor);
    return true;
  }

  // ===========================================================================
  // Intents
  // ===========================================================================

  pendingIntents(): IntentRecord[] {
    return this.intents.map(copyIntent);
  }

  /**
   * Forget pending intents once their effects were acknowledged
   *
   * @returns number of committed intents
   */
  commit(): number {
    const count = this.intents.length;
    this.intents = [];
    return count;
  }

  /**
   * Restore every value changed since the last commit, newest first
   *
   * @returns number of rolled back intents
   */
  rollback(): number {
    const pending = this.intents;
    this.intents = [];
    for (const intent of [...pending].reverse()) {
      if (intent.kind === 'credential') {
        this.restoreCredential(intent.principal, intent.previous);
      } else {
        this.restoreTls(intent.principal, intent.previous);
      }
      this.recordAudit('rollback', intent.principal, intent.previous?.version ?? 0, this.actor);
    }
    if (pending.length > 0) {
      this.log.warn('Rolled back uncommitted secret changes', { intents: pending.length });
    }
    return pending.length;
  }

  auditLog(principal?: string): AuditRecord[] {
    return this.audit.list(principal);
  }

  // ===========================================================================
  // Write side
  // ===========================================================================

  /**
   * Secret mutations, available to the leader only
   */
  writer(token: LeaderToken): SecretWriter {
    return {
      ensure: (principal) => this.ensure(principal, token.unit),
      rotate: (principal, newValue) => this.rotate(principal, newValue, token.unit),
      revoke: (principal) => this.revoke(principal, token.unit),
      issueTlsKey: (relationId, privateKey, subject) =>
        this.issueTlsKey(relationId, privateKey, subject, token.unit),
    };
  }

  private ensure(principal: string, actor: string): Credential {
    const existing = this.credentials.get(principal);
    if (existing) {
      return copyCredential(existing);
    }
    const credential = this.newCredential(principal, generatePassword(), 1, actor);
    this.putCredential(principal, credential);
    this.recordAudit('create', principal, credential.version, actor);
    this.log.info('Created credential', { principal, version: credential.version });
    return copyCredential(credential);
  }

  private rotate(principal: string, newValue: string | undefined, actor: string): Credential {
    const current = this.credentials.get(principal);
    if (newValue !== undefined) {
      if (!newValue) {
        throw new ValidationFailure('Password must not be empty');
      }
      if (current && secretsEqual(current.secretValue, newValue)) {
        throw new ValidationFailure(DUPLICATE_PASSWORD_MESSAGE);
      }
    }

    let value = newValue ?? generatePassword();
    while (current && value === current.secretValue) {
      value = generatePassword();
    }

    const credential = this.newCredential(principal, value, (current?.version ?? 0) + 1, actor);
    this.putCredential(principal, credential);
    this.recordAudit('rotate', principal, credential.version, actor);
    this.log.info('Rotated credential', { principal, version: credential.version });
    return copyCredential(credential);
  }

  private revoke(principal: string, actor: string): void {
    const existing = this.credentials.get(principal);
    if (!existing) {
      return;
    }
    this.putCredential(principal, undefined);
    this.recordAudit('revoke', principal, existing.version, actor);
    this.log.info('Revoked credential', { principal, version: existing.version });
  }

  private issueTlsKey(
    relationId: string,
    privateKey: string | undefined,
    subject: TlsSubject,
    actor: string
  ): TLSMaterial {
    const key = privateKey !== undefined ? parsePrivateKey(privateKey) : generatePrivateKey();
    const current = this.tls.get(relationId);
    const material: TLSMaterial = {
      issuerRelationId: relationId,
      privateKey: key,
      certificateSigningRequest: createCsr(key, subject),
      version: (current?.version ?? 0) + 1,
    };
    this.putTls(relationId, material);
    this.recordAudit('issue-tls-key', relationId, material.version, actor);
    this.log.info('Issued TLS key and CSR', { relation: relationId, version: material.version });
    return copyMaterial(material);
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private newCredential(principal: string, value: string, version: number, actor: string): Credential {
    return {
      principal,
      secretValue: value,
      salt: generateSalt(),
      version,
      createdAt: this.now().toISOString(),
      rotatedBy: actor,
    };
  }

  private putCredential(principal: string, next: Credential | undefined): void {
    const previous = this.credentials.get(principal);
    this.intents.push({
      id: randomUUID(),
      kind: 'credential',
      principal,
      previous: previous && copyCredential(previous),
      next: next && copyCredential(next),
      createdAt: this.now().toISOString(),
    });
    this.restoreCredential(principal, next);
  }

  private putTls(relationId: string, next: TLSMaterial | undefined): void {
    const previous = this.tls.get(relationId);
    this.intents.push({
      id: randomUUID(),
      kind: 'tls',
      principal: relationId,
      previous: previous && copyMaterial(previous),
      next: next && copyMaterial(next),
      createdAt: this.now().toISOString(),
    });
    this.restoreTls(relationId, next);
  }

  private restoreCredential(principal: string, value: Credential | undefined): void {
    if (value) {
      this.credentials.set(principal, copyCredential(value));
    } else {
      this.credentials.delete(principal);
    }
  }

  private restoreTls(relationId: string, value: TLSMaterial | undefined): void {
    if (value) {
      this.tls.set(relationId, copyMaterial(value));
    } else {
      this.tls.delete(relationId);
    }
  }

  private recordAudit(action: AuditAction, principal: string, version: number, actor: string): void {
    this.audit.record(action, principal, version, actor, this.now());
  }

  /**
   * Persisted form of all stores, pending intents included
   */
  snapshot(): SecretSnapshot {
    return {
      credentials: this.principals().flatMap((p) => {
        const credential = this.credentials.get(p);
        return credential ? [copyCredential(credential)] : [];
      }),
      tls: this.tlsRelations().flatMap((id) => {
        const material = this.tls.get(id);
        return material ? [copyMaterial(material)] : [];
      }),
      intents: this.intents.map(copyIntent),
      audit: this.audit.list(),
    };
  }
}
