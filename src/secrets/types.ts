/**
 * Types for credential and TLS material management
 */

/**
 * Credential of one principal (internal user or client application)
 */
export interface Credential {
  principal: string;
  /** Plaintext secret, shared with the principal over its relation */
  secretValue: string;
  /** Salt used for the hash written to the authfile */
  salt: string;
  /** Increases by one on every rotation */
  version: number;
  /** ISO 8601 timestamp */
  createdAt: string;
  /** Unit (or `replication`) that produced this version */
  rotatedBy: string;
}

/**
 * Subject a certificate signing request is built for
 */
export interface TlsSubject {
  commonName: string;
  /** DNS subject alternative names */
  dnsNames?: string[];
  /** IP subject alternative names */
  ipAddresses?: string[];
}

/**
 * Private key and certificate material for one certificates relation
 */
export interface TLSMaterial {
  /** Peer id of the certificates relation that issues the certificate */
  issuerRelationId: string;
  privateKey: string;
  certificateSigningRequest: string;
  signedCertificate?: string;
  caCertificate?: string;
  version: number;
}

/**
 * Auditable secret operations
 */
export type AuditAction =
  | 'create'
  | 'rotate'
  | 'revoke'
  | 'issue-tls-key'
  | 'accept-certificate'
  | 'rollback';

/**
 * One entry of the audit log. Never carries secret values.
 */
export interface AuditRecord {
  action: AuditAction;
  principal: string;
  version: number;
  actor: string;
  timestamp: string;
}

/**
 * Write-ahead record of an uncommitted change
 *
 * `previous` is what rollback restores; undefined means the entry did not
 * exist before the change.
 */
export type IntentRecord =
  | {
      id: string;
      kind: 'credential';
      principal: string;
      previous?: Credential;
      next?: Credential;
      createdAt: string;
    }
  | {
      id: string;
      kind: 'tls';
      principal: string;
      previous?: TLSMaterial;
      next?: TLSMaterial;
      createdAt: string;
    };

/**
 * Persisted form of the secret stores
 */
export interface SecretSnapshot {
  credentials: Credential[];
  tls: TLSMaterial[];
  intents: IntentRecord[];
  audit: AuditRecord[];
}

/**
 * Secret mutations reserved to the leader unit
 */
export interface SecretWriter {
  /** Return the active credential, generating one when absent */
  ensure(principal: string): Credential;
  /** Replace the credential with a new version */
  rotate(principal: string, newValue?: string): Credential;
  /** Remove a credential; no-op when absent */
  revoke(principal: string): void;
  /** Create or replace the TLS key and CSR for a certificates relation */
  issueTlsKey(relationId: string, privateKey: string | undefined, subject: TlsSubject): TLSMaterial;
}
