/**
 * Secret management exports
 */

export type {
  AuditAction,
  AuditRecord,
  Credential,
  IntentRecord,
  SecretSnapshot,
  SecretWriter,
  TLSMaterial,
  TlsSubject,
} from './types.js';

export { AuditLog, DEFAULT_AUDIT_LIMIT } from './audit.js';
export { LeaderToken, acquireLeadership, requireLeadership } from './leadership.js';
export { PASSWORD_LENGTH, generatePassword, generateSalt, hashPassword, secretsEqual } from './passwords.js';
export {
  RSA_KEY_BITS,
  createCsr,
  csrCommonName,
  decodeKeyInput,
  generatePrivateKey,
  parsePrivateKey,
  samePem,
  unitSubject,
} from './tls.js';
export { REPLICATION_ACTOR, SecretManager, type SecretManagerOptions } from './manager.js';
