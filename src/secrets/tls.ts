/**
 * TLS private key handling and CSR generation
 */

import { createPrivateKey, generateKeyPairSync, type KeyObject } from 'node:crypto';
import { isIP } from 'node:net';
import forge from 'node-forge';
import { InvalidKeyMaterial } from '../errors.js';
import type { TlsSubject } from './types.js';

const PEM_ARMOR = /-+(BEGIN|END) [A-Z ]+-+/;
const BASE64 = /^[A-Za-z0-9+/=\s]+$/;

/** Modulus length of generated keys */
export const RSA_KEY_BITS = 2048;

/**
 * Generate an RSA private key as PKCS#8 PEM
 */
export function generatePrivateKey(): string {
  const { privateKey } = generateKeyPairSync('rsa', {
    modulusLength: RSA_KEY_BITS,
    privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
    publicKeyEncoding: { type: 'spki', format: 'pem' },
  });
  return privateKey;
}

/**
 * Decode a key supplied as PEM or as base64-encoded PEM
 */
export function decodeKeyInput(input: string): string {
  const trimmed = input.trim();
  if (!trimmed) {
    throw new InvalidKeyMaterial('key is empty');
  }
  if (PEM_ARMOR.test(trimmed)) {
    return trimmed;
  }
  if (!BASE64.test(trimmed)) {
    throw new InvalidKeyMaterial('expected PEM or base64-encoded PEM');
  }
  const decoded = Buffer.from(trimmed.replace(/\s+/g, ''), 'base64').toString('utf-8').trim();
  if (!PEM_ARMOR.test(decoded)) {
    throw new InvalidKeyMaterial('base64 payload does not contain a PEM block');
  }
  return decoded;
}

function parseKey(pem: string): KeyObject {
  try {
    return createPrivateKey({ key: pem, format: 'pem' });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidKeyMaterial(reason);
  }
}

/**
 * Validate caller-supplied key material and normalize it to PKCS#8 PEM
 *
 * @throws InvalidKeyMaterial for malformed, encrypted or non-RSA keys
 */
export function parsePrivateKey(input: string): string {
  const key = parseKey(decodeKeyInput(input));
  if (key.asymmetricKeyType !== 'rsa') {
    throw new InvalidKeyMaterial(`unsupported key type "${key.asymmetricKeyType ?? 'unknown'}", expected RSA`);
  }
  return key.export({ type: 'pkcs8', format: 'pem' }).toString().trim();
}

/**
 * Build a PEM certificate signing request for a subject
 */
export function createCsr(privateKeyPem: string, subject: TlsSubject): string {
  const privateKey = forge.pki.privateKeyFromPem(privateKeyPem);
  const csr = forge.pki.createCertificationRequest();
  csr.publicKey = forge.pki.setRsaPublicKey(privateKey.n, privateKey.e);
  csr.setSubject([{ name: 'commonName', value: subject.commonName }]);

  const altNames = [
    ...(subject.dnsNames ?? []).map((value) => ({ type: 2, value })),
    ...(subject.ipAddresses ?? []).map((ip) => ({ type: 7, ip })),
  ];
  if (altNames.length > 0) {
    csr.setAttributes([
      {
        name: 'extensionRequest',
        extensions: [{ name: 'subjectAltName', altNames }],
      },
    ]);
  }

  csr.sign(privateKey, forge.md.sha256.create());
  return forge.pki.certificationRequestToPem(csr).trim();
}

/**
 * Read the common name back from a PEM CSR; undefined when it does not parse
 */
export function csrCommonName(csrPem: string): string | undefined {
  try {
    const field = forge.pki.certificationRequestFromPem(csrPem).subject.getField('CN');
    return field && typeof field.value === 'string' ? field.value : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Subject for a unit's certificate
 */
export function unitSubject(unitName: string, host: string, fqdn?: string): TlsSubject {
  const dnsNames = [unitName.replace('/', '-')];
  if (fqdn && !dnsNames.includes(fqdn)) {
    dnsNames.push(fqdn);
  }
  if (!isIP(host) && !dnsNames.includes(host)) {
    dnsNames.push(host);
  }
  return {
    commonName: host,
    dnsNames,
    ipAddresses: isIP(host) ? [host] : [],
  };
}

/**
 * Whether two PEM documents are the same after whitespace normalization
 */
export function samePem(a: string | undefined, b: string | undefined): boolean {
  if (a === undefined || b === undefined) {
    return false;
  }
  return a.replace(/\s+/g, '') === b.replace(/\s+/g, '');
}
