/**
 * Operator actions: set-password, get-password, set-tls-private-key
 *
 * Actions run inside a pass after relation data was ingested. A failing
 * action throws; the pass records it and applies nothing.
 */

import { ValidationFailure } from '../errors.js';
import { requireLeadership } from '../secrets/leadership.js';
import type { TlsSubject } from '../secrets/types.js';
import type { OperatorContext } from './context.js';
import { ADMIN_USER, INTERNAL_USERS } from './literals.js';
import { certificatesPeer } from './lifecycle.js';
import type { ActionResult, OperatorAction } from './types.js';

function internalUser(username: string | undefined): string {
  const user = username ?? ADMIN_USER;
  if (!INTERNAL_USERS.includes(user)) {
    throw new ValidationFailure(
      `Can only update internal users: ${INTERNAL_USERS.join(', ')}, not ${user}.`
    );
  }
  return user;
}

/**
 * Rotate an internal user's password (leader only)
 */
export function setPassword(
  context: OperatorContext,
  username: string | undefined,
  password: string | undefined
): ActionResult {
  const token = requireLeadership(context.unit, 'set-password');
  const user = internalUser(username);
  const credential = context.secrets.writer(token).rotate(user, password);
  return {
    name: 'set-password',
    success: true,
    data: { username: user, password: credential.secretValue, version: credential.version },
  };
}

/**
 * Read an internal user's current password
 */
export function getPassword(context: OperatorContext, username: string | undefined): ActionResult {
  const user = internalUser(username);
  const credential = context.secrets.get(user);
  if (!credential) {
    throw new ValidationFailure(`No credential for ${user} yet: internal credentials not yet added`);
  }
  return {
    name: 'get-password',
    success: true,
    data: { username: user, password: credential.secretValue },
  };
}

/**
 * Replace the TLS private key and emit a new CSR (leader only)
 */
export function setTlsPrivateKey(
  context: OperatorContext,
  key: string | undefined,
  subject: TlsSubject
): ActionResult {
  const token = requireLeadership(context.unit, 'set-tls-private-key');
  const peer = certificatesPeer(context);
  if (peer === undefined) {
    throw new ValidationFailure('set-tls-private-key requires a certificates relation', 'certificates');
  }
  const material = context.secrets.writer(token).issueTlsKey(peer, key, subject);
  return {
    name: 'set-tls-private-key',
    success: true,
    data: { relation: peer, version: material.version },
  };
}

/**
 * Dispatch an operator action
 *
 * @throws LeadershipRequired, ValidationFailure or InvalidKeyMaterial
 */
export function runAction(context: OperatorContext, action: OperatorAction, subject: TlsSubject): ActionResult {
  switch (action.name) {
    case 'set-password':
      return setPassword(context, action.username, action.password);
    case 'get-password':
      return getPassword(context, action.username);
    case 'set-tls-private-key':
      return setTlsPrivateKey(context, action.key, subject);
  }
}
