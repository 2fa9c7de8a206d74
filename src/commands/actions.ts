/**
 * Operator action commands: set-password, get-password, set-tls-private-key
 *
 * Each action runs as a full pass, so a rotated password or key is applied
 * to the service before the command returns.
 */

import { readFile } from 'node:fs/promises';
import { ValidationFailure } from '../errors.js';
import type { ActionResult, OperatorAction } from '../reconcilers/types.js';
import type { CommandContext, CommandResult } from '../types.js';
import { printReconciliation, printStatus } from '../utils/output.js';
import { runPasses, type PassDependencies } from './session.js';

export interface SetPasswordOptions {
  username?: string;
  password?: string;
}

export interface GetPasswordOptions {
  username?: string;
}

export interface SetTlsPrivateKeyOptions {
  /** PEM or base64-encoded PEM key */
  key?: string;
  /** File holding the key */
  keyFile?: string;
}

async function runActionCommand(
  ctx: CommandContext,
  action: OperatorAction,
  deps: PassDependencies
): Promise<CommandResult<ActionResult>> {
  const [result] = await runPasses(ctx, [{ type: 'action', action }], deps);
  const outcome: ActionResult = result?.action ?? { name: action.name, success: false, error: 'action did not run' };

  if (ctx.outputFormat === 'human' && result) {
    printReconciliation(result);
    if (outcome.success && outcome.data) {
      printStatus(outcome.data, 'human');
    }
  }

  if (!outcome.success) {
    return {
      success: false,
      message: `${action.name} failed`,
      data: outcome,
      errors: outcome.error ? [outcome.error] : undefined,
    };
  }

  const failures = result?.failures.map((failure) => failure.message) ?? [];
  return {
    success: failures.length === 0,
    message: failures.length === 0 ? `${action.name} completed` : `${action.name} completed, apply failed`,
    data: outcome,
    errors: failures.length > 0 ? failures : undefined,
  };
}

/**
 * Execute the set-password command
 */
export async function setPasswordCommand(
  ctx: CommandContext,
  options: SetPasswordOptions,
  deps: PassDependencies = {}
): Promise<CommandResult<ActionResult>> {
  return runActionCommand(
    ctx,
    { name: 'set-password', username: options.username, password: options.password },
    deps
  );
}

/**
 * Execute the get-password command
 */
export async function getPasswordCommand(
  ctx: CommandContext,
  options: GetPasswordOptions,
  deps: PassDependencies = {}
): Promise<CommandResult<ActionResult>> {
  return runActionCommand(ctx, { name: 'get-password', username: options.username }, deps);
}

/**
 * Execute the set-tls-private-key command
 */
export async function setTlsPrivateKeyCommand(
  ctx: CommandContext,
  options: SetTlsPrivateKeyOptions,
  deps: PassDependencies = {}
): Promise<CommandResult<ActionResult>> {
  if (options.key !== undefined && options.keyFile !== undefined) {
    throw new ValidationFailure('Give either --key or --key-file, not both');
  }
  const key = options.keyFile !== undefined ? await readFile(options.keyFile, 'utf-8') : options.key;
  return runActionCommand(ctx, { name: 'set-tls-private-key', key }, deps);
}
