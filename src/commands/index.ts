/**
 * Command exports
 */

export { handleCommand, resolveEvents, describeResults, type HandleOptions } from './handle.js';
export {
  getPasswordCommand,
  setPasswordCommand,
  setTlsPrivateKeyCommand,
  type GetPasswordOptions,
  type SetPasswordOptions,
  type SetTlsPrivateKeyOptions,
} from './actions.js';
export {
  statusCommand,
  type CredentialSummary,
  type StatusOptions,
  type TlsSummary,
  type UnitReport,
} from './status.js';
export { EVENT_TYPES, parseEvent, parseEventDocument, parseRelationData } from './events.js';
export { commandLogger, openContext, runPasses, type PassDependencies } from './session.js';
