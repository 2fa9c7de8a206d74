/**
 * karapace-lifecycle library entrypoint
 *
 * The CLI lives in cli.ts; this module exposes the reconciler for embedding.
 */

export * from './errors.js';
export type {
  CommandContext,
  CommandResult,
  GlobalOptions,
  OperatorSettings,
  OutputFormat,
  SettingSource,
  UnitIdentity,
} from './types.js';
export * from './relations/index.js';
export * from './secrets/index.js';
export * from './workload/index.js';
export * from './reconcilers/index.js';
export * from './state/index.js';
export * from './config/index.js';
export * from './commands/index.js';
