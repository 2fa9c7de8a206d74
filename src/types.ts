/**
 * Shared types and interfaces for the karapace-lifecycle CLI
 */

import type { RetryPolicy } from './workload/retry.js';
import type { LogLevel } from './workload/logger.js';

// ============================================================================
// Unit Identity
// ============================================================================

/**
 * The unit this controller runs for
 */
export interface UnitIdentity {
  /** Unit name, e.g. `karapace/0` */
  name: string;
  /** Address other units and clients reach this unit on */
  host: string;
  /** Whether this unit currently holds leadership */
  isLeader: boolean;
}

// ============================================================================
// Operator Settings
// ============================================================================

/**
 * Fully resolved controller settings
 */
export interface OperatorSettings {
  unit: UnitIdentity;
  /** YAML file holding the operator context between passes */
  stateFile: string;
  /** Configuration directory of the managed service */
  confDir: string;
  /** Service manager executable; unset tracks run state in a marker file */
  serviceCommand?: string;
  /** Service name passed to the service manager */
  serviceName: string;
  /** Backoff and time bounds for workload operations */
  retry: Required<RetryPolicy>;
  /** How long a restart lock is honoured before it is considered stale (ms) */
  restartLockTimeoutMs: number;
  /** Log level of the managed service itself */
  serviceLogLevel: 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR';
  logLevel: LogLevel;
  logJson: boolean;
}

/**
 * Where a resolved setting came from
 */
export type SettingSource = 'cli' | 'env' | 'local_config' | 'default';

// ============================================================================
// Global Options and Context
// ============================================================================

/**
 * Global options available to all commands
 */
export interface GlobalOptions {
  /** Unit name, e.g. `karapace/0` */
  unit?: string;
  /** Unit address */
  host?: string;
  /** Run as the leader unit */
  leader?: boolean;
  /** State file path */
  state?: string;
  /** Managed service configuration directory */
  confDir?: string;
  /** Local config file */
  config?: string;
  /** Output JSON for CI/automation */
  json: boolean;
  /** Enable verbose logging */
  verbose: boolean;
}

/**
 * Output format type
 */
export type OutputFormat = 'human' | 'json';

/**
 * Result of a command execution
 */
export interface CommandResult<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  errors?: string[];
}

/**
 * Command context passed to command handlers
 */
export interface CommandContext {
  /** Parsed global CLI options */
  options: GlobalOptions;
  /** Output format for results */
  outputFormat: OutputFormat;
  /** Resolved settings */
  settings: OperatorSettings;
  /** Source of each resolved setting, for verbose output */
  sources: Record<string, SettingSource>;
}
