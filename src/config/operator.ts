/**
 * Controller settings resolution
 *
 * Every setting is resolved independently, highest priority first:
 * 1. CLI flag
 * 2. Environment variable (KARAPACE_OPERATOR_*)
 * 3. Local config file (.karapace-lifecycle/config.yaml)
 * 4. Built-in default
 */

import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import * as yaml from 'yaml';
import { ValidationFailure } from '../errors.js';
import { DEFAULT_RESTART_LOCK_TIMEOUT_MS } from '../reconcilers/restart.js';
import type { GlobalOptions, OperatorSettings, SettingSource } from '../types.js';
import { parseLogLevel } from '../workload/logger.js';
import { DEFAULT_RETRY_POLICY } from '../workload/retry.js';

/** Local config file, relative to the working directory */
export const LOCAL_CONFIG_FILE = '.karapace-lifecycle/config.yaml';

/** Prefix of all environment variables read by the controller */
export const ENV_PREFIX = 'KARAPACE_OPERATOR_';

const DEFAULT_STATE_FILE = '.karapace-lifecycle/state.yaml';
const DEFAULT_CONF_DIR = '/etc/karapace';
const DEFAULT_UNIT = 'karapace/0';
const DEFAULT_HOST = '127.0.0.1';

const SERVICE_LOG_LEVELS = ['DEBUG', 'INFO', 'WARNING', 'ERROR'] as const;

type ServiceLogLevel = (typeof SERVICE_LOG_LEVELS)[number];

/**
 * Resolved settings together with the source of each one
 */
export interface SettingsResolution {
  settings: OperatorSettings;
  sources: Record<string, SettingSource>;
  /** Local config file that was read, if any */
  configFile?: string;
}

export interface ResolveSettingsOptions {
  /** Parsed global CLI options */
  cli?: Partial<GlobalOptions>;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

type Parser<T> = (raw: unknown, origin: string) => T;

// =============================================================================
// Value parsers
// =============================================================================

function invalid(origin: string, expected: string): ValidationFailure {
  return new ValidationFailure(`Invalid setting ${origin}: expected ${expected}`, undefined, origin);
}

const parseString: Parser<string> = (raw, origin) => {
  if (typeof raw === 'number') return String(raw);
  if (typeof raw !== 'string' || raw.trim() === '') throw invalid(origin, 'a non-empty string');
  return raw.trim();
};

const parseBoolean: Parser<boolean> = (raw, origin) => {
  if (typeof raw === 'boolean') return raw;
  if (typeof raw === 'string') {
    const value = raw.trim().toLowerCase();
    if (['true', '1', 'yes'].includes(value)) return true;
    if (['false', '0', 'no'].includes(value)) return false;
  }
  throw invalid(origin, 'true or false');
};

const parseNonNegativeInt: Parser<number> = (raw, origin) => {
  const value = typeof raw === 'string' && raw.trim() !== '' ? Number(raw) : raw;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw invalid(origin, 'a non-negative integer');
  }
  return value;
};

const parseFraction: Parser<number> = (raw, origin) => {
  const value = typeof raw === 'string' && raw.trim() !== '' ? Number(raw) : raw;
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0 || value > 1) {
    throw invalid(origin, 'a number between 0 and 1');
  }
  return value;
};

const parseOperatorLogLevel: Parser<OperatorSettings['logLevel']> = (raw, origin) => {
  const level = typeof raw === 'string' ? parseLogLevel(raw) : undefined;
  if (!level) throw invalid(origin, 'one of debug, info, warn, error');
  return level;
};

const parseServiceLogLevel: Parser<ServiceLogLevel> = (raw, origin) => {
  const value = typeof raw === 'string' ? raw.trim().toUpperCase() : undefined;
  const level = SERVICE_LOG_LEVELS.find((candidate) => candidate === value);
  if (!level) throw invalid(origin, SERVICE_LOG_LEVELS.join(', '));
  return level;
};

// =============================================================================
// Local config
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read the local config file
 *
 * Keys are snake_case; a nested `retry` mapping holds the backoff settings.
 * Returns an empty mapping when the file does not exist.
 */
export function loadLocalConfig(path: string): Record<string, unknown> {
  if (!existsSync(path)) {
    return {};
  }
  let parsed: unknown;
  try {
    parsed = yaml.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ValidationFailure(`Cannot parse ${path}: ${reason}`);
  }
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new ValidationFailure(`${path} must contain a YAML mapping`);
  }
  const { retry, ...rest } = parsed;
  if (retry === undefined || retry === null) {
    return rest;
  }
  if (!isRecord(retry)) {
    throw new ValidationFailure(`${path}: retry must be a mapping`);
  }
  const flattened: Record<string, unknown> = { ...rest };
  for (const [key, value] of Object.entries(retry)) {
    flattened[`retry.${key}`] = value;
  }
  return flattened;
}

// =============================================================================
// Resolution
// =============================================================================

class Resolver {
  readonly sources: Record<string, SettingSource> = {};

  constructor(
    private readonly env: NodeJS.ProcessEnv,
    private readonly file: Record<string, unknown>
  ) {}

  /**
   * Resolve one setting from its sources
   *
   * @param name - Setting name reported in `sources`
   * @param key - Local config key; the env variable is its upper-cased form
   */
  pick<T>(name: string, key: string, parse: Parser<T>, cliValue: unknown, fallback: T): T {
    if (cliValue !== undefined) {
      this.sources[name] = 'cli';
      return parse(cliValue, `--${name}`);
    }

    const envName = ENV_PREFIX + key.replace(/\./g, '_').toUpperCase();
    const envValue = this.env[envName];
    if (envValue !== undefined && envValue !== '') {
      this.sources[name] = 'env';
      return parse(envValue, envName);
    }

    const fileValue = this.file[key];
    if (fileValue !== undefined && fileValue !== null) {
      this.sources[name] = 'local_config';
      return parse(fileValue, key);
    }

    this.sources[name] = 'default';
    return fallback;
  }

  optional<T>(name: string, key: string, parse: Parser<T>, cliValue?: unknown): T | undefined {
    return this.pick<T | undefined>(name, key, parse, cliValue, undefined);
  }
}

/**
 * Resolve controller settings from CLI options, environment and local config
 *
 * @throws ValidationFailure for malformed values
 */
export function resolveSettings(options: ResolveSettingsOptions = {}): SettingsResolution {
  const cli = options.cli ?? {};
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  const configPath = resolve(cwd, cli.config ?? env[`${ENV_PREFIX}CONFIG`] ?? LOCAL_CONFIG_FILE);
  const file = loadLocalConfig(configPath);
  const r = new Resolver(env, file);

  const name = r.pick('unit', 'unit', parseString, cli.unit, DEFAULT_UNIT);
  const host = r.pick('host', 'host', parseString, cli.host, DEFAULT_HOST);
  const isLeader = r.pick('leader', 'leader', parseBoolean, cli.leader, false);

  const settings: OperatorSettings = {
    unit: { name, host, isLeader },
    stateFile: resolve(cwd, r.pick('state', 'state_file', parseString, cli.state, DEFAULT_STATE_FILE)),
    confDir: resolve(cwd, r.pick('conf-dir', 'conf_dir', parseString, cli.confDir, DEFAULT_CONF_DIR)),
    serviceCommand: r.optional('service-command', 'service_command', parseString),
    serviceName: r.pick('service-name', 'service_name', parseString, undefined, 'karapace'),
    retry: {
      maxRetries: r.pick(
        'max-retries',
        'retry.max_retries',
        parseNonNegativeInt,
        undefined,
        DEFAULT_RETRY_POLICY.maxRetries
      ),
      baseDelayMs: r.pick(
        'base-delay-ms',
        'retry.base_delay_ms',
        parseNonNegativeInt,
        undefined,
        DEFAULT_RETRY_POLICY.baseDelayMs
      ),
      maxDelayMs: r.pick(
        'max-delay-ms',
        'retry.max_delay_ms',
        parseNonNegativeInt,
        undefined,
        DEFAULT_RETRY_POLICY.maxDelayMs
      ),
      jitterFactor: r.pick(
        'jitter-factor',
        'retry.jitter_factor',
        parseFraction,
        undefined,
        DEFAULT_RETRY_POLICY.jitterFactor
      ),
      timeoutMs: r.pick(
        'timeout-ms',
        'retry.timeout_ms',
        parseNonNegativeInt,
        undefined,
        DEFAULT_RETRY_POLICY.timeoutMs
      ),
    },
    restartLockTimeoutMs: r.pick(
      'restart-lock-timeout-ms',
      'restart_lock_timeout_ms',
      parseNonNegativeInt,
      undefined,
      DEFAULT_RESTART_LOCK_TIMEOUT_MS
    ),
    serviceLogLevel: r.pick('service-log-level', 'service_log_level', parseServiceLogLevel, undefined, 'INFO'),
    logLevel: r.pick('log-level', 'log_level', parseOperatorLogLevel, cli.verbose ? 'debug' : undefined, 'info'),
    logJson: r.pick('log-json', 'log_json', parseBoolean, undefined, false),
  };

  return {
    settings,
    sources: r.sources,
    configFile: existsSync(configPath) ? configPath : undefined,
  };
}
