/**
 * Unit status values reported after every pass
 */

import type { LogLevel } from '../workload/logger.js';

export type StatusLevel = 'active' | 'blocked' | 'waiting' | 'maintenance';

export interface UnitStatus {
  level: StatusLevel;
  message: string;
}

export interface StatusEntry {
  status: UnitStatus;
  /** Level the status is logged at when it is set */
  logLevel: LogLevel;
}

export const STATUS = {
  ACTIVE: { status: { level: 'active', message: '' }, logLevel: 'debug' },
  NO_PEER_RELATION: {
    status: { level: 'maintenance', message: 'no peer relation yet' },
    logLevel: 'debug',
  },
  SERVICE_NOT_RUNNING: {
    status: { level: 'blocked', message: 'karapace service not running' },
    logLevel: 'error',
  },
  KAFKA_NOT_RELATED: {
    status: { level: 'blocked', message: 'missing required kafka relation' },
    logLevel: 'debug',
  },
  KAFKA_TLS_MISMATCH: {
    status: { level: 'blocked', message: 'tls must be enabled on both karapace and kafka' },
    logLevel: 'error',
  },
  KAFKA_NO_DATA: {
    status: { level: 'waiting', message: 'kafka credentials not created yet' },
    logLevel: 'debug',
  },
  NO_CREDS: {
    status: { level: 'waiting', message: 'internal credentials not yet added' },
    logLevel: 'debug',
  },
  NO_CERT: {
    status: { level: 'waiting', message: 'unit waiting for signed certificates' },
    logLevel: 'info',
  },
} as const satisfies Record<string, StatusEntry>;

export type StatusKey = keyof typeof STATUS;

/**
 * Status for a kafka relation that failed validation or apply
 */
export function kafkaBroken(reason: string): StatusEntry {
  return {
    status: { level: 'blocked', message: `kafka relation broken: ${reason}` },
    logLevel: 'error',
  };
}

/**
 * Copy of a predefined status
 */
export function statusOf(key: StatusKey): StatusEntry {
  const entry = STATUS[key];
  return { status: { ...entry.status }, logLevel: entry.logLevel };
}
