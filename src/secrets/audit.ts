/**
 * Append-only audit log of secret operations
 */

import type { AuditAction, AuditRecord } from './types.js';

/** Entries kept when no limit is given */
export const DEFAULT_AUDIT_LIMIT = 500;

export class AuditLog {
  private readonly records: AuditRecord[];

  constructor(
    initial: AuditRecord[] = [],
    private readonly limit = DEFAULT_AUDIT_LIMIT
  ) {
    this.records = initial.slice(-limit).map((record) => ({ ...record }));
  }

  record(action: AuditAction, principal: string, version: number, actor: string, at: Date): AuditRecord {
    const entry: AuditRecord = {
      action,
      principal,
      version,
      actor,
      timestamp: at.toISOString(),
    };
    this.records.push(entry);
    // Oldest entries go first
    if (this.records.length > this.limit) {
      this.records.splice(0, this.records.length - this.limit);
    }
    return { ...entry };
  }

  list(principal?: string): AuditRecord[] {
    return this.records
      .filter((record) => principal === undefined || record.principal === principal)
      .map((record) => ({ ...record }));
  }
}
