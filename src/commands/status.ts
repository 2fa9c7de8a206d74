/**
 * status command - Show the persisted state of this unit
 *
 * Read-only: no pass runs and the service is not touched.
 */

import type { UnitStatus } from '../reconcilers/status.js';
import type { RelationSummary } from '../reconcilers/types.js';
import type { AuditRecord } from '../secrets/types.js';
import type { CommandContext, CommandResult } from '../types.js';
import { header, printRelations, printStatus, verbose } from '../utils/output.js';
import { openContext, type PassDependencies } from './session.js';

export interface StatusOptions {
  /** Include the secret audit trail */
  audit?: boolean;
}

export interface CredentialSummary {
  principal: string;
  version: number;
  rotatedBy: string;
}

export interface TlsSummary {
  relation: string;
  version: number;
  signed: boolean;
}

export interface UnitReport {
  unit: string;
  leader: boolean;
  status: UnitStatus;
  relations: RelationSummary[];
  credentials: CredentialSummary[];
  tls: TlsSummary[];
  running: boolean;
  restartPending: boolean;
  pendingIntents: number;
  audit?: AuditRecord[];
}

/**
 * Execute the status command
 */
export async function statusCommand(
  ctx: CommandContext,
  options: StatusOptions = {},
  deps: PassDependencies = {}
): Promise<CommandResult<UnitReport>> {
  const { options: globalOpts, outputFormat, settings } = ctx;
  verbose(`Reading state from ${settings.stateFile}`, globalOpts.verbose);

  const context = await openContext(ctx, deps);
  const report: UnitReport = {
    unit: context.unit.name,
    leader: context.unit.isLeader,
    status: { ...context.status },
    relations: context.relations.list().map((state) => ({
      name: state.relationName,
      status: state.status,
      peers: [...state.peerUnitIds].sort(),
      reason: state.reason,
    })),
    // Secret values are never reported here; use get-password
    credentials: context.secrets.principals().flatMap((principal) => {
      const credential = context.secrets.get(principal);
      return credential ? [{ principal, version: credential.version, rotatedBy: credential.rotatedBy }] : [];
    }),
    tls: context.secrets.tlsRelations().flatMap((relation) => {
      const material = context.secrets.tlsMaterial(relation);
      return material
        ? [{ relation, version: material.version, signed: material.signedCertificate !== undefined }]
        : [];
    }),
    running: context.applied.running,
    restartPending: context.applied.restartPending,
    pendingIntents: context.secrets.pendingIntents().length,
  };
  if (options.audit) {
    report.audit = context.secrets.auditLog();
  }

  const statusLine = report.status.message ? `${report.status.level}: ${report.status.message}` : report.status.level;

  if (outputFormat === 'human') {
    header(`Unit ${report.unit}`);
    printStatus(
      {
        Status: statusLine,
        Leader: report.leader,
        Running: report.running,
        'Restart pending': report.restartPending,
        Credentials: report.credentials.map((c) => `${c.principal}@v${c.version}`).join(', ') || undefined,
        TLS: report.tls.map((t) => `${t.relation}@v${t.version}${t.signed ? '' : ' (unsigned)'}`).join(', ') || undefined,
      },
      'human'
    );
    header('Relations');
    printRelations(report.relations);
    if (report.audit) {
      header('Audit');
      for (const entry of report.audit) {
        console.log(`  ${entry.timestamp} ${entry.action} ${entry.principal} v${entry.version} by ${entry.actor}`);
      }
    }
  }

  return {
    success: true,
    message: `${report.unit} is ${statusLine}`,
    data: report,
  };
}
