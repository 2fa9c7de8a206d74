#!/usr/bin/env node
/**
 * karapace-lifecycle CLI - Relation and secret lifecycle for a schema registry unit
 *
 * Commands:
 * - handle: Run a reconciliation pass for a relation, config or status event
 * - set-password / get-password: Manage internal user credentials
 * - set-tls-private-key: Replace the TLS key and request a new certificate
 * - status: Show the persisted state of this unit
 */

import { Command, Option } from 'commander';
import {
  EVENT_TYPES,
  getPasswordCommand,
  handleCommand,
  setPasswordCommand,
  setTlsPrivateKeyCommand,
  statusCommand,
} from './commands/index.js';
import { resolveSettings } from './config/index.js';
import { formatError } from './errors.js';
import type { CommandContext, CommandResult, GlobalOptions } from './types.js';
import { error, printResult, verbose as verboseLog } from './utils/output.js';

const VERSION = '0.1.0';

/**
 * Create the command context from parsed options
 */
function createContext(options: GlobalOptions): CommandContext {
  const { settings, sources, configFile } = resolveSettings({ cli: options });

  if (options.verbose) {
    verboseLog(`Local config: ${configFile ?? '(none)'}`, true);
    for (const [name, source] of Object.entries(sources)) {
      verboseLog(`${name} resolved from ${source}`, true);
    }
  }

  return {
    options,
    outputFormat: options.json ? 'json' : 'human',
    settings,
    sources,
  };
}

/**
 * Run a command handler, print its result and exit with its status
 */
async function run<T>(
  label: string,
  handler: (ctx: CommandContext) => Promise<CommandResult<T>>
): Promise<void> {
  const globalOpts = program.opts<GlobalOptions>();
  try {
    const ctx = createContext(globalOpts);
    const result = await handler(ctx);
    printResult(result, ctx.outputFormat);
    process.exit(result.success ? 0 : 1);
  } catch (err) {
    error(`${label} failed: ${formatError(err)}`);
    process.exit(1);
  }
}

/**
 * Main CLI program
 */
const program = new Command()
  .name('karapace-lifecycle')
  .description('Relation and secret lifecycle controller for a Karapace schema registry unit')
  .version(VERSION)
  .addOption(new Option('--unit <name>', 'Unit name, e.g. karapace/0'))
  .addOption(new Option('--host <address>', 'Address this unit is reached on'))
  .addOption(new Option('--leader', 'Run as the leader unit'))
  .addOption(new Option('--state <path>', 'State file path'))
  .addOption(new Option('--conf-dir <path>', 'Configuration directory of the managed service'))
  .addOption(new Option('--config <path>', 'Local config file'))
  .addOption(new Option('--json', 'Output JSON for CI/automation').default(false))
  .addOption(new Option('-v, --verbose', 'Enable verbose logging').default(false));

interface HandleCliOptions {
  relation?: string;
  peer?: string;
  data?: string;
  eventsFile?: string;
}

/**
 * handle command - Reconcile after an external event
 */
program
  .command('handle')
  .description('Run a reconciliation pass for an event')
  .addArgument(program.createArgument('[event]', 'Event type').choices(EVENT_TYPES))
  .option('--relation <name>', 'Relation the event concerns')
  .option('--peer <id>', 'Remote unit or application')
  .option('--data <json>', 'Relation data as a JSON object of strings')
  .option('--events-file <path>', 'JSON file holding one event or a list of events')
  .action(async (event: string | undefined, cmdOpts: HandleCliOptions) => {
    await run('Handle', (ctx) => handleCommand(ctx, { event, ...cmdOpts }));
  });

/**
 * set-password command - Rotate an internal user's password
 */
program
  .command('set-password')
  .description('Change an internal user password (leader only)')
  .option('--username <name>', 'Internal user', 'operator')
  .option('--password <value>', 'New password; generated when omitted')
  .action(async (cmdOpts: { username?: string; password?: string }) => {
    await run('Set password', (ctx) => setPasswordCommand(ctx, cmdOpts));
  });

/**
 * get-password command - Show an internal user's password
 */
program
  .command('get-password')
  .description('Show an internal user password')
  .option('--username <name>', 'Internal user', 'operator')
  .action(async (cmdOpts: { username?: string }) => {
    await run('Get password', (ctx) => getPasswordCommand(ctx, cmdOpts));
  });

/**
 * set-tls-private-key command - Replace the TLS key
 */
program
  .command('set-tls-private-key')
  .description('Set the TLS private key and request a new certificate (leader only)')
  .option('--key <pem>', 'PEM or base64-encoded PEM key; generated when omitted')
  .option('--key-file <path>', 'File holding the key')
  .action(async (cmdOpts: { key?: string; keyFile?: string }) => {
    await run('Set TLS private key', (ctx) => setTlsPrivateKeyCommand(ctx, cmdOpts));
  });

/**
 * status command - Show current state
 */
program
  .command('status')
  .description('Show the persisted state of this unit')
  .option('--audit', 'Include the secret audit trail')
  .action(async (cmdOpts: { audit?: boolean }) => {
    await run('Status', (ctx) => statusCommand(ctx, cmdOpts));
  });

// Parse and execute
await program.parseAsync();
