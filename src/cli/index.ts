#!/usr/bin/env node
import { program } from 'commander';

import packageJson from '../../package.json' with { type: 'json' };
import { backupCommand, backupsCommand, removeBackupCommand, restoreCommand } from './commands/backup.js';
import type { BackupCommandOptions, RemoveBackupCommandOptions, RestoreCommandOptions } from './commands/backup.js';
import { checkCommand } from './commands/check.js';
import { deployCommand } from './commands/deploy.js';
import type { DeployCommandOptions } from './commands/deploy.js';
import { destroyCommand } from './commands/destroy.js';
import { keysCommand } from './commands/keys.js';
import { rebootCommand, startCommand, stopCommand } from './commands/power.js';
import type { RebootCommandOptions } from './commands/power.js';
import { validateCommand } from './commands/validate.js';
import type { CommonOptions, ConfirmingOptions } from './session.js';

program
  .name('vmconverge')
  .description('Converge declared Azure virtual machines and their disks')
  .version(packageJson.version)
  .option('--verbose', 'Print Azure calls and remote commands before execution');

const VERBOSE_DESC = 'Print Azure calls and remote commands before execution';
const YES_DESC = 'Answer yes to every confirmation';

/**
 * Merge the global --verbose flag into command-level options.
 * Supports both positions:
 *   vmconverge --verbose deploy file    (parent parses --verbose)
 *   vmconverge deploy file --verbose    (subcommand parses --verbose)
 */
function withGlobalOpts<T extends CommonOptions>(opts: T): T {
  const globalOpts = program.opts<{ verbose?: boolean }>();
  return { ...opts, verbose: opts.verbose === true || globalOpts.verbose === true };
}

program
  .command('validate <file>')
  .description('Validate the deployment file without contacting Azure')
  .option('--json', 'Output as JSON')
  .action((file: string, opts: CommonOptions) => validateCommand(file, opts));

program
  .command('deploy <file> [machines...]')
  .description('Create or update machines to match the deployment file')
  .option('--check', 'Compare the state record with the live resources first')
  .option('--allow-reboot', 'Allow changes that reboot a machine')
  .option('--allow-recreate', 'Allow destroying and re-creating a machine')
  .option('-y, --yes', YES_DESC)
  .option('--json', 'Output as JSON')
  .option('--verbose', VERBOSE_DESC)
  .action((file: string, machines: string[], opts: DeployCommandOptions) =>
    deployCommand(file, machines, withGlobalOpts(opts))
  );

program
  .command('check <file> [machines...]')
  .description('Check deployed machines against the live resources')
  .option('--json', 'Output as JSON')
  .option('--verbose', VERBOSE_DESC)
  .action((file: string, machines: string[], opts: CommonOptions) =>
    checkCommand(file, machines, withGlobalOpts(opts))
  );

program
  .command('start <file> [machines...]')
  .description('Start deployed machines')
  .option('--json', 'Output as JSON')
  .option('--verbose', VERBOSE_DESC)
  .action((file: string, machines: string[], opts: CommonOptions) =>
    startCommand(file, machines, withGlobalOpts(opts))
  );

program
  .command('stop <file> [machines...]')
  .description('Power off deployed machines')
  .option('--json', 'Output as JSON')
  .option('--verbose', VERBOSE_DESC)
  .action((file: string, machines: string[], opts: CommonOptions) =>
    stopCommand(file, machines, withGlobalOpts(opts))
  );

program
  .command('reboot <file> [machines...]')
  .description('Reboot deployed machines over ssh, or reset them with --hard')
  .option('--hard', 'Reset through the Azure API instead of rebooting the OS')
  .option('--json', 'Output as JSON')
  .option('--verbose', VERBOSE_DESC)
  .action((file: string, machines: string[], opts: RebootCommandOptions) =>
    rebootCommand(file, machines, withGlobalOpts(opts))
  );

program
  .command('destroy <file> [machines...]')
  .description('Destroy machines, their network resources and ephemeral disks')
  .option('-y, --yes', YES_DESC)
  .option('--json', 'Output as JSON')
  .option('--verbose', VERBOSE_DESC)
  .action((file: string, machines: string[], opts: ConfirmingOptions) =>
    destroyCommand(file, machines, withGlobalOpts(opts))
  );

program
  .command('backup <file> [machines...]')
  .description('Snapshot every disk of the deployed machines')
  .option('--id <id>', 'Backup id (default: current UTC time)')
  .option('--json', 'Output as JSON')
  .option('--verbose', VERBOSE_DESC)
  .action((file: string, machines: string[], opts: BackupCommandOptions) =>
    backupCommand(file, machines, withGlobalOpts(opts))
  );

program
  .command('restore <file> [machines...]')
  .description('Restore disks from a backup and provision the machines again')
  .requiredOption('--id <id>', 'Backup id')
  .option('--devices <devices...>', 'Disk ids, names or device paths to restore (default: all)')
  .option('-y, --yes', YES_DESC)
  .option('--json', 'Output as JSON')
  .option('--verbose', VERBOSE_DESC)
  .action((file: string, machines: string[], opts: RestoreCommandOptions) =>
    restoreCommand(file, machines, withGlobalOpts(opts))
  );

program
  .command('remove-backup <file> [machines...]')
  .description('Delete the snapshots of a backup')
  .requiredOption('--id <id>', 'Backup id')
  .option('--json', 'Output as JSON')
  .option('--verbose', VERBOSE_DESC)
  .action((file: string, machines: string[], opts: RemoveBackupCommandOptions) =>
    removeBackupCommand(file, machines, withGlobalOpts(opts))
  );

program
  .command('backups <file> [machines...]')
  .description('List recorded backups and whether they can be restored')
  .option('--json', 'Output as JSON')
  .option('--verbose', VERBOSE_DESC)
  .action((file: string, machines: string[], opts: CommonOptions) =>
    backupsCommand(file, machines, withGlobalOpts(opts))
  );

program
  .command('keys <file> [machines...]')
  .description('Print generated disk encryption keys')
  .option('--json', 'Output as JSON')
  .action((file: string, machines: string[], opts: CommonOptions) => keysCommand(file, machines, opts));

await program.parseAsync();
