/**
 * Main CLI program definition using Commander.js
 */

import { Command, InvalidArgumentError } from 'commander';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { defaultCommandContext, type CommandContext } from './core/context.js';
import type { GlobalOptions } from './core/types.js';

// Get CLI version from package.json
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJson: { version: string } = JSON.parse(
  readFileSync(join(__dirname, '../package.json'), 'utf-8'),
);

/**
 * Parse a non-negative integer option value
 */
export function parseLimit(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('Must be a non-negative integer.');
  }
  return Number.parseInt(value, 10);
}

export function createProgram(context: CommandContext = defaultCommandContext): Command {
  const program = new Command();
  const globals = (): GlobalOptions => program.opts<GlobalOptions>();

  program
    .name('sessionkeep')
    .description('Inspect and maintain agent session state')
    .version(packageJson.version)
    .option('--json', 'Output results as JSON')
    .option('-c, --config <path>', 'Path to sessionkeep.toml');

  // Session subcommands
  const sessionsCmd = program.command('sessions').description('Inspect stored sessions');

  sessionsCmd
    .command('list')
    .description('List sessions with stored messages or context')
    .option('-p, --pattern <glob>', 'Only sessions whose id matches the glob')
    .action(async (options: { pattern?: string }) => {
      const { listSessionsCommand } = await import('./commands/sessions/list.js');
      await listSessionsCommand({ ...globals(), ...options }, context);
    });

  sessionsCmd
    .command('show <sessionId>')
    .description('Show metadata, items and context of one session')
    .option('-n, --limit <count>', 'Only the most recent items', parseLimit)
    .action(async (sessionId: string, options: { limit?: number }) => {
      const { showSessionCommand } = await import('./commands/sessions/show.js');
      await showSessionCommand(sessionId, { ...globals(), ...options }, context);
    });

  sessionsCmd
    .command('delete <sessionId>')
    .description('Delete messages, metadata and context of one session')
    .action(async (sessionId: string) => {
      const { deleteSessionCommand } = await import('./commands/sessions/delete.js');
      await deleteSessionCommand(sessionId, globals(), context);
    });

  sessionsCmd
    .command('cleanup')
    .description('Count context keys that have already expired')
    .action(async () => {
      const { cleanupSessionsCommand } = await import('./commands/sessions/cleanup.js');
      await cleanupSessionsCommand(globals(), context);
    });

  // Config subcommands
  const configCmd = program.command('config').description('Configuration management');

  configCmd
    .command('validate')
    .description('Validate sessionkeep.toml configuration')
    .action(async () => {
      const { validateCommand } = await import('./commands/config/validate.js');
      await validateCommand(globals(), context);
    });

  // Top-level commands
  program
    .command('ping')
    .description('Check that the configured store is reachable')
    .action(async () => {
      const { pingCommand } = await import('./commands/ping.js');
      await pingCommand(globals(), context);
    });

  return program;
}

/**
 * Get CLI version
 */
export function getVersion(): string {
  return packageJson.version;
}
