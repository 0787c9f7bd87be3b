/**
 * sessionkeep sessions cleanup command
 */

import { OutputFormatter, terminal } from '../../core/output.js';
import { defaultCommandContext, withManager, type CommandContext } from '../../core/context.js';
import type { GlobalOptions } from '../../core/types.js';
import { getVersion } from '../../cli.js';

export async function cleanupSessionsCommand(
  options: GlobalOptions,
  context: CommandContext = defaultCommandContext,
): Promise<void> {
  const output = new OutputFormatter(options.json ?? false, 'sessions cleanup', getVersion());

  try {
    const { config, configPath } = context.loadConfig(options.config);
    output.setConfigPath(configPath);

    const result = await withManager(context, config, (manager) => manager.cleanupExpired());

    output.emit({ expired_contexts: result.expiredContexts }, (data) => {
      terminal.ok('Cleanup complete');
      terminal.field('Expired contexts observed', data.expired_contexts);
    });
  } catch (error) {
    output.fail(error);
  }
}
