/**
 * sessionkeep sessions delete command
 */

import { OutputFormatter, terminal } from '../../core/output.js';
import { defaultCommandContext, withManager, type CommandContext } from '../../core/context.js';
import type { GlobalOptions } from '../../core/types.js';
import { getVersion } from '../../cli.js';

export async function deleteSessionCommand(
  sessionId: string,
  options: GlobalOptions,
  context: CommandContext = defaultCommandContext,
): Promise<void> {
  const output = new OutputFormatter(options.json ?? false, 'sessions delete', getVersion());

  try {
    const { config, configPath } = context.loadConfig(options.config);
    output.setConfigPath(configPath);

    const result = await withManager(context, config, (manager) =>
      manager.deleteEverything(sessionId),
    );

    const report = {
      session_id: sessionId,
      messages_deleted: result.messagesDeleted,
      context_deleted: result.contextDeleted,
    };

    output.emit(report, (data) => {
      if (!data.messages_deleted && !data.context_deleted) {
        terminal.warn(`Nothing stored for session ${data.session_id}`);
        return;
      }
      terminal.ok(`Deleted session ${data.session_id}`);
      terminal.field('Messages', data.messages_deleted ? 'deleted' : 'none');
      terminal.field('Context', data.context_deleted ? 'deleted' : 'none');
    });
  } catch (error) {
    output.fail(error);
  }
}
