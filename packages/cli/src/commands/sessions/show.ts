/**
 * sessionkeep sessions show command
 */

import {
  OutputFormatter,
  formatEpoch,
  renderContext,
  renderItems,
  terminal,
} from '../../core/output.js';
import { defaultCommandContext, withManager, type CommandContext } from '../../core/context.js';
import { SessionNotFoundError } from '../../core/errors.js';
import type { GlobalOptions } from '../../core/types.js';
import { getVersion } from '../../cli.js';

interface ShowOptions extends GlobalOptions {
  limit?: number;
}

export async function showSessionCommand(
  sessionId: string,
  options: ShowOptions,
  context: CommandContext = defaultCommandContext,
): Promise<void> {
  const output = new OutputFormatter(options.json ?? false, 'sessions show', getVersion());

  try {
    const { config, configPath } = context.loadConfig(options.config);
    output.setConfigPath(configPath);

    const details = await withManager(context, config, async (manager) => {
      const overview = await manager.overview(sessionId);
      if (!overview.hasMessages && !overview.hasContext) {
        throw new SessionNotFoundError(sessionId);
      }
      return {
        session_id: sessionId,
        created_at: overview.sessionInfo?.createdAt ?? null,
        updated_at: overview.sessionInfo?.updatedAt ?? null,
        size: await manager.log.size(sessionId),
        items: await manager.log.read(sessionId, options.limit),
        context: overview.context,
      };
    });

    output.emit(details, (data) => {
      terminal.section(`Session ${data.session_id}`);
      if (data.created_at !== null && data.updated_at !== null) {
        terminal.field('Created', formatEpoch(data.created_at));
        terminal.field('Updated', formatEpoch(data.updated_at));
      }
      terminal.field('Items', data.size);
      renderItems(
        options.limit !== undefined ? `Last ${data.items.length} item(s)` : 'Items',
        data.items,
      );
      renderContext(data.context);
    });
  } catch (error) {
    output.fail(error);
  }
}
