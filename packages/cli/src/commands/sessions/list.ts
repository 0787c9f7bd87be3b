/**
 * sessionkeep sessions list command
 */

import { OutputFormatter, renderSessionIds, terminal } from '../../core/output.js';
import { defaultCommandContext, withManager, type CommandContext } from '../../core/context.js';
import type { GlobalOptions } from '../../core/types.js';
import { getVersion } from '../../cli.js';

interface ListOptions extends GlobalOptions {
  pattern?: string;
}

type SessionsListing =
  | { pattern: string; total_sessions: number; session_ids: string[] }
  | {
      total_sessions: number;
      sessions_with_messages: number;
      sessions_with_contexts: number;
      session_ids: string[];
    };

export async function listSessionsCommand(
  options: ListOptions,
  context: CommandContext = defaultCommandContext,
): Promise<void> {
  const output = new OutputFormatter(options.json ?? false, 'sessions list', getVersion());

  try {
    const { config, configPath } = context.loadConfig(options.config);
    output.setConfigPath(configPath);

    const listing = await withManager<SessionsListing>(context, config, async (manager) => {
      if (options.pattern) {
        const sessionIds = await manager.log.listSessions(options.pattern);
        return { pattern: options.pattern, total_sessions: sessionIds.length, session_ids: sessionIds };
      }
      const all = await manager.listAllSessions();
      return {
        total_sessions: all.totalSessions,
        sessions_with_messages: all.sessionsWithMessages,
        sessions_with_contexts: all.sessionsWithContexts,
        session_ids: all.sessionIds,
      };
    });

    output.emit(listing, (data) => {
      if (data.total_sessions === 0) {
        terminal.info('No sessions found');
        return;
      }
      const title = 'pattern' in data ? `Sessions matching ${data.pattern}` : 'Sessions';
      renderSessionIds(title, data.session_ids);
      if ('sessions_with_messages' in data) {
        terminal.section('Counts');
        terminal.field('With messages', data.sessions_with_messages);
        terminal.field('With context', data.sessions_with_contexts);
      }
    });
  } catch (error) {
    output.fail(error);
  }
}
