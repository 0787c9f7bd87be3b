/**
 * sessionkeep ping command
 * Check that the configured store answers
 */

import { OutputFormatter, terminal } from '../core/output.js';
import { defaultCommandContext, withManager, type CommandContext } from '../core/context.js';
import { StoreUnreachableError } from '../core/errors.js';
import type { GlobalOptions } from '../core/types.js';
import { getVersion } from '../cli.js';

export async function pingCommand(
  options: GlobalOptions,
  context: CommandContext = defaultCommandContext,
): Promise<void> {
  const output = new OutputFormatter(options.json ?? false, 'ping', getVersion());

  try {
    const { config, configPath } = context.loadConfig(options.config);
    output.setConfigPath(configPath);

    const health = await withManager(context, config, (manager) => manager.healthCheck());
    if (!health.healthy) {
      throw new StoreUnreachableError(health.store);
    }

    output.emit(
      { healthy: true, store: health.store, latency_ms: health.latencyMs },
      (data) => terminal.ok(`Store is reachable (${data.store}, ${data.latency_ms}ms)`),
    );
  } catch (error) {
    output.fail(error);
  }
}
