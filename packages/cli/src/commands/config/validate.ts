/**
 * sessionkeep config validate command
 */

import { OutputFormatter, terminal } from '../../core/output.js';
import { defaultCommandContext, type CommandContext } from '../../core/context.js';
import { ConfigValidationError } from '../../core/errors.js';
import type { GlobalOptions } from '../../core/types.js';
import { getVersion } from '../../cli.js';

export async function validateCommand(
  options: GlobalOptions,
  context: CommandContext = defaultCommandContext,
): Promise<void> {
  const output = new OutputFormatter(options.json ?? false, 'config validate', getVersion());

  try {
    const { configPath, result } = context.checkConfigFile(options.config);
    output.setConfigPath(configPath);

    output.note(`Validating configuration: ${configPath}`);

    if (!result.valid) {
      throw new ConfigValidationError(result.errors.join(', '), result.errors);
    }

    output.emit(
      { config_path: configPath, valid: true, warnings: result.warnings },
      (data) => {
        terminal.ok('Configuration is valid');
        for (const warning of data.warnings) {
          terminal.warn(warning);
        }
        terminal.field('Config path', data.config_path);
      },
    );
  } catch (error) {
    output.fail(error);
  }
}
