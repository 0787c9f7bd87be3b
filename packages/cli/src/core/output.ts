/**
 * Command results: the `--json` envelope on stdout, or terminal lines
 */

import chalk from 'chalk';
import type { ConversationItem, JsonObject } from '@sessionkeep/types';
import type { CommandOutput } from './types.js';
import { toCLIError } from './errors.js';

const ITEM_PREVIEW_CHARS = 120;

export class OutputFormatter {
  private readonly startedAt = Date.now();
  private configPath: string | undefined;

  constructor(
    private readonly json: boolean,
    private readonly command: string,
    private readonly version: string,
  ) {}

  setConfigPath(configPath: string | undefined): void {
    this.configPath = configPath;
  }

  /**
   * Terminal-only progress line; JSON mode prints the envelope and nothing else
   */
  note(message: string): void {
    if (!this.json) {
      terminal.info(message);
    }
  }

  /**
   * Print `data` as the envelope payload, or hand it to `render`
   */
  emit<T>(data: T, render: (data: T) => void): void {
    if (this.json) {
      this.write({ ok: true, command: this.command, data, meta: this.meta() });
      return;
    }
    render(data);
  }

  /**
   * Report a failed command and set the process exit code from it
   */
  fail(thrown: unknown): void {
    const error = toCLIError(thrown);
    process.exitCode = error.exitCode;

    if (this.json) {
      this.write({
        ok: false,
        command: this.command,
        error: { code: error.code, message: error.message, details: error.details },
        meta: this.meta(),
      });
      return;
    }

    console.error(chalk.red.bold(`✗ ${error.message}`), chalk.dim(`[${error.code}]`));
    if (error.suggestion) {
      console.error(chalk.yellow(error.suggestion));
    }
  }

  private write(envelope: CommandOutput): void {
    console.log(JSON.stringify(envelope, null, 2));
  }

  private meta(): CommandOutput['meta'] {
    return {
      timestamp: new Date().toISOString(),
      version: this.version,
      config_path: this.configPath,
      duration_ms: Date.now() - this.startedAt,
    };
  }
}

/**
 * Line helpers for terminal output
 */
export const terminal = {
  ok(message: string): void {
    console.log(chalk.green('✓'), message);
  },

  info(message: string): void {
    console.log(chalk.blue('ℹ'), message);
  },

  warn(message: string): void {
    console.log(chalk.yellow('⚠'), message);
  },

  section(title: string): void {
    console.log();
    console.log(chalk.bold(title));
  },

  field(label: string, value: string | number): void {
    console.log(`  ${chalk.cyan(label)}: ${value}`);
  },

  line(text: string): void {
    console.log(`  ${text}`);
  },
};

/**
 * Epoch seconds (fractional) as an ISO 8601 timestamp
 */
export function formatEpoch(seconds: number): string {
  return new Date(seconds * 1000).toISOString();
}

/**
 * One conversation item on one line. Items shaped `{ role, content }` with
 * string content print as `role: content`; anything else prints as JSON.
 */
export function formatItem(item: ConversationItem): string {
  const { role, content } = item;
  if (typeof role === 'string' && typeof content === 'string') {
    return `${chalk.bold(role)}: ${preview(content)}`;
  }
  return preview(JSON.stringify(item));
}

function preview(text: string): string {
  return text.length > ITEM_PREVIEW_CHARS ? `${text.slice(0, ITEM_PREVIEW_CHARS - 1)}…` : text;
}

export function renderSessionIds(title: string, sessionIds: readonly string[]): void {
  terminal.section(`${title} (${sessionIds.length})`);
  for (const sessionId of sessionIds) {
    terminal.line(chalk.cyan(sessionId));
  }
}

export function renderItems(title: string, items: readonly ConversationItem[]): void {
  if (items.length === 0) {
    return;
  }
  terminal.section(title);
  items.forEach((item, index) => {
    terminal.line(`${chalk.dim(String(index + 1).padStart(3))} ${formatItem(item)}`);
  });
}

export function renderContext(context: JsonObject | null): void {
  terminal.section('Context');
  if (!context) {
    terminal.line(chalk.dim('(none)'));
    return;
  }
  for (const line of JSON.stringify(context, null, 2).split('\n')) {
    terminal.line(line);
  }
}
