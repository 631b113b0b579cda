import type { Command } from 'commander';
import chalk from 'chalk';

export type OutputFormat = 'text' | 'json';

export interface GlobalFlags {
  output: OutputFormat;
  quiet: boolean;
  noColor: boolean;
  dryRun: boolean;
}

/**
 * Add the output flags shared by every action command.
 */
export function addGlobalFlags(cmd: Command): Command {
  return cmd
    .option('-o, --output <format>', 'Summary format: text, json (default: auto)')
    .option('-q, --quiet', 'Minimal output (errors only)')
    .option('--no-color', 'Disable colored output')
    .option('--dry-run', 'Show the sync plan without transferring anything');
}

/**
 * Resolve global flags from parsed options, applying TTY detection defaults.
 */
export function resolveFlags(opts: Record<string, unknown>): GlobalFlags {
  const isTTY = process.stdout.isTTY ?? false;
  const noColor = opts.noColor === true || opts.color === false;
  const requested = typeof opts.output === 'string' ? opts.output : undefined;
  const output: OutputFormat = requested === 'json' || requested === 'text'
    ? requested
    : isTTY ? 'text' : 'json';

  if (noColor) {
    chalk.level = 0;
  }

  return {
    output,
    quiet: opts.quiet === true,
    noColor,
    dryRun: opts.dryRun === true,
  };
}
