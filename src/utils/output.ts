import chalk from 'chalk';
import ora from 'ora';
import type { GlobalFlags } from './flags.js';
import type { ProgressObserver, TransferProgress } from '../sync/types.js';

/**
 * Human-facing output: spinner, transfer progress and the pass summary.
 * Status messages go to stderr so stdout stays clean for piping.
 */
export class Output {
  private flags: GlobalFlags;
  private spinner: ReturnType<typeof ora> | null = null;

  constructor(flags: GlobalFlags) {
    this.flags = flags;
  }

  private get interactive(): boolean {
    return this.flags.output === 'text' && !this.flags.quiet && process.stderr.isTTY === true;
  }

  /**
   * Start a spinner (only shown in text mode, non-quiet, TTY).
   */
  startSpinner(message: string): void {
    if (this.interactive) {
      this.spinner = ora({ text: message, stream: process.stderr }).start();
    }
  }

  stopSpinner(): void {
    this.spinner?.stop();
    this.spinner = null;
  }

  succeedSpinner(message: string): void {
    if (this.spinner) {
      this.spinner.succeed(message);
      this.spinner = null;
    } else if (this.flags.output === 'text' && !this.flags.quiet) {
      process.stderr.write(chalk.green('✓') + ' ' + message + '\n');
    }
  }

  failSpinner(message: string): void {
    if (this.spinner) {
      this.spinner.fail(message);
      this.spinner = null;
    } else {
      process.stderr.write(chalk.red('✖') + ' ' + message + '\n');
    }
  }

  /**
   * Print a status/info message to stderr (never captured by piping).
   */
  status(message: string): void {
    if (!this.flags.quiet) {
      process.stderr.write(message + '\n');
    }
  }

  error(message: string): void {
    process.stderr.write(chalk.red(message) + '\n');
  }

  /**
   * Output a single record: key-value lines in text mode, one JSON object otherwise.
   */
  record(data: Record<string, unknown>): void {
    if (this.flags.output === 'json') {
      process.stdout.write(JSON.stringify(data) + '\n');
      return;
    }
    if (!this.flags.quiet) {
      this.printKeyValue(data);
    }
  }

  /**
   * Progress observer rendering one carriage-return line per transfer.
   * Inert unless stderr is an interactive terminal.
   */
  progressObserver(): ProgressObserver {
    return {
      onProgress: (progress: TransferProgress) => {
        if (!this.interactive) return;
        process.stderr.write('\r' + formatProgress(progress));
      },
      onComplete: () => {
        if (!this.interactive) return;
        process.stderr.write('\n');
      },
    };
  }

  private printKeyValue(data: Record<string, unknown>): void {
    const maxKeyLen = Math.max(...Object.keys(data).map(k => k.length));
    for (const [key, value] of Object.entries(data)) {
      const label = key.charAt(0).toUpperCase() + key.slice(1);
      const padding = ' '.repeat(Math.max(0, maxKeyLen - key.length + 1));
      const displayValue = value === null || value === undefined
        ? chalk.dim('none')
        : Array.isArray(value) ? value.join(', ') || chalk.dim('none') : String(value);
      process.stdout.write(`${label}:${padding}${displayValue}\n`);
    }
  }
}

export function formatProgress(progress: TransferProgress): string {
  const { key, bytesTransferred, totalBytes } = progress;
  if (totalBytes <= 0) {
    return `${key}  ${bytesTransferred} bytes`;
  }
  const percentage = (bytesTransferred / totalBytes) * 100;
  return `${key}  ${bytesTransferred} / ${totalBytes}  (${percentage.toFixed(2)}%)`;
}

export function createOutput(flags: GlobalFlags): Output {
  return new Output(flags);
}

/**
 * Standard error handler for commands.
 * Prints error to stderr and sets exit code.
 */
export function handleError(out: Output, err: unknown, spinnerMessage?: string): void {
  if (spinnerMessage) {
    out.failSpinner(spinnerMessage);
  }
  const message = err instanceof Error ? err.message : String(err);
  out.error(message);
  process.exitCode = 1;
}
