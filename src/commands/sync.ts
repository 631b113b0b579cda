import path from 'node:path';
import { InvalidArgumentError, type Command } from 'commander';
import chalk from 'chalk';
import { loadConfig, type CliConfig } from '../config.js';
import { addGlobalFlags, resolveFlags, type GlobalFlags } from '../utils/flags.js';
import { createOutput, type Output } from '../utils/output.js';
import { Logger, parseLogLevel, type LogLevel } from '../utils/logger.js';
import { SetupError, errorMessage, isFatal } from '../sync/errors.js';
import { isRemotePath, parseRemotePath } from '../sync/keys.js';
import { buildTemplates } from '../sync/metadata.js';
import { resolveIgnorePatterns } from '../sync/ignore.js';
import { formatPlan } from '../sync/diff.js';
import { SyncOrchestrator } from '../sync/engine.js';
import { parseInterval, runAutosync } from '../sync/scheduler.js';
import { S3Store, createS3Client } from '../lib/s3-store.js';
import type { RemotePath, RemoteStore, SyncDirection, SyncResult } from '../sync/types.js';

export interface SyncPaths {
  direction: SyncDirection;
  local: string;
  remote: RemotePath;
}

export interface SyncCommandDeps {
  /** Build the remote store for a bucket; defaults to an S3Store */
  createStore?: (bucket: string, config: CliConfig) => RemoteStore;
  /** Signal ending an autosync loop; defaults to SIGINT/SIGTERM */
  signal?: AbortSignal;
}

/**
 * Work out the sync direction from which argument carries the s3:// scheme.
 */
export function resolveSyncPaths(source: string, destination: string): SyncPaths {
  const sourceRemote = isRemotePath(source);
  const destinationRemote = isRemotePath(destination);
  if (sourceRemote === destinationRemote) {
    throw new SetupError('Exactly one of <source> and <destination> must be an s3:// path');
  }
  return sourceRemote
    ? { direction: 'download', local: destination, remote: parseRemotePath(source) }
    : { direction: 'upload', local: source, remote: parseRemotePath(destination) };
}

function parseInteger(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parseInt(value, 10);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' ? value : undefined;
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

/**
 * Apply command-line flags on top of the resolved config.
 */
export function applyFlags(config: CliConfig, opts: Record<string, unknown>): CliConfig {
  const merged: CliConfig = { ...config };
  const region = optionalString(opts.region);
  const endpoint = optionalString(opts.endpoint);
  const profile = optionalString(opts.profile);
  const cacheDir = optionalString(opts.cacheDir);
  const cacheFile = optionalString(opts.cacheFile);
  const logDir = optionalString(opts.logDir);
  const log = optionalString(opts.log);
  const dirMode = optionalNumber(opts.metaDirMode);
  const fileMode = optionalNumber(opts.metaFileMode);

  if (region) merged.region = region;
  if (endpoint) merged.endpoint = endpoint;
  if (opts.pathStyle === true) merged.forcePathStyle = true;
  if (profile) merged.profile = profile;
  if (opts.cache === true || cacheDir || cacheFile) merged.cacheEnabled = true;
  if (cacheDir) merged.cacheDir = cacheDir;
  if (cacheFile) merged.cacheFile = cacheFile;
  if (logDir) merged.logDir = logDir;
  if (dirMode !== undefined) merged.dirMode = dirMode;
  if (fileMode !== undefined) merged.fileMode = fileMode;
  if (log) {
    try {
      merged.logLevel = parseLogLevel(log);
    } catch (err) {
      throw new SetupError(errorMessage(err), err);
    }
  }
  return merged;
}

function effectiveLevel(level: LogLevel, flags: GlobalFlags): LogLevel {
  return flags.quiet && (level === 'debug' || level === 'info' || level === 'warning') ? 'error' : level;
}

function reportResult(out: Output, result: SyncResult): void {
  out.record({
    direction: result.direction,
    planned: result.planned.length,
    transferred: result.transferred,
    bytes: result.bytesTransferred,
    failed: result.failed.length,
    mismatched: result.mismatched.length,
    prefixesCreated: result.prefixesCreated,
    prefixesUpdated: result.prefixesUpdated,
    dryRun: result.dryRun,
  });
}

function defaultStore(bucket: string, config: CliConfig): RemoteStore {
  return new S3Store({
    bucket,
    client: createS3Client({
      region: config.region,
      endpoint: config.endpoint,
      forcePathStyle: config.forcePathStyle,
      profile: config.profile,
    }),
  });
}

/**
 * Run a sync from the parsed command line. Setup errors set exit code 1;
 * per-key failures are logged and leave it at 0.
 */
export async function executeSync(
  source: string,
  destination: string,
  opts: Record<string, unknown>,
  deps: SyncCommandDeps = {},
): Promise<SyncResult[]> {
  const flags = resolveFlags(opts);
  const out = createOutput(flags);
  const results: SyncResult[] = [];

  let logger: Logger | undefined;
  try {
    const config = applyFlags(loadConfig(), opts);
    logger = new Logger({ level: effectiveLevel(config.logLevel, flags), logDir: config.logDir });

    const paths = resolveSyncPaths(source, destination);
    const overrides = { uid: optionalNumber(opts.uid), gid: optionalNumber(opts.gid) };
    const templates = buildTemplates({
      json: optionalString(opts.metadata),
      dirMode: config.dirMode,
      fileMode: config.fileMode,
      overrides,
      defaultUid: process.geteuid?.() ?? 0,
      defaultGid: process.getegid?.() ?? 0,
      now: Math.floor(Date.now() / 1000),
    });
    const intervalMinutes = parseInterval(optionalString(opts.interval));
    const store = (deps.createStore ?? defaultStore)(paths.remote.bucket, config);

    const orchestrator = new SyncOrchestrator({
      local: paths.local,
      remote: paths.remote,
      direction: paths.direction,
      store,
      templates,
      overrides,
      force: opts.force === true,
      dryRun: flags.dryRun,
      cacheFile: config.cacheEnabled ? path.join(config.cacheDir, config.cacheFile) : undefined,
      ignorePatterns: resolveIgnorePatterns(stringList(opts.exclude), paths.local),
      logger: logger.child(paths.direction),
      observer: out.progressObserver(),
      onPhase: (phase) => logger?.debug(`phase: ${phase}`),
      onPlan: (plan) => {
        if (flags.dryRun && flags.output === 'text') out.status(formatPlan(plan));
      },
    });

    if (!intervalMinutes) {
      const result = await orchestrator.runPass();
      results.push(result);
      reportResult(out, result);
      return results;
    }

    const controller = new AbortController();
    const stop = () => controller.abort();
    const signal = deps.signal ?? controller.signal;
    if (!deps.signal) {
      process.once('SIGINT', stop);
      process.once('SIGTERM', stop);
    }
    logger.info(`autosync every ${intervalMinutes} minute(s), interrupt to stop`);
    try {
      await runAutosync(orchestrator, {
        intervalMinutes,
        signal,
        logger,
        onResult: (result) => {
          results.push(result);
          reportResult(out, result);
        },
        onSleep: (until) => out.startSpinner(`next sync at ${until.toLocaleTimeString()}`),
        onWake: () => out.stopSpinner(),
      });
    } finally {
      process.removeListener('SIGINT', stop);
      process.removeListener('SIGTERM', stop);
    }
    return results;
  } catch (err) {
    out.stopSpinner();
    const message = errorMessage(err);
    if (logger) {
      if (isFatal(err)) logger.critical(message);
      else logger.error(message);
    } else {
      out.error(message);
    }
    process.exitCode = 1;
    return results;
  }
}

export function registerSyncCommand(program: Command): void {
  addGlobalFlags(program
    .argument('<source>', 'Local path or s3://bucket/key to sync from')
    .argument('<destination>', 'Local path or s3://bucket/key to sync to')
    .option('-f, --force', 'Transfer everything, ignoring the cache and the remote listing')
    .option('-m, --metadata <json>', 'JSON metadata for created prefixes, e.g. \'{"uid": 1000}\'')
    .option('--meta-dir-mode <mode>', 'Mode for created prefixes and for directories when none is found locally (default: 509)', parseInteger)
    .option('--meta-file-mode <mode>', 'Mode for files when none is found locally (default: 33204)', parseInteger)
    .option('--uid <uid>', 'Owner uid written to every key', parseInteger)
    .option('--gid <gid>', 'Owner gid written to every key', parseInteger)
    .option('-p, --profile <name>', 'AWS shared config profile')
    .option('--region <region>', 'Bucket region')
    .option('--endpoint <url>', 'S3-compatible endpoint URL')
    .option('--path-style', 'Use path-style bucket addressing')
    .option('-c, --cache', 'Use the local fingerprint cache')
    .option('--cache-dir <dir>', 'Fingerprint cache directory (implies --cache)')
    .option('--cache-file <name>', 'Fingerprint cache file name (implies --cache)')
    .option('-i, --interval <minutes>', 'Repeat the sync every N minutes until interrupted')
    .option('-e, --exclude <patterns...>', 'Glob patterns to skip, relative to the local root')
    .option('-l, --log <level>', 'Log level: debug, info, warning, error, critical')
    .option('--log-dir <dir>', 'Also write logs to <dir>/metasync.log'))
    .addHelpText('after', `
EXAMPLES
  metasync ./photos s3://my-bucket/home/user/photos/
  metasync s3://my-bucket/home/user/photos/ ./photos --cache
  metasync ./notes.txt s3://my-bucket/home/user/ --uid 1000 --gid 1000
  metasync ./data s3://my-bucket/data/ --interval 15 --log-dir ~/.metasync/logs

Direction is inferred from which argument is an s3:// path.
${chalk.dim('Keys ending in / are directories; their parents are created with --metadata.')}`)
    .action(async (source: string, destination: string, opts: Record<string, unknown>) => {
      await executeSync(source, destination, opts);
    });
}
