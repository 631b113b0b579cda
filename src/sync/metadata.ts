/**
 * POSIX-style object metadata as understood by FUSE mounts of the bucket
 * (s3fs and friends read `uid`, `gid`, `mode` and `mtime` user metadata).
 */
import { z } from 'zod';
import { SetupError } from './errors.js';
import type { Entry } from './types.js';

export const DEFAULT_DIR_MODE = 509; // 0o775
export const DEFAULT_FILE_MODE = 33204; // 0o100664

const KNOWN_FIELDS = ['uid', 'gid', 'mode', 'mtime'] as const;
type KnownField = (typeof KNOWN_FIELDS)[number];
const KNOWN_FIELD_SET: ReadonlySet<string> = new Set(KNOWN_FIELDS);

export interface ObjectMetadata {
  uid?: number;
  gid?: number;
  mode?: number;
  mtime?: number;
  /** Unrecognised keys, carried through untouched */
  extra: Record<string, string>;
}

export interface OwnerOverrides {
  uid?: number;
  gid?: number;
}

export interface MetadataTemplates {
  directory: ObjectMetadata;
  file: ObjectMetadata;
}

export interface TemplateOptions {
  /** Raw JSON from the command line */
  json?: string;
  dirMode: number;
  fileMode: number;
  overrides: OwnerOverrides;
  defaultUid: number;
  defaultGid: number;
  /** Seconds; fixed for the lifetime of an orchestrator */
  now: number;
}

const metadataJsonSchema = z.record(z.union([z.string(), z.number()]));

function isKnownField(key: string): key is KnownField {
  return KNOWN_FIELD_SET.has(key);
}

function parseInteger(value: string): number | undefined {
  if (!/^-?\d+$/.test(value.trim())) return undefined;
  return parseInt(value, 10);
}

/**
 * Parse a raw string map (as returned by the store) into typed metadata.
 * Known fields that are not integers are kept in `extra` verbatim.
 */
export function fromMetadataRecord(record: Record<string, string>): ObjectMetadata {
  const meta: ObjectMetadata = { extra: {} };
  for (const [rawKey, value] of Object.entries(record)) {
    const key = rawKey.toLowerCase();
    const parsed = isKnownField(key) ? parseInteger(value) : undefined;
    if (isKnownField(key) && parsed !== undefined) {
      meta[key] = parsed;
    } else {
      meta.extra[key] = value;
    }
  }
  return meta;
}

/**
 * Serialise typed metadata to the flat string map the store accepts.
 */
export function toMetadataRecord(meta: ObjectMetadata): Record<string, string> {
  const record: Record<string, string> = { ...meta.extra };
  for (const field of KNOWN_FIELDS) {
    const value = meta[field];
    if (value !== undefined) {
      record[field] = String(value);
    }
  }
  return record;
}

/**
 * Exact equality of two metadata maps (same keys, same values).
 */
export function metadataEquals(
  actual: Record<string, string>,
  expected: Record<string, string>,
): boolean {
  const actualKeys = Object.keys(actual);
  const expectedKeys = Object.keys(expected);
  if (actualKeys.length !== expectedKeys.length) return false;
  return expectedKeys.every(key => actual[key] === expected[key]);
}

/**
 * Parse the `--metadata` JSON argument.
 */
export function parseMetadataJson(json: string): ObjectMetadata {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    throw new SetupError(`Invalid metadata JSON: ${json}`, err);
  }
  const result = metadataJsonSchema.safeParse(raw);
  if (!result.success) {
    throw new SetupError('Metadata must be a flat JSON object of strings or numbers', result.error);
  }
  const record: Record<string, string> = {};
  for (const [key, value] of Object.entries(result.data)) {
    record[key] = String(value);
  }
  return fromMetadataRecord(record);
}

/**
 * Build the directory and file metadata templates. Values given in the JSON
 * win over the per-role defaults; explicit uid/gid overrides win over both.
 */
export function buildTemplates(opts: TemplateOptions): MetadataTemplates {
  const base: ObjectMetadata = opts.json ? parseMetadataJson(opts.json) : { extra: {} };

  const build = (mode: number): ObjectMetadata => ({
    extra: { ...base.extra },
    mode: base.mode ?? mode,
    uid: opts.overrides.uid ?? base.uid ?? opts.defaultUid,
    gid: opts.overrides.gid ?? base.gid ?? opts.defaultGid,
    mtime: opts.now,
  });

  return {
    directory: build(opts.dirMode),
    file: build(opts.fileMode),
  };
}

/**
 * Metadata attached to an uploaded object: the captured stat wins, except
 * uid/gid which the overrides replace for files and directories alike.
 * The template supplies the extras, and the mode when stat reported none.
 */
export function entryMetadata(
  entry: Entry,
  overrides: OwnerOverrides,
  template?: ObjectMetadata,
): ObjectMetadata {
  return {
    extra: { ...template?.extra },
    uid: overrides.uid ?? entry.uid,
    gid: overrides.gid ?? entry.gid,
    mode: entry.mode === 0 ? template?.mode : entry.mode,
    mtime: entry.mtime,
  };
}
