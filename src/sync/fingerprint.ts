/**
 * Content fingerprints comparable with S3 ETags.
 * Files up to one part hash to their plain MD5; larger files use the
 * multipart convention: MD5 over the concatenated raw part digests,
 * suffixed with `-<partCount>`.
 */
import fs from 'node:fs';
import crypto from 'node:crypto';

export const DEFAULT_PART_SIZE = 8 * 1024 * 1024;

/** MD5 of zero bytes. Also the ETag S3 reports for empty placeholder objects. */
export const EMPTY_FINGERPRINT = 'd41d8cd98f00b204e9800998ecf8427e';

export type FingerprintFn = (filePath: string, partSize?: number) => Promise<string>;

/**
 * Strip surrounding quotes from a store-reported fingerprint.
 */
export function normalizeFingerprint(value: string | undefined): string {
  return (value ?? '').replace(/"/g, '');
}

async function isRegularFile(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.promises.stat(filePath);
    return stat.isFile();
  } catch (err) {
    if (err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR')) {
      return false;
    }
    throw err;
  }
}

/**
 * Compute the fingerprint of a file. Paths that are not regular files
 * (missing, directories) yield EMPTY_FINGERPRINT.
 */
export async function fingerprint(
  filePath: string,
  partSize: number = DEFAULT_PART_SIZE,
): Promise<string> {
  if (partSize <= 0) {
    throw new RangeError(`partSize must be positive, got ${partSize}`);
  }
  if (!(await isRegularFile(filePath))) {
    return EMPTY_FINGERPRINT;
  }

  const partDigests: Buffer[] = [];
  let hash = crypto.createHash('md5');
  let partBytes = 0;

  for await (const chunk of fs.createReadStream(filePath)) {
    const data = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    let offset = 0;
    while (offset < data.length) {
      const take = Math.min(partSize - partBytes, data.length - offset);
      hash.update(data.subarray(offset, offset + take));
      partBytes += take;
      offset += take;
      if (partBytes === partSize) {
        partDigests.push(hash.digest());
        hash = crypto.createHash('md5');
        partBytes = 0;
      }
    }
  }
  if (partBytes > 0) {
    partDigests.push(hash.digest());
  }

  if (partDigests.length === 0) {
    return EMPTY_FINGERPRINT;
  }
  if (partDigests.length === 1) {
    return partDigests[0].toString('hex');
  }
  const combined = crypto.createHash('md5').update(Buffer.concat(partDigests)).digest('hex');
  return `${combined}-${partDigests.length}`;
}
