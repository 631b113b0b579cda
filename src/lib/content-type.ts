import fs from 'node:fs';
import mime from 'mime-types';

export const DIRECTORY_CONTENT_TYPE = 'application/x-directory';
export const DEFAULT_CONTENT_TYPE = 'application/octet-stream';

export type ContentTypeSniffer = (filePath: string) => string;

/**
 * Content type for an upload: directories get the placeholder type FUSE
 * mounts recognise, files are looked up by extension.
 */
export function sniffContentType(filePath: string): string {
  try {
    if (fs.statSync(filePath).isDirectory()) {
      return DIRECTORY_CONTENT_TYPE;
    }
  } catch {
    return DEFAULT_CONTENT_TYPE;
  }
  return mime.lookup(filePath) || DEFAULT_CONTENT_TYPE;
}
