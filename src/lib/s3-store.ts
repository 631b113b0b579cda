/**
 * RemoteStore backed by an S3 (or S3-compatible) bucket.
 */
import { Readable } from 'node:stream';
import {
  CopyObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
  paginateListObjectsV2,
  type S3ClientConfig,
  type _Object,
} from '@aws-sdk/client-s3';
import { Upload } from '@aws-sdk/lib-storage';
import { fromIni } from '@aws-sdk/credential-providers';
import { DEFAULT_PART_SIZE } from '../sync/fingerprint.js';
import { PermissionDeniedError, RemoteStoreError, errorMessage } from '../sync/errors.js';
import type {
  LookupResult,
  RemoteObject,
  RemoteStore,
  StreamedPutOptions,
} from '../sync/types.js';

/** Max keys per ListObjectsV2 request (S3 limit). */
const LIST_PAGE_SIZE = 1000;

export interface S3ClientOptions {
  region?: string;
  endpoint?: string;
  forcePathStyle?: boolean;
  /** Named profile from the shared AWS config/credentials files */
  profile?: string;
}

export interface S3StoreOptions {
  bucket: string;
  client: S3Client;
  /** Multipart part size; must equal the fingerprint part size for ETags to match */
  partSize?: number;
}

/**
 * Build an S3 client. Credentials come from the profile when one is given,
 * otherwise from the SDK's default provider chain (env, shared config, IMDS).
 */
export function createS3Client(options: S3ClientOptions = {}): S3Client {
  const config: S3ClientConfig = {
    maxAttempts: 3,
    followRegionRedirects: true,
    region: options.region ?? process.env.AWS_REGION ?? process.env.AWS_DEFAULT_REGION ?? 'us-east-1',
  };
  if (options.endpoint) {
    config.endpoint = options.endpoint;
  }
  if (options.forcePathStyle) {
    config.forcePathStyle = true;
  }
  if (options.profile) {
    config.credentials = fromIni({ profile: options.profile });
  }
  return new S3Client(config);
}

function httpStatus(err: unknown): number | undefined {
  return err instanceof S3ServiceException ? err.$metadata.httpStatusCode : undefined;
}

export function isNotFound(err: unknown): boolean {
  if (!(err instanceof S3ServiceException)) return false;
  return err.name === 'NotFound' || err.name === 'NoSuchKey' || httpStatus(err) === 404;
}

export function isAccessDenied(err: unknown): boolean {
  if (!(err instanceof S3ServiceException)) return false;
  return err.name === 'AccessDenied' || err.name === 'Forbidden' || httpStatus(err) === 403;
}

function mapError(err: unknown, key: string, action: string): Error {
  if (isAccessDenied(err)) {
    return new PermissionDeniedError(key, err);
  }
  return new RemoteStoreError(`${action} failed for "${key}": ${errorMessage(err)}`, key, err);
}

function toCopySource(bucket: string, key: string): string {
  return `${bucket}/${encodeURIComponent(key).replace(/%2F/g, '/')}`;
}

function toRemoteObject(object: _Object & { Key: string }): RemoteObject {
  return {
    key: object.Key,
    fingerprint: object.ETag ?? '',
    metadata: {},
    size: object.Size ?? 0,
  };
}

function hasKey(object: _Object): object is _Object & { Key: string } {
  return typeof object.Key === 'string' && object.Key.length > 0;
}

export class S3Store implements RemoteStore {
  readonly bucket: string;
  private readonly client: S3Client;
  private readonly partSize: number;

  constructor(options: S3StoreOptions) {
    this.bucket = options.bucket;
    this.client = options.client;
    this.partSize = options.partSize ?? DEFAULT_PART_SIZE;
  }

  async headObject(key: string): Promise<LookupResult<RemoteObject>> {
    try {
      const response = await this.client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: key }));
      return {
        status: 'found',
        value: {
          key,
          fingerprint: response.ETag ?? '',
          metadata: response.Metadata ?? {},
          size: response.ContentLength ?? 0,
        },
      };
    } catch (err) {
      if (isNotFound(err)) {
        return { status: 'not-found' };
      }
      return { status: 'error', error: mapError(err, key, 'head') };
    }
  }

  async putObject(
    key: string,
    body: Buffer | undefined,
    metadata: Record<string, string>,
    contentType?: string,
  ): Promise<void> {
    try {
      await this.client.send(new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: body ?? '',
        Metadata: metadata,
        ContentType: contentType,
      }));
    } catch (err) {
      throw mapError(err, key, 'put');
    }
  }

  async copyObjectMetadata(key: string, metadata: Record<string, string>): Promise<void> {
    try {
      await this.client.send(new CopyObjectCommand({
        Bucket: this.bucket,
        Key: key,
        CopySource: toCopySource(this.bucket, key),
        Metadata: metadata,
        MetadataDirective: 'REPLACE',
      }));
    } catch (err) {
      throw mapError(err, key, 'metadata update');
    }
  }

  async *listObjects(prefix: string): AsyncIterable<RemoteObject[]> {
    const pages = paginateListObjectsV2(
      { client: this.client, pageSize: LIST_PAGE_SIZE },
      { Bucket: this.bucket, Prefix: prefix },
    );
    try {
      for await (const page of pages) {
        yield (page.Contents ?? []).filter(hasKey).map(toRemoteObject);
      }
    } catch (err) {
      throw mapError(err, prefix, 'list');
    }
  }

  async getObject(key: string): Promise<Readable> {
    let body: unknown;
    try {
      const response = await this.client.send(new GetObjectCommand({ Bucket: this.bucket, Key: key }));
      body = response.Body;
    } catch (err) {
      throw mapError(err, key, 'get');
    }
    if (!(body instanceof Readable)) {
      throw new RemoteStoreError(`get returned no readable body for "${key}"`, key);
    }
    return body;
  }

  /**
   * Streamed upload, one part in flight at a time. Parts are exactly
   * partSize bytes, so the resulting ETag equals the local fingerprint.
   */
  async putObjectStreamed(key: string, body: Readable, options: StreamedPutOptions): Promise<void> {
    const { metadata, contentType, size, observer } = options;
    const upload = new Upload({
      client: this.client,
      params: {
        Bucket: this.bucket,
        Key: key,
        Body: body,
        Metadata: metadata,
        ContentType: contentType,
      },
      partSize: this.partSize,
      queueSize: 1,
      leavePartsOnError: false,
    });

    upload.on('httpUploadProgress', (progress) => {
      observer?.onProgress({
        key,
        bytesTransferred: progress.loaded ?? 0,
        totalBytes: progress.total ?? size ?? 0,
      });
    });

    try {
      await upload.done();
    } catch (err) {
      throw mapError(err, key, 'upload');
    }
    observer?.onComplete?.(key);
  }
}
