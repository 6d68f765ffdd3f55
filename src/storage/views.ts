import type { Readable } from 'node:stream';

export interface PutObjectInput {
  bucket: string;
  key: string;
  body: Uint8Array | Readable;
  contentLength: number;
  contentType: string;
}

/**
 * Minimal blob-store surface used by the uploader.
 *
 * Implementations throw ConfigurationError / CredentialsError from
 * headBucket, and CredentialsError / ObjectWriteError from putObject.
 */
export interface ObjectStore {
  headBucket(bucket: string): Promise<void>;
  putObject(input: PutObjectInput): Promise<void>;
  deleteObject(bucket: string, key: string): Promise<void>;
}
