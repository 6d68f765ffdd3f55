import {
  DeleteObjectCommand,
  HeadBucketCommand,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
} from '@aws-sdk/client-s3';
import type { StorageConfig } from '../config/index.js';
import {
  ConfigurationError,
  CredentialsError,
  ObjectWriteError,
  errorMessage,
} from '../exceptions.js';
import type { ObjectStore, PutObjectInput } from './views.js';

const MISSING_CREDENTIAL_ERRORS = new Set(['CredentialsProviderError']);

const INVALID_CREDENTIAL_ERRORS = new Set([
  'InvalidAccessKeyId',
  'SignatureDoesNotMatch',
  'ExpiredToken',
  'InvalidToken',
  'TokenRefreshRequired',
]);

const httpStatusOf = (error: unknown): number | undefined =>
  error instanceof S3ServiceException ? error.$metadata.httpStatusCode : undefined;

const errorNameOf = (error: unknown): string => (error instanceof Error ? error.name : '');

/**
 * Map an SDK error to a CredentialsError when the failure is about keys,
 * otherwise return null.
 */
export function classifyCredentialsError(error: unknown): CredentialsError | null {
  const name = errorNameOf(error);
  if (MISSING_CREDENTIAL_ERRORS.has(name)) {
    return new CredentialsError(
      'Storage credentials not found. Set AWS_ACCESS_KEY_ID and AWS_SECRET_ACCESS_KEY.',
      'missing_credentials',
      { cause: error }
    );
  }
  if (INVALID_CREDENTIAL_ERRORS.has(name)) {
    return new CredentialsError(`Storage credentials rejected: ${errorMessage(error)}`, 'invalid_credentials', {
      cause: error,
    });
  }
  return null;
}

export function classifyBucketError(error: unknown, bucket: string): ConfigurationError {
  const credentialsError = classifyCredentialsError(error);
  if (credentialsError) {
    return credentialsError;
  }

  const name = errorNameOf(error);
  const status = httpStatusOf(error);
  if (name === 'NotFound' || name === 'NoSuchBucket' || status === 404) {
    return new ConfigurationError(`Bucket '${bucket}' does not exist`, 'bucket_not_found', { cause: error });
  }
  if (name === 'Forbidden' || name === 'AccessDenied' || status === 403) {
    return new ConfigurationError(`Access denied to bucket '${bucket}'`, 'access_denied', { cause: error });
  }
  return new ConfigurationError(`Error accessing bucket '${bucket}': ${errorMessage(error)}`, 'bucket_unreachable', {
    cause: error,
  });
}

export function createS3Client(config: StorageConfig): S3Client {
  return new S3Client({
    region: config.region,
    endpoint: config.endpoint,
    // needed for MinIO/R2-style endpoints
    forcePathStyle: Boolean(config.endpoint),
    credentials:
      config.accessKeyId && config.secretAccessKey
        ? {
            accessKeyId: config.accessKeyId,
            secretAccessKey: config.secretAccessKey,
          }
        : undefined,
  });
}

export class S3ObjectStore implements ObjectStore {
  constructor(private readonly client: S3Client) {}

  static fromConfig(config: StorageConfig): S3ObjectStore {
    return new S3ObjectStore(createS3Client(config));
  }

  async headBucket(bucket: string): Promise<void> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: bucket }));
    } catch (error) {
      throw classifyBucketError(error, bucket);
    }
  }

  async putObject(input: PutObjectInput): Promise<void> {
    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: input.bucket,
          Key: input.key,
          Body: input.body,
          ContentLength: input.contentLength,
          ContentType: input.contentType,
        })
      );
    } catch (error) {
      throw (
        classifyCredentialsError(error) ??
        new ObjectWriteError(`S3 upload failed for '${input.key}': ${errorMessage(error)}`, input.key, {
          cause: error,
        })
      );
    }
  }

  async deleteObject(bucket: string, key: string): Promise<void> {
    try {
      await this.client.send(new DeleteObjectCommand({ Bucket: bucket, Key: key }));
    } catch (error) {
      throw (
        classifyCredentialsError(error) ??
        new ObjectWriteError(`S3 delete failed for '${key}': ${errorMessage(error)}`, key, { cause: error })
      );
    }
  }
}
