import { createReadStream, promises as fs } from 'node:fs';
import mime from 'mime-types';
import { CredentialsError, ObjectWriteError, errorMessage } from '../exceptions.js';
import type { DownloadedArtifact, UploadOutcome } from '../extraction/views.js';
import { createLogger, type Logger } from '../logging-config.js';
import { buildObjectKey, toObjectUri } from './keys.js';
import type { ObjectStore } from './views.js';

const DEFAULT_CONTENT_TYPE = 'application/octet-stream';

export interface StorageUploaderOptions {
  logger?: Logger;
}

/**
 * Uploads staged artifacts to a bucket, one outcome per artifact.
 *
 * Two artifacts sharing a basename map to the same key; the later upload
 * overwrites the earlier one (last-write-wins) and a warning is logged.
 */
export class StorageUploader {
  private readonly logger: Logger;

  constructor(
    private readonly store: ObjectStore,
    options: StorageUploaderOptions = {}
  ) {
    this.logger = options.logger ?? createLogger('storage');
  }

  /**
   * Precondition gate: fails once with ConfigurationError instead of N times per file.
   */
  async validateBucketAccess(bucket: string): Promise<void> {
    await this.store.headBucket(bucket);
    this.logger.info(`Bucket '${bucket}' is accessible`);
  }

  /**
   * Upload every artifact without failing fast. Outcomes keep input order.
   * A CredentialsError aborts the batch since every remaining upload would fail the same way.
   */
  async uploadAll(artifacts: readonly DownloadedArtifact[], bucket: string, prefix: string): Promise<UploadOutcome[]> {
    const outcomes: UploadOutcome[] = [];
    const keyOwners = new Map<string, string>();

    for (const artifact of artifacts) {
      const objectKey = buildObjectKey(prefix, artifact.localPath);
      const previousOwner = keyOwners.get(objectKey);
      if (previousOwner) {
        this.logger.warning(`Duplicate object key '${objectKey}', later upload overwrites earlier one`, {
          previous: previousOwner,
          current: artifact.localPath,
        });
      }
      keyOwners.set(objectKey, artifact.localPath);

      outcomes.push(await this.uploadOne(artifact, bucket, objectKey));
    }

    const failed = outcomes.filter((outcome) => !outcome.ok).length;
    this.logger.info(`Upload summary: ${outcomes.length - failed} succeeded, ${failed} failed`, { bucket });
    return outcomes;
  }

  /**
   * Best-effort removal of an uploaded object.
   */
  async deleteObject(bucket: string, key: string): Promise<boolean> {
    try {
      await this.store.deleteObject(bucket, key);
      this.logger.info(`Deleted ${toObjectUri(bucket, key)}`);
      return true;
    } catch (error) {
      this.logger.error(`Failed to delete ${toObjectUri(bucket, key)}`, { error: errorMessage(error) });
      return false;
    }
  }

  private async uploadOne(artifact: DownloadedArtifact, bucket: string, objectKey: string): Promise<UploadOutcome> {
    let sizeBytes: number;
    try {
      const stats = await fs.stat(artifact.localPath);
      sizeBytes = stats.size;
    } catch (error) {
      return this.failed(
        artifact,
        new ObjectWriteError(`Local file not readable: ${artifact.localPath} (${errorMessage(error)})`, objectKey, {
          cause: error,
        })
      );
    }

    const objectUri = toObjectUri(bucket, objectKey);
    this.logger.debug(`Uploading '${artifact.fileName}' to ${objectUri}`, { sizeBytes });

    // Streamed from disk; the stream is destroyed if the put fails
    const body = createReadStream(artifact.localPath);
    try {
      await this.store.putObject({
        bucket,
        key: objectKey,
        body,
        contentLength: sizeBytes,
        contentType: mime.lookup(artifact.fileName) || DEFAULT_CONTENT_TYPE,
      });
    } catch (error) {
      body.destroy();
      if (error instanceof CredentialsError) {
        throw error;
      }
      const writeError =
        error instanceof ObjectWriteError
          ? error
          : new ObjectWriteError(`S3 upload failed for '${objectKey}': ${errorMessage(error)}`, objectKey, {
              cause: error,
            });
      return this.failed(artifact, writeError);
    }

    this.logger.info(`Uploaded ${objectUri}`);
    return { ok: true, artifact, objectKey, objectUri };
  }

  private failed(artifact: DownloadedArtifact, error: ObjectWriteError): UploadOutcome {
    this.logger.error(`Failed to upload ${artifact.fileName}`, { error: error.message });
    return { ok: false, artifact, objectKey: error.objectKey, error };
  }
}
