import { z } from 'zod';
import { ValidationError, type ObjectWriteError } from '../exceptions.js';
import { normalizeKeyPrefix } from '../storage/keys.js';

export interface ExtractionRequest {
  readonly targetUrl: string;
  readonly bucket: string;
  readonly keyPrefix: string;
}

export interface DownloadedArtifact {
  readonly localPath: string;
  readonly fileName: string;
  readonly sizeBytes: number;
  readonly discoveredAt: Date;
}

interface UploadOutcomeBase {
  readonly artifact: DownloadedArtifact;
  readonly objectKey: string;
}

export interface UploadSuccess extends UploadOutcomeBase {
  readonly ok: true;
  readonly objectUri: string;
}

export interface UploadFailure extends UploadOutcomeBase {
  readonly ok: false;
  readonly error: ObjectWriteError;
}

export type UploadOutcome = UploadSuccess | UploadFailure;

export type ExtractionStatus = 'success' | 'partial_failure' | 'no_artifacts' | 'failure';

export type ExtractionPhase =
  | 'idle'
  | 'directory_reset'
  | 'agent_running'
  | 'listing'
  | 'uploading'
  | 'cleanup'
  | 'terminal';

export interface FailedFile {
  fileName: string;
  error: string;
}

export interface ExtractionResult {
  requestId: string;
  status: ExtractionStatus;
  message: string;
  uploadedUris: string[];
  uploadedCount: number;
  failures: FailedFile[];
  durationMs: number;
}

const isHttpUrl = (value: string): boolean => {
  try {
    const { protocol } = new URL(value);
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
};

const httpUrl = z
  .string({ required_error: 'url is required' })
  .trim()
  .refine(isHttpUrl, 'url must be an absolute http(s) URL');

// Wire shape of POST /extract
export const ExtractionRequestBodySchema = z.object({
  url: httpUrl,
  s3_bucket: z.string({ required_error: 's3_bucket is required' }).trim().min(1, 's3_bucket must not be empty'),
  s3_prefix: z.string().optional().default(''),
});

export type ExtractionRequestBody = z.input<typeof ExtractionRequestBodySchema>;

/**
 * Validate raw input and freeze it into an ExtractionRequest.
 */
export function buildExtractionRequest(body: unknown): ExtractionRequest {
  const parsed = ExtractionRequestBodySchema.safeParse(body);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new ValidationError(`Invalid extraction request: ${issues.join('; ')}`, issues);
  }

  return Object.freeze({
    targetUrl: parsed.data.url,
    bucket: parsed.data.s3_bucket,
    keyPrefix: normalizeKeyPrefix(parsed.data.s3_prefix),
  });
}
