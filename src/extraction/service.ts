import { randomUUID } from 'node:crypto';
import type { ExtractionAgent } from '../agent/views.js';
import { AgentFailure, ExtractionError, errorMessage } from '../exceptions.js';
import { createLogger, type Logger } from '../logging-config.js';
import type { ScratchArena, ScratchDirectory } from '../scratch/service.js';
import type { StorageUploader } from '../storage/service.js';
import type {
  ExtractionPhase,
  ExtractionRequest,
  ExtractionResult,
  UploadFailure,
  UploadOutcome,
  UploadSuccess,
} from './views.js';

export const DEFAULT_AGENT_TIMEOUT_MS = 120_000;
export const DEFAULT_AGENT_ABORT_GRACE_MS = 2_000;

export interface ExtractionServiceOptions {
  agent: ExtractionAgent;
  uploader: StorageUploader;
  arena: ScratchArena;
  agentTimeoutMs?: number;
  /** How long to wait for an aborted agent to stop writing before cleanup. */
  agentAbortGraceMs?: number;
  logger?: Logger;
  generateRequestId?: () => string;
  onPhaseChange?: (requestId: string, phase: ExtractionPhase) => void;
}

const noop = () => undefined;

/**
 * Drives one extraction: reset scratch dir, run the agent under a
 * timeout, list what landed, upload it, and always clean up.
 */
export class ExtractionService {
  private readonly agent: ExtractionAgent;
  private readonly uploader: StorageUploader;
  private readonly arena: ScratchArena;
  private readonly agentTimeoutMs: number;
  private readonly agentAbortGraceMs: number;
  private readonly logger: Logger;
  private readonly generateRequestId: () => string;
  private readonly onPhaseChange?: (requestId: string, phase: ExtractionPhase) => void;

  constructor(options: ExtractionServiceOptions) {
    this.agent = options.agent;
    this.uploader = options.uploader;
    this.arena = options.arena;
    this.agentTimeoutMs = options.agentTimeoutMs ?? DEFAULT_AGENT_TIMEOUT_MS;
    this.agentAbortGraceMs = options.agentAbortGraceMs ?? DEFAULT_AGENT_ABORT_GRACE_MS;
    this.logger = options.logger ?? createLogger('extraction');
    this.generateRequestId = options.generateRequestId ?? randomUUID;
    this.onPhaseChange = options.onPhaseChange;
  }

  async extract(request: ExtractionRequest): Promise<ExtractionResult> {
    const requestId = this.generateRequestId();
    const startedAt = Date.now();
    this.enter(requestId, 'idle');
    this.logger.info(`Extraction requested for ${request.targetUrl}`, {
      requestId,
      bucket: request.bucket,
      prefix: request.keyPrefix,
    });

    const scratch = this.arena.allocate(requestId);
    let outcomes: UploadOutcome[] = [];

    try {
      this.enter(requestId, 'directory_reset');
      await scratch.reset();

      this.enter(requestId, 'agent_running');
      await this.runAgent(request.targetUrl, scratch.directory, requestId);

      this.enter(requestId, 'listing');
      const artifacts = await scratch.listArtifacts();
      if (artifacts.length === 0) {
        this.logger.warning('No documents were downloaded', { requestId });
        return {
          requestId,
          status: 'no_artifacts',
          message: 'No documents found at the target URL',
          uploadedUris: [],
          uploadedCount: 0,
          failures: [],
          durationMs: Date.now() - startedAt,
        };
      }
      this.logger.info(`Found ${artifacts.length} artifact(s)`, {
        requestId,
        files: artifacts.map((artifact) => artifact.fileName),
      });

      this.enter(requestId, 'uploading');
      await this.uploader.validateBucketAccess(request.bucket);
      outcomes = await this.uploader.uploadAll(artifacts, request.bucket, request.keyPrefix);

      return this.summarize(requestId, outcomes, startedAt);
    } catch (error) {
      this.logger.error(`Extraction failed: ${errorMessage(error)}`, {
        requestId,
        code: error instanceof ExtractionError ? error.code : 'unexpected',
      });
      throw error;
    } finally {
      this.enter(requestId, 'cleanup');
      await this.cleanup(scratch, outcomes);
      this.enter(requestId, 'terminal');
    }
  }

  private async runAgent(url: string, directory: string, requestId: string): Promise<void> {
    const controller = new AbortController();
    const startedAt = Date.now();
    const run = (async () =>
      this.agent.runAgentExtraction(url, directory, {
        timeoutMs: this.agentTimeoutMs,
        signal: controller.signal,
      }))();

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), this.agentTimeoutMs);
    });

    try {
      const outcome = await Promise.race([run, deadline]);
      if (outcome === 'timeout') {
        const failure = new AgentFailure(`Agent run exceeded ${this.agentTimeoutMs} ms for ${url}`, 'timeout');
        controller.abort(failure);
        await this.settle(run);
        throw failure;
      }
      this.logger.info(`Agent completed in ${Date.now() - startedAt} ms`, {
        requestId,
        reported: outcome.downloaded.length,
        message: outcome.message,
      });
    } catch (error) {
      if (error instanceof AgentFailure) {
        throw error;
      }
      throw new AgentFailure(`Agent run failed for ${url}: ${errorMessage(error)}`, 'crashed', { cause: error });
    } finally {
      clearTimeout(timer);
    }
  }

  private async settle(run: Promise<unknown>): Promise<void> {
    let timer: NodeJS.Timeout | undefined;
    const grace = new Promise<void>((resolve) => {
      timer = setTimeout(resolve, this.agentAbortGraceMs);
    });
    await Promise.race([run.then(noop, noop), grace]);
    clearTimeout(timer);
  }

  private summarize(requestId: string, outcomes: UploadOutcome[], startedAt: number): ExtractionResult {
    const succeeded = outcomes.filter((outcome): outcome is UploadSuccess => outcome.ok);
    const failed = outcomes.filter((outcome): outcome is UploadFailure => !outcome.ok);
    const failures = failed.map((outcome) => ({
      fileName: outcome.artifact.fileName,
      error: outcome.error.message,
    }));

    let status: ExtractionResult['status'];
    let message: string;
    if (failed.length === 0) {
      status = 'success';
      message = `Successfully extracted ${succeeded.length} file(s)`;
    } else if (succeeded.length === 0) {
      status = 'failure';
      message = `All ${failed.length} upload(s) failed: ${failures.map((failure) => failure.fileName).join(', ')}`;
    } else {
      status = 'partial_failure';
      message =
        `Uploaded ${succeeded.length} of ${outcomes.length} file(s); ` +
        `failed: ${failures.map((failure) => failure.fileName).join(', ')}`;
    }

    this.logger.info(message, { requestId, status });
    return {
      requestId,
      status,
      message,
      uploadedUris: succeeded.map((outcome) => outcome.objectUri),
      uploadedCount: succeeded.length,
      failures,
      durationMs: Date.now() - startedAt,
    };
  }

  /**
   * Uploaded files go first, then leftovers, then the directory itself.
   * Never throws.
   */
  private async cleanup(scratch: ScratchDirectory, outcomes: UploadOutcome[]): Promise<void> {
    for (const outcome of outcomes) {
      if (outcome.ok) {
        await scratch.remove(outcome.artifact);
      }
    }

    try {
      const leftovers = await scratch.listFiles();
      for (const leftover of leftovers) {
        await scratch.remove(leftover);
      }
      if (leftovers.length > 0) {
        this.logger.debug(`Removed ${leftovers.length} file(s) that were not uploaded`, { path: scratch.directory });
      }
    } catch (error) {
      this.logger.warning(`Could not list scratch directory for cleanup: ${errorMessage(error)}`, {
        path: scratch.directory,
      });
    }

    await scratch.dispose();
  }

  private enter(requestId: string, phase: ExtractionPhase): void {
    this.logger.debug(`Phase -> ${phase}`, { requestId });
    this.onPhaseChange?.(requestId, phase);
  }
}
