import { promises as fs, type Dirent } from 'node:fs';
import path from 'node:path';
import { IOFailure, errorMessage } from '../exceptions.js';
import type { DownloadedArtifact } from '../extraction/views.js';
import { createLogger, type Logger } from '../logging-config.js';

const SAFE_SEGMENT = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export interface ScratchDirectoryOptions {
  /** Lower-case extensions (with dot) reported by listArtifacts; empty means every file. */
  allowedExtensions?: string[];
  logger?: Logger;
}

/**
 * A staging directory owned by exactly one extraction request.
 */
export class ScratchDirectory {
  private readonly allowedExtensions: Set<string>;
  private readonly logger: Logger;

  constructor(
    public readonly directory: string,
    options: ScratchDirectoryOptions = {}
  ) {
    this.allowedExtensions = new Set((options.allowedExtensions ?? []).map((ext) => ext.toLowerCase()));
    this.logger = options.logger ?? createLogger('scratch');
  }

  /**
   * Create the directory if needed and delete everything inside it.
   */
  async reset(): Promise<void> {
    try {
      await fs.mkdir(this.directory, { recursive: true });
      const entries = await fs.readdir(this.directory);
      for (const entry of entries) {
        await fs.rm(path.join(this.directory, entry), { recursive: true, force: true });
      }
    } catch (error) {
      throw new IOFailure(`Failed to reset scratch directory ${this.directory}: ${errorMessage(error)}`, this.directory, {
        cause: error,
      });
    }
    this.logger.debug('Scratch directory cleared', { path: this.directory });
  }

  /**
   * Regular files currently in the directory, oldest first.
   */
  async listArtifacts(): Promise<DownloadedArtifact[]> {
    const files = await this.listFiles();
    return files.filter((artifact) => this.isAllowed(artifact.fileName));
  }

  /**
   * Every regular file, ignoring the extension filter. Used for cleanup.
   */
  async listFiles(): Promise<DownloadedArtifact[]> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(this.directory, { withFileTypes: true });
    } catch (error) {
      if (isMissing(error)) {
        return [];
      }
      throw new IOFailure(`Failed to list scratch directory ${this.directory}: ${errorMessage(error)}`, this.directory, {
        cause: error,
      });
    }

    const artifacts: DownloadedArtifact[] = [];
    for (const entry of entries) {
      if (!entry.isFile()) {
        continue;
      }
      const localPath = path.join(this.directory, entry.name);
      try {
        const stats = await fs.stat(localPath);
        artifacts.push({
          localPath,
          fileName: entry.name,
          sizeBytes: stats.size,
          discoveredAt: stats.mtime,
        });
      } catch (error) {
        // Removed between readdir and stat
        if (!isMissing(error)) {
          throw new IOFailure(`Failed to inspect ${localPath}: ${errorMessage(error)}`, localPath, { cause: error });
        }
      }
    }

    return artifacts.sort(
      (a, b) => a.discoveredAt.getTime() - b.discoveredAt.getTime() || a.fileName.localeCompare(b.fileName)
    );
  }

  /**
   * Delete one file. Never throws; reports whether the file is gone.
   */
  async remove(artifact: DownloadedArtifact): Promise<boolean> {
    try {
      await fs.rm(artifact.localPath, { force: true });
      return true;
    } catch (error) {
      this.logger.warning('Failed to remove scratch file', {
        path: artifact.localPath,
        error: errorMessage(error),
      });
      return false;
    }
  }

  /**
   * Remove the directory itself. Never throws.
   */
  async dispose(): Promise<boolean> {
    try {
      await fs.rm(this.directory, { recursive: true, force: true });
      return true;
    } catch (error) {
      this.logger.warning('Failed to remove scratch directory', {
        path: this.directory,
        error: errorMessage(error),
      });
      return false;
    }
  }

  private isAllowed(fileName: string): boolean {
    if (this.allowedExtensions.size === 0) {
      return true;
    }
    return this.allowedExtensions.has(path.extname(fileName).toLowerCase());
  }
}

export interface ScratchArenaOptions extends ScratchDirectoryOptions {
  root: string;
}

/**
 * Hands out one uniquely named directory per request under a shared root.
 */
export class ScratchArena {
  readonly root: string;
  private readonly options: ScratchDirectoryOptions;

  constructor({ root, ...options }: ScratchArenaOptions) {
    this.root = path.resolve(root);
    this.options = options;
  }

  allocate(requestId: string): ScratchDirectory {
    if (!SAFE_SEGMENT.test(requestId)) {
      throw new IOFailure(`Refusing to allocate scratch directory for unsafe id: ${requestId}`, this.root);
    }
    return new ScratchDirectory(path.join(this.root, requestId), this.options);
  }
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
