import { DocumentLinkHarvester } from '../agent/link-harvester.js';
import type { ExtractionAgent } from '../agent/views.js';
import type { AppConfig } from '../config/index.js';
import { ScratchArena } from '../scratch/service.js';
import { S3ObjectStore } from '../storage/s3-object-store.js';
import { StorageUploader } from '../storage/service.js';
import type { ObjectStore } from '../storage/views.js';
import { ExtractionService } from './service.js';

export interface ExtractionServiceOverrides {
  agent?: ExtractionAgent;
  objectStore?: ObjectStore;
}

/**
 * Wire the pipeline from configuration. Overrides replace the external
 * collaborators (browser agent, object store).
 */
export function createExtractionService(config: AppConfig, overrides: ExtractionServiceOverrides = {}): ExtractionService {
  const store = overrides.objectStore ?? S3ObjectStore.fromConfig(config.storage);
  return new ExtractionService({
    agent: overrides.agent ?? new DocumentLinkHarvester(config.browser),
    uploader: new StorageUploader(store),
    arena: new ScratchArena({
      root: config.extraction.scratchRoot,
      allowedExtensions: config.extraction.allowedExtensions,
    }),
    agentTimeoutMs: config.extraction.agentTimeoutMs,
    agentAbortGraceMs: config.extraction.agentAbortGraceMs,
  });
}
