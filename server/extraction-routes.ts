import express from 'express';
import { buildExtractionRequest, type ExtractionResult } from '../src/extraction/views.js';
import type { ExtractionService } from '../src/extraction/service.js';

export interface FailedFileBody {
  file_name: string;
  error: string;
}

export interface ExtractionResponseBody {
  status: ExtractionResult['status'];
  message: string;
  files_uploaded: number;
  s3_uris: string[];
  failed_files: FailedFileBody[];
}

const toFailedFiles = (failures: ExtractionResult['failures']): FailedFileBody[] =>
  failures.map((failure) => ({ file_name: failure.fileName, error: failure.error }));

export function toResponseBody(result: ExtractionResult): ExtractionResponseBody {
  return {
    status: result.status,
    message: result.message,
    files_uploaded: result.uploadedCount,
    s3_uris: result.uploadedUris,
    failed_files: toFailedFiles(result.failures),
  };
}

export function createExtractionRouter(service: ExtractionService): express.Router {
  const router = express.Router();

  // Extraction endpoint: agent run + upload
  router.post('/extract', async (req, res, next) => {
    try {
      const request = buildExtractionRequest(req.body);
      const result = await service.extract(request);

      if (result.status === 'failure') {
        res.status(500).json({
          detail: result.message,
          failed_files: toFailedFiles(result.failures),
        });
        return;
      }

      res.json(toResponseBody(result));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
