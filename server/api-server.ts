import express from 'express';
import type { Server } from 'node:http';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { getConfig } from '../src/config/index.js';
import { ExtractionError } from '../src/exceptions.js';
import { createExtractionService } from '../src/extraction/factory.js';
import type { ExtractionService } from '../src/extraction/service.js';
import { createLogger, setupLogging, type Logger } from '../src/logging-config.js';
import { SignalHandler } from '../src/services/signal-handler.js';
import { SERVICE_VERSION } from '../src/version.js';
import { createExtractionRouter } from './extraction-routes.js';

export interface AppDependencies {
  extractionService: ExtractionService;
  version?: string;
  logger?: Logger;
}

const isMalformedBody = (error: unknown): boolean =>
  error instanceof SyntaxError && 'status' in error && error.status === 400;

// body-parser marks its own rejections (oversized body, bad charset) with a 4xx status
const bodyParserStatus = (error: unknown): number | null => {
  if (!(error instanceof Error) || !('status' in error) || typeof error.status !== 'number') {
    return null;
  }
  return error.status >= 400 && error.status < 500 ? error.status : null;
};

export function createApp({ extractionService, version = SERVICE_VERSION, logger = createLogger('api') }: AppDependencies) {
  const app = express();

  // CORS middleware
  app.use((req, res, next) => {
    res.header('Access-Control-Allow-Origin', '*');
    res.header('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.header('Access-Control-Allow-Headers', 'Origin, X-Requested-With, Content-Type, Accept, Authorization');

    if (req.method === 'OPTIONS') {
      res.sendStatus(200);
    } else {
      next();
    }
  });

  app.use(express.json());

  // Health check endpoint
  app.get('/health', (req, res) => {
    logger.debug('Health check requested');
    res.json({ status: 'healthy', version, timestamp: new Date().toISOString() });
  });

  app.get('/', (req, res) => {
    res.json({
      message: 'Document Extraction API',
      health: '/health',
      version,
    });
  });

  app.use(createExtractionRouter(extractionService));

  // 404 handler
  app.use((req, res) => {
    res.status(404).json({ detail: `Endpoint not found: ${req.method} ${req.path}` });
  });

  // Error handling middleware
  app.use((err: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (isMalformedBody(err)) {
      res.status(400).json({ detail: 'Request body is not valid JSON' });
      return;
    }

    const clientStatus = bodyParserStatus(err);
    if (clientStatus !== null && err instanceof Error) {
      res.status(clientStatus).json({ detail: err.message });
      return;
    }

    if (err instanceof ExtractionError) {
      res.status(err.statusCode).json({ detail: err.message, code: err.code });
      return;
    }

    logger.error('Unhandled error', { error: err instanceof Error ? err.message : String(err), path: req.path });
    res.status(500).json({ detail: 'Internal server error' });
  });

  return app;
}

export async function startServer(): Promise<Server> {
  const config = await getConfig();
  setupLogging({ logLevel: config.logging.level, json: config.logging.json, forceSetup: true });
  const logger = createLogger('api');

  const app = createApp({ extractionService: createExtractionService(config), logger });
  const { host, port } = config.server;

  const server = app.listen(port, host, () => {
    logger.info(`API Server is running on http://${host}:${port}`);
    logger.info(`Health check: GET http://${host}:${port}/health`);
    logger.info(`Extract documents: POST http://${host}:${port}/extract`);
  });

  const signals = new SignalHandler({
    logger,
    cleanup: () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  });
  signals.register();

  return server;
}

// Start server
const entryPoint = process.argv[1];
if (entryPoint && path.resolve(entryPoint) === fileURLToPath(import.meta.url)) {
  startServer().catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`fatal: ${message}`);
    process.exitCode = 1;
  });
}
