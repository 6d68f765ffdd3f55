import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { AgentFailure, ConfigurationError, CredentialsError, IOFailure } from '../src/exceptions.js';
import { DEFAULT_CONFIG } from '../src/config/index.js';
import { createExtractionService } from '../src/extraction/factory.js';
import { ExtractionService } from '../src/extraction/service.js';
import type { ExtractionPhase, ExtractionRequest } from '../src/extraction/views.js';
import { ScratchArena } from '../src/scratch/service.js';
import { StorageUploader } from '../src/storage/service.js';
import type { ExtractionAgent } from '../src/agent/views.js';
import { FileWritingAgent, HangingAgent, MemoryObjectStore } from './support/fakes.js';

const request = (overrides: Partial<ExtractionRequest> = {}): ExtractionRequest => ({
  targetUrl: 'https://example.com/docs',
  bucket: 'test-bucket',
  keyPrefix: 'event-1/',
  ...overrides,
});

describe('ExtractionService', () => {
  let root: string;
  let store: MemoryObjectStore;
  let phases: ExtractionPhase[];

  const buildService = (agent: ExtractionAgent, options: { agentTimeoutMs?: number; root?: string } = {}) => {
    let counter = 0;
    return new ExtractionService({
      agent,
      uploader: new StorageUploader(store),
      arena: new ScratchArena({ root: options.root ?? root }),
      agentTimeoutMs: options.agentTimeoutMs ?? 5_000,
      agentAbortGraceMs: 20,
      generateRequestId: () => `req-${++counter}`,
      onPhaseChange: (_requestId, phase) => phases.push(phase),
    });
  };

  const scratchDir = (requestId = 'req-1') => path.join(root, requestId);

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'extraction-service-'));
    store = new MemoryObjectStore(['test-bucket']);
    phases = [];
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('reports no_artifacts with an empty uri list when the agent finds nothing', async () => {
    const service = buildService(new FileWritingAgent([]));

    const result = await service.extract(request());

    expect(result.status).toBe('no_artifacts');
    expect(result.uploadedCount).toBe(0);
    expect(result.uploadedUris).toEqual([]);
    expect(result.message).toBe('No documents found at the target URL');
    expect(store.putKeys).toEqual([]);
    expect(fs.existsSync(scratchDir())).toBe(false);
  });

  it('uploads every artifact and returns s3 uris in discovery order', async () => {
    const agent = new FileWritingAgent([
      ['zeta.pdf', 'first'],
      ['alpha.pdf', 'second'],
      ['mid.pdf', 'third'],
    ]);
    const service = buildService(agent);

    const result = await service.extract(request());

    expect(result.status).toBe('success');
    expect(result.message).toBe('Successfully extracted 3 file(s)');
    expect(result.uploadedCount).toBe(3);
    expect(result.uploadedUris).toEqual([
      's3://test-bucket/event-1/zeta.pdf',
      's3://test-bucket/event-1/alpha.pdf',
      's3://test-bucket/event-1/mid.pdf',
    ]);
    expect(result.failures).toEqual([]);
    expect(Buffer.from(store.objects.get('test-bucket/event-1/alpha.pdf')?.body ?? []).toString()).toBe('second');
    expect(agent.calls[0]?.outputDirectory).toBe(scratchDir());
    expect(agent.calls[0]?.options.timeoutMs).toBe(5_000);
    expect(fs.existsSync(scratchDir())).toBe(false);
  });

  it('walks the phases strictly in order', async () => {
    const service = buildService(new FileWritingAgent([['a.pdf', 'a']]));

    await service.extract(request());

    expect(phases).toEqual([
      'idle',
      'directory_reset',
      'agent_running',
      'listing',
      'uploading',
      'cleanup',
      'terminal',
    ]);
  });

  it('skips the upload phase when nothing was found', async () => {
    const service = buildService(new FileWritingAgent([]));

    await service.extract(request());

    expect(phases).toEqual(['idle', 'directory_reset', 'agent_running', 'listing', 'cleanup', 'terminal']);
  });

  it('returns partial_failure naming the file whose upload failed', async () => {
    store.failPut('event-1/b.pdf', new Error('boom'));
    const service = buildService(
      new FileWritingAgent([
        ['a.pdf', 'a'],
        ['b.pdf', 'b'],
        ['c.pdf', 'c'],
      ])
    );

    const result = await service.extract(request());

    expect(result.status).toBe('partial_failure');
    expect(result.uploadedCount).toBe(2);
    expect(result.uploadedUris).toEqual(['s3://test-bucket/event-1/a.pdf', 's3://test-bucket/event-1/c.pdf']);
    expect(result.failures).toEqual([{ fileName: 'b.pdf', error: "S3 upload failed for 'event-1/b.pdf': boom" }]);
    expect(result.message).toBe('Uploaded 2 of 3 file(s); failed: b.pdf');
    expect(fs.existsSync(scratchDir())).toBe(false);
  });

  it('returns failure when every upload fails', async () => {
    store.failPut('event-1/a.pdf', new Error('denied'));
    store.failPut('event-1/b.pdf', new Error('denied'));
    const service = buildService(
      new FileWritingAgent([
        ['a.pdf', 'a'],
        ['b.pdf', 'b'],
      ])
    );

    const result = await service.extract(request());

    expect(result.status).toBe('failure');
    expect(result.uploadedCount).toBe(0);
    expect(result.uploadedUris).toEqual([]);
    expect(result.message).toBe('All 2 upload(s) failed: a.pdf, b.pdf');
    expect(fs.existsSync(scratchDir())).toBe(false);
  });

  it('fails with ConfigurationError before any upload when the bucket is not accessible', async () => {
    const service = buildService(new FileWritingAgent([['a.pdf', 'a']]));

    const error = await service.extract(request({ bucket: 'missing-bucket' })).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({ problem: 'bucket_not_found', statusCode: 500 });
    expect(store.putKeys).toEqual([]);
    expect(fs.existsSync(scratchDir())).toBe(false);
  });

  it('aborts the batch on a credentials error and still cleans up', async () => {
    store.failPut('event-1/a.pdf', new CredentialsError('Storage credentials rejected: bad key'));
    const service = buildService(
      new FileWritingAgent([
        ['a.pdf', 'a'],
        ['b.pdf', 'b'],
      ])
    );

    await expect(service.extract(request())).rejects.toBeInstanceOf(CredentialsError);
    expect(store.putKeys).toEqual(['event-1/a.pdf']);
    expect(fs.existsSync(scratchDir())).toBe(false);
  });

  it('wraps an agent crash in AgentFailure and removes partial downloads', async () => {
    const service = buildService(new FileWritingAgent([['partial.pdf', 'half']], { failWith: new Error('browser crashed') }));

    const error = await service.extract(request()).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(AgentFailure);
    expect(error).toMatchObject({
      reason: 'crashed',
      message: 'Agent run failed for https://example.com/docs: browser crashed',
    });
    expect(phases.slice(-2)).toEqual(['cleanup', 'terminal']);
    expect(fs.existsSync(scratchDir())).toBe(false);
  });

  it('times out a hanging agent, aborts its signal and does not hang the caller', async () => {
    const agent = new HangingAgent();
    const service = buildService(agent, { agentTimeoutMs: 50 });
    const startedAt = Date.now();

    const error = await service.extract(request()).catch((err: unknown) => err);

    expect(Date.now() - startedAt).toBeLessThan(1_000);
    expect(error).toBeInstanceOf(AgentFailure);
    expect(error).toMatchObject({ reason: 'timeout', message: 'Agent run exceeded 50 ms for https://example.com/docs' });
    expect(agent.signal?.aborted).toBe(true);
    expect(fs.existsSync(scratchDir())).toBe(false);
  });

  it('reports a timeout even when the agent rejects after being aborted', async () => {
    const agent = new HangingAgent(true);
    const service = buildService(agent, { agentTimeoutMs: 30 });

    await expect(service.extract(request())).rejects.toMatchObject({ name: 'AgentFailure', reason: 'timeout' });
  });

  it('fails with IOFailure when the scratch directory cannot be created', async () => {
    const blocker = path.join(root, 'not-a-directory');
    fs.writeFileSync(blocker, 'x');
    const agent = new FileWritingAgent([['a.pdf', 'a']]);
    const service = buildService(agent, { root: blocker });

    await expect(service.extract(request())).rejects.toBeInstanceOf(IOFailure);
    expect(agent.calls).toHaveLength(0);
  });

  it('uploads only allowed extensions and still removes the rest', async () => {
    const service = new ExtractionService({
      agent: new FileWritingAgent([
        ['a.pdf', 'a'],
        ['b.tmp', 'partial'],
      ]),
      uploader: new StorageUploader(store),
      arena: new ScratchArena({ root, allowedExtensions: ['.pdf'] }),
      generateRequestId: () => 'req-1',
    });

    const result = await service.extract(request());

    expect(result.uploadedUris).toEqual(['s3://test-bucket/event-1/a.pdf']);
    expect(store.putKeys).toEqual(['event-1/a.pdf']);
    expect(fs.existsSync(scratchDir())).toBe(false);
  });

  it('is wired from configuration by the factory', async () => {
    const agent = new FileWritingAgent([['report.pdf', 'r']]);
    const service = createExtractionService(
      { ...DEFAULT_CONFIG, extraction: { ...DEFAULT_CONFIG.extraction, scratchRoot: root, agentTimeoutMs: 3_000 } },
      { agent, objectStore: store }
    );

    const result = await service.extract(request());

    expect(result.status).toBe('success');
    expect(result.uploadedUris).toEqual(['s3://test-bucket/event-1/report.pdf']);
    expect(agent.calls[0]?.options.timeoutMs).toBe(3_000);
    expect(path.dirname(agent.calls[0]?.outputDirectory ?? '')).toBe(root);
    expect(fs.readdirSync(root)).toEqual([]);
  });

  it('isolates concurrent requests in separate scratch directories', async () => {
    const urlFiles: Record<string, Array<[string, string]>> = {
      'https://example.com/alpha': [
        ['alpha-1.pdf', 'a1'],
        ['alpha-2.pdf', 'a2'],
      ],
      'https://example.com/beta': [
        ['beta-1.pdf', 'b1'],
        ['beta-2.pdf', 'b2'],
        ['beta-3.pdf', 'b3'],
      ],
    };
    const directories: string[] = [];
    const agent: ExtractionAgent = {
      runAgentExtraction: async (url, outputDirectory, options) => {
        directories.push(outputDirectory);
        return new FileWritingAgent(urlFiles[url] ?? [], { delayMs: 5 }).runAgentExtraction(url, outputDirectory, options);
      },
    };
    const service = new ExtractionService({
      agent,
      uploader: new StorageUploader(store),
      arena: new ScratchArena({ root }),
    });

    const [alpha, beta] = await Promise.all([
      service.extract(request({ targetUrl: 'https://example.com/alpha', keyPrefix: 'alpha/' })),
      service.extract(request({ targetUrl: 'https://example.com/beta', keyPrefix: 'beta/' })),
    ]);

    expect(new Set(directories).size).toBe(2);
    expect(alpha?.uploadedUris).toEqual(['s3://test-bucket/alpha/alpha-1.pdf', 's3://test-bucket/alpha/alpha-2.pdf']);
    expect(beta?.uploadedUris).toEqual([
      's3://test-bucket/beta/beta-1.pdf',
      's3://test-bucket/beta/beta-2.pdf',
      's3://test-bucket/beta/beta-3.pdf',
    ]);
    expect(alpha?.requestId).not.toBe(beta?.requestId);
    expect(fs.readdirSync(root)).toEqual([]);
  });
});
