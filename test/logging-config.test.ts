import { afterEach, describe, expect, it } from 'vitest';
import { createLogger, isLogLevel, setupLogging } from '../src/logging-config.js';
import { MemoryWritable } from './support/fakes.js';

describe('logging', () => {
  afterEach(() => {
    setupLogging({ stream: process.stderr, logLevel: 'info', forceSetup: true });
  });

  it('prefixes logger names with the root namespace once', () => {
    expect(createLogger('test').name).toBe('docex.test');
    expect(createLogger('docex.api').name).toBe('docex.api');
    expect(createLogger('storage').child('s3').name).toBe('docex.storage.s3');
  });

  it('writes padded text lines and filters by level', () => {
    const output = new MemoryWritable();
    setupLogging({ stream: output, logLevel: 'info', forceSetup: true });
    const log = createLogger('test');

    log.debug('hidden');
    log.info('shown', { count: 2 });
    log.warn('careful');
    log.error('broken', { error: new Error('boom') });

    expect(output.lines()).toEqual([
      'INFO    [docex.test] shown {"count":2}',
      'WARNING [docex.test] careful',
      'ERROR   [docex.test] broken {"error":{"name":"Error","message":"boom"}}',
    ]);
  });

  it('writes one JSON object per line in json mode', () => {
    const output = new MemoryWritable();
    setupLogging({ stream: output, logLevel: 'debug', json: true, forceSetup: true });

    createLogger('test').debug('phase', { requestId: 'req-1' });

    const [line] = output.lines();
    const entry: unknown = JSON.parse(line ?? '');
    expect(entry).toMatchObject({ level: 'debug', logger: 'docex.test', message: 'phase', requestId: 'req-1' });
    expect(entry).toHaveProperty('timestamp');
  });

  it('keeps the first setup unless forced', () => {
    const first = new MemoryWritable();
    const second = new MemoryWritable();
    setupLogging({ stream: first, logLevel: 'info', forceSetup: true });
    setupLogging({ stream: second, logLevel: 'debug' });

    createLogger('test').debug('still hidden');
    createLogger('test').info('to first');

    expect(first.lines()).toEqual(['INFO    [docex.test] to first']);
    expect(second.lines()).toEqual([]);
  });

  it('recognizes log levels', () => {
    expect(isLogLevel('warning')).toBe(true);
    expect(isLogLevel('warn')).toBe(false);
    expect(isLogLevel(3)).toBe(false);
  });
});
