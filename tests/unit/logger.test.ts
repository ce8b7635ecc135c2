import { describe, it, expect } from 'vitest';
import { Logger, MemorySink } from '../../src/core/logger.js';

describe('Logger', () => {
  it('writes level, scope, message and fields', () => {
    const sink = new MemorySink();
    const logger = new Logger({ sink, scope: 'engine' });

    logger.info('record stored', { id: 'abc', embedded: true, note: 'two words', skipped: undefined });

    expect(sink.lines).toEqual(['ℹ INFO [engine] record stored id=abc embedded=true note="two words"']);
  });

  it('drops lines below the minimum level', () => {
    const sink = new MemorySink();
    const logger = new Logger({ sink, level: 'warn' });

    logger.debug('noise');
    logger.info('noise');
    logger.warn('careful');
    logger.error('broken', { code: 3 });

    expect(sink.lines).toEqual(['⚠ WARN careful', '✗ ERROR broken code=3']);
  });

  it('child loggers nest scopes and keep the level', () => {
    const sink = new MemorySink();
    const child = new Logger({ sink, level: 'error', scope: 'memtier' }).child('graph');

    child.warn('hidden');
    child.error('shown');

    expect(sink.lines).toEqual(['✗ ERROR [memtier:graph] shown']);
  });

  it('leaves lines uncoloured when the sink is not a terminal', () => {
    const sink = new MemorySink();
    new Logger({ sink }).info('plain');
    expect(sink.lines[0]).toBe('ℹ INFO plain');
  });
});
