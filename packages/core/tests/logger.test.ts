import { describe, it, expect, vi } from 'vitest';
import {
  createConsoleLogger,
  createEnvLogger,
  resolveLogLevel,
  silentLogger,
} from '../src/logger';
import { isSeqLensError, SeqLensError, ValidationError, ErrorCodes } from '../src/errors';

function createSink() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('createConsoleLogger', () => {
  it('prefixes messages and passes context through', () => {
    const sink = createSink();
    const logger = createConsoleLogger({ sink });

    logger.info('Aggregated matchups', { pairs: 2 });
    logger.warn('No context');

    expect(sink.info).toHaveBeenCalledWith('[seqlens] Aggregated matchups', { pairs: 2 });
    expect(sink.warn).toHaveBeenCalledWith('[seqlens] No context');
  });

  it('drops messages below the configured level', () => {
    const sink = createSink();
    const logger = createConsoleLogger({ sink, level: 'warn', prefix: '[test]' });

    logger.debug('hidden');
    logger.info('hidden');
    logger.error('shown', {});

    expect(sink.debug).not.toHaveBeenCalled();
    expect(sink.info).not.toHaveBeenCalled();
    expect(sink.error).toHaveBeenCalledWith('[test] shown');
  });
});

describe('resolveLogLevel', () => {
  it('reads SEQLENS_LOG_LEVEL', () => {
    expect(resolveLogLevel({ SEQLENS_LOG_LEVEL: ' Debug ' })).toBe('debug');
  });

  it('falls back on unknown values', () => {
    expect(resolveLogLevel({ SEQLENS_LOG_LEVEL: 'verbose' })).toBe('silent');
    expect(resolveLogLevel({}, 'info')).toBe('info');
  });

  it('keeps the environment logger silent by default', () => {
    expect(createEnvLogger({})).toBe(silentLogger);
    expect(createEnvLogger({ SEQLENS_LOG_LEVEL: 'info' })).not.toBe(silentLogger);
  });
});

describe('errors', () => {
  it('carries a stable code and location', () => {
    const error = new ValidationError(ErrorCodes.MISSING_FIELD, 'Missing entityId', {
      recordIndex: 4,
    });

    expect(error).toBeInstanceOf(SeqLensError);
    expect(error.name).toBe('ValidationError');
    expect(error.message).toBe('Missing entityId (record 4)');
    expect(isSeqLensError(error)).toBe(true);
    expect(isSeqLensError(new Error('plain'))).toBe(false);
  });
});
