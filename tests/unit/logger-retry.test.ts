/**
 * Unit Tests: Logging and Retry
 */

import { describe, it, expect, vi } from 'vitest';
import {
  ApiLogger,
  isLogLevel,
  redactContext,
  redactHeaders,
  redactPatterns,
  redactString,
  type LogLevel,
} from '../../src/api/logger.js';
import {
  DEFAULT_RETRY_CONFIG,
  calculateDelay,
  isRetryableError,
  parseRetryAfter,
  withRetry,
} from '../../src/api/retry.js';
import { SyncError, TransportError } from '../../src/errors.js';
import { createCapturingLogger } from './fixtures/repository.js';

function collect(level: LogLevel = 'debug', json = false) {
  const lines: Array<[LogLevel, string]> = [];
  const logger = new ApiLogger({
    level,
    json,
    timestamps: false,
    sink: (lvl, line) => {
      lines.push([lvl, line]);
    },
  });
  return { logger, lines };
}

// =============================================================================
// Redaction
// =============================================================================

describe('redaction', () => {
  it('keeps the ends of long values', () => {
    expect(redactString('ghp_abcdefghijklmnop1234')).toBe('ghp_...1234');
    expect(redactString('short')).toBe('[REDACTED]');
  });

  it('redacts bearer tokens inside text', () => {
    expect(redactPatterns('Authorization: Bearer abc.def-123')).toBe('Authorization: Bear...-123');
  });

  it('redacts sensitive keys at any depth', () => {
    expect(
      redactContext({
        token: 'test-secret-value',
        scope: 'intro',
        nested: { password: 5, list: ['ok'] },
      })
    ).toEqual({
      token: 'test...alue',
      scope: 'intro',
      nested: { password: '[REDACTED]', list: ['ok'] },
    });
  });

  it('redacts signature headers', () => {
    expect(
      redactHeaders({ 'X-Hub-Signature-256': 'sha256=0123456789', Accept: 'application/json' })
    ).toEqual({ 'X-Hub-Signature-256': 'sha2...6789', Accept: 'application/json' });
  });

  it('recognizes log levels', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });
});

// =============================================================================
// ApiLogger
// =============================================================================

describe('ApiLogger', () => {
  it('formats human-readable lines with context', () => {
    const { logger, lines } = collect();
    logger.info('Sync started', { scope: 'intro' });

    expect(lines).toEqual([['info', '[INFO] Sync started {"scope":"intro"}']]);
  });

  it('drops entries below the configured level', () => {
    const { logger, lines } = collect('warn');
    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');

    expect(lines).toEqual([['warn', '[WARN] shown']]);
  });

  it('binds context on child loggers', () => {
    const { logger, lines } = collect();
    logger.child({ component: 'runner' }).debug('Queued', { scope: 'intro' });

    expect(lines[0][1]).toBe('[DEBUG] Queued {"component":"runner","scope":"intro"}');
  });

  it('appends error name and code', () => {
    const { logger, lines } = collect();
    logger.error('Run failed', new SyncError('boom', 'X_FAILED'));

    expect(lines[0][1]).toBe('[ERROR] Run failed \n  Error: SyncError (X_FAILED): boom');
  });

  it('writes redacted JSON entries', () => {
    const { logger, lines } = collect('debug', true);
    logger.info('Fetched', { token: 'abc' });

    expect(JSON.parse(lines[0][1])).toMatchObject({
      level: 'info',
      message: 'Fetched',
      context: { token: '[REDACTED]' },
    });
  });

  it('applies configuration changes', () => {
    const { logger, lines } = collect('error');
    logger.setConfig({ level: 'debug' });
    logger.debug('now visible');

    expect(logger.getConfig().level).toBe('debug');
    expect(lines).toHaveLength(1);
  });
});

// =============================================================================
// Retry
// =============================================================================

const NO_JITTER = { ...DEFAULT_RETRY_CONFIG, jitterFactor: 0 };

describe('calculateDelay', () => {
  it('doubles the delay per attempt', () => {
    expect(calculateDelay(1, NO_JITTER)).toBe(1000);
    expect(calculateDelay(3, NO_JITTER)).toBe(4000);
  });

  it('honours Retry-After and the maximum', () => {
    expect(calculateDelay(1, NO_JITTER, 2)).toBe(2000);
    expect(calculateDelay(1, NO_JITTER, 120)).toBe(30000);
    expect(calculateDelay(10, NO_JITTER)).toBe(30000);
  });
});

describe('isRetryableError', () => {
  it('retries transient statuses and network failures only', () => {
    expect(isRetryableError(new TransportError('x', 'TRANSPORT_ERROR', { status: 503 }), NO_JITTER)).toBe(true);
    expect(isRetryableError(new TransportError('x', 'NOT_FOUND', { status: 404 }), NO_JITTER)).toBe(false);
    expect(isRetryableError(new TransportError('x'), NO_JITTER)).toBe(false);
    expect(isRetryableError(new Error('fetch failed'), NO_JITTER)).toBe(true);
    expect(isRetryableError(new Error('bad input'), NO_JITTER)).toBe(false);
  });
});

describe('parseRetryAfter', () => {
  it('reads seconds', () => {
    expect(parseRetryAfter('5')).toBe(5);
  });

  it('ignores missing or unreadable values', () => {
    expect(parseRetryAfter(null)).toBeUndefined();
    expect(parseRetryAfter('soon')).toBeUndefined();
  });
});

describe('withRetry', () => {
  const fast = { baseDelayMs: 1, jitterFactor: 0 };

  it('retries until the call succeeds', async () => {
    const { logger } = createCapturingLogger();
    const onRetry = vi.fn();
    const fn = vi
      .fn<[], Promise<string>>()
      .mockRejectedValueOnce(new TransportError('unavailable', 'TRANSPORT_ERROR', { status: 503 }))
      .mockRejectedValueOnce(new Error('socket hang up'))
      .mockResolvedValue('ok');

    const result = await withRetry(fn, { ...fast, logger, onRetry });

    expect(result).toMatchObject({ success: true, data: 'ok', attempts: 3 });
    expect(onRetry).toHaveBeenCalledTimes(2);
  });

  it('stops at a non-retryable error', async () => {
    const { logger } = createCapturingLogger();
    const missing = new TransportError('missing', 'NOT_FOUND', { status: 404 });
    const result = await withRetry(() => Promise.reject(missing), { ...fast, logger });

    expect(result).toEqual({ success: false, error: missing, attempts: 1, totalTimeMs: expect.any(Number) });
  });

  it('gives up after the configured retries', async () => {
    const { logger, lines } = createCapturingLogger();
    const result = await withRetry(
      () => Promise.reject(new TransportError('down', 'TRANSPORT_ERROR', { status: 500 })),
      { ...fast, maxRetries: 1, logger }
    );

    expect(result.success).toBe(false);
    expect(result.attempts).toBe(2);
    expect(lines.some((line) => line.includes('All 1 retry attempts exhausted'))).toBe(true);
  });
});
