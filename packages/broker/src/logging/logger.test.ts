import { describe, it, expect } from 'vitest';
import { createLogger, parseLogLevel } from './logger.js';

const fixedNow = () => new Date('2026-01-02T03:04:05.000Z');

describe('createLogger', () => {
  it('formats timestamp, level and context', () => {
    const lines: string[] = [];
    const logger = createLogger({ level: 'debug', write: (line) => lines.push(line), now: fixedNow });

    logger.warn('dropping tool call', { requestId: 'req-1', toolCallId: 't1', provider: 'openai' });
    logger.info('plain');

    expect(lines).toEqual([
      '2026-01-02T03:04:05.000Z WARN [request=req-1 call=t1 provider=openai] dropping tool call',
      '2026-01-02T03:04:05.000Z INFO plain',
    ]);
  });

  it('filters messages below the configured level', () => {
    const lines: string[] = [];
    const logger = createLogger({ level: 'warn', write: (line) => lines.push(line), now: fixedNow });

    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error('e');

    expect(lines).toEqual([
      '2026-01-02T03:04:05.000Z WARN w',
      '2026-01-02T03:04:05.000Z ERROR e',
    ]);
  });
});

describe('parseLogLevel', () => {
  it('accepts known levels case-insensitively', () => {
    expect(parseLogLevel('DEBUG')).toBe('debug');
    expect(parseLogLevel(' error ')).toBe('error');
  });

  it('returns null for unknown or missing values', () => {
    expect(parseLogLevel('verbose')).toBeNull();
    expect(parseLogLevel(undefined)).toBeNull();
  });
});
