import { Effect } from 'effect';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { ConsoleLogger, createMemoryLogger, defaultLogConfig, isLogLevel, type LogConfig } from './logging.js';

const plain: LogConfig = { level: 'trace', enableColors: false, detailed: false, includeStackTrace: false };

function capture(config: LogConfig) {
  const lines: string[] = [];
  const logger = new ConsoleLogger(config, 'cards', (_entry, line) => {
    lines.push(line);
  });
  return { logger, lines };
}

afterEach(() => {
  vi.unstubAllEnvs();
});

describe('ConsoleLogger', () => {
  it('prefixes warnings and errors in plain output', () => {
    const { logger, lines } = capture(plain);

    Effect.runSync(logger.info('Created PROJ-1'));
    Effect.runSync(logger.warn('Slow response'));
    Effect.runSync(logger.error('Request failed', new Error('boom')));

    expect(lines).toEqual(['Created PROJ-1', 'Warning: Slow response', 'Error: Request failed: boom']);
  });

  it('adds timestamp, level, module and metadata in detailed output', () => {
    const { logger, lines } = capture({ ...plain, detailed: true });

    Effect.runSync(logger.info('hello', { a: 1 }));

    expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z INFO  \[cards\] {6}hello {"a":1}$/);
  });

  it('drops entries below the level, for every module logger', () => {
    const { logger, entries } = createMemoryLogger('warn');
    const session = logger.withModule('session');

    Effect.runSync(session.info('ignored'));
    Effect.runSync(session.warn('kept'));

    expect(entries.map((e) => [e.module, e.level, e.message])).toEqual([['session', 'warn', 'kept']]);
  });
});

describe('log configuration', () => {
  it('recognizes level names', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });

  it('reads the level and format from the environment', () => {
    vi.stubEnv('SPRINTDECK_LOG_LEVEL', 'debug');
    vi.stubEnv('SPRINTDECK_LOG_DETAILED', '1');

    expect(defaultLogConfig()).toMatchObject({ level: 'debug', detailed: true });
  });

  it('falls back to info for an unknown level', () => {
    vi.stubEnv('SPRINTDECK_LOG_LEVEL', 'loud');

    expect(defaultLogConfig().level).toBe('info');
  });
});
