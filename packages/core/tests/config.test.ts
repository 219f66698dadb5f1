import { describe, expect, it } from 'vitest';
import { CastError, Logger, loadConfig } from '../src/index.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig({})).toEqual({
      logging: { level: 'warn', format: 'text' },
      relabel: { maxDepth: 4096 },
    });
  });

  it('reads SHAPECAST_* variables', () => {
    expect(
      loadConfig({
        SHAPECAST_LOG_LEVEL: 'debug',
        SHAPECAST_LOG_FORMAT: 'json',
        SHAPECAST_RELABEL_MAX_DEPTH: '12',
        UNRELATED: 'ignored',
      })
    ).toEqual({
      logging: { level: 'debug', format: 'json' },
      relabel: { maxDepth: 12 },
    });
  });

  it('treats empty variables as unset', () => {
    expect(loadConfig({ SHAPECAST_LOG_LEVEL: '' }).logging.level).toBe('warn');
  });

  it('rejects invalid values', () => {
    let error: unknown;
    try {
      loadConfig({ SHAPECAST_LOG_LEVEL: 'loud', SHAPECAST_RELABEL_MAX_DEPTH: '0' });
    } catch (caught) {
      error = caught;
    }

    expect(error).toBeInstanceOf(CastError);
    if (!(error instanceof CastError)) return;
    expect(error.code).toBe('CONFIGURATION_ERROR');
    expect(error.message.split('\n')[0]).toBe('Invalid shapecast environment:');
    expect(error.message).toContain('- SHAPECAST_LOG_LEVEL: ');
    expect(error.message).toContain('- SHAPECAST_RELABEL_MAX_DEPTH: ');
  });
});

describe('Logger', () => {
  function capture(options: ConstructorParameters<typeof Logger>[0]) {
    const lines: string[] = [];
    const logger = new Logger({ ...options, write: (line) => lines.push(line) });
    return { logger, lines };
  }

  it('filters by level', () => {
    const { logger, lines } = capture({ level: 'warn', format: 'json' });
    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');
    logger.error('shown too');

    expect(lines.map((line) => JSON.parse(line).msg)).toEqual(['shown', 'shown too']);
  });

  it('writes nothing when silent', () => {
    const { logger, lines } = capture({ level: 'silent' });
    logger.error('hidden');
    expect(lines).toEqual([]);
  });

  it('writes JSON records', () => {
    const { logger, lines } = capture({ level: 'debug', format: 'json' });
    logger.info('cast done', { targetType: 'Point' });

    const record = JSON.parse(lines[0] ?? '{}');
    expect(record).toMatchObject({ level: 'info', msg: 'cast done', targetType: 'Point' });
    expect(typeof record.ts).toBe('string');
  });

  it('writes text lines with extra fields', () => {
    const { logger, lines } = capture({ level: 'info' });
    logger.info('hello', { a: 1, b: 'x', skipped: undefined });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\[[^\]]+\] INFO hello a=1 b=x$/);
  });

  it('merges child fields', () => {
    const { logger, lines } = capture({ level: 'debug', format: 'json' });
    logger.child({ caster: 'recursive' }).warn('dropped', { field: 'extra' });

    expect(JSON.parse(lines[0] ?? '{}')).toMatchObject({
      level: 'warn',
      msg: 'dropped',
      caster: 'recursive',
      field: 'extra',
    });
  });
});
