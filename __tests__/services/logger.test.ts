/**
 * Logger Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { LogLevel, Logger, resolveLogLevel } from '../../services/logger';

describe('resolveLogLevel', () => {
  it('prefers an explicit LOG_LEVEL', () => {
    expect(resolveLogLevel({ LOG_LEVEL: 'warn', NODE_ENV: 'development' })).toBe(LogLevel.WARN);
    expect(resolveLogLevel({ LOG_LEVEL: ' Silent ' })).toBe(LogLevel.SILENT);
  });

  it('falls back to NODE_ENV', () => {
    expect(resolveLogLevel({ NODE_ENV: 'production' })).toBe(LogLevel.WARN);
    expect(resolveLogLevel({ NODE_ENV: 'test' })).toBe(LogLevel.ERROR);
    expect(resolveLogLevel({ LOG_LEVEL: 'verbose' })).toBe(LogLevel.DEBUG);
  });
});

describe('Logger', () => {
  it('passes every entry to callbacks regardless of level', () => {
    const callback = vi.fn();
    const log = new Logger('Test', LogLevel.SILENT, [callback]);

    log.debug('quiet', { cue: 3 });

    expect(callback).toHaveBeenCalledTimes(1);
    expect(callback.mock.calls[0][0]).toMatchObject({
      level: LogLevel.DEBUG,
      context: 'Test',
      message: 'quiet',
      data: { cue: 3 },
    });
  });

  it('prints only entries at or above its level', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const log = new Logger('Test', LogLevel.WARN);

    log.info('hidden');
    log.warn('shown');

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[Test]', 'shown');
    warn.mockRestore();
    info.mockRestore();
  });

  it('gives children a nested context and shared callbacks', () => {
    const callback = vi.fn();
    const parent = new Logger('Job', LogLevel.SILENT, [callback]);

    parent.child('Merge').info('done');

    expect(callback.mock.calls[0][0]).toMatchObject({ context: 'Job:Merge', message: 'done' });
  });
});
