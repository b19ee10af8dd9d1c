import { describe, it, expect, vi, afterEach } from 'vitest';
import { LogLevel, LoggerFactory, createLogger } from '../utils/logger';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('drops messages below the configured level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = createLogger({ level: LogLevel.WARN, timestamp: false });

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('hello');

    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith('\x1b[33mskinkit [WARN] hello\x1b[0m');
  });

  it('passes the context through and honors the prefix', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    createLogger({ level: LogLevel.DEBUG, timestamp: false, prefix: 'rig' }).error('boom', { stage: 'read' });
    expect(log).toHaveBeenCalledWith('\x1b[31mrig [ERROR] boom\x1b[0m', { stage: 'read' });
  });

  it('changes level at runtime', () => {
    const logger = createLogger({ level: LogLevel.ERROR });
    expect(logger.shouldLog(LogLevel.INFO)).toBe(false);
    logger.setLevel(LogLevel.DEBUG);
    expect(logger.getLevel()).toBe(LogLevel.DEBUG);
    expect(logger.shouldLog(LogLevel.INFO)).toBe(true);
  });

  it('reports timing without durations when disabled', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = createLogger({ level: LogLevel.INFO, timestamp: false, duration: false });

    await expect(logger.withTiming('bake', async () => 7)).resolves.toBe(7);
    expect(log).toHaveBeenCalledWith('\x1b[36mskinkit [INFO] Completed operation: bake\x1b[0m', {
      operation: 'bake',
      success: true,
    });
  });

  it('rethrows from withTiming and records the failure', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = createLogger({ level: LogLevel.INFO, timestamp: false, duration: false });
    const failure = new Error('no skin');

    await expect(logger.withTiming('read', async () => {
      throw failure;
    })).rejects.toBe(failure);
    expect(log).toHaveBeenCalledWith('\x1b[36mskinkit [INFO] Completed operation: read\x1b[0m', {
      operation: 'read',
      success: false,
      error: 'no skin',
    });
  });

  it('builds factory loggers at their levels', () => {
    expect(LoggerFactory.forImport().getLevel()).toBe(LogLevel.INFO);
    expect(LoggerFactory.forDebug().getLevel()).toBe(LogLevel.DEBUG);
    expect(LoggerFactory.forRendering().getLevel()).toBe(LogLevel.WARN);
  });
});
