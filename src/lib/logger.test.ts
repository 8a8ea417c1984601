import { describe, it, expect, vi, afterEach } from 'vitest';
import { isLogLevel, logger } from './logger';

describe('logger', () => {
  const initialLevel = logger.getLogLevel();

  afterEach(() => {
    logger.setLogLevel(initialLevel);
    vi.restoreAllMocks();
  });

  it('drops entries below the current level but always emits errors', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    logger.setLogLevel('error');
    logger.info('Test', 'hidden');
    logger.warn('Test', 'hidden too');
    logger.error('Test', 'shown', 42);

    expect(info).not.toHaveBeenCalled();
    expect(warn).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledTimes(1);
    expect(String(error.mock.calls[0][0])).toMatch(/shown$/);
    expect(error.mock.calls[0][1]).toBe(42);
  });

  it('prints tag and message on the console line', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});

    logger.setLogLevel('debug');
    logger.info('Deployer', 'Connected');

    expect(info).toHaveBeenCalledTimes(1);
    expect(String(info.mock.calls[0][0])).toContain('[Deployer]');
    expect(String(info.mock.calls[0][0])).toMatch(/Connected$/);
  });
});

describe('isLogLevel', () => {
  it('recognises the four levels only', () => {
    expect(['debug', 'info', 'warn', 'error'].every(isLogLevel)).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});
