import { describe, it, expect, vi, afterEach } from 'vitest';
import { ConsoleLogger, createLogger, mask, silentLogger } from './logger';

describe('ConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  it('writes to stderr with level prefixes', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = new ConsoleLogger({ debug: true });

    logger.debug('loading');
    logger.info('ready');
    logger.warn('slow backend');
    logger.error('failed');

    expect(stderr.mock.calls).toEqual([['[debug] loading'], ['ready'], ['⚠️  slow backend'], ['❌ failed']]);
  });

  it('drops debug output unless enabled', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});
    new ConsoleLogger().debug('hidden');
    expect(stderr).not.toHaveBeenCalled();
  });

  it('turns debug on from SECRET_ROUTER_DEBUG', () => {
    vi.stubEnv('SECRET_ROUTER_DEBUG', '1');
    expect(createLogger().debugEnabled).toBe(true);
    vi.stubEnv('SECRET_ROUTER_DEBUG', 'true');
    expect(createLogger().debugEnabled).toBe(true);
    vi.stubEnv('SECRET_ROUTER_DEBUG', '');
    expect(createLogger().debugEnabled).toBe(false);
    expect(createLogger({ debug: true }).debugEnabled).toBe(true);
  });

  it('has a silent variant', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});
    silentLogger.error('nothing');
    expect(stderr).not.toHaveBeenCalled();
  });
});

describe('mask', () => {
  it('keeps only the length', () => {
    expect(mask('test-secret')).toBe('[REDACTED 11 chars]');
    expect(mask('')).toBe('(empty)');
    expect(mask(undefined)).toBe('(empty)');
  });
});
