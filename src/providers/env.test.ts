import { describe, it, expect } from 'vitest';
import { EnvProvider, createEnvProvider } from './env';
import { LiteralProvider, createLiteralProvider } from './literal';
import { ConfigError, MalformedReferenceError, NotFoundError } from './errors';
import { silentLogger } from '../core/logger';
import type { FactoryContext } from './types';

const ctx: FactoryContext = {
  logger: silentLogger,
  adapterFor: () => undefined,
  createProvider: () => {
    throw new Error('unused');
  },
};

describe('EnvProvider', () => {
  const env = { APP_DATABASE_URL: 'postgres://localhost/app', EMPTY: '' };

  it('reads variables with the configured prefix', async () => {
    const provider = new EnvProvider('shell', { prefix: 'APP_', env });
    const value = await provider.resolve({ provider: 'shell', key: ' DATABASE_URL ' });
    expect(value.value).toBe('postgres://localhost/app');
    expect(value.metadata).toEqual({ provider: 'shell', variable: 'APP_DATABASE_URL' });
  });

  it('returns empty variables, which exist', async () => {
    const provider = new EnvProvider('shell', { env });
    await expect(provider.resolve({ provider: 'shell', key: 'EMPTY' })).resolves.toMatchObject({ value: '' });
  });

  it('reports unset variables as NotFound', async () => {
    const provider = new EnvProvider('shell', { env });
    await expect(provider.resolve({ provider: 'shell', key: 'MISSING' })).rejects.toBeInstanceOf(NotFoundError);
    await expect(provider.describe({ provider: 'shell', key: 'MISSING' })).resolves.toEqual({ exists: false, tags: {} });
  });

  it('describes a variable by its byte size', async () => {
    const provider = new EnvProvider('shell', { env: { GREETING: 'héllo' } });
    await expect(provider.describe({ provider: 'shell', key: 'GREETING' })).resolves.toEqual({
      exists: true,
      size: 6,
      type: 'environment',
      tags: { variable: 'GREETING' },
    });
  });

  it('rejects empty keys', async () => {
    const provider = new EnvProvider('shell', { env });
    await expect(provider.resolve({ provider: 'shell', key: ' ' })).rejects.toBeInstanceOf(MalformedReferenceError);
  });

  it('validates without I/O and needs no auth', async () => {
    const provider = createEnvProvider('shell', {}, ctx);
    await expect(provider.validate()).resolves.toBeUndefined();
    expect(provider.capabilities().requiresAuth).toBe(false);
  });
});

describe('LiteralProvider', () => {
  it('serves configured values', async () => {
    const provider = createLiteralProvider('dev', { values: { API_KEY: 'test-api-key' } }, ctx);
    await expect(provider.resolve({ provider: 'dev', key: 'API_KEY' })).resolves.toMatchObject({
      value: 'test-api-key',
      metadata: { provider: 'dev' },
    });
    await expect(provider.describe({ provider: 'dev', key: 'API_KEY' })).resolves.toEqual({
      exists: true,
      size: 12,
      type: 'literal',
      tags: {},
    });
  });

  it('reports unknown keys as NotFound', async () => {
    const provider = new LiteralProvider('dev', {});
    await expect(provider.resolve({ provider: 'dev', key: 'NOPE' })).rejects.toThrow('secret not found: NOPE in dev');
  });

  it('requires string values', () => {
    expect(() => createLiteralProvider('dev', { values: { PORT: 5432 } }, ctx)).toThrow(ConfigError);
  });
});
