import { describe, it, expect, afterEach, vi } from 'vitest';
import { gcpSecretManagerClassifier, parseGcpSecretReference, parseGcpVersion } from './gcp-secretmanager';
import { classifyError } from '../classify';
import { AuthError, ConfigError, MalformedReferenceError, NotFoundError } from '../errors';
import { createDefaultRegistry } from '../registry';
import type { BackendAdapter } from '../types';

describe('parseGcpVersion', () => {
  it('accepts latest and numbers only', () => {
    expect(parseGcpVersion('latest')).toBe('latest');
    expect(parseGcpVersion('12')).toBe('12');
    expect(parseGcpVersion('v12')).toBeUndefined();
    expect(parseGcpVersion('LATEST')).toBeUndefined();
  });
});

describe('parseGcpSecretReference', () => {
  it('parses short names with either version marker', () => {
    expect(parseGcpSecretReference('api-key')).toEqual({ name: 'api-key', version: undefined, field: undefined });
    expect(parseGcpSecretReference('api-key:3')).toMatchObject({ name: 'api-key', version: '3' });
    expect(parseGcpSecretReference('api-key@latest')).toMatchObject({ name: 'api-key', version: 'latest' });
  });

  it('splits the JSON path before the version', () => {
    expect(parseGcpSecretReference('db-config:2#.password')).toEqual({
      name: 'db-config',
      version: '2',
      field: '.password',
    });
  });

  it('keeps non-version suffixes in the name', () => {
    expect(parseGcpSecretReference('team:shared').name).toBe('team:shared');
  });

  it('parses full resource names', () => {
    expect(parseGcpSecretReference('projects/other/secrets/shared/versions/5#.user')).toEqual({
      name: 'shared',
      project: 'other',
      version: '5',
      field: '.user',
    });
    expect(parseGcpSecretReference('projects/other/secrets/shared')).toMatchObject({ project: 'other', version: undefined });
  });

  it('rejects malformed resource names', () => {
    expect(() => parseGcpSecretReference('projects/other/shared')).toThrow(MalformedReferenceError);
    expect(() => parseGcpSecretReference('projects/other/secrets/shared/versions/newest')).toThrow(
      'version must be "latest" or a number, got "newest"'
    );
  });
});

describe('gcpSecretManagerClassifier', () => {
  const ctx = { provider: 'gcp-sm', key: 'api-key', operation: 'get' };

  it('maps gRPC status text', () => {
    expect(classifyError(new Error('5 NOT_FOUND: Secret [api-key] not found'), gcpSecretManagerClassifier, ctx)).toBeInstanceOf(
      NotFoundError
    );
    expect(
      classifyError(new Error('7 PERMISSION_DENIED: Permission denied on resource'), gcpSecretManagerClassifier, ctx)
    ).toBeInstanceOf(AuthError);
  });
});

describe('GCP Secret Manager provider', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  const adapter: BackendAdapter = {
    getSecret: async (_ctx, _token, path, version) => ({
      value: JSON.stringify({ path, version: version ?? null, password: 'test-password' }),
    }),
    describeItem: async () => ({}),
    listItems: async () => [],
  };

  it('reads the project from GOOGLE_CLOUD_PROJECT when unset', async () => {
    vi.stubEnv('GOOGLE_CLOUD_PROJECT', 'env-project');
    const provider = createDefaultRegistry({ adapters: { 'gcp.secretmanager': adapter } }).createProvider('gsm', {
      type: 'gcp.secretmanager',
      config: {},
    });
    await expect(provider.resolve({ provider: 'gsm', key: 'db#.path' })).resolves.toMatchObject({
      value: 'projects/env-project/secrets/db',
    });
  });

  it('requires a project', () => {
    vi.stubEnv('GOOGLE_CLOUD_PROJECT', '');
    const registry = createDefaultRegistry({ adapters: { 'gcp.secretmanager': adapter } });
    expect(() => registry.createProvider('gsm', { type: 'gcp.secretmanager', config: {} })).toThrow(ConfigError);
  });

  it('selects JSON fields', async () => {
    const provider = createDefaultRegistry({ adapters: { 'gcp.secretmanager': adapter } }).createProvider('gsm', {
      type: 'gcp.secretmanager',
      config: { project_id: 'acme' },
    });
    await expect(provider.resolve({ provider: 'gsm', key: 'db@3#.password' })).resolves.toMatchObject({
      value: 'test-password',
      version: '3',
    });
  });
});
