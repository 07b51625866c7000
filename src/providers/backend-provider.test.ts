import { describe, it, expect, vi } from 'vitest';
import { BackendProvider, requireAdapter, defineCapabilities, type BackendDefinition } from './backend-provider';
import { infisicalDefinition } from './backends/infisical';
import { AuthError, BackendError, ConfigError, MalformedReferenceError, NotFoundError, UserError } from './errors';
import type { AdapterContext, AuthResult, BackendAdapter, FactoryContext, RawSecret, StructuredReference } from './types';
import { silentLogger } from '../core/logger';

/** In-memory adapter keyed by path, with an optional token handshake */
class FakeAdapter implements BackendAdapter {
  readonly secrets = new Map<string, RawSecret>();
  authenticateCalls = 0;
  tokensSeen: Array<string | undefined> = [];
  failNextGet: unknown = undefined;
  authResult: AuthResult = { token: 'token-1', ttlSeconds: 300 };
  authDelayMs = 0;
  authSignals: Array<AbortSignal | undefined> = [];

  async authenticate(ctx: AdapterContext): Promise<AuthResult> {
    this.authenticateCalls++;
    this.authSignals.push(ctx.signal);
    if (this.authDelayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.authDelayMs));
    }
    return { ...this.authResult, token: `token-${this.authenticateCalls}` };
  }

  async getSecret(_ctx: AdapterContext, token: string | undefined, path: string, version?: string): Promise<RawSecret> {
    this.tokensSeen.push(token);
    if (this.failNextGet !== undefined) {
      const err = this.failNextGet;
      this.failNextGet = undefined;
      throw err;
    }
    const secret = this.secrets.get(version ? `${path}@${version}` : path);
    if (!secret) throw new BackendError('get', path, 'secret not found', { statusCode: 404 });
    return secret;
  }

  async describeItem(_ctx: AdapterContext, _token: string | undefined, path: string) {
    const secret = this.secrets.get(path);
    if (!secret) throw new BackendError('describe', path, 'secret not found', { statusCode: 404 });
    return { version: secret.version, size: secret.value.length, type: 'shared', tags: { env: 'dev' } };
  }

  async listItems(): Promise<string[]> {
    return [...this.secrets.keys()];
  }
}

function provider(adapter: FakeAdapter, now?: () => number) {
  return new BackendProvider('inf', infisicalDefinition, adapter, {}, { now });
}

describe('BackendProvider.resolve', () => {
  it('resolves a versioned reference end to end', async () => {
    const adapter = new FakeAdapter();
    adapter.secrets.set('item@3', { value: 'secret-v3' });
    const getSecret = vi.spyOn(adapter, 'getSecret');

    const value = await provider(adapter).resolve({ provider: 'inf', key: 'item@v3' });

    expect(getSecret).toHaveBeenCalledWith(expect.objectContaining({ provider: 'inf' }), 'token-1', 'item', '3');
    expect(value.value).toBe('secret-v3');
    expect(value.version).toBe('3');
    expect(value.metadata).toEqual({ provider: 'inf' });
    expect(Object.isFrozen(value)).toBe(true);
  });

  it('prefers the version reported by the adapter', async () => {
    const adapter = new FakeAdapter();
    adapter.secrets.set('backend/DB_URL', { value: 'x', version: '7', metadata: { environment: 'dev' } });
    const value = await provider(adapter).resolve({ provider: 'inf', key: 'backend/DB_URL' });
    expect(value.version).toBe('7');
    expect(value.metadata).toEqual({ environment: 'dev', provider: 'inf' });
  });

  it('rejects malformed references before any I/O', async () => {
    const adapter = new FakeAdapter();
    await expect(provider(adapter).resolve({ provider: 'inf', key: 'folder/' })).rejects.toBeInstanceOf(
      MalformedReferenceError
    );
    expect(adapter.authenticateCalls).toBe(0);
  });

  it('classifies a missing secret as NotFound', async () => {
    const adapter = new FakeAdapter();
    await expect(provider(adapter).resolve({ provider: 'inf', key: 'MISSING' })).rejects.toBeInstanceOf(NotFoundError);
  });

  it('surfaces unclassified failures as UserError with the backend suggestion', async () => {
    const adapter = new FakeAdapter();
    adapter.failNextGet = new Error('socket hang up');
    const err = await provider(adapter)
      .resolve({ provider: 'inf', key: 'X' })
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(UserError);
    expect(err instanceof UserError && err.suggestion).toBe('Check Infisical connectivity, project_id and environment');
  });
});

describe('token handling', () => {
  it('authenticates once for concurrent resolves', async () => {
    const adapter = new FakeAdapter();
    adapter.authDelayMs = 10;
    adapter.secrets.set('A', { value: 'a' });
    const p = provider(adapter);

    const values = await Promise.all(
      Array.from({ length: 10 }, () => p.resolve({ provider: 'inf', key: 'A' }))
    );

    expect(values.map((v) => v.value)).toEqual(Array(10).fill('a'));
    expect(adapter.authenticateCalls).toBe(1);
    expect(new Set(adapter.tokensSeen)).toEqual(new Set(['token-1']));
  });

  it('cancels only the caller that aborts while authentication is shared', async () => {
    const adapter = new FakeAdapter();
    adapter.authDelayMs = 20;
    adapter.secrets.set('A', { value: 'a' });
    const p = provider(adapter);
    const controller = new AbortController();
    const reason = new Error('aborted');
    reason.name = 'AbortError';

    const first = p.resolve({ provider: 'inf', key: 'A' }, { signal: controller.signal }).catch((e: unknown) => e);
    const second = p.resolve({ provider: 'inf', key: 'A' });
    controller.abort(reason);

    await expect(first).resolves.toBe(reason);
    await expect(second).resolves.toMatchObject({ value: 'a' });
    expect(adapter.authenticateCalls).toBe(1);
    expect(adapter.authSignals[0]?.aborted).toBe(false);
  });

  it('aborts the shared authentication once every caller has gone', async () => {
    const adapter = new FakeAdapter();
    adapter.authDelayMs = 20;
    adapter.secrets.set('A', { value: 'a' });
    const p = provider(adapter);
    const controller = new AbortController();

    const first = p.resolve({ provider: 'inf', key: 'A' }, { signal: controller.signal }).catch((e: unknown) => e);
    controller.abort();

    const err = await first;
    expect(err instanceof Error && err.name).toBe('AbortError');
    expect(adapter.authSignals[0]?.aborted).toBe(true);

    await expect(p.resolve({ provider: 'inf', key: 'A' })).resolves.toMatchObject({ value: 'a' });
    expect(adapter.authenticateCalls).toBe(2);
  });

  it('reuses the cached token until it expires', async () => {
    let now = 0;
    const adapter = new FakeAdapter();
    adapter.authResult = { token: 'ignored', ttlSeconds: 60 };
    adapter.secrets.set('A', { value: 'a' });
    const p = provider(adapter, () => now);

    await p.resolve({ provider: 'inf', key: 'A' });
    now = 54_999;
    await p.resolve({ provider: 'inf', key: 'A' });
    expect(adapter.authenticateCalls).toBe(1);

    now = 55_000;
    await p.resolve({ provider: 'inf', key: 'A' });
    expect(adapter.authenticateCalls).toBe(2);
    expect(adapter.tokensSeen).toEqual(['token-1', 'token-1', 'token-2']);
  });

  it('clears the token after an auth failure', async () => {
    const adapter = new FakeAdapter();
    adapter.secrets.set('A', { value: 'a' });
    const p = provider(adapter);

    await p.resolve({ provider: 'inf', key: 'A' });
    adapter.failNextGet = Object.assign(new Error('token expired'), { statusCode: 401 });
    await expect(p.resolve({ provider: 'inf', key: 'A' })).rejects.toBeInstanceOf(AuthError);

    await p.resolve({ provider: 'inf', key: 'A' });
    expect(adapter.authenticateCalls).toBe(2);
  });

  it('keeps the token after a non-auth failure', async () => {
    const adapter = new FakeAdapter();
    adapter.secrets.set('A', { value: 'a' });
    const p = provider(adapter);

    await p.resolve({ provider: 'inf', key: 'A' });
    await expect(p.resolve({ provider: 'inf', key: 'B' })).rejects.toBeInstanceOf(NotFoundError);
    await p.resolve({ provider: 'inf', key: 'A' });
    expect(adapter.authenticateCalls).toBe(1);
  });

  it('reports a failed authentication as AuthError', async () => {
    const adapter = new FakeAdapter();
    vi.spyOn(adapter, 'authenticate').mockRejectedValue(new Error('invalid client secret'));
    const err = await provider(adapter)
      .resolve({ provider: 'inf', key: 'A' })
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(AuthError);
    expect(err instanceof AuthError && err.message).toBe('authentication failed for inf: invalid client secret');
  });

  it('retries authentication on the next call after a failure', async () => {
    const adapter = new FakeAdapter();
    adapter.secrets.set('A', { value: 'a' });
    const authenticate = vi
      .spyOn(adapter, 'authenticate')
      .mockRejectedValueOnce(new Error('unauthorized'))
      .mockResolvedValueOnce({ token: 'fresh', ttlSeconds: 60 });
    const p = provider(adapter);

    await expect(p.resolve({ provider: 'inf', key: 'A' })).rejects.toBeInstanceOf(AuthError);
    await expect(p.resolve({ provider: 'inf', key: 'A' })).resolves.toMatchObject({ value: 'a' });
    expect(authenticate).toHaveBeenCalledTimes(2);
  });

  it('skips authentication for adapters without it', async () => {
    const adapter = new FakeAdapter();
    const plain: BackendAdapter = {
      getSecret: (ctx, token, path) => adapter.getSecret(ctx, token, path),
      describeItem: (ctx, token, path) => adapter.describeItem(ctx, token, path),
      listItems: async () => [],
    };
    adapter.secrets.set('A', { value: 'a' });
    const p = new BackendProvider('inf', infisicalDefinition, plain, {});
    await p.resolve({ provider: 'inf', key: 'A' });
    expect(adapter.tokensSeen).toEqual([undefined]);
  });

  it('invalidateToken forces a new authentication', async () => {
    const adapter = new FakeAdapter();
    adapter.secrets.set('A', { value: 'a' });
    const p = provider(adapter);
    await p.resolve({ provider: 'inf', key: 'A' });
    p.invalidateToken();
    await p.resolve({ provider: 'inf', key: 'A' });
    expect(adapter.authenticateCalls).toBe(2);
  });
});

describe('BackendProvider.describe', () => {
  it('returns metadata without the value', async () => {
    const adapter = new FakeAdapter();
    adapter.secrets.set('A', { value: 'abcd', version: '2' });
    const meta = await provider(adapter).describe({ provider: 'inf', key: 'A' });
    expect(meta).toEqual({ exists: true, version: '2', updatedAt: undefined, size: 4, type: 'shared', tags: { env: 'dev' } });
  });

  it('reports a missing secret as exists: false while resolve throws', async () => {
    const adapter = new FakeAdapter();
    const p = provider(adapter);
    await expect(p.describe({ provider: 'inf', key: 'GONE' })).resolves.toEqual({ exists: false, tags: {} });
    await expect(p.resolve({ provider: 'inf', key: 'GONE' })).rejects.toBeInstanceOf(NotFoundError);
  });
});

describe('BackendProvider.validate', () => {
  it('authenticates and lists the configured path', async () => {
    const adapter = new FakeAdapter();
    const listItems = vi.spyOn(adapter, 'listItems');
    await provider(adapter).validate();
    expect(adapter.authenticateCalls).toBe(1);
    expect(listItems).toHaveBeenCalledWith(expect.anything(), 'token-1', '/');
  });

  it('passes the abort signal to the adapter and rethrows aborts untouched', async () => {
    const adapter = new FakeAdapter();
    const abort = new Error('aborted');
    abort.name = 'AbortError';
    vi.spyOn(adapter, 'listItems').mockRejectedValue(abort);
    const controller = new AbortController();

    await expect(provider(adapter).validate({ signal: controller.signal })).rejects.toBe(abort);
  });
});

describe('select', () => {
  it('applies the definition selector to the fetched value', async () => {
    const definition: BackendDefinition<StructuredReference> = {
      type: 'upper',
      capabilities: defineCapabilities({
        supportsVersioning: false,
        supportsMetadata: false,
        supportsWatching: false,
        supportsBinary: false,
        requiresAuth: false,
        authMethods: [],
      }),
      classifier: { backend: 'Upper', rules: [], fallbackSuggestion: 'n/a' },
      parse: (key) => ({ name: key }),
      target: (ref) => ({ path: ref.name }),
      select: (raw) => raw.value.toUpperCase(),
    };
    const adapter = new FakeAdapter();
    adapter.secrets.set('a', { value: 'quiet' });
    const p = new BackendProvider('up', definition, adapter, {});
    await expect(p.resolve({ provider: 'up', key: 'a' })).resolves.toMatchObject({ value: 'QUIET' });
  });
});

describe('requireAdapter', () => {
  const ctx = (adapter?: BackendAdapter): FactoryContext => ({
    logger: silentLogger,
    adapterFor: () => adapter,
    createProvider: () => {
      throw new Error('unused');
    },
  });

  it('returns the registered adapter', () => {
    const adapter = new FakeAdapter();
    expect(requireAdapter(ctx(adapter), 'infisical', 'inf')).toBe(adapter);
  });

  it('names the missing adapter', () => {
    expect(() => requireAdapter(ctx(), 'infisical', 'inf')).toThrow(ConfigError);
    expect(() => requireAdapter(ctx(), 'infisical', 'inf')).toThrow(
      'No backend adapter registered for provider type "infisical" (provider "inf")'
    );
  });
});
