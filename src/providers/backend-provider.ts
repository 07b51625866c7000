/**
 * Generic adapter-backed provider.
 *
 * Every concrete backend is the same four steps: parse the key, get a token
 * (for token-based backends), call the adapter, classify failures. What
 * varies per backend is captured in a BackendDefinition.
 */

import type {
  AdapterContext,
  AuthResult,
  BackendAdapter,
  CallOptions,
  Capabilities,
  FactoryContext,
  Metadata,
  Provider,
  RawSecret,
  Reference,
  SecretValue,
  StructuredReference,
} from './types';
import { createSecretValue } from './types';
import { classifyError, type ErrorClassifier } from './classify';
import { AuthError, ConfigError, isNotFound } from './errors';
import { TokenCache } from './token-cache';
import { silentLogger, type Logger } from '../core/logger';

/** What the adapter is asked for */
export interface ResolveTarget {
  path: string;
  version?: string;
}

export interface BackendDefinition<R extends StructuredReference> {
  type: string;
  capabilities: Capabilities;
  classifier: ErrorClassifier;
  /** Pure; throws MalformedReferenceError only */
  parse(key: string): R;
  target(ref: R): ResolveTarget;
  /** Pick the requested field out of a fetched secret; defaults to the raw value */
  select?(raw: RawSecret, ref: R): string;
  /** Path passed to listItems by validate() */
  listPath?: string;
}

/** One in-flight authentication and the number of callers awaiting it */
interface PendingAuth {
  promise: Promise<string>;
  controller: AbortController;
  waiters: number;
}

function abortReason(signal: AbortSignal): Error {
  if (signal.reason instanceof Error) return signal.reason;
  const error = new Error('The operation was aborted', { cause: signal.reason });
  error.name = 'AbortError';
  return error;
}

export interface BackendProviderOptions {
  logger?: Logger;
  now?: () => number;
}

export class BackendProvider<R extends StructuredReference> implements Provider {
  readonly type: string;

  private readonly cache: TokenCache;
  private readonly logger: Logger;
  private pendingAuth: PendingAuth | undefined;

  constructor(
    readonly name: string,
    private readonly definition: BackendDefinition<R>,
    private readonly adapter: BackendAdapter,
    private readonly config: Readonly<Record<string, unknown>>,
    options: BackendProviderOptions = {}
  ) {
    this.type = definition.type;
    this.cache = new TokenCache(options.now);
    this.logger = options.logger ?? silentLogger;
  }

  async resolve(ref: Reference, options?: CallOptions): Promise<SecretValue> {
    const parsed = this.definition.parse(ref.key);
    const target = this.definition.target(parsed);
    const ctx = this.context(options);
    const token = await this.token(ctx, ref.key);

    let raw: RawSecret;
    try {
      raw = await this.adapter.getSecret(ctx, token, target.path, target.version);
    } catch (err) {
      throw this.fail(err, ref.key, 'get');
    }

    const value = this.definition.select ? this.definition.select(raw, parsed) : raw.value;
    this.logger.debug(`${this.name}: resolved ${target.path}`);

    return createSecretValue({
      value,
      version: raw.version ?? target.version,
      updatedAt: raw.updatedAt,
      metadata: { ...raw.metadata, provider: this.name },
    });
  }

  async describe(ref: Reference, options?: CallOptions): Promise<Metadata> {
    const parsed = this.definition.parse(ref.key);
    const target = this.definition.target(parsed);
    const ctx = this.context(options);
    const token = await this.token(ctx, ref.key);

    try {
      const item = await this.adapter.describeItem(ctx, token, target.path);
      return {
        exists: true,
        version: item.version,
        updatedAt: item.updatedAt,
        size: item.size,
        type: item.type,
        tags: { ...item.tags },
      };
    } catch (err) {
      const error = this.fail(err, ref.key, 'describe');
      if (isNotFound(error)) {
        return { exists: false, tags: {} };
      }
      throw error;
    }
  }

  capabilities(): Capabilities {
    return this.definition.capabilities;
  }

  async validate(options?: CallOptions): Promise<void> {
    const ctx = this.context(options);
    const listPath = this.definition.listPath ?? '';
    const token = await this.token(ctx, listPath);
    try {
      await this.adapter.listItems(ctx, token, listPath);
    } catch (err) {
      throw this.fail(err, listPath, 'list');
    }
  }

  /** Drop the cached token; the next call authenticates again. */
  invalidateToken(): void {
    this.cache.clear();
  }

  private context(options?: CallOptions): AdapterContext {
    return { provider: this.name, config: this.config, signal: options?.signal };
  }

  /**
   * Cached token, or one fresh authentication shared by every caller
   * that arrives while it is in flight. Each caller's signal cancels only
   * that caller's wait; the shared request is aborted once nobody waits.
   */
  private async token(ctx: AdapterContext, key: string): Promise<string | undefined> {
    const authenticate = this.adapter.authenticate?.bind(this.adapter);
    if (!authenticate) {
      return undefined;
    }

    const cached = this.cache.get();
    if (cached !== undefined) {
      return cached;
    }

    let pending = this.pendingAuth;
    if (!pending) {
      const controller = new AbortController();
      const started: PendingAuth = {
        promise: this.authenticate(authenticate, { ...ctx, signal: controller.signal }, key),
        controller,
        waiters: 0,
      };
      const clear = () => {
        if (this.pendingAuth === started) this.pendingAuth = undefined;
      };
      void started.promise.then(clear, clear);
      this.pendingAuth = started;
      pending = started;
    }
    return this.waitFor(pending, ctx.signal);
  }

  private async waitFor(pending: PendingAuth, signal: AbortSignal | undefined): Promise<string> {
    if (!signal) {
      pending.waiters++;
      try {
        return await pending.promise;
      } finally {
        pending.waiters--;
      }
    }

    return new Promise<string>((resolve, reject) => {
      let done = false;
      const leave = () => {
        done = true;
        pending.waiters--;
        signal.removeEventListener('abort', onAbort);
      };
      const onAbort = () => {
        if (done) return;
        leave();
        if (pending.waiters === 0) {
          pending.controller.abort();
          if (this.pendingAuth === pending) this.pendingAuth = undefined;
        }
        reject(abortReason(signal));
      };

      pending.waiters++;
      void pending.promise.then(
        (token) => {
          if (done) return;
          leave();
          resolve(token);
        },
        (err: unknown) => {
          if (done) return;
          leave();
          reject(err);
        }
      );
      if (signal.aborted) {
        onAbort();
      } else {
        signal.addEventListener('abort', onAbort, { once: true });
      }
    });
  }

  private async authenticate(
    authenticate: (ctx: AdapterContext) => Promise<AuthResult>,
    ctx: AdapterContext,
    key: string
  ): Promise<string> {
    this.logger.debug(`${this.name}: authenticating`);
    try {
      const result = await authenticate(ctx);
      this.cache.set(result.token, result.ttlSeconds);
      this.logger.debug(`${this.name}: token cached for ${result.ttlSeconds}s`);
      return result.token;
    } catch (err) {
      throw classifyError(err, this.definition.classifier, {
        provider: this.name,
        key,
        operation: 'authenticate',
        phase: 'auth',
      });
    }
  }

  private fail(err: unknown, key: string, operation: string): Error {
    const error = classifyError(err, this.definition.classifier, { provider: this.name, key, operation });
    if (error instanceof AuthError) {
      this.cache.clear();
      this.logger.debug(`${this.name}: cleared cached token after auth failure`);
    }
    return error;
  }
}

/**
 * Adapter registered for `type`, or a ConfigError naming what is missing.
 */
export function requireAdapter(ctx: FactoryContext, type: string, name: string): BackendAdapter {
  const adapter = ctx.adapterFor(type);
  if (!adapter) {
    throw new ConfigError(
      'adapter',
      `No backend adapter registered for provider type "${type}" (provider "${name}")`,
      `Register an adapter for "${type}" with registry.registerAdapter() before creating providers`,
      { provider: name, value: type }
    );
  }
  return adapter;
}

/**
 * Freeze a capabilities literal so every caller sees the same constant.
 */
export function defineCapabilities(capabilities: Capabilities): Capabilities {
  return Object.freeze({ ...capabilities, authMethods: Object.freeze([...capabilities.authMethods]) });
}
