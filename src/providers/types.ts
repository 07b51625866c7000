/**
 * Provider contract
 *
 * Every secret backend, whether a cloud secret manager, a password manager
 * CLI or a unified router over several services, is exposed through the
 * same small interface defined here.
 */

import type { Logger } from '../core/logger';
import { MalformedReferenceError } from './errors';

// --- References ------------------------------------------

/**
 * A reference as written by a caller: which provider, and an opaque key
 * whose grammar belongs to that provider's backend.
 */
export interface Reference {
  provider: string;
  key: string;
}

/**
 * Parsed form of a key. Backends extend this with their own parts
 * (folder, vault, project, ...).
 */
export interface StructuredReference {
  /** Never empty for a non-empty key */
  name: string;
  /** Absent means latest */
  version?: number | string;
  /** Nested field or JSON path selector */
  field?: string;
}

// --- Reference URIs ------------------------------------

const PROVIDER_NAME_PATTERN = /^[a-z][a-z0-9_-]{0,63}$/;
const URI_PATTERN = /^([A-Za-z][A-Za-z0-9_-]*):\/\/(.*)$/s;

/** Provider names: a lower-case letter, then up to 63 of [a-z0-9_-] */
export function isValidProviderName(name: string): boolean {
  return PROVIDER_NAME_PATTERN.test(name);
}

/** Longest key accepted in a reference URI */
export const MAX_KEY_LENGTH = 1024;

/**
 * Parse "provider://key", or a plain key that belongs to `defaultProvider`.
 *
 * Provider names are lower-cased. The key is opaque here; the provider's
 * own parser checks its grammar.
 *
 * @example
 *   parseReferenceUri('prod-aws://prod/db')   // { provider: 'prod-aws', key: 'prod/db' }
 *   parseReferenceUri('DATABASE_URL', 'env')  // { provider: 'env', key: 'DATABASE_URL' }
 */
export function parseReferenceUri(uri: string, defaultProvider?: string): Reference {
  const match = URI_PATTERN.exec(uri);
  const provider = match ? match[1].toLowerCase() : defaultProvider;
  const key = match ? match[2] : uri;

  if (provider === undefined) {
    throw new MalformedReferenceError(uri, 'no provider given and no default provider configured');
  }
  if (!isValidProviderName(provider)) {
    throw new MalformedReferenceError(
      uri,
      `invalid provider name "${provider}": must start with a letter and use at most 64 letters, digits, hyphens or underscores`
    );
  }
  if (key.trim().length === 0) {
    throw new MalformedReferenceError(uri, 'key cannot be empty');
  }
  if (key.length > MAX_KEY_LENGTH) {
    throw new MalformedReferenceError(uri, `key exceeds maximum length of ${MAX_KEY_LENGTH} characters`);
  }
  return { provider, key };
}

// --- Values ----------------------------------------------

export interface SecretValue {
  readonly value: string;
  readonly version?: string;
  readonly updatedAt?: Date;
  readonly metadata: Readonly<Record<string, string>>;
}

/**
 * Build an immutable SecretValue. Called once per resolve; values are
 * never cached.
 */
export function createSecretValue(init: {
  value: string;
  version?: string;
  updatedAt?: Date;
  metadata?: Record<string, string>;
}): SecretValue {
  return Object.freeze({
    value: init.value,
    version: init.version,
    updatedAt: init.updatedAt,
    metadata: Object.freeze({ ...init.metadata }),
  });
}

/**
 * Everything known about a secret except its value.
 * `exists: false` is a normal result, not an error.
 */
export interface Metadata {
  exists: boolean;
  version?: string;
  updatedAt?: Date;
  size?: number;
  type?: string;
  tags: Record<string, string>;
}

export interface Capabilities {
  supportsVersioning: boolean;
  supportsMetadata: boolean;
  supportsWatching: boolean;
  supportsBinary: boolean;
  requiresAuth: boolean;
  authMethods: readonly string[];
}

// --- Provider --------------------------------------------

export interface CallOptions {
  /** Passed through to adapter calls; the core adds no timeout of its own */
  signal?: AbortSignal;
}

export interface Provider {
  /** Instance name from configuration (e.g. "prod-aws") */
  readonly name: string;
  /** Registered type (e.g. "aws", "vault", "onepassword") */
  readonly type: string;

  /**
   * Fetch a secret.
   * @throws NotFoundError, AuthError, UserError or MalformedReferenceError
   */
  resolve(ref: Reference, options?: CallOptions): Promise<SecretValue>;

  /**
   * Describe a secret without returning its value.
   * A missing secret yields `{ exists: false }` instead of throwing.
   */
  describe(ref: Reference, options?: CallOptions): Promise<Metadata>;

  /** Static for the life of the provider; no I/O */
  capabilities(): Capabilities;

  /**
   * Cheapest authenticated round-trip the backend offers.
   * Never mutates backend state.
   */
  validate(options?: CallOptions): Promise<void>;
}

// --- Backend Adapter -------------------------------------

export interface AdapterContext {
  /** Provider instance name, for messages */
  provider: string;
  config: Readonly<Record<string, unknown>>;
  signal?: AbortSignal;
}

export interface AuthResult {
  token: string;
  ttlSeconds: number;
}

export interface RawSecret {
  value: string;
  version?: string;
  updatedAt?: Date;
  metadata?: Record<string, string>;
}

export interface RawItemMetadata {
  version?: string;
  updatedAt?: Date;
  size?: number;
  type?: string;
  tags?: Record<string, string>;
}

/**
 * Performs real I/O against one vendor. Adapters throw whatever their
 * client throws (or a BackendError); providers classify it.
 */
export interface BackendAdapter {
  /** Present only for token-based backends */
  authenticate?(ctx: AdapterContext): Promise<AuthResult>;
  getSecret(ctx: AdapterContext, token: string | undefined, path: string, version?: string): Promise<RawSecret>;
  describeItem(ctx: AdapterContext, token: string | undefined, path: string): Promise<RawItemMetadata>;
  listItems(ctx: AdapterContext, token: string | undefined, path: string): Promise<string[]>;
}

// --- Construction ----------------------------------------

/**
 * Configuration for one provider instance.
 * `config` holds the type-specific settings.
 */
export interface ProviderConfig {
  type: string;
  config: Record<string, unknown>;
}

export interface FactoryContext {
  logger: Logger;
  /** Adapter registered for a backend type, if any */
  adapterFor(type: string): BackendAdapter | undefined;
  /** Create another provider through the same registry (used by routers) */
  createProvider(name: string, config: ProviderConfig): Provider;
  /** Clock used by token caches; defaults to Date.now */
  now?: () => number;
}

export type ProviderFactory = (name: string, config: Record<string, unknown>, ctx: FactoryContext) => Provider;
