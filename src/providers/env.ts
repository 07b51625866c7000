/**
 * Environment Variable Provider
 *
 * The simplest provider: reads secrets from environment variables.
 * Useful for CI/CD, Docker and Kubernetes deployments.
 *
 * Usage:
 *   env://STRIPE_API_KEY  ->  process.env.STRIPE_API_KEY
 */

import { Type } from '@sinclair/typebox';
import type { Capabilities, Metadata, Provider, ProviderFactory, Reference, SecretValue } from './types';
import { createSecretValue } from './types';
import { defineCapabilities } from './backend-provider';
import { NotFoundError } from './errors';
import { requireKey } from './references';
import { readSettings } from './settings';

export const ENV_TYPE = 'env';

const EnvSettings = Type.Object({
  /** Added to every lookup ("APP_" makes "FOO" read APP_FOO) */
  prefix: Type.Optional(Type.String()),
});

const envCapabilities = defineCapabilities({
  supportsVersioning: false,
  supportsMetadata: true,
  supportsWatching: false,
  supportsBinary: false,
  requiresAuth: false,
  authMethods: [],
});

export interface EnvProviderOptions {
  prefix?: string;
  /** Defaults to process.env */
  env?: NodeJS.ProcessEnv;
}

export class EnvProvider implements Provider {
  readonly type = ENV_TYPE;

  private readonly prefix: string;
  private readonly env: NodeJS.ProcessEnv;

  constructor(
    readonly name: string,
    options: EnvProviderOptions = {}
  ) {
    this.prefix = options.prefix ?? '';
    this.env = options.env ?? process.env;
  }

  async resolve(ref: Reference): Promise<SecretValue> {
    const variable = this.variable(ref.key);
    const value = this.env[variable];
    if (value === undefined) {
      throw new NotFoundError(this.name, ref.key);
    }
    return createSecretValue({ value, metadata: { provider: this.name, variable } });
  }

  async describe(ref: Reference): Promise<Metadata> {
    const variable = this.variable(ref.key);
    const value = this.env[variable];
    if (value === undefined) {
      return { exists: false, tags: {} };
    }
    return { exists: true, size: Buffer.byteLength(value), type: 'environment', tags: { variable } };
  }

  capabilities(): Capabilities {
    return envCapabilities;
  }

  /** Environment variables are always available */
  async validate(): Promise<void> {}

  private variable(key: string): string {
    return this.prefix + requireKey(key).trim();
  }
}

export const createEnvProvider: ProviderFactory = (name, config) => {
  const settings = readSettings(EnvSettings, config, { provider: name, type: ENV_TYPE });
  return new EnvProvider(name, { prefix: settings.prefix });
};
