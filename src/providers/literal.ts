/**
 * Literal Provider
 *
 * Serves values straight from configuration. Meant for tests, local
 * development and non-secret defaults.
 *
 *   providers:
 *     dev:
 *       type: literal
 *       values:
 *         DATABASE_URL: postgres://localhost/dev
 */

import { Type } from '@sinclair/typebox';
import type { Capabilities, Metadata, Provider, ProviderFactory, Reference, SecretValue } from './types';
import { createSecretValue } from './types';
import { defineCapabilities } from './backend-provider';
import { NotFoundError } from './errors';
import { requireKey } from './references';
import { readSettings } from './settings';

export const LITERAL_TYPE = 'literal';

const LiteralSettings = Type.Object({
  values: Type.Record(Type.String(), Type.String()),
});

const literalCapabilities = defineCapabilities({
  supportsVersioning: false,
  supportsMetadata: true,
  supportsWatching: false,
  supportsBinary: false,
  requiresAuth: false,
  authMethods: [],
});

export class LiteralProvider implements Provider {
  readonly type = LITERAL_TYPE;

  private readonly values: ReadonlyMap<string, string>;

  constructor(
    readonly name: string,
    values: Record<string, string>
  ) {
    this.values = new Map(Object.entries(values));
  }

  async resolve(ref: Reference): Promise<SecretValue> {
    const value = this.values.get(requireKey(ref.key));
    if (value === undefined) {
      throw new NotFoundError(this.name, ref.key);
    }
    return createSecretValue({ value, metadata: { provider: this.name } });
  }

  async describe(ref: Reference): Promise<Metadata> {
    const value = this.values.get(requireKey(ref.key));
    if (value === undefined) {
      return { exists: false, tags: {} };
    }
    return { exists: true, size: Buffer.byteLength(value), type: 'literal', tags: {} };
  }

  capabilities(): Capabilities {
    return literalCapabilities;
  }

  async validate(): Promise<void> {}
}

export const createLiteralProvider: ProviderFactory = (name, config) => {
  const settings = readSettings(LiteralSettings, config, {
    provider: name,
    type: LITERAL_TYPE,
    hints: { values: 'Set "values" to a map of key to string value' },
  });
  return new LiteralProvider(name, settings.values);
};
