/**
 * HashiCorp Vault.
 *
 * Reference: path[@vN][#field]
 *   secret/data/app/db            whole secret, as JSON
 *   secret/data/app/db#password   one field
 *   secret/data/app/db@v3#password
 */

import { Type } from '@sinclair/typebox';
import type { ProviderFactory, StructuredReference } from '../types';
import { BackendProvider, defineCapabilities, requireAdapter, type BackendDefinition } from '../backend-provider';
import type { ErrorClassifier } from '../classify';
import { extractJsonPath } from '../json-path';
import { parseVersionNumber, requireKey, requireNonEmpty, splitFieldSelector, splitVersionSuffix } from '../references';
import { readSettings, settingOrEnv } from '../settings';

export const VAULT_TYPE = 'vault';

export interface VaultReference extends StructuredReference {
  version?: number;
}

export function parseVaultReference(key: string): VaultReference {
  requireKey(key);
  const { rest, selector } = splitFieldSelector(key, '#');
  const { name, version } = splitVersionSuffix(rest, '@v', parseVersionNumber);
  return { name: requireNonEmpty(key, name, 'secret path'), version, field: selector };
}

export const vaultClassifier: ErrorClassifier = {
  backend: 'Vault',
  rules: [
    {
      kind: 'not-found',
      patterns: ['no value found', 'secret not found'],
      statusCodes: [404],
    },
    {
      kind: 'auth',
      patterns: ['invalid token', 'token expired', 'missing client token'],
      suggestion: 'Your Vault token may be expired or invalid. Re-authenticate with Vault',
    },
    {
      kind: 'auth',
      patterns: ['permission denied'],
      statusCodes: [401, 403],
      suggestion: 'Check your Vault token permissions for this path',
    },
    {
      kind: 'operational',
      patterns: ['namespace'],
      suggestion: 'Check your Vault namespace configuration',
    },
    {
      kind: 'operational',
      patterns: ['tls', 'x509', 'certificate'],
      suggestion: 'Check the TLS configuration of the Vault address',
    },
    {
      kind: 'operational',
      patterns: ['sealed'],
      statusCodes: [503],
      suggestion: 'The Vault server is sealed. Unseal it before reading secrets',
    },
  ],
  fallbackSuggestion: 'Check your Vault configuration and connectivity',
};

const VaultSettings = Type.Object({
  address: Type.String({ minLength: 1 }),
  namespace: Type.Optional(Type.String()),
  auth_method: Type.Optional(
    Type.Union([
      Type.Literal('token'),
      Type.Literal('approle'),
      Type.Literal('kubernetes'),
      Type.Literal('userpass'),
      Type.Literal('ldap'),
      Type.Literal('aws'),
    ])
  ),
  mount: Type.Optional(Type.String()),
});

export const vaultCapabilities = defineCapabilities({
  supportsVersioning: true,
  supportsMetadata: true,
  supportsWatching: false,
  supportsBinary: false,
  requiresAuth: true,
  authMethods: ['token', 'approle', 'kubernetes', 'userpass', 'ldap', 'aws'],
});

export function vaultDefinition(listPath?: string): BackendDefinition<VaultReference> {
  return {
    type: VAULT_TYPE,
    capabilities: vaultCapabilities,
    classifier: vaultClassifier,
    parse: parseVaultReference,
    target: (ref) => ({ path: ref.name, version: ref.version?.toString() }),
    select: (raw, ref) => (ref.field === undefined ? raw.value : extractJsonPath(raw.value, ref.field)),
    listPath,
  };
}

/**
 * address falls back to VAULT_ADDR.
 */
export const createVaultProvider: ProviderFactory = (name, config, ctx) => {
  const resolved = { ...config, address: settingOrEnv(config.address, 'VAULT_ADDR') };
  const settings = readSettings(VaultSettings, resolved, {
    provider: name,
    type: VAULT_TYPE,
    hints: { address: 'Set "address" or the VAULT_ADDR environment variable (e.g. https://vault.example.com:8200)' },
  });
  return new BackendProvider(name, vaultDefinition(settings.mount), requireAdapter(ctx, VAULT_TYPE, name), resolved, {
    logger: ctx.logger,
    now: ctx.now,
  });
};
