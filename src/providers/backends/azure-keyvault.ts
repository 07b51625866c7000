/**
 * Azure Key Vault secrets.
 *
 * Reference: name[/version][#.json.path] or a secret URL
 *   db-password
 *   db-password/4f8a0c3e2b1d4e6f8a9b0c1d2e3f4a5b
 *   app-config#.database.host
 *   https://other-vault.vault.azure.net/secrets/db-password
 */

import { Type } from '@sinclair/typebox';
import type { ProviderFactory, StructuredReference } from '../types';
import { BackendProvider, defineCapabilities, requireAdapter, type BackendDefinition } from '../backend-provider';
import type { ErrorClassifier } from '../classify';
import { MalformedReferenceError } from '../errors';
import { extractJsonPath } from '../json-path';
import { requireKey, splitFieldSelector, splitVersionSuffix } from '../references';
import { readSettings, settingOrEnv } from '../settings';

export const AZURE_KEY_VAULT_TYPE = 'azure.keyvault';

const SECRET_URL_PATTERN = /^(https:\/\/[^/]+)\/secrets\/([^/]+)(?:\/([^/]+))?\/?$/;
const SECRET_NAME_PATTERN = /^[0-9A-Za-z-]{1,127}$/;
const VERSION_PATTERN = /^[0-9a-f]{32}$/i;

export interface KeyVaultReference extends StructuredReference {
  version?: string;
  /** Set only when the reference is a full secret URL */
  vaultUrl?: string;
}

export function parseKeyVaultVersion(tail: string): string | undefined {
  return VERSION_PATTERN.test(tail) ? tail : undefined;
}

function requireSecretName(raw: string, name: string): string {
  if (!SECRET_NAME_PATTERN.test(name)) {
    throw new MalformedReferenceError(raw, 'secret names are 1-127 letters, digits and dashes');
  }
  return name;
}

export function parseKeyVaultReference(key: string): KeyVaultReference {
  requireKey(key);
  const { rest, selector } = splitFieldSelector(key, '#');

  if (rest.startsWith('https://')) {
    const match = SECRET_URL_PATTERN.exec(rest);
    if (!match) {
      throw new MalformedReferenceError(key, 'expected https://<vault>.vault.azure.net/secrets/<name>[/<version>]');
    }
    const [, vaultUrl, name, versionPart] = match;
    if (versionPart !== undefined && parseKeyVaultVersion(versionPart) === undefined) {
      throw new MalformedReferenceError(key, 'version must be 32 hexadecimal characters');
    }
    return { name: requireSecretName(key, name), version: versionPart, vaultUrl, field: selector };
  }

  const { name, version } = splitVersionSuffix(rest, '/', parseKeyVaultVersion);
  return { name: requireSecretName(key, name), version, field: selector };
}

export const keyVaultClassifier: ErrorClassifier = {
  backend: 'Azure Key Vault',
  rules: [
    {
      kind: 'auth',
      patterns: ['forbidden', 'access denied'],
      statusCodes: [403],
      suggestion: "Check Key Vault access policies: 'Get' and 'List' permissions are required for secrets",
    },
    {
      kind: 'not-found',
      patterns: ['secretnotfound'],
      statusCodes: [404],
    },
    {
      kind: 'auth',
      patterns: ['unauthorized'],
      statusCodes: [401],
      suggestion: 'Check authentication: verify managed identity, service principal, or Azure CLI login',
    },
    {
      kind: 'operational',
      patterns: ['vault not found', 'keyvaulterror'],
      suggestion: 'Check the vault URL format and that the Key Vault exists',
    },
    {
      kind: 'operational',
      patterns: ['throttled', 'too many requests'],
      statusCodes: [429],
      suggestion: 'Request was throttled. Reduce the request rate',
    },
    {
      kind: 'operational',
      patterns: ['tenant'],
      suggestion: 'Check that the tenant ID is correct and the application is registered',
    },
  ],
  fallbackSuggestion: 'Check Azure credentials, Key Vault URL, and access policies',
};

const KeyVaultSettings = Type.Object({
  vault_url: Type.String({ pattern: '^https://' }),
  tenant_id: Type.Optional(Type.String({ minLength: 1 })),
  client_id: Type.Optional(Type.String({ minLength: 1 })),
  client_secret: Type.Optional(Type.String({ minLength: 1 })),
  use_managed_identity: Type.Optional(Type.Boolean()),
});

export const azureKeyVaultCapabilities = defineCapabilities({
  supportsVersioning: true,
  supportsMetadata: true,
  supportsWatching: false,
  supportsBinary: false,
  requiresAuth: true,
  authMethods: ['managed_identity', 'service_principal', 'azure_cli'],
});

export function keyVaultDefinition(vaultUrl: string): BackendDefinition<KeyVaultReference> {
  const base = vaultUrl.replace(/\/+$/, '');
  return {
    type: AZURE_KEY_VAULT_TYPE,
    capabilities: azureKeyVaultCapabilities,
    classifier: keyVaultClassifier,
    parse: parseKeyVaultReference,
    target: (ref) => ({ path: `${ref.vaultUrl ?? base}/secrets/${ref.name}`, version: ref.version }),
    select: (raw, ref) => (ref.field === undefined ? raw.value : extractJsonPath(raw.value, ref.field)),
    listPath: `${base}/secrets`,
  };
}

export const createKeyVaultProvider: ProviderFactory = (name, config, ctx) => {
  const resolved = { ...config, vault_url: settingOrEnv(config.vault_url, 'AZURE_KEYVAULT_URL') };
  const settings = readSettings(KeyVaultSettings, resolved, {
    provider: name,
    type: AZURE_KEY_VAULT_TYPE,
    hints: { vault_url: 'Set "vault_url" to the vault address, e.g. https://my-vault.vault.azure.net' },
  });
  return new BackendProvider(
    name,
    keyVaultDefinition(settings.vault_url),
    requireAdapter(ctx, AZURE_KEY_VAULT_TYPE, name),
    resolved,
    { logger: ctx.logger, now: ctx.now }
  );
};
