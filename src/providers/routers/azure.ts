/**
 * Unified Azure provider over Key Vault secrets and Azure AD tokens.
 *
 *   db-password                          -> keyvault
 *   https://graph.microsoft.com/.default -> identity
 *   token                                -> identity
 *   kv:db-password                       -> keyvault (prefix stripped)
 */

import { Type } from '@sinclair/typebox';
import type { Provider, ProviderFactory } from '../types';
import { UnifiedProvider, type RouterDefinition } from '../unified';
import { mergeSettings, readSettings } from '../settings';
import { AZURE_KEY_VAULT_TYPE } from '../backends/azure-keyvault';
import { AZURE_IDENTITY_TYPE } from '../backends/azure-identity';

export const AZURE_TYPE = 'azure';

const TOKEN_KEYS = new Set(['access_token', 'token', 'expires_at']);

function isTokenKey(key: string): boolean {
  const lower = key.toLowerCase();
  return lower.includes('.default') || lower.startsWith('scope') || TOKEN_KEYS.has(lower);
}

export const azureRouter: RouterDefinition = {
  type: AZURE_TYPE,
  vendor: 'Azure',
  services: [
    { name: 'keyvault', aliases: ['keyvault', 'kv', 'vault', 'secrets'] },
    { name: 'identity', aliases: ['identity', 'auth', 'token', 'managed'] },
  ],
  rules: [
    {
      service: 'identity',
      description: 'token scope or field',
      matches: isTokenKey,
    },
    {
      service: 'keyvault',
      description: 'Key Vault URL',
      matches: (key) => key.startsWith('https://') && key.includes('.vault.azure.net/'),
    },
    {
      service: 'keyvault',
      description: 'version or JSON path',
      matches: (key) => key.includes('/') || key.includes('#'),
    },
  ],
  defaultService: 'keyvault',
};

const Section = Type.Optional(Type.Record(Type.String(), Type.Unknown()));

const AzureSettings = Type.Object({
  vault_url: Type.Optional(Type.String({ pattern: '^https://' })),
  tenant_id: Type.Optional(Type.String({ minLength: 1 })),
  client_id: Type.Optional(Type.String({ minLength: 1 })),
  client_secret: Type.Optional(Type.String({ minLength: 1 })),
  use_managed_identity: Type.Optional(Type.Boolean()),
  default_service: Type.Optional(Type.String({ minLength: 1 })),
  keyvault: Section,
  identity: Section,
});

export const createAzureProvider: ProviderFactory = (name, config, ctx) => {
  const settings = readSettings(AzureSettings, config, {
    provider: name,
    type: AZURE_TYPE,
    hints: { vault_url: 'vault_url must be https://<vault>.vault.azure.net' },
  });
  const common = {
    tenant_id: settings.tenant_id,
    client_id: settings.client_id,
    client_secret: settings.client_secret,
    use_managed_identity: settings.use_managed_identity,
  };

  const services = new Map<string, Provider>();
  if (settings.vault_url) {
    services.set(
      'keyvault',
      ctx.createProvider(`${name}-kv`, {
        type: AZURE_KEY_VAULT_TYPE,
        config: mergeSettings({ ...common, vault_url: settings.vault_url }, settings.keyvault),
      })
    );
  }
  services.set(
    'identity',
    ctx.createProvider(`${name}-identity`, {
      type: AZURE_IDENTITY_TYPE,
      config: mergeSettings(common, settings.identity),
    })
  );

  return new UnifiedProvider(name, azureRouter, services, {
    defaultService: settings.default_service,
    logger: ctx.logger,
  });
};
