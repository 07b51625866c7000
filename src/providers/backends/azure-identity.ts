/**
 * Azure AD (Entra ID) access tokens.
 *
 * Reference: [scope][#field]
 *   https://vault.azure.net/.default
 *   https://graph.microsoft.com/.default#expires_at
 *   expires_in                      field of a token for the default scope
 *
 * The adapter returns the token as the value and its expiry as
 * `metadata.expires_at` (ISO 8601).
 */

import { Type } from '@sinclair/typebox';
import type { ProviderFactory, RawSecret, StructuredReference } from '../types';
import { BackendProvider, defineCapabilities, requireAdapter, type BackendDefinition } from '../backend-provider';
import type { ErrorClassifier } from '../classify';
import { MalformedReferenceError, UserError } from '../errors';
import { requireKey, splitFieldSelector } from '../references';
import { readSettings } from '../settings';

export const AZURE_IDENTITY_TYPE = 'azure.identity';
export const DEFAULT_AZURE_SCOPE = 'https://management.azure.com/.default';

export type TokenField = 'access_token' | 'expires_at' | 'expires_in' | 'token_info';

const TOKEN_FIELDS: ReadonlyMap<string, TokenField> = new Map<string, TokenField>([
  ['access_token', 'access_token'],
  ['token', 'access_token'],
  ['expires_at', 'expires_at'],
  ['expiration', 'expires_at'],
  ['expires_in', 'expires_in'],
  ['token_info', 'token_info'],
  ['all', 'token_info'],
]);

const FIELD_SUGGESTION = 'Use one of: access_token, expires_at, expires_in, token_info';

export interface TokenReference extends StructuredReference {
  field: TokenField;
  /** Absent means the configured default scope */
  scope?: string;
}

export function parseTokenReference(key: string): TokenReference {
  requireKey(key);
  const { rest, selector } = splitFieldSelector(key, '#');
  const scope = rest.trim() || undefined;

  if (selector === undefined) {
    const bareField = scope === undefined ? undefined : TOKEN_FIELDS.get(scope);
    if (bareField) {
      return { name: bareField, field: bareField };
    }
    return { name: scope ?? 'access_token', scope, field: 'access_token' };
  }

  const field = TOKEN_FIELDS.get(selector);
  if (!field) {
    throw new MalformedReferenceError(key, `unknown token field "${selector}". ${FIELD_SUGGESTION}`);
  }
  return { name: scope ?? field, scope, field };
}

/**
 * Render one token field. `now` is the clock expires_in is measured on.
 */
export function selectTokenField(raw: RawSecret, field: TokenField, now: () => number): string {
  if (field === 'access_token') {
    return raw.value;
  }

  const expiresAt = raw.metadata?.expires_at;
  const expiresMs = expiresAt === undefined ? Number.NaN : Date.parse(expiresAt);
  if (expiresAt === undefined || Number.isNaN(expiresMs)) {
    throw new UserError('Azure token response has no usable expiry', {
      suggestion: 'Check the identity adapter reports expires_at as an ISO 8601 timestamp',
    });
  }
  const expiresIn = Math.max(0, Math.floor((expiresMs - now()) / 1000));

  switch (field) {
    case 'expires_at':
      return expiresAt;
    case 'expires_in':
      return String(expiresIn);
    case 'token_info':
      return JSON.stringify({
        access_token: raw.value,
        token_type: 'Bearer',
        expires_at: expiresAt,
        expires_in: expiresIn,
      });
  }
}

export const azureIdentityClassifier: ErrorClassifier = {
  backend: 'Azure Identity',
  rules: [
    {
      kind: 'auth',
      patterns: ['managed identity'],
      suggestion: 'Check that Managed Identity is enabled and assigned appropriate roles',
    },
    {
      kind: 'auth',
      patterns: ['invalid_client_secret', 'aadsts7000215'],
      suggestion: 'Check that the client secret is correct and not expired',
    },
    {
      kind: 'auth',
      patterns: ['invalid_client', 'unauthorized_client'],
      statusCodes: [401],
      suggestion: "Check service principal client ID and ensure it's registered in the correct tenant",
    },
    {
      kind: 'operational',
      patterns: ['invalid_scope'],
      statusCodes: [400],
      suggestion: 'Check that the requested scope is valid (e.g., https://management.azure.com/.default)',
    },
    {
      kind: 'auth',
      patterns: ['tenant'],
      suggestion: 'Check that the tenant ID is correct',
    },
    {
      kind: 'auth',
      patterns: ['az login', 'login'],
      suggestion: "Try running 'az login' to authenticate with Azure CLI",
    },
    {
      kind: 'auth',
      patterns: ['certificate'],
      suggestion: 'Check certificate path and format. Ensure certificate is valid and not expired',
    },
  ],
  fallbackSuggestion:
    "Check Azure credentials and network connectivity. Try 'az login' or verify managed identity configuration",
};

const IdentitySettings = Type.Object({
  scope: Type.Optional(Type.String({ minLength: 1 })),
  tenant_id: Type.Optional(Type.String({ minLength: 1 })),
  client_id: Type.Optional(Type.String({ minLength: 1 })),
  client_secret: Type.Optional(Type.String({ minLength: 1 })),
  certificate_path: Type.Optional(Type.String({ minLength: 1 })),
  use_managed_identity: Type.Optional(Type.Boolean()),
});

export const azureIdentityCapabilities = defineCapabilities({
  supportsVersioning: false,
  supportsMetadata: true,
  supportsWatching: false,
  supportsBinary: false,
  requiresAuth: true,
  authMethods: ['managed_identity', 'service_principal', 'certificate', 'azure_cli'],
});

export function identityDefinition(defaultScope: string, now: () => number): BackendDefinition<TokenReference> {
  return {
    type: AZURE_IDENTITY_TYPE,
    capabilities: azureIdentityCapabilities,
    classifier: azureIdentityClassifier,
    parse: parseTokenReference,
    target: (ref) => ({ path: ref.scope ?? defaultScope }),
    select: (raw, ref) => selectTokenField(raw, ref.field, now),
    listPath: defaultScope,
  };
}

export const createIdentityProvider: ProviderFactory = (name, config, ctx) => {
  const settings = readSettings(IdentitySettings, config, { provider: name, type: AZURE_IDENTITY_TYPE });
  const now = ctx.now ?? Date.now;
  return new BackendProvider(
    name,
    identityDefinition(settings.scope ?? DEFAULT_AZURE_SCOPE, now),
    requireAdapter(ctx, AZURE_IDENTITY_TYPE, name),
    config,
    { logger: ctx.logger, now }
  );
};
