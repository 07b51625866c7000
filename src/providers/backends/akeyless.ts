/**
 * Akeyless.
 *
 * Reference: [/]path/to/item[@vN]. The leading "/" is added when missing.
 */

import { Type } from '@sinclair/typebox';
import type { ProviderFactory, StructuredReference } from '../types';
import { BackendProvider, defineCapabilities, requireAdapter, type BackendDefinition } from '../backend-provider';
import type { ErrorClassifier } from '../classify';
import { MalformedReferenceError } from '../errors';
import { ensureLeadingSeparator, parseVersionNumber, requireKey, splitVersionSuffix } from '../references';
import { readSettings } from '../settings';

export const AKEYLESS_TYPE = 'akeyless';

export interface AkeylessReference extends StructuredReference {
  version?: number;
}

export function parseAkeylessReference(key: string): AkeylessReference {
  requireKey(key);
  const { name, version } = splitVersionSuffix(key, '@v', parseVersionNumber);
  const path = ensureLeadingSeparator(name);
  if (path === '/') {
    throw new MalformedReferenceError(key, 'item path cannot be empty');
  }
  return { name: path, version };
}

export const akeylessClassifier: ErrorClassifier = {
  backend: 'Akeyless',
  rules: [
    {
      kind: 'operational',
      patterns: ['gateway'],
      suggestion: 'Check the Akeyless gateway URL and that the gateway is reachable',
    },
    {
      kind: 'not-found',
      patterns: ['itemnotfound', 'item not found', 'not found'],
      statusCodes: [404],
    },
    {
      kind: 'auth',
      patterns: ['authentication failed', 'unauthorized', 'access denied', 'token is expired'],
      statusCodes: [401, 403],
      suggestion: 'Check the Akeyless access id and access key (or cloud identity) for this auth method',
    },
  ],
  fallbackSuggestion: 'Check Akeyless credentials, gateway URL and item path',
};

const AkeylessSettings = Type.Object({
  access_id: Type.String({ minLength: 1 }),
  access_type: Type.Optional(
    Type.Union([
      Type.Literal('api_key'),
      Type.Literal('aws_iam'),
      Type.Literal('azure_ad'),
      Type.Literal('gcp'),
      Type.Literal('k8s'),
    ])
  ),
  gateway_url: Type.Optional(Type.String()),
});

export const akeylessCapabilities = defineCapabilities({
  supportsVersioning: true,
  supportsMetadata: true,
  supportsWatching: false,
  supportsBinary: false,
  requiresAuth: true,
  authMethods: ['api_key', 'aws_iam', 'azure_ad', 'gcp', 'k8s'],
});

export const akeylessDefinition: BackendDefinition<AkeylessReference> = {
  type: AKEYLESS_TYPE,
  capabilities: akeylessCapabilities,
  classifier: akeylessClassifier,
  parse: parseAkeylessReference,
  target: (ref) => ({ path: ref.name, version: ref.version?.toString() }),
  listPath: '/',
};

export const createAkeylessProvider: ProviderFactory = (name, config, ctx) => {
  readSettings(AkeylessSettings, config, { provider: name, type: AKEYLESS_TYPE });
  return new BackendProvider(name, akeylessDefinition, requireAdapter(ctx, AKEYLESS_TYPE, name), config, {
    logger: ctx.logger,
    now: ctx.now,
  });
};
