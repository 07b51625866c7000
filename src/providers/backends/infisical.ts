/**
 * Infisical.
 *
 * Reference: [folder/]NAME[@vN]
 *   DATABASE_URL
 *   backend/DATABASE_URL@v3
 */

import { Type } from '@sinclair/typebox';
import type { ProviderFactory, StructuredReference } from '../types';
import { BackendProvider, defineCapabilities, requireAdapter, type BackendDefinition } from '../backend-provider';
import type { ErrorClassifier } from '../classify';
import { parseVersionNumber, requireKey, requireNonEmpty, splitVersionSuffix } from '../references';
import { readSettings } from '../settings';

export const INFISICAL_TYPE = 'infisical';

export interface InfisicalReference extends StructuredReference {
  version?: number;
  folder?: string;
}

export function parseInfisicalReference(key: string): InfisicalReference {
  requireKey(key);
  const { name: path, version } = splitVersionSuffix(key, '@v', parseVersionNumber);

  const slash = path.lastIndexOf('/');
  if (slash < 0) {
    return { name: requireNonEmpty(key, path, 'secret name'), version };
  }
  const folder = path.slice(0, slash);
  const name = requireNonEmpty(key, path.slice(slash + 1), 'secret name');
  return { name, version, folder: folder || undefined };
}

export const infisicalClassifier: ErrorClassifier = {
  backend: 'Infisical',
  rules: [
    {
      kind: 'not-found',
      patterns: ['secret not found', 'not found'],
      statusCodes: [404],
    },
    {
      kind: 'auth',
      patterns: ['unauthorized', 'invalid token', 'token expired', 'forbidden'],
      statusCodes: [401, 403],
      suggestion: 'Check the Infisical machine identity credentials and its access to the project and environment',
    },
    {
      kind: 'operational',
      patterns: ['rate limit', 'too many requests'],
      statusCodes: [429],
      suggestion: 'Request was throttled. Reduce the request rate',
    },
  ],
  fallbackSuggestion: 'Check Infisical connectivity, project_id and environment',
};

const InfisicalSettings = Type.Object({
  project_id: Type.String({ minLength: 1 }),
  environment: Type.String({ minLength: 1 }),
  site_url: Type.Optional(Type.String()),
  client_id: Type.Optional(Type.String()),
  client_secret: Type.Optional(Type.String()),
});

export const infisicalCapabilities = defineCapabilities({
  supportsVersioning: true,
  supportsMetadata: true,
  supportsWatching: false,
  supportsBinary: false,
  requiresAuth: true,
  authMethods: ['universal_auth', 'service_token'],
});

export const infisicalDefinition: BackendDefinition<InfisicalReference> = {
  type: INFISICAL_TYPE,
  capabilities: infisicalCapabilities,
  classifier: infisicalClassifier,
  parse: parseInfisicalReference,
  target: (ref) => ({
    path: ref.folder ? `${ref.folder}/${ref.name}` : ref.name,
    version: ref.version?.toString(),
  }),
  listPath: '/',
};

export const createInfisicalProvider: ProviderFactory = (name, config, ctx) => {
  readSettings(InfisicalSettings, config, {
    provider: name,
    type: INFISICAL_TYPE,
    hints: {
      project_id: 'Set "project_id" to the Infisical project (workspace) id',
      environment: 'Set "environment" to the environment slug, e.g. dev or prod',
    },
  });
  return new BackendProvider(name, infisicalDefinition, requireAdapter(ctx, INFISICAL_TYPE, name), config, {
    logger: ctx.logger,
    now: ctx.now,
  });
};
