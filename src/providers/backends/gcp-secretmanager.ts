/**
 * Google Cloud Secret Manager.
 *
 * Reference: name[(:|@)version][#.json.path] or a full resource name
 *   db-password
 *   db-password:3
 *   db-password@latest
 *   app-config#.database.host
 *   projects/other-project/secrets/db-password/versions/2
 */

import { Type } from '@sinclair/typebox';
import type { ProviderFactory, StructuredReference } from '../types';
import { BackendProvider, defineCapabilities, requireAdapter, type BackendDefinition } from '../backend-provider';
import type { ErrorClassifier } from '../classify';
import { MalformedReferenceError } from '../errors';
import { extractJsonPath } from '../json-path';
import { requireKey, requireNonEmpty, splitFieldSelector, splitVersionSuffix } from '../references';
import { readSettings, settingOrEnv } from '../settings';

export const GCP_SECRET_MANAGER_TYPE = 'gcp.secretmanager';

const RESOURCE_PATTERN = /^projects\/([^/]+)\/secrets\/([^/]+)(?:\/versions\/([^/]+))?$/;

export interface GcpSecretReference extends StructuredReference {
  version?: string;
  /** Set only when the reference is a full resource name */
  project?: string;
}

/** "latest" or a version number */
export function parseGcpVersion(tail: string): string | undefined {
  return tail === 'latest' || /^\d+$/.test(tail) ? tail : undefined;
}

export function parseGcpSecretReference(key: string): GcpSecretReference {
  requireKey(key);
  const { rest, selector } = splitFieldSelector(key, '#');

  if (rest.startsWith('projects/')) {
    const match = RESOURCE_PATTERN.exec(rest);
    if (!match) {
      throw new MalformedReferenceError(key, 'expected projects/PROJECT/secrets/NAME[/versions/VERSION]');
    }
    const [, project, name, versionPart] = match;
    const version = versionPart === undefined ? undefined : parseGcpVersion(versionPart);
    if (versionPart !== undefined && version === undefined) {
      throw new MalformedReferenceError(key, `version must be "latest" or a number, got "${versionPart}"`);
    }
    return { name, project, version, field: selector };
  }

  const colon = splitVersionSuffix(rest, ':', parseGcpVersion);
  const { name, version } = colon.version !== undefined ? colon : splitVersionSuffix(rest, '@', parseGcpVersion);
  return { name: requireNonEmpty(key, name, 'secret name'), version, field: selector };
}

export const gcpSecretManagerClassifier: ErrorClassifier = {
  backend: 'GCP Secret Manager',
  rules: [
    {
      kind: 'auth',
      patterns: ['permissiondenied', 'permission_denied'],
      statusCodes: [403],
      suggestion: 'Check IAM permissions: secretmanager.secrets.get, secretmanager.versions.access',
    },
    {
      kind: 'auth',
      patterns: ['unauthenticated', 'could not load the default credentials'],
      statusCodes: [401],
      suggestion:
        "Check authentication: set GOOGLE_APPLICATION_CREDENTIALS or run 'gcloud auth application-default login'",
    },
    {
      kind: 'not-found',
      patterns: ['notfound', 'not_found', 'not found'],
      statusCodes: [404],
    },
    {
      kind: 'operational',
      patterns: ['invalidargument', 'invalid_argument'],
      statusCodes: [400],
      suggestion: 'Check the secret name format and version specification',
    },
    {
      kind: 'operational',
      patterns: ['resourceexhausted', 'resource_exhausted'],
      statusCodes: [429],
      suggestion: 'Request was throttled. Reduce the request rate',
    },
    {
      kind: 'operational',
      patterns: ['project'],
      suggestion: 'Check that the project ID is correct and the project exists',
    },
  ],
  fallbackSuggestion: 'Check GCP credentials, project ID, and IAM permissions for Secret Manager',
};

const GcpSecretManagerSettings = Type.Object({
  project_id: Type.String({ minLength: 1 }),
  service_account_key_path: Type.Optional(Type.String({ minLength: 1 })),
  impersonate_service_account: Type.Optional(Type.String({ minLength: 1 })),
  location: Type.Optional(Type.String({ minLength: 1 })),
});

export const gcpSecretManagerCapabilities = defineCapabilities({
  supportsVersioning: true,
  supportsMetadata: true,
  supportsWatching: false,
  supportsBinary: true,
  requiresAuth: true,
  authMethods: ['application_default', 'service_account', 'impersonation'],
});

export function gcpSecretManagerDefinition(projectId: string): BackendDefinition<GcpSecretReference> {
  return {
    type: GCP_SECRET_MANAGER_TYPE,
    capabilities: gcpSecretManagerCapabilities,
    classifier: gcpSecretManagerClassifier,
    parse: parseGcpSecretReference,
    target: (ref) => ({ path: `projects/${ref.project ?? projectId}/secrets/${ref.name}`, version: ref.version }),
    select: (raw, ref) => (ref.field === undefined ? raw.value : extractJsonPath(raw.value, ref.field)),
    listPath: `projects/${projectId}`,
  };
}

export const createGcpSecretManagerProvider: ProviderFactory = (name, config, ctx) => {
  const resolved = { ...config, project_id: settingOrEnv(config.project_id, 'GOOGLE_CLOUD_PROJECT') };
  const settings = readSettings(GcpSecretManagerSettings, resolved, {
    provider: name,
    type: GCP_SECRET_MANAGER_TYPE,
    hints: { project_id: 'Set "project_id" or the GOOGLE_CLOUD_PROJECT environment variable' },
  });
  return new BackendProvider(
    name,
    gcpSecretManagerDefinition(settings.project_id),
    requireAdapter(ctx, GCP_SECRET_MANAGER_TYPE, name),
    resolved,
    { logger: ctx.logger, now: ctx.now }
  );
};
