/**
 * AWS Secrets Manager.
 *
 * Reference: name[@version][#.json.path]
 *   prod/db
 *   prod/db@AWSPREVIOUS                         staging label
 *   prod/db@6b5f8a2e-0c3d-4f1e-9a7b-2c4d6e8f0a1b  version id
 *   prod/db#.password
 *   arn:aws:secretsmanager:us-east-1:123456789012:secret:prod/db
 */

import { Type } from '@sinclair/typebox';
import type { ProviderFactory, StructuredReference } from '../types';
import { BackendProvider, defineCapabilities, requireAdapter, type BackendDefinition } from '../backend-provider';
import type { ErrorClassifier } from '../classify';
import { extractJsonPath } from '../json-path';
import { requireKey, requireNonEmpty, splitFieldSelector, splitVersionSuffix } from '../references';
import { readSettings } from '../settings';

export const AWS_SECRETS_MANAGER_TYPE = 'aws.secretsmanager';

const VERSION_ID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
/** AWSCURRENT, AWSPREVIOUS, AWSPENDING and custom upper-case labels */
const STAGE_PATTERN = /^[A-Z][A-Z0-9_-]*$/;

export interface SecretsManagerVersion {
  kind: 'id' | 'stage';
  value: string;
}

export interface SecretsManagerReference extends StructuredReference {
  version?: string;
  versionKind?: 'id' | 'stage';
}

export function parseSecretsManagerVersion(tail: string): SecretsManagerVersion | undefined {
  if (VERSION_ID_PATTERN.test(tail)) return { kind: 'id', value: tail };
  if (STAGE_PATTERN.test(tail)) return { kind: 'stage', value: tail };
  return undefined;
}

export function parseSecretsManagerReference(key: string): SecretsManagerReference {
  requireKey(key);
  const { rest, selector } = splitFieldSelector(key, '#');
  const { name, version } = splitVersionSuffix(rest, '@', parseSecretsManagerVersion);
  return {
    name: requireNonEmpty(key, name, 'secret name'),
    version: version?.value,
    versionKind: version?.kind,
    field: selector,
  };
}

export const secretsManagerClassifier: ErrorClassifier = {
  backend: 'AWS Secrets Manager',
  rules: [
    {
      kind: 'not-found',
      patterns: ['resourcenotfoundexception', "can't find the specified secret"],
    },
    {
      kind: 'auth',
      patterns: ['accessdenied', 'unauthorizedoperation', 'invaliduserid', 'forbidden'],
      statusCodes: [403],
      suggestion: 'Check IAM permissions for secretsmanager:GetSecretValue',
    },
    {
      kind: 'auth',
      patterns: ['unrecognizedclient', 'expiredtoken', 'invalidclienttokenid', 'could not load credentials', 'credentials'],
      suggestion: "Configure AWS credentials: 'aws configure' or set AWS_PROFILE",
    },
    {
      kind: 'operational',
      patterns: ['invalidversionstage', 'invalidparametervalue', 'invalidrequestexception'],
      suggestion: 'Check the version stage or version id, and that the secret is not scheduled for deletion',
    },
    {
      kind: 'operational',
      patterns: ['decryptionfailure', 'kms'],
      suggestion: 'Check kms:Decrypt permission for the key that encrypts this secret',
    },
    {
      kind: 'operational',
      patterns: ['throttl', 'toomanyrequests'],
      suggestion: 'Request was throttled. Reduce the request rate',
    },
  ],
  fallbackSuggestion: "Verify the secret name and region. List secrets with: 'aws secretsmanager list-secrets'",
};

export const AwsCommonSettings = Type.Object({
  region: Type.Optional(Type.String({ minLength: 1 })),
  profile: Type.Optional(Type.String({ minLength: 1 })),
});

export const awsSecretsManagerCapabilities = defineCapabilities({
  supportsVersioning: true,
  supportsMetadata: true,
  supportsWatching: false,
  supportsBinary: true,
  requiresAuth: true,
  authMethods: ['iam', 'profile', 'environment', 'instance_role'],
});

export const secretsManagerDefinition: BackendDefinition<SecretsManagerReference> = {
  type: AWS_SECRETS_MANAGER_TYPE,
  capabilities: awsSecretsManagerCapabilities,
  classifier: secretsManagerClassifier,
  parse: parseSecretsManagerReference,
  target: (ref) => ({ path: ref.name, version: ref.version }),
  select: (raw, ref) => (ref.field === undefined ? raw.value : extractJsonPath(raw.value, ref.field)),
};

export const createSecretsManagerProvider: ProviderFactory = (name, config, ctx) => {
  readSettings(AwsCommonSettings, config, { provider: name, type: AWS_SECRETS_MANAGER_TYPE });
  return new BackendProvider(
    name,
    secretsManagerDefinition,
    requireAdapter(ctx, AWS_SECRETS_MANAGER_TYPE, name),
    config,
    { logger: ctx.logger, now: ctx.now }
  );
};
