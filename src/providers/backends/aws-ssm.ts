/**
 * AWS Systems Manager Parameter Store.
 *
 * Reference: [/]path/to/param[:N]
 *   /prod/db/password
 *   /prod/db/password:3
 *   arn:aws:ssm:us-east-1:123456789012:parameter/prod/db/password
 * With `parameter_prefix` set, relative names are joined onto it.
 */

import { Type } from '@sinclair/typebox';
import type { ProviderFactory, StructuredReference } from '../types';
import { BackendProvider, defineCapabilities, requireAdapter, type BackendDefinition } from '../backend-provider';
import type { ErrorClassifier } from '../classify';
import { MalformedReferenceError } from '../errors';
import { parseVersionNumber, requireKey, splitVersionSuffix } from '../references';
import { readSettings } from '../settings';

export const AWS_SSM_TYPE = 'aws.ssm';

export interface ParameterReference extends StructuredReference {
  version?: number;
}

/**
 * Parser for one parameter prefix. The prefix is configuration, so it is
 * bound here rather than read at parse time.
 */
export function createParameterParser(prefix?: string): (key: string) => ParameterReference {
  return (key) => {
    requireKey(key);
    const { name, version } = splitVersionSuffix(key, ':', parseVersionNumber);

    let path = name;
    if (prefix && !name.startsWith('/') && !name.startsWith('arn:')) {
      path = `${prefix.replace(/\/+$/, '')}/${name}`;
    }
    if (path === '/' || path.length === 0) {
      throw new MalformedReferenceError(key, 'parameter name cannot be empty');
    }
    return { name: path, version };
  };
}

export const parseParameterReference = createParameterParser();

export const ssmClassifier: ErrorClassifier = {
  backend: 'AWS SSM',
  rules: [
    {
      kind: 'not-found',
      patterns: ['parameternotfound', 'parameterversionnotfound'],
    },
    {
      kind: 'auth',
      patterns: ['accessdenied', 'unrecognizedclient', 'expiredtoken', 'invalidclienttokenid'],
      statusCodes: [403],
      suggestion: 'Check IAM permissions: ssm:GetParameter, ssm:DescribeParameters, and kms:Decrypt (for SecureString)',
    },
    {
      kind: 'operational',
      patterns: ['invalidkeyid'],
      suggestion: 'The KMS key for this SecureString parameter may not exist or you lack kms:Decrypt permission',
    },
    {
      kind: 'operational',
      patterns: ['throttl'],
      suggestion: 'Request was throttled. Reduce the request rate',
    },
    {
      kind: 'operational',
      patterns: ['region'],
      suggestion: "Check that you're using the correct AWS region where the parameter is stored",
    },
  ],
  fallbackSuggestion: 'Check AWS credentials, region, and IAM permissions for SSM Parameter Store',
};

const SsmSettings = Type.Object({
  region: Type.Optional(Type.String({ minLength: 1 })),
  profile: Type.Optional(Type.String({ minLength: 1 })),
  parameter_prefix: Type.Optional(Type.String({ pattern: '^/' })),
  with_decryption: Type.Optional(Type.Boolean()),
});

export const awsSsmCapabilities = defineCapabilities({
  supportsVersioning: true,
  supportsMetadata: true,
  supportsWatching: false,
  supportsBinary: false,
  requiresAuth: true,
  authMethods: ['iam', 'profile', 'environment', 'instance_role'],
});

export function ssmDefinition(prefix?: string): BackendDefinition<ParameterReference> {
  return {
    type: AWS_SSM_TYPE,
    capabilities: awsSsmCapabilities,
    classifier: ssmClassifier,
    parse: createParameterParser(prefix),
    target: (ref) => ({ path: ref.name, version: ref.version?.toString() }),
    listPath: prefix ?? '/',
  };
}

export const createSsmProvider: ProviderFactory = (name, config, ctx) => {
  const settings = readSettings(SsmSettings, config, {
    provider: name,
    type: AWS_SSM_TYPE,
    hints: { parameter_prefix: 'parameter_prefix must start with "/", e.g. /prod/app' },
  });
  return new BackendProvider(name, ssmDefinition(settings.parameter_prefix), requireAdapter(ctx, AWS_SSM_TYPE, name), config, {
    logger: ctx.logger,
    now: ctx.now,
  });
};
