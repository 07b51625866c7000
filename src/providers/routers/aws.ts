/**
 * Unified AWS provider.
 *
 * One provider instance in front of Secrets Manager, Parameter Store and
 * (when configured) STS and SSO credentials:
 *
 *   prod/db                                       -> secretsmanager
 *   /prod/db/password                             -> ssm
 *   arn:aws:iam::123456789012:role/deploy#session_token -> sts
 *   ssm:prod/db/password                          -> ssm (prefix stripped)
 */

import { Type } from '@sinclair/typebox';
import type { Provider, ProviderFactory } from '../types';
import { UnifiedProvider, type RouterDefinition } from '../unified';
import { mergeSettings, readSettings } from '../settings';
import { AWS_SECRETS_MANAGER_TYPE } from '../backends/aws-secretsmanager';
import { AWS_SSM_TYPE } from '../backends/aws-ssm';
import { AWS_SSO_TYPE, AWS_STS_TYPE } from '../backends/aws-sts';

export const AWS_TYPE = 'aws';

const CREDENTIAL_KEYS = new Set(['access_key_id', 'secret_access_key', 'session_token', 'credentials']);

function isCredentialKey(key: string): boolean {
  return CREDENTIAL_KEYS.has(key.split('#', 1)[0].toLowerCase());
}

export const awsRouter: RouterDefinition = {
  type: AWS_TYPE,
  vendor: 'AWS',
  services: [
    { name: 'secretsmanager', aliases: ['secretsmanager', 'sm'] },
    { name: 'ssm', aliases: ['ssm', 'parameter'] },
    { name: 'sts', aliases: ['sts', 'credentials'] },
    { name: 'sso', aliases: ['sso'] },
  ],
  rules: [
    {
      service: 'ssm',
      description: 'parameter path',
      matches: (key) => key.startsWith('/'),
    },
    {
      service: 'secretsmanager',
      description: 'Secrets Manager ARN',
      matches: (key) => key.startsWith('arn:aws:') && key.includes(':secretsmanager:'),
    },
    {
      service: 'ssm',
      description: 'parameter ARN',
      matches: (key) => key.startsWith('arn:aws:') && key.includes(':ssm:'),
    },
    {
      service: 'sts',
      description: 'IAM role ARN',
      matches: (key) => key.startsWith('arn:aws:') && key.includes(':iam:') && key.includes(':role/'),
    },
    {
      service: 'sts',
      description: 'credential field',
      matches: (key, configured) => configured('sts') && isCredentialKey(key),
    },
    {
      service: 'sso',
      description: 'credential field',
      matches: (key, configured) => configured('sso') && isCredentialKey(key),
    },
  ],
  defaultService: 'secretsmanager',
};

const Section = Type.Optional(Type.Record(Type.String(), Type.Unknown()));

const AwsSettings = Type.Object({
  region: Type.Optional(Type.String({ minLength: 1 })),
  profile: Type.Optional(Type.String({ minLength: 1 })),
  default_service: Type.Optional(Type.String({ minLength: 1 })),
  assume_role: Type.Optional(Type.String({ pattern: '^arn:' })),
  secretsmanager: Section,
  ssm: Section,
  sts: Section,
  sso: Section,
});

export const createAwsProvider: ProviderFactory = (name, config, ctx) => {
  const settings = readSettings(AwsSettings, config, { provider: name, type: AWS_TYPE });
  const common = { region: settings.region, profile: settings.profile };

  const services = new Map<string, Provider>();
  services.set(
    'secretsmanager',
    ctx.createProvider(`${name}-sm`, {
      type: AWS_SECRETS_MANAGER_TYPE,
      config: mergeSettings(common, settings.secretsmanager),
    })
  );
  services.set(
    'ssm',
    ctx.createProvider(`${name}-ssm`, { type: AWS_SSM_TYPE, config: mergeSettings(common, settings.ssm) })
  );
  if (settings.sts || settings.assume_role) {
    services.set(
      'sts',
      ctx.createProvider(`${name}-sts`, {
        type: AWS_STS_TYPE,
        config: mergeSettings({ ...common, assume_role: settings.assume_role }, settings.sts),
      })
    );
  }
  if (settings.sso) {
    services.set(
      'sso',
      ctx.createProvider(`${name}-sso`, { type: AWS_SSO_TYPE, config: mergeSettings(common, settings.sso) })
    );
  }

  ctx.logger.debug(`${name}: AWS services ${[...services.keys()].join(', ')}`);
  return new UnifiedProvider(name, awsRouter, services, {
    defaultService: settings.default_service,
    logger: ctx.logger,
  });
};
