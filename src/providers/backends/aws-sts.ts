/**
 * Temporary AWS credentials, from STS (AssumeRole / GetSessionToken) or
 * from IAM Identity Center (SSO role credentials).
 *
 * Reference: [role-arn#]field, a role ARN, or a field
 *   access_key_id
 *   arn:aws:iam::123456789012:role/deploy
 *   arn:aws:iam::123456789012:role/deploy#session_token
 *
 * The adapter returns the credentials as JSON:
 *   { AccessKeyId, SecretAccessKey, SessionToken, Expiration, AssumedRoleArn? }
 */

import { Type } from '@sinclair/typebox';
import type { ProviderFactory, RawSecret, StructuredReference } from '../types';
import { BackendProvider, defineCapabilities, requireAdapter, type BackendDefinition } from '../backend-provider';
import type { ErrorClassifier } from '../classify';
import { MalformedReferenceError, UserError } from '../errors';
import { requireKey, splitFieldSelector } from '../references';
import { readSettings } from '../settings';
import { isRecord } from './cli';

export const AWS_STS_TYPE = 'aws.sts';
export const AWS_SSO_TYPE = 'aws.sso';

export type CredentialField =
  | 'access_key_id'
  | 'secret_access_key'
  | 'session_token'
  | 'expiration'
  | 'assumed_role_arn'
  | 'credentials';

const FIELD_ALIASES: Readonly<Record<string, CredentialField>> = {
  access_key_id: 'access_key_id',
  accesskeyid: 'access_key_id',
  aws_access_key_id: 'access_key_id',
  secret_access_key: 'secret_access_key',
  secretaccesskey: 'secret_access_key',
  aws_secret_access_key: 'secret_access_key',
  session_token: 'session_token',
  sessiontoken: 'session_token',
  aws_session_token: 'session_token',
  expiration: 'expiration',
  assumed_role_arn: 'assumed_role_arn',
  assumedrolearn: 'assumed_role_arn',
  credentials: 'credentials',
  all: 'credentials',
};

/** Key in the credentials JSON for each single-value field */
const CREDENTIAL_KEYS: Readonly<Record<Exclude<CredentialField, 'credentials'>, string>> = {
  access_key_id: 'AccessKeyId',
  secret_access_key: 'SecretAccessKey',
  session_token: 'SessionToken',
  expiration: 'Expiration',
  assumed_role_arn: 'AssumedRoleArn',
};

const FIELD_SUGGESTION = 'Use one of: access_key_id, secret_access_key, session_token, expiration, credentials';

export interface CredentialsReference extends StructuredReference {
  field: CredentialField;
  roleArn?: string;
}

/** Canonical field for any accepted spelling, or undefined */
export function normalizeCredentialField(field: string): CredentialField | undefined {
  const lookup = field.trim().toLowerCase();
  return Object.hasOwn(FIELD_ALIASES, lookup) ? FIELD_ALIASES[lookup] : undefined;
}

function requireField(raw: string, field: string): CredentialField {
  const normalized = normalizeCredentialField(field);
  if (!normalized) {
    throw new MalformedReferenceError(raw, `unknown credential field "${field}". ${FIELD_SUGGESTION}`);
  }
  return normalized;
}

export function parseCredentialsReference(key: string): CredentialsReference {
  requireKey(key);
  const { rest, selector } = splitFieldSelector(key, '#');

  if (rest.startsWith('arn:')) {
    return { name: rest, roleArn: rest, field: selector === undefined ? 'credentials' : requireField(key, selector) };
  }
  if (selector !== undefined) {
    throw new MalformedReferenceError(key, 'expected an IAM role ARN before "#"');
  }
  const field = requireField(key, rest);
  return { name: field, field };
}

/**
 * Pick one field out of a credentials document. `credentials` returns the
 * document as fetched.
 */
export function selectCredentialField(raw: RawSecret, ref: CredentialsReference): string {
  if (ref.field === 'credentials') {
    return raw.value;
  }

  let document: unknown;
  try {
    document = JSON.parse(raw.value);
  } catch (err) {
    throw new UserError('AWS credentials response is not valid JSON', {
      suggestion: 'Check the credentials adapter returns the STS credentials document',
      cause: err,
    });
  }

  const jsonKey = CREDENTIAL_KEYS[ref.field];
  const value = isRecord(document) ? document[jsonKey] : undefined;
  if (typeof value !== 'string' || value.length === 0) {
    throw new UserError(`Field "${ref.field}" not present in AWS credentials`, {
      suggestion: ref.field === 'assumed_role_arn' ? 'Reference a role ARN to get an assumed role' : FIELD_SUGGESTION,
    });
  }
  return value;
}

// --- STS -------------------------------------------------

export const stsClassifier: ErrorClassifier = {
  backend: 'AWS STS',
  rules: [
    {
      kind: 'auth',
      patterns: ['accessdenied'],
      statusCodes: [403],
      suggestion: 'Check that you have permission to assume the role and the trust policy allows your principal',
    },
    {
      kind: 'auth',
      patterns: ['tokenrefreshrequired', 'multifactor', 'mfa'],
      suggestion: 'The role requires MFA. Provide a fresh MFA token code',
    },
    {
      kind: 'auth',
      patterns: ['expiredtoken', 'unrecognizedclient', 'invalidclienttokenid'],
      suggestion: "Configure AWS credentials: 'aws configure' or set AWS_PROFILE",
    },
    {
      kind: 'operational',
      patterns: ['invalidparametervalue', 'malformedpolicydocument', 'validationerror'],
      suggestion: 'Check the role ARN, session name and duration',
    },
    {
      kind: 'operational',
      patterns: ['regiondisabled'],
      suggestion: 'STS is not activated in this region. Activate it in IAM account settings or use another region',
    },
  ],
  fallbackSuggestion: 'Check AWS credentials, role ARN, and IAM permissions',
};

const StsSettings = Type.Object({
  region: Type.Optional(Type.String({ minLength: 1 })),
  profile: Type.Optional(Type.String({ minLength: 1 })),
  assume_role: Type.Optional(Type.String({ pattern: '^arn:' })),
  role_session_name: Type.Optional(Type.String({ minLength: 2, maxLength: 64 })),
  duration_seconds: Type.Optional(Type.Integer({ minimum: 900, maximum: 43200 })),
  external_id: Type.Optional(Type.String()),
});

export const awsStsCapabilities = defineCapabilities({
  supportsVersioning: false,
  supportsMetadata: true,
  supportsWatching: false,
  supportsBinary: false,
  requiresAuth: true,
  authMethods: ['iam', 'profile', 'environment', 'assume_role'],
});

/**
 * Without a role in the reference the configured `assume_role` is used;
 * an empty path asks the adapter for session credentials of the caller.
 */
export function stsDefinition(defaultRole?: string): BackendDefinition<CredentialsReference> {
  return {
    type: AWS_STS_TYPE,
    capabilities: awsStsCapabilities,
    classifier: stsClassifier,
    parse: parseCredentialsReference,
    target: (ref) => ({ path: ref.roleArn ?? defaultRole ?? '' }),
    select: selectCredentialField,
  };
}

export const createStsProvider: ProviderFactory = (name, config, ctx) => {
  const settings = readSettings(StsSettings, config, {
    provider: name,
    type: AWS_STS_TYPE,
    hints: { assume_role: 'assume_role must be an IAM role ARN, e.g. arn:aws:iam::123456789012:role/deploy' },
  });
  return new BackendProvider(name, stsDefinition(settings.assume_role), requireAdapter(ctx, AWS_STS_TYPE, name), config, {
    logger: ctx.logger,
    now: ctx.now,
  });
};

// --- SSO -------------------------------------------------

export function parseSsoReference(key: string): CredentialsReference {
  requireKey(key);
  const field = requireField(key, key);
  return { name: field, field };
}

export const ssoClassifier: ErrorClassifier = {
  backend: 'AWS SSO',
  rules: [
    {
      kind: 'auth',
      patterns: ['unauthorizedexception', 'token has expired', 'sso session'],
      statusCodes: [401],
      suggestion: "The SSO session has expired. Run 'aws sso login' again",
    },
    {
      kind: 'auth',
      patterns: ['accessdeniedexception'],
      statusCodes: [403],
      suggestion: 'Check that your SSO user is assigned the permission set on this account',
    },
    {
      kind: 'operational',
      patterns: ['resourcenotfoundexception'],
      suggestion: 'Check the SSO account_id and role_name',
    },
    {
      kind: 'operational',
      patterns: ['toomanyrequestsexception'],
      statusCodes: [429],
      suggestion: 'Request was throttled. Reduce the request rate',
    },
  ],
  fallbackSuggestion: "Check the SSO start URL, account and role, and run 'aws sso login'",
};

const SsoSettings = Type.Object({
  region: Type.Optional(Type.String({ minLength: 1 })),
  profile: Type.Optional(Type.String({ minLength: 1 })),
  start_url: Type.String({ pattern: '^https://' }),
  account_id: Type.String({ pattern: '^[0-9]{12}$' }),
  role_name: Type.String({ minLength: 1 }),
});

export const awsSsoCapabilities = defineCapabilities({
  supportsVersioning: false,
  supportsMetadata: true,
  supportsWatching: false,
  supportsBinary: false,
  requiresAuth: true,
  authMethods: ['sso'],
});

export function ssoDefinition(accountId: string, roleName: string): BackendDefinition<CredentialsReference> {
  return {
    type: AWS_SSO_TYPE,
    capabilities: awsSsoCapabilities,
    classifier: ssoClassifier,
    parse: parseSsoReference,
    target: () => ({ path: `${accountId}/${roleName}` }),
    select: selectCredentialField,
  };
}

export const createSsoProvider: ProviderFactory = (name, config, ctx) => {
  const settings = readSettings(SsoSettings, config, {
    provider: name,
    type: AWS_SSO_TYPE,
    hints: {
      start_url: 'Set "start_url" to your IAM Identity Center portal, e.g. https://example.awsapps.com/start',
      account_id: 'Set "account_id" to the 12-digit AWS account id',
      role_name: 'Set "role_name" to the permission set name',
    },
  });
  return new BackendProvider(
    name,
    ssoDefinition(settings.account_id, settings.role_name),
    requireAdapter(ctx, AWS_SSO_TYPE, name),
    config,
    { logger: ctx.logger, now: ctx.now }
  );
};
