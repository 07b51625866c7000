/**
 * Secret providers
 *
 * Built-in types:
 *   - env, literal
 *   - onepassword, bitwarden, pass, doppler (vendor CLIs)
 *   - vault, infisical, akeyless, keychain
 *   - aws.secretsmanager, aws.ssm, aws.sts, aws.sso, gcp.secretmanager,
 *     azure.keyvault, azure.identity
 *   - aws, gcp, azure (unified routers over the above)
 *
 * Usage:
 *   const registry = createDefaultRegistry({ adapters: { 'aws.secretsmanager': myAdapter } });
 *   const providers = buildProviders(registry, config.providers);
 *   const secret = await resolveReference(providers, 'prod://prod/db#.password');
 */

export {
  ProviderRegistry,
  createDefaultRegistry,
  buildProviders,
  resolveReference,
  requireProvider,
} from './registry';
export type { RegistryOptions, DefaultRegistryOptions } from './registry';

export type {
  Reference,
  StructuredReference,
  SecretValue,
  Metadata,
  Capabilities,
  CallOptions,
  Provider,
  AdapterContext,
  AuthResult,
  RawSecret,
  RawItemMetadata,
  BackendAdapter,
  ProviderConfig,
  ProviderFactory,
  FactoryContext,
} from './types';
export { createSecretValue, parseReferenceUri } from './types';

export {
  SecretError,
  SecretErrorCode,
  NotFoundError,
  AuthError,
  ConfigError,
  UserError,
  BackendError,
  MalformedReferenceError,
  formatError,
  isNotFound,
} from './errors';

export { BackendProvider, defineCapabilities } from './backend-provider';
export type { BackendDefinition, ResolveTarget } from './backend-provider';
export { UnifiedProvider } from './unified';
export type { RouterDefinition, RoutingRule, ServiceDefinition, Route } from './unified';
export { classifyError } from './classify';
export type { ErrorClassifier, ClassificationRule } from './classify';
export { TokenCache } from './token-cache';
export { extractJsonPath } from './json-path';
export { EnvProvider } from './env';
export { LiteralProvider } from './literal';
