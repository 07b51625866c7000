/**
 * Provider Registry
 *
 * Maps provider type names to factories and backend types to adapters.
 * Built once at startup, then frozen; provider instances are created from
 * configuration through it.
 */

import type {
  BackendAdapter,
  FactoryContext,
  Provider,
  ProviderConfig,
  ProviderFactory,
  SecretValue,
  CallOptions,
} from './types';
import { parseReferenceUri } from './types';
import { ConfigError } from './errors';
import { silentLogger, type Logger } from '../core/logger';
import { runCommand, type CommandRunner } from '../core/command';

import { createEnvProvider, ENV_TYPE } from './env';
import { createLiteralProvider, LITERAL_TYPE } from './literal';
import { createAkeylessProvider, AKEYLESS_TYPE } from './backends/akeyless';
import { createSecretsManagerProvider, AWS_SECRETS_MANAGER_TYPE } from './backends/aws-secretsmanager';
import { createSsmProvider, AWS_SSM_TYPE } from './backends/aws-ssm';
import { createSsoProvider, createStsProvider, AWS_SSO_TYPE, AWS_STS_TYPE } from './backends/aws-sts';
import { createIdentityProvider, AZURE_IDENTITY_TYPE } from './backends/azure-identity';
import { createKeyVaultProvider, AZURE_KEY_VAULT_TYPE } from './backends/azure-keyvault';
import { BitwardenCliAdapter, createBitwardenProvider, BITWARDEN_TYPE } from './backends/bitwarden';
import { DopplerCliAdapter, createDopplerProvider, DOPPLER_TYPE } from './backends/doppler';
import { createGcpSecretManagerProvider, GCP_SECRET_MANAGER_TYPE } from './backends/gcp-secretmanager';
import { createInfisicalProvider, INFISICAL_TYPE } from './backends/infisical';
import { createKeychainProvider, KEYCHAIN_TYPE } from './backends/keychain';
import { OnePasswordCliAdapter, createOnePasswordProvider, ONEPASSWORD_TYPE } from './backends/onepassword';
import { PassCliAdapter, createPassProvider, PASS_TYPE } from './backends/pass';
import { createVaultProvider, VAULT_TYPE } from './backends/vault';
import { createAwsProvider, AWS_TYPE } from './routers/aws';
import { createAzureProvider, AZURE_TYPE } from './routers/azure';
import { createGcpProvider, GCP_TYPE } from './routers/gcp';

export interface RegistryOptions {
  logger?: Logger;
  /** Clock handed to token caches */
  now?: () => number;
}

export class ProviderRegistry {
  private readonly factories = new Map<string, ProviderFactory>();
  private readonly adapters = new Map<string, BackendAdapter>();
  private readonly logger: Logger;
  private readonly now?: () => number;
  private frozen = false;

  constructor(options: RegistryOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.now = options.now;
  }

  /**
   * Register a provider type.
   * @throws ConfigError when the type is taken or the registry is frozen
   */
  registerFactory(type: string, factory: ProviderFactory): this {
    this.ensureMutable(type);
    if (this.factories.has(type)) {
      throw new ConfigError(
        'type',
        `Provider type "${type}" is already registered`,
        'Register each provider type once',
        { value: type }
      );
    }
    this.factories.set(type, factory);
    return this;
  }

  /** Register (or replace) the adapter that performs I/O for a backend type */
  registerAdapter(type: string, adapter: BackendAdapter): this {
    this.ensureMutable(type);
    this.adapters.set(type, adapter);
    return this;
  }

  hasAdapter(type: string): boolean {
    return this.adapters.has(type);
  }

  isSupported(type: string): boolean {
    return this.factories.has(type);
  }

  /** Registered types, sorted */
  supportedTypes(): string[] {
    return [...this.factories.keys()].sort();
  }

  /** No registrations are accepted afterwards. */
  freeze(): this {
    this.frozen = true;
    return this;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  /**
   * Create a provider instance. Settings are validated here, before any I/O.
   * @throws ConfigError for an unknown type or invalid settings
   */
  createProvider(name: string, config: ProviderConfig): Provider {
    const factory = this.factories.get(config.type);
    if (!factory) {
      throw new ConfigError(
        'type',
        `Unknown provider type "${config.type}". Available types: ${this.supportedTypes().join(', ')}`,
        `Set "type" of provider "${name}" to one of the available types`,
        { provider: name, value: config.type }
      );
    }
    this.logger.debug(`creating provider "${name}" (${config.type})`);
    return factory(name, config.config, this.factoryContext());
  }

  private factoryContext(): FactoryContext {
    return {
      logger: this.logger,
      now: this.now,
      adapterFor: (type) => this.adapters.get(type),
      createProvider: (name, config) => this.createProvider(name, config),
    };
  }

  private ensureMutable(type: string): void {
    if (this.frozen) {
      throw new ConfigError(
        'type',
        `Cannot register "${type}": the provider registry is frozen`,
        'Register provider types and adapters before freezing the registry'
      );
    }
  }
}

export interface DefaultRegistryOptions extends RegistryOptions {
  /** Adapters for SDK- and HTTP-backed types, keyed by backend type */
  adapters?: Record<string, BackendAdapter>;
  /** Runs vendor CLIs for the built-in CLI adapters */
  runner?: CommandRunner;
}

/**
 * Registry with every built-in provider type and the CLI adapters
 * (op, bw, pass, doppler). Not frozen, so callers can add adapters.
 */
export function createDefaultRegistry(options: DefaultRegistryOptions = {}): ProviderRegistry {
  const registry = new ProviderRegistry(options);
  const runner = options.runner ?? runCommand;

  registry
    .registerFactory(ENV_TYPE, createEnvProvider)
    .registerFactory(LITERAL_TYPE, createLiteralProvider)
    .registerFactory(ONEPASSWORD_TYPE, createOnePasswordProvider)
    .registerFactory(BITWARDEN_TYPE, createBitwardenProvider)
    .registerFactory(PASS_TYPE, createPassProvider)
    .registerFactory(DOPPLER_TYPE, createDopplerProvider)
    .registerFactory(VAULT_TYPE, createVaultProvider)
    .registerFactory(INFISICAL_TYPE, createInfisicalProvider)
    .registerFactory(AKEYLESS_TYPE, createAkeylessProvider)
    .registerFactory(KEYCHAIN_TYPE, createKeychainProvider)
    .registerFactory(AWS_SECRETS_MANAGER_TYPE, createSecretsManagerProvider)
    .registerFactory(AWS_SSM_TYPE, createSsmProvider)
    .registerFactory(AWS_STS_TYPE, createStsProvider)
    .registerFactory(AWS_SSO_TYPE, createSsoProvider)
    .registerFactory(GCP_SECRET_MANAGER_TYPE, createGcpSecretManagerProvider)
    .registerFactory(AZURE_KEY_VAULT_TYPE, createKeyVaultProvider)
    .registerFactory(AZURE_IDENTITY_TYPE, createIdentityProvider)
    .registerFactory(AWS_TYPE, createAwsProvider)
    .registerFactory(GCP_TYPE, createGcpProvider)
    .registerFactory(AZURE_TYPE, createAzureProvider);

  registry
    .registerAdapter(ONEPASSWORD_TYPE, new OnePasswordCliAdapter(runner))
    .registerAdapter(BITWARDEN_TYPE, new BitwardenCliAdapter(runner))
    .registerAdapter(PASS_TYPE, new PassCliAdapter(runner))
    .registerAdapter(DOPPLER_TYPE, new DopplerCliAdapter(runner));

  for (const [type, adapter] of Object.entries(options.adapters ?? {})) {
    registry.registerAdapter(type, adapter);
  }
  return registry;
}

/**
 * Create every configured provider. Fails on the first invalid one.
 */
export function buildProviders(
  registry: ProviderRegistry,
  configs: Record<string, ProviderConfig>
): Map<string, Provider> {
  const providers = new Map<string, Provider>();
  for (const [name, config] of Object.entries(configs)) {
    providers.set(name, registry.createProvider(name, config));
  }
  return providers;
}

/**
 * Resolve "provider://key" (or a plain key against `defaultProvider`).
 */
export async function resolveReference(
  providers: ReadonlyMap<string, Provider>,
  uri: string,
  defaultProvider?: string,
  options?: CallOptions
): Promise<SecretValue> {
  const ref = parseReferenceUri(uri, defaultProvider);
  return requireProvider(providers, ref.provider).resolve(ref, options);
}

/**
 * Look up a configured provider by name.
 * @throws ConfigError listing the configured providers
 */
export function requireProvider(providers: ReadonlyMap<string, Provider>, name: string): Provider {
  const provider = providers.get(name);
  if (!provider) {
    const available = [...providers.keys()].sort().join(', ') || '(none)';
    throw new ConfigError(
      'provider',
      `Provider "${name}" not found. Configured providers: ${available}`,
      'Add the provider to the configuration file, or check the reference for typos',
      { provider: name }
    );
  }
  return provider;
}
