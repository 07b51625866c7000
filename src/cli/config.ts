/**
 * Shared setup for commands that talk to providers.
 *
 * Providers are created on first use, so one misconfigured provider does
 * not break commands aimed at another.
 */

import { createLogger, type Logger } from '../core/logger';
import { createDefaultRegistry, type ProviderRegistry } from '../providers/registry';
import type { Provider, ProviderConfig } from '../providers/types';
import { ConfigError } from '../providers/errors';
import { getConfigPath, loadConfig, toProviderConfigs, type RouterConfig } from './config-yaml';

/** Options every command accepts from the program level */
export interface GlobalOptions {
  config?: string;
  debug?: boolean;
}

export interface Runtime {
  configPath: string;
  config: RouterConfig;
  logger: Logger;
  registry: ProviderRegistry;
  /** Configured provider names, in file order */
  providerNames(): string[];
  /** Create (once) and return a configured provider */
  provider(name: string): Provider;
}

export function loadRuntime(options: GlobalOptions = {}, registry?: ProviderRegistry): Runtime {
  const logger = createLogger({ debug: options.debug });
  const configPath = getConfigPath(options.config);
  logger.debug(`loading configuration from ${configPath}`);

  const config = loadConfig(configPath);
  const configs: Record<string, ProviderConfig> = toProviderConfigs(config);
  const reg = registry ?? createDefaultRegistry({ logger });
  reg.freeze();

  const created = new Map<string, Provider>();
  return {
    configPath,
    config,
    logger,
    registry: reg,
    providerNames: () => Object.keys(configs),
    provider(name) {
      const existing = created.get(name);
      if (existing) return existing;

      if (!Object.hasOwn(configs, name)) {
        const available = Object.keys(configs).join(', ') || '(none)';
        throw new ConfigError(
          'provider',
          `Provider "${name}" not found. Configured providers: ${available}`,
          `Add "${name}" under providers in ${configPath}, or check the reference for typos`,
          { provider: name }
        );
      }
      const provider = reg.createProvider(name, configs[name]);
      created.set(name, provider);
      return provider;
    },
  };
}

/**
 * Name of the provider a plain key belongs to.
 */
export function defaultProviderOf(config: RouterConfig): string | undefined {
  if (config.default_provider) return config.default_provider;
  const names = Object.keys(config.providers);
  return names.length === 1 ? names[0] : undefined;
}
