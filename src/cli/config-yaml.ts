/**
 * YAML configuration
 *
 *   version: 1
 *   default_provider: prod
 *   providers:
 *     prod:
 *       type: aws
 *       region: us-east-1
 *
 * Everything under a provider except `type` is that provider's settings;
 * each provider type validates its own settings when it is created.
 */

import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { ConfigError, errorMessage } from '../providers/errors';
import { isValidProviderName, type ProviderConfig } from '../providers/types';

export const CONFIG_FILE_NAME = 'secret-router.yaml';
export const CONFIG_ENV_VAR = 'SECRET_ROUTER_CONFIG';
export const CONFIG_VERSION = 1;

/** Provider entries keep their extra keys: they are the settings. */
const ProviderEntrySchema = Type.Intersect([
  Type.Object({ type: Type.String({ minLength: 1 }) }),
  Type.Record(Type.String(), Type.Unknown()),
]);

export const RouterConfigSchema = Type.Object({
  version: Type.Literal(CONFIG_VERSION),
  default_provider: Type.Optional(Type.String({ minLength: 1 })),
  providers: Type.Record(Type.String(), ProviderEntrySchema),
});

export type ProviderEntry = Static<typeof ProviderEntrySchema>;
export type RouterConfig = Static<typeof RouterConfigSchema>;

/**
 * Config file path: explicit flag, then SECRET_ROUTER_CONFIG, then
 * secret-router.yaml in the working directory.
 */
export function getConfigPath(explicit?: string): string {
  const fromEnv = process.env[CONFIG_ENV_VAR];
  return path.resolve(explicit || fromEnv || path.join(process.cwd(), CONFIG_FILE_NAME));
}

export function hasConfig(configPath: string): boolean {
  return fs.existsSync(configPath);
}

/**
 * Check a parsed document against the config schema. The first violation
 * is reported as a ConfigError naming the field.
 */
export function validateConfig(document: unknown, source: string): RouterConfig {
  if (!Value.Check(RouterConfigSchema, document)) {
    const first = Value.Errors(RouterConfigSchema, document).First();
    const field = first ? first.path.replace(/^\//, '').replace(/\//g, '.') : '';
    const label = field || '(root)';
    throw new ConfigError(
      label,
      `Invalid configuration in ${source}: "${label}" ${first?.message ?? 'is invalid'}`,
      `Fix "${label}" in ${source}. See \`secret-router init\` for an example`,
      { value: first?.value }
    );
  }

  const config: RouterConfig = document;
  const invalid = Object.keys(config.providers).find((name) => !isValidProviderName(name));
  if (invalid !== undefined) {
    throw new ConfigError(
      `providers.${invalid}`,
      `Invalid configuration in ${source}: provider name "${invalid}" must start with a lower-case letter and use at most 64 lower-case letters, digits, hyphens or underscores`,
      `Rename "${invalid}" in ${source}`,
      { value: invalid }
    );
  }
  if (config.default_provider !== undefined && !Object.hasOwn(config.providers, config.default_provider)) {
    throw new ConfigError(
      'default_provider',
      `Invalid configuration in ${source}: default_provider "${config.default_provider}" is not a configured provider`,
      `Set default_provider to one of: ${Object.keys(config.providers).join(', ') || '(none configured)'}`,
      { value: config.default_provider }
    );
  }
  return config;
}

/**
 * Load and validate the YAML configuration.
 */
export function loadConfig(configPath: string): RouterConfig {
  if (!hasConfig(configPath)) {
    throw new ConfigError(
      'config',
      `No configuration found at ${configPath}`,
      `Run \`secret-router init\` to create one, or pass --config <path>`
    );
  }

  const content = fs.readFileSync(configPath, 'utf8');
  let document: unknown;
  try {
    document = yaml.load(content);
  } catch (err) {
    throw new ConfigError('config', `Invalid YAML in ${configPath}: ${errorMessage(err)}`, 'Fix the YAML syntax');
  }

  // YAML parses an empty providers section as null
  if (typeof document === 'object' && document !== null && 'providers' in document && document.providers === null) {
    document = { ...document, providers: {} };
  }
  return validateConfig(document, configPath);
}

/**
 * Write the configuration. The file may hold tokens, so it is created
 * readable by the owner only.
 */
export function saveConfig(configPath: string, config: RouterConfig): void {
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  const content = yaml.dump(config, { indent: 2, lineWidth: 120, noRefs: true });
  fs.writeFileSync(configPath, content, { encoding: 'utf8', mode: 0o600 });
}

/**
 * Split each entry into its type and its settings.
 */
export function toProviderConfigs(config: RouterConfig): Record<string, ProviderConfig> {
  const result: Record<string, ProviderConfig> = {};
  for (const [name, entry] of Object.entries(config.providers)) {
    const { type, ...settings } = entry;
    result[name] = { type, config: settings };
  }
  return result;
}
