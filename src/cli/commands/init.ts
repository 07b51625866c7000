import { confirm, select } from '@inquirer/prompts';
import { ConfigError } from '../../providers/errors';
import { CONFIG_VERSION, getConfigPath, hasConfig, saveConfig, type RouterConfig } from '../config-yaml';
import { exitWithError } from '../output';
import { PROVIDER_TEMPLATES, templateFor } from '../templates';

export interface InitOptions {
  config?: string;
  /** Provider type; prompted for when absent */
  type?: string;
  /** Provider name; defaults to the type with dots turned into dashes */
  name?: string;
  force?: boolean;
  json?: boolean;
}

async function chooseType(options: InitOptions): Promise<string> {
  if (options.type) return options.type;
  return select({
    message: 'Provider type:',
    choices: Object.entries(PROVIDER_TEMPLATES).map(([value, template]) => ({
      name: `${value} - ${template.description}`,
      value,
    })),
  });
}

/**
 * Write a starter secret-router.yaml with one example provider.
 */
export async function initCommand(options: InitOptions = {}): Promise<void> {
  try {
    const configPath = getConfigPath(options.config);

    if (hasConfig(configPath) && !options.force) {
      if (!process.stdin.isTTY || options.json) {
        throw new ConfigError(
          'config',
          `Configuration already exists at ${configPath}`,
          'Pass --force to overwrite it'
        );
      }
      const overwrite = await confirm({ message: `${configPath} exists. Overwrite?`, default: false });
      if (!overwrite) {
        console.log('Aborted. Existing configuration kept.');
        return;
      }
    }

    const type = await chooseType(options);
    const template = templateFor(type);
    if (!template) {
      throw new ConfigError(
        'type',
        `Unknown provider type "${type}". Available types: ${Object.keys(PROVIDER_TEMPLATES).sort().join(', ')}`,
        'Run `secret-router providers --types` to list provider types',
        { value: type }
      );
    }

    const name = options.name ?? type.replace(/\./g, '-');
    const config: RouterConfig = {
      version: CONFIG_VERSION,
      default_provider: name,
      providers: { [name]: { type, ...template.settings } },
    };
    saveConfig(configPath, config);

    if (options.json) {
      console.log(JSON.stringify({ ok: true, path: configPath, provider: name, type }, null, 2));
      return;
    }

    console.log(`✅ Created ${configPath}`);
    console.log('');
    console.log(`Provider "${name}" (${template.description}) uses example settings. Next:`);
    console.log(`  1. Edit ${configPath}`);
    console.log('  2. secret-router validate');
    console.log(`  3. secret-router get ${name}://<key>`);
  } catch (error) {
    exitWithError(error, options);
  }
}
