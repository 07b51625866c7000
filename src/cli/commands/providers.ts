import type { Capabilities } from '../../providers/types';
import { createDefaultRegistry } from '../../providers/registry';
import { errorMessage } from '../../providers/errors';
import { loadRuntime, defaultProviderOf, type GlobalOptions } from '../config';
import { exitWithError } from '../output';
import { templateFor } from '../templates';

export interface ProvidersOptions extends GlobalOptions {
  /** List supported provider types instead of configured providers */
  types?: boolean;
  json?: boolean;
}

interface ProviderSummary {
  name: string;
  type: string;
  default: boolean;
  capabilities?: Capabilities;
  error?: string;
}

function featureList(caps: Capabilities): string {
  const features = [
    caps.supportsVersioning && 'versioning',
    caps.supportsMetadata && 'metadata',
    caps.supportsBinary && 'binary',
    caps.supportsWatching && 'watching',
  ].filter((feature): feature is string => typeof feature === 'string');
  return features.length > 0 ? features.join(', ') : 'none';
}

function listTypes(options: ProvidersOptions): void {
  const types = createDefaultRegistry().supportedTypes();
  if (options.json) {
    console.log(
      JSON.stringify(
        types.map((type) => ({ type, description: templateFor(type)?.description })),
        null,
        2
      )
    );
    return;
  }

  const width = Math.max(...types.map((type) => type.length));
  console.log('');
  console.log('Provider types:');
  for (const type of types) {
    console.log(`  ${type.padEnd(width)}  ${templateFor(type)?.description ?? ''}`.trimEnd());
  }
  console.log('');
}

export async function providersCommand(options: ProvidersOptions = {}): Promise<void> {
  try {
    if (options.types) {
      listTypes(options);
      return;
    }

    const runtime = loadRuntime(options);
    const defaultProvider = defaultProviderOf(runtime.config);
    const entries = runtime.providerNames().map((name): ProviderSummary => {
      const type = runtime.config.providers[name].type;
      try {
        return { name, type, default: name === defaultProvider, capabilities: runtime.provider(name).capabilities() };
      } catch (error) {
        return { name, type, default: name === defaultProvider, error: errorMessage(error) };
      }
    });

    if (options.json) {
      console.log(JSON.stringify({ providers: entries }, null, 2));
      return;
    }

    if (entries.length === 0) {
      console.log('No providers configured yet.');
      console.log('');
      console.log('Add one:');
      console.log('  secret-router init');
      console.log(`  or edit ${runtime.configPath}`);
      return;
    }

    console.log('');
    console.log('Providers:');
    for (const entry of entries) {
      console.log(`  ${entry.name}${entry.default ? ' (default)' : ''}`);
      console.log(`    Type: ${entry.type}`);
      if (entry.capabilities) {
        console.log(`    Features: ${featureList(entry.capabilities)}`);
        if (entry.capabilities.authMethods.length > 0) {
          console.log(`    Auth: ${entry.capabilities.authMethods.join(', ')}`);
        }
      } else {
        console.log(`    ⚠️  ${entry.error}`);
      }
    }
    console.log('');
  } catch (error) {
    exitWithError(error, options);
  }
}
