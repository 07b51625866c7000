import { errorMessage, formatError, isAbortError } from '../../providers/errors';
import { loadRuntime, type GlobalOptions, type Runtime } from '../config';
import { exitWithError } from '../output';

export interface ValidateOptions extends GlobalOptions {
  json?: boolean;
}

interface ValidationResult {
  name: string;
  type: string;
  ok: boolean;
  error?: unknown;
}

async function validateOne(runtime: Runtime, name: string): Promise<ValidationResult> {
  const type = Object.hasOwn(runtime.config.providers, name) ? runtime.config.providers[name].type : 'unknown';
  try {
    const provider = runtime.provider(name);
    await provider.validate();
    return { name, type: provider.type, ok: true };
  } catch (error) {
    if (isAbortError(error)) throw error;
    runtime.logger.debug(`${name}: validation failed: ${errorMessage(error)}`);
    return { name, type, ok: false, error };
  }
}

/**
 * Validate one provider, or every configured provider.
 * Exits 1 when any validation fails.
 */
export async function validateCommand(providerName: string | undefined, options: ValidateOptions = {}): Promise<void> {
  let failed = false;
  try {
    const runtime = loadRuntime(options);
    const names = providerName ? [providerName] : runtime.providerNames();

    if (names.length === 0) {
      if (options.json) {
        console.log(JSON.stringify({ ok: true, providers: [] }, null, 2));
      } else {
        console.log(`No providers configured in ${runtime.configPath}.`);
      }
      return;
    }

    const results = await Promise.all(names.map((name) => validateOne(runtime, name)));
    failed = results.some((result) => !result.ok);

    if (options.json) {
      console.log(
        JSON.stringify(
          {
            ok: !failed,
            providers: results.map((result) => ({
              name: result.name,
              type: result.type,
              ok: result.ok,
              error: result.ok ? undefined : errorMessage(result.error),
            })),
          },
          null,
          2
        )
      );
    } else {
      for (const result of results) {
        if (result.ok) {
          console.log(`✅ ${result.name} (${result.type})`);
        } else {
          console.log(`❌ ${result.name} (${result.type})`);
          console.log(formatError(result.error).replace(/^/gm, '   '));
        }
      }
    }
  } catch (error) {
    exitWithError(error, options);
  }

  if (failed) {
    process.exit(1);
  }
}
