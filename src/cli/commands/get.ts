import { mask } from '../../core/logger';
import { parseReferenceUri, type Reference } from '../../providers/types';
import { defaultProviderOf, loadRuntime, type GlobalOptions } from '../config';
import { exitWithError } from '../output';

export interface GetOptions extends GlobalOptions {
  /** Treat the whole argument as a key of this provider */
  provider?: string;
  json?: boolean;
}

export async function getCommand(reference: string, options: GetOptions = {}): Promise<void> {
  try {
    const runtime = loadRuntime(options);
    const ref: Reference = options.provider
      ? { provider: options.provider, key: reference }
      : parseReferenceUri(reference, defaultProviderOf(runtime.config));

    const secret = await runtime.provider(ref.provider).resolve(ref);
    runtime.logger.debug(`${ref.provider}: got "${ref.key}" ${mask(secret.value)}`);

    if (options.json) {
      console.log(
        JSON.stringify(
          {
            ok: true,
            provider: ref.provider,
            key: ref.key,
            value: secret.value,
            version: secret.version,
            updatedAt: secret.updatedAt?.toISOString(),
            metadata: secret.metadata,
          },
          null,
          2
        )
      );
      return;
    }

    console.log(secret.value);
  } catch (error) {
    exitWithError(error, options);
  }
}
