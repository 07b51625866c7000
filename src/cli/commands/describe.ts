import { parseReferenceUri, type Reference } from '../../providers/types';
import { defaultProviderOf, loadRuntime, type GlobalOptions } from '../config';
import { exitWithError } from '../output';

export interface DescribeOptions extends GlobalOptions {
  provider?: string;
  json?: boolean;
}

export async function describeCommand(reference: string, options: DescribeOptions = {}): Promise<void> {
  try {
    const runtime = loadRuntime(options);
    const ref: Reference = options.provider
      ? { provider: options.provider, key: reference }
      : parseReferenceUri(reference, defaultProviderOf(runtime.config));

    const metadata = await runtime.provider(ref.provider).describe(ref);

    if (options.json) {
      console.log(
        JSON.stringify(
          {
            ok: true,
            provider: ref.provider,
            key: ref.key,
            ...metadata,
            updatedAt: metadata.updatedAt?.toISOString(),
          },
          null,
          2
        )
      );
      return;
    }

    console.log('');
    console.log(`${ref.provider}://${ref.key}`);
    console.log(`  Exists: ${metadata.exists ? 'yes' : 'no'}`);
    if (metadata.version !== undefined) console.log(`  Version: ${metadata.version}`);
    if (metadata.updatedAt) console.log(`  Updated: ${metadata.updatedAt.toISOString()}`);
    if (metadata.size !== undefined) console.log(`  Size: ${metadata.size} bytes`);
    if (metadata.type) console.log(`  Type: ${metadata.type}`);

    const tags = Object.entries(metadata.tags);
    if (tags.length > 0) {
      console.log('  Tags:');
      for (const [key, value] of tags) {
        console.log(`    ${key}: ${value}`);
      }
    }
    console.log('');
  } catch (error) {
    exitWithError(error, options);
  }
}
