import { SecretError, errorMessage, formatError, suggestionOf } from '../providers/errors';

/**
 * Print an error the way every command does and exit 1.
 * With --json the error goes to stdout as `{ ok: false, error }`.
 */
export function exitWithError(error: unknown, options: { json?: boolean } = {}): never {
  if (options.json) {
    console.log(
      JSON.stringify(
        {
          ok: false,
          error: {
            message: errorMessage(error),
            code: error instanceof SecretError ? error.code : undefined,
            suggestion: suggestionOf(error),
          },
        },
        null,
        2
      )
    );
  } else {
    console.error('❌ Error:', formatError(error));
  }
  process.exit(1);
}
