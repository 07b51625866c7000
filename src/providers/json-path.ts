import { UserError } from './errors';

const JSON_SUGGESTION = 'Check that the secret contains valid JSON and the path exists';

/**
 * Pick a value out of a JSON document with a dotted path like `.db.hosts.0`.
 * Strings come back raw; other values are re-serialized as JSON.
 */
export function extractJsonPath(raw: string, path: string): string {
  const segments = path.replace(/^\./, '').split('.').filter((segment) => segment.length > 0);
  if (segments.length === 0) {
    return raw;
  }

  let current: unknown;
  try {
    current = JSON.parse(raw);
  } catch (err) {
    throw new UserError(`Secret value is not valid JSON, cannot extract "${path}"`, {
      suggestion: JSON_SUGGESTION,
      cause: err,
    });
  }

  for (const segment of segments) {
    if (typeof current !== 'object' || current === null || (Array.isArray(current) && !/^\d+$/.test(segment))) {
      throw missing(path, segment);
    }
    const entry = Object.getOwnPropertyDescriptor(current, segment);
    if (!entry) {
      throw missing(path, segment);
    }
    current = entry.value;
  }

  if (typeof current === 'string') {
    return current;
  }
  return JSON.stringify(current);
}

function missing(path: string, segment: string): UserError {
  return new UserError(`JSON path "${path}" not found in secret (at "${segment}")`, {
    suggestion: JSON_SUGGESTION,
  });
}
