import { describe, it, expect } from 'vitest';
import { extractJsonPath } from './json-path';
import { UserError } from './errors';

const doc = JSON.stringify({
  database: { host: 'db.internal', port: 5432, replicas: ['r1', 'r2'] },
  enabled: true,
});

describe('extractJsonPath', () => {
  it('returns strings raw', () => {
    expect(extractJsonPath(doc, '.database.host')).toBe('db.internal');
  });

  it('accepts paths without a leading dot', () => {
    expect(extractJsonPath(doc, 'database.host')).toBe('db.internal');
  });

  it('serializes non-string values as JSON', () => {
    expect(extractJsonPath(doc, '.database.port')).toBe('5432');
    expect(extractJsonPath(doc, '.enabled')).toBe('true');
    expect(extractJsonPath(doc, '.database.replicas')).toBe('["r1","r2"]');
  });

  it('indexes arrays with numeric segments', () => {
    expect(extractJsonPath(doc, '.database.replicas.1')).toBe('r2');
  });

  it('returns the raw value for an empty path', () => {
    expect(extractJsonPath('not json', '')).toBe('not json');
    expect(extractJsonPath('not json', '.')).toBe('not json');
  });

  it('reports the missing segment', () => {
    expect(() => extractJsonPath(doc, '.database.user')).toThrow(
      'JSON path ".database.user" not found in secret (at "user")'
    );
    expect(() => extractJsonPath(doc, '.database.replicas.first')).toThrow(UserError);
  });

  it('does not read inherited properties', () => {
    expect(() => extractJsonPath(doc, '.database.constructor')).toThrow(UserError);
  });

  it('rejects values that are not JSON', () => {
    expect(() => extractJsonPath('plain-text', '.a')).toThrow('Secret value is not valid JSON, cannot extract ".a"');
  });
});
