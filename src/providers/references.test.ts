import { describe, it, expect } from 'vitest';
import {
  ensureLeadingSeparator,
  parseVersionNumber,
  requireKey,
  requireNonEmpty,
  splitFieldSelector,
  splitVersionSuffix,
} from './references';
import { MalformedReferenceError } from './errors';

describe('splitFieldSelector', () => {
  it('splits at the first marker', () => {
    expect(splitFieldSelector('a/b#c#d', '#')).toEqual({ rest: 'a/b', selector: 'c#d' });
  });

  it('returns the key unchanged without a marker', () => {
    expect(splitFieldSelector('a/b', '#')).toEqual({ rest: 'a/b' });
  });

  it('treats an empty selector as absent', () => {
    expect(splitFieldSelector('a/b#', '#')).toEqual({ rest: 'a/b', selector: undefined });
  });
});

describe('splitVersionSuffix', () => {
  it('strips a version at the last marker', () => {
    expect(splitVersionSuffix('app@v1/db@v3', '@v', parseVersionNumber)).toEqual({ name: 'app@v1/db', version: 3 });
  });

  it('keeps the marker in the name when the tail is not a version', () => {
    expect(splitVersionSuffix('user@vendor', '@v', parseVersionNumber)).toEqual({ name: 'user@vendor' });
    expect(splitVersionSuffix('item@v', '@v', parseVersionNumber)).toEqual({ name: 'item@v' });
  });

  it('keeps a marker at position 0 in the name', () => {
    expect(splitVersionSuffix('@v3', '@v', parseVersionNumber)).toEqual({ name: '@v3' });
  });
});

describe('parseVersionNumber', () => {
  it('accepts digits only', () => {
    expect(parseVersionNumber('42')).toBe(42);
    expect(parseVersionNumber('0')).toBe(0);
    expect(parseVersionNumber('4a')).toBeUndefined();
    expect(parseVersionNumber('-1')).toBeUndefined();
    expect(parseVersionNumber('')).toBeUndefined();
  });

  it('rejects numbers beyond the safe integer range', () => {
    expect(parseVersionNumber('99999999999999999999')).toBeUndefined();
  });
});

describe('helpers', () => {
  it('adds a leading separator once', () => {
    expect(ensureLeadingSeparator('a/b')).toBe('/a/b');
    expect(ensureLeadingSeparator('/a/b')).toBe('/a/b');
  });

  it('rejects empty and whitespace-only keys', () => {
    expect(() => requireKey('')).toThrow(MalformedReferenceError);
    expect(() => requireKey('   ')).toThrow('invalid reference "   ": reference cannot be empty');
    expect(requireKey('x')).toBe('x');
  });

  it('names the empty part', () => {
    expect(() => requireNonEmpty('/', '', 'item path')).toThrow('invalid reference "/": item path cannot be empty');
  });
});
