/**
 * Building blocks shared by the per-backend reference parsers.
 *
 * Order is the same for every grammar: the field selector is split off at
 * its first marker, then a version suffix is stripped from the tail of
 * what remains, then the name is split into path parts.
 */

import { MalformedReferenceError } from './errors';

export interface FieldSplit {
  rest: string;
  selector?: string;
}

/**
 * Split at the first occurrence of `marker`. The selector is everything
 * after it, verbatim. An empty selector counts as absent.
 */
export function splitFieldSelector(key: string, marker: string): FieldSplit {
  const index = key.indexOf(marker);
  if (index < 0) {
    return { rest: key };
  }
  const selector = key.slice(index + marker.length);
  return { rest: key.slice(0, index), selector: selector === '' ? undefined : selector };
}

export interface VersionSplit<V> {
  name: string;
  version?: V;
}

/**
 * Strip a version suffix at the last occurrence of `marker`.
 *
 * When the tail does not parse, the marker is treated as part of the name.
 * So is a marker at position 0, since the name would be empty.
 */
export function splitVersionSuffix<V>(
  key: string,
  marker: string,
  parse: (tail: string) => V | undefined
): VersionSplit<V> {
  const index = key.lastIndexOf(marker);
  if (index <= 0) {
    return { name: key };
  }
  const version = parse(key.slice(index + marker.length));
  if (version === undefined) {
    return { name: key };
  }
  return { name: key.slice(0, index), version };
}

/** Digits only; anything else is "not a version". */
export function parseVersionNumber(tail: string): number | undefined {
  if (!/^\d+$/.test(tail)) return undefined;
  const value = Number(tail);
  return Number.isSafeInteger(value) ? value : undefined;
}

export function ensureLeadingSeparator(path: string, separator = '/'): string {
  return path.startsWith(separator) ? path : separator + path;
}

export function requireNonEmpty(raw: string, value: string, what: string): string {
  if (value.length === 0) {
    throw new MalformedReferenceError(raw, `${what} cannot be empty`);
  }
  return value;
}

/**
 * Reject empty keys up front. Every parser starts here.
 */
export function requireKey(raw: string): string {
  if (raw.trim().length === 0) {
    throw new MalformedReferenceError(raw, 'reference cannot be empty');
  }
  return raw;
}
