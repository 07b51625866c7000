/**
 * Typed access to a provider's settings block.
 */

import type { Static, TSchema } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { ConfigError } from './errors';

export interface SettingsContext {
  /** Provider instance name */
  provider: string;
  /** Provider type, for messages */
  type: string;
  /** Per-field suggestions; a generic one is used otherwise */
  hints?: Record<string, string>;
}

/**
 * Check `config` against `schema` and return it typed. The first violation
 * becomes a ConfigError naming the field, before any I/O happens.
 */
export function readSettings<T extends TSchema>(
  schema: T,
  config: Record<string, unknown>,
  ctx: SettingsContext
): Static<T> {
  if (Value.Check(schema, config)) {
    return config;
  }

  const first = Value.Errors(schema, config).First();
  const field = first ? first.path.replace(/^\//, '').replace(/\//g, '.') : '';
  const label = field || '(settings)';
  const missing = first !== undefined && first.value === undefined;
  const message = missing
    ? `${ctx.type} provider "${ctx.provider}" requires "${label}"`
    : `${ctx.type} provider "${ctx.provider}" has an invalid "${label}": ${first?.message ?? 'unexpected value'}`;

  throw new ConfigError(
    label,
    message,
    ctx.hints?.[field] ?? `Set "${label}" in the settings of provider "${ctx.provider}"`,
    { provider: ctx.provider, value: first?.value }
  );
}

/**
 * Overlay `section` on `common`, dropping undefined values so the
 * section's absent keys do not erase common ones.
 */
export function mergeSettings(
  common: Record<string, unknown>,
  section: Record<string, unknown> | undefined
): Record<string, unknown> {
  const merged: Record<string, unknown> = {};
  for (const source of [common, section ?? {}]) {
    for (const [key, value] of Object.entries(source)) {
      if (value !== undefined) merged[key] = value;
    }
  }
  return merged;
}

/**
 * First non-empty of a configured value and an environment variable.
 */
export function settingOrEnv(value: unknown, envVar: string): string | undefined {
  if (typeof value === 'string' && value.length > 0) return value;
  const fromEnv = process.env[envVar];
  return fromEnv && fromEnv.length > 0 ? fromEnv : undefined;
}
