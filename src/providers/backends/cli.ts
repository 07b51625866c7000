/**
 * Shared plumbing for adapters that shell out to a vendor CLI.
 */

import type { CommandRunner } from '../../core/command';
import { BackendError } from '../errors';
import type { AdapterContext } from '../types';

export interface CliCall {
  command: string;
  args: string[];
  env?: Record<string, string>;
  /** Operation and resource named in a failure */
  operation: string;
  resource: string;
}

/**
 * Run a vendor CLI and return its stdout. A non-zero exit becomes a
 * BackendError whose message is the command's stderr.
 */
export async function runCli(runner: CommandRunner, ctx: AdapterContext, call: CliCall): Promise<string> {
  const result = await runner(call.command, call.args, { env: call.env, signal: ctx.signal });
  if (result.exitCode !== 0) {
    const detail = result.stderr.trim() || result.stdout.trim() || `${call.command} exited with code ${result.exitCode}`;
    throw new BackendError(call.operation, call.resource, detail, { provider: ctx.provider });
  }
  return result.stdout;
}

/**
 * Parse CLI JSON output. Malformed output is a backend failure, not a crash.
 */
export function parseCliJson(output: string, call: Pick<CliCall, 'operation' | 'resource'>, provider: string): unknown {
  try {
    const parsed: unknown = JSON.parse(output);
    return parsed;
  } catch (err) {
    throw new BackendError(call.operation, call.resource, 'unexpected output (not JSON)', { provider, cause: err });
  }
}

/** String-valued setting from an adapter context, if set */
export function stringSetting(ctx: AdapterContext, key: string): string | undefined {
  const value = ctx.config[key];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** `record[key]` when it is a string */
export function stringField(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' ? value : undefined;
}
