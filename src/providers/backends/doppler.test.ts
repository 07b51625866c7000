import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { parseDopplerReference } from './doppler';
import { createDefaultRegistry } from '../registry';
import { AuthError, ConfigError, MalformedReferenceError, NotFoundError } from '../errors';
import type { CommandResult, CommandRunner } from '../../core/command';

const SETTINGS = { token: 'test-token', project: 'api', config: 'dev' };
const ENV = { DOPPLER_TOKEN: 'test-token', DOPPLER_PROJECT: 'api', DOPPLER_CONFIG: 'dev' };

function runner(result: Partial<CommandResult>) {
  return vi.fn<CommandRunner>(async () => ({ stdout: '', stderr: '', exitCode: 0, ...result }));
}

function doppler(run: CommandRunner, config: Record<string, unknown> = SETTINGS) {
  return createDefaultRegistry({ runner: run }).createProvider('doppler', { type: 'doppler', config });
}

describe('parseDopplerReference', () => {
  it('uses the trimmed key as the secret name', () => {
    expect(parseDopplerReference(' STRIPE_KEY ')).toEqual({ name: 'STRIPE_KEY' });
    expect(() => parseDopplerReference('  ')).toThrow(MalformedReferenceError);
  });
});

describe('Doppler provider', () => {
  beforeEach(() => {
    vi.stubEnv('DOPPLER_TOKEN', '');
    vi.stubEnv('DOPPLER_PROJECT', '');
    vi.stubEnv('DOPPLER_CONFIG', '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('runs doppler secrets get --plain and strips the trailing newline', async () => {
    const run = runner({ stdout: 'test-value\n' });
    const value = await doppler(run).resolve({ provider: 'doppler', key: 'STRIPE_KEY' });
    expect(run).toHaveBeenCalledWith('doppler', ['secrets', 'get', 'STRIPE_KEY', '--plain'], {
      env: ENV,
      signal: undefined,
    });
    expect(value.value).toBe('test-value');
    expect(value.metadata).toEqual({ name: 'STRIPE_KEY', provider: 'doppler' });
  });

  it('reads missing settings from the environment', async () => {
    vi.stubEnv('DOPPLER_TOKEN', 'test-token');
    vi.stubEnv('DOPPLER_PROJECT', 'api');
    vi.stubEnv('DOPPLER_CONFIG', 'dev');
    const run = runner({ stdout: 'x' });
    await doppler(run, {}).resolve({ provider: 'doppler', key: 'A' });
    expect(run).toHaveBeenCalledWith('doppler', ['secrets', 'get', 'A', '--plain'], { env: ENV, signal: undefined });
  });

  it('requires token, project and config', () => {
    expect(() => doppler(runner({}), { project: 'api', config: 'dev' })).toThrow(ConfigError);
    expect(() => doppler(runner({}), { project: 'api', config: 'dev' })).toThrow(
      'doppler provider "doppler" requires "token"'
    );
  });

  it('classifies Doppler failures', async () => {
    await expect(
      doppler(runner({ exitCode: 1, stderr: 'Doppler Error: Could not find requested secret: NOPE' })).resolve({
        provider: 'doppler',
        key: 'NOPE',
      })
    ).rejects.toBeInstanceOf(NotFoundError);
    await expect(
      doppler(runner({ exitCode: 1, stderr: 'Doppler Error: Invalid Service token' })).resolve({
        provider: 'doppler',
        key: 'A',
      })
    ).rejects.toBeInstanceOf(AuthError);
  });

  it('describes a secret with its project and config', async () => {
    const meta = await doppler(runner({ stdout: 'test-value\n' })).describe({ provider: 'doppler', key: 'A' });
    expect(meta).toEqual({
      exists: true,
      size: 10,
      type: 'secret',
      tags: { project: 'api', config: 'dev' },
    });
  });

  it('validates by listing secrets', async () => {
    const run = runner({ stdout: '{"A":{"computed":"x"}}' });
    await doppler(run).validate();
    expect(run).toHaveBeenCalledWith('doppler', ['secrets', '--json'], { env: ENV, signal: undefined });
  });
});
