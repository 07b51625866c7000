/**
 * Doppler, through the `doppler` CLI. The reference is the secret name.
 */

import { Type } from '@sinclair/typebox';
import type { CommandRunner } from '../../core/command';
import type { AdapterContext, BackendAdapter, ProviderFactory, RawItemMetadata, RawSecret, StructuredReference } from '../types';
import { BackendProvider, defineCapabilities, requireAdapter, type BackendDefinition } from '../backend-provider';
import type { ErrorClassifier } from '../classify';
import { requireKey } from '../references';
import { readSettings, settingOrEnv } from '../settings';
import { isRecord, parseCliJson, runCli, stringSetting } from './cli';

export const DOPPLER_TYPE = 'doppler';

export function parseDopplerReference(key: string): StructuredReference {
  return { name: requireKey(key).trim() };
}

export const dopplerClassifier: ErrorClassifier = {
  backend: 'Doppler',
  rules: [
    {
      kind: 'operational',
      patterns: ['command not found'],
      suggestion: 'Install the Doppler CLI: https://docs.doppler.com/docs/install-cli',
    },
    {
      kind: 'auth',
      patterns: ['invalid auth token', 'invalid service token', 'unauthorized', 'forbidden'],
      statusCodes: [401, 403],
      suggestion: 'Ensure your service token is valid and has access to the specified project/config',
    },
    {
      kind: 'not-found',
      patterns: ['could not find requested secret', 'not found'],
    },
  ],
  fallbackSuggestion: 'Check your network connection and Doppler service status',
};

const DopplerSettings = Type.Object({
  token: Type.String({ minLength: 1 }),
  project: Type.String({ minLength: 1 }),
  config: Type.String({ minLength: 1 }),
});

export class DopplerCliAdapter implements BackendAdapter {
  constructor(private readonly runner: CommandRunner) {}

  async getSecret(ctx: AdapterContext, _token: string | undefined, path: string): Promise<RawSecret> {
    const value = await this.plain(ctx, path, 'get');
    return { value, metadata: { name: path } };
  }

  async describeItem(ctx: AdapterContext, _token: string | undefined, path: string): Promise<RawItemMetadata> {
    const value = await this.plain(ctx, path, 'describe');
    return {
      size: value.length,
      type: 'secret',
      tags: {
        project: stringSetting(ctx, 'project') ?? '',
        config: stringSetting(ctx, 'config') ?? '',
      },
    };
  }

  async listItems(ctx: AdapterContext): Promise<string[]> {
    const output = await runCli(this.runner, ctx, {
      command: 'doppler',
      args: ['secrets', '--json'],
      env: this.env(ctx),
      operation: 'list',
      resource: 'secrets',
    });
    const secrets = parseCliJson(output, { operation: 'list', resource: 'secrets' }, ctx.provider);
    return isRecord(secrets) ? Object.keys(secrets) : [];
  }

  private async plain(ctx: AdapterContext, name: string, operation: string): Promise<string> {
    const output = await runCli(this.runner, ctx, {
      command: 'doppler',
      args: ['secrets', 'get', name, '--plain'],
      env: this.env(ctx),
      operation,
      resource: name,
    });
    return output.replace(/\r?\n$/, '');
  }

  private env(ctx: AdapterContext): Record<string, string> {
    const env: Record<string, string> = {};
    const token = stringSetting(ctx, 'token');
    const project = stringSetting(ctx, 'project');
    const config = stringSetting(ctx, 'config');
    if (token) env.DOPPLER_TOKEN = token;
    if (project) env.DOPPLER_PROJECT = project;
    if (config) env.DOPPLER_CONFIG = config;
    return env;
  }
}

export const dopplerCapabilities = defineCapabilities({
  supportsVersioning: false,
  supportsMetadata: true,
  supportsWatching: false,
  supportsBinary: false,
  requiresAuth: true,
  authMethods: ['service_token'],
});

export const dopplerDefinition: BackendDefinition<StructuredReference> = {
  type: DOPPLER_TYPE,
  capabilities: dopplerCapabilities,
  classifier: dopplerClassifier,
  parse: parseDopplerReference,
  target: (ref) => ({ path: ref.name }),
};

/**
 * token, project and config fall back to DOPPLER_TOKEN, DOPPLER_PROJECT
 * and DOPPLER_CONFIG; all three are required.
 */
export const createDopplerProvider: ProviderFactory = (name, config, ctx) => {
  const resolved = {
    ...config,
    token: settingOrEnv(config.token, 'DOPPLER_TOKEN'),
    project: settingOrEnv(config.project, 'DOPPLER_PROJECT'),
    config: settingOrEnv(config.config, 'DOPPLER_CONFIG'),
  };
  readSettings(DopplerSettings, resolved, {
    provider: name,
    type: DOPPLER_TYPE,
    hints: {
      token: 'Set "token" or the DOPPLER_TOKEN environment variable to a Doppler service token',
      project: 'Set "project" or the DOPPLER_PROJECT environment variable',
      config: 'Set "config" or the DOPPLER_CONFIG environment variable (e.g. dev, stg, prd)',
    },
  });
  return new BackendProvider(name, dopplerDefinition, requireAdapter(ctx, DOPPLER_TYPE, name), resolved, {
    logger: ctx.logger,
    now: ctx.now,
  });
};
