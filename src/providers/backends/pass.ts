/**
 * pass (the standard unix password manager), through the `pass` CLI.
 *
 * Reference: path/to/entry[#field]. The password is the entry's first line;
 * a field selects a "field: value" line from the rest.
 */

import { Type } from '@sinclair/typebox';
import type { CommandRunner } from '../../core/command';
import type { AdapterContext, BackendAdapter, ProviderFactory, RawItemMetadata, RawSecret, StructuredReference } from '../types';
import { BackendProvider, defineCapabilities, requireAdapter, type BackendDefinition } from '../backend-provider';
import type { ErrorClassifier } from '../classify';
import { UserError } from '../errors';
import { requireKey, requireNonEmpty, splitFieldSelector } from '../references';
import { readSettings } from '../settings';
import { runCli, stringSetting } from './cli';

export const PASS_TYPE = 'pass';

export interface PassReference extends StructuredReference {
  field?: string;
}

export function parsePassReference(key: string): PassReference {
  requireKey(key);
  const { rest, selector } = splitFieldSelector(key, '#');
  const path = requireNonEmpty(key, rest.replace(/^\/+/, ''), 'entry path');
  return { name: path, field: selector };
}

export const passClassifier: ErrorClassifier = {
  backend: 'pass',
  rules: [
    {
      kind: 'operational',
      patterns: ['command not found'],
      suggestion: 'Install pass: https://www.passwordstore.org/ (brew install pass, apt install pass, etc.)',
    },
    {
      kind: 'not-found',
      patterns: ['is not in the password store'],
    },
    {
      kind: 'operational',
      patterns: ['password store is empty', 'try "pass init"'],
      suggestion: "Initialize pass with 'pass init <gpg-key-id>'",
    },
    {
      kind: 'auth',
      patterns: ['decryption failed', 'no secret key', 'bad passphrase'],
      suggestion: 'Check your GPG key setup and that gpg-agent can unlock the key',
    },
  ],
  fallbackSuggestion: "Check the secret path with 'pass ls' or 'pass find <keyword>'",
};

const PassSettings = Type.Object({
  store_dir: Type.Optional(Type.String({ minLength: 1 })),
});

function entryLines(content: string): string[] {
  return content.replace(/\r\n/g, '\n').trim().split('\n');
}

/**
 * First line, or the value of a "field: value" line (field name matched
 * case-insensitively).
 */
export function extractPassField(content: string, field: string | undefined, path: string): string {
  const lines = entryLines(content);
  if (field === undefined || field === 'password') {
    return lines[0];
  }

  const wanted = field.toLowerCase();
  for (const line of lines.slice(1)) {
    const separator = line.indexOf(':');
    if (separator > 0 && line.slice(0, separator).trim().toLowerCase() === wanted) {
      return line.slice(separator + 1).trim();
    }
  }

  throw new UserError(`Field "${field}" not found in pass entry "${path}"`, {
    suggestion: `Add a "${field}: <value>" line to the entry with 'pass edit ${path}'`,
  });
}

function folderOf(path: string): string | undefined {
  const index = path.lastIndexOf('/');
  return index > 0 ? path.slice(0, index) : undefined;
}

export class PassCliAdapter implements BackendAdapter {
  constructor(private readonly runner: CommandRunner) {}

  async getSecret(ctx: AdapterContext, _token: string | undefined, path: string): Promise<RawSecret> {
    const content = await this.show(ctx, path, 'get');
    const folder = folderOf(path);
    return {
      value: content,
      metadata: { path, ...(folder ? { folder } : {}) },
    };
  }

  async describeItem(ctx: AdapterContext, _token: string | undefined, path: string): Promise<RawItemMetadata> {
    const content = await this.show(ctx, path, 'describe');
    const folder = folderOf(path);
    return {
      size: content.trim().length,
      type: entryLines(content).length > 1 ? 'password_with_metadata' : 'password',
      tags: { path, ...(folder ? { folder } : {}) },
    };
  }

  async listItems(ctx: AdapterContext, _token: string | undefined, path: string): Promise<string[]> {
    const output = await runCli(this.runner, ctx, {
      command: 'pass',
      args: path ? ['ls', path] : ['ls'],
      env: this.env(ctx),
      operation: 'list',
      resource: path || 'store',
    });
    return output
      .split('\n')
      .slice(1)
      .map((line) => line.replace(/^[\s│├└─|`-]+/, '').trim())
      .filter((line) => line.length > 0);
  }

  private show(ctx: AdapterContext, path: string, operation: string): Promise<string> {
    return runCli(this.runner, ctx, {
      command: 'pass',
      args: ['show', path],
      env: this.env(ctx),
      operation,
      resource: path,
    });
  }

  private env(ctx: AdapterContext): Record<string, string> | undefined {
    const storeDir = stringSetting(ctx, 'store_dir');
    return storeDir ? { PASSWORD_STORE_DIR: storeDir } : undefined;
  }
}

export const passCapabilities = defineCapabilities({
  supportsVersioning: false,
  supportsMetadata: true,
  supportsWatching: false,
  supportsBinary: false,
  requiresAuth: false,
  authMethods: ['gpg'],
});

export const passDefinition: BackendDefinition<PassReference> = {
  type: PASS_TYPE,
  capabilities: passCapabilities,
  classifier: passClassifier,
  parse: parsePassReference,
  target: (ref) => ({ path: ref.name }),
  select: (raw, ref) => extractPassField(raw.value, ref.field, ref.name),
};

export const createPassProvider: ProviderFactory = (name, config, ctx) => {
  readSettings(PassSettings, config, { provider: name, type: PASS_TYPE });
  return new BackendProvider(name, passDefinition, requireAdapter(ctx, PASS_TYPE, name), config, {
    logger: ctx.logger,
    now: ctx.now,
  });
};
