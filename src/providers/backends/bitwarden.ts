/**
 * Bitwarden, through the `bw` CLI.
 *
 * Reference: item[.field], where item is an id or a name and field defaults
 * to "password". Fields: password, username, totp, notes, name, uri/uriN,
 * or the name of a custom field.
 */

import { Type } from '@sinclair/typebox';
import type { CommandRunner } from '../../core/command';
import type { AdapterContext, BackendAdapter, ProviderFactory, RawItemMetadata, RawSecret, StructuredReference } from '../types';
import { BackendProvider, defineCapabilities, requireAdapter, type BackendDefinition } from '../backend-provider';
import type { ErrorClassifier } from '../classify';
import { UserError } from '../errors';
import { requireKey, requireNonEmpty, splitFieldSelector } from '../references';
import { readSettings } from '../settings';
import { isRecord, parseCliJson, runCli, stringField, stringSetting } from './cli';

export const BITWARDEN_TYPE = 'bitwarden';
const DEFAULT_FIELD = 'password';

export interface BitwardenReference extends StructuredReference {
  item: string;
  field: string;
}

export function parseBitwardenReference(key: string): BitwardenReference {
  requireKey(key);
  const { rest, selector } = splitFieldSelector(key, '.');
  const item = requireNonEmpty(key, rest, 'item');
  return { name: item, item, field: selector ?? DEFAULT_FIELD };
}

export const bitwardenClassifier: ErrorClassifier = {
  backend: 'Bitwarden',
  rules: [
    {
      kind: 'operational',
      patterns: ['command not found'],
      suggestion: 'Install Bitwarden CLI: https://bitwarden.com/help/cli/',
    },
    {
      kind: 'auth',
      patterns: ['not logged in', 'you are not logged in'],
      suggestion: "Run 'bw login' to authenticate with Bitwarden",
    },
    {
      kind: 'auth',
      patterns: ['vault is locked', 'invalid session'],
      suggestion: "Run 'bw unlock' and set the session in the provider settings or BW_SESSION",
    },
    {
      kind: 'not-found',
      patterns: ['not found'],
    },
  ],
  fallbackSuggestion: "Verify the item name exists in Bitwarden. Use 'bw list items --search <name>' to search",
};

const BitwardenSettings = Type.Object({
  session: Type.Optional(Type.String()),
});

// --- Field extraction ------------------------------------

function missingField(field: string, item: string): UserError {
  return new UserError(`Field "${field}" not found in Bitwarden item "${item}"`, {
    suggestion: `Run 'bw get item "${item}"' to see the item's fields`,
  });
}

function nonEmpty(value: string | undefined): string | undefined {
  return value ? value : undefined;
}

/**
 * Pick a field out of `bw get item` output.
 */
export function extractBitwardenField(itemJson: string, field: string, itemName: string): string {
  let item: unknown;
  try {
    item = JSON.parse(itemJson);
  } catch (err) {
    throw new UserError(`Bitwarden returned malformed data for item "${itemName}"`, {
      suggestion: 'Check the installed Bitwarden CLI version',
      cause: err,
    });
  }
  if (!isRecord(item)) {
    throw missingField(field, itemName);
  }
  const login = isRecord(item.login) ? item.login : undefined;

  let found: string | undefined;
  switch (field) {
    case 'password':
    case 'username':
    case 'totp':
      found = login ? nonEmpty(stringField(login, field)) : undefined;
      break;
    case 'notes':
      found = nonEmpty(stringField(item, 'notes'));
      break;
    case 'name':
      found = stringField(item, 'name');
      break;
    default: {
      const custom = Array.isArray(item.fields)
        ? item.fields.filter(isRecord).find((entry) => stringField(entry, 'name') === field)
        : undefined;
      if (custom) {
        found = stringField(custom, 'value');
      } else if (/^uri\d*$/.test(field) && login) {
        const index = field.length > 3 ? Number(field.slice(3)) : 0;
        const uris = Array.isArray(login.uris) ? login.uris.filter(isRecord) : [];
        found = index < uris.length ? stringField(uris[index], 'uri') : undefined;
      }
    }
  }

  if (found === undefined) {
    throw missingField(field, itemName);
  }
  return found;
}

// --- CLI adapter -----------------------------------------

export class BitwardenCliAdapter implements BackendAdapter {
  constructor(private readonly runner: CommandRunner) {}

  async getSecret(ctx: AdapterContext, _token: string | undefined, path: string): Promise<RawSecret> {
    const output = await this.getItem(ctx, path);
    const item = parseCliJson(output, { operation: 'get', resource: path }, ctx.provider);
    const meta: RawItemMetadata = isRecord(item) ? itemMetadata(item) : {};
    return { value: output, updatedAt: meta.updatedAt, metadata: meta.tags };
  }

  async describeItem(ctx: AdapterContext, _token: string | undefined, path: string): Promise<RawItemMetadata> {
    const output = await this.getItem(ctx, path);
    const item = parseCliJson(output, { operation: 'describe', resource: path }, ctx.provider);
    return isRecord(item) ? itemMetadata(item) : {};
  }

  async listItems(ctx: AdapterContext, _token: string | undefined, path: string): Promise<string[]> {
    const args = path ? ['list', 'items', '--search', path] : ['list', 'folders'];
    const output = await runCli(this.runner, ctx, {
      command: 'bw',
      args,
      env: this.env(ctx),
      operation: 'list',
      resource: path || 'folders',
    });
    const entries = parseCliJson(output, { operation: 'list', resource: path || 'folders' }, ctx.provider);
    if (!Array.isArray(entries)) return [];
    return entries.filter(isRecord).map((entry) => stringField(entry, 'name') ?? '');
  }

  private getItem(ctx: AdapterContext, item: string): Promise<string> {
    return runCli(this.runner, ctx, {
      command: 'bw',
      args: ['get', 'item', item],
      env: this.env(ctx),
      operation: 'get',
      resource: item,
    });
  }

  /** Session is passed as BW_SESSION, never as an argument */
  private env(ctx: AdapterContext): Record<string, string> | undefined {
    const session = stringSetting(ctx, 'session') ?? process.env.BW_SESSION;
    return session ? { BW_SESSION: session } : undefined;
  }
}

function itemMetadata(item: Record<string, unknown>): RawItemMetadata {
  const tags: Record<string, string> = {};
  const id = stringField(item, 'id');
  if (id) tags.id = id;
  const name = stringField(item, 'name');
  if (name) tags.name = name;
  const revision = stringField(item, 'revisionDate');
  return {
    updatedAt: revision ? new Date(revision) : undefined,
    type: isRecord(item.login) ? 'login' : 'item',
    tags,
  };
}

// --- Provider --------------------------------------------

export const bitwardenCapabilities = defineCapabilities({
  supportsVersioning: false,
  supportsMetadata: true,
  supportsWatching: false,
  supportsBinary: false,
  requiresAuth: true,
  authMethods: ['cli_session'],
});

export const bitwardenDefinition: BackendDefinition<BitwardenReference> = {
  type: BITWARDEN_TYPE,
  capabilities: bitwardenCapabilities,
  classifier: bitwardenClassifier,
  parse: parseBitwardenReference,
  target: (ref) => ({ path: ref.item }),
  select: (raw, ref) => extractBitwardenField(raw.value, ref.field, ref.item),
};

export const createBitwardenProvider: ProviderFactory = (name, config, ctx) => {
  readSettings(BitwardenSettings, config, { provider: name, type: BITWARDEN_TYPE });
  return new BackendProvider(name, bitwardenDefinition, requireAdapter(ctx, BITWARDEN_TYPE, name), config, {
    logger: ctx.logger,
    now: ctx.now,
  });
};
