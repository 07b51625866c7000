/**
 * 1Password, through the `op` CLI.
 *
 * Reference forms:
 *   op://vault/item[/field]
 *   item[.field]           (uses the configured default vault, if any)
 * The field defaults to "password".
 */

import { Type } from '@sinclair/typebox';
import type { CommandRunner } from '../../core/command';
import type { AdapterContext, BackendAdapter, ProviderFactory, RawItemMetadata, RawSecret, StructuredReference } from '../types';
import { BackendProvider, defineCapabilities, requireAdapter, type BackendDefinition } from '../backend-provider';
import type { ErrorClassifier } from '../classify';
import { MalformedReferenceError, UserError } from '../errors';
import { requireKey, requireNonEmpty, splitFieldSelector } from '../references';
import { readSettings } from '../settings';
import { isRecord, parseCliJson, runCli, stringField, stringSetting } from './cli';

export const ONEPASSWORD_TYPE = 'onepassword';
const DEFAULT_FIELD = 'password';
const URI_PREFIX = 'op://';

export interface OnePasswordReference extends StructuredReference {
  item: string;
  vault?: string;
  field: string;
}

export function parseOnePasswordReference(key: string): OnePasswordReference {
  requireKey(key);

  if (key.startsWith(URI_PREFIX)) {
    const parts = key.slice(URI_PREFIX.length).split('/');
    if (parts.length < 2 || parts.length > 3 || parts.some((part) => part.length === 0)) {
      throw new MalformedReferenceError(key, 'expected op://vault/item[/field]');
    }
    const [vault, item, field = DEFAULT_FIELD] = parts;
    return { name: item, item, vault, field };
  }

  const { rest, selector } = splitFieldSelector(key, '.');
  const item = requireNonEmpty(key, rest, 'item name');
  return { name: item, item, field: selector ?? DEFAULT_FIELD };
}

export const onePasswordClassifier: ErrorClassifier = {
  backend: '1Password',
  rules: [
    {
      kind: 'operational',
      patterns: ['command not found'],
      suggestion: 'Install 1Password CLI: https://developer.1password.com/docs/cli/get-started/',
    },
    {
      kind: 'auth',
      patterns: ['not signed in', 'not currently signed in', 'session expired', 'authentication required', 'unauthorized'],
      suggestion: "Run 'op signin' to authenticate with 1Password",
    },
    {
      kind: 'not-found',
      patterns: ["isn't an item", "isn't a vault", 'no item found', 'not found'],
    },
  ],
  fallbackSuggestion: "Verify the item exists. Use 'op item list' to see available items",
};

const OnePasswordSettings = Type.Object({
  account: Type.Optional(Type.String()),
  vault: Type.Optional(Type.String({ minLength: 1 })),
  service_account_token: Type.Optional(Type.String()),
});

// --- Field extraction ------------------------------------

interface OnePasswordField {
  id?: string;
  type?: string;
  purpose?: string;
  label?: string;
  value?: string;
}

function fieldsOf(item: Record<string, unknown>): OnePasswordField[] {
  const fields = item.fields;
  if (!Array.isArray(fields)) return [];
  return fields.filter(isRecord).map((field) => ({
    id: stringField(field, 'id'),
    type: stringField(field, 'type'),
    purpose: stringField(field, 'purpose'),
    label: stringField(field, 'label'),
    value: stringField(field, 'value'),
  }));
}

/**
 * Pick a field out of `op item get --format json` output. Labels and ids
 * match first; then the well-known names password, username, url, notes
 * and title.
 */
export function extractOnePasswordField(itemJson: string, field: string, itemName: string): string {
  let item: unknown;
  try {
    item = JSON.parse(itemJson);
  } catch (err) {
    throw new UserError(`1Password returned malformed data for item "${itemName}"`, {
      suggestion: 'Check the installed 1Password CLI version',
      cause: err,
    });
  }
  if (!isRecord(item)) {
    throw new UserError(`1Password returned malformed data for item "${itemName}"`, {
      suggestion: 'Check the installed 1Password CLI version',
    });
  }

  const fields = fieldsOf(item);
  const exact = fields.find((f) => f.label === field || f.id === field);
  if (exact?.value !== undefined) {
    return exact.value;
  }

  let found: string | undefined;
  switch (field.toLowerCase()) {
    case 'password':
      found = fields.find((f) => f.purpose === 'PASSWORD' || f.type === 'CONCEALED' || f.label?.toLowerCase() === 'password')?.value;
      break;
    case 'username':
      found = fields.find(
        (f) => f.purpose === 'USERNAME' || f.label?.toLowerCase() === 'username' || f.label?.toLowerCase() === 'email'
      )?.value;
      break;
    case 'url':
    case 'website': {
      const urls = Array.isArray(item.urls) ? item.urls.filter(isRecord) : [];
      const primary = urls.find((url) => url.primary === true) ?? urls[0];
      found = primary ? stringField(primary, 'href') : undefined;
      break;
    }
    case 'notes':
      found = fields.find((f) => f.purpose === 'NOTES')?.value ?? stringField(item, 'notes');
      break;
    case 'title':
    case 'name':
      found = stringField(item, 'title');
      break;
  }

  if (found === undefined) {
    throw new UserError(`Field "${field}" not found in 1Password item "${itemName}"`, {
      suggestion: `Run 'op item get "${itemName}"' to see the item's fields`,
    });
  }
  return found;
}

// --- CLI adapter -----------------------------------------

function splitItemPath(path: string): { item: string; vault?: string } {
  if (path.startsWith(URI_PREFIX)) {
    const [vault, ...item] = path.slice(URI_PREFIX.length).split('/');
    return { vault, item: item.join('/') };
  }
  return { item: path };
}

export class OnePasswordCliAdapter implements BackendAdapter {
  constructor(private readonly runner: CommandRunner) {}

  async getSecret(ctx: AdapterContext, _token: string | undefined, path: string): Promise<RawSecret> {
    const output = await this.itemGet(ctx, path);
    const item = parseCliJson(output, { operation: 'get', resource: path }, ctx.provider);
    const meta: ItemMetadata = isRecord(item) ? itemMetadata(item) : { tags: {} };
    return { value: output, version: meta.version, updatedAt: meta.updatedAt, metadata: meta.tags };
  }

  async describeItem(ctx: AdapterContext, _token: string | undefined, path: string): Promise<RawItemMetadata> {
    const output = await this.itemGet(ctx, path);
    const item = parseCliJson(output, { operation: 'describe', resource: path }, ctx.provider);
    return isRecord(item) ? itemMetadata(item) : {};
  }

  async listItems(ctx: AdapterContext, _token: string | undefined, path: string): Promise<string[]> {
    const args = path ? ['item', 'list', '--vault', path, '--format', 'json'] : ['vault', 'list', '--format', 'json'];
    const output = await runCli(this.runner, ctx, {
      command: 'op',
      args: [...args, ...this.accountArgs(ctx)],
      env: this.env(ctx),
      operation: 'list',
      resource: path || 'vaults',
    });
    const entries = parseCliJson(output, { operation: 'list', resource: path || 'vaults' }, ctx.provider);
    if (!Array.isArray(entries)) return [];
    return entries.filter(isRecord).map((entry) => stringField(entry, 'title') ?? stringField(entry, 'name') ?? '');
  }

  private itemGet(ctx: AdapterContext, path: string): Promise<string> {
    const { item, vault } = splitItemPath(path);
    return runCli(this.runner, ctx, {
      command: 'op',
      args: ['item', 'get', item, ...(vault ? ['--vault', vault] : []), '--format', 'json', ...this.accountArgs(ctx)],
      env: this.env(ctx),
      operation: 'get',
      resource: path,
    });
  }

  private accountArgs(ctx: AdapterContext): string[] {
    const account = stringSetting(ctx, 'account');
    return account ? ['--account', account] : [];
  }

  private env(ctx: AdapterContext): Record<string, string> | undefined {
    const token = stringSetting(ctx, 'service_account_token');
    return token ? { OP_SERVICE_ACCOUNT_TOKEN: token } : undefined;
  }
}

type ItemMetadata = RawItemMetadata & { tags: Record<string, string> };

function itemMetadata(item: Record<string, unknown>): ItemMetadata {
  const tags: Record<string, string> = {};
  const title = stringField(item, 'title');
  if (title) tags.title = title;
  if (isRecord(item.vault)) {
    const vault = stringField(item.vault, 'name');
    if (vault) tags.vault = vault;
  }
  const updated = stringField(item, 'updated_at');
  return {
    version: typeof item.version === 'number' ? String(item.version) : undefined,
    updatedAt: updated ? new Date(updated) : undefined,
    type: stringField(item, 'category'),
    tags,
  };
}

// --- Provider --------------------------------------------

export const onePasswordCapabilities = defineCapabilities({
  supportsVersioning: false,
  supportsMetadata: true,
  supportsWatching: false,
  supportsBinary: false,
  requiresAuth: true,
  authMethods: ['cli_session', 'service_account'],
});

export function onePasswordDefinition(defaultVault?: string): BackendDefinition<OnePasswordReference> {
  return {
    type: ONEPASSWORD_TYPE,
    capabilities: onePasswordCapabilities,
    classifier: onePasswordClassifier,
    parse: parseOnePasswordReference,
    target: (ref) => {
      const vault = ref.vault ?? defaultVault;
      return { path: vault ? `${URI_PREFIX}${vault}/${ref.item}` : ref.item };
    },
    select: (raw, ref) => extractOnePasswordField(raw.value, ref.field, ref.item),
    listPath: defaultVault,
  };
}

export const createOnePasswordProvider: ProviderFactory = (name, config, ctx) => {
  const settings = readSettings(OnePasswordSettings, config, { provider: name, type: ONEPASSWORD_TYPE });
  return new BackendProvider(name, onePasswordDefinition(settings.vault), requireAdapter(ctx, ONEPASSWORD_TYPE, name), config, {
    logger: ctx.logger,
    now: ctx.now,
  });
};
