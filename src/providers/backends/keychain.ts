/**
 * OS keychain (macOS Keychain, Secret Service on Linux).
 *
 * Reference: service/account. Both parts are trimmed and must be non-empty.
 */

import type { ProviderFactory, StructuredReference } from '../types';
import { BackendProvider, defineCapabilities, requireAdapter, type BackendDefinition } from '../backend-provider';
import type { ErrorClassifier } from '../classify';
import { MalformedReferenceError } from '../errors';
import { requireKey } from '../references';

export const KEYCHAIN_TYPE = 'keychain';

export interface KeychainReference extends StructuredReference {
  service: string;
  account: string;
}

export function parseKeychainReference(key: string): KeychainReference {
  requireKey(key);
  const slash = key.indexOf('/');
  const service = slash < 0 ? '' : key.slice(0, slash).trim();
  const account = slash < 0 ? '' : key.slice(slash + 1).trim();
  if (!service || !account) {
    throw new MalformedReferenceError(key, 'expected service/account');
  }
  return { name: `${service}/${account}`, service, account };
}

export const keychainClassifier: ErrorClassifier = {
  backend: 'Keychain',
  rules: [
    {
      kind: 'not-found',
      patterns: ['could not be found', 'errsecitemnotfound', 'item not found', 'no such secret'],
    },
    {
      kind: 'auth',
      patterns: ['user interaction is not allowed', 'keychain is locked', 'user canceled'],
      suggestion: 'Unlock the keychain, or run in a session that has keychain access',
    },
  ],
  fallbackSuggestion: 'Check that the keychain is available in this environment (headless sessions often have none)',
};

export const keychainCapabilities = defineCapabilities({
  supportsVersioning: false,
  supportsMetadata: false,
  supportsWatching: false,
  supportsBinary: false,
  requiresAuth: false,
  authMethods: ['os_keychain'],
});

export const keychainDefinition: BackendDefinition<KeychainReference> = {
  type: KEYCHAIN_TYPE,
  capabilities: keychainCapabilities,
  classifier: keychainClassifier,
  parse: parseKeychainReference,
  target: (ref) => ({ path: `${ref.service}/${ref.account}` }),
};

export const createKeychainProvider: ProviderFactory = (name, config, ctx) =>
  new BackendProvider(name, keychainDefinition, requireAdapter(ctx, KEYCHAIN_TYPE, name), config, {
    logger: ctx.logger,
    now: ctx.now,
  });
