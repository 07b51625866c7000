/**
 * Unified GCP provider. Secret Manager is the only service today; the
 * router still accepts service prefixes so references stay stable as
 * services are added.
 */

import { Type } from '@sinclair/typebox';
import type { Provider, ProviderFactory } from '../types';
import { UnifiedProvider, type RouterDefinition } from '../unified';
import { mergeSettings, readSettings } from '../settings';
import { GCP_SECRET_MANAGER_TYPE, parseGcpVersion } from '../backends/gcp-secretmanager';

export const GCP_TYPE = 'gcp';

/** name:3 or name:latest, ignoring any #selector */
function hasVersionSuffix(key: string): boolean {
  const rest = key.split('#', 1)[0];
  const colon = rest.lastIndexOf(':');
  return colon > 0 && parseGcpVersion(rest.slice(colon + 1)) !== undefined;
}

export const gcpRouter: RouterDefinition = {
  type: GCP_TYPE,
  vendor: 'GCP',
  services: [{ name: 'secretmanager', aliases: ['secretmanager', 'sm', 'secrets'] }],
  rules: [
    {
      service: 'secretmanager',
      description: 'resource name',
      matches: (key) => key.startsWith('projects/') && key.includes('/secrets/'),
    },
    {
      service: 'secretmanager',
      description: 'version suffix',
      matches: hasVersionSuffix,
    },
    {
      service: 'secretmanager',
      description: 'version or JSON path',
      matches: (key) => key.includes('@') || key.includes('#'),
    },
  ],
  defaultService: 'secretmanager',
};

const GcpSettings = Type.Object({
  project_id: Type.Optional(Type.String({ minLength: 1 })),
  service_account_key_path: Type.Optional(Type.String({ minLength: 1 })),
  impersonate_service_account: Type.Optional(Type.String({ minLength: 1 })),
  location: Type.Optional(Type.String({ minLength: 1 })),
  default_service: Type.Optional(Type.String({ minLength: 1 })),
  secretmanager: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
});

export const createGcpProvider: ProviderFactory = (name, config, ctx) => {
  const settings = readSettings(GcpSettings, config, { provider: name, type: GCP_TYPE });
  const common = {
    project_id: settings.project_id,
    service_account_key_path: settings.service_account_key_path,
    impersonate_service_account: settings.impersonate_service_account,
    location: settings.location,
  };

  const services = new Map<string, Provider>([
    [
      'secretmanager',
      ctx.createProvider(`${name}-sm`, {
        type: GCP_SECRET_MANAGER_TYPE,
        config: mergeSettings(common, settings.secretmanager),
      }),
    ],
  ]);

  return new UnifiedProvider(name, gcpRouter, services, {
    defaultService: settings.default_service,
    logger: ctx.logger,
  });
};
