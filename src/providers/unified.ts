/**
 * Unified provider for vendors that offer several secret services.
 *
 * One reference string is routed to one sub-provider:
 *   1. an explicit "<alias>:" prefix for a configured service (stripped)
 *   2. the vendor's structural rules, in order
 *   3. the default service
 * A prefix that names no configured service is an error, never a silent
 * fall-through to the default.
 */

import type { CallOptions, Capabilities, Metadata, Provider, Reference, SecretValue } from './types';
import { createSecretValue } from './types';
import { ConfigError, UserError, errorMessage, isAbortError } from './errors';
import { silentLogger, type Logger } from '../core/logger';

export interface ServiceDefinition {
  /** Canonical service name, e.g. "secretsmanager" */
  name: string;
  /** Every prefix that selects this service, canonical name included */
  aliases: readonly string[];
}

export interface RoutingRule {
  service: string;
  description: string;
  /** `configured` tells whether a service has a live sub-provider */
  matches(key: string, configured: (service: string) => boolean): boolean;
}

export interface RouterDefinition {
  type: string;
  /** Vendor label used in messages, e.g. "AWS" */
  vendor: string;
  services: readonly ServiceDefinition[];
  rules: readonly RoutingRule[];
  defaultService: string;
}

export interface Route {
  service: string;
  provider: Provider;
  key: string;
}

const PREFIX_PATTERN = /^([A-Za-z][A-Za-z0-9_-]*):(?!\/\/)(.*)$/s;

export class UnifiedProvider implements Provider {
  readonly type: string;

  private readonly byAlias = new Map<string, string>();
  private readonly defaultService: string;
  private readonly caps: Capabilities;
  private readonly logger: Logger;

  /**
   * @param services canonical service name -> live sub-provider
   */
  constructor(
    readonly name: string,
    private readonly definition: RouterDefinition,
    private readonly services: ReadonlyMap<string, Provider>,
    options: { defaultService?: string; logger?: Logger } = {}
  ) {
    this.type = definition.type;
    this.logger = options.logger ?? silentLogger;

    for (const service of definition.services) {
      for (const alias of service.aliases) {
        this.byAlias.set(alias, service.name);
      }
    }

    const requested = options.defaultService ?? definition.defaultService;
    const canonical = this.byAlias.get(requested);
    if (!canonical) {
      throw new ConfigError(
        'default_service',
        `Unknown ${definition.vendor} service "${requested}" for default_service of provider "${name}"`,
        `Use one of: ${this.knownAliases().join(', ')}`,
        { provider: name, value: requested }
      );
    }
    this.defaultService = canonical;
    this.caps = unionCapabilities([...services.values()].map((provider) => provider.capabilities()));
  }

  /**
   * Pick the sub-provider for a key and strip any routing prefix.
   * @throws UserError when the key names a service that is not configured
   */
  route(key: string): Route {
    let unclaimedPrefix: string | undefined;

    const prefix = PREFIX_PATTERN.exec(key);
    if (prefix) {
      const [, alias, rest] = prefix;
      const service = this.byAlias.get(alias);
      if (service !== undefined) {
        return this.forward(service, rest, alias);
      }
      unclaimedPrefix = alias;
    }

    const configured = (service: string): boolean => this.services.has(service);
    for (const rule of this.definition.rules) {
      if (rule.matches(key, configured)) {
        this.logger.debug(`${this.name}: "${key}" routed to ${rule.service} (${rule.description})`);
        return this.forward(rule.service, key, rule.service);
      }
    }

    if (unclaimedPrefix !== undefined) {
      throw this.unknownService(unclaimedPrefix);
    }
    return this.forward(this.defaultService, key, this.defaultService);
  }

  async resolve(ref: Reference, options?: CallOptions): Promise<SecretValue> {
    const route = this.route(ref.key);
    const value = await route.provider.resolve({ provider: route.provider.name, key: route.key }, options);
    return createSecretValue({
      value: value.value,
      version: value.version,
      updatedAt: value.updatedAt,
      metadata: { ...value.metadata, provider: this.name, service: route.service },
    });
  }

  async describe(ref: Reference, options?: CallOptions): Promise<Metadata> {
    const route = this.route(ref.key);
    return route.provider.describe({ provider: route.provider.name, key: route.key }, options);
  }

  capabilities(): Capabilities {
    return this.caps;
  }

  /**
   * Validate every configured service and report all failures together.
   */
  async validate(options?: CallOptions): Promise<void> {
    const entries = [...this.services.entries()];
    const results = await Promise.allSettled(entries.map(([, provider]) => provider.validate(options)));

    const failures: string[] = [];
    let firstCause: unknown;
    for (const [i, result] of results.entries()) {
      if (result.status === 'fulfilled') continue;
      if (isAbortError(result.reason)) {
        throw result.reason;
      }
      failures.push(`${entries[i][0]}: ${errorMessage(result.reason)}`);
      firstCause ??= result.reason;
    }

    if (failures.length > 0) {
      throw new UserError(`One or more ${this.definition.vendor} services failed validation`, {
        suggestion: `Check ${this.definition.vendor} credentials and permissions for each service`,
        details: failures.join('\n'),
        provider: this.name,
        cause: firstCause,
      });
    }
  }

  /** Configured aliases, sorted */
  availableAliases(): string[] {
    const aliases: string[] = [];
    for (const [alias, service] of this.byAlias) {
      if (this.services.has(service)) aliases.push(alias);
    }
    return aliases.sort();
  }

  private knownAliases(): string[] {
    return [...this.byAlias.keys()].sort();
  }

  private forward(service: string, key: string, requestedAs: string): Route {
    const provider = this.services.get(service);
    if (!provider) {
      throw this.unknownService(requestedAs);
    }
    return { service, provider, key };
  }

  private unknownService(service: string): UserError {
    const available = this.availableAliases();
    return new UserError(
      `Unknown ${this.definition.vendor} service "${service}". Available services: ${available.join(', ')}`,
      {
        suggestion: `Prefix the reference with one of the available services, e.g. "${available[0] ?? this.defaultService}:<key>", or configure the "${service}" service`,
        provider: this.name,
      }
    );
  }
}

/**
 * A capability is offered when any sub-provider offers it.
 */
export function unionCapabilities(all: readonly Capabilities[]): Capabilities {
  const authMethods = new Set<string>();
  const union: Capabilities = {
    supportsVersioning: false,
    supportsMetadata: false,
    supportsWatching: false,
    supportsBinary: false,
    requiresAuth: false,
    authMethods: [],
  };
  for (const caps of all) {
    union.supportsVersioning ||= caps.supportsVersioning;
    union.supportsMetadata ||= caps.supportsMetadata;
    union.supportsWatching ||= caps.supportsWatching;
    union.supportsBinary ||= caps.supportsBinary;
    union.requiresAuth ||= caps.requiresAuth;
    caps.authMethods.forEach((method) => authMethods.add(method));
  }
  return Object.freeze({ ...union, authMethods: Object.freeze([...authMethods]) });
}
