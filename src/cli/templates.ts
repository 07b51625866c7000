import templates from './provider-templates.json';

export interface ProviderTemplate {
  description: string;
  /** Example settings written by `init` */
  settings: Record<string, unknown>;
}

export const PROVIDER_TEMPLATES: Readonly<Record<string, ProviderTemplate>> = templates;

export function templateFor(type: string): ProviderTemplate | undefined {
  return Object.hasOwn(PROVIDER_TEMPLATES, type) ? PROVIDER_TEMPLATES[type] : undefined;
}
