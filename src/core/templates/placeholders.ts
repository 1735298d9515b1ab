/**
 * Placeholder vocabulary for template kinds.
 */

/** Every token a template may contain. */
export const PLACEHOLDERS = {
  CLASS_NAME: '{CLASS_NAME}',
  SNAKE_NAME: '{SNAKE_NAME}',
  VERB_NAME: '{VERB_NAME}',
  /** PascalCase verb name + `Verb`, e.g. `InvoiceVerb` */
  VERB_TYPE_NAME: '{VERB_TYPE_NAME}',
  DOMAIN_NAME: '{DOMAIN_NAME}',
  DOMAIN_TYPE_NAME: '{DOMAIN_TYPE_NAME}',
  PACKAGE_NAME: '{PACKAGE_NAME}',
  CLI_NAME: '{CLI_NAME}',
  VERSION: '{VERSION}',
  CREATED_AT: '{CREATED_AT}',
  REGISTRY_TYPE: '{REGISTRY_TYPE}',
} as const;

export type PlaceholderName = keyof typeof PLACEHOLDERS;

export type TemplateKind = 'verb' | 'domain-commands' | 'class' | 'class-module' | 'cli';

/** Tokens each kind of template is allowed to use. */
export const ALLOWED_PLACEHOLDERS: Record<TemplateKind, readonly PlaceholderName[]> = {
  verb: ['VERB_NAME', 'VERB_TYPE_NAME', 'DOMAIN_NAME', 'PACKAGE_NAME'],
  'domain-commands': ['DOMAIN_NAME', 'DOMAIN_TYPE_NAME', 'PACKAGE_NAME'],
  class: ['CLASS_NAME', 'SNAKE_NAME', 'DOMAIN_NAME', 'PACKAGE_NAME'],
  'class-module': ['CLASS_NAME', 'SNAKE_NAME', 'VERSION', 'CREATED_AT', 'REGISTRY_TYPE', 'PACKAGE_NAME'],
  cli: ['CLI_NAME', 'PACKAGE_NAME'],
};

/** Values bound to placeholders for one substitution. */
export type PlaceholderBindings = Partial<Record<PlaceholderName, string>>;

const TOKEN_PATTERN = /\{([A-Z][A-Z0-9_]*)\}/g;

export function isPlaceholderName(name: string): name is PlaceholderName {
  return Object.prototype.hasOwnProperty.call(PLACEHOLDERS, name);
}

/**
 * Find `{TOKEN}`-shaped text that the given template kind does not allow.
 * Returns each offending token once, in order of first appearance.
 */
export function findUnknownPlaceholders(text: string, kind: TemplateKind): string[] {
  const allowed = ALLOWED_PLACEHOLDERS[kind];
  const unknown: string[] = [];
  for (const match of text.matchAll(TOKEN_PATTERN)) {
    const name = match[1];
    const known = isPlaceholderName(name) && allowed.includes(name);
    if (!known && !unknown.includes(match[0])) {
      unknown.push(match[0]);
    }
  }
  return unknown;
}
