/**
 * Template lookup and placeholder substitution.
 */
import { fileExists, readFile } from '../../utils/file-system.js';
import { TemplateError, ErrorCodes } from '../../utils/errors.js';
import type { PlaceholderMode } from '../config/schema.js';
import { logger } from '../../utils/logger.js';
import {
  findUnknownPlaceholders,
  isPlaceholderName,
  type PlaceholderBindings,
  type PlaceholderName,
  type TemplateKind,
} from './placeholders.js';

const log = logger.child('templates');

/**
 * A template found on disk plus the precedence list used to find it.
 */
export interface TemplateReference {
  path: string;
  /** Candidate paths, most specific first */
  candidates: readonly string[];
}

/**
 * Substitute bound placeholders in template text.
 *
 * Every occurrence of each bound token is replaced in a single pass, so the
 * result does not depend on binding order and a bound value is never
 * re-scanned for tokens. Unbound and unknown tokens are left as they are.
 */
export function substitute(text: string, bindings: PlaceholderBindings): string {
  return text.replace(/\{([A-Z][A-Z0-9_]*)\}/g, (token: string, name: string) => {
    const value = lookupBinding(bindings, name);
    return value ?? token;
  });
}

function lookupBinding(bindings: PlaceholderBindings, name: string): string | undefined {
  return isPlaceholderName(name) ? bindings[name] : undefined;
}

export class TemplateEngine {
  constructor(private readonly placeholderMode: PlaceholderMode = 'strict') {}

  /**
   * Find the first existing template among `candidates` (most specific first).
   * @throws TemplateError naming the last path probed when none exists
   */
  async resolveTemplate(candidates: readonly string[]): Promise<TemplateReference> {
    for (const candidate of candidates) {
      if (await fileExists(candidate)) {
        return { path: candidate, candidates };
      }
    }
    const lastProbed = candidates[candidates.length - 1] ?? '<none>';
    throw new TemplateError(
      ErrorCodes.TEMPLATE_NOT_FOUND,
      `Template file not found: ${lastProbed}`,
      { path: lastProbed, candidates }
    );
  }

  /**
   * Return the contents of `specificPath` if present, else of `genericPath`.
   */
  async loadTemplate(specificPath: string, genericPath: string): Promise<string> {
    const reference = await this.resolveTemplate([specificPath, genericPath]);
    return readFile(reference.path);
  }

  substitute(text: string, bindings: PlaceholderBindings): string {
    return substitute(text, bindings);
  }

  /**
   * Check a template against the vocabulary of its kind, then substitute.
   *
   * In strict mode a template using a token outside its kind's vocabulary is
   * rejected; in lenient mode the token passes through and a warning is
   * logged.
   */
  render(text: string, kind: TemplateKind, bindings: PlaceholderBindings, source?: string): string {
    const unknown = findUnknownPlaceholders(text, kind);
    if (unknown.length > 0) {
      if (this.placeholderMode === 'strict') {
        throw new TemplateError(
          ErrorCodes.UNKNOWN_PLACEHOLDER,
          `Unknown placeholder${unknown.length > 1 ? 's' : ''} ${unknown.join(', ')} in ${kind} template${source ? `: ${source}` : ''}`,
          { kind, unknown, source }
        );
      }
      log.warn(`Leaving unknown placeholders in ${kind} template`, { unknown, source });
    }
    return substitute(text, bindings);
  }

  /**
   * Load the first existing candidate and render it.
   */
  async renderFirst(
    candidates: readonly string[],
    kind: TemplateKind,
    bindings: PlaceholderBindings
  ): Promise<{ content: string; template: TemplateReference }> {
    const template = await this.resolveTemplate(candidates);
    const text = await readFile(template.path);
    log.debug(`Using ${kind} template`, { path: template.path });
    return { content: this.render(text, kind, bindings, template.path), template };
  }
}

export type { PlaceholderBindings, PlaceholderName, TemplateKind };
