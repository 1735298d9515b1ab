/**
 * Name validation and the deterministic names derived from them.
 */
import { NamingError, ErrorCodes } from '../../utils/errors.js';
import { toPascalCase, toSnakeCase } from '../../utils/string.js';

export interface VerbName {
  domain?: string;
  verb: string;
}

const UNSAFE_SEGMENT = /[/\\]|^\.\.?$/;
const CLASS_NAME = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

/**
 * A name that becomes a single path segment: non-empty, no separators.
 */
export function assertSegment(name: string, what: string): void {
  if (!name || name.trim() !== name || UNSAFE_SEGMENT.test(name)) {
    throw new NamingError(ErrorCodes.INVALID_NAME, `Invalid ${what} name: '${name}'`, { name });
  }
}

/**
 * Split `verb` or `domain.verb`. A dotted name must have exactly two
 * non-empty segments.
 */
export function parseVerbName(fullName: string): VerbName {
  if (!fullName.includes('.')) {
    assertSegment(fullName, 'verb');
    return { verb: fullName };
  }

  const parts = fullName.split('.');
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    throw new NamingError(
      ErrorCodes.INVALID_NAME,
      `Invalid domain.verb name: ${fullName}`,
      { name: fullName }
    );
  }
  const [domain, verb] = parts;
  assertSegment(domain, 'domain');
  assertSegment(verb, 'verb');
  return { domain, verb };
}

export function assertClassName(name: string): void {
  if (!CLASS_NAME.test(name)) {
    throw new NamingError(ErrorCodes.INVALID_NAME, `Invalid class name: '${name}'`, { name });
  }
}

/** `invoice` -> `InvoiceVerb` */
export function verbTypeName(verb: string): string {
  return `${toPascalCase(verb)}Verb`;
}

/**
 * File names produced for a registry-backed class.
 */
export function classArtifactNames(className: string, extension: string) {
  const snake = toSnakeCase(className);
  return {
    snake,
    directory: snake,
    module: `${snake}_class${extension}`,
    registry: `${snake}_registry.yml`,
  };
}
