/**
 * Path rules and write helpers shared by the generation flows.
 */
import * as path from 'node:path';
import { directoryExists, ensureDir, writeFileIfAbsent } from '../../utils/file-system.js';
import { ConflictError, ErrorCodes } from '../../utils/errors.js';
import { toIdentifier } from '../../utils/string.js';
import type { GenerationContext } from './types.js';

/** Suffix that turns a generated file name into its template name. */
export const TEMPLATE_SUFFIX = '.tpl';

export function templateName(fileName: string): string {
  return `${fileName}${TEMPLATE_SUFFIX}`;
}

export function markerName(ctx: GenerationContext): string {
  return `index${ctx.settings.extension}`;
}

export function domainDir(ctx: GenerationContext, domain: string): string {
  return path.join(ctx.target.root, 'domains', domain);
}

/**
 * Create a directory and its package marker when missing.
 * Returns the paths this call created (the marker, if written).
 */
export async function ensurePackageDir(
  ctx: GenerationContext,
  dir: string,
  markerContent = ''
): Promise<string[]> {
  await ensureDir(dir);
  const marker = path.join(dir, markerName(ctx));
  if (await writeFileIfAbsent(marker, markerContent)) {
    ctx.log.debug('Created package marker', { path: marker });
    return [marker];
  }
  return [];
}

/**
 * Create `domains/` with its marker. The marker is only written together
 * with the directory; an existing unmarked `domains/` is left as it is.
 */
export async function ensureDomainsRoot(ctx: GenerationContext): Promise<string[]> {
  const domainsRoot = path.join(ctx.target.root, 'domains');
  if (await directoryExists(domainsRoot)) {
    return [];
  }
  return ensurePackageDir(ctx, domainsRoot, `// ${toIdentifier(ctx.target.package)} domains\n`);
}

/**
 * Create `domains/<domain>/<section>` with a marker at every level it adds.
 * Returns the markers written, outermost first.
 */
export async function ensureDomainSection(
  ctx: GenerationContext,
  domain: string,
  section: 'classes' | 'verbs'
): Promise<string[]> {
  const root = domainDir(ctx, domain);
  return [
    ...(await ensureDomainsRoot(ctx)),
    ...(await ensurePackageDir(ctx, root)),
    ...(await ensurePackageDir(ctx, path.join(root, section))),
  ];
}

/**
 * Write a new file. Throws a ConflictError when something got there first.
 */
export async function writeNewFile(
  filePath: string,
  content: string,
  conflictMessage: string
): Promise<void> {
  if (!(await writeFileIfAbsent(filePath, content))) {
    throw new ConflictError(ErrorCodes.ALREADY_EXISTS, conflictMessage, { path: filePath });
  }
}

export function withTrailingNewline(content: string): string {
  return content.endsWith('\n') ? content : `${content}\n`;
}
