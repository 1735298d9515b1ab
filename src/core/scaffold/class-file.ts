/**
 * Single-file class flow.
 */
import * as path from 'node:path';
import { fileExists } from '../../utils/file-system.js';
import { ConflictError, ErrorCodes } from '../../utils/errors.js';
import { toSnakeCase } from '../../utils/string.js';
import { assertClassName, assertSegment } from './naming.js';
import { domainDir, ensureDomainSection, templateName, withTrailingNewline, writeNewFile } from './files.js';
import { success } from './outcome.js';
import type { DefineClassFileOptions, GenerationContext, ScaffoldOutcome } from './types.js';

export const GENERIC_CLASS_TEMPLATE = 'class_template';

export async function defineClassFile(
  ctx: GenerationContext,
  className: string,
  options: Pick<DefineClassFileOptions, 'domain' | 'content'> = {}
): Promise<ScaffoldOutcome> {
  assertClassName(className);
  const { domain } = options;
  if (domain !== undefined) {
    assertSegment(domain, 'domain');
  }

  const { target, settings } = ctx;
  const snake = toSnakeCase(className);
  const fileName = `${snake}${settings.extension}`;
  const dir = domain ? path.join(domainDir(ctx, domain), 'classes') : target.root;
  const classFile = path.join(dir, fileName);
  const exists = `Class '${className}' already exists, not overwriting: ${classFile}`;

  if (await fileExists(classFile)) {
    throw new ConflictError(ErrorCodes.ALREADY_EXISTS, exists, { path: classFile });
  }

  let content: string;
  if (options.content !== undefined) {
    content = withTrailingNewline(options.content);
  } else {
    const specific = domain
      ? path.join(target.templates, 'domains', domain, 'classes', templateName(fileName))
      : path.join(target.templates, 'classes', templateName(fileName));
    const rendered = await ctx.engine.renderFirst(
      [specific, path.join(target.templates, templateName(`${GENERIC_CLASS_TEMPLATE}${settings.extension}`))],
      'class',
      {
        CLASS_NAME: className,
        SNAKE_NAME: snake,
        DOMAIN_NAME: domain ?? '',
        PACKAGE_NAME: target.package,
      }
    );
    content = rendered.content;
  }

  const created = domain ? await ensureDomainSection(ctx, domain, 'classes') : [];
  await writeNewFile(classFile, content, exists);
  created.push(classFile);

  return success(`Defined class '${className}' in ${target.package} -> ${classFile}`, {
    path: classFile,
    created,
  });
}
