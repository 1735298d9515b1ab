/**
 * Verb flow: one generated unit of command behavior per file.
 */
import * as path from 'node:path';
import { fileExists } from '../../utils/file-system.js';
import { ConflictError, ErrorCodes } from '../../utils/errors.js';
import { parseVerbName, verbTypeName, type VerbName } from './naming.js';
import { domainDir, ensureDomainSection, ensurePackageDir, templateName, writeNewFile } from './files.js';
import { injectExecuteBody } from './inline.js';
import { success } from './outcome.js';
import type { GenerationContext, ScaffoldOutcome } from './types.js';

export const GENERIC_VERB_TEMPLATE = 'verb_template';

/**
 * Template candidates for a verb, most specific first:
 * domain+verb, then top-level verb, then the generic verb template.
 */
export function verbTemplateCandidates(ctx: GenerationContext, name: VerbName): string[] {
  const ext = ctx.settings.extension;
  const templates = ctx.target.templates;
  const candidates: string[] = [];
  if (name.domain) {
    candidates.push(path.join(templates, 'domains', name.domain, 'verbs', templateName(`${name.verb}${ext}`)));
  }
  candidates.push(path.join(templates, 'verbs', templateName(`${name.verb}${ext}`)));
  candidates.push(path.join(templates, 'verbs', templateName(`${GENERIC_VERB_TEMPLATE}${ext}`)));
  return candidates;
}

export function verbDestination(ctx: GenerationContext, name: VerbName): string {
  const dir = name.domain
    ? path.join(domainDir(ctx, name.domain), 'verbs')
    : path.join(ctx.target.root, 'verbs');
  return path.join(dir, `${name.verb}${ctx.settings.extension}`);
}

export async function registerVerb(
  ctx: GenerationContext,
  fullName: string,
  inline?: string
): Promise<ScaffoldOutcome> {
  const name = parseVerbName(fullName);
  const label = name.domain ? `${name.domain}.${name.verb}` : name.verb;
  const { target } = ctx;
  const verbFile = verbDestination(ctx, name);

  const created = name.domain
    ? await ensureDomainSection(ctx, name.domain, 'verbs')
    : await ensurePackageDir(ctx, path.dirname(verbFile));

  const exists = `Verb '${label}' already exists, not overwriting: ${verbFile}`;
  if (await fileExists(verbFile)) {
    throw new ConflictError(ErrorCodes.ALREADY_EXISTS, exists, { path: verbFile });
  }

  const rendered = await ctx.engine.renderFirst(verbTemplateCandidates(ctx, name), 'verb', {
    VERB_NAME: name.verb,
    VERB_TYPE_NAME: verbTypeName(name.verb),
    DOMAIN_NAME: name.domain ?? '',
    PACKAGE_NAME: target.package,
  });

  let content = rendered.content;
  const notes: string[] = [];
  if (inline) {
    const injection = injectExecuteBody(content, inline);
    if (injection.injected) {
      content = injection.content;
      notes.push('Inline code placed in the body of execute');
    } else {
      notes.push(`Inline code ignored: template has no execute region (${rendered.template.path})`);
    }
  }

  await writeNewFile(verbFile, content, exists);
  created.push(verbFile);

  return success(`Registered verb '${label}' in ${target.package} -> ${verbFile}`, {
    path: verbFile,
    created,
    notes,
  });
}
