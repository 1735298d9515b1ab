/**
 * Bulk domain import: materializes a whole domain from the target's
 * `domains/<name>/` template tree.
 */
import * as path from 'node:path';
import {
  copyFileIfAbsent,
  directoryExists,
  globFiles,
  readFile,
  writeFileIfAbsent,
} from '../../utils/file-system.js';
import { TemplateError, ErrorCodes } from '../../utils/errors.js';
import { toPascalCase, toSnakeCase } from '../../utils/string.js';
import type { PlaceholderBindings } from '../templates/placeholders.js';
import { assertSegment, verbTypeName } from './naming.js';
import { TEMPLATE_SUFFIX, domainDir, ensurePackageDir } from './files.js';
import { success } from './outcome.js';
import type { GenerationContext, ScaffoldOutcome } from './types.js';

const SCHEMAS_DIR = 'schemas';

export interface DomainFilePlan {
  /** Path relative to the domain template directory */
  source: string;
  destination: string;
  /** Substitute placeholders and drop the template suffix */
  render: boolean;
}

/**
 * Work out where each template file lands. Files under a leading `schemas/`
 * segment are collected into `<root>/schemas/<name>/`.
 */
export function planDomainFiles(ctx: GenerationContext, name: string, files: readonly string[]): DomainFilePlan[] {
  const domainRoot = domainDir(ctx, name);
  const schemasRoot = path.join(ctx.target.root, SCHEMAS_DIR, name);

  return files.map((source) => {
    const render = source.endsWith(TEMPLATE_SUFFIX);
    const output = render ? source.slice(0, -TEMPLATE_SUFFIX.length) : source;
    const segments = output.split('/');
    const destination =
      segments[0] === SCHEMAS_DIR && segments.length > 1
        ? path.join(schemasRoot, path.basename(output))
        : path.join(domainRoot, ...segments);
    return { source, destination, render };
  });
}

/**
 * Bindings for one rendered file: the domain's, plus verb or class names
 * taken from the file's stem under `verbs/` or `classes/`.
 */
function bindingsFor(ctx: GenerationContext, name: string, plan: DomainFilePlan): PlaceholderBindings {
  const bindings: PlaceholderBindings = {
    DOMAIN_NAME: name,
    DOMAIN_TYPE_NAME: toPascalCase(name),
    PACKAGE_NAME: ctx.target.package,
  };
  const [section] = plan.source.split('/');
  const stem = path.basename(plan.destination, ctx.settings.extension);
  if (section === 'verbs') {
    bindings.VERB_NAME = stem;
    bindings.VERB_TYPE_NAME = verbTypeName(stem);
  } else if (section === 'classes') {
    bindings.CLASS_NAME = toPascalCase(stem);
    bindings.SNAKE_NAME = toSnakeCase(stem);
  }
  return bindings;
}

export async function buildDomain(ctx: GenerationContext, name: string): Promise<ScaffoldOutcome> {
  assertSegment(name, 'domain');
  const { target } = ctx;
  const templateDir = path.join(target.templates, 'domains', name);

  if (!(await directoryExists(templateDir))) {
    throw new TemplateError(
      ErrorCodes.TEMPLATE_NOT_FOUND,
      `Domain template directory not found: ${templateDir}`,
      { path: templateDir }
    );
  }

  const files = await globFiles('**/*', { cwd: templateDir, ignore: [] });
  const created: string[] = [];
  let skipped = 0;

  for (const plan of planDomainFiles(ctx, name, files)) {
    const source = path.join(templateDir, plan.source);
    const written = plan.render
      ? await writeFileIfAbsent(
          plan.destination,
          ctx.engine.substitute(await readFile(source), bindingsFor(ctx, name, plan))
        )
      : await copyFileIfAbsent(source, plan.destination);

    if (written) {
      created.push(plan.destination);
    } else {
      skipped++;
      ctx.log.debug('Skipping existing file', { path: plan.destination });
    }
  }

  const copied = created.length;
  const root = domainDir(ctx, name);
  for (const dir of [root, path.join(root, 'classes'), path.join(root, 'verbs')]) {
    if (await directoryExists(dir)) {
      created.push(...(await ensurePackageDir(ctx, dir)));
    }
  }

  const notes = skipped > 0 ? [`Skipped ${skipped} existing file${skipped === 1 ? '' : 's'}`] : [];
  return success(`Built domain '${name}' in ${target.package}: ${copied} files copied`, {
    path: root,
    created,
    notes,
  });
}
