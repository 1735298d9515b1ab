/**
 * Domain flow: `domains/<name>/{classes,verbs}` plus a commands stub.
 */
import * as path from 'node:path';
import { fileExists, writeFileIfAbsent } from '../../utils/file-system.js';
import { ConflictError, ErrorCodes } from '../../utils/errors.js';
import { toPascalCase } from '../../utils/string.js';
import { assertSegment } from './naming.js';
import { domainDir, ensureDomainsRoot, ensurePackageDir, templateName } from './files.js';
import { success } from './outcome.js';
import type { GenerationContext, ScaffoldOutcome } from './types.js';

export const DOMAIN_COMMANDS_TEMPLATE = 'domain_commands_template';

/**
 * Register a domain. Only missing pieces are created; existing files are
 * never touched. A run that finds everything in place is a conflict.
 */
export async function registerDomain(ctx: GenerationContext, name: string): Promise<ScaffoldOutcome> {
  assertSegment(name, 'domain');
  const { target } = ctx;
  const created = await ensureDomainsRoot(ctx);

  const root = domainDir(ctx, name);
  created.push(...(await ensurePackageDir(ctx, root)));
  created.push(...(await ensurePackageDir(ctx, path.join(root, 'classes'))));
  created.push(...(await ensurePackageDir(ctx, path.join(root, 'verbs'))));

  const commandsFile = path.join(root, `commands${ctx.settings.extension}`);
  if (!(await fileExists(commandsFile))) {
    const content = await renderCommands(ctx, name);
    if (await writeFileIfAbsent(commandsFile, content)) {
      created.push(commandsFile);
    }
  }

  if (created.length === 0) {
    throw new ConflictError(
      ErrorCodes.ALREADY_EXISTS,
      `Domain '${name}' already exists in ${target.package}, nothing to create: ${root}`,
      { path: root }
    );
  }

  ctx.log.debug(`Registered domain ${name}`, { created });
  return success(`Registered domain '${name}' in ${target.package} -> ${root}`, {
    path: root,
    created,
  });
}

async function renderCommands(ctx: GenerationContext, name: string): Promise<string> {
  const bindings = {
    DOMAIN_NAME: name,
    DOMAIN_TYPE_NAME: toPascalCase(name),
    PACKAGE_NAME: ctx.target.package,
  };
  const templatePath = path.join(
    ctx.target.templates,
    templateName(`${DOMAIN_COMMANDS_TEMPLATE}${ctx.settings.extension}`)
  );

  if (await fileExists(templatePath)) {
    const { content } = await ctx.engine.renderFirst([templatePath], 'domain-commands', bindings);
    return content;
  }

  ctx.log.debug('No domain commands template, generating stub', { templatePath });
  return commandsStub(name);
}

/**
 * Minimal command group used when the target ships no commands template.
 */
export function commandsStub(name: string): string {
  const typeName = toPascalCase(name);
  return [
    '/**',
    ` * ${name} domain commands`,
    ' */',
    "import { Command } from 'commander';",
    '',
    `export function create${typeName}Command(): Command {`,
    `  return new Command('${name}').description('${name} management commands');`,
    '}',
    '',
    '// Domain commands will be added here as verbs are registered',
    '',
  ].join('\n');
}
