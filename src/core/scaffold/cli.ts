/**
 * CLI flow: writes the target's entry point from a named CLI template.
 */
import * as path from 'node:path';
import { fileExists } from '../../utils/file-system.js';
import { ConflictError, ErrorCodes } from '../../utils/errors.js';
import { assertSegment } from './naming.js';
import { templateName, writeNewFile } from './files.js';
import { success } from './outcome.js';
import type { GenerationContext, ScaffoldOutcome } from './types.js';

export function cliTemplatePath(ctx: GenerationContext, name: string): string {
  return path.join(
    ctx.target.templates,
    'clis',
    templateName(`${name}_cli_template${ctx.settings.extension}`)
  );
}

export async function registerCli(ctx: GenerationContext, name: string): Promise<ScaffoldOutcome> {
  assertSegment(name, 'cli');
  const { target } = ctx;
  const cliFile = path.join(target.root, `cli${ctx.settings.extension}`);
  const exists = `CLI already exists in ${target.package}, not overwriting: ${cliFile}`;

  if (await fileExists(cliFile)) {
    throw new ConflictError(ErrorCodes.ALREADY_EXISTS, exists, { path: cliFile });
  }

  const { content } = await ctx.engine.renderFirst([cliTemplatePath(ctx, name)], 'cli', {
    CLI_NAME: name,
    PACKAGE_NAME: target.package,
  });
  await writeNewFile(cliFile, content, exists);

  return success(`Registered CLI '${name}' in ${target.package} -> ${cliFile}`, {
    path: cliFile,
    created: [cliFile],
  });
}
