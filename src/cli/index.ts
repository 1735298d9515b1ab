/**
 * fold command line.
 */
import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { loadConfig } from '../core/config/loader.js';
import { TargetResolver } from '../core/targets/resolver.js';
import { ScaffoldGenerator } from '../core/scaffold/generator.js';
import { failure } from '../core/scaffold/outcome.js';
import { logger } from '../utils/logger.js';
import { report, type CliContext } from './context.js';
import { createRegisterCommand } from './commands/register.js';
import { createDefineCommand } from './commands/define.js';
import { createBuildCommand } from './commands/build.js';
import { createTargetsCommand } from './commands/targets.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const VERSION = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'))).version;

interface GlobalOptions {
  verbose?: boolean;
  quiet?: boolean;
}

/** Create the CLI program. */
export function createCli(context: CliContext): Command {
  const program = new Command()
    .name('fold')
    .description('Scaffold domains, verbs and classes into target packages')
    .version(VERSION)
    // Program options are only read before the command name.
    .enablePositionalOptions()
    .option('--verbose', 'Show debug output')
    .option('-q, --quiet', 'Only print outcomes')
    .addHelpText(
      'after',
      '\nTarget selection (any position):\n  --target <name>  Generate into the named target or alias\n  --self           Generate into the default target'
    )
    .hook('preAction', () => {
      const options = program.opts<GlobalOptions>();
      if (options.verbose) {
        logger.setLevel('debug');
      } else if (options.quiet) {
        logger.setLevel('silent');
      }
    });

  [createRegisterCommand, createDefineCommand, createBuildCommand, createTargetsCommand].forEach((cmd) =>
    program.addCommand(cmd(context))
  );
  return program;
}

/**
 * Run fold with user arguments (no node/script prefix) against a repository.
 *
 * `--target` and `--self` are taken out before commander sees the rest.
 */
export async function runCli(args: readonly string[], repoRoot: string = process.cwd()): Promise<void> {
  let resolver: TargetResolver;
  let generator: ScaffoldGenerator;
  try {
    const config = await loadConfig(repoRoot);
    resolver = TargetResolver.fromConfig(repoRoot, config);
    generator = new ScaffoldGenerator(resolver, { settings: config.generation });
  } catch (error) {
    report(failure(error));
    return;
  }

  const selection = resolver.parseTargetSelector(args);
  const program = createCli({ resolver, generator, target: selection.target });
  await program.parseAsync(selection.remaining, { from: 'user' });
}
