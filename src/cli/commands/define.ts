/**
 * `fold define class|file <Name>`
 */
import { Command } from 'commander';
import { report, type CliContext } from '../context.js';

interface DefineClassCliOptions {
  domain?: string;
  version?: string;
  reverse?: boolean;
}

interface DefineFileCliOptions {
  domain?: string;
  code?: string;
}

export function createDefineCommand(context: CliContext): Command {
  const command = new Command('define').description('Define classes in a target package');

  command
    .command('class')
    .description('Create a registry-backed class directory (module + registry document)')
    .argument('<name>', 'Class name, e.g. UserAccount')
    .option('-d, --domain <domain>', 'Place the class under domains/<domain>/classes')
    .option('-v, --version <version>', 'Version stamped on the class and its registry')
    .option('-r, --reverse', 'Remove the class directory instead')
    .action(async (name: string, options: DefineClassCliOptions) => {
      report(
        await context.generator.defineClass(name, {
          target: context.target,
          domain: options.domain,
          version: options.version,
          reverse: options.reverse,
        })
      );
    });

  command
    .command('file')
    .description('Create a single class file')
    .argument('<name>', 'Class name')
    .option('-d, --domain <domain>', 'Place the file under domains/<domain>/classes')
    .option('-c, --code <code>', 'File content, written verbatim')
    .action(async (name: string, options: DefineFileCliOptions) => {
      report(
        await context.generator.defineClassFile(name, {
          target: context.target,
          domain: options.domain,
          content: options.code,
        })
      );
    });

  return command;
}
