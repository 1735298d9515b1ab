/**
 * `fold register domain|verb|cli <name>`
 */
import { Command } from 'commander';
import { report, type CliContext } from '../context.js';

interface RegisterVerbCliOptions {
  code?: string;
}

export function createRegisterCommand(context: CliContext): Command {
  const command = new Command('register').description('Register a domain, verb or CLI in a target package');

  command
    .command('domain')
    .description('Create domains/<name> with classes/, verbs/ and a commands module')
    .argument('<name>', 'Domain name')
    .action(async (name: string) => {
      report(await context.generator.registerDomain(name, { target: context.target }));
    });

  command
    .command('verb')
    .description('Generate a verb from the most specific matching template')
    .argument('<name>', 'Verb name, optionally qualified as domain.verb')
    .option('-c, --code <code>', 'Code placed in the body of execute')
    .action(async (name: string, options: RegisterVerbCliOptions) => {
      report(await context.generator.registerVerb(name, { target: context.target, inline: options.code }));
    });

  command
    .command('cli')
    .description('Write the target entry point from clis/<name>_cli_template')
    .argument('<name>', 'CLI template name')
    .action(async (name: string) => {
      report(await context.generator.registerCli(name, { target: context.target }));
    });

  return command;
}
