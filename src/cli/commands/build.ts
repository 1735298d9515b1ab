/**
 * `fold build domain <name>`
 */
import { Command } from 'commander';
import { report, type CliContext } from '../context.js';

export function createBuildCommand(context: CliContext): Command {
  const command = new Command('build').description('Materialize template trees into a target package');

  command
    .command('domain')
    .description('Copy templates/domains/<name> into the target, skipping existing files')
    .argument('<name>', 'Domain name')
    .action(async (name: string) => {
      report(await context.generator.buildDomain(name, { target: context.target }));
    });

  return command;
}
