/**
 * `fold targets`
 */
import { Command } from 'commander';
import chalk from 'chalk';
import type { CliContext } from '../context.js';

interface TargetsCliOptions {
  json?: boolean;
}

export function createTargetsCommand(context: CliContext): Command {
  return new Command('targets')
    .description('List the discovered targets')
    .option('--json', 'Output as JSON')
    .action((options: TargetsCliOptions) => {
      const { resolver } = context;
      const targets = resolver.targets();

      if (options.json) {
        console.log(JSON.stringify(targets, null, 2));
        return;
      }

      for (const target of targets) {
        const isDefault = target.key === resolver.defaultTarget;
        console.log(chalk.bold(`${target.key}${isDefault ? chalk.dim(' (default)') : ''}`));
        console.log(`  package:   ${target.package}`);
        console.log(`  root:      ${target.root}`);
        console.log(`  templates: ${target.templates}`);
        console.log(`  project:   ${target.projectRoot}`);
      }
    });
}
