/**
 * State shared by the fold commands for one process.
 */
import { exitCodeFor } from '../core/scaffold/outcome.js';
import type { ScaffoldGenerator } from '../core/scaffold/generator.js';
import type { ScaffoldOutcome } from '../core/scaffold/types.js';
import type { TargetResolver } from '../core/targets/resolver.js';
import { logger } from '../utils/logger.js';
import { printOutcome } from './formatters/outcome.js';

export interface CliContext {
  resolver: TargetResolver;
  generator: ScaffoldGenerator;
  /** Target picked by `--target` / `--self`; the default target when unset */
  target?: string;
}

/**
 * Print an outcome and set the process exit code from it.
 */
export function report(outcome: ScaffoldOutcome): void {
  printOutcome(outcome, { verbose: logger.getLevel() === 'debug' });
  process.exitCode = exitCodeFor(outcome);
}
