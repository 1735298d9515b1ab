/**
 * Terminal rendering of scaffold outcomes.
 */
import chalk from 'chalk';
import { formatOutcome } from '../../core/scaffold/outcome.js';
import type { OutcomeStatus, ScaffoldOutcome } from '../../core/scaffold/types.js';

export interface OutcomeFormatOptions {
  colors?: boolean;
  /** List every created path under the message */
  verbose?: boolean;
}

const COLORS: Record<OutcomeStatus, (text: string) => string> = {
  success: chalk.green,
  warning: chalk.yellow,
  error: chalk.red,
};

/**
 * The marker line first, then notes (and created paths when verbose),
 * indented beneath it.
 */
export function formatOutcomeLines(outcome: ScaffoldOutcome, options: OutcomeFormatOptions = {}): string[] {
  const colors = options.colors ?? true;
  const head = formatOutcome(outcome);
  const lines = [colors ? COLORS[outcome.status](head) : head];

  for (const note of outcome.notes) {
    lines.push(`   ${colors ? chalk.dim(note) : note}`);
  }
  if (options.verbose) {
    for (const created of outcome.created) {
      lines.push(`   + ${created}`);
    }
  }
  return lines;
}

/**
 * Print an outcome. Errors go to stderr.
 */
export function printOutcome(outcome: ScaffoldOutcome, options: OutcomeFormatOptions = {}): void {
  const text = formatOutcomeLines(outcome, options).join('\n');
  if (outcome.status === 'error') {
    console.error(text);
  } else {
    console.log(text);
  }
}
