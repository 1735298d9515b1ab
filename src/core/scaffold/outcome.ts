import { ConflictError, ErrorCodes, toFoldError } from '../../utils/errors.js';
import type { OutcomeStatus, ScaffoldOutcome } from './types.js';

/** Fixed prefixes callers use to tell outcomes apart. */
export const OUTCOME_MARKERS: Record<OutcomeStatus, string> = {
  success: '✅',
  warning: '⚠️ ',
  error: '❌',
};

interface OutcomeDetails {
  path?: string;
  created?: string[];
  notes?: string[];
}

export function success(message: string, details: OutcomeDetails = {}): ScaffoldOutcome {
  return {
    status: 'success',
    message,
    path: details.path,
    created: details.created ?? [],
    notes: details.notes ?? [],
  };
}

export function warning(message: string, details: OutcomeDetails = {}): ScaffoldOutcome {
  return {
    status: 'warning',
    message,
    path: details.path,
    created: details.created ?? [],
    notes: details.notes ?? [],
    code: ErrorCodes.ALREADY_EXISTS,
  };
}

/**
 * Convert anything thrown by a flow into an outcome. Conflicts are
 * non-fatal and become warnings.
 */
export function failure(error: unknown): ScaffoldOutcome {
  const err = toFoldError(error);
  const detailPath = err.details?.path;
  return {
    status: err instanceof ConflictError ? 'warning' : 'error',
    message: err.message,
    path: typeof detailPath === 'string' ? detailPath : undefined,
    created: [],
    notes: [],
    code: err.code,
  };
}

export function formatOutcome(outcome: ScaffoldOutcome): string {
  return `${OUTCOME_MARKERS[outcome.status]} ${outcome.message}`;
}

/**
 * Success and warning exit 0; anything else exits 1.
 */
export function exitCodeFor(outcome: ScaffoldOutcome): number {
  return exitCodeForStatus(outcome.status);
}

export function exitCodeForStatus(status: OutcomeStatus): number {
  return status === 'error' ? 1 : 0;
}

/**
 * Recover the status of a line produced by `formatOutcome`.
 * Lines without a success or warning marker count as errors.
 */
export function statusFromMessage(line: string): OutcomeStatus {
  if (line.startsWith(OUTCOME_MARKERS.success)) return 'success';
  if (line.startsWith(OUTCOME_MARKERS.warning.trim())) return 'warning';
  return 'error';
}
