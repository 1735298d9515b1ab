/**
 * Scaffold type definitions.
 */
import type { GenerationSettings } from '../config/schema.js';
import type { Target } from '../targets/types.js';
import type { TemplateEngine } from '../templates/engine.js';
import type { Clock } from '../registry/item.js';
import type { Logger } from '../../utils/logger.js';
import type { ErrorCode } from '../../utils/errors.js';

export type OutcomeStatus = 'success' | 'warning' | 'error';

/**
 * Tagged result of a generation flow. Nothing a flow throws escapes it;
 * failures arrive here with status `error`.
 */
export interface ScaffoldOutcome {
  status: OutcomeStatus;
  message: string;
  /** Main path the flow produced or inspected */
  path?: string;
  /** Files written by this invocation, in order */
  created: string[];
  /** Informational notes shown under the message */
  notes: string[];
  /** Error code for warnings and errors */
  code?: ErrorCode;
}

/**
 * Everything a flow needs for one invocation. Built fresh per call.
 */
export interface GenerationContext {
  target: Target;
  engine: TemplateEngine;
  settings: GenerationSettings;
  clock: Clock;
  log: Logger;
}

export interface TargetOption {
  /** Target name or alias; the default target when omitted */
  target?: string;
}

export interface RegisterVerbOptions extends TargetOption {
  /** Code to place in the body of the generated `execute` method */
  inline?: string;
}

export interface DefineClassOptions extends TargetOption {
  domain?: string;
  version?: string;
  /** Remove the class directory instead of creating it */
  reverse?: boolean;
}

export interface DefineClassFileOptions extends TargetOption {
  domain?: string;
  /** Written verbatim instead of a template */
  content?: string;
}
