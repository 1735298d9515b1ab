/**
 * Scaffold generator exports barrel file.
 */
export { ScaffoldGenerator, type ScaffoldGeneratorOptions } from './generator.js';
export {
  OUTCOME_MARKERS,
  success,
  warning,
  failure,
  formatOutcome,
  exitCodeFor,
  exitCodeForStatus,
  statusFromMessage,
} from './outcome.js';
export { parseVerbName, verbTypeName, classArtifactNames, type VerbName } from './naming.js';
export { injectExecuteBody, type InjectionResult } from './inline.js';
export { commandsStub } from './domain.js';
export type {
  OutcomeStatus,
  ScaffoldOutcome,
  GenerationContext,
  TargetOption,
  RegisterVerbOptions,
  DefineClassOptions,
  DefineClassFileOptions,
} from './types.js';
