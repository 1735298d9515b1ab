/**
 * Target resolution exports barrel file.
 */
export { TargetResolver } from './resolver.js';
export { discoverTargets, BUNDLED_TEMPLATES_DIR } from './discovery.js';
export { parseTargetSelector } from './selector.js';
export type {
  Target,
  AliasTable,
  DefaultTargetDefinition,
  TargetProbeDefinition,
  DiscoveryOptions,
  TargetSelection,
} from './types.js';
