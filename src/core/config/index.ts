/**
 * Configuration exports barrel file.
 */
export { loadConfig, getDefaultConfig, mergeConfig, getConfigPath } from './loader.js';
export {
  ConfigSchema,
  TargetProbeSchema,
  GenerationSettingsSchema,
  PlaceholderModeSchema,
} from './schema.js';
export type { Config, TargetProbe, GenerationSettings, PlaceholderMode } from './schema.js';
