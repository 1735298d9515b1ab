/**
 * Template engine exports barrel file.
 */
export { TemplateEngine, substitute } from './engine.js';
export type { TemplateReference } from './engine.js';
export {
  PLACEHOLDERS,
  ALLOWED_PLACEHOLDERS,
  findUnknownPlaceholders,
  isPlaceholderName,
} from './placeholders.js';
export type { PlaceholderName, PlaceholderBindings, TemplateKind } from './placeholders.js';
