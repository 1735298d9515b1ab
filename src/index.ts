/**
 * foldsmith - scaffolding for domains, verbs and registry-backed classes.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Targets
export * from './core/targets/index.js';

// Templates
export * from './core/templates/index.js';

// Registry
export * from './core/registry/index.js';

// Generation flows
export * from './core/scaffold/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli, runCli } from './cli/index.js';
export type { CliContext } from './cli/context.js';
