/**
 * layerkit library exports.
 */

// Configuration
export * from './core/config/index.js';

// Naming
export * from './core/naming/index.js';

// Rules
export * from './core/rules/index.js';

// Feature descriptors
export * from './core/features/index.js';

// Layout planning
export * from './core/planner/index.js';

// Source trees
export * from './core/tree/index.js';

// Validation
export * from './core/validation/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
