/**
 * @errstack/core - Stackable errors with classification codes
 *
 * Errors are chains: each layer a failure passes through stacks a message
 * on top, and the code and URI of the layer below carry forward.
 *
 * Dependency direction: core → adapters
 */

// Classification codes
export * from './codes/index.js';
// Contract and base chain
export * from './contract.js';
export * from './stack-error.js';
// Result and its lifting
export * from './result.js';
export * from './result-stacks.js';
export * from './helpers.js';
// Wrapper generator
export * from './derive.js';
// Configuration and logging
export * from './schemas.js';
export * from './config.js';
export * from './logger.js';
// Message helpers
export * from './utils/fmt-loc.js';
