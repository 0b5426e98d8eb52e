/**
 * xsoar-packs - Main module exports
 * Public API surface for reconciling and deploying XSOAR content packs
 */

// Core errors
export * from './core/errors.js'

// Utilities
export { createLogger, childLogger, setLogLevel, logger } from './utils/logger.js'
export { maskSecrets, deepMask, MASKED_VALUE } from './cli/utils/masking.js'

// Version ordering
export * from './modules/version-ordering/index.js'

// Configuration
export * from './modules/config/index.js'

// Artifact providers
export * from './artifact-providers/index.js'

// Platform client
export * from './modules/platform-client/index.js'
