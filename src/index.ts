/**
 * mutant-gate - Main module exports
 * Public API surface for embedding the gate and report diff
 */

// Core types
export * from './core/types.js'
// Core errors
export * from './core/errors.js'
// Utilities
export { createLogger, childLogger, setLogLevel, logger } from './utils/logger.js'

// Report data model
export * from './modules/mutation-report/index.js'

// Quality gate
export * from './modules/quality-gates/index.js'

// Report diff
export * from './modules/report-diff/index.js'

// Report providers and build history
export * from './modules/report-provider/index.js'
export * from './modules/build-history/index.js'
export * from './modules/build-evaluator/index.js'

// Configuration
export * from './modules/config/index.js'

// Persistence
export { DatabaseWrapper } from './persistence/database.js'
export { runMigrations, LATEST_SCHEMA_VERSION } from './persistence/migrations/index.js'
export type { Migration } from './persistence/migrations/index.js'
