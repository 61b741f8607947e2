/**
 * patternbook-core
 *
 * Catalog of runnable design pattern demonstrations:
 * - Pattern identifiers and catalog queries
 * - run() / runWithRawInput() producing demonstration traces
 * - The demonstrations and their building blocks
 * - Logger, configuration and RunContext
 *
 * @module patternbook-core
 */

// ============================================================================
// Catalog
// ============================================================================

export * from './catalog/index.js';

// ============================================================================
// Runtime
// ============================================================================

export * from './runtime/index.js';

// ============================================================================
// Demonstrations
// ============================================================================

export * from './demonstrations/index.js';
