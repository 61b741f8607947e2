/**
 * Pattern Catalog
 *
 * @module catalog
 */

export type {
  PatternId,
  PatternCategory,
  PatternSummary,
  PatternDefinition,
  PatternDemonstration,
} from './types.js';

export { PATTERN_IDS, PATTERN_CATEGORIES } from './types.js';

export { definePattern, formatIssues } from './define.js';

export type {
  IPatternCatalog,
  PatternFilter,
  PatternSort,
  PatternQueryOptions,
  PatternQueryResult,
} from './catalog.js';

export {
  PatternCatalog,
  createPatternCatalog,
  getDefaultCatalog,
  getPattern,
  listPatterns,
  isPatternId,
  toPatternSummary,
  DEFAULT_SORT,
} from './catalog.js';

export { UnknownPatternError, InvalidPatternInputError, PatternAlreadyRegisteredError } from './errors.js';

export { run, runWithRawInput, parseRawInput, type RunOptions } from './runner.js';
