/**
 * Pattern Catalog
 *
 * Lookup and query layer over the registered demonstrations. Consumers
 * (runner, CLI, MCP tools) go through IPatternCatalog rather than the
 * demonstration modules.
 *
 * @module catalog/catalog
 */

import { ALL_DEMONSTRATIONS } from '../demonstrations/index.js';
import { PatternAlreadyRegisteredError, UnknownPatternError } from './errors.js';
import {
  PATTERN_CATEGORIES,
  PATTERN_IDS,
  type PatternCategory,
  type PatternDemonstration,
  type PatternId,
  type PatternSummary,
} from './types.js';

// ============================================================================
// Query Types
// ============================================================================

/**
 * Filter options for catalog queries
 */
export interface PatternFilter {
  /** Filter by pattern IDs */
  ids?: string[] | undefined;

  /** Filter by categories */
  categories?: PatternCategory[] | undefined;

  /** Case-insensitive search in id, name and summary */
  search?: string | undefined;
}

/**
 * Sort options for catalog queries
 */
export interface PatternSort {
  field: 'id' | 'name' | 'category';
  direction: 'asc' | 'desc';
}

export interface PatternQueryOptions {
  filter?: PatternFilter | undefined;
  sort?: PatternSort | undefined;
}

export interface PatternQueryResult {
  patterns: PatternSummary[];
  total: number;
}

export const DEFAULT_SORT: PatternSort = { field: 'category', direction: 'asc' };

// ============================================================================
// Catalog Interface
// ============================================================================

export interface IPatternCatalog {
  /** Whether the id names a registered demonstration */
  has(id: string): boolean;

  /**
   * @throws UnknownPatternError when the id is not registered
   */
  get(id: string): PatternDemonstration;

  /** Registered ids in catalog order */
  ids(): PatternId[];

  query(options?: PatternQueryOptions): PatternQueryResult;
}

// ============================================================================
// Helpers
// ============================================================================

const PATTERN_ID_SET: ReadonlySet<string> = new Set<string>(PATTERN_IDS);

export function isPatternId(value: string): value is PatternId {
  return PATTERN_ID_SET.has(value);
}

export function toPatternSummary(demonstration: PatternDemonstration): PatternSummary {
  return {
    id: demonstration.id,
    name: demonstration.name,
    category: demonstration.category,
    summary: demonstration.summary,
    inputHint: demonstration.inputHint,
    sampleInput: demonstration.sampleInput,
  };
}

function matchesFilter(demonstration: PatternDemonstration, filter: PatternFilter): boolean {
  if (filter.ids && !filter.ids.includes(demonstration.id)) {
    return false;
  }
  if (filter.categories && !filter.categories.includes(demonstration.category)) {
    return false;
  }
  if (filter.search) {
    const needle = filter.search.toLowerCase();
    const haystack = [demonstration.id, demonstration.name, demonstration.summary];
    if (!haystack.some((text) => text.toLowerCase().includes(needle))) {
      return false;
    }
  }
  return true;
}

function compareByField(a: PatternSummary, b: PatternSummary, field: PatternSort['field']): number {
  switch (field) {
    case 'id':
      return a.id.localeCompare(b.id);
    case 'name':
      return a.name.localeCompare(b.name);
    case 'category':
      return (
        PATTERN_CATEGORIES.indexOf(a.category) - PATTERN_CATEGORIES.indexOf(b.category) ||
        a.id.localeCompare(b.id)
      );
  }
}

function compareSummaries(a: PatternSummary, b: PatternSummary, sort: PatternSort): number {
  const result = compareByField(a, b, sort.field);
  return sort.direction === 'asc' ? result : -result;
}

// ============================================================================
// Implementation
// ============================================================================

export class PatternCatalog implements IPatternCatalog {
  private readonly demonstrations = new Map<string, PatternDemonstration>();

  constructor(demonstrations: readonly PatternDemonstration[] = []) {
    for (const demonstration of demonstrations) {
      this.register(demonstration);
    }
  }

  /**
   * @throws PatternAlreadyRegisteredError when the id is taken
   */
  register(demonstration: PatternDemonstration): void {
    if (this.demonstrations.has(demonstration.id)) {
      throw new PatternAlreadyRegisteredError(demonstration.id);
    }
    this.demonstrations.set(demonstration.id, demonstration);
  }

  has(id: string): boolean {
    return this.demonstrations.has(id);
  }

  get(id: string): PatternDemonstration {
    const demonstration = this.demonstrations.get(id);
    if (!demonstration) {
      throw new UnknownPatternError(id, this.ids());
    }
    return demonstration;
  }

  ids(): PatternId[] {
    return Array.from(this.demonstrations.values(), (demonstration) => demonstration.id);
  }

  query(options: PatternQueryOptions = {}): PatternQueryResult {
    const filter = options.filter ?? {};
    const sort = options.sort ?? DEFAULT_SORT;

    const patterns = Array.from(this.demonstrations.values())
      .filter((demonstration) => matchesFilter(demonstration, filter))
      .map(toPatternSummary)
      .sort((a, b) => compareSummaries(a, b, sort));

    return { patterns, total: patterns.length };
  }
}

/**
 * Catalog with every shipped demonstration registered.
 */
export function createPatternCatalog(): PatternCatalog {
  return new PatternCatalog(ALL_DEMONSTRATIONS);
}

const defaultCatalog = createPatternCatalog();

export function getDefaultCatalog(): IPatternCatalog {
  return defaultCatalog;
}

export function getPattern(id: string): PatternDemonstration {
  return defaultCatalog.get(id);
}

export function listPatterns(options?: PatternQueryOptions): PatternQueryResult {
  return defaultCatalog.query(options);
}
