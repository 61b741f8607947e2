/**
 * Catalog Types
 *
 * Single source of truth for pattern identifiers, categories and the
 * shape of a registered demonstration.
 *
 * @module catalog/types
 */

import type { z } from 'zod';
import type { RunContext } from '../runtime/context.js';

// ============================================================================
// Identifiers
// ============================================================================

export const PATTERN_CATEGORIES = ['behavioral', 'creational', 'structural'] as const;

export type PatternCategory = (typeof PATTERN_CATEGORIES)[number];

export const PATTERN_IDS = [
  // Behavioral
  'chain_of_responsibility',
  'command',
  'iterator',
  'mediator',
  'memento',
  'observer',
  'state',
  'strategy',
  'template_method',
  'visitor',
  // Creational
  'abstract_factory',
  'builder',
  'factory_method',
  'prototype',
  'singleton',
  // Structural
  'adapter',
  'bridge',
  'composite',
  'decorator',
  'facade',
  'flyweight',
  'proxy',
] as const;

export type PatternId = (typeof PATTERN_IDS)[number];

// ============================================================================
// Demonstrations
// ============================================================================

/**
 * Catalog-facing description of a demonstration
 */
export interface PatternSummary {
  id: PatternId;

  /** Display name, e.g. "Chain of Responsibility" */
  name: string;

  category: PatternCategory;

  /** One-line description of what the demonstration shows */
  summary: string;

  /** Human-readable description of the accepted input */
  inputHint: string;

  /** Input used when the caller supplies none */
  sampleInput: unknown;
}

/**
 * Authoring shape of a demonstration, typed over its validated input
 */
export interface PatternDefinition<TInput> {
  id: PatternId;
  name: string;
  category: PatternCategory;
  summary: string;
  inputHint: string;
  /** Schema that validates raw input; it alone fixes TInput */
  input: z.ZodType<TInput, z.ZodTypeDef, unknown>;
  sampleInput: NoInfer<TInput>;
  trace(input: NoInfer<TInput>, context: RunContext): string[];
}

/**
 * A registered demonstration with its input type erased
 */
export interface PatternDemonstration extends PatternSummary {
  /**
   * Validation issues for a candidate input; empty when the input is accepted.
   */
  validate(input: unknown): string[];

  /**
   * Validate the input and produce the demonstration trace.
   *
   * @throws InvalidPatternInputError when validation fails
   */
  execute(input: unknown, context: RunContext): string[];
}
