/**
 * Demonstration Runner
 *
 * Resolves a pattern id against the catalog and produces its trace.
 * Nothing is emitted until the demonstration has completed, so a failed
 * lookup or rejected input never produces partial output.
 *
 * @module catalog/runner
 */

import { createRunContext, type RunContext } from '../runtime/context.js';
import { getDefaultCatalog, type IPatternCatalog } from './catalog.js';
import { UnknownPatternError } from './errors.js';
import type { PatternDemonstration } from './types.js';

export interface RunOptions {
  /** Context to run in; a fresh one is created per call when omitted */
  context?: RunContext | undefined;

  /** Called once per trace line, in order, after a successful run */
  onLine?: ((line: string) => void) | undefined;

  /** Catalog to resolve ids against (defaults to the shipped catalog) */
  catalog?: IPatternCatalog | undefined;
}

function resolveDemonstration(
  catalog: IPatternCatalog,
  patternId: string,
  context: RunContext
): PatternDemonstration {
  if (!catalog.has(patternId)) {
    context.logger.debug('Unknown pattern requested', { patternId });
    throw new UnknownPatternError(patternId, catalog.ids());
  }
  return catalog.get(patternId);
}

function execute(
  demonstration: PatternDemonstration,
  input: unknown,
  context: RunContext,
  onLine: RunOptions['onLine']
): string[] {
  const usedSample = input === undefined;
  const lines = demonstration.execute(usedSample ? demonstration.sampleInput : input, context);

  context.logger.debug('Demonstration complete', {
    patternId: demonstration.id,
    lines: lines.length,
    usedSample,
  });

  if (onLine) {
    for (const line of lines) {
      onLine(line);
    }
  }
  return lines;
}

/**
 * Run a demonstration and return its trace.
 *
 * An undefined input selects the demonstration's sample input.
 *
 * @throws UnknownPatternError for ids outside the catalog
 * @throws InvalidPatternInputError when the input fails validation
 */
export function run(patternId: string, input?: unknown, options: RunOptions = {}): string[] {
  const context = options.context ?? createRunContext();
  const demonstration = resolveDemonstration(options.catalog ?? getDefaultCatalog(), patternId, context);
  return execute(demonstration, input, context, options.onLine);
}

type JsonParseResult = { ok: true; value: unknown } | { ok: false };

function tryParseJson(raw: string): JsonParseResult {
  try {
    const value: unknown = JSON.parse(raw);
    return { ok: true, value };
  } catch (error) {
    if (error instanceof SyntaxError) {
      return { ok: false };
    }
    throw error;
  }
}

/**
 * Interpret a raw command-line string for a demonstration.
 *
 * JSON is preferred when the parsed value is accepted, then the string
 * itself. When neither is accepted the JSON value (or, for text that is
 * not JSON, the string) is returned so that validation reports against it.
 */
export function parseRawInput(demonstration: PatternDemonstration, raw: string | undefined): unknown {
  if (raw === undefined) {
    return undefined;
  }

  const json = tryParseJson(raw);
  if (!json.ok) {
    return raw;
  }
  if (demonstration.validate(json.value).length === 0) {
    return json.value;
  }
  if (demonstration.validate(raw).length === 0) {
    return raw;
  }
  return json.value;
}

/**
 * Run a demonstration from a raw string input, as typed on a command line.
 */
export function runWithRawInput(patternId: string, raw?: string, options: RunOptions = {}): string[] {
  const context = options.context ?? createRunContext();
  const demonstration = resolveDemonstration(options.catalog ?? getDefaultCatalog(), patternId, context);
  return execute(demonstration, parseRawInput(demonstration, raw), context, options.onLine);
}
