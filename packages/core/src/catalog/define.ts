/**
 * Demonstration Definition Helper
 *
 * @module catalog/define
 */

import type { ZodError } from 'zod';
import { InvalidPatternInputError } from './errors.js';
import type { PatternDefinition, PatternDemonstration } from './types.js';

/**
 * Render zod issues as "path: message" strings.
 */
export function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

/**
 * Wrap a typed definition into a catalog demonstration.
 */
export function definePattern<TInput>(definition: PatternDefinition<TInput>): PatternDemonstration {
  const { input: schema, trace, ...summary } = definition;

  return {
    ...summary,
    validate(input) {
      const parsed = schema.safeParse(input);
      return parsed.success ? [] : formatIssues(parsed.error);
    },
    execute(input, context) {
      const parsed = schema.safeParse(input);
      if (!parsed.success) {
        throw new InvalidPatternInputError(definition.id, formatIssues(parsed.error));
      }
      return trace(parsed.data, context);
    },
  };
}
