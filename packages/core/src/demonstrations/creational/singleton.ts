/**
 * Singleton
 *
 * The single shared configuration lives on the RunContext rather than in a
 * module-level global. Callers that reuse a context reuse the instance.
 */

import { z } from 'zod';
import { definePattern } from '../../catalog/define.js';
import type { DemoConfiguration } from '../../runtime/context.js';

export const MAX_ACCESSES = 1000;

export const singleton = definePattern({
  id: 'singleton',
  name: 'Singleton',
  category: 'creational',
  summary: 'Hands out one shared configuration instance per run context',
  inputHint: `number of accesses (integer from 1 to ${MAX_ACCESSES})`,
  input: z.number().int().min(1).max(MAX_ACCESSES),
  sampleInput: 2,
  trace(accesses, context) {
    const lines: string[] = [];
    const seen = new Set<DemoConfiguration>();

    for (let i = 0; i < accesses; i++) {
      const wasCreated = context.configuration.created;
      seen.add(context.configuration.access());
      lines.push(wasCreated ? 'Reusing existing configuration.' : 'Configuration created.');
    }

    lines.push(`All accesses share one instance: ${seen.size === 1}`);
    return lines;
  },
});
