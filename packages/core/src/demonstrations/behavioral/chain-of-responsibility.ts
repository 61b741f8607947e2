/**
 * Chain of Responsibility
 *
 * A request travels along Admin -> Moderator until a handler accepts it.
 * A request nobody accepts falls off the end of the chain silently.
 */

import { z } from 'zod';
import { definePattern } from '../../catalog/define.js';

export type HandlerRole = 'admin' | 'moderator';

export interface Handler {
  role: HandlerRole;
  label: string;
}

export const DEFAULT_CHAIN: readonly Handler[] = [
  { role: 'admin', label: 'Admin' },
  { role: 'moderator', label: 'Moderator' },
];

/**
 * Pass a request down the chain; returns the line printed by the handler
 * that accepted it, or null when no handler did.
 */
export function handleRequest(request: string, chain: readonly Handler[] = DEFAULT_CHAIN): string | null {
  for (const handler of chain) {
    if (handler.role === request) {
      return `Request handled by ${handler.label}.`;
    }
  }
  return null;
}

export const chainOfResponsibility = definePattern({
  id: 'chain_of_responsibility',
  name: 'Chain of Responsibility',
  category: 'behavioral',
  summary: 'Passes a request along a chain of handlers until one accepts it',
  inputHint: 'request string, e.g. "admin" or "moderator"',
  input: z.string(),
  sampleInput: 'admin',
  trace(request) {
    const line = handleRequest(request);
    return line === null ? [] : [line];
  },
});
