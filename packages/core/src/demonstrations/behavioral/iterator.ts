/**
 * Iterator
 */

import { z } from 'zod';
import { definePattern } from '../../catalog/define.js';

export class BookCollection implements Iterable<string> {
  constructor(private readonly titles: readonly string[]) {}

  *[Symbol.iterator](): Iterator<string> {
    for (const title of this.titles) {
      yield title;
    }
  }
}

export const iterator = definePattern({
  id: 'iterator',
  name: 'Iterator',
  category: 'behavioral',
  summary: 'Walks a book collection without exposing its storage',
  inputHint: 'list of book titles',
  input: z.array(z.string()),
  sampleInput: ['Design Patterns', 'Refactoring', 'Clean Code'],
  trace(titles) {
    const lines: string[] = [];
    for (const title of new BookCollection(titles)) {
      lines.push(`Book: ${title}`);
    }
    return lines;
  },
});
