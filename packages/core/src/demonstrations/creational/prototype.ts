/**
 * Prototype
 *
 * clone() is deep: the copy shares no mutable state with its source.
 */

import { z } from 'zod';
import { definePattern } from '../../catalog/define.js';

export interface DocumentFields {
  title: string;
  tags: string[];
}

export class DocumentPrototype {
  constructor(public title: string, public tags: string[]) {}

  static from(fields: DocumentFields): DocumentPrototype {
    return new DocumentPrototype(fields.title, [...fields.tags]);
  }

  clone(): DocumentPrototype {
    const copy = structuredClone({ title: this.title, tags: this.tags });
    return new DocumentPrototype(copy.title, copy.tags);
  }

  describe(): string {
    return `${this.title} [${this.tags.join(', ')}]`;
  }
}

export const prototype = definePattern({
  id: 'prototype',
  name: 'Prototype',
  category: 'creational',
  summary: 'Copies an existing document instead of building a new one',
  inputHint: '{ "title": "...", "tags": ["..."] }',
  input: z.object({ title: z.string(), tags: z.array(z.string()) }),
  sampleInput: { title: 'Quarterly Report', tags: ['draft'] },
  trace(fields) {
    const original = DocumentPrototype.from(fields);
    const copy = original.clone();
    copy.title = `${copy.title} (copy)`;
    copy.tags.push('copy');
    return [`Original: ${original.describe()}`, `Clone: ${copy.describe()}`];
  },
});
