/**
 * Memento
 */

import { z } from 'zod';
import { definePattern } from '../../catalog/define.js';

export interface EditorSnapshot {
  readonly content: string;
}

export class Editor {
  private content = '';

  get text(): string {
    return this.content;
  }

  write(text: string): void {
    this.content += text;
  }

  save(): EditorSnapshot {
    return { content: this.content };
  }

  restore(snapshot: EditorSnapshot): void {
    this.content = snapshot.content;
  }
}

const EditorOperation = z.discriminatedUnion('type', [
  z.object({ type: z.literal('write'), text: z.string() }),
  z.object({ type: z.literal('save') }),
  z.object({ type: z.literal('undo') }),
]);

export type EditorOperation = z.infer<typeof EditorOperation>;

export const memento = definePattern({
  id: 'memento',
  name: 'Memento',
  category: 'behavioral',
  summary: 'Saves and restores editor content without exposing its internals',
  inputHint: 'list of operations: { "type": "write", "text": "..." } | { "type": "save" } | { "type": "undo" }',
  input: z.array(EditorOperation),
  sampleInput: [
    { type: 'write', text: 'Hello' },
    { type: 'save' },
    { type: 'write', text: ' World' },
    { type: 'undo' },
  ],
  trace(operations) {
    const editor = new Editor();
    const history: EditorSnapshot[] = [];

    return operations.map((operation) => {
      switch (operation.type) {
        case 'write':
          editor.write(operation.text);
          return `Content: ${editor.text}`;
        case 'save':
          history.push(editor.save());
          return `Saved: ${editor.text}`;
        case 'undo': {
          const snapshot = history.pop();
          if (snapshot === undefined) {
            return 'Nothing to restore.';
          }
          editor.restore(snapshot);
          return `Restored: ${editor.text}`;
        }
      }
    });
  },
});
