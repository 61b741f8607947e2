/**
 * Flyweight
 *
 * Tree types are intrinsic and shared through the factory; coordinates
 * are extrinsic and supplied per draw call.
 */

import { z } from 'zod';
import { definePattern } from '../../catalog/define.js';

export interface TreeType {
  readonly name: string;
}

export class TreeTypeFactory {
  private readonly types = new Map<string, TreeType>();

  get(name: string): TreeType {
    let type = this.types.get(name);
    if (type === undefined) {
      type = { name };
      this.types.set(name, type);
    }
    return type;
  }

  get size(): number {
    return this.types.size;
  }
}

export function drawTree(type: TreeType, x: number, y: number): string {
  return `Drawing ${type.name} tree at (${x}, ${y}).`;
}

export const flyweight = definePattern({
  id: 'flyweight',
  name: 'Flyweight',
  category: 'structural',
  summary: 'Shares tree type data across many planted trees',
  inputHint: 'list of trees: { "type": "Oak", "x": 1, "y": 2 }',
  input: z.array(z.object({ type: z.string().min(1), x: z.number().int(), y: z.number().int() })),
  sampleInput: [
    { type: 'Oak', x: 1, y: 2 },
    { type: 'Pine', x: 5, y: 3 },
    { type: 'Oak', x: 7, y: 8 },
  ],
  trace(trees) {
    const factory = new TreeTypeFactory();
    const lines = trees.map((tree) => drawTree(factory.get(tree.type), tree.x, tree.y));
    lines.push(`Shared tree types: ${factory.size}`);
    return lines;
  },
});
