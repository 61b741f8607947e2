/**
 * Composite
 *
 * Files and directories share one node type; a node with a children array
 * (even an empty one) is a directory. Input trees are limited to
 * MAX_TREE_DEPTH levels, checked before the recursive schema runs.
 */

import { z } from 'zod';
import { definePattern } from '../../catalog/define.js';

export interface FileNode {
  name: string;
  children?: FileNode[] | undefined;
}

export const MAX_TREE_DEPTH = 32;

const FileNodeSchema: z.ZodType<FileNode> = z.lazy(() =>
  z.object({
    name: z.string().min(1),
    children: z.array(FileNodeSchema).optional(),
  })
);

/**
 * Number of levels in an unvalidated tree, walked level by level. Stops
 * counting once `limit` is exceeded.
 */
export function treeDepth(value: unknown, limit = MAX_TREE_DEPTH): number {
  let depth = 0;
  let level: unknown[] = [value];

  while (level.length > 0 && depth <= limit) {
    depth++;
    const next: unknown[] = [];
    for (const node of level) {
      if (typeof node === 'object' && node !== null && 'children' in node && Array.isArray(node.children)) {
        for (const child of node.children) {
          next.push(child);
        }
      }
    }
    level = next;
  }
  return depth;
}

const TreeInputSchema = z
  .unknown()
  .superRefine((value, ctx) => {
    if (treeDepth(value) > MAX_TREE_DEPTH) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Tree is deeper than ${MAX_TREE_DEPTH} levels`,
      });
    }
  })
  .pipe(FileNodeSchema);

const INDENT = '  ';

export function renderTree(node: FileNode, depth = 0): string[] {
  const prefix = INDENT.repeat(depth);
  if (node.children === undefined) {
    return [`${prefix}${node.name}`];
  }
  return [
    `${prefix}${node.name}/`,
    ...node.children.flatMap((child) => renderTree(child, depth + 1)),
  ];
}

export const composite = definePattern({
  id: 'composite',
  name: 'Composite',
  category: 'structural',
  summary: 'Treats files and directories uniformly as a tree',
  inputHint: '{ "name": "...", "children"?: [ ...nodes ] }',
  input: TreeInputSchema,
  sampleInput: {
    name: 'root',
    children: [{ name: 'docs', children: [{ name: 'readme.md' }] }, { name: 'index.ts' }],
  },
  trace(tree) {
    return renderTree(tree);
  },
});
