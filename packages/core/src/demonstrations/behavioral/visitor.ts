/**
 * Visitor
 *
 * The shape set is closed, so the visitor is a single switch over the
 * tagged union instead of double dispatch.
 */

import { z } from 'zod';
import { definePattern } from '../../catalog/define.js';

const ShapeSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('circle'), radius: z.number().nonnegative().finite() }),
  z.object({
    kind: z.literal('rectangle'),
    width: z.number().nonnegative().finite(),
    height: z.number().nonnegative().finite(),
  }),
]);

export type Shape = z.infer<typeof ShapeSchema>;

export interface ShapeVisitor<T> {
  circle(shape: Extract<Shape, { kind: 'circle' }>): T;
  rectangle(shape: Extract<Shape, { kind: 'rectangle' }>): T;
}

export function visitShape<T>(shape: Shape, visitor: ShapeVisitor<T>): T {
  switch (shape.kind) {
    case 'circle':
      return visitor.circle(shape);
    case 'rectangle':
      return visitor.rectangle(shape);
  }
}

export const areaVisitor: ShapeVisitor<number> = {
  circle: ({ radius }) => Math.PI * radius * radius,
  rectangle: ({ width, height }) => width * height,
};

export const visitor = definePattern({
  id: 'visitor',
  name: 'Visitor',
  category: 'behavioral',
  summary: 'Computes areas over a fixed set of shape kinds',
  inputHint: 'list of shapes: { "kind": "circle", "radius": 5 } | { "kind": "rectangle", "width": 3, "height": 4 }',
  input: z.array(ShapeSchema),
  sampleInput: [
    { kind: 'circle', radius: 5 },
    { kind: 'rectangle', width: 3, height: 4 },
  ],
  trace(shapes) {
    return shapes.map((shape) => `Area of ${shape.kind}: ${visitShape(shape, areaVisitor).toFixed(2)}`);
  },
});
