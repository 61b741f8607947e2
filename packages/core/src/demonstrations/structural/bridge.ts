/**
 * Bridge
 *
 * Shapes (abstraction) and renderers (implementation) vary independently.
 */

import { z } from 'zod';
import { definePattern } from '../../catalog/define.js';

export type ShapeKind = 'circle' | 'square';

export type RendererKind = 'vector' | 'raster';

export interface Renderer {
  renderShape(shape: ShapeKind): string;
}

export const RENDERERS: Record<RendererKind, Renderer> = {
  vector: { renderShape: (shape) => `Drawing ${shape} as vector shapes.` },
  raster: { renderShape: (shape) => `Drawing ${shape} as pixels.` },
};

export class BridgedShape {
  constructor(
    private readonly kind: ShapeKind,
    private readonly renderer: Renderer
  ) {}

  draw(): string {
    return this.renderer.renderShape(this.kind);
  }
}

export const bridge = definePattern({
  id: 'bridge',
  name: 'Bridge',
  category: 'structural',
  summary: 'Separates what is drawn from how it is rendered',
  inputHint: '{ "shape": "circle" | "square", "renderer": "vector" | "raster" }',
  input: z.object({
    shape: z.enum(['circle', 'square']),
    renderer: z.enum(['vector', 'raster']),
  }),
  sampleInput: { shape: 'circle', renderer: 'vector' },
  trace({ shape, renderer }) {
    return [new BridgedShape(shape, RENDERERS[renderer]).draw()];
  },
});
