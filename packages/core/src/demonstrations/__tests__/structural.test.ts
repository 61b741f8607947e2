/**
 * Structural Demonstration Tests
 */

import { describe, it, expect } from 'vitest';

import { run } from '../../catalog/index.js';
import {
  LegacyPrinter,
  LegacyPrinterAdapter,
  BridgedShape,
  RENDERERS,
  renderTree,
  treeDepth,
  MAX_TREE_DEPTH,
  type FileNode,
  Coffee,
  AddOnDecorator,
  formatCents,
  TreeTypeFactory,
  ImageProxy,
} from '../index.js';

function nestedTree(levels: number): FileNode {
  let node: FileNode = { name: 'leaf' };
  for (let level = 1; level < levels; level++) {
    node = { name: `dir${level}`, children: [node] };
  }
  return node;
}

// ============================================================================
// Adapter
// ============================================================================

describe('adapter', () => {
  it('should print the sample trace', () => {
    expect(run('adapter')).toEqual(['Legacy printer: Hello, Adapter!']);
  });

  it('should delegate to the legacy printer', () => {
    expect(new LegacyPrinterAdapter(new LegacyPrinter()).print('x')).toBe('Legacy printer: x');
  });
});

// ============================================================================
// Bridge
// ============================================================================

describe('bridge', () => {
  it('should print the sample trace', () => {
    expect(run('bridge')).toEqual(['Drawing circle as vector shapes.']);
  });

  it('should combine any shape with any renderer', () => {
    expect(run('bridge', { shape: 'square', renderer: 'raster' })).toEqual(['Drawing square as pixels.']);
    expect(new BridgedShape('square', RENDERERS.vector).draw()).toBe('Drawing square as vector shapes.');
  });
});

// ============================================================================
// Composite
// ============================================================================

describe('composite', () => {
  it('should print the sample trace', () => {
    expect(run('composite')).toEqual(['root/', '  docs/', '    readme.md', '  index.ts']);
  });

  it('should treat an empty children list as a directory', () => {
    expect(renderTree({ name: 'empty', children: [] })).toEqual(['empty/']);
    expect(renderTree({ name: 'file.txt' })).toEqual(['file.txt']);
  });

  it('should validate nested nodes', () => {
    expect(() => run('composite', { name: 'root', children: [{ name: '' }] })).toThrow(
      'Invalid input for pattern composite: children.0.name: String must contain at least 1 character(s)'
    );
  });

  it('should count tree levels', () => {
    expect(treeDepth({ name: 'file.txt' })).toBe(1);
    expect(treeDepth({ name: 'root', children: [{ name: 'a' }, { name: 'b', children: [{ name: 'c' }] }] })).toBe(3);
    expect(treeDepth(nestedTree(100), 10)).toBe(11);
  });

  it('should render trees up to the depth limit', () => {
    const lines = run('composite', nestedTree(MAX_TREE_DEPTH));

    expect(lines).toHaveLength(MAX_TREE_DEPTH);
    expect(lines[MAX_TREE_DEPTH - 1]).toBe(`${'  '.repeat(MAX_TREE_DEPTH - 1)}leaf`);
  });

  it('should reject trees deeper than the limit as invalid input', () => {
    expect(() => run('composite', nestedTree(MAX_TREE_DEPTH + 1))).toThrow(
      'Invalid input for pattern composite: Tree is deeper than 32 levels'
    );
    expect(() => run('composite', nestedTree(100_000))).toThrow(
      'Invalid input for pattern composite: Tree is deeper than 32 levels'
    );
  });
});

// ============================================================================
// Decorator
// ============================================================================

describe('decorator', () => {
  it('should print the sample trace', () => {
    expect(run('decorator')).toEqual(['Coffee, Milk, Sugar costs $2.70']);
  });

  it('should price plain coffee', () => {
    expect(run('decorator', [])).toEqual(['Coffee costs $2.00']);
  });

  it('should stack the same add-on more than once', () => {
    const beverage = new AddOnDecorator(new AddOnDecorator(new Coffee(), 'milk'), 'milk');

    expect(beverage.description()).toBe('Coffee, Milk, Milk');
    expect(beverage.costCents()).toBe(300);
  });

  it('should format cents', () => {
    expect(formatCents(5)).toBe('$0.05');
    expect(formatCents(340)).toBe('$3.40');
  });
});

// ============================================================================
// Facade
// ============================================================================

describe('facade', () => {
  it('should print the sample trace', () => {
    expect(run('facade')).toEqual([
      'Lights dimmed.',
      'Projector on.',
      'Sound system set to surround.',
      'Playing movie: Inception',
    ]);
  });
});

// ============================================================================
// Flyweight
// ============================================================================

describe('flyweight', () => {
  it('should print the sample trace', () => {
    expect(run('flyweight')).toEqual([
      'Drawing Oak tree at (1, 2).',
      'Drawing Pine tree at (5, 3).',
      'Drawing Oak tree at (7, 8).',
      'Shared tree types: 2',
    ]);
  });

  it('should return the same type object for the same name', () => {
    const factory = new TreeTypeFactory();

    expect(factory.get('Birch')).toBe(factory.get('Birch'));
    expect(factory.size).toBe(1);
  });
});

// ============================================================================
// Proxy
// ============================================================================

describe('proxy', () => {
  it('should print the sample trace', () => {
    expect(run('proxy')).toEqual(['Loading photo.png from disk.', 'Displaying photo.png.', 'Displaying photo.png.']);
  });

  it('should not load until the first display', () => {
    const image = new ImageProxy('a.jpg');

    expect(image.loaded).toBe(false);
    expect(image.display()).toEqual(['Loading a.jpg from disk.', 'Displaying a.jpg.']);
    expect(image.loaded).toBe(true);
    expect(image.display()).toEqual(['Displaying a.jpg.']);
  });
});
