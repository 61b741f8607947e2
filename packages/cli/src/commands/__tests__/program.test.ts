/**
 * Program Wiring Tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';

import { createProgram, VERSION } from '../../program.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('createProgram', () => {
  it('should register the commands', () => {
    const program = createProgram();

    expect(program.name()).toBe('patternbook');
    expect(program.version()).toBe(VERSION);
    expect(program.commands.map((command) => command.name())).toEqual(['run', 'list', 'describe']);
  });

  it('should route run arguments to the demonstration', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    createProgram().parse(['run', 'facade', 'Up', '--no-color'], { from: 'user' });

    expect(log.mock.calls.map((call) => call[0])).toEqual([
      'Lights dimmed.',
      'Projector on.',
      'Sound system set to surround.',
      'Playing movie: Up',
    ]);
  });

  it('should build fresh commands for every program', () => {
    const [first] = createProgram().commands;
    const [second] = createProgram().commands;

    expect(first).toBeDefined();
    expect(first).not.toBe(second);
  });

  it('should not carry options from one program into the next', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    createProgram().parse(['run', 'adapter', 'x', '--json'], { from: 'user' });
    createProgram().parse(['run', 'adapter', 'x'], { from: 'user' });

    expect(log.mock.calls.map((call) => call[0])).toEqual([
      JSON.stringify({ pattern: 'adapter', lines: ['Legacy printer: x'] }, null, 2),
      'Legacy printer: x',
    ]);
  });
});
