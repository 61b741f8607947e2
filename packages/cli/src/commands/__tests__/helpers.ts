/**
 * Test helpers for the CLI commands.
 */

import type { CommandIO } from '../../services/cli-context.js';

export interface CapturedIO {
  io: CommandIO;
  out: string[];
  err: string[];
}

export function captureIO(): CapturedIO {
  const out: string[] = [];
  const err: string[] = [];
  return {
    io: {
      out: (line) => out.push(line),
      err: (line) => err.push(line),
    },
    out,
    err,
  };
}
