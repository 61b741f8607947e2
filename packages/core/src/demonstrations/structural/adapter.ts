/**
 * Adapter
 */

import { z } from 'zod';
import { definePattern } from '../../catalog/define.js';

/** Interface the client code expects. */
export interface Printer {
  print(text: string): string;
}

/** Existing class with an incompatible interface. */
export class LegacyPrinter {
  printText(message: string): string {
    return `Legacy printer: ${message}`;
  }
}

export class LegacyPrinterAdapter implements Printer {
  constructor(private readonly legacy: LegacyPrinter) {}

  print(text: string): string {
    return this.legacy.printText(text);
  }
}

export const adapter = definePattern({
  id: 'adapter',
  name: 'Adapter',
  category: 'structural',
  summary: 'Lets client code use a legacy printer through a modern interface',
  inputHint: 'text to print',
  input: z.string(),
  sampleInput: 'Hello, Adapter!',
  trace(text) {
    const printer: Printer = new LegacyPrinterAdapter(new LegacyPrinter());
    return [printer.print(text)];
  },
});
