/**
 * Template Method
 *
 * The base class fixes the read -> parse -> save sequence; subclasses
 * supply the format-specific steps.
 */

import { z } from 'zod';
import { definePattern } from '../../catalog/define.js';

export abstract class DataProcessor {
  process(): string[] {
    return [this.read(), this.parse(), this.save()];
  }

  protected abstract read(): string;

  protected abstract parse(): string;

  protected save(): string {
    return 'Saving processed data.';
  }
}

export class CsvProcessor extends DataProcessor {
  protected read(): string {
    return 'Reading CSV file.';
  }

  protected parse(): string {
    return 'Parsing CSV rows.';
  }
}

export class JsonProcessor extends DataProcessor {
  protected read(): string {
    return 'Reading JSON file.';
  }

  protected parse(): string {
    return 'Parsing JSON document.';
  }
}

export const templateMethod = definePattern({
  id: 'template_method',
  name: 'Template Method',
  category: 'behavioral',
  summary: 'Fixes the skeleton of a data pipeline and defers steps to subclasses',
  inputHint: '"csv" or "json"',
  input: z.enum(['csv', 'json']),
  sampleInput: 'csv',
  trace(format) {
    const processor = format === 'csv' ? new CsvProcessor() : new JsonProcessor();
    return processor.process();
  },
});
