/**
 * Proxy
 *
 * The proxy defers loading the real image until the first display.
 */

import { z } from 'zod';
import { definePattern } from '../../catalog/define.js';

export interface Image {
  display(): string[];
}

export class RealImage implements Image {
  readonly loadLine: string;

  constructor(private readonly fileName: string) {
    this.loadLine = `Loading ${fileName} from disk.`;
  }

  display(): string[] {
    return [`Displaying ${this.fileName}.`];
  }
}

export class ImageProxy implements Image {
  private real: RealImage | null = null;

  constructor(private readonly fileName: string) {}

  get loaded(): boolean {
    return this.real !== null;
  }

  display(): string[] {
    if (this.real === null) {
      this.real = new RealImage(this.fileName);
      return [this.real.loadLine, ...this.real.display()];
    }
    return this.real.display();
  }
}

export const proxy = definePattern({
  id: 'proxy',
  name: 'Proxy',
  category: 'structural',
  summary: 'Loads an image lazily on first display',
  inputHint: 'image file name',
  input: z.string().min(1),
  sampleInput: 'photo.png',
  trace(fileName) {
    const image = new ImageProxy(fileName);
    return [...image.display(), ...image.display()];
  },
});
