/**
 * Builder
 */

import { z } from 'zod';
import { definePattern } from '../../catalog/define.js';

export interface Computer {
  cpu?: string;
  ram?: string;
  storage?: string;
}

export class ComputerBuilder {
  private readonly parts: Computer = {};

  setCpu(cpu: string): this {
    this.parts.cpu = cpu;
    return this;
  }

  setRam(ram: string): this {
    this.parts.ram = ram;
    return this;
  }

  setStorage(storage: string): this {
    this.parts.storage = storage;
    return this;
  }

  build(): Computer {
    return { ...this.parts };
  }
}

/** Only parts that were set are listed, always in CPU, RAM, Storage order. */
export function describeComputer(computer: Computer): string {
  const parts: string[] = [];
  if (computer.cpu !== undefined) parts.push(`CPU=${computer.cpu}`);
  if (computer.ram !== undefined) parts.push(`RAM=${computer.ram}`);
  if (computer.storage !== undefined) parts.push(`Storage=${computer.storage}`);
  return `Computer: ${parts.join(', ')}`;
}

export const builder = definePattern({
  id: 'builder',
  name: 'Builder',
  category: 'creational',
  summary: 'Assembles a computer step by step through a fluent builder',
  inputHint: '{ "cpu": "...", "ram": "...", "storage"?: "..." }',
  input: z.object({
    cpu: z.string().min(1),
    ram: z.string().min(1),
    storage: z.string().min(1).optional(),
  }),
  sampleInput: { cpu: 'Intel i7', ram: '16GB', storage: '512GB SSD' },
  trace({ cpu, ram, storage }) {
    const computerBuilder = new ComputerBuilder().setCpu(cpu).setRam(ram);
    if (storage !== undefined) {
      computerBuilder.setStorage(storage);
    }
    return [describeComputer(computerBuilder.build())];
  },
});
