/**
 * Factory Method
 */

import { z } from 'zod';
import { definePattern } from '../../catalog/define.js';

export const ROUTES = ['road', 'sea'] as const;

export type Route = (typeof ROUTES)[number];

export interface Transport {
  readonly name: string;
  deliver(): string;
}

export abstract class Logistics {
  protected abstract createTransport(): Transport;

  planDelivery(): string[] {
    const transport = this.createTransport();
    return [`${transport.name} created.`, transport.deliver()];
  }
}

export class RoadLogistics extends Logistics {
  protected createTransport(): Transport {
    return { name: 'Truck', deliver: () => 'Delivering cargo by road.' };
  }
}

export class SeaLogistics extends Logistics {
  protected createTransport(): Transport {
    return { name: 'Ship', deliver: () => 'Delivering cargo by sea.' };
  }
}

export function logisticsFor(route: Route): Logistics {
  switch (route) {
    case 'road':
      return new RoadLogistics();
    case 'sea':
      return new SeaLogistics();
  }
}

export const factoryMethod = definePattern({
  id: 'factory_method',
  name: 'Factory Method',
  category: 'creational',
  summary: 'Lets each logistics subclass decide which transport to create',
  inputHint: '"road" or "sea"',
  input: z.enum(ROUTES),
  sampleInput: 'road',
  trace(route) {
    return logisticsFor(route).planDelivery();
  },
});
