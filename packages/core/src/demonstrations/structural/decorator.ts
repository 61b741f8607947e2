/**
 * Decorator
 *
 * Each add-on wraps the beverage beneath it and extends its description
 * and cost. Costs are kept in cents.
 */

import { z } from 'zod';
import { definePattern } from '../../catalog/define.js';

export type AddOn = 'milk' | 'sugar' | 'whipped_cream';

export interface Beverage {
  description(): string;
  costCents(): number;
}

export class Coffee implements Beverage {
  description(): string {
    return 'Coffee';
  }

  costCents(): number {
    return 200;
  }
}

const ADD_ONS: Record<AddOn, { label: string; cents: number }> = {
  milk: { label: 'Milk', cents: 50 },
  sugar: { label: 'Sugar', cents: 20 },
  whipped_cream: { label: 'Whipped Cream', cents: 70 },
};

export class AddOnDecorator implements Beverage {
  constructor(
    private readonly inner: Beverage,
    private readonly addOn: AddOn
  ) {}

  description(): string {
    return `${this.inner.description()}, ${ADD_ONS[this.addOn].label}`;
  }

  costCents(): number {
    return this.inner.costCents() + ADD_ONS[this.addOn].cents;
  }
}

export function formatCents(cents: number): string {
  const dollars = Math.floor(cents / 100);
  const remainder = String(cents % 100).padStart(2, '0');
  return `$${dollars}.${remainder}`;
}

export const decorator = definePattern({
  id: 'decorator',
  name: 'Decorator',
  category: 'structural',
  summary: 'Stacks add-ons on a coffee without subclassing it',
  inputHint: 'list of add-ons: "milk", "sugar", "whipped_cream"',
  input: z.array(z.enum(['milk', 'sugar', 'whipped_cream'])),
  sampleInput: ['milk', 'sugar'],
  trace(addOns) {
    const beverage = addOns.reduce<Beverage>((inner, addOn) => new AddOnDecorator(inner, addOn), new Coffee());
    return [`${beverage.description()} costs ${formatCents(beverage.costCents())}`];
  },
});
