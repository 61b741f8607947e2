/**
 * Strategy
 */

import { z } from 'zod';
import { definePattern } from '../../catalog/define.js';

export type PaymentMethod = 'credit_card' | 'paypal' | 'bank_transfer';

export type PaymentStrategy = (amount: number) => string;

export const PAYMENT_STRATEGIES: Record<PaymentMethod, PaymentStrategy> = {
  credit_card: (amount) => `Paid ${amount} using Credit Card.`,
  paypal: (amount) => `Paid ${amount} using PayPal.`,
  bank_transfer: (amount) => `Paid ${amount} using Bank Transfer.`,
};

export class Checkout {
  constructor(private strategy: PaymentStrategy) {}

  setStrategy(strategy: PaymentStrategy): void {
    this.strategy = strategy;
  }

  pay(amount: number): string {
    return this.strategy(amount);
  }
}

export const strategy = definePattern({
  id: 'strategy',
  name: 'Strategy',
  category: 'behavioral',
  summary: 'Swaps the payment algorithm used at checkout',
  inputHint: '{ "amount": 100, "method": "credit_card" | "paypal" | "bank_transfer" }',
  input: z.object({
    amount: z.number().positive().finite(),
    method: z.enum(['credit_card', 'paypal', 'bank_transfer']),
  }),
  sampleInput: { amount: 100, method: 'credit_card' },
  trace({ amount, method }) {
    return [new Checkout(PAYMENT_STRATEGIES[method]).pay(amount)];
  },
});
