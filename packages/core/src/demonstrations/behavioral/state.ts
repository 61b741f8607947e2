/**
 * State
 *
 * Order status as a closed set of states with a total transition function.
 * Delivered is terminal going forward and Placed is terminal going back;
 * requests past either end print a notice and leave the state unchanged.
 */

import { z } from 'zod';
import { definePattern } from '../../catalog/define.js';

export type OrderStatus = 'placed' | 'shipped' | 'delivered';

export type OrderTransition = 'next' | 'previous';

export interface TransitionResult {
  status: OrderStatus;
  message: string;
  /** False when the request ran past a terminal state */
  changed: boolean;
}

const STATUS_MESSAGES: Record<OrderStatus, string> = {
  placed: 'Order placed.',
  shipped: 'Order shipped.',
  delivered: 'Order delivered.',
};

const FORWARD: Record<OrderStatus, OrderStatus | null> = {
  placed: 'shipped',
  shipped: 'delivered',
  delivered: null,
};

const BACKWARD: Record<OrderStatus, OrderStatus | null> = {
  placed: null,
  shipped: 'placed',
  delivered: 'shipped',
};

export const INITIAL_ORDER_STATUS: OrderStatus = 'placed';

export function describeStatus(status: OrderStatus): string {
  return STATUS_MESSAGES[status];
}

export function transitionOrder(status: OrderStatus, transition: OrderTransition): TransitionResult {
  const target = transition === 'next' ? FORWARD[status] : BACKWARD[status];

  if (target === null) {
    return {
      status,
      message: transition === 'next' ? 'Order already delivered.' : 'Order has not shipped yet.',
      changed: false,
    };
  }

  return { status: target, message: STATUS_MESSAGES[target], changed: true };
}

export class Order {
  private current: OrderStatus = INITIAL_ORDER_STATUS;

  get status(): OrderStatus {
    return this.current;
  }

  next(): string {
    return this.apply('next');
  }

  previous(): string {
    return this.apply('previous');
  }

  private apply(transition: OrderTransition): string {
    const result = transitionOrder(this.current, transition);
    this.current = result.status;
    return result.message;
  }
}

export const state = definePattern({
  id: 'state',
  name: 'State',
  category: 'behavioral',
  summary: 'Moves an order through Placed, Shipped and Delivered',
  inputHint: 'list of transitions: "next" or "previous"',
  input: z.array(z.enum(['next', 'previous'])),
  sampleInput: ['next', 'next', 'next'],
  trace(transitions) {
    const order = new Order();
    const lines = [describeStatus(order.status)];
    for (const transition of transitions) {
      lines.push(transition === 'next' ? order.next() : order.previous());
    }
    return lines;
  },
});
