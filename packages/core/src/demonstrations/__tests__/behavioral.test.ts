/**
 * Behavioral Demonstration Tests
 */

import { describe, it, expect } from 'vitest';

import { run, runWithRawInput } from '../../catalog/index.js';
import {
  handleRequest,
  RemoteControl,
  Light,
  BookCollection,
  ChatRoom,
  Publisher,
  namedSubscriber,
  Order,
  transitionOrder,
  Checkout,
  PAYMENT_STRATEGIES,
  visitShape,
  areaVisitor,
} from '../index.js';

// ============================================================================
// Chain of Responsibility
// ============================================================================

describe('chain_of_responsibility', () => {
  it('should let the first matching handler answer', () => {
    expect(handleRequest('admin')).toBe('Request handled by Admin.');
    expect(handleRequest('moderator')).toBe('Request handled by Moderator.');
  });

  it('should match exactly', () => {
    expect(handleRequest('Admin')).toBeNull();
    expect(run('chain_of_responsibility', 'administrator')).toEqual([]);
  });

  it('should drop requests when the chain is empty', () => {
    expect(handleRequest('admin', [])).toBeNull();
  });
});

// ============================================================================
// Command
// ============================================================================

describe('command', () => {
  it('should print the sample trace', () => {
    expect(run('command')).toEqual(['Light is ON.', 'Light is OFF.', 'Light is ON.']);
  });

  it('should undo commands in reverse order', () => {
    expect(run('command', ['on', 'off', 'undo', 'undo', 'undo'])).toEqual([
      'Light is ON.',
      'Light is OFF.',
      'Light is ON.',
      'Light is OFF.',
      'Nothing to undo.',
    ]);
  });

  it('should track the light state', () => {
    const light = new Light();
    const remote = new RemoteControl(light);

    remote.execute({ kind: 'turn_on' });
    expect(light.isOn).toBe(true);
    remote.undo();
    expect(light.isOn).toBe(false);
  });
});

// ============================================================================
// Iterator
// ============================================================================

describe('iterator', () => {
  it('should print the sample trace', () => {
    expect(run('iterator')).toEqual(['Book: Design Patterns', 'Book: Refactoring', 'Book: Clean Code']);
  });

  it('should be iterable more than once', () => {
    const books = new BookCollection(['A', 'B']);

    expect([...books]).toEqual(['A', 'B']);
    expect([...books]).toEqual(['A', 'B']);
  });

  it('should print nothing for an empty collection', () => {
    expect(run('iterator', [])).toEqual([]);
  });
});

// ============================================================================
// Mediator
// ============================================================================

describe('mediator', () => {
  it('should print the sample trace', () => {
    expect(run('mediator')).toEqual([
      'Bob received message from Alice: Hello everyone!',
      'Charlie received message from Alice: Hello everyone!',
    ]);
  });

  it('should deliver to every member when the sender is outside the room', () => {
    const room = new ChatRoom();
    room.join('Bob');
    room.join('Bob');

    expect(room.send('Eve', 'hi')).toEqual(['Bob received message from Eve: hi']);
  });
});

// ============================================================================
// Memento
// ============================================================================

describe('memento', () => {
  it('should print the sample trace', () => {
    expect(run('memento')).toEqual(['Content: Hello', 'Saved: Hello', 'Content: Hello World', 'Restored: Hello']);
  });

  it('should report when there is nothing to restore', () => {
    expect(run('memento', [{ type: 'undo' }, { type: 'write', text: 'x' }])).toEqual([
      'Nothing to restore.',
      'Content: x',
    ]);
  });

  it('should restore snapshots newest first', () => {
    expect(
      run('memento', [
        { type: 'write', text: 'a' },
        { type: 'save' },
        { type: 'write', text: 'b' },
        { type: 'save' },
        { type: 'write', text: 'c' },
        { type: 'undo' },
        { type: 'undo' },
      ])
    ).toEqual(['Content: a', 'Saved: a', 'Content: ab', 'Saved: ab', 'Content: abc', 'Restored: ab', 'Restored: a']);
  });
});

// ============================================================================
// Observer
// ============================================================================

describe('observer', () => {
  it('should notify each subscriber for each message in order', () => {
    expect(run('observer', ['first', 'second'])).toEqual([
      'User1 received message: first',
      'User2 received message: first',
      'User1 received message: second',
      'User2 received message: second',
    ]);
  });

  it('should accept a single message', () => {
    expect(run('observer', 'ping')).toEqual(['User1 received message: ping', 'User2 received message: ping']);
  });

  it('should stop notifying unsubscribed subscribers', () => {
    const publisher = new Publisher();
    const unsubscribe = publisher.subscribe(namedSubscriber('A'));
    publisher.subscribe(namedSubscriber('B'));

    unsubscribe();

    expect(publisher.publish('m')).toEqual(['B received message: m']);
  });
});

// ============================================================================
// State
// ============================================================================

describe('state', () => {
  it('should start placed and move forward one step at a time', () => {
    expect(run('state', [])).toEqual(['Order placed.']);
    expect(run('state', ['next'])).toEqual(['Order placed.', 'Order shipped.']);
    expect(run('state', ['next', 'next'])).toEqual(['Order placed.', 'Order shipped.', 'Order delivered.']);
  });

  it('should stay delivered when moving forward from the terminal state', () => {
    const order = new Order();
    order.next();
    order.next();

    expect(order.next()).toBe('Order already delivered.');
    expect(order.status).toBe('delivered');
  });

  it('should stay placed when moving back from the initial state', () => {
    const order = new Order();

    expect(order.previous()).toBe('Order has not shipped yet.');
    expect(order.status).toBe('placed');
  });

  it('should move backward through the states', () => {
    expect(run('state', ['next', 'next', 'previous', 'previous', 'previous'])).toEqual([
      'Order placed.',
      'Order shipped.',
      'Order delivered.',
      'Order shipped.',
      'Order placed.',
      'Order has not shipped yet.',
    ]);
  });

  it('should define every transition', () => {
    expect(transitionOrder('placed', 'next')).toEqual({ status: 'shipped', message: 'Order shipped.', changed: true });
    expect(transitionOrder('shipped', 'next')).toEqual({
      status: 'delivered',
      message: 'Order delivered.',
      changed: true,
    });
    expect(transitionOrder('delivered', 'next')).toEqual({
      status: 'delivered',
      message: 'Order already delivered.',
      changed: false,
    });
    expect(transitionOrder('delivered', 'previous')).toEqual({
      status: 'shipped',
      message: 'Order shipped.',
      changed: true,
    });
    expect(transitionOrder('shipped', 'previous')).toEqual({ status: 'placed', message: 'Order placed.', changed: true });
    expect(transitionOrder('placed', 'previous')).toEqual({
      status: 'placed',
      message: 'Order has not shipped yet.',
      changed: false,
    });
  });
});

// ============================================================================
// Strategy
// ============================================================================

describe('strategy', () => {
  it('should print the sample trace', () => {
    expect(run('strategy')).toEqual(['Paid 100 using Credit Card.']);
  });

  it('should use the selected payment method', () => {
    expect(run('strategy', { amount: 12.5, method: 'paypal' })).toEqual(['Paid 12.5 using PayPal.']);
    expect(run('strategy', { amount: 7, method: 'bank_transfer' })).toEqual(['Paid 7 using Bank Transfer.']);
  });

  it('should switch strategies at runtime', () => {
    const checkout = new Checkout(PAYMENT_STRATEGIES.credit_card);
    checkout.setStrategy(PAYMENT_STRATEGIES.paypal);

    expect(checkout.pay(3)).toBe('Paid 3 using PayPal.');
  });

  it('should reject an infinite amount', () => {
    expect(() => run('strategy', { amount: Infinity, method: 'paypal' })).toThrow(
      'Invalid input for pattern strategy: amount: Number must be finite'
    );
    expect(() => runWithRawInput('strategy', '{"amount":1e999,"method":"paypal"}')).toThrow(
      'Invalid input for pattern strategy: amount: Number must be finite'
    );
  });
});

// ============================================================================
// Template Method
// ============================================================================

describe('template_method', () => {
  it('should run the CSV pipeline', () => {
    expect(run('template_method')).toEqual(['Reading CSV file.', 'Parsing CSV rows.', 'Saving processed data.']);
  });

  it('should run the JSON pipeline', () => {
    expect(run('template_method', 'json')).toEqual([
      'Reading JSON file.',
      'Parsing JSON document.',
      'Saving processed data.',
    ]);
  });
});

// ============================================================================
// Visitor
// ============================================================================

describe('visitor', () => {
  it('should print the sample trace', () => {
    expect(run('visitor')).toEqual(['Area of circle: 78.54', 'Area of rectangle: 12.00']);
  });

  it('should dispatch on the shape kind', () => {
    const kindVisitor = { circle: () => 'round', rectangle: () => 'angular' };

    expect(visitShape({ kind: 'circle', radius: 1 }, kindVisitor)).toBe('round');
    expect(visitShape({ kind: 'rectangle', width: 1, height: 2 }, kindVisitor)).toBe('angular');
    expect(visitShape({ kind: 'rectangle', width: 2, height: 2.5 }, areaVisitor)).toBe(5);
  });

  it('should reject infinite dimensions', () => {
    expect(() => run('visitor', [{ kind: 'circle', radius: Infinity }])).toThrow(
      'Invalid input for pattern visitor: 0.radius: Number must be finite'
    );
    expect(() => run('visitor', [{ kind: 'rectangle', width: Infinity, height: 1 }])).toThrow(
      'Invalid input for pattern visitor: 0.width: Number must be finite'
    );
    expect(() => run('visitor', [{ kind: 'rectangle', width: 1, height: Infinity }])).toThrow(
      'Invalid input for pattern visitor: 0.height: Number must be finite'
    );
  });

  it('should reject unknown shape kinds', () => {
    expect(() => run('visitor', [{ kind: 'triangle', base: 1, height: 1 }])).toThrow(
      'Invalid input for pattern visitor'
    );
  });
});
