/**
 * Observer
 *
 * A publisher notifies its subscribers, in subscription order, of every
 * message it publishes.
 */

import { z } from 'zod';
import { definePattern } from '../../catalog/define.js';

export type Subscriber = (message: string) => string;

export class Publisher {
  private readonly subscribers: Subscriber[] = [];

  subscribe(subscriber: Subscriber): () => void {
    this.subscribers.push(subscriber);
    return () => {
      const index = this.subscribers.indexOf(subscriber);
      if (index !== -1) {
        this.subscribers.splice(index, 1);
      }
    };
  }

  publish(message: string): string[] {
    return this.subscribers.map((notify) => notify(message));
  }
}

export function namedSubscriber(name: string): Subscriber {
  return (message) => `${name} received message: ${message}`;
}

export const DEFAULT_SUBSCRIBERS = ['User1', 'User2'] as const;

export const observer = definePattern({
  id: 'observer',
  name: 'Observer',
  category: 'behavioral',
  summary: 'Broadcasts messages to every registered subscriber',
  inputHint: 'message or list of messages',
  input: z.union([z.string().transform((message) => [message]), z.array(z.string())]),
  sampleInput: ['New update available!'],
  trace(messages) {
    const publisher = new Publisher();
    for (const name of DEFAULT_SUBSCRIBERS) {
      publisher.subscribe(namedSubscriber(name));
    }
    return messages.flatMap((message) => publisher.publish(message));
  },
});
