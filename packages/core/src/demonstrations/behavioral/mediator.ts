/**
 * Mediator
 *
 * Users never talk to each other directly; the chat room relays each
 * message to every registered user except the sender.
 */

import { z } from 'zod';
import { definePattern } from '../../catalog/define.js';

export class ChatRoom {
  private readonly users: string[] = [];

  join(user: string): void {
    if (!this.users.includes(user)) {
      this.users.push(user);
    }
  }

  send(from: string, text: string): string[] {
    return this.users
      .filter((user) => user !== from)
      .map((user) => `${user} received message from ${from}: ${text}`);
  }
}

const MediatorInput = z.object({
  users: z.array(z.string().min(1)),
  messages: z.array(z.object({ from: z.string().min(1), text: z.string() })),
});

export const mediator = definePattern({
  id: 'mediator',
  name: 'Mediator',
  category: 'behavioral',
  summary: 'Routes chat messages between users through a central room',
  inputHint: '{ "users": [...], "messages": [{ "from": "...", "text": "..." }] }',
  input: MediatorInput,
  sampleInput: {
    users: ['Alice', 'Bob', 'Charlie'],
    messages: [{ from: 'Alice', text: 'Hello everyone!' }],
  },
  trace({ users, messages }) {
    const room = new ChatRoom();
    for (const user of users) {
      room.join(user);
    }
    return messages.flatMap((message) => room.send(message.from, message.text));
  },
});
