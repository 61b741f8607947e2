/**
 * Command
 *
 * Light switch operations wrapped as command objects; the remote keeps a
 * history so the last command can be undone by running its inverse.
 */

import { z } from 'zod';
import { definePattern } from '../../catalog/define.js';

export type LightCommand = { kind: 'turn_on' } | { kind: 'turn_off' };

export type RemoteAction = 'on' | 'off' | 'undo';

export class Light {
  isOn = false;

  apply(command: LightCommand): string {
    switch (command.kind) {
      case 'turn_on':
        this.isOn = true;
        return 'Light is ON.';
      case 'turn_off':
        this.isOn = false;
        return 'Light is OFF.';
    }
  }
}

function inverse(command: LightCommand): LightCommand {
  return command.kind === 'turn_on' ? { kind: 'turn_off' } : { kind: 'turn_on' };
}

export class RemoteControl {
  private readonly history: LightCommand[] = [];

  constructor(private readonly light: Light) {}

  execute(command: LightCommand): string {
    this.history.push(command);
    return this.light.apply(command);
  }

  undo(): string {
    const last = this.history.pop();
    if (last === undefined) {
      return 'Nothing to undo.';
    }
    return this.light.apply(inverse(last));
  }
}

export const command = definePattern({
  id: 'command',
  name: 'Command',
  category: 'behavioral',
  summary: 'Encapsulates light switch requests as objects with undo',
  inputHint: 'list of actions: "on", "off", "undo"',
  input: z.array(z.enum(['on', 'off', 'undo'])),
  sampleInput: ['on', 'off', 'undo'],
  trace(actions) {
    const remote = new RemoteControl(new Light());
    return actions.map((action: RemoteAction) => {
      switch (action) {
        case 'on':
          return remote.execute({ kind: 'turn_on' });
        case 'off':
          return remote.execute({ kind: 'turn_off' });
        case 'undo':
          return remote.undo();
      }
    });
  },
});
