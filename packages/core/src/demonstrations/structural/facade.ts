/**
 * Facade
 */

import { z } from 'zod';
import { definePattern } from '../../catalog/define.js';

class Lights {
  dim(): string {
    return 'Lights dimmed.';
  }
}

class Projector {
  on(): string {
    return 'Projector on.';
  }
}

class SoundSystem {
  setSurround(): string {
    return 'Sound system set to surround.';
  }
}

/** One call in place of driving three subsystems by hand. */
export class HomeTheaterFacade {
  private readonly lights = new Lights();
  private readonly projector = new Projector();
  private readonly sound = new SoundSystem();

  watchMovie(title: string): string[] {
    return [this.lights.dim(), this.projector.on(), this.sound.setSurround(), `Playing movie: ${title}`];
  }
}

export const facade = definePattern({
  id: 'facade',
  name: 'Facade',
  category: 'structural',
  summary: 'Starts a movie night through one simplified interface',
  inputHint: 'movie title',
  input: z.string().min(1),
  sampleInput: 'Inception',
  trace(title) {
    return new HomeTheaterFacade().watchMovie(title);
  },
});
