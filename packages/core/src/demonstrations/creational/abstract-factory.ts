/**
 * Abstract Factory
 *
 * Each factory produces a matching family of widgets for one platform.
 */

import { z } from 'zod';
import { definePattern } from '../../catalog/define.js';

export type Platform = 'windows' | 'mac';

export interface Widget {
  render(): string;
}

export interface WidgetFactory {
  createButton(): Widget;
  createCheckbox(): Widget;
}

const PLATFORM_LABELS: Record<Platform, string> = {
  windows: 'Windows',
  mac: 'Mac',
};

export function createWidgetFactory(platform: Platform): WidgetFactory {
  const label = PLATFORM_LABELS[platform];
  return {
    createButton: () => ({ render: () => `Rendering ${label} button.` }),
    createCheckbox: () => ({ render: () => `Rendering ${label} checkbox.` }),
  };
}

/** Client code only sees the factory interface. */
export function renderForm(factory: WidgetFactory): string[] {
  return [factory.createButton().render(), factory.createCheckbox().render()];
}

export const abstractFactory = definePattern({
  id: 'abstract_factory',
  name: 'Abstract Factory',
  category: 'creational',
  summary: 'Creates a consistent family of UI widgets per platform',
  inputHint: '"windows" or "mac"',
  input: z.enum(['windows', 'mac']),
  sampleInput: 'windows',
  trace(platform) {
    return renderForm(createWidgetFactory(platform));
  },
});
