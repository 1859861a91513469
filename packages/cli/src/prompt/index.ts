import type { Style } from '../style.js';
import { InkPrompter } from './ink-prompter.js';
import { LinePrompter } from './line-prompter.js';
import type { Prompter } from './types.js';

export { InkPrompter } from './ink-prompter.js';
export { LinePrompter } from './line-prompter.js';
export { type Prompter, parseConfirmation } from './types.js';

/** Ink prompts on a terminal, plain line prompts otherwise. */
export function createPrompter(style: Style): Prompter {
  return process.stdin.isTTY ? new InkPrompter({ style }) : new LinePrompter({ style });
}
