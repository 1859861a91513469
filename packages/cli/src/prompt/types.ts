import type { EditorIO } from '@unitwright/core';

/** Everything a command asks the operator: template fields and yes/no questions. */
export interface Prompter extends EditorIO {
  /** `question` is shown with a `[y/N]` or `[Y/n]` suffix matching `defaultYes`. */
  confirm(question: string, defaultYes: boolean): Promise<boolean>;
  close(): void;
}

export function confirmSuffix(defaultYes: boolean): string {
  return defaultYes ? '[Y/n]' : '[y/N]';
}

/** `y`/`yes` in any case is yes, empty takes the default, anything else is no. */
export function parseConfirmation(answer: string, defaultYes: boolean): boolean {
  const normalized = answer.trim().toLowerCase();
  if (normalized === '') return defaultYes;
  return normalized === 'y' || normalized === 'yes';
}
