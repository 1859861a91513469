import { type FieldPrompt, type SectionName, UserAbortError } from '@unitwright/core';
import { Box, type Instance, Text, render, useInput } from 'ink';
import TextInput from 'ink-text-input';
import { type ReactElement, useState } from 'react';
import type { Style } from '../style.js';
import { type Prompter, confirmSuffix } from './types.js';

function isAbortKey(input: string, key: { ctrl: boolean }): boolean {
  return key.ctrl && (input === 'c' || input === 'd');
}

interface FieldPromptViewProps {
  field: FieldPrompt;
  onSubmit: (value: string) => void;
  onAbort: () => void;
}

export function FieldPromptView({ field, onSubmit, onAbort }: FieldPromptViewProps): JSX.Element {
  const [value, setValue] = useState('');

  useInput((input, key) => {
    if (isAbortKey(input, key)) onAbort();
  });

  return (
    <Box>
      <Text color="gray">
        ({field.position}/{field.total}){' '}
      </Text>
      <Text color="green" bold>
        {field.key}=
      </Text>
      <TextInput value={value} onChange={setValue} onSubmit={onSubmit} placeholder={field.hint} />
    </Box>
  );
}

interface ConfirmViewProps {
  question: string;
  defaultYes: boolean;
  onAnswer: (yes: boolean) => void;
  onAbort: () => void;
}

export function ConfirmView({ question, defaultYes, onAnswer, onAbort }: ConfirmViewProps): JSX.Element {
  useInput((input, key) => {
    if (isAbortKey(input, key)) {
      onAbort();
    } else if (input === 'y' || input === 'Y') {
      onAnswer(true);
    } else if (input === 'n' || input === 'N') {
      onAnswer(false);
    } else if (key.return) {
      onAnswer(defaultYes);
    }
  });

  return (
    <Box>
      <Text>
        {question} <Text color="gray">{confirmSuffix(defaultYes)}</Text>
      </Text>
    </Box>
  );
}

export interface InkPrompterOptions {
  style: Style;
  stdin?: NodeJS.ReadStream;
  stdout?: NodeJS.WriteStream;
}

/** Terminal prompts, one short-lived ink app per question. */
export class InkPrompter implements Prompter {
  private style: Style;
  private stdin: NodeJS.ReadStream;
  private stdout: NodeJS.WriteStream;
  private sectionsShown = 0;

  constructor(options: InkPrompterOptions) {
    this.style = options.style;
    this.stdin = options.stdin ?? process.stdin;
    this.stdout = options.stdout ?? process.stdout;
  }

  beginSection(section: SectionName, keyCount: number): void {
    if (this.sectionsShown > 0) this.stdout.write('\n');
    this.sectionsShown++;
    const count = this.style.render('muted', `(${keyCount} ${keyCount === 1 ? 'key' : 'keys'})`);
    this.stdout.write(
      `${this.style.render('section', `[${section}]`)} section configuration: ${count}\n`,
    );
  }

  ask(field: FieldPrompt): Promise<string> {
    return this.mount<string>((done, abort) => (
      <FieldPromptView field={field} onSubmit={done} onAbort={abort} />
    ));
  }

  confirm(question: string, defaultYes: boolean): Promise<boolean> {
    return this.mount<boolean>((done, abort) => (
      <ConfirmView question={question} defaultYes={defaultYes} onAnswer={done} onAbort={abort} />
    ));
  }

  close(): void {}

  private mount<T>(view: (done: (value: T) => void, abort: () => void) => ReactElement): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      let instance: Instance | undefined;
      let settled = false;

      const settle = (finish: () => void) => {
        if (settled) return;
        settled = true;
        instance?.unmount();
        finish();
      };

      instance = render(
        view(
          (value) => settle(() => resolve(value)),
          () => settle(() => reject(new UserAbortError())),
        ),
        { stdin: this.stdin, stdout: this.stdout, exitOnCtrlC: false },
      );
    });
  }
}
