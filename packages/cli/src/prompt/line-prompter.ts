import { type Interface, createInterface } from 'node:readline';
import { type FieldPrompt, type SectionName, UserAbortError } from '@unitwright/core';
import type { Style } from '../style.js';
import { type Prompter, confirmSuffix, parseConfirmation } from './types.js';

export interface LinePrompterOptions {
  style: Style;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  /** Source of SIGINT; the process unless a test swaps it. */
  signals?: SignalSource;
}

export type SignalSource = Pick<NodeJS.EventEmitter, 'on' | 'off'>;

/** Line-based prompts for piped or redirected stdin. */
export class LinePrompter implements Prompter {
  private rl: Interface;
  private lines: AsyncIterator<string>;
  private output: NodeJS.WritableStream;
  private signals: SignalSource;
  private style: Style;
  private sectionsShown = 0;

  constructor(options: LinePrompterOptions) {
    this.style = options.style;
    this.output = options.output ?? process.stdout;
    this.signals = options.signals ?? process;
    this.rl = createInterface({ input: options.input ?? process.stdin, terminal: false });
    this.lines = this.rl[Symbol.asyncIterator]();
  }

  beginSection(section: SectionName, _keyCount?: number): void {
    if (this.sectionsShown > 0) this.output.write('\n');
    this.sectionsShown++;
    this.output.write(`${this.style.render('section', `[${section}]`)} section configuration:\n`);
  }

  ask(field: FieldPrompt): Promise<string> {
    const hint = field.hint ? ` [${field.hint}]` : '';
    this.output.write(`${this.style.render('key', field.key)}${hint}=`);
    return this.readLine();
  }

  async confirm(question: string, defaultYes: boolean): Promise<boolean> {
    this.output.write(`${question} ${confirmSuffix(defaultYes)}: `);
    return parseConfirmation(await this.readLine(), defaultYes);
  }

  close(): void {
    this.rl.close();
  }

  private readLine(): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      const onInterrupt = () => {
        cleanup();
        reject(new UserAbortError());
      };
      const cleanup = () => {
        this.signals.off('SIGINT', onInterrupt);
      };
      this.signals.on('SIGINT', onInterrupt);

      this.lines.next().then(
        (result) => {
          cleanup();
          if (result.done) reject(new UserAbortError());
          else resolve(result.value);
        },
        (err: unknown) => {
          cleanup();
          reject(err);
        },
      );
    });
  }
}
