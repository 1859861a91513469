import fs from 'node:fs';
import { WriteError } from '@unitwright/core';
import type { CliConfig } from '../config.js';
import type { Prompter } from '../prompt/types.js';
import type { EditorLauncher } from '../services/editor.js';
import type { ServiceManagerClient, ServiceResult } from '../services/systemctl.js';
import type { Style } from '../style.js';

/** Collaborators every command receives; tests swap in fakes. */
export interface CommandContext {
  config: CliConfig;
  style: Style;
  log: (msg: string) => void;
  error: (msg: string) => void;
  manager: ServiceManagerClient;
  editor: EditorLauncher;
  uid: number | undefined;
}

export interface InteractiveContext extends CommandContext {
  prompter: Prompter;
}

/** Failed control commands are shown as warnings; the command carries on. */
export function reportResult(ctx: CommandContext, result: ServiceResult): void {
  if (!result.success) {
    ctx.error(ctx.style.render('warning', result.message));
  }
}

export function confirmWritten(file: string): void {
  if (!fs.existsSync(file)) {
    throw new WriteError(`${file} was not found after writing.`);
  }
}
