import { spawnSync } from 'node:child_process';
import type { ServiceResult } from './systemctl.js';

export interface EditorLauncher {
  open(path: string): ServiceResult;
}

/** Runs the configured editor on a file and blocks until it exits. */
export class SpawnEditorLauncher implements EditorLauncher {
  private command: string;

  constructor(command: string) {
    this.command = command;
  }

  open(path: string): ServiceResult {
    const [bin, ...args] = this.command.trim().split(/\s+/);
    if (!bin) {
      return { success: false, message: 'No editor configured.' };
    }

    const result = spawnSync(bin, [...args, path], { stdio: 'inherit' });
    if (result.error) {
      return { success: false, message: `Could not run ${bin}: ${result.error.message}` };
    }
    if (result.status !== 0) {
      return {
        success: false,
        message: `${bin} exited with ${result.status ?? `signal ${result.signal ?? 'unknown'}`}.`,
      };
    }
    return { success: true, message: `Closed ${bin}.` };
  }
}
