import path from 'node:path';
import { PermissionError } from '@unitwright/core';
import type { Mode } from '../cli/mode.js';
import type { CliConfig } from '../config.js';
import { PROGRAM_NAME } from '../version.js';

/** Effective uid, or undefined on platforms without one. */
export function currentUid(): number | undefined {
  return process.getuid?.();
}

export function isPrivileged(uid: number | undefined): boolean {
  return uid === 0;
}

/** Delete, edit and writes into the configured unit directory need root. */
export function requiresPrivilege(mode: Mode, config: CliConfig): boolean {
  switch (mode.kind) {
    case 'delete':
    case 'edit':
      return true;
    case 'create':
      return mode.outputDir === path.resolve(config.unitDir);
    default:
      return false;
  }
}

export function checkPrivileges(mode: Mode, config: CliConfig, uid: number | undefined): void {
  if (requiresPrivilege(mode, config) && !isPrivileged(uid)) {
    throw new PermissionError(
      `Insufficient permissions. You have to run ${PROGRAM_NAME} as root (with sudo).`,
    );
  }
}
