import { execFileSync } from 'node:child_process';
import { LookupError, ServiceManagerError } from '@unitwright/core';
import { logger } from '../logger.js';

export interface ServiceResult {
  success: boolean;
  message: string;
}

/** Runs a command to completion and returns its stdout. */
export type ExecFn = (command: string, args: string[]) => string;

export interface ServiceManagerClient {
  version(): number;
  fragmentPath(service: string): string;
  reload(): ServiceResult;
  enable(service: string): ServiceResult;
  disable(service: string): ServiceResult;
  start(service: string): ServiceResult;
  stop(service: string): ServiceResult;
}

function defaultExec(command: string, args: string[]): string {
  return execFileSync(command, args, {
    encoding: 'utf-8',
    stdio: ['ignore', 'pipe', 'pipe'],
  });
}

function errorMessage(err: unknown): string {
  if (err instanceof Error && 'stderr' in err) {
    const stderr = err.stderr;
    if (typeof stderr === 'string' && stderr.trim()) return stderr.trim();
  }
  return err instanceof Error ? err.message : String(err);
}

/** First line of `systemctl --version` looks like `systemd 252 (252.22-1)`. */
export function parseSystemdVersion(output: string): number | undefined {
  const match = /^systemd (\d+)/.exec(output.trim());
  return match?.[1] ? Number(match[1]) : undefined;
}

/** Value of the `FragmentPath=` line, or '' when absent. */
export function parseFragmentPath(output: string): string {
  for (const line of output.split('\n')) {
    if (line.startsWith('FragmentPath=')) {
      return line.slice('FragmentPath='.length).trim();
    }
  }
  return '';
}

export class SystemctlClient implements ServiceManagerClient {
  private exec: ExecFn;

  constructor(exec?: ExecFn) {
    this.exec = exec ?? defaultExec;
  }

  version(): number {
    let output: string;
    try {
      output = this.exec('systemctl', ['--version']);
    } catch (err: unknown) {
      throw new ServiceManagerError(
        'systemd is not available on this machine. unitwright needs a systemd-based system.',
        { cause: err },
      );
    }

    const version = parseSystemdVersion(output);
    if (version === undefined) {
      throw new ServiceManagerError('Could not determine the systemd version.');
    }
    logger.debug({ version }, 'systemd detected');
    return version;
  }

  fragmentPath(service: string): string {
    let output: string;
    try {
      output = this.exec('systemctl', ['show', service, '-p', 'FragmentPath']);
    } catch (err: unknown) {
      throw new LookupError(`Could not look up ${service}: ${errorMessage(err)}`, { cause: err });
    }

    const fragment = parseFragmentPath(output);
    if (!fragment) {
      throw new LookupError(`Service ${service} is not known to systemd.`);
    }
    logger.debug({ service, fragment }, 'unit file located');
    return fragment;
  }

  reload(): ServiceResult {
    return this.control(['daemon-reload'], 'Reloaded systemd manager configuration.');
  }

  enable(service: string): ServiceResult {
    return this.control(['enable', service], `Enabled ${service}.`);
  }

  disable(service: string): ServiceResult {
    return this.control(['disable', service], `Disabled ${service}.`);
  }

  start(service: string): ServiceResult {
    return this.control(['start', service], `Started ${service}.`);
  }

  stop(service: string): ServiceResult {
    return this.control(['stop', service], `Stopped ${service}.`);
  }

  private control(args: string[], okMessage: string): ServiceResult {
    logger.debug({ args }, 'systemctl');
    try {
      this.exec('systemctl', args);
      return { success: true, message: okMessage };
    } catch (err: unknown) {
      const msg = errorMessage(err);
      logger.warn({ args, err: msg }, 'systemctl failed');
      return { success: false, message: `systemctl ${args.join(' ')} failed: ${msg}` };
    }
  }
}
