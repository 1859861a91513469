import {
  ArgumentError,
  ConfigError,
  LookupError,
  PermissionError,
  SchemaError,
  ServiceManagerError,
  UserAbortError,
  WriteError,
} from '@unitwright/core';

export const ExitCode = {
  Success: 0,
  UserAbort: 5,
  ArgumentError: 6,
  ConfigError: 7,
  GlobalError: 8,
  SchemaError: 9,
  ServiceManagerError: 10,
  PermissionError: 11,
  WriteError: 12,
} as const;
export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/** Exit code for a known failure, or undefined for anything unexpected. */
export function exitCodeFor(err: unknown): ExitCode | undefined {
  if (err instanceof UserAbortError) return ExitCode.UserAbort;
  if (err instanceof ArgumentError) return ExitCode.ArgumentError;
  if (err instanceof ConfigError) return ExitCode.ConfigError;
  if (err instanceof SchemaError) return ExitCode.SchemaError;
  if (err instanceof ServiceManagerError) return ExitCode.ServiceManagerError;
  if (err instanceof LookupError) return ExitCode.ServiceManagerError;
  if (err instanceof PermissionError) return ExitCode.PermissionError;
  if (err instanceof WriteError) return ExitCode.WriteError;
  return undefined;
}
