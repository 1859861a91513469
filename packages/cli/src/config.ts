import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { ConfigError } from '@unitwright/core';
import { z } from 'zod';
import { PACKAGE_ROOT } from './version.js';

export const DEFAULT_UNIT_DIR = '/etc/systemd/system';
export const DEFAULT_SYSTEM_UNIT_DIRS = ['/lib/systemd/system', '/usr/lib/systemd/system'];
export const DEFAULT_EDITOR = 'vim';
export const PACKAGED_SCHEMA_DIR = path.join(PACKAGE_ROOT, 'schemas');

export const LogLevel = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);
export type LogLevel = z.infer<typeof LogLevel>;

/** Shape of the optional JSON configuration file. */
export const ConfigFile = z
  .object({
    /** Editor command, e.g. "nano" or "code --wait" */
    editor: z.string().min(1).optional(),
    /** Where new units are written when -d is not given */
    unitDir: z.string().min(1).optional(),
    /** Directory holding the packaged templates and default-schema */
    schemaDir: z.string().min(1).optional(),
    /** Vendor unit directories; deleting from them asks for confirmation */
    systemUnitDirs: z.array(z.string().min(1)).optional(),
    trace: z.boolean().optional(),
    logLevel: LogLevel.optional(),
  })
  .strict();
export type ConfigFile = z.infer<typeof ConfigFile>;

export interface CliConfig {
  configPath: string;
  editor: string;
  unitDir: string;
  schemaDir: string;
  systemUnitDirs: string[];
  trace: boolean;
  logLevel: LogLevel;
}

export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  if (env.UNITWRIGHT_CONFIG) return env.UNITWRIGHT_CONFIG;
  const base = env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config');
  return path.join(base, 'unitwright', 'config.json');
}

function readConfigFile(configPath: string): ConfigFile {
  let raw: string;
  try {
    raw = fs.readFileSync(configPath, 'utf-8');
  } catch (err: unknown) {
    const code = (err as { code?: string }).code;
    if (code === 'ENOENT') return {};
    throw new ConfigError(`Cannot read config at ${configPath}. Check file permissions.`, {
      cause: err,
    });
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err: unknown) {
    throw new ConfigError(`Config file corrupted at ${configPath}: not valid JSON.`, {
      cause: err,
    });
  }

  const result = ConfigFile.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join('.') : 'config';
    throw new ConfigError(`Invalid config at ${configPath}: ${where}: ${issue?.message}`);
  }
  return result.data;
}

/**
 * Load configuration: the JSON file (if any), then environment overrides.
 * Relative paths in the file are taken from the file's own directory.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  const configPath = getConfigPath(env);
  const file = readConfigFile(configPath);
  const fromFile = (p: string) => path.resolve(path.dirname(configPath), p);

  let logLevel: LogLevel = file.logLevel ?? 'warn';
  if (env.UNITWRIGHT_LOG_LEVEL) {
    const parsed = LogLevel.safeParse(env.UNITWRIGHT_LOG_LEVEL);
    if (!parsed.success) {
      throw new ConfigError(
        `Invalid UNITWRIGHT_LOG_LEVEL: "${env.UNITWRIGHT_LOG_LEVEL}". Must be one of ${LogLevel.options.join(', ')}.`,
      );
    }
    logLevel = parsed.data;
  }

  return {
    configPath,
    editor: file.editor ?? (env.VISUAL || env.EDITOR || DEFAULT_EDITOR),
    unitDir: file.unitDir ? fromFile(file.unitDir) : DEFAULT_UNIT_DIR,
    schemaDir: file.schemaDir ? fromFile(file.schemaDir) : PACKAGED_SCHEMA_DIR,
    systemUnitDirs: (file.systemUnitDirs ?? DEFAULT_SYSTEM_UNIT_DIRS).map(fromFile),
    trace: env.UNITWRIGHT_TRACE === '1' || env.UNITWRIGHT_TRACE === 'true' || (file.trace ?? false),
    logLevel,
  };
}
