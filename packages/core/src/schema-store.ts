import fs from 'node:fs';
import path from 'node:path';
import { SchemaError } from './errors.js';
import { parseUnitFile } from './ini/parse.js';
import { serializeUnitModel } from './ini/serialize.js';
import { type UnitModel, type UnitModelInit, createUnitModel } from './model/unit-model.js';

/** Canonical defaults written by `buildDefaultSchema`. */
export const DEFAULT_SCHEMA: UnitModelInit = {
  Unit: {
    Description: 'Example',
    After: 'network.target',
  },
  Service: {
    Type: 'simple',
    ExecStart: '/bin/true',
    ExecStop: '/bin/true',
    Restart: 'on-failure',
    RestartSec: '2',
    User: 'root',
    Group: 'root',
    PIDFile: '/run/service.pid',
    EnvironmentFile: '/etc/service/env',
    KillMode: 'control-group',
    KillSignal: 'SIGTERM',
    TimeoutStopSec: '5',
    StandardOutput: 'journal',
    StandardError: 'journal',
    DynamicUser: 'no',
  },
  Install: {
    WantedBy: 'multi-user.target',
  },
};

function describeFsError(err: unknown): string {
  const code = (err as { code?: string }).code;
  if (code === 'ENOENT') return 'file not found';
  if (code === 'EACCES') return 'permission denied';
  if (code === 'EISDIR') return 'is a directory';
  return err instanceof Error ? err.message : String(err);
}

/** Read and parse a template. Throws SchemaError on any failure. */
export function loadSchema(schemaPath: string): UnitModel {
  let raw: string;
  try {
    raw = fs.readFileSync(schemaPath, 'utf-8');
  } catch (err: unknown) {
    throw new SchemaError(`Cannot read schema ${schemaPath}: ${describeFsError(err)}`, {
      cause: err,
    });
  }

  return parseUnitFile(raw, schemaPath);
}

/**
 * Write the default template to `schemaPath`.
 * Never replaces an existing file.
 */
export function buildDefaultSchema(schemaPath: string): void {
  const content = serializeUnitModel(createUnitModel(DEFAULT_SCHEMA));

  try {
    fs.mkdirSync(path.dirname(schemaPath), { recursive: true });
    fs.writeFileSync(schemaPath, content, { encoding: 'utf-8', flag: 'wx' });
  } catch (err: unknown) {
    if ((err as { code?: string }).code === 'EEXIST') {
      throw new SchemaError(`${schemaPath} already exists.`, { cause: err });
    }
    throw new SchemaError(`Cannot write schema ${schemaPath}: ${describeFsError(err)}`, {
      cause: err,
    });
  }
}
