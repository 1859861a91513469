import path from 'node:path';
import { ArgumentError, normalizeServiceName } from '@unitwright/core';
import type { CliConfig } from '../config.js';
import type { RawArgs } from './args.js';

export type SchemaPreset = 'default' | 'short' | 'extended';

export type SchemaChoice =
  | { kind: 'preset'; preset: SchemaPreset }
  | { kind: 'custom'; path: string };

export type BuildMode = { kind: 'build'; schemaPath: string };
export type InfoMode = { kind: 'info' };
export type DeleteMode = { kind: 'delete'; service: string };
export type EditMode = { kind: 'edit'; service: string };
export type CreateMode = {
  kind: 'create';
  service: string;
  schema: SchemaChoice;
  schemaPath: string;
  outputDir: string;
};

/** What one invocation does, resolved once from the raw flags. */
export type Mode = BuildMode | InfoMode | DeleteMode | EditMode | CreateMode;

export const SCHEMA_FILES: Record<SchemaPreset, string> = {
  default: 'service-config',
  short: 'short_service-config',
  extended: 'extended_service-config',
};

export const DEFAULT_BUILD_SCHEMA = 'default-schema';

type ArgName =
  | 'build'
  | 'info'
  | 'delete'
  | 'edit'
  | 'short'
  | 'extended'
  | 'schema'
  | 'directory'
  | 'serviceName';

const LABELS: Record<ArgName, string> = {
  build: '-b/--build',
  info: '--info',
  delete: '--delete',
  edit: '--edit',
  short: '-s/--short',
  extended: '-x/--extended',
  schema: '-c/--schema',
  directory: '-d/--directory',
  serviceName: 'service_name',
};

/** Flags each standalone mode refuses to share the command line with. */
const INCOMPATIBLE: Record<'build' | 'info' | 'delete' | 'edit', ArgName[]> = {
  build: ['serviceName', 'info', 'short', 'extended', 'delete', 'edit'],
  info: ['serviceName', 'build', 'short', 'extended', 'delete', 'edit'],
  delete: ['build', 'info', 'short', 'extended', 'schema', 'directory', 'edit'],
  edit: ['build', 'info', 'short', 'extended', 'schema', 'directory', 'delete'],
};

function isSet(raw: RawArgs, name: ArgName): boolean {
  switch (name) {
    case 'schema':
    case 'directory':
    case 'serviceName':
      return raw[name] !== undefined;
    default:
      return raw[name];
  }
}

/** Every illegal flag combination in `raw`, as operator-facing messages. */
export function findArgumentConflicts(raw: RawArgs): string[] {
  const conflicts: string[] = [];

  for (const mode of ['build', 'info', 'delete', 'edit'] as const) {
    if (!raw[mode]) continue;
    for (const other of INCOMPATIBLE[mode]) {
      if (isSet(raw, other)) {
        conflicts.push(`The argument ${LABELS[mode]} cannot be used with ${LABELS[other]}.`);
      }
    }
  }

  for (const mode of ['delete', 'edit'] as const) {
    if (raw[mode] && raw.serviceName === undefined) {
      conflicts.push(`The argument ${LABELS[mode]} requires a service name.`);
    }
  }

  const schemaChoices = (['schema', 'short', 'extended'] as const).filter((n) => isSet(raw, n));
  for (let i = 1; i < schemaChoices.length; i++) {
    const [first, other] = [schemaChoices[0], schemaChoices[i]];
    if (first && other) {
      conflicts.push(`The argument ${LABELS[first]} cannot be used with ${LABELS[other]}.`);
    }
  }

  const standalone = raw.build || raw.info || raw.delete || raw.edit;
  if (!standalone && raw.serviceName === undefined) {
    conflicts.push('A service name is required to create a service.');
  }

  return conflicts;
}

export function resolveSchemaPath(choice: SchemaChoice, schemaDir: string): string {
  return choice.kind === 'custom'
    ? path.resolve(choice.path)
    : path.join(schemaDir, SCHEMA_FILES[choice.preset]);
}

/**
 * Turn raw flags into a Mode. Throws one ArgumentError listing every
 * conflict; the service name is validated and normalized here, once,
 * for every mode that takes one.
 */
export function resolveMode(raw: RawArgs, config: CliConfig): Mode {
  const conflicts = findArgumentConflicts(raw);
  if (conflicts.length > 0) {
    throw new ArgumentError(conflicts.join('\n'));
  }

  if (raw.info) return { kind: 'info' };
  if (raw.build) {
    return { kind: 'build', schemaPath: path.join(config.schemaDir, DEFAULT_BUILD_SCHEMA) };
  }

  const service = normalizeServiceName(raw.serviceName ?? '');
  if (raw.delete) return { kind: 'delete', service };
  if (raw.edit) return { kind: 'edit', service };

  const schema: SchemaChoice =
    raw.schema !== undefined
      ? { kind: 'custom', path: raw.schema }
      : { kind: 'preset', preset: raw.short ? 'short' : raw.extended ? 'extended' : 'default' };

  return {
    kind: 'create',
    service,
    schema,
    schemaPath: resolveSchemaPath(schema, config.schemaDir),
    outputDir: path.resolve(raw.directory ?? config.unitDir),
  };
}
