import { ArgumentError } from '@unitwright/core';
import { PROGRAM_NAME } from '../version.js';

/** Flags as typed, before any combination rule is applied. */
export interface RawArgs {
  info: boolean;
  build: boolean;
  short: boolean;
  extended: boolean;
  delete: boolean;
  edit: boolean;
  help: boolean;
  version: boolean;
  schema?: string;
  directory?: string;
  serviceName?: string;
}

type BooleanFlag = 'info' | 'build' | 'short' | 'extended' | 'delete' | 'edit' | 'help' | 'version';
type ValueFlag = 'schema' | 'directory';

const BOOLEAN_FLAGS = new Map<string, BooleanFlag>([
  ['--info', 'info'],
  ['-b', 'build'],
  ['--build', 'build'],
  ['-s', 'short'],
  ['--short', 'short'],
  ['-x', 'extended'],
  ['--extended', 'extended'],
  ['--delete', 'delete'],
  ['--edit', 'edit'],
  ['-h', 'help'],
  ['--help', 'help'],
  ['-v', 'version'],
  ['--version', 'version'],
]);

const VALUE_FLAGS = new Map<string, ValueFlag>([
  ['-c', 'schema'],
  ['--schema', 'schema'],
  ['-d', 'directory'],
  ['--directory', 'directory'],
]);

export function emptyArgs(): RawArgs {
  return {
    info: false,
    build: false,
    short: false,
    extended: false,
    delete: false,
    edit: false,
    help: false,
    version: false,
  };
}

/**
 * Tokenize argv. Accepts `-c path`, `--schema path` and `--schema=path`;
 * everything after `--` is positional.
 */
export function parseArgs(argv: readonly string[]): RawArgs {
  const args = emptyArgs();
  let positionalOnly = false;

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i] ?? '';

    if (!positionalOnly && token === '--') {
      positionalOnly = true;
      continue;
    }

    if (!positionalOnly && token.startsWith('-') && token !== '-') {
      const eq = token.startsWith('--') ? token.indexOf('=') : -1;
      const flag = eq === -1 ? token : token.slice(0, eq);

      const valueFlag = VALUE_FLAGS.get(flag);
      if (valueFlag) {
        const value = eq === -1 ? argv[++i] : token.slice(eq + 1);
        if (value === undefined || value === '' || (eq === -1 && value.startsWith('-'))) {
          throw new ArgumentError(`The argument ${flag} expects a path.`);
        }
        args[valueFlag] = value;
        continue;
      }

      const booleanFlag = eq === -1 ? BOOLEAN_FLAGS.get(flag) : undefined;
      if (booleanFlag) {
        args[booleanFlag] = true;
        continue;
      }

      throw new ArgumentError(`Unknown argument: ${token}`);
    }

    if (args.serviceName !== undefined) {
      throw new ArgumentError(`Unexpected extra argument: ${token}`);
    }
    args.serviceName = token;
  }

  return args;
}

export function usage(): string {
  return [
    `Usage: ${PROGRAM_NAME} [options] [service_name]`,
    '',
    'Create a service (default):',
    `  ${PROGRAM_NAME} myapp                  Prompt for every key of the default schema`,
    '  -s, --short                   Use the short schema',
    '  -x, --extended                Use the extended schema',
    '  -c, --schema <path>           Use a custom schema',
    '  -d, --directory <path>        Output directory (default: /etc/systemd/system)',
    '',
    'Other modes:',
    '  --edit <service_name>         Open an installed unit in the editor',
    '  --delete <service_name>       Stop, disable and remove an installed unit',
    '  -b, --build                   Write the default schema to <schemaDir>/default-schema',
    '  --info                        Show information about unitwright',
    '  -h, --help                    Show this help',
    '  -v, --version                 Show the version',
    '',
    'Leaving a prompt blank drops that key from the unit file.',
  ].join('\n');
}
