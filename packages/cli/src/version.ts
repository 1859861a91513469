import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = dirname(fileURLToPath(import.meta.url));

/** Package root; `src/` and `dist/` sit at the same depth below it. */
export const PACKAGE_ROOT = resolve(__dirname, '..');

const pkg = JSON.parse(readFileSync(resolve(PACKAGE_ROOT, 'package.json'), 'utf-8')) as {
  version: string;
  description: string;
};

export const PROGRAM_NAME = 'unitwright';
export const VERSION: string = pkg.version;
export const DESCRIPTION: string = pkg.description;
