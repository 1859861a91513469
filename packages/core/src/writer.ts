import fs from 'node:fs';
import { WriteError } from './errors.js';
import { serializeUnitModel } from './ini/serialize.js';
import type { UnitModel } from './model/unit-model.js';

/** A completed write, with what it replaced so it can be undone. */
export interface WrittenUnitFile {
  destination: string;
  /** Previous contents, or undefined when the file did not exist. */
  previous: string | undefined;
}

function describeWriteFailure(err: unknown): string {
  const code = (err as { code?: string }).code;
  if (code === 'ENOENT') return 'directory does not exist';
  if (code === 'EACCES' || code === 'EPERM') return 'permission denied';
  return err instanceof Error ? err.message : String(err);
}

function readPrevious(destination: string): string | undefined {
  try {
    return fs.readFileSync(destination, 'utf-8');
  } catch (err: unknown) {
    if ((err as { code?: string }).code === 'ENOENT') return undefined;
    throw new WriteError(`Cannot write ${destination}: ${describeWriteFailure(err)}`, {
      cause: err,
    });
  }
}

/**
 * Serialize the model (with the generated-by comment) to `destination`.
 * The parent directory must already exist.
 */
export function writeUnitFile(model: UnitModel, destination: string): WrittenUnitFile {
  const content = serializeUnitModel(model, { provenance: true });
  const previous = readPrevious(destination);

  try {
    fs.writeFileSync(destination, content, 'utf-8');
  } catch (err: unknown) {
    throw new WriteError(`Cannot write ${destination}: ${describeWriteFailure(err)}`, {
      cause: err,
    });
  }
  return { destination, previous };
}

/** Put back what `writeUnitFile` replaced, or remove the file it created. */
export function revertUnitFile({ destination, previous }: WrittenUnitFile): void {
  try {
    if (previous === undefined) {
      fs.rmSync(destination, { force: true });
    } else {
      fs.writeFileSync(destination, previous, 'utf-8');
    }
  } catch (err: unknown) {
    throw new WriteError(`Cannot restore ${destination}: ${describeWriteFailure(err)}`, {
      cause: err,
    });
  }
}
