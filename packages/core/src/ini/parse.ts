import { SchemaError } from '../errors.js';
import {
  type SectionName,
  type UnitModel,
  type UnitSection,
  createUnitModel,
  getSection,
  isSectionName,
} from '../model/unit-model.js';

interface LogicalLine {
  text: string;
  lineNumber: number;
}

const HEADER = /^\[(.*)\]$/;

function isComment(text: string): boolean {
  return text.startsWith('#') || text.startsWith(';');
}

/**
 * Trim each line and fold backslash continuations into one logical line,
 * the way systemd reads unit files.
 */
function toLogicalLines(text: string): LogicalLine[] {
  const physical = text.split(/\r?\n/);
  const lines: LogicalLine[] = [];

  for (let i = 0; i < physical.length; i++) {
    const lineNumber = i + 1;
    let current = (physical[i] ?? '').trim();

    if (!isComment(current)) {
      while (current.endsWith('\\') && i + 1 < physical.length) {
        i++;
        current = `${current.slice(0, -1).trimEnd()} ${(physical[i] ?? '').trim()}`.trim();
      }
    }

    lines.push({ text: current, lineNumber });
  }

  return lines;
}

/**
 * Parse unit-file text into a UnitModel.
 *
 * Only `[Unit]`, `[Service]` and `[Install]` are accepted; the first two
 * must be present. Key casing and order are kept; a repeated key keeps its
 * first position and takes the last value.
 */
export function parseUnitFile(text: string, source = '<input>'): UnitModel {
  const model = createUnitModel();
  const seen = new Set<SectionName>();
  let current: UnitSection | undefined;

  for (const { text: line, lineNumber } of toLogicalLines(text)) {
    if (line === '' || isComment(line)) continue;

    const header = HEADER.exec(line);
    if (header) {
      const name = header[1] ?? '';
      if (!isSectionName(name)) {
        throw new SchemaError(`${source}:${lineNumber}: unsupported section [${name}]`);
      }
      seen.add(name);
      current = getSection(model, name);
      continue;
    }

    const idx = line.indexOf('=');
    if (idx === -1) {
      throw new SchemaError(
        `${source}:${lineNumber}: expected "Key=Value" or a [Section] header, got "${line}"`,
      );
    }
    if (!current) {
      throw new SchemaError(`${source}:${lineNumber}: assignment before any [Section] header`);
    }

    const key = line.slice(0, idx).trim();
    if (key === '') {
      throw new SchemaError(`${source}:${lineNumber}: assignment without a key`);
    }
    current.set(key, line.slice(idx + 1).trim());
  }

  for (const required of ['Unit', 'Service'] as const) {
    if (!seen.has(required)) {
      throw new SchemaError(`${source}: missing [${required}] section`);
    }
  }

  return model;
}
