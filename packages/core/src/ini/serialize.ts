import { SECTION_NAMES, type UnitModel, getSection } from '../model/unit-model.js';

export const PROVENANCE_COMMENT = '# Automatically generated by unitwright.';

export interface SerializeOptions {
  /** Append the generated-by comment as the last line. */
  provenance?: boolean;
}

export function serializeUnitModel(model: UnitModel, options: SerializeOptions = {}): string {
  const blocks: string[] = [];

  for (const name of SECTION_NAMES) {
    const section = getSection(model, name);
    if (name === 'Install' && section.size === 0) continue;

    const lines = [`[${name}]`];
    for (const [key, value] of section) {
      lines.push(`${key}=${value}`);
    }
    blocks.push(`${lines.join('\n')}\n`);
  }

  let text = blocks.join('\n');
  if (options.provenance) {
    text += `\n${PROVENANCE_COMMENT}\n`;
  }
  return text;
}
