import {
  SECTION_NAMES,
  type SectionName,
  type UnitModel,
  cloneUnitModel,
  getSection,
  pruneEmptyValues,
} from './model/unit-model.js';

/** One key the operator is asked about. */
export interface FieldPrompt {
  section: SectionName;
  key: string;
  /** Template default, shown as a hint. */
  hint: string;
  /** 1-based index of this key within its section */
  position: number;
  /** Number of keys in this section */
  total: number;
}

/**
 * Terminal side of an edit session. `ask` resolves with one line of input
 * and rejects with UserAbortError on end of input or interrupt.
 */
export interface EditorIO {
  beginSection(section: SectionName, keyCount: number): void;
  ask(field: FieldPrompt): Promise<string>;
}

/**
 * Prompt for every key of the template, section by section.
 *
 * Answers are stored with surrounding whitespace stripped. Non-empty input
 * replaces the value; empty input drops the key, even when
 * the template had a default. The returned model is a new one: if `io.ask`
 * rejects, the error propagates and the input model is left as it was.
 */
export async function editUnitModel(model: UnitModel, io: EditorIO): Promise<UnitModel> {
  const edited = cloneUnitModel(model);

  for (const name of SECTION_NAMES) {
    const section = getSection(edited, name);
    const keys = [...section.keys()];
    io.beginSection(name, keys.length);

    for (const [index, key] of keys.entries()) {
      const answer = await io.ask({
        section: name,
        key,
        hint: section.get(key) ?? '',
        position: index + 1,
        total: keys.length,
      });
      section.set(key, answer.trim());
    }
  }

  return pruneEmptyValues(edited);
}
