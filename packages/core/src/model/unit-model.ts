export const SECTION_NAMES = ['Unit', 'Service', 'Install'] as const;
export type SectionName = (typeof SECTION_NAMES)[number];

/** Ordered key/value pairs of one section. Map keeps insertion order. */
export type UnitSection = Map<string, string>;

export interface UnitModel {
  unit: UnitSection;
  service: UnitSection;
  install: UnitSection;
}

export type SectionEntries = ReadonlyArray<readonly [string, string]> | Readonly<Record<string, string>>;

export type UnitModelInit = Partial<Record<SectionName, SectionEntries>>;

export function isSectionName(name: string): name is SectionName {
  return (SECTION_NAMES as readonly string[]).includes(name);
}

function isEntryList(
  entries: SectionEntries,
): entries is ReadonlyArray<readonly [string, string]> {
  return Array.isArray(entries);
}

function toSection(entries: SectionEntries | undefined): UnitSection {
  const section: UnitSection = new Map();
  if (!entries) return section;

  const pairs = isEntryList(entries) ? entries : Object.entries(entries);
  // Map.set on an existing key keeps its position: first position, last value.
  for (const [key, value] of pairs) {
    section.set(key, value);
  }
  return section;
}

export function createUnitModel(init: UnitModelInit = {}): UnitModel {
  return {
    unit: toSection(init.Unit),
    service: toSection(init.Service),
    install: toSection(init.Install),
  };
}

export function getSection(model: UnitModel, name: SectionName): UnitSection {
  switch (name) {
    case 'Unit':
      return model.unit;
    case 'Service':
      return model.service;
    case 'Install':
      return model.install;
  }
}

export function cloneUnitModel(model: UnitModel): UnitModel {
  return {
    unit: new Map(model.unit),
    service: new Map(model.service),
    install: new Map(model.install),
  };
}

/** Drop every key whose value is the empty string. Mutates the model. */
export function pruneEmptyValues(model: UnitModel): UnitModel {
  for (const name of SECTION_NAMES) {
    const section = getSection(model, name);
    for (const [key, value] of section) {
      if (value === '') section.delete(key);
    }
  }
  return model;
}

export function countKeys(model: UnitModel): number {
  return model.unit.size + model.service.size + model.install.size;
}

/** Plain view of the model, section by section, in key order. */
export function unitModelToObject(model: UnitModel): Record<SectionName, Array<[string, string]>> {
  return {
    Unit: [...model.unit],
    Service: [...model.service],
    Install: [...model.install],
  };
}
