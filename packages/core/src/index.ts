// Model
export {
  SECTION_NAMES,
  cloneUnitModel,
  countKeys,
  createUnitModel,
  getSection,
  isSectionName,
  pruneEmptyValues,
  unitModelToObject,
} from './model/unit-model.js';
export type {
  SectionEntries,
  SectionName,
  UnitModel,
  UnitModelInit,
  UnitSection,
} from './model/unit-model.js';

// Codec
export { parseUnitFile } from './ini/parse.js';
export { PROVENANCE_COMMENT, serializeUnitModel } from './ini/serialize.js';
export type { SerializeOptions } from './ini/serialize.js';

// Templates, editing, writing
export { DEFAULT_SCHEMA, buildDefaultSchema, loadSchema } from './schema-store.js';
export { editUnitModel } from './editor.js';
export type { EditorIO, FieldPrompt } from './editor.js';
export { revertUnitFile, writeUnitFile } from './writer.js';
export type { WrittenUnitFile } from './writer.js';

// Service names
export {
  SERVICE_SUFFIX,
  ServiceName,
  normalizeServiceName,
  validateServiceName,
} from './service-name.js';

// Errors
export {
  ArgumentError,
  ConfigError,
  LookupError,
  PermissionError,
  SchemaError,
  ServiceManagerError,
  UnitwrightError,
  UserAbortError,
  WriteError,
} from './errors.js';
