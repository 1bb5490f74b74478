/**
 * Desired-state definitions: loading and the config value tree
 */

export {
  loadDefinitions,
  loadComposeDefinition,
  loadCatalogDefinition,
  listDefinitionFiles,
  parseDefinitionFile,
  DEFINITION_EXTENSIONS,
  DEFAULT_CATALOG_TRAIN,
  DEFAULT_CATALOG_VERSION,
} from './loader.js';

export {
  toConfigValue,
  toConfigMapping,
  toPlain,
  toPlainObject,
  configEquals,
  formatConfigValue,
  describeKind,
  scalar,
  sequence,
  mapping,
} from './value.js';

export { DefinitionError } from './types.js';

export type {
  AppDefinition,
  CatalogReference,
  ConfigMapping,
  ConfigScalar,
  ConfigScalarValue,
  ConfigSequence,
  ConfigValue,
  DefinitionConflict,
  DefinitionErrorCode,
  LoadError,
  LoadOptions,
  LoadResult,
  SourceKind,
  SourceSummary,
} from './types.js';
