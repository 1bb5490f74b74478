/**
 * Desired-state definition types
 *
 * An AppDefinition is what the operator wants deployed, loaded from either a
 * compose file or a catalog export. Its configuration is held as a tagged
 * value tree so comparisons never depend on how the source file was written.
 */

// =============================================================================
// Config Value Tree
// =============================================================================

export type ConfigScalar = string | number | boolean | null;

export interface ConfigScalarValue {
  readonly kind: 'scalar';
  readonly value: ConfigScalar;
}

export interface ConfigSequence {
  readonly kind: 'sequence';
  readonly items: readonly ConfigValue[];
}

export interface ConfigMapping {
  readonly kind: 'mapping';
  readonly entries: ReadonlyMap<string, ConfigValue>;
}

export type ConfigValue = ConfigScalarValue | ConfigSequence | ConfigMapping;

// =============================================================================
// Definitions
// =============================================================================

/**
 * Where a definition came from
 */
export type SourceKind = 'compose' | 'catalog';

/**
 * Catalog coordinates needed to install a catalog app
 */
export interface CatalogReference {
  /** Catalog app name, e.g. "plex" */
  readonly catalogApp: string;
  /** Catalog train (default "stable") */
  readonly train: string;
  /** App version (default "latest") */
  readonly version: string;
}

/**
 * A desired application, immutable once loaded
 */
export interface AppDefinition {
  /** Unique key within a run */
  readonly name: string;
  readonly sourceKind: SourceKind;
  /**
   * Compared configuration: the whole compose document for compose
   * definitions, the `values` mapping for catalog definitions
   */
  readonly config: ConfigMapping;
  /** File the definition was loaded from */
  readonly originPath: string;
  /** Present for catalog definitions only */
  readonly catalog?: CatalogReference;
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Definition load error codes
 */
export type DefinitionErrorCode =
  | 'READ_FAILED'
  | 'PARSE_ERROR'
  | 'NOT_A_MAPPING'
  | 'MISSING_FIELD'
  | 'UNSUPPORTED_VALUE'
  | 'UNSUPPORTED_EXTENSION'
  | 'NOT_A_DIRECTORY';

/**
 * Error raised while loading a single definition file
 */
export class DefinitionError extends Error {
  constructor(
    message: string,
    public readonly code: DefinitionErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DefinitionError';
  }
}

/**
 * A file (or directory) that could not be loaded; the rest of the load continues
 */
export interface LoadError {
  path: string;
  code: DefinitionErrorCode;
  message: string;
}

/**
 * Two definitions resolving to the same app name; the later one is kept
 */
export interface DefinitionConflict {
  name: string;
  kept: { sourceKind: SourceKind; originPath: string };
  discarded: { sourceKind: SourceKind; originPath: string };
}

/**
 * What happened to one configured source directory
 */
export interface SourceSummary {
  kind: SourceKind;
  dir?: string;
  /**
   * - loaded: directory was read (possibly with zero definitions)
   * - missing: path does not exist
   * - not-configured: no directory given for this kind
   * - invalid: path exists but is not a directory
   */
  status: 'loaded' | 'missing' | 'not-configured' | 'invalid';
  /** Definitions loaded from this source (before conflict resolution) */
  loaded: number;
}

export interface LoadOptions {
  composeDir?: string;
  catalogDir?: string;
}

export interface LoadResult {
  /** Definitions in discovery order: compose files, then catalog files */
  definitions: AppDefinition[];
  errors: LoadError[];
  conflicts: DefinitionConflict[];
  sources: SourceSummary[];
}
