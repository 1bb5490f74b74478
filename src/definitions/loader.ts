/**
 * Definition loading
 *
 * Reads the compose and catalog directories and produces one AppDefinition
 * per discovered app. A file that fails to load is reported and skipped;
 * a directory that does not exist simply contributes nothing.
 */

import type { Stats } from 'node:fs';
import { readFile, readdir, stat } from 'node:fs/promises';
import { basename, extname, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import {
  DefinitionError,
  type AppDefinition,
  type CatalogReference,
  type ConfigMapping,
  type DefinitionConflict,
  type LoadError,
  type LoadOptions,
  type LoadResult,
  type SourceKind,
  type SourceSummary,
} from './types.js';
import { mapping, toConfigMapping } from './value.js';

/** Supported file extensions for definition files */
export const DEFINITION_EXTENSIONS = ['.yaml', '.yml', '.json'];

/** Defaults applied to catalog exports that omit them */
export const DEFAULT_CATALOG_TRAIN = 'stable';
export const DEFAULT_CATALOG_VERSION = 'latest';

// =============================================================================
// File Parsing
// =============================================================================

/**
 * Read and parse a single YAML or JSON file
 *
 * @throws DefinitionError if the file cannot be read or parsed
 */
export async function parseDefinitionFile(filePath: string): Promise<unknown> {
  const ext = extname(filePath).toLowerCase();
  if (!DEFINITION_EXTENSIONS.includes(ext)) {
    throw new DefinitionError(
      `${basename(filePath)} must be .yaml, .yml, or .json`,
      'UNSUPPORTED_EXTENSION',
      { path: filePath }
    );
  }

  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (err) {
    throw new DefinitionError(
      `Failed to read ${basename(filePath)}: ${err instanceof Error ? err.message : String(err)}`,
      'READ_FAILED',
      { path: filePath }
    );
  }

  try {
    // compose files commonly share settings through `<<: *anchor`
    const parsed: unknown = ext === '.json' ? JSON.parse(content) : parseYaml(content, { merge: true });
    // an empty YAML document
    return parsed ?? null;
  } catch (err) {
    throw new DefinitionError(
      `${basename(filePath)} is not valid ${ext.slice(1)}: ${err instanceof Error ? err.message : String(err)}`,
      'PARSE_ERROR',
      { path: filePath }
    );
  }
}

// =============================================================================
// Definition Builders
// =============================================================================

/**
 * Load a compose file; the app is named after the file stem
 */
export async function loadComposeDefinition(filePath: string): Promise<AppDefinition> {
  const document = await parseDefinitionFile(filePath);
  const name = basename(filePath, extname(filePath));

  const definition: AppDefinition = {
    name,
    sourceKind: 'compose',
    config: toConfigMapping(document, basename(filePath)),
    originPath: filePath,
  };
  return Object.freeze(definition);
}

function requireString(
  document: ConfigMapping,
  keys: string[],
  filePath: string
): string {
  for (const key of keys) {
    const value = document.entries.get(key);
    if (value?.kind === 'scalar' && typeof value.value === 'string' && value.value.length > 0) {
      return value.value;
    }
  }
  throw new DefinitionError(
    `${basename(filePath)} is missing required field "${keys[0]}"`,
    'MISSING_FIELD',
    { path: filePath, field: keys[0] }
  );
}

function optionalString(document: ConfigMapping, key: string, fallback: string): string {
  const value = document.entries.get(key);
  if (value?.kind === 'scalar' && (typeof value.value === 'string' || typeof value.value === 'number')) {
    return String(value.value);
  }
  return fallback;
}

/**
 * Load a catalog export; the app name and values come from its content
 *
 * Expected shape (the platform's install payload):
 *   app_name: plex
 *   catalog_app: plex
 *   train: stable
 *   version: 1.2.3
 *   values: { ... }
 */
export async function loadCatalogDefinition(filePath: string): Promise<AppDefinition> {
  const document = toConfigMapping(await parseDefinitionFile(filePath), basename(filePath));

  const name = requireString(document, ['app_name', 'name'], filePath);
  const catalog: CatalogReference = {
    catalogApp: requireString(document, ['catalog_app'], filePath),
    train: optionalString(document, 'train', DEFAULT_CATALOG_TRAIN),
    version: optionalString(document, 'version', DEFAULT_CATALOG_VERSION),
  };

  const values = document.entries.get('values');
  let config: ConfigMapping;
  if (values === undefined || (values.kind === 'scalar' && values.value === null)) {
    config = mapping();
  } else if (values.kind === 'mapping') {
    config = values;
  } else {
    throw new DefinitionError(
      `${basename(filePath)}: "values" must be an object/mapping`,
      'NOT_A_MAPPING',
      { path: filePath, field: 'values' }
    );
  }

  const definition: AppDefinition = {
    name,
    sourceKind: 'catalog',
    config,
    originPath: filePath,
    catalog: Object.freeze(catalog),
  };
  return Object.freeze(definition);
}

// =============================================================================
// Directory Loading
// =============================================================================

type DirectoryListing =
  | { status: 'loaded'; files: string[] }
  | { status: 'missing' }
  | { status: 'invalid' };

/**
 * List definition files in a directory, sorted by file name
 */
export async function listDefinitionFiles(dirPath: string): Promise<DirectoryListing> {
  let dirStat: Stats;
  try {
    dirStat = await stat(dirPath);
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return { status: 'missing' };
    }
    throw err;
  }

  if (!dirStat.isDirectory()) {
    return { status: 'invalid' };
  }

  const entries = await readdir(dirPath, { withFileTypes: true });
  const files: string[] = [];

  for (const entry of entries) {
    if (!DEFINITION_EXTENSIONS.includes(extname(entry.name).toLowerCase())) {
      continue;
    }
    const filePath = resolve(dirPath, entry.name);
    if (entry.isFile()) {
      files.push(filePath);
    } else if (entry.isSymbolicLink()) {
      const target = await stat(filePath).catch(() => undefined);
      if (target?.isFile()) {
        files.push(filePath);
      }
    }
  }

  return { status: 'loaded', files: files.sort() };
}

const LOADERS: Record<SourceKind, (filePath: string) => Promise<AppDefinition>> = {
  compose: loadComposeDefinition,
  catalog: loadCatalogDefinition,
};

/**
 * Load every definition from the compose and catalog directories.
 *
 * Compose files are loaded before catalog files. When two files resolve to
 * the same app name the later one replaces the earlier one in place and the
 * clash is reported in `conflicts`.
 */
export async function loadDefinitions(options: LoadOptions): Promise<LoadResult> {
  const definitions: AppDefinition[] = [];
  const indexByName = new Map<string, number>();
  const errors: LoadError[] = [];
  const conflicts: DefinitionConflict[] = [];
  const sources: SourceSummary[] = [];

  const plan: Array<[SourceKind, string | undefined]> = [
    ['compose', options.composeDir],
    ['catalog', options.catalogDir],
  ];

  for (const [kind, dir] of plan) {
    if (!dir) {
      sources.push({ kind, status: 'not-configured', loaded: 0 });
      continue;
    }

    const dirPath = resolve(dir);
    const listing = await listDefinitionFiles(dirPath);

    if (listing.status !== 'loaded') {
      sources.push({ kind, dir: dirPath, status: listing.status, loaded: 0 });
      if (listing.status === 'invalid') {
        errors.push({
          path: dirPath,
          code: 'NOT_A_DIRECTORY',
          message: `${kind} path ${dirPath} is not a directory`,
        });
      }
      continue;
    }

    let loaded = 0;
    for (const filePath of listing.files) {
      let definition: AppDefinition;
      try {
        definition = await LOADERS[kind](filePath);
      } catch (err) {
        if (err instanceof DefinitionError) {
          errors.push({ path: filePath, code: err.code, message: err.message });
          continue;
        }
        throw err;
      }

      loaded++;
      const existing = indexByName.get(definition.name);
      if (existing === undefined) {
        indexByName.set(definition.name, definitions.length);
        definitions.push(definition);
      } else {
        const previous = definitions[existing];
        conflicts.push({
          name: definition.name,
          kept: { sourceKind: definition.sourceKind, originPath: definition.originPath },
          discarded: { sourceKind: previous.sourceKind, originPath: previous.originPath },
        });
        definitions[existing] = definition;
      }
    }

    sources.push({ kind, dir: dirPath, status: 'loaded', loaded });
  }

  return { definitions, errors, conflicts, sources };
}
