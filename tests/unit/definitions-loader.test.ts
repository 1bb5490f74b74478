/**
 * Unit Tests: Definition Loader
 *
 * Tests discovery and loading of compose files and catalog exports,
 * including per-file error isolation and name conflicts.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import {
  loadDefinitions,
  loadCatalogDefinition,
  loadComposeDefinition,
  parseDefinitionFile,
} from '../../src/definitions/loader.js';
import { toPlain } from '../../src/definitions/value.js';
import { classifyApp } from '../../src/reconcilers/apps/diff.js';
import { createTempDir, cleanupTempDir, remoteApp, writeFiles } from '../helpers/nas.js';

const NGINX_COMPOSE = `services:
  nginx:
    image: nginx:1.25
    ports:
      - "8080:80"
`;

describe('definition loader', () => {
  let tempDir: string;
  let composeDir: string;
  let catalogDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
    composeDir = join(tempDir, 'compose');
    catalogDir = join(tempDir, 'catalog');
    await mkdir(composeDir);
    await mkdir(catalogDir);
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  // ===========================================================================
  // Compose files
  // ===========================================================================

  describe('loadComposeDefinition', () => {
    it('should name the app after the file stem', async () => {
      await writeFiles(composeDir, { 'nginx.yaml': NGINX_COMPOSE });

      const definition = await loadComposeDefinition(join(composeDir, 'nginx.yaml'));

      expect(definition.name).toBe('nginx');
      expect(definition.sourceKind).toBe('compose');
      expect(definition.catalog).toBeUndefined();
      expect(toPlain(definition.config)).toEqual({
        services: { nginx: { image: 'nginx:1.25', ports: ['8080:80'] } },
      });
    });

    it('should resolve YAML merge keys', async () => {
      await writeFiles(composeDir, {
        'web.yaml': [
          'x-common: &common',
          '  restart: always',
          'services:',
          '  web:',
          '    <<: *common',
          '    image: nginx:1.25',
          '',
        ].join('\n'),
      });

      const definition = await loadComposeDefinition(join(composeDir, 'web.yaml'));
      const remote = remoteApp('web', {
        'x-common': { restart: 'always' },
        services: { web: { restart: 'always', image: 'nginx:1.25' } },
      });

      expect(toPlain(definition.config)).toEqual({
        'x-common': { restart: 'always' },
        services: { web: { restart: 'always', image: 'nginx:1.25' } },
      });
      expect(classifyApp(definition, remote).action).toBe('skip');
    });

    it('should return a frozen definition', async () => {
      await writeFiles(composeDir, { 'nginx.yaml': NGINX_COMPOSE });

      const definition = await loadComposeDefinition(join(composeDir, 'nginx.yaml'));

      expect(Object.isFrozen(definition)).toBe(true);
    });

    it('should reject a document that is not a mapping', async () => {
      await writeFiles(composeDir, { 'list.yaml': '- a\n- b\n' });

      await expect(loadComposeDefinition(join(composeDir, 'list.yaml'))).rejects.toThrow(
        'list.yaml must contain a top-level object/mapping'
      );
    });
  });

  // ===========================================================================
  // Catalog exports
  // ===========================================================================

  describe('loadCatalogDefinition', () => {
    it('should read the name, catalog coordinates and values', async () => {
      await writeFiles(catalogDir, {
        'plex.json': JSON.stringify({
          app_name: 'plex',
          catalog_app: 'plex',
          train: 'community',
          version: '1.2.3',
          values: { network: { web_port: 32400 } },
        }),
      });

      const definition = await loadCatalogDefinition(join(catalogDir, 'plex.json'));

      expect(definition.name).toBe('plex');
      expect(definition.sourceKind).toBe('catalog');
      expect(definition.catalog).toEqual({ catalogApp: 'plex', train: 'community', version: '1.2.3' });
      expect(toPlain(definition.config)).toEqual({ network: { web_port: 32400 } });
    });

    it('should default train, version and values', async () => {
      await writeFiles(catalogDir, { 'minio.yaml': 'name: minio\ncatalog_app: minio\n' });

      const definition = await loadCatalogDefinition(join(catalogDir, 'minio.yaml'));

      expect(definition.name).toBe('minio');
      expect(definition.catalog).toEqual({ catalogApp: 'minio', train: 'stable', version: 'latest' });
      expect(definition.config.entries.size).toBe(0);
    });

    it('should stringify a numeric version', async () => {
      await writeFiles(catalogDir, { 'minio.yaml': 'app_name: minio\ncatalog_app: minio\nversion: 2\n' });

      const definition = await loadCatalogDefinition(join(catalogDir, 'minio.yaml'));

      expect(definition.catalog?.version).toBe('2');
    });

    it('should require catalog_app', async () => {
      await writeFiles(catalogDir, { 'x.yaml': 'app_name: x\n' });

      await expect(loadCatalogDefinition(join(catalogDir, 'x.yaml'))).rejects.toThrow(
        'x.yaml is missing required field "catalog_app"'
      );
    });

    it('should reject values that are not a mapping', async () => {
      await writeFiles(catalogDir, { 'x.yaml': 'app_name: x\ncatalog_app: x\nvalues: [1]\n' });

      await expect(loadCatalogDefinition(join(catalogDir, 'x.yaml'))).rejects.toMatchObject({
        code: 'NOT_A_MAPPING',
      });
    });
  });

  describe('parseDefinitionFile', () => {
    it('should reject unsupported extensions', async () => {
      await writeFiles(composeDir, { 'notes.txt': 'hello' });

      await expect(parseDefinitionFile(join(composeDir, 'notes.txt'))).rejects.toMatchObject({
        code: 'UNSUPPORTED_EXTENSION',
      });
    });

    it('should report unreadable files', async () => {
      await expect(parseDefinitionFile(join(composeDir, 'absent.yaml'))).rejects.toMatchObject({
        code: 'READ_FAILED',
      });
    });
  });

  // ===========================================================================
  // Directory loading
  // ===========================================================================

  describe('loadDefinitions', () => {
    it('should load compose files sorted, then catalog files', async () => {
      await writeFiles(composeDir, {
        'web.yaml': 'services:\n  web:\n    image: httpd\n',
        'api.yml': 'services:\n  api:\n    image: node:20\n',
        'README.md': '# not a definition',
      });
      await writeFiles(catalogDir, {
        'plex.json': JSON.stringify({ app_name: 'plex', catalog_app: 'plex' }),
      });

      const result = await loadDefinitions({ composeDir, catalogDir });

      expect(result.definitions.map((d) => d.name)).toEqual(['api', 'web', 'plex']);
      expect(result.errors).toEqual([]);
      expect(result.conflicts).toEqual([]);
      expect(result.sources).toEqual([
        { kind: 'compose', dir: composeDir, status: 'loaded', loaded: 2 },
        { kind: 'catalog', dir: catalogDir, status: 'loaded', loaded: 1 },
      ]);
    });

    it('should record a bad file and keep loading the rest', async () => {
      await writeFiles(composeDir, {
        'bad.yaml': 'services: [\n',
        'good.yaml': NGINX_COMPOSE,
      });

      const result = await loadDefinitions({ composeDir });

      expect(result.definitions.map((d) => d.name)).toEqual(['good']);
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0].path).toBe(join(composeDir, 'bad.yaml'));
      expect(result.errors[0].code).toBe('PARSE_ERROR');
    });

    it('should treat an empty file as not a mapping', async () => {
      await writeFiles(composeDir, { 'empty.yaml': '' });

      const result = await loadDefinitions({ composeDir });

      expect(result.definitions).toEqual([]);
      expect(result.errors.map((e) => e.code)).toEqual(['NOT_A_MAPPING']);
    });

    it('should skip a directory that does not exist', async () => {
      const missing = join(tempDir, 'nope');

      const result = await loadDefinitions({ composeDir: missing });

      expect(result.definitions).toEqual([]);
      expect(result.errors).toEqual([]);
      expect(result.sources).toEqual([
        { kind: 'compose', dir: missing, status: 'missing', loaded: 0 },
        { kind: 'catalog', status: 'not-configured', loaded: 0 },
      ]);
    });

    it('should report a path that is not a directory', async () => {
      const filePath = join(tempDir, 'file.yaml');
      await writeFile(filePath, NGINX_COMPOSE);

      const result = await loadDefinitions({ catalogDir: filePath });

      expect(result.errors).toEqual([
        {
          path: filePath,
          code: 'NOT_A_DIRECTORY',
          message: `catalog path ${filePath} is not a directory`,
        },
      ]);
    });

    it('should keep the catalog definition when both sources define an app', async () => {
      await writeFiles(composeDir, { 'plex.yaml': 'services:\n  plex:\n    image: plex\n' });
      await writeFiles(catalogDir, {
        'plex.json': JSON.stringify({ app_name: 'plex', catalog_app: 'plex' }),
      });

      const result = await loadDefinitions({ composeDir, catalogDir });

      expect(result.definitions).toHaveLength(1);
      expect(result.definitions[0].sourceKind).toBe('catalog');
      expect(result.conflicts).toEqual([
        {
          name: 'plex',
          kept: { sourceKind: 'catalog', originPath: join(catalogDir, 'plex.json') },
          discarded: { sourceKind: 'compose', originPath: join(composeDir, 'plex.yaml') },
        },
      ]);
    });

    it('should return nothing when no directory is configured', async () => {
      const result = await loadDefinitions({});

      expect(result.definitions).toEqual([]);
      expect(result.sources.map((s) => s.status)).toEqual(['not-configured', 'not-configured']);
    });
  });
});
