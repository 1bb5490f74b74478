/**
 * App drift classification
 *
 * Compares desired app definitions with the remote inventory and classifies
 * each one as create, update or skip. Only keys the desired side specifies
 * are compared, at every mapping level, so fields the platform adds on its
 * own never count as drift. Sequences are compared element by element.
 */

import type { AppDefinition, ConfigValue } from '../../definitions/types.js';
import { formatConfigValue } from '../../definitions/value.js';
import type {
  ConfigDrift,
  DriftResult,
  ReconcilePlan,
  RemoteApp,
  RemoteInventory,
} from './types.js';

/**
 * Maximum number of drifted paths named in a reason
 */
export const MAX_REASON_PATHS = 3;

// =============================================================================
// Config Comparison
// =============================================================================

function childPath(parent: string, key: string): string {
  return parent ? `${parent}.${key}` : key;
}

/**
 * Compute the drifts between a desired and an actual config value
 *
 * Mapping keys are visited in sorted order so results are deterministic.
 *
 * @param path - Path of the values being compared; empty for the document root
 */
export function diffConfig(
  desired: ConfigValue,
  actual: ConfigValue | undefined,
  path = ''
): ConfigDrift[] {
  if (actual === undefined) {
    return [{ path, kind: 'missing', desired }];
  }

  switch (desired.kind) {
    case 'mapping': {
      if (actual.kind !== 'mapping') {
        return [{ path, kind: 'changed', desired, actual }];
      }
      const drifts: ConfigDrift[] = [];
      const keys = [...desired.entries.keys()].sort();
      for (const key of keys) {
        const value = desired.entries.get(key);
        if (value !== undefined) {
          drifts.push(...diffConfig(value, actual.entries.get(key), childPath(path, key)));
        }
      }
      return drifts;
    }

    case 'sequence': {
      if (actual.kind !== 'sequence' || actual.items.length !== desired.items.length) {
        return [{ path, kind: 'changed', desired, actual }];
      }
      const actualItems = actual.items;
      return desired.items.flatMap((item, index) =>
        diffConfig(item, actualItems[index], `${path}[${index}]`)
      );
    }

    case 'scalar':
      if (actual.kind === 'scalar' && actual.value === desired.value) {
        return [];
      }
      return [{ path, kind: 'changed', desired, actual }];
  }
}

// =============================================================================
// Classification
// =============================================================================

/**
 * Summarise drifted paths for a one-line reason
 */
export function describeDrifts(drifts: ConfigDrift[]): string {
  const paths = drifts.map((drift) => drift.path || '(root)');
  const shown = paths.slice(0, MAX_REASON_PATHS).join(', ');
  const more = paths.length > MAX_REASON_PATHS ? ` and ${paths.length - MAX_REASON_PATHS} more` : '';
  return `${shown}${more} ${paths.length === 1 ? 'differs' : 'differ'}`;
}

/**
 * Classify a single definition against its remote counterpart (if any)
 */
export function classifyApp(definition: AppDefinition, remote: RemoteApp | undefined): DriftResult {
  if (remote === undefined) {
    return {
      appName: definition.name,
      action: 'create',
      reason: 'absent remotely',
      drifts: [],
      definition,
    };
  }

  const drifts = diffConfig(definition.config, remote.configSnapshot);
  if (drifts.length > 0) {
    return {
      appName: definition.name,
      action: 'update',
      reason: describeDrifts(drifts),
      drifts,
      definition,
      remote,
    };
  }

  return {
    appName: definition.name,
    action: 'skip',
    reason: 'config is up to date',
    drifts: [],
    definition,
    remote,
  };
}

/**
 * Classify every definition, preserving definition order
 *
 * Remote apps without a definition are ignored: nothing is ever removed.
 */
export function classifyAll(
  definitions: readonly AppDefinition[],
  remote: RemoteInventory
): ReconcilePlan {
  const results = definitions.map((definition) => classifyApp(definition, remote.get(definition.name)));

  return {
    results,
    summary: {
      toCreate: results.filter((r) => r.action === 'create').length,
      toUpdate: results.filter((r) => r.action === 'update').length,
      unchanged: results.filter((r) => r.action === 'skip').length,
      total: results.length,
    },
  };
}

// =============================================================================
// Formatting
// =============================================================================

/**
 * Render drift details, one line per drifted path
 */
export function formatDriftDetails(drifts: ConfigDrift[]): string[] {
  return drifts.map((drift) => {
    const path = drift.path || '(root)';
    if (drift.kind === 'missing') {
      return `${path}: ${formatConfigValue(drift.desired)} (not set remotely)`;
    }
    return `${path}: ${formatConfigValue(drift.actual)} -> ${formatConfigValue(drift.desired)}`;
  });
}
