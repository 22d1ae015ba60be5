/**
 * @file packages/cli/src/domain/logic/watch-list.ts
 * @description Resolves user-given sensor names against an enumeration.
 */

import { sensorName, type SensorProviders, type SensorTree } from '@lsensors/shared';
import { ConfigurationError } from '../errors/app-error.js';
import { sortPaths } from './path-comparator.js';

function matches(path: string, name: string): boolean {
  return name.includes('/') ? path.endsWith(`/${name}`) : sensorName(path) === name;
}

/**
 * Picks the sensors named in `names` out of `tree`, keeping the order of
 * `names`. Several paths matching one name come out in natural order.
 *
 * A bare name matches the last path segment; `type/name` matches the path
 * suffix.
 *
 * @throws ConfigurationError when a name matches nothing
 */
export function resolveWatchList(names: readonly string[], tree: SensorTree): SensorTree {
  const sorted = sortPaths(tree.keys());
  const resolved = new Map<string, SensorProviders>();
  const missing: string[] = [];

  for (const name of names) {
    const hits = sorted.filter((path) => matches(path, name));
    if (hits.length === 0) {
      missing.push(name);
      continue;
    }
    for (const path of hits) {
      const providers = tree.get(path);
      if (providers && !resolved.has(path)) resolved.set(path, providers);
    }
  }

  if (missing.length > 0) {
    throw new ConfigurationError(`Sensor not found: ${missing.join(', ')}`);
  }
  return resolved;
}
