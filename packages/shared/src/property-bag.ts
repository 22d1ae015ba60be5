/**
 * @file packages/shared/src/property-bag.ts
 * @description Constructors for tagged property values and bags.
 */

import type { PropertyBag, PropertyValue } from './types.js';

export const intValue = (value: bigint | number): PropertyValue => ({
  kind: 'int',
  value: typeof value === 'bigint' ? value : BigInt(Math.trunc(value)),
});

export const doubleValue = (value: number): PropertyValue => ({ kind: 'double', value });

export const boolValue = (value: boolean): PropertyValue => ({ kind: 'bool', value });

export const stringValue = (value: string): PropertyValue => ({ kind: 'string', value });

/**
 * Builds a bag from a plain record. Keys mapped to `undefined` are left out.
 */
export function createPropertyBag(
  entries: Record<string, PropertyValue | undefined> = {},
): PropertyBag {
  const bag = new Map<string, PropertyValue>();
  for (const [key, value] of Object.entries(entries)) {
    if (value !== undefined) bag.set(key, value);
  }
  return bag;
}

/**
 * Merges bags left to right; a key already present is kept.
 */
export function mergePropertyBags(bags: Iterable<PropertyBag>): PropertyBag {
  const merged = new Map<string, PropertyValue>();
  for (const bag of bags) {
    for (const [key, value] of bag) {
      if (!merged.has(key)) merged.set(key, value);
    }
  }
  return merged;
}

/**
 * Human-readable rendering of a single value, used in debug logs.
 */
export function describeValue(value: PropertyValue): string {
  switch (value.kind) {
    case 'int':
      return `${value.value.toString()}i`;
    case 'double':
      return `${value.value}d`;
    case 'bool':
      return value.value ? 'true' : 'false';
    case 'string':
      return JSON.stringify(value.value);
    default: {
      const unreachable: never = value;
      return String(unreachable);
    }
  }
}
