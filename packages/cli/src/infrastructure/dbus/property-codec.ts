/**
 * @file packages/cli/src/infrastructure/dbus/property-codec.ts
 * @description Decodes `a{sv}` property replies into tagged property values.
 */

import { z } from 'zod';
import type { PropertyBag, PropertyValue } from '@lsensors/shared';
import type { LoggerLike } from '../../logger.js';

// dbus-next hands variants back as `Variant { signature, value }`.
const VariantSchema = z.object({
  signature: z.string(),
  value: z.unknown(),
});

export const PropertiesReplySchema = z.record(z.string(), VariantSchema);

const INTEGER_SIGNATURES = new Set(['y', 'n', 'q', 'i', 'u', 'x', 't']);
const STRING_SIGNATURES = new Set(['s', 'o', 'g']);

/**
 * Decodes one variant. Returns `undefined` for signatures a sensor bag has
 * no use for (arrays, structs, nested variants) and for values that do not
 * match their signature.
 */
export function decodeVariant(signature: string, value: unknown): PropertyValue | undefined {
  if (INTEGER_SIGNATURES.has(signature)) {
    if (typeof value === 'bigint') return { kind: 'int', value };
    if (typeof value === 'number' && Number.isInteger(value)) {
      return { kind: 'int', value: BigInt(value) };
    }
    return undefined;
  }
  if (signature === 'd') {
    return typeof value === 'number' ? { kind: 'double', value } : undefined;
  }
  if (signature === 'b') {
    return typeof value === 'boolean' ? { kind: 'bool', value } : undefined;
  }
  if (STRING_SIGNATURES.has(signature)) {
    return typeof value === 'string' ? { kind: 'string', value } : undefined;
  }
  return undefined;
}

/**
 * Decodes a whole `GetAll` reply body entry.
 *
 * @throws z.ZodError when the reply is not a property dictionary
 */
export function decodeProperties(raw: unknown, logger?: LoggerLike): PropertyBag {
  const props = PropertiesReplySchema.parse(raw);
  const bag = new Map<string, PropertyValue>();
  for (const [name, variant] of Object.entries(props)) {
    const decoded = decodeVariant(variant.signature, variant.value);
    if (decoded) {
      bag.set(name, decoded);
    } else {
      logger?.debug({ name, signature: variant.signature }, 'Skipping unsupported property');
    }
  }
  return bag;
}
