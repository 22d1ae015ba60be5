/**
 * @file packages/cli/src/cli/options.ts
 * @description Argument parsers for the lsensors command line.
 */

import { InvalidArgumentError } from 'commander';
import {
  LayoutNameSchema,
  MAX_INTERVAL_SECONDS,
  isValidSensorType,
  type LayoutName,
} from '@lsensors/shared';
import { ConfigurationError } from '../domain/errors/app-error.js';

/**
 * Parses `--interval`: a positive whole number of seconds that fits a timer.
 */
export function parseInterval(value: string): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed) || Number(trimmed) <= 0) {
    throw new InvalidArgumentError('Interval must be a positive integer number of seconds.');
  }
  if (Number(trimmed) > MAX_INTERVAL_SECONDS) {
    throw new InvalidArgumentError(`Interval must not exceed ${MAX_INTERVAL_SECONDS} seconds.`);
  }
  return Number(trimmed);
}

export function parseLayout(value: string): LayoutName {
  const result = LayoutNameSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidArgumentError(`Layout must be one of: ${LayoutNameSchema.options.join(', ')}.`);
  }
  return result.data;
}

/**
 * Accumulates repeated `--sensor` flags, each possibly comma-separated.
 */
export function collectSensorNames(value: string, previous: string[] = []): string[] {
  const names = value
    .split(',')
    .map((name) => name.trim())
    .filter(Boolean);
  return [...previous, ...names];
}

/**
 * @throws ConfigurationError for anything but letters, digits and `_`
 */
export function validateSensorType(type: string | undefined): string | undefined {
  if (type === undefined) return undefined;
  if (!isValidSensorType(type)) {
    throw new ConfigurationError('Invalid sensor type is specified!');
  }
  return type;
}
