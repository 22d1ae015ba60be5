/**
 * @file packages/shared/src/constants.ts
 * @description Well-known bus names, sensor interfaces, unit symbols and table layouts.
 */

import type { LayoutName, ThresholdKey } from './types.js';

// ─── lsensors Constants ───────────────────────────────────────

export const LSENSORS_VERSION = '0.1.0';

/** Sentinel printed for anything that cannot be shown. */
export const NOT_AVAILABLE = 'N/A';

/** Sentinel for a missing unit enumerant. */
export const UNKNOWN_UNIT = 'Unknown';

export const DEFAULT_SENSORS_ROOT = '/xyz/openbmc_project/sensors';

export const DEFAULT_INTERVAL_SECONDS = 2;

/** Longest interval a Node.js timer can hold, in whole seconds. */
export const MAX_INTERVAL_SECONDS = 2147483;

// ─── D-Bus ────────────────────────────────────────────────────

export const DBUS_NAMES = {
  mapperBus: 'xyz.openbmc_project.ObjectMapper',
  mapperPath: '/xyz/openbmc_project/object_mapper',
  mapperInterface: 'xyz.openbmc_project.ObjectMapper',
  propertiesInterface: 'org.freedesktop.DBus.Properties',
} as const;

export const SENSOR_VALUE_INTERFACE = 'xyz.openbmc_project.Sensor.Value';

/**
 * Interfaces whose properties make up one sensor's property bag.
 * Sensor.Value always comes first; later interfaces never override its keys.
 */
export const SENSOR_INTERFACES = [
  SENSOR_VALUE_INTERFACE,
  'xyz.openbmc_project.Sensor.Threshold.Warning',
  'xyz.openbmc_project.Sensor.Threshold.Critical',
  'xyz.openbmc_project.Sensor.Threshold.Fatal',
  'xyz.openbmc_project.State.Decorator.OperationalStatus',
  'xyz.openbmc_project.State.Decorator.Availability',
] as const;

/** Mapper errors that mean "nothing lives under this scope". */
export const NOT_FOUND_ERRORS: readonly string[] = [
  'xyz.openbmc_project.Common.Error.ResourceNotFound',
  'org.freedesktop.DBus.Error.FileNotFound',
];

// ─── Units ────────────────────────────────────────────────────

export const UNIT_SYMBOLS: ReadonlyMap<string, string> = new Map([
  ['Volts', 'V'],
  ['DegreesC', '°C'],
  ['Amperes', 'A'],
  ['RPMS', 'RPM'],
  ['Watts', 'W'],
  ['Joules', 'J'],
  ['Meters', 'm'],
  ['Percent', '%'],
]);

// ─── Table Layouts ────────────────────────────────────────────

export interface TableLayout {
  name: LayoutName;
  /** Width every numeric cell is fitted to. */
  numberWidth: number;
  thresholds: readonly ThresholdKey[];
}

export const TABLE_LAYOUTS: Readonly<Record<LayoutName, TableLayout>> = {
  basic: { name: 'basic', numberWidth: 9, thresholds: [] },
  thresholds: {
    name: 'thresholds',
    numberWidth: 8,
    thresholds: ['WarningLow', 'WarningHigh', 'CriticalLow', 'CriticalHigh'],
  },
  full: {
    name: 'full',
    numberWidth: 7,
    thresholds: ['WarningLow', 'WarningHigh', 'CriticalLow', 'CriticalHigh', 'FatalHigh'],
  },
};

export const THRESHOLD_TITLES: Readonly<Record<ThresholdKey, string>> = {
  WarningLow: 'WarnLo',
  WarningHigh: 'WarnHi',
  CriticalLow: 'CritLo',
  CriticalHigh: 'CritHi',
  FatalHigh: 'FatalHi',
};
