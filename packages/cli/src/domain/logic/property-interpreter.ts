/**
 * @file packages/cli/src/domain/logic/property-interpreter.ts
 * @description Turns a raw sensor property bag into a display-ready view.
 */

import {
  NOT_AVAILABLE,
  ThresholdKeySchema,
  UNIT_SYMBOLS,
  UNKNOWN_UNIT,
  type AlarmKey,
  type DerivedSensorView,
  type GateState,
  type PropertyBag,
  type PropertyValue,
  type SensorStatus,
  type ThresholdKey,
} from '@lsensors/shared';

export interface InterpretOptions {
  /** Fit every numeric string to this many characters. */
  width?: number;
  /** Threshold keys to format. Defaults to all of them. */
  thresholds?: readonly ThresholdKey[];
}

const ALL_THRESHOLDS: readonly ThresholdKey[] = ThresholdKeySchema.options;

// Highest priority first.
const ALARM_TIERS: ReadonlyArray<{ status: SensorStatus; keys: readonly AlarmKey[] }> = [
  { status: 'Fatal', keys: ['FatalAlarmHigh'] },
  { status: 'Critical', keys: ['CriticalAlarmLow', 'CriticalAlarmHigh'] },
  { status: 'Warning', keys: ['WarningAlarmLow', 'WarningAlarmHigh'] },
];

/**
 * Reads a boolean property. Absent or non-boolean values give `undefined`.
 */
function readFlag(bag: PropertyBag, key: string): boolean | undefined {
  const prop = bag.get(key);
  return prop?.kind === 'bool' ? prop.value : undefined;
}

/**
 * Functional/availability gate. `FAIL` wins over `N/A`.
 */
export function availabilityGate(bag: PropertyBag): GateState {
  if (readFlag(bag, 'Functional') === false) return 'FAIL';
  if (readFlag(bag, 'Available') === false) return 'N/A';
  return 'OK';
}

/**
 * Status from the alarm flags alone, ignoring the gate.
 */
export function alarmStatus(bag: PropertyBag): SensorStatus {
  for (const tier of ALARM_TIERS) {
    if (tier.keys.some((key) => readFlag(bag, key) === true)) return tier.status;
  }
  return 'OK';
}

/**
 * Decimal exponent from `Scale`; 0 when absent or not numeric.
 */
export function scaleExponent(bag: PropertyBag): number {
  const scale = bag.get('Scale');
  if (!scale) return 0;
  switch (scale.kind) {
    case 'int':
      return Number(scale.value);
    case 'double':
      return Number.isFinite(scale.value) ? Math.trunc(scale.value) : 0;
    case 'bool':
    case 'string':
      return 0;
    default: {
      const unreachable: never = scale;
      return unreachable;
    }
  }
}

function applyScale(raw: bigint, exponent: number): number {
  const n = Number(raw);
  // Dividing keeps 12345e-2 at exactly 123.45.
  return exponent < 0 ? n / 10 ** -exponent : n * 10 ** exponent;
}

function formatMagnitude(n: number): string {
  if (Number.isNaN(n)) return NOT_AVAILABLE;
  if (Math.abs(n) < 1000) return n.toFixed(3);
  // Number#toString switches to exponent notation from 1e21.
  return Number.isFinite(n) ? BigInt(Math.trunc(n)).toString() : n.toString();
}

/**
 * Formats one reading or threshold.
 *
 * Integers are raw and get scaled by `10^exponent`; doubles are already
 * scaled. Magnitudes under 1000 get three decimals, the rest none.
 */
export function formatReading(value: PropertyValue | undefined, exponent: number): string {
  if (!value) return NOT_AVAILABLE;
  switch (value.kind) {
    case 'int':
      return formatMagnitude(applyScale(value.value, exponent));
    case 'double':
      return formatMagnitude(value.value);
    case 'bool':
    case 'string':
      return NOT_AVAILABLE;
    default: {
      const unreachable: never = value;
      return unreachable;
    }
  }
}

/**
 * Right-pads or truncates to exactly `width` characters.
 */
export function fitWidth(text: string, width: number): string {
  return text.padEnd(width).slice(0, width);
}

/**
 * Maps the `Unit` enumerant (`….Unit.DegreesC`) to its display symbol.
 * Unknown enumerants pass through by their last segment.
 */
export function unitSymbol(bag: PropertyBag): string {
  const unit = bag.get('Unit');
  if (unit?.kind !== 'string' || unit.value === '') return UNKNOWN_UNIT;
  const segment = unit.value.slice(unit.value.lastIndexOf('.') + 1);
  return UNIT_SYMBOLS.get(segment) ?? segment;
}

/**
 * Derives the full view of one sensor. Never throws: missing or mistyped
 * properties come out as `N/A` or `Unknown`.
 */
export function deriveSensorView(
  bag: PropertyBag,
  options: InterpretOptions = {},
): DerivedSensorView {
  const fit = (text: string): string =>
    options.width === undefined ? text : fitWidth(text, options.width);

  const gate = availabilityGate(bag);
  const exponent = scaleExponent(bag);

  const thresholds: Partial<Record<ThresholdKey, string>> = {};
  for (const key of options.thresholds ?? ALL_THRESHOLDS) {
    thresholds[key] = fit(formatReading(bag.get(key), exponent));
  }

  return Object.freeze({
    status: gate === 'OK' ? alarmStatus(bag) : gate,
    value: fit(gate === 'OK' ? formatReading(bag.get('Value'), exponent) : NOT_AVAILABLE),
    unit: unitSymbol(bag),
    thresholds: Object.freeze(thresholds),
  });
}
