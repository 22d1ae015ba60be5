/**
 * @file packages/shared/src/types.ts
 * @description Schemas and inferred types shared by the sensor tooling.
 */

import { z } from 'zod';
import {
  DEFAULT_INTERVAL_SECONDS,
  DEFAULT_SENSORS_ROOT,
  MAX_INTERVAL_SECONDS,
} from './constants.js';

// ─── Property Values ──────────────────────────────────────────

export const PropertyValueSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('int'), value: z.bigint() }),
  z.object({ kind: z.literal('double'), value: z.number() }),
  z.object({ kind: z.literal('bool'), value: z.boolean() }),
  z.object({ kind: z.literal('string'), value: z.string() }),
]);
export type PropertyValue = z.infer<typeof PropertyValueSchema>;
export type PropertyKind = PropertyValue['kind'];

/**
 * One sensor's properties, keyed by property name.
 * A missing key means the provider did not publish it.
 */
export type PropertyBag = ReadonlyMap<string, PropertyValue>;

// ─── Sensor View ──────────────────────────────────────────────

export const SensorStatusSchema = z.enum(['OK', 'Warning', 'Critical', 'Fatal', 'FAIL', 'N/A']);
export type SensorStatus = z.infer<typeof SensorStatusSchema>;

/** Result of the functional/availability gate. */
export type GateState = Extract<SensorStatus, 'OK' | 'FAIL' | 'N/A'>;

export const ThresholdKeySchema = z.enum([
  'CriticalLow',
  'CriticalHigh',
  'WarningLow',
  'WarningHigh',
  'FatalHigh',
]);
export type ThresholdKey = z.infer<typeof ThresholdKeySchema>;

export const AlarmKeySchema = z.enum([
  'CriticalAlarmLow',
  'CriticalAlarmHigh',
  'WarningAlarmLow',
  'WarningAlarmHigh',
  'FatalAlarmHigh',
]);
export type AlarmKey = z.infer<typeof AlarmKeySchema>;

export interface DerivedSensorView {
  readonly status: SensorStatus;
  readonly value: string;
  readonly unit: string;
  readonly thresholds: Readonly<Partial<Record<ThresholdKey, string>>>;
}

// ─── Enumeration ──────────────────────────────────────────────

/** service name -> interfaces it implements on that path */
export type SensorProviders = ReadonlyMap<string, readonly string[]>;

/** sensor path -> providers */
export type SensorTree = ReadonlyMap<string, SensorProviders>;

// ─── Configuration ────────────────────────────────────────────

export const LayoutNameSchema = z.enum(['basic', 'thresholds', 'full']);
export type LayoutName = z.infer<typeof LayoutNameSchema>;

export const LSensorsConfigSchema = z.object({
  sensorsRoot: z.string().startsWith('/').default(DEFAULT_SENSORS_ROOT),
  intervalSeconds: z
    .number()
    .int()
    .positive()
    .max(MAX_INTERVAL_SECONDS)
    .default(DEFAULT_INTERVAL_SECONDS),
  layout: LayoutNameSchema.default('basic'),
  busAddress: z.string().min(1).optional(),
  color: z.boolean().default(true),
});
export type LSensorsConfig = z.infer<typeof LSensorsConfigSchema>;
