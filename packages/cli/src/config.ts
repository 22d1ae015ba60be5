/**
 * @file packages/cli/src/config.ts
 * @description Loads lsensors settings from `.env`, `lsensors.config.yaml` and the environment.
 */

import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { config as loadDotenv } from 'dotenv';
import { LSensorsConfigSchema, type LSensorsConfig } from '@lsensors/shared';
import { ConfigurationError } from './domain/errors/app-error.js';
export type { LSensorsConfig };

export const CONFIG_FILE_NAME = 'lsensors.config.yaml';

let cachedConfig: LSensorsConfig | null = null;

/**
 * Parses bool.
 * @param value - Value.
 * @returns The parse bool result.
 */
const parseBool = (value?: string): boolean | undefined => {
  if (value === undefined) return undefined;
  const normalized = value.toLowerCase().trim();
  if (['true', '1', 'yes', 'y', 'on'].includes(normalized)) return true;
  if (['false', '0', 'no', 'n', 'off'].includes(normalized)) return false;
  return undefined;
};

const parseNumber = (value?: string): number | undefined =>
  value === undefined || value.trim() === '' ? undefined : Number(value);

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Loads config.
 * @param projectRoot - Directory holding `.env` and `lsensors.config.yaml`.
 * @returns The validated configuration.
 */
export function loadConfig(projectRoot?: string): LSensorsConfig {
  if (cachedConfig) return cachedConfig;

  const root = projectRoot || process.cwd();

  const envPath = join(root, '.env');
  if (existsSync(envPath)) {
    loadDotenv({ path: envPath });
  }

  const configPath = join(root, CONFIG_FILE_NAME);
  let fileConfig: Record<string, unknown> = {};
  if (existsSync(configPath)) {
    let parsed: unknown;
    try {
      parsed = parseYaml(readFileSync(configPath, 'utf-8'));
    } catch (err) {
      throw new ConfigurationError(`Cannot parse ${CONFIG_FILE_NAME}: ${String(err)}`);
    }
    if (isRecord(parsed)) {
      fileConfig = parsed;
    } else if (parsed !== null && parsed !== undefined) {
      throw new ConfigurationError(`${CONFIG_FILE_NAME} must contain a mapping`);
    }
  }

  // File values win over the environment.
  const merged = {
    sensorsRoot: fileConfig.sensorsRoot ?? process.env.LSENSORS_SENSORS_ROOT,
    intervalSeconds: fileConfig.intervalSeconds ?? parseNumber(process.env.LSENSORS_INTERVAL),
    layout: fileConfig.layout ?? process.env.LSENSORS_LAYOUT,
    busAddress: fileConfig.busAddress ?? process.env.LSENSORS_BUS_ADDRESS,
    color: fileConfig.color ?? parseBool(process.env.LSENSORS_COLOR),
  };

  const result = LSensorsConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${issues}`);
  }

  cachedConfig = result.data;
  return cachedConfig;
}

/**
 * Resets config cache.
 */
export function resetConfigCache(): void {
  cachedConfig = null;
}
