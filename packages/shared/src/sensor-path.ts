/**
 * @file packages/shared/src/sensor-path.ts
 * @description Helpers for `/…/<type>/<name>` sensor object paths.
 */

/**
 * Type segment of a sensor path: the segment right before the last `/`.
 * Returns an empty string for paths with fewer than two segments.
 */
export function sensorType(path: string): string {
  const namePos = path.lastIndexOf('/');
  if (namePos <= 0) return '';
  const typePos = path.lastIndexOf('/', namePos - 1);
  return path.slice(typePos + 1, namePos);
}

/**
 * Final segment of a sensor path.
 */
export function sensorName(path: string): string {
  return path.slice(path.lastIndexOf('/') + 1);
}

/**
 * Appends a type filter to a root scope.
 */
export function scopeFor(root: string, type?: string): string {
  const base = root.endsWith('/') ? root.slice(0, -1) : root;
  return type ? `${base}/${type}` : base;
}

const SENSOR_TYPE_PATTERN = /^[A-Za-z0-9_]+$/;

export function isValidSensorType(type: string): boolean {
  return SENSOR_TYPE_PATTERN.test(type);
}
