/**
 * Property serialization for Neo4j
 *
 * Converts extractor output to storable values:
 * - Point3D -> [x, y, z]
 * - Dates -> ISO strings
 * - Homogeneous primitive arrays -> preserved
 * - Other objects -> JSON strings (Neo4j has no nested properties)
 * - undefined, null, NaN -> excluded
 */

import type { Point3D } from '../host/types.js';
import type { PropertyMap, PropertyValue } from './types.js';

export type PropertyInput = PropertyValue | Point3D | Date | null | undefined;

export function isPoint3D(value: unknown): value is Point3D {
  return (
    typeof value === 'object' &&
    value !== null &&
    'x' in value &&
    'y' in value &&
    'z' in value &&
    typeof value.x === 'number' &&
    typeof value.y === 'number' &&
    typeof value.z === 'number'
  );
}

export function serializeProperty(value: PropertyInput): PropertyValue | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (value instanceof Date) return value.toISOString();
  if (isPoint3D(value)) return [value.x, value.y, value.z];
  if (Array.isArray(value)) return value;
  return JSON.stringify(value);
}

export function serializeProperties(input: Record<string, PropertyInput>): PropertyMap {
  const serialized: PropertyMap = {};
  for (const [key, value] of Object.entries(input)) {
    const stored = serializeProperty(value);
    if (stored !== undefined) {
      serialized[key] = stored;
    }
  }
  return serialized;
}

/**
 * Order-independent fingerprint of a property map, used to detect
 * conflicting re-emissions of the same node.
 */
export function fingerprintProperties(properties: PropertyMap): string {
  const keys = Object.keys(properties).sort();
  return JSON.stringify(keys.map(key => [key, properties[key]]));
}
