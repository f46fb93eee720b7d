import type { ParameterValue } from '../../host/types.js';

/** Typed reads from a host parameter map; a value of another type reads as absent */

export function numberParameter(value: ParameterValue | undefined): number | undefined {
  return typeof value === 'number' ? value : undefined;
}

export function stringParameter(value: ParameterValue | undefined): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

export function booleanParameter(value: ParameterValue | undefined): boolean | undefined {
  return typeof value === 'boolean' ? value : undefined;
}
