/**
 * Typed reads from a process description for code that has already checked
 * the inputs are present. A miss here is a programming error, not bad input.
 */

import { getMaterialProfile, type MaterialProfile, type ReferenceTables } from '../reference/ReferenceTables.js';
import type { ParameterName, ParameterValue } from '../types/common.js';
import type { ProcessDescription } from '../types/models.js';

export function requireNumber(d: ProcessDescription, name: ParameterName): number {
  const value = d[name];
  if (typeof value !== 'number') {
    throw new Error(`Expected numeric "${name}" in process description`);
  }
  return value;
}

export function requireMaterial(tables: ReferenceTables, d: ProcessDescription): MaterialProfile {
  const profile = getMaterialProfile(tables, d.material);
  if (!profile) {
    throw new Error(`Expected a known material in process description, got "${String(d.material)}"`);
  }
  return profile;
}

export function hasAll(d: ProcessDescription, names: readonly ParameterName[]): boolean {
  return names.every((n) => d[n] !== undefined);
}

export function asNumber(value: ParameterValue | undefined): number | null {
  return typeof value === 'number' ? value : null;
}
