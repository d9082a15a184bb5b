/**
 * Material-property reference tables.
 * Loaded once from a versioned JSON file, checked, and frozen. Nothing mutates
 * them at runtime; every service reads the same instance.
 */

import { readFile } from 'node:fs/promises';
import type { ParameterName, ParameterValue } from '../types/common.js';
import { ValidationError, type FieldViolation } from '../errors.js';
import { isParameterName } from './parameters.js';
import { deepFreeze } from '../utils/freeze.js';

export interface TypicalValue {
  value: number;
  confidence: number;
  /** When set, `value` is per unit of this parameter (e.g. kWh per tonne). */
  perUnitOf?: ParameterName;
}

export interface MaterialProfile {
  /** kg CO2e per tonne of primary (virgin) material. */
  primaryEmissionFactor: number;
  /** Share of the primary footprint avoided per unit of recycled input. */
  recycledCredit: number;
  /** kg CO2e per tonne not recycled at end of life. */
  endOfLifeFactor: number;
  /** Share of recycled flow actually recovered as usable material. */
  recoveryEfficiency: number;
  /** Carbon intensity (kg CO2e/t) at which the heuristic environmental score reaches 0. */
  carbonIntensityCeiling: number;
  /** Plausible energy intensity in kWh/t. */
  energyIntensityRange: [number, number];
  plausibleRanges: Partial<Record<ParameterName, [number, number]>>;
  typical: Partial<Record<ParameterName, TypicalValue>>;
}

export interface CircularityIndexWeights {
  version: string;
  recycling: number;
  recovery: number;
  renewable: number;
}

export interface ReferenceTables {
  version: string;
  /** kg CO2e per kWh of non-renewable grid electricity. */
  gridEmissionFactor: number;
  /** kg CO2e per tonne-kilometre. */
  transportEmissionFactor: number;
  circularityIndexWeights: CircularityIndexWeights;
  defaultConfidence: number;
  defaults: Partial<Record<ParameterName, ParameterValue>>;
  materials: Record<string, MaterialProfile>;
}

export async function loadReferenceTables(path: string): Promise<ReferenceTables> {
  const text = await readFile(path, 'utf8');
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    throw new ValidationError(`Reference tables at ${path} are not valid JSON`);
  }
  return parseReferenceTables(json);
}

export function parseReferenceTables(json: unknown): ReferenceTables {
  const errors: FieldViolation[] = [];

  if (!isRecord(json)) {
    throw new ValidationError('Reference tables must be a JSON object');
  }

  const version = typeof json.version === 'string' ? json.version : '';
  if (!version) errors.push({ field: 'version', reason: 'must be a non-empty string' });

  const gridEmissionFactor = readNumber(json, 'gridEmissionFactor', errors);
  const transportEmissionFactor = readNumber(json, 'transportEmissionFactor', errors);
  const defaultConfidence = readNumber(json, 'defaultConfidence', errors);
  if (defaultConfidence < 0 || defaultConfidence > 1) {
    errors.push({ field: 'defaultConfidence', reason: 'must be in [0, 1]' });
  }

  const weights = parseWeights(json.circularityIndexWeights, errors);
  const defaults = parseDefaults(json.defaults, errors);

  const materials: Record<string, MaterialProfile> = {};
  if (!isRecord(json.materials) || Object.keys(json.materials).length === 0) {
    errors.push({ field: 'materials', reason: 'must list at least one material' });
  } else {
    for (const [name, raw] of Object.entries(json.materials)) {
      const profile = parseMaterial(name, raw, errors);
      if (profile) materials[name.toLowerCase()] = profile;
    }
  }

  if (errors.length > 0) {
    throw ValidationError.fromViolations(errors);
  }

  return deepFreeze({
    version,
    gridEmissionFactor,
    transportEmissionFactor,
    circularityIndexWeights: weights,
    defaultConfidence,
    defaults,
    materials,
  });
}

export function getMaterialProfile(
  tables: ReferenceTables,
  material: ParameterValue | undefined
): MaterialProfile | null {
  if (typeof material !== 'string') return null;
  return tables.materials[material] ?? null;
}

// ── Parsing helpers ──

function parseWeights(raw: unknown, errors: FieldViolation[]): CircularityIndexWeights {
  if (!isRecord(raw)) {
    errors.push({ field: 'circularityIndexWeights', reason: 'must be an object' });
    return { version: '', recycling: 0, recovery: 0, renewable: 0 };
  }
  const weights: CircularityIndexWeights = {
    version: typeof raw.version === 'string' ? raw.version : '',
    recycling: readNumber(raw, 'recycling', errors, 'circularityIndexWeights.'),
    recovery: readNumber(raw, 'recovery', errors, 'circularityIndexWeights.'),
    renewable: readNumber(raw, 'renewable', errors, 'circularityIndexWeights.'),
  };
  const sum = weights.recycling + weights.recovery + weights.renewable;
  if (Math.abs(sum - 1) > 1e-9) {
    errors.push({ field: 'circularityIndexWeights', reason: `weights must sum to 1 (got ${sum})` });
  }
  return weights;
}

function parseDefaults(
  raw: unknown,
  errors: FieldViolation[]
): Partial<Record<ParameterName, ParameterValue>> {
  const defaults: Partial<Record<ParameterName, ParameterValue>> = {};
  if (!isRecord(raw)) {
    errors.push({ field: 'defaults', reason: 'must be an object' });
    return defaults;
  }
  for (const [key, value] of Object.entries(raw)) {
    if (!isParameterName(key)) {
      errors.push({ field: `defaults.${key}`, reason: 'unknown parameter' });
    } else if (typeof value === 'number' || typeof value === 'string') {
      defaults[key] = value;
    } else {
      errors.push({ field: `defaults.${key}`, reason: 'must be a number or string' });
    }
  }
  return defaults;
}

function parseMaterial(
  name: string,
  raw: unknown,
  errors: FieldViolation[]
): MaterialProfile | null {
  const prefix = `materials.${name}.`;
  if (!isRecord(raw)) {
    errors.push({ field: `materials.${name}`, reason: 'must be an object' });
    return null;
  }

  const plausibleRanges: Partial<Record<ParameterName, [number, number]>> = {};
  if (isRecord(raw.plausibleRanges)) {
    for (const [key, range] of Object.entries(raw.plausibleRanges)) {
      const parsed = parseRange(range);
      if (!isParameterName(key) || !parsed) {
        errors.push({ field: `${prefix}plausibleRanges.${key}`, reason: 'must be a known parameter with [min, max]' });
      } else {
        plausibleRanges[key] = parsed;
      }
    }
  }

  const typical: Partial<Record<ParameterName, TypicalValue>> = {};
  if (isRecord(raw.typical)) {
    for (const [key, entry] of Object.entries(raw.typical)) {
      const parsed = parseTypical(entry);
      if (!isParameterName(key) || !parsed) {
        errors.push({ field: `${prefix}typical.${key}`, reason: 'must be a known parameter with value and confidence in [0, 1]' });
      } else {
        typical[key] = parsed;
      }
    }
  }

  const energyIntensityRange = parseRange(raw.energyIntensityRange);
  if (!energyIntensityRange) {
    errors.push({ field: `${prefix}energyIntensityRange`, reason: 'must be [min, max]' });
  }

  return {
    primaryEmissionFactor: readNumber(raw, 'primaryEmissionFactor', errors, prefix),
    recycledCredit: readFraction(raw, 'recycledCredit', errors, prefix),
    endOfLifeFactor: readNumber(raw, 'endOfLifeFactor', errors, prefix),
    recoveryEfficiency: readFraction(raw, 'recoveryEfficiency', errors, prefix),
    carbonIntensityCeiling: readNumber(raw, 'carbonIntensityCeiling', errors, prefix),
    energyIntensityRange: energyIntensityRange ?? [0, 0],
    plausibleRanges,
    typical,
  };
}

function parseTypical(raw: unknown): TypicalValue | null {
  if (!isRecord(raw)) return null;
  const { value, confidence, perUnitOf } = raw;
  if (typeof value !== 'number' || typeof confidence !== 'number') return null;
  if (confidence < 0 || confidence > 1) return null;
  if (perUnitOf === undefined) return { value, confidence };
  if (typeof perUnitOf !== 'string' || !isParameterName(perUnitOf)) return null;
  return { value, confidence, perUnitOf };
}

function parseRange(raw: unknown): [number, number] | null {
  if (!Array.isArray(raw) || raw.length !== 2) return null;
  const [min, max] = raw;
  if (typeof min !== 'number' || typeof max !== 'number' || min > max) return null;
  return [min, max];
}

function readNumber(
  obj: Record<string, unknown>,
  key: string,
  errors: FieldViolation[],
  prefix = ''
): number {
  const value = obj[key];
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    errors.push({ field: `${prefix}${key}`, reason: 'must be a non-negative number' });
    return 0;
  }
  return value;
}

function readFraction(
  obj: Record<string, unknown>,
  key: string,
  errors: FieldViolation[],
  prefix: string
): number {
  const value = readNumber(obj, key, errors, prefix);
  if (value > 1) {
    errors.push({ field: `${prefix}${key}`, reason: 'must be at most 1' });
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
