import { describe, it, expect, beforeAll } from 'vitest';
import { ValidationError } from '../../src/errors.js';
import {
  getMaterialProfile,
  parseReferenceTables,
  type ReferenceTables,
} from '../../src/reference/ReferenceTables.js';
import { declarationIndex, getParameterSchema, isParameterName } from '../../src/reference/parameters.js';
import { loadTestTables } from '../mocks/fixtures.js';

function steelProfile(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    primaryEmissionFactor: 1900,
    recycledCredit: 0.7,
    endOfLifeFactor: 30,
    recoveryEfficiency: 0.9,
    carbonIntensityCeiling: 3000,
    energyIntensityRange: [1, 15000],
    plausibleRanges: { recycling_rate: [0.05, 0.98] },
    typical: { energy_use: { value: 5500, perUnitOf: 'production_rate', confidence: 0.55 } },
    ...overrides,
  };
}

function minimalTables(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    version: 'test-1',
    gridEmissionFactor: 0.5,
    transportEmissionFactor: 0.1,
    circularityIndexWeights: { version: 'w1', recycling: 0.5, recovery: 0.25, renewable: 0.25 },
    defaultConfidence: 0.2,
    defaults: { recycling_rate: 0.5 },
    materials: { Steel: steelProfile() },
    ...overrides,
  };
}

describe('ReferenceTables', () => {
  let tables: ReferenceTables;

  beforeAll(async () => {
    tables = await loadTestTables();
  });

  // --- loadReferenceTables() ---

  it('should load the shipped tables', () => {
    expect(tables.version).toBe('2025.1');
    expect(tables.circularityIndexWeights.version).toBe('ce-index-v1');
    expect(Object.keys(tables.materials)).toEqual(['aluminum', 'copper', 'steel', 'plastic', 'glass', 'paper']);
  });

  it('should freeze the loaded tables', () => {
    expect(Object.isFrozen(tables)).toBe(true);
    expect(Object.isFrozen(tables.materials.aluminum.typical)).toBe(true);
  });

  // --- parseReferenceTables() ---

  it('should lowercase material names', () => {
    const parsed = parseReferenceTables(minimalTables());
    expect(Object.keys(parsed.materials)).toEqual(['steel']);
    expect(parsed.materials.steel.typical.energy_use).toEqual({
      value: 5500,
      perUnitOf: 'production_rate',
      confidence: 0.55,
    });
  });

  it('should reject index weights that do not sum to 1', () => {
    const json = minimalTables({
      circularityIndexWeights: { version: 'w1', recycling: 0.5, recovery: 0.5, renewable: 0.5 },
    });
    try {
      parseReferenceTables(json);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      if (err instanceof ValidationError) {
        expect(err.violations.map((v) => v.field)).toEqual(['circularityIndexWeights']);
      }
    }
  });

  it('should collect every violation before throwing', () => {
    const json = minimalTables({ version: '', gridEmissionFactor: -1, defaults: { colour: 'red' } });
    try {
      parseReferenceTables(json);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      if (err instanceof ValidationError) {
        expect(err.violations.map((v) => v.field)).toEqual(['version', 'gridEmissionFactor', 'defaults.colour']);
      }
    }
  });

  it('should reject a typical value with confidence above 1', () => {
    const materials = {
      steel: steelProfile({ typical: { recycling_rate: { value: 0.6, confidence: 1.5 } } }),
    };
    expect(() => parseReferenceTables(minimalTables({ materials }))).toThrow(
      'materials.steel.typical.recycling_rate: must be a known parameter with value and confidence in [0, 1]'
    );
  });

  it('should reject a document that is not an object', () => {
    expect(() => parseReferenceTables([])).toThrow('Reference tables must be a JSON object');
  });

  // --- getMaterialProfile() ---

  it('should return null for an unknown or absent material', () => {
    expect(getMaterialProfile(tables, 'unobtainium')).toBeNull();
    expect(getMaterialProfile(tables, undefined)).toBeNull();
    expect(getMaterialProfile(tables, 42)).toBeNull();
  });

  it('should return the profile of a known material', () => {
    expect(getMaterialProfile(tables, 'aluminum')?.recoveryEfficiency).toBe(0.95);
  });
});

describe('parameter schemas', () => {
  it('should recognize only declared parameters', () => {
    expect(isParameterName('recycling_rate')).toBe(true);
    expect(isParameterName('colour')).toBe(false);
  });

  it('should keep declaration order', () => {
    expect(declarationIndex('material')).toBe(0);
    expect(declarationIndex('renewable_energy_percent')).toBe(6);
    expect(declarationIndex('process_stage')).toBe(8);
  });

  it('should describe numeric ranges', () => {
    const schema = getParameterSchema('renewable_energy_percent');
    expect(schema.kind).toBe('numeric');
    if (schema.kind === 'numeric') {
      expect([schema.min, schema.max, schema.clampTolerance]).toEqual([0, 100, 1]);
    }
  });
});
