/**
 * Deterministic life-cycle metrics.
 * Each formula reads a fixed, named subset of the process description. The
 * caller only invokes a formula once every input in its subset is known;
 * nothing here substitutes a default for a missing input.
 *
 * Carbon figures are kg CO2e. Emission factors come from the reference tables.
 */

import type { ReferenceTables } from '../reference/ReferenceTables.js';
import type { MetricName, ParameterName } from '../types/common.js';
import type { MetricFlag, ProcessDescription } from '../types/models.js';
import { requireMaterial, requireNumber } from './inputs.js';

export interface MetricComputation {
  value: number;
  flags: MetricFlag[];
}

export interface FormulaDefinition {
  name: MetricName;
  unit: string;
  inputs: readonly ParameterName[];
}

const PRODUCTION_INPUTS = [
  'material',
  'production_rate',
  'energy_use',
  'recycling_rate',
  'renewable_energy_percent',
] as const satisfies readonly ParameterName[];

const TRANSPORT_INPUTS = ['production_rate', 'transport_distance'] as const satisfies readonly ParameterName[];

const END_OF_LIFE_INPUTS = ['material', 'production_rate', 'recycling_rate'] as const satisfies readonly ParameterName[];

export const LCA_FORMULAS: readonly FormulaDefinition[] = [
  { name: 'carbon_footprint_production', unit: 'kg CO2e', inputs: PRODUCTION_INPUTS },
  { name: 'carbon_footprint_transport', unit: 'kg CO2e', inputs: TRANSPORT_INPUTS },
  { name: 'carbon_footprint_end_of_life', unit: 'kg CO2e', inputs: END_OF_LIFE_INPUTS },
  {
    name: 'carbon_footprint_total',
    unit: 'kg CO2e',
    inputs: union(PRODUCTION_INPUTS, TRANSPORT_INPUTS, END_OF_LIFE_INPUTS),
  },
  { name: 'energy_intensity', unit: 'kWh/t', inputs: ['energy_use', 'production_rate'] },
  { name: 'water_use_efficiency', unit: 't/m3', inputs: ['production_rate', 'water_use'] },
  { name: 'waste_generation_rate', unit: 't/t', inputs: ['waste_generation', 'production_rate'] },
];

/** Inputs of the heuristic environmental score used when no model can score it. */
export const ENVIRONMENTAL_FALLBACK_INPUTS = union(PRODUCTION_INPUTS, TRANSPORT_INPUTS, END_OF_LIFE_INPUTS);

export class MetricCalculator {
  constructor(private readonly tables: ReferenceTables) {}

  calculate(name: MetricName, d: ProcessDescription): MetricComputation {
    switch (name) {
      case 'carbon_footprint_production':
        return ok(this.carbonProduction(d));
      case 'carbon_footprint_transport':
        return ok(this.carbonTransport(d));
      case 'carbon_footprint_end_of_life':
        return ok(this.carbonEndOfLife(d));
      case 'carbon_footprint_total':
        return ok(this.carbonTotal(d));
      case 'energy_intensity':
        return ratio(requireNumber(d, 'energy_use'), requireNumber(d, 'production_rate'));
      case 'water_use_efficiency':
        // tonnes of product per cubic metre of water
        return ratio(requireNumber(d, 'production_rate'), requireNumber(d, 'water_use') / 1000);
      case 'waste_generation_rate':
        return ratio(requireNumber(d, 'waste_generation'), requireNumber(d, 'production_rate'));
      default:
        throw new Error(`No deterministic formula for metric "${name}"`);
    }
  }

  /** P·EF_primary·(1 − r·credit) + E·EF_grid·(1 − s/100) */
  carbonProduction(d: ProcessDescription): number {
    const profile = requireMaterial(this.tables, d);
    const production = requireNumber(d, 'production_rate');
    const recycling = requireNumber(d, 'recycling_rate');
    const energy = requireNumber(d, 'energy_use');
    const renewable = requireNumber(d, 'renewable_energy_percent');

    const material = production * profile.primaryEmissionFactor * (1 - recycling * profile.recycledCredit);
    const electricity = energy * this.tables.gridEmissionFactor * (1 - renewable / 100);
    return material + electricity;
  }

  /** P·d·EF_transport */
  carbonTransport(d: ProcessDescription): number {
    return (
      requireNumber(d, 'production_rate') *
      requireNumber(d, 'transport_distance') *
      this.tables.transportEmissionFactor
    );
  }

  /** P·(1 − r)·EF_eol */
  carbonEndOfLife(d: ProcessDescription): number {
    const profile = requireMaterial(this.tables, d);
    return requireNumber(d, 'production_rate') * (1 - requireNumber(d, 'recycling_rate')) * profile.endOfLifeFactor;
  }

  carbonTotal(d: ProcessDescription): number {
    return this.carbonProduction(d) + this.carbonTransport(d) + this.carbonEndOfLife(d);
  }

  /**
   * Heuristic environmental score (0–100): falls linearly from 100 at zero
   * carbon intensity to 0 at the material's intensity ceiling.
   */
  environmentalScoreFallback(d: ProcessDescription): MetricComputation {
    const profile = requireMaterial(this.tables, d);
    const intensity = ratio(this.carbonTotal(d), requireNumber(d, 'production_rate'));
    if (intensity.flags.includes('undefined-input')) {
      return { value: 0, flags: ['undefined-input', 'fallback'] };
    }
    const ceiling = profile.carbonIntensityCeiling;
    const score = ceiling > 0 ? 100 * Math.max(0, 1 - intensity.value / ceiling) : 0;
    return { value: score, flags: ['fallback'] };
  }
}

function ok(value: number): MetricComputation {
  return { value, flags: [] };
}

/** Division with a structurally-zero denominator reported as a flagged 0. */
export function ratio(numerator: number, denominator: number): MetricComputation {
  if (denominator === 0) {
    return { value: 0, flags: ['undefined-input'] };
  }
  return { value: numerator / denominator, flags: [] };
}

function union(...lists: ReadonlyArray<readonly ParameterName[]>): ParameterName[] {
  const out: ParameterName[] = [];
  for (const list of lists) {
    for (const name of list) {
      if (!out.includes(name)) out.push(name);
    }
  }
  return out;
}
