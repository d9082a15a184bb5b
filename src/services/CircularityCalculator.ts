/**
 * Circular-economy metrics.
 *
 * CMUR (Circular Material Use Rate) = recycled input mass / total input mass.
 * Total input mass is the production rate; recycled input mass is
 * production × recycling rate. Always bounded to [0, 1]; with zero input
 * mass the rate is 0 and flagged `undefined-input`.
 *
 * The composite circularity index weights recycling rate, material recovery
 * rate and renewable-energy share with the versioned weights in the
 * reference tables (ce-index-v1: 0.4 / 0.3 / 0.3).
 */

import type { ReferenceTables } from '../reference/ReferenceTables.js';
import type { MetricName } from '../types/common.js';
import type { ProcessDescription } from '../types/models.js';
import type { FormulaDefinition, MetricComputation } from './MetricCalculator.js';
import { requireMaterial, requireNumber } from './inputs.js';

export const CIRCULARITY_FORMULAS: readonly FormulaDefinition[] = [
  { name: 'cmur', unit: 'fraction', inputs: ['production_rate', 'recycling_rate'] },
  { name: 'material_recovery_rate', unit: 'fraction', inputs: ['material', 'recycling_rate'] },
  {
    name: 'circularity_index',
    unit: 'fraction',
    inputs: ['material', 'recycling_rate', 'renewable_energy_percent'],
  },
];

/** The heuristic circularity score reads exactly what the index reads. */
export const CIRCULARITY_FALLBACK_INPUTS = CIRCULARITY_FORMULAS[2].inputs;

export class CircularityCalculator {
  constructor(private readonly tables: ReferenceTables) {}

  calculate(name: MetricName, d: ProcessDescription): MetricComputation {
    switch (name) {
      case 'cmur':
        return this.cmur(d);
      case 'material_recovery_rate':
        return { value: this.materialRecoveryRate(d), flags: [] };
      case 'circularity_index':
        return { value: this.circularityIndex(d), flags: [] };
      default:
        throw new Error(`No circularity formula for metric "${name}"`);
    }
  }

  cmur(d: ProcessDescription): MetricComputation {
    const totalInput = requireNumber(d, 'production_rate');
    if (totalInput <= 0) {
      return { value: 0, flags: ['undefined-input'] };
    }
    const recycledInput = totalInput * requireNumber(d, 'recycling_rate');
    return { value: clamp01(recycledInput / totalInput), flags: [] };
  }

  materialRecoveryRate(d: ProcessDescription): number {
    const profile = requireMaterial(this.tables, d);
    return clamp01(requireNumber(d, 'recycling_rate') * profile.recoveryEfficiency);
  }

  circularityIndex(d: ProcessDescription): number {
    const w = this.tables.circularityIndexWeights;
    const recycling = clamp01(requireNumber(d, 'recycling_rate'));
    const recovery = this.materialRecoveryRate(d);
    const renewable = clamp01(requireNumber(d, 'renewable_energy_percent') / 100);
    return clamp01(w.recycling * recycling + w.recovery * recovery + w.renewable * renewable);
  }

  /** Heuristic circularity score (0–100) used when no model can score it. */
  circularityScoreFallback(d: ProcessDescription): MetricComputation {
    return { value: 100 * this.circularityIndex(d), flags: ['fallback'] };
  }
}

function clamp01(x: number): number {
  return Math.max(0, Math.min(1, x));
}
