/**
 * Gap detector.
 * Classifies every parameter the analysis type needs as present-valid,
 * present-invalid or absent, and emits one DataGap per parameter that is not
 * present-valid. Pure and deterministic: the same description and analysis
 * type always produce the same gaps in the same order.
 */

import { declarationIndex } from '../reference/parameters.js';
import { getMaterialProfile, type MaterialProfile, type ReferenceTables } from '../reference/ReferenceTables.js';
import type { AnalysisType, ParameterName, ParameterValue } from '../types/common.js';
import type { DataGap, GapCategory, PriorityLevel, ProcessDescription } from '../types/models.js';
import { asNumber } from './inputs.js';
import type { MetricCatalog } from './MetricCatalog.js';

interface Classification {
  category: GapCategory;
  reason: string;
}

export class GapDetector {
  constructor(
    private readonly tables: ReferenceTables,
    private readonly catalog: MetricCatalog
  ) {}

  detect(d: ProcessDescription, analysisType: AnalysisType): DataGap[] {
    const profile = getMaterialProfile(this.tables, d.material);
    const material = typeof d.material === 'string' ? d.material : null;
    const gaps: DataGap[] = [];

    for (const parameter of this.catalog.requiredParameters(analysisType)) {
      const value = d[parameter];
      const classification = this.classify(parameter, value, d, profile);
      if (!classification) continue;

      const dependents = this.catalog.dependents(parameter, analysisType);
      gaps.push({
        parameter,
        materialType: material,
        category: classification.category,
        priority: priorityLevel(dependents.length),
        dependents,
        declarationIndex: declarationIndex(parameter),
        observedValue: value ?? null,
        reason: classification.reason,
      });
    }

    return gaps.sort(
      (a, b) => b.dependents.length - a.dependents.length || a.declarationIndex - b.declarationIndex
    );
  }

  private classify(
    parameter: ParameterName,
    value: ParameterValue | undefined,
    d: ProcessDescription,
    profile: MaterialProfile | null
  ): Classification | null {
    if (value === undefined) {
      return { category: 'missing', reason: 'not supplied' };
    }
    if (!profile || typeof value !== 'number') return null;

    const range = profile.plausibleRanges[parameter];
    if (range && (value < range[0] || value > range[1])) {
      return {
        category: 'out_of_range',
        reason: `${value} is outside the plausible range [${range[0]}, ${range[1]}] for ${String(d.material)}`,
      };
    }

    if (parameter === 'energy_use') {
      const production = asNumber(d.production_rate);
      if (production !== null && production > 0) {
        const intensity = value / production;
        const [min, max] = profile.energyIntensityRange;
        if (intensity < min || intensity > max) {
          return {
            category: 'inconsistent',
            reason: `energy intensity ${intensity.toFixed(1)} kWh/t is outside [${min}, ${max}] for ${String(d.material)}`,
          };
        }
      }
    }

    return null;
  }
}

export function priorityLevel(dependentCount: number): PriorityLevel {
  if (dependentCount >= 3) return 'high';
  if (dependentCount === 2) return 'medium';
  return 'low';
}
