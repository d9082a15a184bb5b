/**
 * Shared primitive types used across the engine.
 */

export type ParameterName =
  | 'material'
  | 'production_rate'
  | 'energy_use'
  | 'water_use'
  | 'transport_distance'
  | 'recycling_rate'
  | 'renewable_energy_percent'
  | 'waste_generation'
  | 'process_stage';

export type AnalysisType = 'environmental' | 'circularity' | 'comprehensive';

export const ANALYSIS_TYPES: readonly AnalysisType[] = [
  'environmental',
  'circularity',
  'comprehensive',
];

export type MetricName =
  | 'carbon_footprint_production'
  | 'carbon_footprint_transport'
  | 'carbon_footprint_end_of_life'
  | 'carbon_footprint_total'
  | 'energy_intensity'
  | 'water_use_efficiency'
  | 'waste_generation_rate'
  | 'cmur'
  | 'material_recovery_rate'
  | 'circularity_index'
  | 'environmental_score'
  | 'circularity_score';

export type ParameterValue = number | string;

// ── Parameter schema ──

interface BaseParameterSchema {
  name: ParameterName;
  description: string;
}

export interface NumericParameterSchema extends BaseParameterSchema {
  kind: 'numeric';
  unit: string;
  min: number;
  max: number;
  /** Distance outside [min, max] that is clamped instead of rejected. */
  clampTolerance: number;
  /** Mass, energy, volume or distance: never negative. */
  physical: boolean;
  /** Deviation that counts as a complete miss when scoring feedback. */
  accuracyScale?: number;
}

export interface CategoricalParameterSchema extends BaseParameterSchema {
  kind: 'categorical';
  /** Allowed values; `null` means the reference tables supply them. */
  options: readonly string[] | null;
}

export type ParameterSchema = NumericParameterSchema | CategoricalParameterSchema;

export interface PaginationOptions {
  limit: number;
  offset: number;
}
