/**
 * Metric catalog.
 * The parameter schema of every metric the engine can report and which
 * analysis types require it. Gap detection and prediction read their
 * dependency information from here.
 */

import { PARAMETER_SCHEMAS } from '../reference/parameters.js';
import type { AnalysisType, MetricName, ParameterName } from '../types/common.js';
import { CIRCULARITY_FALLBACK_INPUTS, CIRCULARITY_FORMULAS } from './CircularityCalculator.js';
import { ENVIRONMENTAL_FALLBACK_INPUTS, LCA_FORMULAS } from './MetricCalculator.js';
import type { PredictorAdapter } from './PredictorAdapter.js';

export type ScoreRole = 'environmental' | 'circularity';

export type MetricDefinition =
  | {
      kind: 'lca' | 'circularity';
      name: MetricName;
      unit: string;
      inputs: readonly ParameterName[];
    }
  | {
      kind: 'score';
      name: MetricName;
      unit: string;
      role: ScoreRole;
      /** Registered model for the role, or `null` when only the fallback exists. */
      predictor: string | null;
      /** Model features plus fallback inputs, so the fallback can always run. */
      inputs: readonly ParameterName[];
    };

const ENVIRONMENTAL_METRICS: readonly MetricName[] = [
  'carbon_footprint_production',
  'carbon_footprint_transport',
  'carbon_footprint_end_of_life',
  'carbon_footprint_total',
  'energy_intensity',
  'water_use_efficiency',
  'environmental_score',
];

const CIRCULARITY_METRICS: readonly MetricName[] = [
  'cmur',
  'material_recovery_rate',
  'circularity_index',
  'circularity_score',
];

const REQUIRED_METRICS: Record<AnalysisType, readonly MetricName[]> = {
  environmental: ENVIRONMENTAL_METRICS,
  circularity: CIRCULARITY_METRICS,
  comprehensive: [...ENVIRONMENTAL_METRICS, ...CIRCULARITY_METRICS],
};

/** Reported only when their inputs were supplied; never gap-filled. */
const SUPPLEMENTARY_METRICS: readonly MetricName[] = ['waste_generation_rate'];

export class MetricCatalog {
  private readonly definitions: ReadonlyMap<MetricName, MetricDefinition>;

  constructor(adapter: PredictorAdapter) {
    const map = new Map<MetricName, MetricDefinition>();
    for (const f of LCA_FORMULAS) map.set(f.name, { kind: 'lca', ...f });
    for (const f of CIRCULARITY_FORMULAS) map.set(f.name, { kind: 'circularity', ...f });

    const scores: Array<[MetricName, ScoreRole, readonly ParameterName[]]> = [
      ['environmental_score', 'environmental', ENVIRONMENTAL_FALLBACK_INPUTS],
      ['circularity_score', 'circularity', CIRCULARITY_FALLBACK_INPUTS],
    ];
    for (const [name, role, fallbackInputs] of scores) {
      const predictor = adapter.findByRole(role);
      const modelInputs = predictor ? adapter.featureParameters(predictor.name) : [];
      map.set(name, {
        kind: 'score',
        name,
        unit: 'score',
        role,
        predictor: predictor?.name ?? null,
        inputs: inDeclarationOrder([...modelInputs, ...fallbackInputs]),
      });
    }

    this.definitions = map;
  }

  get(name: MetricName): MetricDefinition {
    const def = this.definitions.get(name);
    if (!def) throw new Error(`Unknown metric: ${name}`);
    return def;
  }

  /** Metrics an analysis type must report. */
  requiredMetrics(type: AnalysisType): MetricDefinition[] {
    return REQUIRED_METRICS[type].map((m) => this.get(m));
  }

  supplementaryMetrics(): MetricDefinition[] {
    return SUPPLEMENTARY_METRICS.map((m) => this.get(m));
  }

  /** Every parameter a required metric reads, in declaration order. */
  requiredParameters(type: AnalysisType): ParameterName[] {
    return inDeclarationOrder(this.requiredMetrics(type).flatMap((m) => [...m.inputs]));
  }

  /** Required metrics of the analysis that read `parameter`. */
  dependents(parameter: ParameterName, type: AnalysisType): MetricName[] {
    return this.requiredMetrics(type)
      .filter((m) => m.inputs.includes(parameter))
      .map((m) => m.name);
  }
}

function inDeclarationOrder(names: readonly ParameterName[]): ParameterName[] {
  return PARAMETER_SCHEMAS.map((s) => s.name).filter((n) => names.includes(n));
}
