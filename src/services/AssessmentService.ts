/**
 * Overall assessment and improvement recommendations for a finished analysis.
 * Reads resolved parameters and metrics only; never estimates anything.
 */

import type { AnalysisType, MetricName, ParameterName } from '../types/common.js';
import type {
  MetricValue,
  OverallAssessment,
  OverallRating,
  Recommendation,
  ResolvedParameter,
} from '../types/models.js';

export const RENEWABLE_TARGET_PERCENT = 50;
export const RECYCLING_TARGET = 0.9;
export const TRANSPORT_DISTANCE_LIMIT_KM = 300;

type ResolvedParameters = Partial<Record<ParameterName, ResolvedParameter>>;
type Metrics = Partial<Record<MetricName, MetricValue>>;

export class AssessmentService {
  assess(
    analysisType: AnalysisType,
    parameters: ResolvedParameters,
    metrics: Metrics,
    required: readonly ParameterName[]
  ): OverallAssessment {
    const components: number[] = [];
    if (analysisType !== 'circularity' && metrics.environmental_score) {
      components.push(metrics.environmental_score.value);
    }
    if (analysisType !== 'environmental' && metrics.circularity_index) {
      components.push(100 * metrics.circularity_index.value);
    }
    const overallScore = components.length > 0
      ? round1(components.reduce((sum, c) => sum + c, 0) / components.length)
      : 0;

    const measured = required.filter((p) => parameters[p]?.source === 'measured').length;
    const dataQualityScore = required.length > 0 ? round1((100 * measured) / required.length) : 100;

    return { overallScore, rating: ratingOf(overallScore), dataQualityScore };
  }

  recommend(parameters: ResolvedParameters): Recommendation[] {
    const out: Recommendation[] = [];

    const renewable = numeric(parameters.renewable_energy_percent);
    if (renewable !== null && renewable < RENEWABLE_TARGET_PERCENT) {
      out.push({
        priority: 'High',
        category: 'energy',
        action: `Increase renewable energy share from ${Math.round(renewable)}% to ${RENEWABLE_TARGET_PERCENT}%`,
        impact: 'Lower electricity emissions in production',
      });
    }

    const recycling = numeric(parameters.recycling_rate);
    if (recycling !== null && recycling < RECYCLING_TARGET) {
      out.push({
        priority: 'Medium',
        category: 'waste',
        action: `Raise recycling rate from ${Math.round(recycling * 100)}% to ${RECYCLING_TARGET * 100}%`,
        impact: 'Lower primary-material and end-of-life emissions',
      });
    }

    const distance = numeric(parameters.transport_distance);
    if (distance !== null && distance > TRANSPORT_DISTANCE_LIMIT_KM) {
      out.push({
        priority: 'Medium',
        category: 'transport',
        action: `Shorten the ${Math.round(distance)} km haul or move it from road to rail`,
        impact: 'Lower transport emissions',
      });
    }

    for (const [name, resolved] of Object.entries(parameters)) {
      if (!resolved || resolved.source !== 'predicted' || !resolved.lowConfidence) continue;
      out.push({
        priority: 'Low',
        category: 'data_quality',
        action: `Measure ${name} directly`,
        impact: `Replaces an estimate with confidence ${(resolved.confidence ?? 0).toFixed(2)}`,
      });
    }

    return out;
  }
}

export function ratingOf(score: number): OverallRating {
  if (score >= 80) return 'Excellent';
  if (score >= 60) return 'Good';
  if (score >= 40) return 'Fair';
  return 'Poor';
}

function numeric(p: ResolvedParameter | undefined): number | null {
  return p && typeof p.value === 'number' ? p.value : null;
}

function round1(x: number): number {
  return Math.round(x * 10) / 10;
}
