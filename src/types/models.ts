/**
 * Domain models — core entities as the engine understands them.
 * Decoupled from database row shapes.
 */

import type {
  AnalysisType,
  MetricName,
  ParameterName,
  ParameterValue,
} from './common.js';

// ── Process input ──

/** Normalized mapping of recognized parameter → value. Absent keys are missing. */
export type ProcessDescription = Readonly<Partial<Record<ParameterName, ParameterValue>>>;

export type Provenance = 'measured' | 'computed' | 'predicted';

export type EstimationMethod = 'model' | 'heuristic' | 'default';

export interface ParameterEstimate {
  parameter: ParameterName;
  value: ParameterValue;
  confidence: number;
  source: 'predicted';
  method: EstimationMethod;
  /** Name of the predictor that produced the value, when a model did. */
  predictor: string | null;
  /** Parameters this estimate was built on that were themselves predicted. */
  basedOn: ParameterName[];
}

export type ParameterEstimates = Partial<Record<ParameterName, ParameterEstimate>>;

export interface ResolvedParameter {
  value: ParameterValue;
  source: 'measured' | 'predicted';
  confidence: number | null;
  method: EstimationMethod | null;
  lowConfidence: boolean;
}

// ── Gaps ──

export type GapCategory = 'missing' | 'out_of_range' | 'inconsistent';

export type PriorityLevel = 'high' | 'medium' | 'low';

export interface DataGap {
  parameter: ParameterName;
  materialType: string | null;
  category: GapCategory;
  priority: PriorityLevel;
  /** Metrics of the analysis that read this parameter. */
  dependents: MetricName[];
  /** Position in the parameter declaration order; breaks priority ties. */
  declarationIndex: number;
  observedValue: ParameterValue | null;
  reason: string;
}

export type GapStatus = 'pending' | 'confirmed';

/** A gap as persisted for later confirmation. */
export interface TrackedGap {
  id: string;
  parameter: ParameterName;
  materialType: string | null;
  analysisType: AnalysisType;
  category: GapCategory;
  priority: PriorityLevel;
  dependentCount: number;
  observedValue: ParameterValue | null;
  predictedValue: ParameterValue | null;
  confidence: number | null;
  method: EstimationMethod | null;
  /** Model that produced the estimate, when one did. */
  predictorName: string | null;
  status: GapStatus;
  actualValue: ParameterValue | null;
  reason: string;
  createdAt: Date;
  confirmedAt: Date | null;
}

// ── Metrics & results ──

export type MetricFlag = 'undefined-input' | 'fallback';

export interface MetricValue {
  value: number;
  unit: string;
  source: Provenance;
  /** Present only when source is `predicted`. */
  confidence: number | null;
  lowConfidence: boolean;
  flags: MetricFlag[];
  /** Predictor that scored this metric, when one did. */
  predictor: string | null;
}

export type OverallRating = 'Excellent' | 'Good' | 'Fair' | 'Poor';

export interface OverallAssessment {
  overallScore: number;
  rating: OverallRating;
  /** Share of required parameters that were measured, 0–100. */
  dataQualityScore: number;
}

export type RecommendationPriority = 'High' | 'Medium' | 'Low';

export type RecommendationCategory =
  | 'energy'
  | 'waste'
  | 'transport'
  | 'data_quality';

export interface Recommendation {
  priority: RecommendationPriority;
  category: RecommendationCategory;
  action: string;
  impact: string;
}

export interface AnalysisResult {
  analysisType: AnalysisType;
  referenceVersion: string;
  parameters: Partial<Record<ParameterName, ResolvedParameter>>;
  metrics: Partial<Record<MetricName, MetricValue>>;
  gaps: DataGap[];
  /** Storage ids of persisted gaps, keyed by parameter. */
  trackedGapIds: Partial<Record<ParameterName, string>>;
  lowConfidenceMetrics: MetricName[];
  assessment: OverallAssessment;
  recommendations: Recommendation[];
  completedAt: Date;
}

// ── Feedback ──

export type TrendDirection = 'improving' | 'declining' | 'stable';

export interface ModelPerformance {
  predictorName: string;
  sampleCount: number;
  meanAccuracy: number;
  accuracyVariance: number;
  meanAbsoluteError: number;
  /** Exponentially weighted accuracy of recent samples. */
  recentAccuracy: number;
  trend: TrendDirection;
  updatedAt: Date | null;
}
