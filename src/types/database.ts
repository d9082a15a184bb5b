/**
 * Database row types — mirror the Supabase table schemas.
 * Kept separate so storage can evolve independently of domain models.
 * Column names use snake_case to match PostgreSQL conventions.
 * Parameter values are stored as text alongside their kind so numeric and
 * categorical values share one column.
 */

import type { AnalysisType, ParameterName } from './common.js';
import type { EstimationMethod, GapCategory, GapStatus, PriorityLevel, TrendDirection } from './models.js';

export type ValueKind = 'numeric' | 'categorical';

export interface DataGapRow {
  id: string;
  parameter: ParameterName;
  material_type: string | null;
  analysis_type: AnalysisType;
  category: GapCategory;
  priority: PriorityLevel;
  dependent_count: number;
  value_kind: ValueKind;
  observed_value: string | null;
  predicted_value: string | null;
  confidence_score: number | null;
  method: EstimationMethod | null;
  predictor_name: string | null;
  status: GapStatus;
  actual_value: string | null;
  reason: string;
  created_at: string;
  confirmed_at: string | null;
}

export interface PredictionFeedbackRow {
  id: string;
  parameter: ParameterName;
  predictor_name: string;
  value_kind: ValueKind;
  predicted_value: string;
  actual_value: string;
  accuracy: number;
  fingerprint: string;
  gap_id: string | null;
  recorded_at: string;
}

export interface ModelPerformanceRow {
  predictor_name: string;
  sample_count: number;
  mean_accuracy: number;
  accuracy_variance: number;
  mean_absolute_error: number;
  recent_accuracy: number;
  trend: TrendDirection;
  updated_at: string;
}

/** Per-parameter aggregate over tracked gaps. */
export interface GapFieldStatsRow {
  parameter: ParameterName;
  gap_count: number;
  confirmed_count: number;
  avg_confidence: number | null;
}
