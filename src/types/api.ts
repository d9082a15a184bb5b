/**
 * Engine operation shapes — inputs and outputs of the calls the boundary
 * layer makes. Decoupled from domain models so the contract can evolve
 * independently.
 */

import type { ParameterName, ParameterValue } from './common.js';
import type { EstimationMethod, ModelPerformance, TrackedGap } from './models.js';

// ── Requests ──

/** Raw, unvalidated process description as received from a caller. */
export type RawProcessInput = Record<string, unknown>;

export interface RecordFeedbackOptions {
  /** Predictor to credit; defaults to the parameter's estimator name. */
  predictorName?: string;
  /** When the actual value was observed. Part of the duplicate guard. */
  timestamp?: Date;
  gapId?: string;
}

// ── Responses ──

export interface PredictedValue {
  value: ParameterValue;
  confidence: number;
  source: 'predicted';
  method: EstimationMethod;
}

export type PredictMissingResponse = Partial<Record<ParameterName, PredictedValue>>;

export interface FieldPerformance {
  fieldName: ParameterName;
  gapCount: number;
  confirmedCount: number;
  avgConfidence: number | null;
}

export interface GapStatistics {
  totalGaps: number;
  confirmedGaps: number;
  pendingGaps: number;
  /** Percentage of tracked gaps confirmed by a user, 0–100. */
  confirmationRate: number;
  fieldPerformance: FieldPerformance[];
}

export interface RecordFeedbackResponse {
  performance: ModelPerformance;
  /** The actual value as normalized and stored. */
  actual: ParameterValue;
  /** False when the same feedback had already been applied. */
  applied: boolean;
}

export interface EngineHealth {
  status: 'ok' | 'degraded';
  referenceVersion: string;
  predictorsLoaded: string[];
  /** `null` when gap storage could not be reached. */
  totalGapsTracked: number | null;
}

export interface ConfirmGapResponse {
  gap: TrackedGap;
  performance: ModelPerformance;
}
