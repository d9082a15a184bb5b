/**
 * Prediction feedback persistence interface.
 * Feedback records are append-only.
 */

import type { ParameterName, ParameterValue } from '../types/common.js';
import type { PredictionFeedbackRow } from '../types/database.js';

export interface CreateFeedbackInput {
  parameter: ParameterName;
  predictorName: string;
  predicted: ParameterValue;
  actual: ParameterValue;
  accuracy: number;
  fingerprint: string;
  gapId: string | null;
  recordedAt: Date;
}

export interface IPredictionFeedbackRepository {
  insert(input: CreateFeedbackInput): Promise<PredictionFeedbackRow>;

  /** Look up an already-recorded piece of feedback by its fingerprint. */
  findByFingerprint(fingerprint: string): Promise<PredictionFeedbackRow | null>;
}
