/**
 * Statistical predictor capability interface.
 * Wraps opaque, pre-trained scoring functions (local artifacts or a remote
 * scoring service). Implementations must be safe to evaluate concurrently:
 * no mutation of model state during `predict`.
 */

import type { ParameterName } from '../types/common.js';

/**
 * What a predictor is for.
 * - environmental: composite environmental-impact score (0–100)
 * - circularity: composite circularity score (0–100)
 * - classifier: categorical parameter (e.g. material class)
 * - estimator: numeric process parameter
 */
export type PredictorRole = 'environmental' | 'circularity' | 'classifier' | 'estimator';

export interface ScalarPrediction {
  kind: 'scalar';
  value: number;
  /** Self-reported reliability in [0, 1], when the model reports one. */
  score: number | null;
}

export interface LabelPrediction {
  kind: 'label';
  label: string;
  classIndex: number;
  score: number | null;
}

export type PredictorOutput = ScalarPrediction | LabelPrediction;

export interface PredictorDescriptor {
  name: string;
  version: string;
  role: PredictorRole;
  /** Feature names, in vector order. `param` or one-hot `param=value`. */
  features: readonly string[];
  /** Parameter estimated by an estimator or classifier. */
  target: ParameterName | null;
  /** Restricts an estimator to one material; `null` applies to any. */
  material: string | null;
}

export interface IPredictor {
  readonly descriptor: PredictorDescriptor;

  /** Score one feature vector. Rejects when the vector has the wrong shape. */
  predict(features: readonly number[]): Promise<PredictorOutput>;
}
