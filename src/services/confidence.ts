/**
 * Confidence scoring for estimated values.
 *
 * A model's own score is capped at MODEL_CONFIDENCE_CAP. Any estimate built
 * on inputs that were themselves estimated loses up to half its confidence
 * in proportion to the share of such inputs, and can never exceed
 * DERIVATION_DISCOUNT × the weakest of them. Confidence therefore never
 * rises along a chain of estimates.
 */

import type { ParameterName } from '../types/common.js';
import type { ParameterEstimates } from '../types/models.js';

export const MODEL_CONFIDENCE_CAP = 0.95;

/** Used when a model reports no score of its own. */
export const UNSCORED_MODEL_CONFIDENCE = 0.6;

export const PREDICTED_INPUT_PENALTY = 0.5;

export const DERIVATION_DISCOUNT = 0.9;

/** Confidence of a composite score produced by the heuristic fallback. */
export const HEURISTIC_METRIC_CONFIDENCE = 0.5;

export function clampConfidence(c: number): number {
  if (!Number.isFinite(c)) return 0;
  return Math.max(0, Math.min(1, c));
}

/**
 * Discount a base confidence by the estimated inputs it was built on.
 * `inputCount` is the number of distinct inputs read; `predictedInputs`
 * holds the confidence of each one that was estimated.
 */
export function discountForPredictedInputs(
  base: number,
  inputCount: number,
  predictedInputs: readonly number[]
): number {
  let c = clampConfidence(base);
  if (predictedInputs.length === 0 || inputCount <= 0) return c;

  const share = Math.min(1, predictedInputs.length / inputCount);
  c *= 1 - PREDICTED_INPUT_PENALTY * share;
  c = Math.min(c, DERIVATION_DISCOUNT * Math.min(...predictedInputs));
  return clampConfidence(c);
}

export function modelConfidence(
  score: number | null,
  inputCount: number,
  predictedInputs: readonly number[]
): number {
  const base = Math.min(score ?? UNSCORED_MODEL_CONFIDENCE, MODEL_CONFIDENCE_CAP);
  return discountForPredictedInputs(base, inputCount, predictedInputs);
}

/** Confidence of a deterministic metric computed from estimated inputs. */
export function derivedConfidence(predictedInputs: readonly number[]): number {
  if (predictedInputs.length === 0) return 1;
  return clampConfidence(DERIVATION_DISCOUNT * Math.min(...predictedInputs));
}

/** Confidences of the listed parameters that were estimated. */
export function confidencesOf(parameters: readonly ParameterName[], estimates: ParameterEstimates): number[] {
  const out: number[] = [];
  for (const p of parameters) {
    const estimate = estimates[p];
    if (estimate) out.push(estimate.confidence);
  }
  return out;
}
