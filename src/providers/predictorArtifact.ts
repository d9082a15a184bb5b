/**
 * Predictor artifact format.
 * An artifact is the serialized, versioned form of a trained scoring function.
 * The engine never trains; it only reads these and evaluates them.
 */

import type { FieldViolation } from '../errors.js';
import { ValidationError } from '../errors.js';
import { isParameterName } from '../reference/parameters.js';
import type { ParameterName } from '../types/common.js';
import type { PredictorRole } from './IPredictor.js';

const ROLES: readonly PredictorRole[] = ['environmental', 'circularity', 'classifier', 'estimator'];

interface BaseArtifact {
  name: string;
  version: string;
  role: PredictorRole;
  features: string[];
  target: ParameterName | null;
  material: string | null;
  /** Held-out score reported at training time (R² or accuracy). */
  score: number | null;
}

export interface LinearArtifact extends BaseArtifact {
  type: 'linear';
  intercept: number;
  coefficients: number[];
  outputRange: [number, number] | null;
}

export interface SoftmaxArtifact extends BaseArtifact {
  type: 'softmax';
  /** Label decoder: class index → label. */
  labels: string[];
  intercepts: number[];
  /** One weight row per class. */
  weights: number[][];
}

export interface RemoteArtifact extends BaseArtifact {
  type: 'remote';
  /** Model identifier on the remote scoring service. */
  model: string;
}

export type PredictorArtifact = LinearArtifact | SoftmaxArtifact | RemoteArtifact;

/** Validate an untrusted JSON document as a predictor artifact. */
export function parseArtifact(json: unknown, source: string): PredictorArtifact {
  const errors: FieldViolation[] = [];
  if (typeof json !== 'object' || json === null || Array.isArray(json)) {
    throw new ValidationError(`Artifact ${source} must be a JSON object`);
  }
  const raw: Record<string, unknown> = { ...json };

  const name = stringField(raw, 'name', errors);
  const version = stringField(raw, 'version', errors);
  const role = ROLES.find((r) => r === raw.role);
  if (!role) errors.push({ field: 'role', reason: `must be one of: ${ROLES.join(', ')}` });

  const features = strings(raw.features);
  if (!features) errors.push({ field: 'features', reason: 'must be an array of strings' });

  let target: ParameterName | null = null;
  if (raw.target !== undefined && raw.target !== null) {
    if (typeof raw.target === 'string' && isParameterName(raw.target)) {
      target = raw.target;
    } else {
      errors.push({ field: 'target', reason: 'must be a known parameter' });
    }
  }
  if ((role === 'estimator' || role === 'classifier') && target === null) {
    errors.push({ field: 'target', reason: `is required for ${role} artifacts` });
  }

  const material = typeof raw.material === 'string' ? raw.material.toLowerCase() : null;

  let score: number | null = null;
  if (raw.score !== undefined && raw.score !== null) {
    if (typeof raw.score === 'number' && raw.score >= 0 && raw.score <= 1) {
      score = raw.score;
    } else {
      errors.push({ field: 'score', reason: 'must be a number in [0, 1]' });
    }
  }

  const base = {
    name,
    version,
    role: role ?? 'estimator',
    features: features ?? [],
    target,
    material,
    score,
  };

  let artifact: PredictorArtifact | null = null;
  switch (raw.type) {
    case 'linear': {
      const coefficients = numbers(raw.coefficients);
      if (!coefficients || coefficients.length !== base.features.length) {
        errors.push({ field: 'coefficients', reason: 'must hold one number per feature' });
      }
      if (typeof raw.intercept !== 'number') {
        errors.push({ field: 'intercept', reason: 'must be a number' });
      }
      let outputRange: [number, number] | null = null;
      if (raw.outputRange !== undefined) {
        const range = numbers(raw.outputRange);
        if (range && range.length === 2 && range[0] <= range[1]) {
          outputRange = [range[0], range[1]];
        } else {
          errors.push({ field: 'outputRange', reason: 'must be [min, max]' });
        }
      }
      artifact = {
        ...base,
        type: 'linear',
        intercept: typeof raw.intercept === 'number' ? raw.intercept : 0,
        coefficients: coefficients ?? [],
        outputRange,
      };
      break;
    }
    case 'softmax': {
      const labels = strings(raw.labels);
      const intercepts = numbers(raw.intercepts);
      const weights = Array.isArray(raw.weights) ? raw.weights.map(numbers) : null;
      if (!labels || labels.length < 2) {
        errors.push({ field: 'labels', reason: 'must list at least two classes' });
      }
      const classes = labels?.length ?? 0;
      if (!intercepts || intercepts.length !== classes) {
        errors.push({ field: 'intercepts', reason: 'must hold one number per class' });
      }
      const rows: number[][] = [];
      if (!weights || weights.length !== classes) {
        errors.push({ field: 'weights', reason: 'must hold one row per class' });
      } else {
        for (const row of weights) {
          if (!row || row.length !== base.features.length) {
            errors.push({ field: 'weights', reason: 'each row must hold one number per feature' });
            break;
          }
          rows.push(row);
        }
      }
      artifact = {
        ...base,
        type: 'softmax',
        labels: labels ?? [],
        intercepts: intercepts ?? [],
        weights: rows,
      };
      break;
    }
    case 'remote': {
      artifact = { ...base, type: 'remote', model: stringField(raw, 'model', errors) };
      break;
    }
    default:
      errors.push({ field: 'type', reason: 'must be one of: linear, softmax, remote' });
  }

  if (errors.length > 0 || !artifact) {
    throw new ValidationError(
      `Invalid predictor artifact ${source}: ${errors.map((e) => `${e.field} ${e.reason}`).join('; ')}`,
      errors
    );
  }
  return artifact;
}

function stringField(raw: Record<string, unknown>, key: string, errors: FieldViolation[]): string {
  const value = raw[key];
  if (typeof value !== 'string' || value.length === 0) {
    errors.push({ field: key, reason: 'must be a non-empty string' });
    return '';
  }
  return value;
}

function numbers(value: unknown): number[] | null {
  if (!Array.isArray(value)) return null;
  const out: number[] = [];
  for (const item of value) {
    if (typeof item !== 'number' || !Number.isFinite(item)) return null;
    out.push(item);
  }
  return out;
}

function strings(value: unknown): string[] | null {
  if (!Array.isArray(value)) return null;
  const out: string[] = [];
  for (const item of value) {
    if (typeof item !== 'string') return null;
    out.push(item);
  }
  return out;
}
