/**
 * Statistical predictor adapter.
 * The only component that evaluates predictors. Holds an immutable registry
 * built once at startup and exposes one call contract for every role:
 * feature vector in, scalar or label out, plus the model's self-reported score.
 * Any failure surfaces as PredictorUnavailableError so callers can fall back.
 */

import { PredictorUnavailableError, ValidationError } from '../errors.js';
import type {
  IPredictor,
  PredictorDescriptor,
  PredictorOutput,
  PredictorRole,
} from '../providers/IPredictor.js';
import type { IPredictorArtifactStore } from '../providers/IPredictorArtifactStore.js';
import type { RemoteScoringOptions } from '../providers/RemoteScoringPredictor.js';
import { createPredictor } from '../providers/createPredictor.js';
import { isParameterName } from '../reference/parameters.js';
import type { ParameterName } from '../types/common.js';
import type { ProcessDescription } from '../types/models.js';

interface FeatureSpec {
  parameter: ParameterName;
  /** One-hot category; `null` for a plain numeric feature. */
  equals: string | null;
}

export interface EncodedFeatures {
  vector: number[];
  /** Distinct parameters read to build the vector, in first-use order. */
  parameters: ParameterName[];
}

export class PredictorAdapter {
  private readonly predictors: ReadonlyMap<string, IPredictor>;

  constructor(predictors: readonly IPredictor[]) {
    const map = new Map<string, IPredictor>();
    for (const p of predictors) {
      if (map.has(p.descriptor.name)) {
        throw new ValidationError(`Duplicate predictor name "${p.descriptor.name}"`);
      }
      map.set(p.descriptor.name, p);
    }
    this.predictors = map;
  }

  /** Load every artifact from a store and build the registry. */
  static async fromStore(
    store: IPredictorArtifactStore,
    remote?: RemoteScoringOptions
  ): Promise<PredictorAdapter> {
    const artifacts = await store.loadAll();
    return new PredictorAdapter(artifacts.map((a) => createPredictor(a, remote)));
  }

  names(): string[] {
    return [...this.predictors.keys()].sort();
  }

  describe(name: string): PredictorDescriptor | null {
    return this.predictors.get(name)?.descriptor ?? null;
  }

  /** First predictor (by name) serving a composite-score role. */
  findByRole(role: PredictorRole): PredictorDescriptor | null {
    for (const name of this.names()) {
      const d = this.describe(name);
      if (d?.role === role) return d;
    }
    return null;
  }

  /**
   * Estimator or classifier for a parameter. A material-specific model wins
   * over a material-agnostic one.
   */
  findEstimator(parameter: ParameterName, material: string | null): PredictorDescriptor | null {
    let generic: PredictorDescriptor | null = null;
    for (const name of this.names()) {
      const d = this.describe(name);
      if (!d || d.target !== parameter) continue;
      if (d.role !== 'estimator' && d.role !== 'classifier') continue;
      if (d.material !== null && d.material === material) return d;
      if (d.material === null && generic === null) generic = d;
    }
    return generic;
  }

  /** Parameters a predictor reads, in feature order. */
  featureParameters(name: string): ParameterName[] {
    const descriptor = this.describe(name);
    if (!descriptor) return [];
    const out: ParameterName[] = [];
    for (const feature of descriptor.features) {
      const spec = parseFeature(feature);
      if (spec && !out.includes(spec.parameter)) out.push(spec.parameter);
    }
    return out;
  }

  /** Build a predictor's feature vector from a process description. */
  encodeFeatures(name: string, d: ProcessDescription): EncodedFeatures {
    const descriptor = this.describe(name);
    if (!descriptor) {
      throw new PredictorUnavailableError(name, 'not loaded');
    }

    const vector: number[] = [];
    const parameters: ParameterName[] = [];
    for (const feature of descriptor.features) {
      const spec = parseFeature(feature);
      if (!spec) {
        throw new PredictorUnavailableError(name, `unknown feature "${feature}"`);
      }
      const value = d[spec.parameter];
      if (value === undefined) {
        throw new PredictorUnavailableError(name, `feature "${feature}" has no value`);
      }
      if (spec.equals !== null) {
        vector.push(value === spec.equals ? 1 : 0);
      } else if (typeof value === 'number') {
        vector.push(value);
      } else {
        throw new PredictorUnavailableError(name, `feature "${feature}" is not numeric`);
      }
      if (!parameters.includes(spec.parameter)) parameters.push(spec.parameter);
    }
    return { vector, parameters };
  }

  /** Evaluate a named predictor on a prepared feature vector. */
  async evaluate(name: string, features: readonly number[]): Promise<PredictorOutput> {
    const predictor = this.predictors.get(name);
    if (!predictor) {
      throw new PredictorUnavailableError(name, 'not loaded');
    }
    if (features.length !== predictor.descriptor.features.length) {
      throw new PredictorUnavailableError(
        name,
        `expected ${predictor.descriptor.features.length} features, got ${features.length}`
      );
    }

    let output: PredictorOutput;
    try {
      output = await predictor.predict(features);
    } catch (err) {
      if (err instanceof PredictorUnavailableError) throw err;
      throw new PredictorUnavailableError(name, err instanceof Error ? err.message : String(err));
    }

    // Remote models may report scores outside [0, 1]
    if (output.score === null) return output;
    const score = Number.isFinite(output.score) ? Math.max(0, Math.min(1, output.score)) : 0;
    return { ...output, score };
  }
}

function parseFeature(feature: string): FeatureSpec | null {
  const eq = feature.indexOf('=');
  const name = eq === -1 ? feature : feature.slice(0, eq);
  if (!isParameterName(name)) return null;
  return { parameter: name, equals: eq === -1 ? null : feature.slice(eq + 1) };
}
