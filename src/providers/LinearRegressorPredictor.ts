/**
 * Linear regressor evaluated from a serialized artifact.
 * Output is clamped to the artifact's declared range.
 */

import { PredictorUnavailableError } from '../errors.js';
import type { IPredictor, PredictorDescriptor, ScalarPrediction } from './IPredictor.js';
import type { LinearArtifact } from './predictorArtifact.js';

export class LinearRegressorPredictor implements IPredictor {
  readonly descriptor: PredictorDescriptor;
  private readonly intercept: number;
  private readonly coefficients: readonly number[];
  private readonly outputRange: readonly [number, number] | null;
  private readonly score: number | null;

  constructor(artifact: LinearArtifact) {
    this.descriptor = Object.freeze({
      name: artifact.name,
      version: artifact.version,
      role: artifact.role,
      features: Object.freeze([...artifact.features]),
      target: artifact.target,
      material: artifact.material,
    });
    this.intercept = artifact.intercept;
    this.coefficients = Object.freeze([...artifact.coefficients]);
    this.outputRange = artifact.outputRange;
    this.score = artifact.score;
  }

  async predict(features: readonly number[]): Promise<ScalarPrediction> {
    if (features.length !== this.coefficients.length) {
      throw new PredictorUnavailableError(
        this.descriptor.name,
        `expected ${this.coefficients.length} features, got ${features.length}`
      );
    }

    let value = this.intercept;
    for (let i = 0; i < features.length; i++) {
      value += this.coefficients[i] * features[i];
    }

    if (!Number.isFinite(value)) {
      throw new PredictorUnavailableError(this.descriptor.name, 'non-finite output');
    }

    if (this.outputRange) {
      value = Math.max(this.outputRange[0], Math.min(this.outputRange[1], value));
    }

    return { kind: 'scalar', value, score: this.score };
  }
}
