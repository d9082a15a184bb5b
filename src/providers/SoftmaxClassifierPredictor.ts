/**
 * Multinomial logistic classifier with a label decoder.
 * The self-reported score is the winning class probability, scaled by the
 * artifact's held-out accuracy when it has one.
 */

import { PredictorUnavailableError } from '../errors.js';
import type { IPredictor, LabelPrediction, PredictorDescriptor } from './IPredictor.js';
import type { SoftmaxArtifact } from './predictorArtifact.js';

export class SoftmaxClassifierPredictor implements IPredictor {
  readonly descriptor: PredictorDescriptor;
  private readonly labels: readonly string[];
  private readonly intercepts: readonly number[];
  private readonly weights: readonly (readonly number[])[];
  private readonly accuracy: number | null;

  constructor(artifact: SoftmaxArtifact) {
    this.descriptor = Object.freeze({
      name: artifact.name,
      version: artifact.version,
      role: artifact.role,
      features: Object.freeze([...artifact.features]),
      target: artifact.target,
      material: artifact.material,
    });
    this.labels = Object.freeze([...artifact.labels]);
    this.intercepts = Object.freeze([...artifact.intercepts]);
    this.weights = Object.freeze(artifact.weights.map((row) => Object.freeze([...row])));
    this.accuracy = artifact.score;
  }

  async predict(features: readonly number[]): Promise<LabelPrediction> {
    const expected = this.descriptor.features.length;
    if (features.length !== expected) {
      throw new PredictorUnavailableError(
        this.descriptor.name,
        `expected ${expected} features, got ${features.length}`
      );
    }

    const logits = this.weights.map((row, k) => {
      let z = this.intercepts[k];
      for (let i = 0; i < row.length; i++) z += row[i] * features[i];
      return z;
    });

    // Subtract the max logit before exponentiating
    const maxLogit = Math.max(...logits);
    const exps = logits.map((z) => Math.exp(z - maxLogit));
    const total = exps.reduce((sum, e) => sum + e, 0);
    if (!Number.isFinite(total) || total === 0) {
      throw new PredictorUnavailableError(this.descriptor.name, 'non-finite output');
    }

    let classIndex = 0;
    for (let k = 1; k < exps.length; k++) {
      if (exps[k] > exps[classIndex]) classIndex = k;
    }
    const probability = exps[classIndex] / total;

    return {
      kind: 'label',
      label: this.decode(classIndex),
      classIndex,
      score: probability * (this.accuracy ?? 1),
    };
  }

  decode(classIndex: number): string {
    const label = this.labels[classIndex];
    if (label === undefined) {
      throw new PredictorUnavailableError(this.descriptor.name, `no label for class ${classIndex}`);
    }
    return label;
  }
}
