import { describe, it, expect } from 'vitest';
import { PredictorUnavailableError } from '../../src/errors.js';
import { SoftmaxClassifierPredictor } from '../../src/providers/SoftmaxClassifierPredictor.js';
import type { SoftmaxArtifact } from '../../src/providers/predictorArtifact.js';

const artifact: SoftmaxArtifact = {
  name: 'material-classifier',
  version: '1',
  type: 'softmax',
  role: 'classifier',
  features: ['recycling_rate', 'renewable_energy_percent'],
  target: 'material',
  material: null,
  score: 0.6,
  labels: ['aluminum', 'copper', 'steel'],
  intercepts: [0, 0, 0.5],
  weights: [
    [2, 0.01],
    [0.5, 0],
    [1, 0.005],
  ],
};

describe('SoftmaxClassifierPredictor', () => {
  it('should return the most probable label', async () => {
    const predictor = new SoftmaxClassifierPredictor(artifact);
    const output = await predictor.predict([0.8, 35]);
    // logits 1.95, 0.4, 1.475
    expect(output.label).toBe('aluminum');
    expect(output.classIndex).toBe(0);
    const probability = 1 / (1 + Math.exp(0.4 - 1.95) + Math.exp(1.475 - 1.95));
    expect(output.score).toBeCloseTo(probability * 0.6, 10);
  });

  it('should use the raw probability without a held-out score', async () => {
    const predictor = new SoftmaxClassifierPredictor({ ...artifact, score: null });
    const output = await predictor.predict([0, 0]);
    // logits 0, 0, 0.5
    expect(output.label).toBe('steel');
    expect(output.score).toBeCloseTo(Math.exp(0.5) / (2 + Math.exp(0.5)), 10);
  });

  it('should stay finite for large logits', async () => {
    const predictor = new SoftmaxClassifierPredictor(artifact);
    const output = await predictor.predict([1000, 0]);
    expect(output.label).toBe('aluminum');
    expect(output.score).toBeCloseTo(0.6, 10);
  });

  it('should reject a vector of the wrong length', async () => {
    const predictor = new SoftmaxClassifierPredictor(artifact);
    await expect(predictor.predict([0.5])).rejects.toThrow(PredictorUnavailableError);
  });

  // --- decode() ---

  it('should decode class indexes', () => {
    const predictor = new SoftmaxClassifierPredictor(artifact);
    expect(predictor.decode(1)).toBe('copper');
    expect(() => predictor.decode(3)).toThrow('no label for class 3');
  });
});
