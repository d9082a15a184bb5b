/**
 * Predictor backed by a remote model-serving endpoint.
 * Posts one feature vector per call and reads back a scalar or a label.
 * No SDK dependency — uses native fetch.
 */

import { PredictorUnavailableError } from '../errors.js';
import type { IPredictor, PredictorDescriptor, PredictorOutput } from './IPredictor.js';
import type { RemoteArtifact } from './predictorArtifact.js';

export interface RemoteScoringOptions {
  /** Base URL of the scoring service, e.g. https://scoring.internal/v1 */
  baseUrl: string;
  apiKey?: string;
}

interface RemotePrediction {
  value?: number;
  label?: string;
  classIndex?: number;
  score?: number;
}

interface RemoteScoringResponse {
  model: string;
  predictions: RemotePrediction[];
}

export class RemoteScoringPredictor implements IPredictor {
  readonly descriptor: PredictorDescriptor;
  private readonly model: string;
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly fallbackScore: number | null;

  constructor(artifact: RemoteArtifact, options: RemoteScoringOptions) {
    this.descriptor = Object.freeze({
      name: artifact.name,
      version: artifact.version,
      role: artifact.role,
      features: Object.freeze([...artifact.features]),
      target: artifact.target,
      material: artifact.material,
    });
    this.model = artifact.model;
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.apiKey = options.apiKey ?? '';
    this.fallbackScore = artifact.score;
  }

  async predict(features: readonly number[]): Promise<PredictorOutput> {
    const expected = this.descriptor.features.length;
    if (features.length !== expected) {
      throw new PredictorUnavailableError(
        this.descriptor.name,
        `expected ${expected} features, got ${features.length}`
      );
    }

    const response = await this.callApi(features);
    const prediction = Array.isArray(response.predictions) ? response.predictions[0] : undefined;
    if (!prediction) {
      throw new PredictorUnavailableError(this.descriptor.name, 'empty prediction list');
    }

    const score = typeof prediction.score === 'number' ? prediction.score : this.fallbackScore;

    if (typeof prediction.label === 'string') {
      return {
        kind: 'label',
        label: prediction.label,
        classIndex: prediction.classIndex ?? -1,
        score,
      };
    }
    if (typeof prediction.value === 'number' && Number.isFinite(prediction.value)) {
      return { kind: 'scalar', value: prediction.value, score };
    }
    throw new PredictorUnavailableError(this.descriptor.name, 'prediction has neither value nor label');
  }

  private async callApi(features: readonly number[]): Promise<RemoteScoringResponse> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.apiKey) {
      headers.Authorization = `Bearer ${this.apiKey}`;
    }

    let res: Response;
    try {
      res = await fetch(`${this.baseUrl}/models/${encodeURIComponent(this.model)}:predict`, {
        method: 'POST',
        headers,
        body: JSON.stringify({ instances: [features] }),
      });
    } catch (err) {
      throw new PredictorUnavailableError(
        this.descriptor.name,
        `scoring service unreachable: ${err instanceof Error ? err.message : String(err)}`
      );
    }

    if (!res.ok) {
      const err = await res.json().catch(() => ({}));
      const detail = (err as Record<string, unknown>).detail ?? 'Unknown error';
      throw new PredictorUnavailableError(
        this.descriptor.name,
        `scoring service error (${res.status}): ${detail}`
      );
    }

    return (await res.json()) as RemoteScoringResponse;
  }
}
