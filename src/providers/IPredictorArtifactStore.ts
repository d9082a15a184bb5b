/**
 * Source of named, versioned predictor artifacts.
 * Read once at startup; the engine never writes back.
 */

import type { PredictorArtifact } from './predictorArtifact.js';

export interface IPredictorArtifactStore {
  /** Load every artifact the store holds. Invalid artifacts reject the whole load. */
  loadAll(): Promise<PredictorArtifact[]>;
}
