/**
 * Turns a parsed artifact into an evaluable predictor.
 */

import { ValidationError } from '../errors.js';
import type { IPredictor } from './IPredictor.js';
import { LinearRegressorPredictor } from './LinearRegressorPredictor.js';
import { RemoteScoringPredictor, type RemoteScoringOptions } from './RemoteScoringPredictor.js';
import { SoftmaxClassifierPredictor } from './SoftmaxClassifierPredictor.js';
import type { PredictorArtifact } from './predictorArtifact.js';

export function createPredictor(
  artifact: PredictorArtifact,
  remote?: RemoteScoringOptions
): IPredictor {
  switch (artifact.type) {
    case 'linear':
      return new LinearRegressorPredictor(artifact);
    case 'softmax':
      return new SoftmaxClassifierPredictor(artifact);
    case 'remote':
      if (!remote) {
        throw new ValidationError(
          `Predictor "${artifact.name}" needs a remote scoring service, but none is configured`
        );
      }
      return new RemoteScoringPredictor(artifact, remote);
  }
}
