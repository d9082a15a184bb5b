export type {
  IPredictor,
  PredictorDescriptor,
  PredictorOutput,
  PredictorRole,
  ScalarPrediction,
  LabelPrediction,
} from './IPredictor.js';
export type { IPredictorArtifactStore } from './IPredictorArtifactStore.js';
export type { PredictorArtifact, LinearArtifact, SoftmaxArtifact, RemoteArtifact } from './predictorArtifact.js';
export { parseArtifact } from './predictorArtifact.js';
export { LinearRegressorPredictor } from './LinearRegressorPredictor.js';
export { SoftmaxClassifierPredictor } from './SoftmaxClassifierPredictor.js';
export { RemoteScoringPredictor } from './RemoteScoringPredictor.js';
export { FilePredictorArtifactStore } from './FilePredictorArtifactStore.js';
export { createPredictor } from './createPredictor.js';
export type { ILogProvider, LogEvent, LogLevel, AnalysisLogEvent } from './ILogProvider.js';
export { ConsoleLogProvider } from './ConsoleLogProvider.js';
export { AxiomLogProvider } from './AxiomLogProvider.js';
