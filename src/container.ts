/**
 * Dependency wiring.
 * Constructs every service with its dependencies. Production passes Supabase
 * repositories; tests pass mocks.
 */

import type { ILogProvider } from './providers/ILogProvider.js';
import type { ReferenceTables } from './reference/ReferenceTables.js';
import type { IDataGapRepository } from './repositories/IDataGapRepository.js';
import type { IModelPerformanceRepository } from './repositories/IModelPerformanceRepository.js';
import type { IPredictionFeedbackRepository } from './repositories/IPredictionFeedbackRepository.js';
import { AnalysisEngine } from './services/AnalysisEngine.js';
import { AssessmentService } from './services/AssessmentService.js';
import { CircularityCalculator } from './services/CircularityCalculator.js';
import { FeedbackTracker } from './services/FeedbackTracker.js';
import { GapDetector } from './services/GapDetector.js';
import { GapService } from './services/GapService.js';
import { MetricCalculator } from './services/MetricCalculator.js';
import { MetricCatalog } from './services/MetricCatalog.js';
import { ParameterPredictor } from './services/ParameterPredictor.js';
import { ParameterValidator } from './services/ParameterValidator.js';
import type { PredictorAdapter } from './services/PredictorAdapter.js';

export interface Container {
  engine: AnalysisEngine;
  validator: ParameterValidator;
  catalog: MetricCatalog;
  adapter: PredictorAdapter;
  gapService: GapService;
  feedbackTracker: FeedbackTracker;
  logProvider: ILogProvider;
}

export function createContainer(deps: {
  tables: ReferenceTables;
  adapter: PredictorAdapter;
  gapRepo: IDataGapRepository;
  feedbackRepo: IPredictionFeedbackRepository;
  performanceRepo: IModelPerformanceRepository;
  logProvider: ILogProvider;
  confidenceFloor?: number;
}): Container {
  const validator = new ParameterValidator(deps.tables);
  const catalog = new MetricCatalog(deps.adapter);
  const gapService = new GapService(deps.gapRepo, deps.logProvider);
  const feedbackTracker = new FeedbackTracker(
    deps.feedbackRepo,
    deps.performanceRepo,
    deps.tables,
    deps.logProvider
  );

  const engine = new AnalysisEngine({
    tables: deps.tables,
    validator,
    catalog,
    calculator: new MetricCalculator(deps.tables),
    circularity: new CircularityCalculator(deps.tables),
    adapter: deps.adapter,
    detector: new GapDetector(deps.tables, catalog),
    predictor: new ParameterPredictor(deps.tables, deps.adapter, deps.logProvider),
    assessment: new AssessmentService(),
    gapService,
    feedback: feedbackTracker,
    logger: deps.logProvider,
    confidenceFloor: deps.confidenceFloor,
  });

  return {
    engine,
    validator,
    catalog,
    adapter: deps.adapter,
    gapService,
    feedbackTracker,
    logProvider: deps.logProvider,
  };
}
