/**
 * Analysis engine.
 * The single entry point the boundary layer calls. One analysis run:
 *
 *   validate → detect gaps → estimate gaps → compute metrics → assess
 *
 * Only missing parameters are estimated. A measured value that looks
 * implausible or inconsistent is kept and reported as a gap for review.
 *
 * Runs share nothing mutable except the feedback tracker's performance
 * records. Every result is deeply frozen. Storage failures never fail a run;
 * they are logged.
 */

import { IncompleteAnalysisError, PredictorUnavailableError, ValidationError } from '../errors.js';
import type { AnalysisLogEvent, ILogProvider } from '../providers/ILogProvider.js';
import { PARAMETER_SCHEMAS } from '../reference/parameters.js';
import type { ReferenceTables } from '../reference/ReferenceTables.js';
import type {
  ConfirmGapResponse,
  EngineHealth,
  GapStatistics,
  PredictMissingResponse,
  RecordFeedbackOptions,
} from '../types/api.js';
import type { MetricName, ParameterName } from '../types/common.js';
import type {
  AnalysisResult,
  DataGap,
  MetricValue,
  ModelPerformance,
  ParameterEstimates,
  ProcessDescription,
  ResolvedParameter,
} from '../types/models.js';
import { deepFreeze } from '../utils/freeze.js';
import { KeyedSerialQueue } from '../utils/KeyedSerialQueue.js';
import type { AssessmentService } from './AssessmentService.js';
import type { CircularityCalculator } from './CircularityCalculator.js';
import {
  HEURISTIC_METRIC_CONFIDENCE,
  confidencesOf,
  derivedConfidence,
  discountForPredictedInputs,
  modelConfidence,
} from './confidence.js';
import { defaultPredictorName, type FeedbackTracker } from './FeedbackTracker.js';
import type { GapDetector } from './GapDetector.js';
import type { GapService } from './GapService.js';
import { hasAll } from './inputs.js';
import type { MetricCalculator } from './MetricCalculator.js';
import type { MetricCatalog, MetricDefinition } from './MetricCatalog.js';
import { ParameterPredictor } from './ParameterPredictor.js';
import type { ParameterValidator } from './ParameterValidator.js';
import type { PredictorAdapter } from './PredictorAdapter.js';

export const DEFAULT_CONFIDENCE_FLOOR = 0.3;

export interface AnalysisEngineDeps {
  tables: ReferenceTables;
  validator: ParameterValidator;
  catalog: MetricCatalog;
  calculator: MetricCalculator;
  circularity: CircularityCalculator;
  adapter: PredictorAdapter;
  detector: GapDetector;
  predictor: ParameterPredictor;
  assessment: AssessmentService;
  gapService: GapService;
  feedback: FeedbackTracker;
  logger: ILogProvider;
  /** Estimates below this confidence mark their dependents low-confidence. */
  confidenceFloor?: number;
}

export class AnalysisEngine {
  private readonly confidenceFloor: number;
  private readonly confirmations = new KeyedSerialQueue();

  constructor(private readonly deps: AnalysisEngineDeps) {
    this.confidenceFloor = deps.confidenceFloor ?? DEFAULT_CONFIDENCE_FLOOR;
  }

  async analyze(raw: unknown, analysisType: unknown): Promise<AnalysisResult> {
    const startedAt = Date.now();
    const { description, analysisType: type, clamped } = this.deps.validator.assertValid(raw, analysisType);
    if (clamped.length > 0) {
      this.deps.logger.debug('Clamped parameters into range', { clamped });
    }

    const gaps = this.deps.detector.detect(description, type);
    const missing = gaps.filter((gap) => gap.category === 'missing');
    const estimates = await this.deps.predictor.predict(description, missing);
    const resolved = ParameterPredictor.merge(description, estimates);
    const parameters = this.resolveParameters(resolved, estimates);

    const metrics: Partial<Record<MetricName, MetricValue>> = {};
    const lowConfidenceMetrics: MetricName[] = [];
    const unresolved: MetricName[] = [];
    const supplementary = this.deps.catalog
      .supplementaryMetrics()
      .filter((def) => def.inputs.every((p) => parameters[p]?.source === 'measured'));

    for (const def of [...this.deps.catalog.requiredMetrics(type), ...supplementary]) {
      if (!hasAll(resolved, def.inputs)) {
        unresolved.push(def.name);
        continue;
      }
      const metric = await this.computeMetric(def, resolved, estimates);
      metrics[def.name] = metric;
      if (metric.lowConfidence) lowConfidenceMetrics.push(def.name);
    }
    if (unresolved.length > 0) {
      throw new IncompleteAnalysisError(unresolved);
    }

    const trackedGapIds = await this.deps.gapService.track(type, gaps, estimates);
    const required = this.deps.catalog.requiredParameters(type);

    const result: AnalysisResult = deepFreeze({
      analysisType: type,
      referenceVersion: this.deps.tables.version,
      parameters,
      metrics,
      gaps,
      trackedGapIds,
      lowConfidenceMetrics,
      assessment: this.deps.assessment.assess(type, parameters, metrics, required),
      recommendations: this.deps.assessment.recommend(parameters),
      completedAt: new Date(),
    });

    const event: AnalysisLogEvent = {
      level: 'info',
      message: 'analysis',
      analysisType: type,
      durationMs: Date.now() - startedAt,
      gapCount: gaps.length,
      predictedCount: Object.keys(estimates).length,
      lowConfidenceCount: lowConfidenceMetrics.length,
    };
    this.deps.logger.log(event);

    return result;
  }

  async detectGaps(raw: unknown, analysisType: unknown): Promise<DataGap[]> {
    const { description, analysisType: type } = this.deps.validator.assertValid(raw, analysisType);
    return deepFreeze(this.deps.detector.detect(description, type));
  }

  /** Estimate the given gaps without computing any metric. */
  async predictMissing(raw: unknown, gaps: readonly DataGap[]): Promise<PredictMissingResponse> {
    const description = this.deps.validator.assertValidDescription(raw);
    const estimates = await this.deps.predictor.predict(description, gaps);

    const response: PredictMissingResponse = {};
    for (const estimate of Object.values(estimates)) {
      if (!estimate) continue;
      response[estimate.parameter] = {
        value: estimate.value,
        confidence: estimate.confidence,
        source: 'predicted',
        method: estimate.method,
      };
    }
    return deepFreeze(response);
  }

  async recordFeedback(
    parameterName: string,
    predicted: unknown,
    actual: unknown,
    options: RecordFeedbackOptions = {}
  ): Promise<ModelPerformance> {
    const { performance, applied } = await this.deps.feedback.record({
      parameter: parameterName,
      predicted,
      actual,
      predictorName: options.predictorName,
      timestamp: options.timestamp,
      gapId: options.gapId ?? null,
    });
    this.deps.logger.info('feedback', {
      parameter: parameterName,
      predictorName: performance.predictorName,
      applied,
      sampleCount: performance.sampleCount,
    });
    return performance;
  }

  async getPerformance(predictorName: string): Promise<ModelPerformance> {
    return this.deps.feedback.getPerformance(predictorName);
  }

  /**
   * Confirm the real value of a tracked gap and score its estimate.
   * Confirmations of the same gap run one at a time.
   */
  async confirmGap(gapId: string, actual: unknown): Promise<ConfirmGapResponse> {
    return this.confirmations.run(gapId, () => this.confirmOnce(gapId, actual));
  }

  async getGapStatistics(): Promise<GapStatistics> {
    return deepFreeze(await this.deps.gapService.getStatistics());
  }

  async health(): Promise<EngineHealth> {
    const predictorsLoaded = this.deps.adapter.names();
    let totalGapsTracked: number | null = null;
    try {
      totalGapsTracked = await this.deps.gapService.countTracked();
    } catch (err) {
      this.deps.logger.error('Gap storage unreachable', {
        error: err instanceof Error ? err.message : String(err),
      });
    }

    return {
      status: totalGapsTracked === null || predictorsLoaded.length === 0 ? 'degraded' : 'ok',
      referenceVersion: this.deps.tables.version,
      predictorsLoaded,
      totalGapsTracked,
    };
  }

  // ── Private ──

  private async confirmOnce(gapId: string, actual: unknown): Promise<ConfirmGapResponse> {
    const gap = await this.deps.gapService.findById(gapId);
    if (gap.status === 'confirmed') {
      throw new ValidationError(`Data gap "${gapId}" is already confirmed`);
    }
    if (gap.predictedValue === null) {
      throw new ValidationError(`Data gap "${gapId}" has no estimate to confirm`);
    }

    const confirmedAt = new Date();
    const { performance, actual: actualValue } = await this.deps.feedback.record({
      parameter: gap.parameter,
      predicted: gap.predictedValue,
      actual,
      predictorName: gap.predictorName ?? defaultPredictorName(gap.parameter),
      timestamp: confirmedAt,
      gapId,
    });

    const confirmed = await this.deps.gapService.markConfirmed(gapId, actualValue, confirmedAt);
    return deepFreeze({ gap: confirmed, performance });
  }

  private resolveParameters(
    resolved: ProcessDescription,
    estimates: ParameterEstimates
  ): Partial<Record<ParameterName, ResolvedParameter>> {
    const out: Partial<Record<ParameterName, ResolvedParameter>> = {};
    for (const { name } of PARAMETER_SCHEMAS) {
      const value = resolved[name];
      if (value === undefined) continue;
      const estimate = estimates[name];
      out[name] = estimate
        ? {
            value,
            source: 'predicted',
            confidence: estimate.confidence,
            method: estimate.method,
            lowConfidence: estimate.confidence < this.confidenceFloor,
          }
        : { value, source: 'measured', confidence: null, method: null, lowConfidence: false };
    }
    return out;
  }

  private async computeMetric(
    def: MetricDefinition,
    d: ProcessDescription,
    estimates: ParameterEstimates
  ): Promise<MetricValue> {
    if (def.kind === 'score') return this.computeScore(def, d, estimates);

    const computation = def.kind === 'lca'
      ? this.deps.calculator.calculate(def.name, d)
      : this.deps.circularity.calculate(def.name, d);
    const predictedInputs = confidencesOf(def.inputs, estimates);
    if (predictedInputs.length === 0) {
      return this.metric(def, computation.value, 'computed', null, computation.flags, null);
    }
    return this.metric(def, computation.value, 'predicted', derivedConfidence(predictedInputs), computation.flags, null);
  }

  /** Composite score from the role's model, or the heuristic when the model cannot run. */
  private async computeScore(
    def: Extract<MetricDefinition, { kind: 'score' }>,
    d: ProcessDescription,
    estimates: ParameterEstimates
  ): Promise<MetricValue> {
    if (def.predictor !== null) {
      try {
        const encoded = this.deps.adapter.encodeFeatures(def.predictor, d);
        const output = await this.deps.adapter.evaluate(def.predictor, encoded.vector);
        if (output.kind !== 'scalar') {
          throw new PredictorUnavailableError(def.predictor, 'returned a label for a score');
        }
        const value = Math.max(0, Math.min(100, output.value));
        const predictedInputs = confidencesOf(encoded.parameters, estimates);
        if (predictedInputs.length === 0) {
          return this.metric(def, value, 'computed', null, [], def.predictor);
        }
        const confidence = modelConfidence(output.score, encoded.parameters.length, predictedInputs);
        return this.metric(def, value, 'predicted', confidence, [], def.predictor);
      } catch (err) {
        if (!(err instanceof PredictorUnavailableError)) throw err;
        this.deps.logger.warn('Score model unavailable, using heuristic fallback', {
          metric: def.name,
          predictor: def.predictor,
          reason: err.message,
        });
      }
    }

    const computation = def.role === 'environmental'
      ? this.deps.calculator.environmentalScoreFallback(d)
      : this.deps.circularity.circularityScoreFallback(d);
    const confidence = discountForPredictedInputs(
      HEURISTIC_METRIC_CONFIDENCE,
      def.inputs.length,
      confidencesOf(def.inputs, estimates)
    );
    return this.metric(def, computation.value, 'predicted', confidence, computation.flags, null);
  }

  private metric(
    def: MetricDefinition,
    value: number,
    source: MetricValue['source'],
    confidence: number | null,
    flags: MetricValue['flags'],
    predictor: string | null
  ): MetricValue {
    return {
      value,
      unit: def.unit,
      source,
      confidence,
      lowConfidence: confidence !== null && confidence < this.confidenceFloor,
      flags,
      predictor,
    };
  }
}
