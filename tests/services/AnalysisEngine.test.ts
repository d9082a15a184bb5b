import { describe, it, expect, beforeAll, beforeEach } from 'vitest';
import { createContainer } from '../../src/container.js';
import {
  IncompleteAnalysisError,
  InconsistentFeedbackError,
  NotFoundError,
  ValidationError,
} from '../../src/errors.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import type { ReferenceTables } from '../../src/reference/ReferenceTables.js';
import type { AnalysisEngine } from '../../src/services/AnalysisEngine.js';
import { PredictorAdapter } from '../../src/services/PredictorAdapter.js';
import { FakePredictor } from '../mocks/FakePredictor.js';
import { MockDataGapRepository } from '../mocks/MockDataGapRepository.js';
import { MockModelPerformanceRepository } from '../mocks/MockModelPerformanceRepository.js';
import { MockPredictionFeedbackRepository } from '../mocks/MockPredictionFeedbackRepository.js';
import { ALUMINUM_PROCESS, loadShippedAdapter, loadTestTables } from '../mocks/fixtures.js';

describe('AnalysisEngine', () => {
  let tables: ReferenceTables;
  let shipped: PredictorAdapter;
  let gapRepo: MockDataGapRepository;
  let logger: ConsoleLogProvider;
  let engine: AnalysisEngine;

  function build(options: { adapter?: PredictorAdapter; tables?: ReferenceTables; confidenceFloor?: number } = {}) {
    return createContainer({
      tables: options.tables ?? tables,
      adapter: options.adapter ?? shipped,
      gapRepo,
      feedbackRepo: new MockPredictionFeedbackRepository(),
      performanceRepo: new MockModelPerformanceRepository(),
      logProvider: logger,
      confidenceFloor: options.confidenceFloor,
    }).engine;
  }

  beforeAll(async () => {
    tables = await loadTestTables();
    shipped = await loadShippedAdapter();
  });

  beforeEach(() => {
    gapRepo = new MockDataGapRepository();
    logger = new ConsoleLogProvider();
    engine = build();
  });

  // --- analyze(): complete input ---

  describe('with every parameter measured', () => {
    it('should report no gaps and only computed metrics', async () => {
      const result = await engine.analyze(ALUMINUM_PROCESS, 'comprehensive');

      expect(result.gaps).toEqual([]);
      expect(result.trackedGapIds).toEqual({});
      expect(result.lowConfidenceMetrics).toEqual([]);
      expect(Object.keys(result.metrics)).toHaveLength(11);
      for (const metric of Object.values(result.metrics)) {
        expect(metric?.source).toBe('computed');
        expect(metric?.confidence).toBeNull();
      }
      for (const parameter of Object.values(result.parameters)) {
        expect(parameter?.source).toBe('measured');
      }
    });

    it('should score with the shipped models', async () => {
      const { metrics } = await engine.analyze(ALUMINUM_PROCESS, 'comprehensive');

      expect(metrics.environmental_score?.value).toBeCloseTo(70, 8);
      expect(metrics.environmental_score?.predictor).toBe('environmental-impact');
      expect(metrics.circularity_score?.value).toBeCloseTo(73, 8);
      expect(metrics.cmur?.value).toBe(0.8);
      expect(metrics.circularity_index?.value).toBeCloseTo(0.653, 10);
      expect(metrics.carbon_footprint_total?.value).toBeCloseTo(2_310_862.5, 3);
      expect(metrics.carbon_footprint_total?.unit).toBe('kg CO2e');
    });

    it('should assess the process', async () => {
      const result = await engine.analyze(ALUMINUM_PROCESS, 'comprehensive');

      // mean of 70 and 65.3
      expect(result.assessment.overallScore).toBeGreaterThan(67.5);
      expect(result.assessment.overallScore).toBeLessThan(67.8);
      expect(result.assessment.rating).toBe('Good');
      expect(result.assessment.dataQualityScore).toBe(100);
      expect(result.recommendations.map((r) => r.category)).toEqual(['energy', 'waste', 'transport']);
      expect(result.referenceVersion).toBe('2025.1');
    });

    it('should report only the metrics of the analysis type', async () => {
      const result = await engine.analyze(ALUMINUM_PROCESS, 'circularity');
      expect(Object.keys(result.metrics)).toEqual([
        'cmur',
        'material_recovery_rate',
        'circularity_index',
        'circularity_score',
      ]);
    });

    it('should add supplementary metrics for measured inputs', async () => {
      const result = await engine.analyze({ ...ALUMINUM_PROCESS, waste_generation: 80 }, 'environmental');
      expect(result.metrics.waste_generation_rate).toMatchObject({ value: 0.08, source: 'computed' });
    });

    it('should freeze the result', async () => {
      const result = await engine.analyze(ALUMINUM_PROCESS, 'comprehensive');
      expect(Object.isFrozen(result)).toBe(true);
      expect(Object.isFrozen(result.metrics.cmur)).toBe(true);
    });

    it('should log one analysis event', async () => {
      await engine.analyze(ALUMINUM_PROCESS, 'comprehensive');
      const events = logger.events.filter((e) => e.message === 'analysis');
      expect(events).toHaveLength(1);
      expect(events[0]).toMatchObject({
        level: 'info',
        analysisType: 'comprehensive',
        gapCount: 0,
        predictedCount: 0,
        lowConfidenceCount: 0,
      });
    });
  });

  // --- analyze(): gap filling ---

  describe('with a missing parameter', () => {
    const withoutRecycling = { ...ALUMINUM_PROCESS, recycling_rate: undefined };

    it('should estimate the gap and mark its provenance', async () => {
      const result = await engine.analyze(withoutRecycling, 'comprehensive');

      expect(result.gaps.map((g) => g.parameter)).toEqual(['recycling_rate']);
      const recycling = result.parameters.recycling_rate;
      expect(recycling?.source).toBe('predicted');
      expect(recycling?.method).toBe('model');
      expect(recycling?.confidence).toBe(0.7);
      expect(recycling?.value).toBeCloseTo(0.69, 10);
      expect(result.parameters.production_rate?.source).toBe('measured');
    });

    it('should discount metrics built on the estimate', async () => {
      const { metrics } = await engine.analyze(withoutRecycling, 'comprehensive');

      expect(metrics.cmur?.source).toBe('predicted');
      expect(metrics.cmur?.value).toBeCloseTo(0.69, 10);
      expect(metrics.cmur?.confidence).toBeCloseTo(0.63, 10);
      expect(metrics.energy_intensity?.source).toBe('computed');
      // min(0.82 · (1 − 0.5 · 1/5), 0.9 · 0.7)
      expect(metrics.environmental_score?.confidence).toBeCloseTo(0.63, 10);
      expect(metrics.environmental_score?.value).toBeCloseTo(66.7, 8);
    });

    it('should track the gap for later confirmation', async () => {
      const result = await engine.analyze(withoutRecycling, 'comprehensive');

      expect(result.trackedGapIds).toEqual({ recycling_rate: 'gap-1' });
      expect(gapRepo.rows[0]).toMatchObject({ parameter: 'recycling_rate', predictor_name: 'recycling-rate-aluminum' });
      expect(result.assessment.dataQualityScore).toBe(85.7);
    });

    it('should keep a measured value at the end of the valid range', async () => {
      const result = await engine.analyze({ ...ALUMINUM_PROCESS, recycling_rate: 1 }, 'comprehensive');

      expect(result.gaps).toEqual([]);
      expect(result.parameters.recycling_rate).toEqual({
        value: 1,
        source: 'measured',
        confidence: null,
        method: null,
        lowConfidence: false,
      });
      expect(result.metrics.cmur?.value).toBe(1);
      for (const metric of Object.values(result.metrics)) {
        expect(metric?.source).toBe('computed');
      }
    });

    it('should report an implausible measured value without replacing it', async () => {
      const result = await engine.analyze({ ...ALUMINUM_PROCESS, transport_distance: 25_000 }, 'comprehensive');

      expect(result.gaps).toHaveLength(1);
      expect(result.gaps[0]).toMatchObject({
        parameter: 'transport_distance',
        category: 'out_of_range',
        observedValue: 25_000,
      });
      expect(result.parameters.transport_distance?.value).toBe(25_000);
      expect(result.parameters.transport_distance?.source).toBe('measured');
      for (const metric of Object.values(result.metrics)) {
        expect(metric?.source).toBe('computed');
      }
      expect(result.trackedGapIds).toEqual({ transport_distance: 'gap-1' });
      expect(gapRepo.rows[0].predicted_value).toBeNull();
    });

    it('should flag metrics resting on a weak estimate', async () => {
      const result = await engine.analyze({ ...ALUMINUM_PROCESS, material: undefined }, 'comprehensive');

      expect(result.parameters.material?.value).toBe('aluminum');
      expect(result.lowConfidenceMetrics).toContain('carbon_footprint_production');
      expect(result.lowConfidenceMetrics).toContain('circularity_score');
      expect(result.lowConfidenceMetrics).not.toContain('cmur');
      expect(result.metrics.carbon_footprint_production?.lowConfidence).toBe(true);
    });

    it('should honor a configured confidence floor', async () => {
      const strict = build({ confidenceFloor: 0.8 });
      const result = await strict.analyze(withoutRecycling, 'circularity');

      expect(result.parameters.recycling_rate?.lowConfidence).toBe(true);
      expect(result.recommendations.at(-1)).toEqual({
        priority: 'Low',
        category: 'data_quality',
        action: 'Measure recycling_rate directly',
        impact: 'Replaces an estimate with confidence 0.70',
      });
    });

    it('should keep going when gap storage fails', async () => {
      gapRepo.failWith = new Error('timeout');
      const result = await engine.analyze(withoutRecycling, 'comprehensive');

      expect(result.trackedGapIds).toEqual({});
      expect(result.metrics.cmur?.source).toBe('predicted');
      expect(logger.byLevel('error').map((e) => e.message)).toEqual(['Failed to persist data gaps']);
    });

    it('should give identical results for concurrent runs', async () => {
      const results = await Promise.all(
        Array.from({ length: 5 }, () => engine.analyze(withoutRecycling, 'comprehensive'))
      );
      for (const result of results) {
        expect(result.metrics).toEqual(results[0].metrics);
      }
    });
  });

  // --- analyze(): score fallbacks ---

  describe('without score models', () => {
    it('should fall back to heuristic scores', async () => {
      const bare = build({ adapter: new PredictorAdapter([]) });
      const { metrics } = await bare.analyze(ALUMINUM_PROCESS, 'comprehensive');

      expect(metrics.environmental_score).toMatchObject({
        source: 'predicted',
        confidence: 0.5,
        flags: ['fallback'],
        predictor: null,
      });
      expect(metrics.environmental_score?.value).toBeCloseTo(100 * (1 - 2310.8625 / 12000), 6);
      expect(metrics.circularity_score?.value).toBeCloseTo(65.3, 8);
    });

    it('should fall back when a score model is unavailable', async () => {
      const fake = new FakePredictor(
        { name: 'env-fake', role: 'environmental', features: ['recycling_rate'] },
        { kind: 'scalar', value: 90, score: 0.9 }
      );
      fake.failUnavailable('timeout');
      const flaky = build({ adapter: new PredictorAdapter([fake]) });

      const { metrics } = await flaky.analyze(ALUMINUM_PROCESS, 'environmental');

      expect(metrics.environmental_score?.flags).toEqual(['fallback']);
      const [warning] = logger.byLevel('warn');
      expect(warning.message).toBe('Score model unavailable, using heuristic fallback');
      expect(warning.fields?.predictor).toBe('env-fake');
    });

    it('should clamp a model score into 0–100', async () => {
      const fake = new FakePredictor(
        { name: 'circ-fake', role: 'circularity', features: ['recycling_rate'] },
        { kind: 'scalar', value: 140, score: 0.9 }
      );
      const result = await build({ adapter: new PredictorAdapter([fake]) }).analyze(ALUMINUM_PROCESS, 'circularity');
      expect(result.metrics.circularity_score?.value).toBe(100);
    });
  });

  // --- analyze(): failures ---

  it('should reject invalid input with every violation', async () => {
    await expect(engine.analyze({ production_rate: -5 }, 'comprehensive')).rejects.toThrow(ValidationError);
    await expect(engine.analyze(ALUMINUM_PROCESS, 'lifecycle')).rejects.toThrow(
      '1 invalid field: analysis_type: must be one of: environmental, circularity, comprehensive'
    );
  });

  it('should refuse to return a partial result', async () => {
    const noDefaults = build({ adapter: new PredictorAdapter([]), tables: { ...tables, defaults: {} } });

    const run = noDefaults.analyze({ material: 'glass' }, 'comprehensive');

    await expect(run).rejects.toThrow(IncompleteAnalysisError);
    await run.catch((err: unknown) => {
      expect(err instanceof IncompleteAnalysisError && err.missingMetrics).toContain('cmur');
    });
    expect(gapRepo.rows).toEqual([]);
  });

  // --- detectGaps() / predictMissing() ---

  it('should detect and fill gaps without computing metrics', async () => {
    const raw = { material: 'aluminum', renewable_energy_percent: 35, transport_distance: 500 };
    const gaps = await engine.detectGaps(raw, 'circularity');
    expect(gaps.map((g) => g.parameter)).toEqual(['recycling_rate', 'production_rate']);

    const predicted = await engine.predictMissing(raw, gaps);
    expect(predicted.recycling_rate).toMatchObject({ confidence: 0.7, source: 'predicted', method: 'model' });
    expect(predicted.production_rate).toEqual({ value: 1000, confidence: 0.2, source: 'predicted', method: 'default' });
    expect(Object.isFrozen(predicted)).toBe(true);
  });

  // --- recordFeedback() / getPerformance() ---

  it('should record feedback against the default estimator', async () => {
    const performance = await engine.recordFeedback('recycling_rate', 0.6, 0.7);

    expect(performance.predictorName).toBe('estimator:recycling_rate');
    expect(performance.meanAccuracy).toBeCloseTo(0.9, 10);
    expect((await engine.getPerformance('estimator:recycling_rate')).sampleCount).toBe(1);
    expect(logger.byLevel('info').map((e) => e.message)).toContain('feedback');
  });

  it('should reject feedback with an impossible actual value', async () => {
    await expect(engine.recordFeedback('renewable_energy_percent', 30, 140)).rejects.toThrow(
      InconsistentFeedbackError
    );
  });

  // --- confirmGap() ---

  describe('confirmGap()', () => {
    it('should score the estimate and close the gap', async () => {
      await engine.analyze({ ...ALUMINUM_PROCESS, recycling_rate: undefined }, 'comprehensive');

      const { gap, performance } = await engine.confirmGap('gap-1', 0.74);

      expect(gap.status).toBe('confirmed');
      expect(gap.actualValue).toBe(0.74);
      expect(performance.predictorName).toBe('recycling-rate-aluminum');
      expect(performance.meanAccuracy).toBeCloseTo(0.95, 10);
      expect((await engine.getGapStatistics()).confirmedGaps).toBe(1);
    });

    it('should refuse to confirm a gap twice', async () => {
      await engine.analyze({ ...ALUMINUM_PROCESS, recycling_rate: undefined }, 'comprehensive');
      await engine.confirmGap('gap-1', 0.74);

      await expect(engine.confirmGap('gap-1', 0.74)).rejects.toThrow('Data gap "gap-1" is already confirmed');
    });

    it('should leave the gap pending when the actual value is impossible', async () => {
      await engine.analyze({ ...ALUMINUM_PROCESS, recycling_rate: undefined }, 'comprehensive');

      await expect(engine.confirmGap('gap-1', 2)).rejects.toThrow(InconsistentFeedbackError);
      expect(gapRepo.rows[0].status).toBe('pending');
    });

    it('should throw for an unknown gap', async () => {
      await expect(engine.confirmGap('gap-404', 1)).rejects.toThrow(NotFoundError);
    });

    it('should refuse to confirm a gap that has no estimate', async () => {
      await engine.analyze({ ...ALUMINUM_PROCESS, transport_distance: 25_000 }, 'comprehensive');

      await expect(engine.confirmGap('gap-1', 600)).rejects.toThrow('Data gap "gap-1" has no estimate to confirm');
    });

    it('should count a retried confirmation once', async () => {
      await engine.analyze({ ...ALUMINUM_PROCESS, recycling_rate: undefined }, 'comprehensive');
      gapRepo.failNextConfirmWith = new Error('db down');

      await expect(engine.confirmGap('gap-1', 0.74)).rejects.toThrow('db down');
      expect(gapRepo.rows[0].status).toBe('pending');

      const { gap, performance } = await engine.confirmGap('gap-1', 0.74);

      expect(gap.status).toBe('confirmed');
      expect(performance.sampleCount).toBe(1);
      expect((await engine.getPerformance('recycling-rate-aluminum')).sampleCount).toBe(1);
    });

    it('should confirm a gap once under concurrent calls', async () => {
      await engine.analyze({ ...ALUMINUM_PROCESS, recycling_rate: undefined }, 'comprehensive');

      const results = await Promise.allSettled([engine.confirmGap('gap-1', 0.74), engine.confirmGap('gap-1', 0.74)]);

      expect(results.map((r) => r.status)).toEqual(['fulfilled', 'rejected']);
      const rejected = results[1];
      expect(rejected.status === 'rejected' && rejected.reason).toBeInstanceOf(ValidationError);
      expect((await engine.getPerformance('recycling-rate-aluminum')).sampleCount).toBe(1);
      expect((await engine.getGapStatistics()).confirmedGaps).toBe(1);
    });
  });

  // --- health() ---

  it('should report a healthy engine', async () => {
    expect(await engine.health()).toEqual({
      status: 'ok',
      referenceVersion: '2025.1',
      predictorsLoaded: ['circularity-score', 'environmental-impact', 'material-classifier', 'recycling-rate-aluminum'],
      totalGapsTracked: 0,
    });
  });

  it('should report degraded health when gap storage is down', async () => {
    gapRepo.failWith = new Error('timeout');
    const health = await engine.health();

    expect(health.status).toBe('degraded');
    expect(health.totalGapsTracked).toBeNull();
    expect(logger.byLevel('error').map((e) => e.message)).toEqual(['Gap storage unreachable']);
  });

  it('should report degraded health without predictors', async () => {
    expect((await build({ adapter: new PredictorAdapter([]) }).health()).status).toBe('degraded');
  });
});
