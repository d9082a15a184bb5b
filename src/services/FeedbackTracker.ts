/**
 * Feedback & performance tracker.
 * Compares predicted values with the real values users report and keeps a
 * running performance record per predictor: Welford mean and variance of
 * accuracy, mean absolute error, an exponentially weighted recent accuracy
 * and its trend.
 *
 * This is the only writer of ModelPerformance. Updates to one predictor are
 * serialized; different predictors update concurrently. Reapplying the same
 * feedback is a no-op: feedback tied to a data gap counts once per gap,
 * other feedback once per (parameter, predicted, actual, timestamp).
 * Persistence is best-effort: a storage failure is logged and the in-memory
 * aggregate keeps the update.
 */

import { createHash } from 'node:crypto';
import { InconsistentFeedbackError, NotFoundError, ValidationError } from '../errors.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import { getParameterSchema, isParameterName } from '../reference/parameters.js';
import type { ReferenceTables } from '../reference/ReferenceTables.js';
import type { IModelPerformanceRepository } from '../repositories/IModelPerformanceRepository.js';
import type { IPredictionFeedbackRepository } from '../repositories/IPredictionFeedbackRepository.js';
import type { RecordFeedbackResponse } from '../types/api.js';
import type { ParameterName, ParameterValue } from '../types/common.js';
import type { ModelPerformanceRow } from '../types/database.js';
import type { ModelPerformance, TrendDirection } from '../types/models.js';
import { KeyedSerialQueue } from '../utils/KeyedSerialQueue.js';

/** Weight of the newest sample in the recent-accuracy average. */
export const RECENT_ACCURACY_ALPHA = 0.2;

/** Smallest move of the recent accuracy reported as a trend. */
export const TREND_THRESHOLD = 0.01;

/** Fingerprints kept in memory; older ones are looked up in storage. */
export const DEFAULT_FINGERPRINT_CACHE_SIZE = 10_000;

export interface FeedbackTrackerOptions {
  fingerprintCacheSize?: number;
}

export interface FeedbackInput {
  parameter: string;
  predicted: unknown;
  actual: unknown;
  predictorName?: string;
  timestamp?: Date;
  gapId?: string | null;
}

interface NormalizedFeedback {
  parameter: ParameterName;
  predicted: ParameterValue;
  actual: ParameterValue;
  accuracy: number;
  absoluteError: number;
}

/** Predictor credited when the caller names none. */
export function defaultPredictorName(parameter: string): string {
  return `estimator:${parameter}`;
}

export class FeedbackTracker {
  private readonly performance = new Map<string, ModelPerformance>();
  private readonly applied = new Set<string>();
  private readonly queue = new KeyedSerialQueue();
  private readonly fingerprintCacheSize: number;

  constructor(
    private readonly feedbackRepo: IPredictionFeedbackRepository,
    private readonly performanceRepo: IModelPerformanceRepository,
    private readonly tables: ReferenceTables,
    private readonly logger: ILogProvider,
    options: FeedbackTrackerOptions = {}
  ) {
    this.fingerprintCacheSize = Math.max(1, options.fingerprintCacheSize ?? DEFAULT_FINGERPRINT_CACHE_SIZE);
  }

  async record(input: FeedbackInput): Promise<RecordFeedbackResponse> {
    const feedback = this.normalize(input);
    const predictorName = input.predictorName?.trim() || defaultPredictorName(feedback.parameter);
    const timestamp = input.timestamp ?? new Date();
    const gapId = input.gapId ?? null;
    const fingerprint = fingerprintOf(feedback, timestamp, gapId);

    return this.queue.run(predictorName, async () => {
      const current = await this.load(predictorName);

      if (await this.alreadyApplied(fingerprint)) {
        return {
          performance: current ?? Object.freeze(emptyPerformance(predictorName)),
          actual: feedback.actual,
          applied: false,
        };
      }

      const updated = Object.freeze(update(current, predictorName, feedback, timestamp));
      this.performance.set(predictorName, updated);
      this.remember(fingerprint);

      await this.persist(async () => {
        await this.feedbackRepo.insert({
          parameter: feedback.parameter,
          predictorName,
          predicted: feedback.predicted,
          actual: feedback.actual,
          accuracy: feedback.accuracy,
          fingerprint,
          gapId,
          recordedAt: timestamp,
        });
        await this.performanceRepo.upsert(updated);
      }, { predictorName, fingerprint });

      return { performance: updated, actual: feedback.actual, applied: true };
    });
  }

  /** Frozen snapshot of a predictor's performance. */
  async getPerformance(predictorName: string): Promise<ModelPerformance> {
    const performance = await this.load(predictorName);
    if (!performance) {
      throw new NotFoundError(`No performance recorded for predictor "${predictorName}"`);
    }
    return performance;
  }

  private normalize(input: FeedbackInput): NormalizedFeedback {
    if (!isParameterName(input.parameter)) {
      throw new ValidationError(`Unknown parameter "${input.parameter}"`, [
        { field: 'parameter', reason: 'unrecognized parameter', value: input.parameter },
      ]);
    }
    const parameter = input.parameter;
    const schema = getParameterSchema(parameter);

    if (schema.kind === 'numeric') {
      const predicted = toNumber(input.predicted);
      if (predicted === null) {
        throw new ValidationError('Predicted value must be a finite number', [
          { field: 'predicted', reason: 'must be a finite number', value: input.predicted },
        ]);
      }
      const actual = toNumber(input.actual);
      if (actual === null || actual < schema.min || actual > schema.max) {
        throw new InconsistentFeedbackError(
          `Actual ${parameter} must be a number in [${schema.min}, ${schema.max}] ${schema.unit}`,
          { parameter, actual: input.actual }
        );
      }
      return { parameter, predicted, actual, ...score(parameter, predicted, actual) };
    }

    const options = schema.options ?? Object.keys(this.tables.materials);
    if (typeof input.predicted !== 'string') {
      throw new ValidationError('Predicted value must be a string', [
        { field: 'predicted', reason: 'must be a string', value: input.predicted },
      ]);
    }
    const predicted = input.predicted.trim().toLowerCase();
    const actual = typeof input.actual === 'string' ? input.actual.trim().toLowerCase() : null;
    if (actual === null || !options.includes(actual)) {
      throw new InconsistentFeedbackError(
        `Actual ${parameter} must be one of: ${options.join(', ')}`,
        { parameter, actual: input.actual }
      );
    }
    return { parameter, predicted, actual, ...score(parameter, predicted, actual) };
  }

  private async load(predictorName: string): Promise<ModelPerformance | null> {
    const cached = this.performance.get(predictorName);
    if (cached) return cached;

    try {
      const row = await this.performanceRepo.findByName(predictorName);
      if (!row) return null;
      // A write may have landed while the read was in flight
      const raced = this.performance.get(predictorName);
      if (raced) return raced;
      const loaded = Object.freeze(rowToPerformance(row));
      this.performance.set(predictorName, loaded);
      return loaded;
    } catch (err) {
      this.logger.error('Failed to load model performance', {
        predictorName,
        error: err instanceof Error ? err.message : String(err),
      });
      return null;
    }
  }

  private async alreadyApplied(fingerprint: string): Promise<boolean> {
    if (this.applied.has(fingerprint)) return true;
    try {
      const existing = await this.feedbackRepo.findByFingerprint(fingerprint);
      if (existing) this.remember(fingerprint);
      return existing !== null;
    } catch (err) {
      this.logger.error('Failed to check feedback fingerprint', {
        fingerprint,
        error: err instanceof Error ? err.message : String(err),
      });
      return false;
    }
  }

  private remember(fingerprint: string): void {
    this.applied.delete(fingerprint);
    this.applied.add(fingerprint);
    // Sets iterate in insertion order: the first entry is the oldest
    for (const oldest of this.applied) {
      if (this.applied.size <= this.fingerprintCacheSize) break;
      this.applied.delete(oldest);
    }
  }

  private async persist(write: () => Promise<void>, fields: Record<string, unknown>): Promise<void> {
    try {
      await write();
    } catch (err) {
      this.logger.error('Failed to persist feedback', {
        ...fields,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}

// ── Scoring ──

function score(
  parameter: ParameterName,
  predicted: ParameterValue,
  actual: ParameterValue
): { accuracy: number; absoluteError: number } {
  const schema = getParameterSchema(parameter);
  if (schema.kind === 'categorical' || typeof predicted !== 'number' || typeof actual !== 'number') {
    const match = predicted === actual;
    return { accuracy: match ? 1 : 0, absoluteError: match ? 0 : 1 };
  }

  const absoluteError = Math.abs(predicted - actual);
  const scale = schema.accuracyScale ?? Math.max(Math.abs(predicted), Math.abs(actual));
  if (scale === 0) return { accuracy: 1, absoluteError };
  return { accuracy: 1 - Math.min(1, absoluteError / scale), absoluteError };
}

function fingerprintOf(feedback: NormalizedFeedback, timestamp: Date, gapId: string | null): string {
  const key = gapId !== null
    ? ['gap', gapId]
    : [feedback.parameter, feedback.predicted, feedback.actual, timestamp.toISOString()];
  return createHash('sha256').update(JSON.stringify(key)).digest('hex');
}

function toNumber(value: unknown): number | null {
  const n = typeof value === 'string' && value.trim() !== '' ? Number(value.trim()) : value;
  return typeof n === 'number' && Number.isFinite(n) ? n : null;
}

// ── Aggregation ──

function emptyPerformance(predictorName: string): ModelPerformance {
  return {
    predictorName,
    sampleCount: 0,
    meanAccuracy: 0,
    accuracyVariance: 0,
    meanAbsoluteError: 0,
    recentAccuracy: 0,
    trend: 'stable',
    updatedAt: null,
  };
}

function update(
  current: ModelPerformance | null,
  predictorName: string,
  feedback: NormalizedFeedback,
  timestamp: Date
): ModelPerformance {
  const prev = current ?? emptyPerformance(predictorName);
  const n = prev.sampleCount + 1;
  const x = feedback.accuracy;

  // Welford: carry the sum of squared deviations as variance × n
  const delta = x - prev.meanAccuracy;
  const mean = prev.meanAccuracy + delta / n;
  const m2 = prev.accuracyVariance * prev.sampleCount + delta * (x - mean);

  const recent = prev.sampleCount === 0
    ? x
    : RECENT_ACCURACY_ALPHA * x + (1 - RECENT_ACCURACY_ALPHA) * prev.recentAccuracy;

  return {
    predictorName,
    sampleCount: n,
    meanAccuracy: mean,
    accuracyVariance: Math.max(0, m2 / n),
    meanAbsoluteError: prev.meanAbsoluteError + (feedback.absoluteError - prev.meanAbsoluteError) / n,
    recentAccuracy: recent,
    trend: prev.sampleCount === 0 ? 'stable' : trendOf(recent - prev.recentAccuracy),
    updatedAt: timestamp,
  };
}

function trendOf(change: number): TrendDirection {
  if (change > TREND_THRESHOLD) return 'improving';
  if (change < -TREND_THRESHOLD) return 'declining';
  return 'stable';
}

function rowToPerformance(row: ModelPerformanceRow): ModelPerformance {
  return {
    predictorName: row.predictor_name,
    sampleCount: row.sample_count,
    meanAccuracy: row.mean_accuracy,
    accuracyVariance: row.accuracy_variance,
    meanAbsoluteError: row.mean_absolute_error,
    recentAccuracy: row.recent_accuracy,
    trend: row.trend === 'improving' || row.trend === 'declining' ? row.trend : 'stable',
    updatedAt: new Date(row.updated_at),
  };
}
