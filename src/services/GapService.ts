/**
 * Gap tracking service.
 * Persists the gaps each analysis filled so users can later confirm the
 * real values, and reports how estimates have held up per parameter.
 */

import { NotFoundError, ValidationError } from '../errors.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { IDataGapRepository } from '../repositories/IDataGapRepository.js';
import { decodeValue } from '../repositories/values.js';
import type { FieldPerformance, GapStatistics } from '../types/api.js';
import type { AnalysisType, ParameterName, ParameterValue } from '../types/common.js';
import type { DataGapRow } from '../types/database.js';
import type { DataGap, ParameterEstimates, TrackedGap } from '../types/models.js';

export class GapService {
  constructor(
    private readonly gapRepo: IDataGapRepository,
    private readonly logger: ILogProvider
  ) {}

  /**
   * Persist one analysis's gaps with their estimates. Returns storage ids by
   * parameter; a storage failure is logged and yields no ids.
   */
  async track(
    analysisType: AnalysisType,
    gaps: readonly DataGap[],
    estimates: ParameterEstimates
  ): Promise<Partial<Record<ParameterName, string>>> {
    if (gaps.length === 0) return {};

    try {
      const rows = await this.gapRepo.insertMany(
        gaps.map((gap) => {
          const estimate = estimates[gap.parameter];
          return {
            parameter: gap.parameter,
            materialType: gap.materialType,
            analysisType,
            category: gap.category,
            priority: gap.priority,
            dependentCount: gap.dependents.length,
            observedValue: gap.observedValue,
            predictedValue: estimate?.value ?? null,
            confidence: estimate?.confidence ?? null,
            method: estimate?.method ?? null,
            predictorName: estimate?.predictor ?? null,
            reason: gap.reason,
          };
        })
      );

      const ids: Partial<Record<ParameterName, string>> = {};
      for (const row of rows) ids[row.parameter] = row.id;
      return ids;
    } catch (err) {
      this.logger.error('Failed to persist data gaps', {
        analysisType,
        gapCount: gaps.length,
        error: err instanceof Error ? err.message : String(err),
      });
      return {};
    }
  }

  async findById(id: string): Promise<TrackedGap> {
    const row = await this.gapRepo.findById(id);
    if (!row) {
      throw new NotFoundError(`Data gap "${id}" not found`);
    }
    return this.rowToGap(row);
  }

  /** Throws ValidationError when the gap is no longer pending. */
  async markConfirmed(id: string, actualValue: ParameterValue, confirmedAt: Date): Promise<TrackedGap> {
    const row = await this.gapRepo.markConfirmed(id, actualValue, confirmedAt);
    if (!row) {
      throw new ValidationError(`Data gap "${id}" is not pending`);
    }
    return this.rowToGap(row);
  }

  async getStatistics(): Promise<GapStatistics> {
    const [counts, fields] = await Promise.all([
      this.gapRepo.count(),
      this.gapRepo.getFieldStats(),
    ]);

    const fieldPerformance: FieldPerformance[] = fields
      .map((f) => ({
        fieldName: f.parameter,
        gapCount: f.gap_count,
        confirmedCount: f.confirmed_count,
        avgConfidence: f.avg_confidence === null ? null : Math.round(f.avg_confidence * 1000) / 1000,
      }))
      .sort((a, b) => b.gapCount - a.gapCount || a.fieldName.localeCompare(b.fieldName));

    return {
      totalGaps: counts.total,
      confirmedGaps: counts.confirmed,
      pendingGaps: counts.total - counts.confirmed,
      confirmationRate: counts.total > 0 ? Math.round((1000 * counts.confirmed) / counts.total) / 10 : 0,
      fieldPerformance,
    };
  }

  async countTracked(): Promise<number> {
    return (await this.gapRepo.count()).total;
  }

  private rowToGap(row: DataGapRow): TrackedGap {
    return {
      id: row.id,
      parameter: row.parameter,
      materialType: row.material_type,
      analysisType: row.analysis_type,
      category: row.category,
      priority: row.priority,
      dependentCount: row.dependent_count,
      observedValue: decodeValue(row.observed_value, row.value_kind),
      predictedValue: decodeValue(row.predicted_value, row.value_kind),
      confidence: row.confidence_score,
      method: row.method,
      predictorName: row.predictor_name,
      status: row.status,
      actualValue: decodeValue(row.actual_value, row.value_kind),
      reason: row.reason,
      createdAt: new Date(row.created_at),
      confirmedAt: row.confirmed_at ? new Date(row.confirmed_at) : null,
    };
  }
}
