/**
 * Data gap persistence interface.
 * Stores the gaps found by each analysis with the estimate that filled them,
 * so users can later confirm the real value.
 */

import type { AnalysisType, ParameterName, ParameterValue } from '../types/common.js';
import type { DataGapRow, GapFieldStatsRow } from '../types/database.js';
import type { EstimationMethod, GapCategory, PriorityLevel } from '../types/models.js';

export interface CreateGapInput {
  parameter: ParameterName;
  materialType: string | null;
  analysisType: AnalysisType;
  category: GapCategory;
  priority: PriorityLevel;
  dependentCount: number;
  observedValue: ParameterValue | null;
  predictedValue: ParameterValue | null;
  confidence: number | null;
  method: EstimationMethod | null;
  /** Model that produced the estimate, when one did. */
  predictorName: string | null;
  reason: string;
}

export interface GapCounts {
  total: number;
  confirmed: number;
}

export interface IDataGapRepository {
  /** Insert gaps in order; rows come back in the same order. */
  insertMany(inputs: CreateGapInput[]): Promise<DataGapRow[]>;

  findById(id: string): Promise<DataGapRow | null>;

  /**
   * Record the confirmed value of a pending gap. Returns null when no pending
   * gap has this id.
   */
  markConfirmed(id: string, actualValue: ParameterValue, confirmedAt: Date): Promise<DataGapRow | null>;

  count(): Promise<GapCounts>;

  /** Per-parameter gap counts and average confidence. */
  getFieldStats(): Promise<GapFieldStatsRow[]>;
}
