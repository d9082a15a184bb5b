/**
 * Model performance persistence interface.
 * One row per predictor, overwritten on every update.
 */

import type { ModelPerformanceRow } from '../types/database.js';
import type { ModelPerformance } from '../types/models.js';

export interface IModelPerformanceRepository {
  upsert(performance: ModelPerformance): Promise<ModelPerformanceRow>;

  findByName(predictorName: string): Promise<ModelPerformanceRow | null>;
}
