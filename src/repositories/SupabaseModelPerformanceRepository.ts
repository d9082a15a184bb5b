/**
 * Supabase implementation of IModelPerformanceRepository.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { ModelPerformanceRow } from '../types/database.js';
import type { ModelPerformance } from '../types/models.js';
import type { IModelPerformanceRepository } from './IModelPerformanceRepository.js';

export class SupabaseModelPerformanceRepository implements IModelPerformanceRepository {
  constructor(private readonly db: SupabaseClient) {}

  async upsert(performance: ModelPerformance): Promise<ModelPerformanceRow> {
    const { data, error } = await this.db
      .from('model_performance')
      .upsert(
        {
          predictor_name: performance.predictorName,
          sample_count: performance.sampleCount,
          mean_accuracy: performance.meanAccuracy,
          accuracy_variance: performance.accuracyVariance,
          mean_absolute_error: performance.meanAbsoluteError,
          recent_accuracy: performance.recentAccuracy,
          trend: performance.trend,
          updated_at: (performance.updatedAt ?? new Date()).toISOString(),
        },
        { onConflict: 'predictor_name' }
      )
      .select()
      .single();

    if (error) throw new Error(`Failed to upsert model performance: ${error.message}`);
    return data as ModelPerformanceRow;
  }

  async findByName(predictorName: string): Promise<ModelPerformanceRow | null> {
    const { data, error } = await this.db
      .from('model_performance')
      .select('*')
      .eq('predictor_name', predictorName)
      .maybeSingle();

    if (error) throw new Error(`Failed to fetch model performance: ${error.message}`);
    return data as ModelPerformanceRow | null;
  }
}
