/**
 * Supabase implementation of IDataGapRepository.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { ParameterValue } from '../types/common.js';
import type { DataGapRow, GapFieldStatsRow } from '../types/database.js';
import type { CreateGapInput, GapCounts, IDataGapRepository } from './IDataGapRepository.js';
import { encodeValue, valueKindOf } from './values.js';

export class SupabaseDataGapRepository implements IDataGapRepository {
  constructor(private readonly db: SupabaseClient) {}

  async insertMany(inputs: CreateGapInput[]): Promise<DataGapRow[]> {
    if (inputs.length === 0) return [];

    const { data, error } = await this.db
      .from('data_gaps')
      .insert(
        inputs.map((input) => ({
          parameter: input.parameter,
          material_type: input.materialType,
          analysis_type: input.analysisType,
          category: input.category,
          priority: input.priority,
          dependent_count: input.dependentCount,
          value_kind: valueKindOf(input.parameter),
          observed_value: encodeValue(input.observedValue),
          predicted_value: encodeValue(input.predictedValue),
          confidence_score: input.confidence,
          method: input.method,
          predictor_name: input.predictorName,
          status: 'pending',
          reason: input.reason,
        }))
      )
      .select();

    if (error) throw new Error(`Failed to insert data gaps: ${error.message}`);
    return (data ?? []) as DataGapRow[];
  }

  async findById(id: string): Promise<DataGapRow | null> {
    const { data, error } = await this.db
      .from('data_gaps')
      .select('*')
      .eq('id', id)
      .maybeSingle();

    if (error) throw new Error(`Failed to fetch data gap: ${error.message}`);
    return data as DataGapRow | null;
  }

  async markConfirmed(id: string, actualValue: ParameterValue, confirmedAt: Date): Promise<DataGapRow | null> {
    const { data, error } = await this.db
      .from('data_gaps')
      .update({
        status: 'confirmed',
        actual_value: encodeValue(actualValue),
        confirmed_at: confirmedAt.toISOString(),
      })
      .eq('id', id)
      .eq('status', 'pending')
      .select()
      .maybeSingle();

    if (error) throw new Error(`Failed to confirm data gap: ${error.message}`);
    return data as DataGapRow | null;
  }

  async count(): Promise<GapCounts> {
    const total = await this.db
      .from('data_gaps')
      .select('*', { count: 'exact', head: true });
    if (total.error) throw new Error(`Failed to count data gaps: ${total.error.message}`);

    const confirmed = await this.db
      .from('data_gaps')
      .select('*', { count: 'exact', head: true })
      .eq('status', 'confirmed');
    if (confirmed.error) throw new Error(`Failed to count data gaps: ${confirmed.error.message}`);

    return { total: total.count ?? 0, confirmed: confirmed.count ?? 0 };
  }

  async getFieldStats(): Promise<GapFieldStatsRow[]> {
    const { data, error } = await this.db.rpc('get_gap_field_stats');

    if (error) throw new Error(`Failed to get gap field stats: ${error.message}`);
    return (data ?? []) as GapFieldStatsRow[];
  }
}
