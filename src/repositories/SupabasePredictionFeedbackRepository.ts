/**
 * Supabase implementation of IPredictionFeedbackRepository.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { PredictionFeedbackRow } from '../types/database.js';
import type {
  CreateFeedbackInput,
  IPredictionFeedbackRepository,
} from './IPredictionFeedbackRepository.js';
import { encodeValue, valueKindOf } from './values.js';

export class SupabasePredictionFeedbackRepository implements IPredictionFeedbackRepository {
  constructor(private readonly db: SupabaseClient) {}

  async insert(input: CreateFeedbackInput): Promise<PredictionFeedbackRow> {
    const { data, error } = await this.db
      .from('prediction_feedback')
      .insert({
        parameter: input.parameter,
        predictor_name: input.predictorName,
        value_kind: valueKindOf(input.parameter),
        predicted_value: encodeValue(input.predicted),
        actual_value: encodeValue(input.actual),
        accuracy: input.accuracy,
        fingerprint: input.fingerprint,
        gap_id: input.gapId,
        recorded_at: input.recordedAt.toISOString(),
      })
      .select()
      .single();

    if (error) throw new Error(`Failed to record feedback: ${error.message}`);
    return data as PredictionFeedbackRow;
  }

  async findByFingerprint(fingerprint: string): Promise<PredictionFeedbackRow | null> {
    const { data, error } = await this.db
      .from('prediction_feedback')
      .select('*')
      .eq('fingerprint', fingerprint)
      .maybeSingle();

    if (error) throw new Error(`Failed to fetch feedback: ${error.message}`);
    return data as PredictionFeedbackRow | null;
  }
}
