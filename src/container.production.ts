/**
 * Production container — Supabase storage, artifacts from disk.
 * Requires SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY.
 */

import { loadConfig } from './config.js';
import { createContainer, type Container } from './container.js';
import { getSupabaseClient } from './db.js';
import { AxiomLogProvider } from './providers/AxiomLogProvider.js';
import { ConsoleLogProvider } from './providers/ConsoleLogProvider.js';
import { FilePredictorArtifactStore } from './providers/FilePredictorArtifactStore.js';
import { loadReferenceTables } from './reference/ReferenceTables.js';
import { SupabaseDataGapRepository } from './repositories/SupabaseDataGapRepository.js';
import { SupabaseModelPerformanceRepository } from './repositories/SupabaseModelPerformanceRepository.js';
import { SupabasePredictionFeedbackRepository } from './repositories/SupabasePredictionFeedbackRepository.js';
import { PredictorAdapter } from './services/PredictorAdapter.js';

let cached: Promise<Container> | null = null;

export function getProductionContainer(): Promise<Container> {
  if (!cached) {
    cached = build().catch((err: unknown) => {
      // Let the next caller retry
      cached = null;
      throw err;
    });
  }
  return cached;
}

async function build(): Promise<Container> {
  const config = loadConfig();

  if (!config.supabase) {
    throw new Error('Missing required environment variables: SUPABASE_URL, SUPABASE_SERVICE_ROLE_KEY');
  }

  const db = getSupabaseClient(config.supabase.url, config.supabase.serviceRoleKey);

  // Axiom logging when configured, console otherwise
  const logProvider = config.axiom
    ? new AxiomLogProvider({
        apiToken: config.axiom.apiToken,
        dataset: config.axiom.dataset,
        minLevel: config.logLevel,
      })
    : new ConsoleLogProvider({ outputToConsole: true, minLevel: config.logLevel });

  const [tables, adapter] = await Promise.all([
    loadReferenceTables(config.referenceTablesPath),
    PredictorAdapter.fromStore(
      new FilePredictorArtifactStore(config.predictorArtifactDir),
      config.remoteScoring ?? undefined
    ),
  ]);

  logProvider.info('Engine started', {
    referenceVersion: tables.version,
    predictors: adapter.names(),
  });

  return createContainer({
    tables,
    adapter,
    gapRepo: new SupabaseDataGapRepository(db),
    feedbackRepo: new SupabasePredictionFeedbackRepository(db),
    performanceRepo: new SupabaseModelPerformanceRepository(db),
    logProvider,
    confidenceFloor: config.confidenceFloor,
  });
}
