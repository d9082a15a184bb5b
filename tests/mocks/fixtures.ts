import { fileURLToPath } from 'node:url';
import { FilePredictorArtifactStore } from '../../src/providers/FilePredictorArtifactStore.js';
import { loadReferenceTables, type ReferenceTables } from '../../src/reference/ReferenceTables.js';
import { PredictorAdapter } from '../../src/services/PredictorAdapter.js';

export const REFERENCE_TABLES_PATH = fileURLToPath(new URL('../../data/reference-tables.json', import.meta.url));
export const MODELS_DIR = fileURLToPath(new URL('../../models', import.meta.url));

export function loadTestTables(): Promise<ReferenceTables> {
  return loadReferenceTables(REFERENCE_TABLES_PATH);
}

/** Adapter over the artifacts shipped in models/. */
export function loadShippedAdapter(): Promise<PredictorAdapter> {
  return PredictorAdapter.fromStore(new FilePredictorArtifactStore(MODELS_DIR));
}

/** The aluminum process with every field the full analysis needs. */
export const ALUMINUM_PROCESS = Object.freeze({
  material: 'aluminum',
  production_rate: 1000,
  energy_use: 5000,
  water_use: 2500,
  transport_distance: 500,
  recycling_rate: 0.8,
  renewable_energy_percent: 35,
});
