/**
 * Runtime configuration, read once from environment variables.
 */

import { resolve } from 'node:path';
import { ValidationError, type FieldViolation } from './errors.js';
import { isLogLevel, type LogLevel } from './providers/ILogProvider.js';
import { DEFAULT_CONFIDENCE_FLOOR } from './services/AnalysisEngine.js';

export interface EngineConfig {
  confidenceFloor: number;
  predictorArtifactDir: string;
  referenceTablesPath: string;
  logLevel: LogLevel;
  remoteScoring: { baseUrl: string; apiKey?: string } | null;
  supabase: { url: string; serviceRoleKey: string } | null;
  axiom: { apiToken: string; dataset: string } | null;
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd()
): EngineConfig {
  const errors: FieldViolation[] = [];

  let confidenceFloor = DEFAULT_CONFIDENCE_FLOOR;
  const rawFloor = env.LCA_CONFIDENCE_FLOOR?.trim();
  if (rawFloor) {
    const n = Number(rawFloor);
    if (!Number.isFinite(n) || n < 0 || n > 1) {
      errors.push({ field: 'LCA_CONFIDENCE_FLOOR', reason: 'must be a number in [0, 1]', value: rawFloor });
    } else {
      confidenceFloor = n;
    }
  }

  let logLevel: LogLevel = 'info';
  const rawLevel = env.LOG_LEVEL?.trim().toLowerCase();
  if (rawLevel) {
    if (isLogLevel(rawLevel)) {
      logLevel = rawLevel;
    } else {
      errors.push({ field: 'LOG_LEVEL', reason: 'must be one of: debug, info, warn, error', value: rawLevel });
    }
  }

  let remoteScoring: EngineConfig['remoteScoring'] = null;
  const scoringUrl = env.REMOTE_SCORING_URL?.trim();
  if (scoringUrl) {
    if (!isHttpUrl(scoringUrl)) {
      errors.push({ field: 'REMOTE_SCORING_URL', reason: 'must be an http(s) URL', value: scoringUrl });
    } else {
      const apiKey = env.REMOTE_SCORING_API_KEY?.trim();
      remoteScoring = apiKey ? { baseUrl: scoringUrl, apiKey } : { baseUrl: scoringUrl };
    }
  }

  const supabase = pair(env, 'SUPABASE_URL', 'SUPABASE_SERVICE_ROLE_KEY', errors);
  const axiom = pair(env, 'AXIOM_API_KEY', 'AXIOM_DATASET', errors);

  if (errors.length > 0) {
    throw ValidationError.fromViolations(errors);
  }

  return {
    confidenceFloor,
    predictorArtifactDir: resolve(cwd, env.PREDICTOR_ARTIFACT_DIR?.trim() || 'models'),
    referenceTablesPath: resolve(cwd, env.REFERENCE_TABLES_PATH?.trim() || 'data/reference-tables.json'),
    logLevel,
    remoteScoring,
    supabase: supabase ? { url: supabase[0], serviceRoleKey: supabase[1] } : null,
    axiom: axiom ? { apiToken: axiom[0], dataset: axiom[1] } : null,
  };
}

/** Two variables that only make sense together: both or neither. */
function pair(
  env: Record<string, string | undefined>,
  first: string,
  second: string,
  errors: FieldViolation[]
): [string, string] | null {
  const a = env[first]?.trim();
  const b = env[second]?.trim();
  if (a && b) return [a, b];
  if (a || b) {
    errors.push({ field: a ? second : first, reason: `must be set together with ${a ? first : second}` });
  }
  return null;
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}
