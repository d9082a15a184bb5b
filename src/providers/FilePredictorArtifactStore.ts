/**
 * Artifact store backed by a directory of `*.json` files.
 * Files are read in name order so the registry is identical across restarts.
 */

import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ValidationError } from '../errors.js';
import type { IPredictorArtifactStore } from './IPredictorArtifactStore.js';
import { parseArtifact, type PredictorArtifact } from './predictorArtifact.js';

export class FilePredictorArtifactStore implements IPredictorArtifactStore {
  constructor(private readonly directory: string) {}

  async loadAll(): Promise<PredictorArtifact[]> {
    const entries = await readdir(this.directory);
    const files = entries.filter((f) => f.endsWith('.json')).sort();

    const artifacts: PredictorArtifact[] = [];
    const seen = new Set<string>();

    for (const file of files) {
      const path = join(this.directory, file);
      const text = await readFile(path, 'utf8');

      let json: unknown;
      try {
        json = JSON.parse(text);
      } catch {
        throw new ValidationError(`Artifact ${file} is not valid JSON`);
      }

      const artifact = parseArtifact(json, file);
      if (seen.has(artifact.name)) {
        throw new ValidationError(`Duplicate predictor name "${artifact.name}" in ${file}`);
      }
      seen.add(artifact.name);
      artifacts.push(artifact);
    }

    return artifacts;
  }
}
