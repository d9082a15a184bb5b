/**
 * Parameter predictor.
 * Fills detected gaps, in gap order, with the best estimate available:
 *
 *   1. a parameter model through the adapter (material-specific first)
 *   2. the material's typical value from the reference tables
 *   3. the global default, at the lowest confidence
 *
 * Each estimate is added to a working description before the next gap is
 * handled, so later estimates may read earlier ones; their confidence is
 * discounted accordingly. Values that were present but invalid are never
 * fed to a model or heuristic.
 */

import { PredictorUnavailableError } from '../errors.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import { getParameterSchema } from '../reference/parameters.js';
import { getMaterialProfile, type ReferenceTables } from '../reference/ReferenceTables.js';
import type { ParameterName, ParameterValue } from '../types/common.js';
import type {
  DataGap,
  ParameterEstimate,
  ParameterEstimates,
  ProcessDescription,
} from '../types/models.js';
import { confidencesOf, discountForPredictedInputs, modelConfidence } from './confidence.js';
import type { PredictorAdapter } from './PredictorAdapter.js';

export class ParameterPredictor {
  constructor(
    private readonly tables: ReferenceTables,
    private readonly adapter: PredictorAdapter,
    private readonly logger: ILogProvider
  ) {}

  async predict(d: ProcessDescription, gaps: readonly DataGap[]): Promise<ParameterEstimates> {
    const working: Partial<Record<ParameterName, ParameterValue>> = { ...d };
    for (const gap of gaps) delete working[gap.parameter];

    const estimates: ParameterEstimates = {};
    for (const gap of gaps) {
      if (estimates[gap.parameter]) continue;
      const estimate =
        (await this.fromModel(gap.parameter, working, estimates)) ??
        this.fromHeuristic(gap.parameter, working, estimates) ??
        this.fromDefault(gap.parameter);
      if (!estimate) continue;

      estimates[gap.parameter] = estimate;
      working[gap.parameter] = estimate.value;
    }
    return estimates;
  }

  /** The description with every estimate written over it. */
  static merge(d: ProcessDescription, estimates: ParameterEstimates): ProcessDescription {
    const merged: Partial<Record<ParameterName, ParameterValue>> = { ...d };
    for (const estimate of Object.values(estimates)) {
      if (estimate) merged[estimate.parameter] = estimate.value;
    }
    return Object.freeze(merged);
  }

  private async fromModel(
    parameter: ParameterName,
    working: ProcessDescription,
    estimates: ParameterEstimates
  ): Promise<ParameterEstimate | null> {
    const material = typeof working.material === 'string' ? working.material : null;
    const descriptor = this.adapter.findEstimator(parameter, material);
    if (!descriptor) return null;

    try {
      const encoded = this.adapter.encodeFeatures(descriptor.name, working);
      const output = await this.adapter.evaluate(descriptor.name, encoded.vector);

      const raw = output.kind === 'scalar' ? output.value : output.label;
      const value = this.normalize(parameter, raw);
      if (value === null) {
        throw new PredictorUnavailableError(descriptor.name, `produced an unusable value for ${parameter}`);
      }

      const basedOn = encoded.parameters.filter((p) => estimates[p] !== undefined);
      return {
        parameter,
        value,
        confidence: modelConfidence(output.score, encoded.parameters.length, confidencesOf(basedOn, estimates)),
        source: 'predicted',
        method: 'model',
        predictor: descriptor.name,
        basedOn,
      };
    } catch (err) {
      if (!(err instanceof PredictorUnavailableError)) throw err;
      this.logger.warn('Parameter model unavailable, using heuristic', {
        parameter,
        predictor: descriptor.name,
        reason: err.message,
      });
      return null;
    }
  }

  private fromHeuristic(
    parameter: ParameterName,
    working: ProcessDescription,
    estimates: ParameterEstimates
  ): ParameterEstimate | null {
    const profile = getMaterialProfile(this.tables, working.material);
    const typical = profile?.typical[parameter];
    if (!typical) return null;

    const inputs: ParameterName[] = ['material'];
    let raw = typical.value;
    if (typical.perUnitOf) {
      const base = working[typical.perUnitOf];
      if (typeof base !== 'number') return null;
      raw *= base;
      inputs.push(typical.perUnitOf);
    }

    const value = this.normalize(parameter, raw);
    if (value === null) return null;

    const basedOn = inputs.filter((p) => estimates[p] !== undefined);
    return {
      parameter,
      value,
      confidence: discountForPredictedInputs(typical.confidence, inputs.length, confidencesOf(basedOn, estimates)),
      source: 'predicted',
      method: 'heuristic',
      predictor: null,
      basedOn,
    };
  }

  private fromDefault(parameter: ParameterName): ParameterEstimate | null {
    const fallback = this.tables.defaults[parameter];
    const value = fallback === undefined ? null : this.normalize(parameter, fallback);
    if (value === null) {
      this.logger.error('No default value for parameter', { parameter });
      return null;
    }
    return {
      parameter,
      value,
      confidence: this.tables.defaultConfidence,
      source: 'predicted',
      method: 'default',
      predictor: null,
      basedOn: [],
    };
  }

  /** Clamp numbers into the hard range; accept only known categories. */
  private normalize(parameter: ParameterName, raw: ParameterValue): ParameterValue | null {
    const schema = getParameterSchema(parameter);
    if (schema.kind === 'numeric') {
      if (typeof raw !== 'number' || !Number.isFinite(raw)) return null;
      return Math.max(schema.min, Math.min(schema.max, raw));
    }
    if (typeof raw !== 'string') return null;
    const label = raw.trim().toLowerCase();
    const options = schema.options ?? Object.keys(this.tables.materials);
    return options.includes(label) ? label : null;
  }
}
