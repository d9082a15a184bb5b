/**
 * Parameter validation and normalization.
 * Turns a raw caller mapping into a ProcessDescription. Pure: no I/O, no
 * logging. Every violation is collected before anything is reported.
 */

import { ValidationError, type FieldViolation } from '../errors.js';
import { getParameterSchema, isParameterName } from '../reference/parameters.js';
import type { ReferenceTables } from '../reference/ReferenceTables.js';
import {
  ANALYSIS_TYPES,
  type AnalysisType,
  type CategoricalParameterSchema,
  type NumericParameterSchema,
  type ParameterName,
  type ParameterValue,
} from '../types/common.js';
import type { ProcessDescription } from '../types/models.js';

export interface ClampedField {
  field: ParameterName;
  original: number;
  value: number;
}

export interface ValidationOutcome {
  description: ProcessDescription;
  analysisType: AnalysisType | null;
  clamped: ClampedField[];
  rejected: FieldViolation[];
}

export interface ValidatedInput {
  description: ProcessDescription;
  analysisType: AnalysisType;
  clamped: ClampedField[];
}

type FieldResult =
  | { ok: true; value: ParameterValue; clamped?: ClampedField }
  | { ok: false; reason: string };

export class ParameterValidator {
  constructor(private readonly tables: ReferenceTables) {}

  validate(raw: unknown, analysisType: unknown): ValidationOutcome {
    const type = ANALYSIS_TYPES.find((t) => t === analysisType) ?? null;
    const outcome = this.normalize(raw);
    if (type === null) {
      outcome.rejected.unshift({
        field: 'analysis_type',
        reason: `must be one of: ${ANALYSIS_TYPES.join(', ')}`,
        value: analysisType,
      });
    }
    return { ...outcome, analysisType: type };
  }

  /** Normalize a process description on its own, without an analysis type. */
  normalize(raw: unknown): Omit<ValidationOutcome, 'analysisType'> {
    const rejected: FieldViolation[] = [];
    const clamped: ClampedField[] = [];
    const description: Partial<Record<ParameterName, ParameterValue>> = {};

    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
      rejected.push({ field: 'input', reason: 'must be an object of parameter values' });
      return { description: Object.freeze(description), clamped, rejected };
    }

    for (const [key, value] of Object.entries(raw)) {
      if (!isParameterName(key)) {
        rejected.push({ field: key, reason: 'unrecognized parameter', value });
        continue;
      }

      // Absent values are gaps, not errors
      if (value === undefined || value === null || value === '') continue;

      const result = this.normalizeField(key, value);
      if (!result.ok) {
        rejected.push({ field: key, reason: result.reason, value });
        continue;
      }
      description[key] = result.value;
      if (result.clamped) clamped.push(result.clamped);
    }

    return { description: Object.freeze(description), clamped, rejected };
  }

  /** Validate, throwing one ValidationError that lists every violation. */
  assertValid(raw: unknown, analysisType: unknown): ValidatedInput {
    const outcome = this.validate(raw, analysisType);
    if (outcome.rejected.length > 0 || outcome.analysisType === null) {
      throw ValidationError.fromViolations(outcome.rejected);
    }
    return {
      description: outcome.description,
      analysisType: outcome.analysisType,
      clamped: outcome.clamped,
    };
  }

  /** Normalize a description alone, throwing on any violation. */
  assertValidDescription(raw: unknown): ProcessDescription {
    const outcome = this.normalize(raw);
    if (outcome.rejected.length > 0) {
      throw ValidationError.fromViolations(outcome.rejected);
    }
    return outcome.description;
  }

  /** Known material classes, from the reference tables. */
  materials(): string[] {
    return Object.keys(this.tables.materials);
  }

  private normalizeField(name: ParameterName, value: unknown): FieldResult {
    const schema = getParameterSchema(name);
    return schema.kind === 'numeric'
      ? this.normalizeNumeric(schema, value)
      : this.normalizeCategorical(schema, value);
  }

  private normalizeNumeric(schema: NumericParameterSchema, value: unknown): FieldResult {
    let n: number;
    if (typeof value === 'number') {
      n = value;
    } else if (typeof value === 'string' && value.trim() !== '') {
      n = Number(value.trim());
    } else {
      return { ok: false, reason: 'must be a number' };
    }

    if (!Number.isFinite(n)) {
      return { ok: false, reason: 'must be a finite number' };
    }

    if (n < schema.min) {
      if (schema.min - n <= schema.clampTolerance) {
        return { ok: true, value: schema.min, clamped: { field: schema.name, original: n, value: schema.min } };
      }
      return {
        ok: false,
        reason: schema.physical && n < 0
          ? `must not be negative (${schema.unit})`
          : `must be at least ${schema.min}`,
      };
    }

    if (n > schema.max) {
      if (n - schema.max <= schema.clampTolerance) {
        return { ok: true, value: schema.max, clamped: { field: schema.name, original: n, value: schema.max } };
      }
      return { ok: false, reason: `must be at most ${schema.max}` };
    }

    return { ok: true, value: n };
  }

  private normalizeCategorical(schema: CategoricalParameterSchema, value: unknown): FieldResult {
    if (typeof value !== 'string') {
      return { ok: false, reason: 'must be a string' };
    }
    const normalized = value.trim().toLowerCase();
    const options = schema.options ?? this.materials();
    if (!options.includes(normalized)) {
      return { ok: false, reason: `must be one of: ${options.join(', ')}` };
    }
    return { ok: true, value: normalized };
  }
}
