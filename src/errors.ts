/**
 * Engine error hierarchy.
 * Every error the boundary layer can see is an AppError with a stable code,
 * a suggested status code for whatever transport wraps the engine, and
 * optional structured details.
 */

export type ErrorCode =
  | 'INVALID_REQUEST'
  | 'NOT_FOUND'
  | 'PREDICTOR_UNAVAILABLE'
  | 'INCONSISTENT_FEEDBACK'
  | 'INCOMPLETE_ANALYSIS'
  | 'INTERNAL_ERROR';

export class AppError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    readonly statusCode: number = 500,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** One rejected input field. */
export interface FieldViolation {
  field: string;
  reason: string;
  value?: unknown;
}

export class ValidationError extends AppError {
  readonly violations: FieldViolation[];

  constructor(message: string, violations: FieldViolation[] = []) {
    super(
      'INVALID_REQUEST',
      message,
      400,
      violations.length > 0 ? { fields: violations } : undefined
    );
    this.violations = violations;
  }

  static fromViolations(violations: FieldViolation[]): ValidationError {
    const summary = violations.map((v) => `${v.field}: ${v.reason}`).join('; ');
    return new ValidationError(
      `${violations.length} invalid field${violations.length === 1 ? '' : 's'}: ${summary}`,
      violations
    );
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Resource not found') {
    super('NOT_FOUND', message, 404);
  }
}

/**
 * A statistical predictor could not be evaluated.
 * Always recovered inside the engine with a heuristic fallback.
 */
export class PredictorUnavailableError extends AppError {
  constructor(
    readonly predictorName: string,
    reason: string
  ) {
    super(
      'PREDICTOR_UNAVAILABLE',
      `Predictor "${predictorName}" unavailable: ${reason}`,
      503,
      { predictor: predictorName, reason }
    );
  }
}

export class InconsistentFeedbackError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INCONSISTENT_FEEDBACK', message, 422, details);
  }
}

export class IncompleteAnalysisError extends AppError {
  constructor(readonly missingMetrics: string[]) {
    super(
      'INCOMPLETE_ANALYSIS',
      `Analysis could not produce required metrics: ${missingMetrics.join(', ')}`,
      500,
      { metrics: missingMetrics }
    );
  }
}
