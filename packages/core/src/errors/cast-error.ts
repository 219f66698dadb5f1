/**
 * Error types raised by the casters
 */

export type CastErrorCode =
  | 'TARGET_TYPE_NOT_FOUND'
  | 'MALFORMED_SOURCE'
  | 'UNKNOWN_FIELD_REJECTED'
  | 'SHAPE_MISMATCH'
  | 'RELABEL_FAILED'
  | 'DYNAMIC_ASSIGN_UNSUPPORTED'
  | 'CYCLIC_GRAPH'
  | 'INSTANTIATION_FAILED'
  | 'FIELD_COPY_FAILED'
  | 'CONFIGURATION_ERROR'
  | 'UNKNOWN';

export interface CastErrorDetails {
  /** Error code for programmatic handling */
  code: CastErrorCode;
  /** Human-readable message */
  message: string;
  /** Suggested action to resolve */
  suggestion?: string;
  /** Original error (if wrapping) */
  cause?: Error;
  /** Field, path and type names involved */
  context?: Record<string, unknown>;
}

export class CastError extends Error {
  readonly code: CastErrorCode;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: CastErrorDetails) {
    super(details.message);
    this.name = 'CastError';
    this.code = details.code;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }

    // Maintains proper stack trace in V8 environments
    if ('captureStackTrace' in Error) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];

    const path = this.context?.['path'];
    if (typeof path === 'string' && path.length > 0) {
      parts.push(`Path: ${path}`);
    }

    if (this.suggestion) {
      parts.push(`Suggested action: ${this.suggestion}`);
    }

    return parts.join('\n');
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}

/**
 * Raised by the precompiled shape caster when a source lacks a captured field.
 * The caller promised an exact shape match, so this is thrown and never
 * returned as a result.
 */
export class ShapeMismatchError extends CastError {
  readonly field: string;

  constructor(field: string, sourceType: string, targetType: string) {
    super({
      code: 'SHAPE_MISMATCH',
      message: `Source ${sourceType} has no field '${field}' required by ${targetType}`,
      suggestion: 'Use recursiveCast for sources whose shape is not guaranteed',
      context: { field, sourceType, targetType },
    });
    this.name = 'ShapeMismatchError';
    this.field = field;
  }
}

/**
 * Helper to wrap unknown errors as CastError
 */
export function wrapError(
  error: unknown,
  defaultCode: CastErrorCode = 'UNKNOWN',
  context?: Record<string, unknown>
): CastError {
  if (error instanceof CastError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;

  return new CastError({
    code: defaultCode,
    message,
    cause,
    context,
  });
}
