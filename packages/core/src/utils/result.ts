import type { CastError } from '../errors/index.js';
import type { CastDiagnostic, CastFailure, CastResult, CastSuccess } from '../types/index.js';

export function castOk<T>(value: T, diagnostics: CastDiagnostic[] = []): CastSuccess<T> {
  return { ok: true, value, diagnostics };
}

export function castFail(error: CastError): CastFailure {
  return { ok: false, error };
}

/**
 * Value of a successful result
 * @throws CastError the failure's error
 */
export function unwrap<T>(result: CastResult<T>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}
