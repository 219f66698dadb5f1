/**
 * Cast policies, options and results
 */

import type { CastError } from '../errors/index.js';
import type { Logger } from '../logging/logger.js';
import type { TypeRegistry } from '../registry/type-registry.js';

/** Behaviour for source fields the target does not declare */
export const CastPolicy = {
  Throw: 'throw',
  Ignore: 'ignore',
  DynamicAssign: 'dynamicAssign',
} as const;

export type CastPolicy = (typeof CastPolicy)[keyof typeof CastPolicy];

/** Non-fatal event reported during a cast */
export interface CastDiagnostic {
  code: 'DYNAMIC_ASSIGN_UNSUPPORTED';
  message: string;
  /** Source field that could not be attached */
  field: string;
  /** Dotted path of the field from the top-level source */
  path: string;
  sourceType: string;
  targetType: string;
}

/** Options shared by every caster */
export interface CastContextOptions {
  /** Registry to resolve types against (default: the process-wide registry) */
  registry?: TypeRegistry;
  /** Diagnostics sink (default: logger built from configuration) */
  logger?: Logger;
}

/** Options of the reflective recursive caster */
export interface RecursiveCastOptions extends CastContextOptions {
  /**
   * Run the target's constructor (true) or allocate from its prototype
   * without running it (false, default).
   */
  useConstructor?: boolean;
  /** Default: throw */
  policy?: CastPolicy;
  /** Called for every diagnostic, in addition to logging */
  onDiagnostic?: (diagnostic: CastDiagnostic) => void;
}

export interface CastSuccess<T> {
  ok: true;
  value: T;
  diagnostics: CastDiagnostic[];
}

export interface CastFailure {
  ok: false;
  error: CastError;
}

export type CastResult<T> = CastSuccess<T> | CastFailure;
