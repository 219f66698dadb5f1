export type * from './descriptor.js';
export type * from './source.js';
export { CastPolicy } from './policy.js';
export type {
  CastDiagnostic,
  CastContextOptions,
  RecursiveCastOptions,
  CastSuccess,
  CastFailure,
  CastResult,
} from './policy.js';
