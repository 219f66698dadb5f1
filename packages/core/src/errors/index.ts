export { CastError, ShapeMismatchError, wrapError } from './cast-error.js';
export type { CastErrorCode, CastErrorDetails } from './cast-error.js';
