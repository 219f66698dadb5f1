/**
 * @shapecast/caster
 *
 * Field-by-field casters over registered type descriptors
 */

export { recursiveCast } from './recursive-caster.js';
export { ShapeCaster } from './shape-caster.js';
export type { ShapeCasterOptions } from './shape-caster.js';
