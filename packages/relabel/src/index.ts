/**
 * @shapecast/relabel
 *
 * Byte-level type-tag relabeling. Rebuilding instances from bytes
 * instantiates whatever types the bytes name: always pass an allow-list.
 */

export { relabelCast } from './relabel.js';
export type { RelabelOptions } from './relabel.js';
export { resolveAllowList } from './allow-list.js';
export type { AllowList } from './allow-list.js';
export { readTypeTag, rewriteTypeTag } from './type-tag.js';
export type { TypeTag } from './type-tag.js';
export { serialize } from './codec/serialize.js';
export type { SerializeOptions } from './codec/serialize.js';
export { unserialize } from './codec/unserialize.js';
export type { UnserializeOptions } from './codec/unserialize.js';
