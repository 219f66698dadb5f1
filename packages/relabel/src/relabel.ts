/**
 * Serialized-representation relabeler
 *
 * Casts by serializing the source, rewriting the type tag at the head of
 * the byte stream to the target's name, and rebuilding an instance from the
 * rewritten bytes. No per-field work and no recursion: nested objects come
 * back as whatever type their own (unchanged) tags name.
 *
 * Rebuilding instantiates every type tagged in the stream. Keep
 * `allowedTypes` as narrow as possible; `true` is only safe when the source
 * is fully trusted.
 */

import {
  CastError,
  castFail,
  castOk,
  defaultRegistry,
  describeType,
  getDefaultConfig,
  getDefaultLogger,
  wrapError,
  type CastContextOptions,
  type CastResult,
  type TypeConstructor,
} from '@shapecast/core';
import { resolveAllowList, type AllowList } from './allow-list.js';
import { serialize } from './codec/serialize.js';
import { unserialize } from './codec/unserialize.js';
import { rewriteTypeTag } from './type-tag.js';

export interface RelabelOptions extends CastContextOptions {
  /** Deepest nesting accepted when rebuilding (default: configuration) */
  maxDepth?: number;
}

function notAnInstance(targetType: string, value: unknown): CastError {
  return new CastError({
    code: 'RELABEL_FAILED',
    message: `Relabeled value is a ${describeType(value)}, not a ${targetType}`,
    context: { targetType, sourceType: describeType(value) },
  });
}

/**
 * Reinterpret `source` as an instance of `target`
 *
 * @example
 * const result = relabelCast(legacyUser, 'User', [Address]);
 */
export function relabelCast<T extends object>(
  source: object,
  target: TypeConstructor<T>,
  allowedTypes?: AllowList,
  options?: RelabelOptions
): CastResult<T>;
export function relabelCast(
  source: object,
  target: string,
  allowedTypes?: AllowList,
  options?: RelabelOptions
): CastResult<object>;
export function relabelCast<T extends object>(
  source: object,
  target: TypeConstructor<T> | string,
  allowedTypes: AllowList = [],
  options: RelabelOptions = {}
): CastResult<T> | CastResult<object> {
  try {
    if (typeof source !== 'object' || source === null) {
      throw new CastError({
        code: 'RELABEL_FAILED',
        message: `Only objects can be relabeled, got ${describeType(source)}`,
      });
    }

    const registry = options.registry ?? defaultRegistry;
    const logger = (options.logger ?? getDefaultLogger()).child({ caster: 'relabel' });
    const descriptor = registry.describe(target);
    const allowed = resolveAllowList(allowedTypes, descriptor.name, registry);

    if (allowed === true) {
      logger.warn('Relabeling with an unrestricted allow-list; any registered type may be instantiated', {
        targetType: descriptor.name,
      });
    }

    const bytes = rewriteTypeTag(serialize(source, { registry }), descriptor.name);
    const value = unserialize(bytes, {
      registry,
      allowedTypes: allowed,
      maxDepth: options.maxDepth ?? getDefaultConfig().relabel.maxDepth,
    });

    if (typeof target === 'string') {
      if (!(value instanceof descriptor.type)) throw notAnInstance(descriptor.name, value);
      return castOk(value);
    }

    if (!(value instanceof target)) throw notAnInstance(descriptor.name, value);
    return castOk(value);
  } catch (error) {
    return castFail(wrapError(error, 'RELABEL_FAILED'));
  }
}
