/**
 * Access to the type tag at the start of a serialized object:
 * O:<byte length>:"<TypeName>":...
 */

import { CastError } from '@shapecast/core';
import { COLON, QUOTE } from './codec/format.js';

const TAG_HEAD = /^O:(\d{1,10}):"/;

export interface TypeTag {
  /** Tagged type name */
  name: string;
  /** Offset of the first name byte */
  nameStart: number;
  /** Offset just past the last name byte */
  nameEnd: number;
}

/**
 * @throws CastError RELABEL_FAILED if the bytes do not start with an object tag
 */
export function readTypeTag(bytes: Buffer): TypeTag {
  const head = TAG_HEAD.exec(bytes.subarray(0, 16).toString('latin1'));
  const declaredLength = head?.[1];
  if (!head || declaredLength === undefined) {
    throw new CastError({
      code: 'RELABEL_FAILED',
      message: 'Serialized value does not start with an object type tag',
      suggestion: 'Only objects can be relabeled',
    });
  }

  const nameStart = head[0].length;
  const nameEnd = nameStart + Number(declaredLength);
  if (bytes[nameEnd] !== QUOTE || bytes[nameEnd + 1] !== COLON) {
    throw new CastError({
      code: 'RELABEL_FAILED',
      message: `Type tag length ${declaredLength} does not match the tagged name`,
      context: { offset: nameStart },
    });
  }

  return {
    name: bytes.subarray(nameStart, nameEnd).toString('utf8'),
    nameStart,
    nameEnd,
  };
}

/**
 * Replace the leading type tag (length and name) with `typeName`, leaving
 * every following byte untouched
 */
export function rewriteTypeTag(bytes: Buffer, typeName: string): Buffer {
  const tag = readTypeTag(bytes);
  const name = Buffer.from(typeName, 'utf8');
  return Buffer.concat([
    Buffer.from(`O:${name.length}:"`, 'latin1'),
    name,
    bytes.subarray(tag.nameEnd),
  ]);
}
