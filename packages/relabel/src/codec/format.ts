/**
 * Canonical byte format
 *
 *   N;                          null
 *   U;                          undefined
 *   b:0; b:1;                   boolean
 *   i:<int>;                    safe integer
 *   d:<float|NAN|INF|-INF>;     any other number
 *   s:<bytes>:"<utf8>";         string, length in UTF-8 bytes
 *   a:<n>:{<key><value>...}     array, keys are i:<index>;
 *   O:<bytes>:"<Type>":<n>:{<s:key><value>...}
 *                               object, tagged with its type name
 */

import { CastError } from '@shapecast/core';

export const QUOTE = 0x22;
export const COLON = 0x3a;

export const FLOAT_PATTERN = /^(?:NAN|-?INF|-?\d+(?:\.\d+)?(?:e[+-]?\d+)?)$/;
export const INTEGER_PATTERN = /^-?\d+$/;
export const COUNT_PATTERN = /^\d+$/;

export function formatFloat(value: number): string {
  if (Number.isNaN(value)) return 'NAN';
  if (value === Infinity) return 'INF';
  if (value === -Infinity) return '-INF';
  if (Object.is(value, -0)) return '-0';
  return String(value);
}

export function parseFloatToken(token: string): number | undefined {
  if (!FLOAT_PATTERN.test(token)) return undefined;
  switch (token) {
    case 'NAN':
      return NaN;
    case 'INF':
      return Infinity;
    case '-INF':
      return -Infinity;
    default:
      return Number(token);
  }
}

export function malformed(message: string, offset: number): CastError {
  return new CastError({
    code: 'RELABEL_FAILED',
    message: `Malformed serialized data at byte ${offset}: ${message}`,
    context: { offset },
  });
}
