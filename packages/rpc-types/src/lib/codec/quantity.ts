// SPDX-License-Identifier: Apache-2.0

import { isDecimal, isHex, numberTo0x } from '../../formatters';
import constants, { type QuantityWidth } from '../constants';
import { predefined } from '../errors/JsonRpcError';
import { describeValue, truncate } from './describe';
import type { Codec } from './types';

const assertInRange = (value: bigint, width: QuantityWidth, path: string): bigint => {
  if (value < BigInt(0)) {
    throw predefined.INVALID_FIELD(path, `expected an unsigned integer, got ${value}`);
  }
  if (value > constants.MAX_QUANTITY[width]) {
    throw predefined.INVALID_FIELD(path, `value ${numberTo0x(value)} does not fit in ${width} bits`);
  }
  return value;
};

const parseQuantity = (raw: unknown, path: string): bigint => {
  if (typeof raw === 'string') {
    if (isHex(raw) || isDecimal(raw)) {
      return BigInt(raw);
    }
    throw predefined.INVALID_FIELD(path, `expected 0x prefixed hexadecimal value, got '${truncate(raw)}'`);
  }

  if (typeof raw === 'number') {
    if (Number.isSafeInteger(raw)) {
      return BigInt(raw);
    }
    throw predefined.INVALID_FIELD(path, `expected an integer, got ${raw}`);
  }

  throw predefined.INVALID_FIELD(path, `expected 0x prefixed hexadecimal value, got ${describeValue(raw)}`);
};

/**
 * Unsigned integer of the given width written as a `0x` prefixed hex string without leading zeros.
 * Reads hex strings, decimal strings and safe JSON integers.
 */
export const quantity = (width: QuantityWidth): Codec<bigint, string> => ({
  encode: (value, path) => numberTo0x(assertInRange(value, width, path)),
  decode: (raw, path) => assertInRange(parseQuantity(raw, path), width, path),
});
