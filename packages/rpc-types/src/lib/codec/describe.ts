// SPDX-License-Identifier: Apache-2.0

import constants from '../constants';

/**
 * Cuts `text` down to MAX_DESCRIBED_VALUE_LENGTH characters, marking the cut with `...`.
 */
export const truncate = (text: string): string =>
  text.length > constants.MAX_DESCRIBED_VALUE_LENGTH
    ? `${text.substring(0, constants.MAX_DESCRIBED_VALUE_LENGTH)}...`
    : text;

const render = (raw: unknown): string => {
  switch (typeof raw) {
    case 'bigint':
      return `${raw}n`;
    case 'undefined':
    case 'function':
    case 'symbol':
      return typeof raw;
    default:
      try {
        return JSON.stringify(raw);
      } catch {
        // cyclic, or holding a bigint somewhere inside
        return typeof raw;
      }
  }
};

/**
 * Short rendering of a rejected wire value for error messages. Accepts anything a caller may hand
 * to `fromWire`, including values JSON cannot represent.
 *
 * describeValue([1, 2])       -> [1,2]
 * describeValue(BigInt(5))    -> 5n
 * describeValue(cyclicObject) -> object
 */
export const describeValue = (raw: unknown): string => truncate(render(raw));
