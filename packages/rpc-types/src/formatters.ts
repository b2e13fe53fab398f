// SPDX-License-Identifier: Apache-2.0

import constants from './lib/constants';

const EMPTY_HEX = constants.EMPTY_HEX;

const numberTo0x = (input: number | bigint): string => {
  return EMPTY_HEX + input.toString(16);
};

const isHex = (value: string): boolean => {
  const hexRegex = /^0x[0-9a-fA-F]+$/;
  return hexRegex.test(value);
};

const isDecimal = (value: string): boolean => {
  return /^[0-9]+$/.test(value);
};

/**
 * Formats a float the way the reference clients' JSON writers do, which differs from `JSON.stringify`:
 * integral values keep a `.0` suffix, plain notation covers decimal exponents -5 through 15 and
 * scientific notation carries no `+` sign.
 *
 * 0      -> 0.0
 * 1      -> 1.0
 * 0.25   -> 0.25
 * 1e-6   -> 1e-6
 * 1e16   -> 1e16
 * 1.5e21 -> 1.5e21
 *
 * Non-finite values have no JSON representation and are written as `null`.
 */
const formatFloat = (value: number): string => {
  if (!Number.isFinite(value)) {
    return 'null';
  }
  if (value === 0) {
    return Object.is(value, -0) ? '-0.0' : '0.0';
  }

  const sign = value < 0 ? '-' : '';
  // toExponential() without an argument yields the shortest digits that round-trip
  const [mantissa, exponentPart] = Math.abs(value).toExponential().split('e');
  const digits = mantissa.replace('.', '');
  const exponent = Number(exponentPart);

  if (exponent < constants.FLOAT_PLAIN_EXPONENT_MIN || exponent > constants.FLOAT_PLAIN_EXPONENT_MAX) {
    const fraction = digits.length > 1 ? `.${digits.substring(1)}` : '';
    return `${sign}${digits[0]}${fraction}e${exponent}`;
  }

  if (exponent < 0) {
    return `${sign}0.${'0'.repeat(-exponent - 1)}${digits}`;
  }

  const integerLength = exponent + 1;
  if (digits.length <= integerLength) {
    return `${sign}${digits}${'0'.repeat(integerLength - digits.length)}.0`;
  }

  return `${sign}${digits.substring(0, integerLength)}.${digits.substring(integerLength)}`;
};

export { numberTo0x, isHex, isDecimal, formatFloat };
