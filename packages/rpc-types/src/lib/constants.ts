// SPDX-License-Identifier: Apache-2.0

export type QuantityWidth = 64 | 128;

export default {
  REQUEST_ID_STRING: `Request ID: `,

  EMPTY_HEX: '0x',

  MAX_QUANTITY: {
    64: (BigInt(1) << BigInt(64)) - BigInt(1),
    128: (BigInt(1) << BigInt(128)) - BigInt(1),
  } satisfies Record<QuantityWidth, bigint>,

  // decimal exponents written without scientific notation, as the reference JSON writers do
  FLOAT_PLAIN_EXPONENT_MIN: -5,
  FLOAT_PLAIN_EXPONENT_MAX: 15,

  // longest rendering of a rejected value quoted in an error message
  MAX_DESCRIBED_VALUE_LENGTH: 64,

  PERCENTILE_MIN: 0,
  PERCENTILE_MAX: 100,
};
