// SPDX-License-Identifier: Apache-2.0

import { predefined } from '../errors/JsonRpcError';
import { describeValue } from './describe';
import type { Codec } from './types';

/**
 * Sequence of `inner` values. Nest it for deeper sequences, e.g. `arrayOf(arrayOf(quantity(128)))`.
 */
export const arrayOf = <T, W>(inner: Codec<T, W>): Codec<T[], W[]> => ({
  encode: (values, path) => values.map((value, index) => inner.encode(value, `${path}[${index}]`)),
  decode: (raw, path) => {
    if (!Array.isArray(raw)) {
      throw predefined.INVALID_FIELD(path, `expected an array, got ${describeValue(raw)}`);
    }
    return raw.map((value: unknown, index) => inner.decode(value, `${path}[${index}]`));
  },
});
