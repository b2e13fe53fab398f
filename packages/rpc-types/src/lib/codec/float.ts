// SPDX-License-Identifier: Apache-2.0

import { predefined } from '../errors/JsonRpcError';
import { describeValue } from './describe';
import type { Codec } from './types';

/**
 * 64-bit float kept as a JSON number. Non-finite values have no JSON form and go out as `null`.
 */
export const float = (): Codec<number, number | null> => ({
  encode: (value) => (Number.isFinite(value) ? value : null),
  decode: (raw, path) => {
    if (typeof raw !== 'number') {
      throw predefined.INVALID_FIELD(path, `expected a number, got ${describeValue(raw)}`);
    }
    return raw;
  },
});
