// SPDX-License-Identifier: Apache-2.0

import { predefined } from '../errors/JsonRpcError';
import type { Codec } from './types';

// Presence policies decide what happens when a key is missing on the way in,
// and whether the key is written at all on the way out.

/**
 * Always written; a missing key fails decoding.
 */
export const required = <T, W>(codec: Codec<T, W>): Codec<T, W> => ({
  encode: (value, path) => codec.encode(value, path),
  decode: (raw, path) => {
    if (raw === undefined) {
      throw predefined.MISSING_FIELD(path);
    }
    return codec.decode(raw, path);
  },
});

/**
 * Always written; a missing key decodes to `fallback()`.
 */
export const withDefault = <T, W>(codec: Codec<T, W>, fallback: () => T): Codec<T, W> => ({
  encode: (value, path) => codec.encode(value, path),
  decode: (raw, path) => (raw === undefined ? fallback() : codec.decode(raw, path)),
});

/**
 * Left out when the sequence is empty; a missing key decodes to an empty sequence.
 * An explicit `[]` on the wire is accepted too.
 */
export const omitEmpty = <T, W>(codec: Codec<T[], W[]>): Codec<T[], W[] | undefined> => ({
  encode: (values, path) => (values.length === 0 ? undefined : codec.encode(values, path)),
  decode: (raw, path) => (raw === undefined ? [] : codec.decode(raw, path)),
});

/**
 * Left out when absent; a missing key or an explicit `null` decodes to `undefined`.
 */
export const optional = <T, W>(codec: Codec<T, W>): Codec<T | undefined, W | undefined> => ({
  encode: (value, path) => (value === undefined ? undefined : codec.encode(value, path)),
  decode: (raw, path) => (raw === undefined || raw === null ? undefined : codec.decode(raw, path)),
});
