// SPDX-License-Identifier: Apache-2.0

/**
 * Two-way mapping between an in-memory value and its JSON wire value.
 *
 * `decode` receives whatever sits under the key in the parsed payload, `undefined`
 * when the key is missing. Both directions take the dotted path of the value so
 * failures can name the offending field.
 */
export interface Codec<T, W> {
  encode(value: T, path: string): W;
  decode(raw: unknown, path: string): T;
}
