// SPDX-License-Identifier: Apache-2.0

import { formatFloat } from '../../formatters';
import { predefined } from '../errors/JsonRpcError';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Writes a wire value as compact JSON text. Differs from `JSON.stringify` only in number
 * formatting (see {@link formatFloat}); object keys keep insertion order and `undefined`
 * members are skipped.
 */
export const writeJson = (value: unknown, path = '$'): string => {
  if (value === null) {
    return 'null';
  }
  if (typeof value === 'string' || typeof value === 'boolean') {
    return JSON.stringify(value);
  }
  if (typeof value === 'number') {
    return formatFloat(value);
  }
  if (Array.isArray(value)) {
    return `[${value.map((item: unknown, index) => writeJson(item, `${path}[${index}]`)).join(',')}]`;
  }
  if (isRecord(value)) {
    const members = Object.entries(value)
      .filter(([, member]) => member !== undefined)
      .map(([key, member]) => `${JSON.stringify(key)}:${writeJson(member, `${path}.${key}`)}`);
    return `{${members.join(',')}}`;
  }

  throw predefined.INTERNAL_ERROR(`Cannot write ${typeof value} at '${path}' as JSON`);
};

export { isRecord };
