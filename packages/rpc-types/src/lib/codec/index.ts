// SPDX-License-Identifier: Apache-2.0

export { arrayOf } from './array';
export { describeValue, truncate } from './describe';
export { float } from './float';
export { isRecord, writeJson } from './json';
export { omitEmpty, optional, required, withDefault } from './presence';
export { quantity } from './quantity';
export type { Codec } from './types';
