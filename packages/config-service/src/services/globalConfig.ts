// SPDX-License-Identifier: Apache-2.0

/**
 * Extracts the type string associated with a specific key in the `_CONFIG` object.
 * If the key `K` exists in `_CONFIG`, it retrieves the 'type' property; otherwise, it resolves to `never`.
 *
 * Example:
 * - `'LOG_LEVEL'` → `'string'`
 * - `'INVALID_KEY'` → `never`
 */
type ExtractTypeStringFromKey<K extends string> = K extends keyof typeof _CONFIG ? (typeof _CONFIG)[K]['type'] : never;

/**
 * Maps string representations of types (`'string'`, `'boolean'`, `'number'`) to their actual TypeScript types.
 */
type StringTypeToActualType<Tstr extends string> = Tstr extends 'string'
  ? string
  : Tstr extends 'boolean'
  ? boolean
  : Tstr extends 'number'
  ? number
  : never;

/**
 * Determines if a configuration value can be `undefined` based on two conditions:
 * - It must be optional (`required: false`)
 * - It must have no default value (`defaultValue: null`)
 *
 * Example:
 * - `'LOG_LEVEL'` (`required: false`, `defaultValue: 'info'`) → `false`
 */
type CanBeUndefined<K extends string> = K extends keyof typeof _CONFIG
  ? (typeof _CONFIG)[K]['required'] extends true
    ? false
    : (typeof _CONFIG)[K]['defaultValue'] extends null
    ? true
    : false
  : never;

/**
 * Maps configuration keys to their corresponding TypeScript types,
 * including `undefined` when applicable based on the configuration.
 *
 * Example:
 * - `'FEE_HISTORY_MAX_REWARD_PERCENTILES'` (`type: 'number'`, `defaultValue: 100`) → `number`
 * - `'FEE_HISTORY_VALIDATE_LENGTHS'` (`type: 'boolean'`, `defaultValue: false`) → `boolean`
 */
export type GetTypeOfConfigKey<K extends string> = CanBeUndefined<K> extends true
  ? StringTypeToActualType<ExtractTypeStringFromKey<K>> | undefined
  : StringTypeToActualType<ExtractTypeStringFromKey<K>>;

/**
 * Interface defining the structure of a configuration property.
 */
export interface ConfigProperty {
  envName: string; // Environment variable name
  type: 'string' | 'number' | 'boolean'; // Data type of the configuration property
  required: boolean; // Whether the property is required
  defaultValue: string | number | boolean | null; // Default value (if any)
}

const _CONFIG = {
  FEE_HISTORY_MAX_REWARD_PERCENTILES: {
    envName: 'FEE_HISTORY_MAX_REWARD_PERCENTILES',
    type: 'number',
    required: false,
    defaultValue: 100,
  },
  FEE_HISTORY_VALIDATE_LENGTHS: {
    envName: 'FEE_HISTORY_VALIDATE_LENGTHS',
    type: 'boolean',
    required: false,
    defaultValue: false,
  },
  LOG_LEVEL: {
    envName: 'LOG_LEVEL',
    type: 'string',
    required: false,
    defaultValue: 'info',
  },
} as const satisfies { [key: string]: ConfigProperty }; // Ensures _CONFIG is read-only and conforms to the ConfigProperty structure

export type ConfigKey = keyof typeof _CONFIG;

export class GlobalConfig {
  public static readonly ENTRIES: Record<ConfigKey, ConfigProperty> = _CONFIG;
}
