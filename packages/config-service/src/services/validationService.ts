// SPDX-License-Identifier: Apache-2.0

import { GlobalConfig } from './globalConfig';

export type ConfigValue = string | number | boolean;

export class ValidationService {
  /**
   * Validate mandatory fields on start-up
   * @param envs
   */
  static startUp(envs: NodeJS.Dict<string>): void {
    Object.entries(GlobalConfig.ENTRIES).forEach(([entryName, entryInfo]) => {
      if (entryInfo.required && !Object.prototype.hasOwnProperty.call(envs, entryName)) {
        throw new Error(`Configuration error: ${entryName} is a mandatory configuration.`);
      }

      if (
        entryInfo.type === 'number' &&
        Object.prototype.hasOwnProperty.call(envs, entryName) &&
        isNaN(Number(envs[entryName]))
      ) {
        throw new Error(`Configuration error: ${entryName} must be a valid number.`);
      }

      if (
        entryInfo.type === 'boolean' &&
        Object.prototype.hasOwnProperty.call(envs, entryName) &&
        !['true', 'false'].includes(envs[entryName] ?? '')
      ) {
        throw new Error(`Configuration error: ${entryName} must be either "true" or "false".`);
      }
    });
  }

  /**
   * Transform string environment variables to their proper types based on GlobalConfig.ENTRIES.
   * For each entry:
   * - If the env var is missing but has a default value, use the default
   * - For 'number' type, converts to Number
   * - For 'boolean' type, converts 'true' string to true boolean
   * - For 'string' type, keeps as string
   *
   * @param envs - Dictionary of environment variables and their string values
   * @returns Dictionary with environment variables cast to their proper types
   */
  static typeCasting(envs: NodeJS.Dict<string>): NodeJS.Dict<ConfigValue> {
    const typeCastedEnvs: NodeJS.Dict<ConfigValue> = {};

    Object.entries(GlobalConfig.ENTRIES).forEach(([entryName, entryInfo]) => {
      const raw = envs[entryName];
      if (raw === undefined) {
        if (entryInfo.defaultValue != null) {
          typeCastedEnvs[entryName] = entryInfo.defaultValue;
        }
        return;
      }

      switch (entryInfo.type) {
        case 'number':
          typeCastedEnvs[entryName] = Number(raw);
          break;
        case 'boolean':
          typeCastedEnvs[entryName] = raw === 'true';
          break;
        default:
          typeCastedEnvs[entryName] = raw;
      }
    });

    return typeCastedEnvs;
  }
}
