// SPDX-License-Identifier: Apache-2.0

import dotenv from 'dotenv';
import findConfig from 'find-config';
import pino from 'pino';

import type { ConfigKey, GetTypeOfConfigKey } from './globalConfig';
import { GlobalConfig } from './globalConfig';
import { type ConfigValue, ValidationService } from './validationService';

const mainLogger = pino({
  name: 'eth-fee-history',
  transport: {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: true,
    },
  },
});
const logger = mainLogger.child({ name: 'config-service' });

export class ConfigService {
  /**
   * @private
   */
  private static envFileName: string = '.env';

  /**
   * The singleton instance
   * @public
   */
  private static instance: ConfigService | undefined;

  /**
   * Copied envs from process.env
   * @private
   */
  private readonly envs: NodeJS.Dict<ConfigValue>;

  /**
   * Fetches all envs from process.env and pushes them into the envs property
   * @private
   */
  private constructor() {
    const configPath = findConfig(ConfigService.envFileName);

    if (configPath) {
      dotenv.config({ path: configPath });
    } else {
      logger.debug(`No ${ConfigService.envFileName} file is found, using process environment and defaults.`);
    }

    // validate mandatory fields
    ValidationService.startUp(process.env);

    // transform string representations of env vars into proper types
    this.envs = ValidationService.typeCasting(process.env);

    for (const name in this.envs) {
      logger.info(`${name} = ${this.envs[name]}`);
    }
  }

  /**
   * Get the singleton instance of the current service
   * @public
   */
  private static getInstance(): ConfigService {
    if (this.instance == null) {
      this.instance = new ConfigService();
    }

    return this.instance;
  }

  /**
   * Retrieves the value of a specified configuration property using its key name.
   *
   * @param name - The configuration key to retrieve.
   * @typeParam K - The specific type parameter representing the ConfigKey.
   * @returns The value associated with the specified key, or the default value from its GlobalConfig entry, properly typed based on the key's configuration.
   * @throws Error if a required configuration value is missing.
   */
  public static get<K extends ConfigKey>(name: K): GetTypeOfConfigKey<K> {
    const configEntry = GlobalConfig.ENTRIES[name];
    const value = this.getInstance().envs[name] ?? configEntry?.defaultValue ?? undefined;

    if (value == undefined && configEntry?.required) {
      throw new Error(`Configuration error: ${name} is a mandatory configuration.`);
    }

    return value as GetTypeOfConfigKey<K>;
  }

  /**
   * Overrides a single value of the running instance. Used by tests to flip settings per case.
   */
  public static override(name: ConfigKey, value: ConfigValue | undefined): void {
    const { envs } = this.getInstance();
    if (value === undefined) {
      delete envs[name];
    } else {
      envs[name] = value;
    }
  }

  /**
   * Drops the cached instance so the next read reloads the environment.
   */
  public static reset(): void {
    this.instance = undefined;
  }
}

export { GlobalConfig, ValidationService };
export type { ConfigKey, ConfigValue, GetTypeOfConfigKey };
