// SPDX-License-Identifier: Apache-2.0

import { ConfigService } from '@eth-fee-history/config-service';
import pino, { type Logger } from 'pino';

/**
 * Root logger for applications embedding the fee history types. Level comes from LOG_LEVEL
 * unless given explicitly.
 */
export const createLogger = (name: string, level: string = ConfigService.get('LOG_LEVEL')): Logger =>
  pino({
    name,
    // pino throws on an empty default level, fall back to the most verbose one
    level: level || 'trace',
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: true,
      },
    },
  });
