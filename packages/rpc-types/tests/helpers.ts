// SPDX-License-Identifier: Apache-2.0

import pino, { type Logger } from 'pino';

import { ConfigServiceTestHelper } from '../../config-service/tests/configServiceTestHelper';

export const overrideEnvsInMochaDescribe = ConfigServiceTestHelper.overrideEnvsInMochaDescribe;

/**
 * Logger at the given level that discards its output, for suites spying on log calls.
 */
export const mutedLogger = (level: string = 'silent'): Logger => pino({ level }, { write: () => undefined });
