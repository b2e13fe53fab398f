// SPDX-License-Identifier: Apache-2.0

import * as codec from './lib/codec';
import { JsonRpcError, predefined } from './lib/errors/JsonRpcError';
import { FeeHistoryCodec } from './lib/feeHistoryCodec';
import { createLogger } from './lib/logger';
import { FeeHistory, type FeeHistoryArgs } from './lib/models/feeHistory';
import { TxGasAndReward } from './lib/models/txGasAndReward';
import { RewardPercentileCalculator } from './lib/rewardPercentileCalculator';
import type { IFeeHistory } from './lib/types';
import { assertFeeHistoryInvariants, validateRewardPercentiles } from './lib/validators';

export * from './formatters';

export {
  assertFeeHistoryInvariants,
  codec,
  createLogger,
  FeeHistory,
  FeeHistoryCodec,
  JsonRpcError,
  predefined,
  RewardPercentileCalculator,
  TxGasAndReward,
  validateRewardPercentiles,
};

export type { FeeHistoryArgs, IFeeHistory };
