// SPDX-License-Identifier: Apache-2.0

import { ConfigService } from '@eth-fee-history/config-service';

import constants from '../constants';
import { predefined } from '../errors/JsonRpcError';

const PARAM_NAME = 'rewardPercentiles';

/**
 * Percentiles must lie within [0, 100], be finite and never decrease. Their count is capped by
 * FEE_HISTORY_MAX_REWARD_PERCENTILES.
 *
 * @throws JsonRpcError (-32602) on the first offending value
 */
export const validateRewardPercentiles = (percentiles: readonly number[]): void => {
  const maxCount = ConfigService.get('FEE_HISTORY_MAX_REWARD_PERCENTILES');
  if (percentiles.length > maxCount) {
    throw predefined.INVALID_PARAMETER(
      PARAM_NAME,
      `Expected at most ${maxCount} percentiles, got ${percentiles.length}`,
    );
  }

  percentiles.forEach((percentile, index) => {
    if (
      !Number.isFinite(percentile) ||
      percentile < constants.PERCENTILE_MIN ||
      percentile > constants.PERCENTILE_MAX
    ) {
      throw predefined.INVALID_PARAMETER(
        `${PARAM_NAME}[${index}]`,
        `Expected a value between ${constants.PERCENTILE_MIN} and ${constants.PERCENTILE_MAX}, got ${percentile}`,
      );
    }
    if (index > 0 && percentile < percentiles[index - 1]) {
      throw predefined.INVALID_PARAMETER(
        `${PARAM_NAME}[${index}]`,
        `Expected non-decreasing values, ${percentile} follows ${percentiles[index - 1]}`,
      );
    }
  });
};
