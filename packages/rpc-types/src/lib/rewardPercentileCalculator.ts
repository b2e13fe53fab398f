// SPDX-License-Identifier: Apache-2.0

import type { Logger } from 'pino';

import { TxGasAndReward } from './models/txGasAndReward';
import { validateRewardPercentiles } from './validators';

/**
 * Picks the effective priority fee at each requested percentile of one block.
 *
 * Transactions are sorted by reward and walked while summing their gas used; the reward reported for
 * percentile p is the one of the transaction at which the running sum reaches p% of the block's gas
 * used. This is the selection geth and reth perform for `eth_feeHistory`.
 */
export class RewardPercentileCalculator {
  /**
   * The logger used for logging all output from this class.
   * @private
   */
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  /**
   * @param percentiles - requested percentiles, non-decreasing, each within [0, 100]
   * @param blockGasUsed - gas used by the whole block
   * @param txs - one entry per transaction of the block, in any order
   * @returns one reward per percentile; all zeroes for a block without transactions
   */
  public calculate(percentiles: readonly number[], blockGasUsed: bigint, txs: readonly TxGasAndReward[]): bigint[] {
    validateRewardPercentiles(percentiles);

    if (txs.length === 0) {
      return percentiles.map(() => BigInt(0));
    }

    const sorted = TxGasAndReward.sortByReward(txs);
    const rewards: bigint[] = [];
    let txIndex = 0;
    let sumGasUsed = sorted[0].gasUsed;

    for (const percentile of percentiles) {
      const threshold = BigInt(Math.floor((Number(blockGasUsed) * percentile) / 100));
      while (sumGasUsed < threshold && txIndex < sorted.length - 1) {
        txIndex++;
        sumGasUsed += sorted[txIndex].gasUsed;
      }
      rewards.push(sorted[txIndex].reward);
    }

    if (this.logger.isLevelEnabled('trace')) {
      this.logger.trace(
        `calculate(percentiles=${percentiles}, blockGasUsed=${blockGasUsed}, txs=${txs.length}): ${rewards.join(',')}`,
      );
    }

    return rewards;
  }
}
