// SPDX-License-Identifier: Apache-2.0

/**
 * One transaction's share of a block when computing reward percentiles.
 *
 * Ordering looks at `reward` only. Two entries with the same reward compare equal whatever
 * their `gasUsed`, so which of them ends up first is left to the stability of the sort.
 * This matches the reference clients and is relied upon when percentiles are picked.
 */
export class TxGasAndReward {
  /**
   * Gas used by the transaction.
   */
  public readonly gasUsed: bigint;

  /**
   * Effective priority fee per gas paid by the transaction.
   */
  public readonly reward: bigint;

  constructor(args: { gasUsed: bigint; reward: bigint }) {
    this.gasUsed = args.gasUsed;
    this.reward = args.reward;
  }

  /**
   * The ordering key.
   */
  static byReward(tx: TxGasAndReward): bigint {
    return tx.reward;
  }

  /**
   * Ascending order by reward, usable as an `Array.prototype.sort` comparator.
   */
  static compare(a: TxGasAndReward, b: TxGasAndReward): number {
    const left = TxGasAndReward.byReward(a);
    const right = TxGasAndReward.byReward(b);
    if (left < right) {
      return -1;
    }
    return left > right ? 1 : 0;
  }

  /**
   * Returns a new array sorted by reward; entries with equal rewards keep their input order.
   */
  static sortByReward(txs: readonly TxGasAndReward[]): TxGasAndReward[] {
    return [...txs].sort(TxGasAndReward.compare);
  }
}
