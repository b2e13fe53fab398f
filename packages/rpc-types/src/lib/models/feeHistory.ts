// SPDX-License-Identifier: Apache-2.0

export interface FeeHistoryArgs {
  baseFeePerGas?: bigint[];
  gasUsedRatio?: number[];
  baseFeePerBlobGas?: bigint[];
  blobGasUsedRatio?: number[];
  oldestBlock?: bigint;
  reward?: bigint[][];
}

/**
 * Response of `eth_feeHistory`.
 *
 * `baseFeePerGas` and `baseFeePerBlobGas` carry one entry more than the ratio arrays: the
 * trailing entry is the fee of the block after the newest requested one, derived from it.
 * The newest requested block is therefore always the second to last entry.
 */
export class FeeHistory {
  /**
   * Base fee per gas of every block in range plus the next block. Zero for pre-EIP-1559 blocks.
   */
  public baseFeePerGas: bigint[] = [];

  /**
   * gasUsed / gasLimit of every block in range.
   */
  public gasUsedRatio: number[] = [];

  /**
   * Base fee per blob gas of every block in range plus the next block. Zero for pre-EIP-4844 blocks.
   */
  public baseFeePerBlobGas: bigint[] = [];

  /**
   * Blob gas used ratio of every block in range.
   */
  public blobGasUsedRatio: number[] = [];

  /**
   * Number of the first block in range.
   */
  public oldestBlock: bigint = BigInt(0);

  /**
   * Effective priority fee per gas at each requested percentile, one row per block.
   * Rows are all zeroes for empty blocks; undefined when no percentiles were requested.
   */
  public reward?: bigint[][];

  constructor(args?: FeeHistoryArgs) {
    if (args) {
      this.baseFeePerGas = args.baseFeePerGas ?? [];
      this.gasUsedRatio = args.gasUsedRatio ?? [];
      this.baseFeePerBlobGas = args.baseFeePerBlobGas ?? [];
      this.blobGasUsedRatio = args.blobGasUsedRatio ?? [];
      this.oldestBlock = args.oldestBlock ?? BigInt(0);
    }
    this.reward = args?.reward;
  }

  /**
   * Base fee of the newest block in the requested range.
   */
  public latestBlockBaseFee(): bigint | undefined {
    return secondToLast(this.baseFeePerGas);
  }

  /**
   * Base fee of the block after the requested range.
   */
  public nextBlockBaseFee(): bigint | undefined {
    return last(this.baseFeePerGas);
  }

  /**
   * Blob base fee of the block after the requested range, undefined when that block is pre-EIP-4844.
   */
  public nextBlockBlobBaseFee(): bigint | undefined {
    return nonZero(last(this.baseFeePerBlobGas));
  }

  /**
   * Blob base fee of the newest block in the requested range, undefined when that block is pre-EIP-4844.
   */
  public latestBlockBlobBaseFee(): bigint | undefined {
    return nonZero(secondToLast(this.baseFeePerBlobGas));
  }

  public equals(other: FeeHistory): boolean {
    return (
      sameSequence(this.baseFeePerGas, other.baseFeePerGas) &&
      sameSequence(this.gasUsedRatio, other.gasUsedRatio) &&
      sameSequence(this.baseFeePerBlobGas, other.baseFeePerBlobGas) &&
      sameSequence(this.blobGasUsedRatio, other.blobGasUsedRatio) &&
      this.oldestBlock === other.oldestBlock &&
      sameRewards(this.reward, other.reward)
    );
  }
}

const last = <T>(values: T[]): T | undefined => (values.length > 0 ? values[values.length - 1] : undefined);

const secondToLast = <T>(values: T[]): T | undefined => (values.length > 1 ? values[values.length - 2] : undefined);

// zero is what the reference clients return for blocks without a blob fee market
const nonZero = (fee: bigint | undefined): bigint | undefined => (fee === BigInt(0) ? undefined : fee);

// numeric equality: NaN never matches, 0 matches -0
const sameSequence = <T extends bigint | number>(left: T[], right: T[]): boolean =>
  left.length === right.length && left.every((value, index) => value === right[index]);

const sameRewards = (left: bigint[][] | undefined, right: bigint[][] | undefined): boolean => {
  if (left === undefined || right === undefined) {
    return left === right;
  }
  return left.length === right.length && left.every((row, index) => sameSequence(row, right[index]));
};
