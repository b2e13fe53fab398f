// SPDX-License-Identifier: Apache-2.0

/**
 * `eth_feeHistory` result as it travels on the wire. Quantities are `0x` prefixed hex strings;
 * keys holding an empty sequence or an absent reward list are left out rather than set.
 */
export interface IFeeHistory {
  baseFeePerGas?: string[];
  gasUsedRatio: (number | null)[];
  baseFeePerBlobGas?: string[];
  blobGasUsedRatio?: (number | null)[];
  oldestBlock: string;
  reward?: string[][];
}
