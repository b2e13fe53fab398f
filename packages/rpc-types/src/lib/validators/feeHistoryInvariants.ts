// SPDX-License-Identifier: Apache-2.0

import constants, { type QuantityWidth } from '../constants';
import { predefined } from '../errors/JsonRpcError';
import { FeeHistory } from '../models/feeHistory';

const assertNextBlockEntry = (fees: bigint[], feesName: string, ratios: number[], ratiosName: string): void => {
  if (fees.length > 0 && ratios.length > 0 && fees.length !== ratios.length + 1) {
    throw predefined.INVALID_FEE_HISTORY(
      `${feesName} has ${fees.length} entries, expected ${ratios.length + 1} for ${ratios.length} ${ratiosName} entries`,
    );
  }
};

const fitsWidth = (value: bigint, width: QuantityWidth): boolean =>
  value >= BigInt(0) && value <= constants.MAX_QUANTITY[width];

const assertWidth = (values: bigint[], name: string, width: QuantityWidth): void => {
  const index = values.findIndex((value) => !fitsWidth(value, width));
  if (index !== -1) {
    throw predefined.INVALID_FEE_HISTORY(`${name}[${index}] is not an unsigned ${width}-bit integer`);
  }
};

/**
 * Checks the relations the fee history arrays keep with one another:
 * fee arrays hold one trailing entry more than their ratio arrays, rewards hold one row per
 * block with the same number of percentiles in every row, and all integers fit their width.
 *
 * @throws JsonRpcError when a relation does not hold
 */
export const assertFeeHistoryInvariants = (feeHistory: FeeHistory): void => {
  assertNextBlockEntry(feeHistory.baseFeePerGas, 'baseFeePerGas', feeHistory.gasUsedRatio, 'gasUsedRatio');
  assertNextBlockEntry(
    feeHistory.baseFeePerBlobGas,
    'baseFeePerBlobGas',
    feeHistory.blobGasUsedRatio,
    'blobGasUsedRatio',
  );

  const { reward } = feeHistory;
  if (reward !== undefined) {
    if (reward.length !== feeHistory.gasUsedRatio.length) {
      throw predefined.INVALID_FEE_HISTORY(
        `reward has ${reward.length} rows, expected one per block (${feeHistory.gasUsedRatio.length})`,
      );
    }
    const percentileCount = reward.length > 0 ? reward[0].length : 0;
    const unevenRow = reward.findIndex((row) => row.length !== percentileCount);
    if (unevenRow !== -1) {
      throw predefined.INVALID_FEE_HISTORY(
        `reward[${unevenRow}] has ${reward[unevenRow].length} entries, expected ${percentileCount}`,
      );
    }
    reward.forEach((row, index) => assertWidth(row, `reward[${index}]`, 128));
  }

  assertWidth(feeHistory.baseFeePerGas, 'baseFeePerGas', 128);
  assertWidth(feeHistory.baseFeePerBlobGas, 'baseFeePerBlobGas', 128);
  if (!fitsWidth(feeHistory.oldestBlock, 64)) {
    throw predefined.INVALID_FEE_HISTORY('oldestBlock is not an unsigned 64-bit integer');
  }
};
