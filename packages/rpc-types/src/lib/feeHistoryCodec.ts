// SPDX-License-Identifier: Apache-2.0

import { ConfigService } from '@eth-fee-history/config-service';
import type { Logger } from 'pino';

import {
  arrayOf,
  describeValue,
  float,
  isRecord,
  omitEmpty,
  optional,
  quantity,
  required,
  withDefault,
  writeJson,
} from './codec';
import { JsonRpcError, predefined } from './errors/JsonRpcError';
import { FeeHistory } from './models/feeHistory';
import type { IFeeHistory } from './types';
import { assertFeeHistoryInvariants } from './validators';

// Wire layout of every field. Fee arrays and the blob ratio array are left out
// when empty, as geth and erigon do; gasUsedRatio is always written.
const FIELDS = {
  baseFeePerGas: omitEmpty(arrayOf(quantity(128))),
  gasUsedRatio: required(arrayOf(float())),
  baseFeePerBlobGas: omitEmpty(arrayOf(quantity(128))),
  blobGasUsedRatio: omitEmpty(arrayOf(float())),
  oldestBlock: withDefault(quantity(64), () => BigInt(0)),
  reward: optional(arrayOf(arrayOf(quantity(128)))),
};

const OMITTABLE_KEYS = ['baseFeePerGas', 'baseFeePerBlobGas', 'blobGasUsedRatio', 'reward'] as const;

/**
 * Converts {@link FeeHistory} values to and from the `eth_feeHistory` wire format.
 *
 * `serialize` / `deserialize` deal in JSON text and reproduce the reference clients' output byte
 * for byte. `toWire` / `fromWire` deal in plain objects for callers embedding the result in a
 * larger response that gets stringified elsewhere.
 */
export class FeeHistoryCodec {
  /**
   * The logger used for logging all output from this class.
   * @private
   */
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  public toWire(feeHistory: FeeHistory): IFeeHistory {
    const wire: IFeeHistory = {
      baseFeePerGas: FIELDS.baseFeePerGas.encode(feeHistory.baseFeePerGas, 'baseFeePerGas'),
      gasUsedRatio: FIELDS.gasUsedRatio.encode(feeHistory.gasUsedRatio, 'gasUsedRatio'),
      baseFeePerBlobGas: FIELDS.baseFeePerBlobGas.encode(feeHistory.baseFeePerBlobGas, 'baseFeePerBlobGas'),
      blobGasUsedRatio: FIELDS.blobGasUsedRatio.encode(feeHistory.blobGasUsedRatio, 'blobGasUsedRatio'),
      oldestBlock: FIELDS.oldestBlock.encode(feeHistory.oldestBlock, 'oldestBlock'),
      reward: FIELDS.reward.encode(feeHistory.reward, 'reward'),
    };

    for (const key of OMITTABLE_KEYS) {
      if (wire[key] === undefined) {
        delete wire[key];
      }
    }

    return wire;
  }

  public serialize(feeHistory: FeeHistory): string {
    return writeJson(this.toWire(feeHistory));
  }

  /**
   * Builds a {@link FeeHistory} from a parsed payload. Missing omittable keys take their defaults.
   * When FEE_HISTORY_VALIDATE_LENGTHS is on, the array length relations are checked as well.
   *
   * @throws JsonRpcError naming the first offending field; nothing is returned for a partly valid payload
   */
  public fromWire(value: unknown): FeeHistory {
    try {
      if (!isRecord(value)) {
        throw predefined.INVALID_FIELD('$', `expected an object, got ${describeValue(value)}`);
      }

      const feeHistory = new FeeHistory({
        baseFeePerGas: FIELDS.baseFeePerGas.decode(value.baseFeePerGas, 'baseFeePerGas'),
        gasUsedRatio: FIELDS.gasUsedRatio.decode(value.gasUsedRatio, 'gasUsedRatio'),
        baseFeePerBlobGas: FIELDS.baseFeePerBlobGas.decode(value.baseFeePerBlobGas, 'baseFeePerBlobGas'),
        blobGasUsedRatio: FIELDS.blobGasUsedRatio.decode(value.blobGasUsedRatio, 'blobGasUsedRatio'),
        oldestBlock: FIELDS.oldestBlock.decode(value.oldestBlock, 'oldestBlock'),
        reward: FIELDS.reward.decode(value.reward, 'reward'),
      });

      if (ConfigService.get('FEE_HISTORY_VALIDATE_LENGTHS')) {
        assertFeeHistoryInvariants(feeHistory);
      }

      return feeHistory;
    } catch (error) {
      if (error instanceof JsonRpcError) {
        this.logger.debug(`Rejected fee history payload: ${error.message}`);
      }
      throw error;
    }
  }

  public deserialize(text: string): FeeHistory {
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.debug(`Rejected fee history payload: ${reason}`);
      throw predefined.PARSE_ERROR(reason);
    }

    if (this.logger.isLevelEnabled('trace')) {
      this.logger.trace(`deserialize(${text})`);
    }

    return this.fromWire(parsed);
  }
}
