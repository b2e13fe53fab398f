// SPDX-License-Identifier: Apache-2.0

import { expect } from 'chai';

import { FeeHistory } from '../../../src/lib/models/feeHistory';

describe('FeeHistory', () => {
  describe('constructor', () => {
    it('should default to an empty history', () => {
      const feeHistory = new FeeHistory();

      expect(feeHistory.baseFeePerGas).to.deep.equal([]);
      expect(feeHistory.gasUsedRatio).to.deep.equal([]);
      expect(feeHistory.baseFeePerBlobGas).to.deep.equal([]);
      expect(feeHistory.blobGasUsedRatio).to.deep.equal([]);
      expect(feeHistory.oldestBlock).to.eq(BigInt(0));
      expect(feeHistory.reward).to.be.undefined;
    });

    it('should take any subset of the fields', () => {
      const feeHistory = new FeeHistory({ oldestBlock: BigInt(7), reward: [[BigInt(1)]] });

      expect(feeHistory.oldestBlock).to.eq(BigInt(7));
      expect(feeHistory.reward).to.deep.equal([[BigInt(1)]]);
      expect(feeHistory.baseFeePerGas).to.deep.equal([]);
    });
  });

  describe('base fee accessors', () => {
    it('should read the newest requested block second to last and the next block last', () => {
      const feeHistory = new FeeHistory({ baseFeePerGas: [BigInt(10), BigInt(20), BigInt(30)] });

      expect(feeHistory.latestBlockBaseFee()).to.eq(BigInt(20));
      expect(feeHistory.nextBlockBaseFee()).to.eq(BigInt(30));
    });

    it('should return only the next block fee for a single entry', () => {
      const feeHistory = new FeeHistory({ baseFeePerGas: [BigInt(10)] });

      expect(feeHistory.latestBlockBaseFee()).to.be.undefined;
      expect(feeHistory.nextBlockBaseFee()).to.eq(BigInt(10));
    });

    it('should return nothing for an empty history', () => {
      const feeHistory = new FeeHistory();

      expect(feeHistory.latestBlockBaseFee()).to.be.undefined;
      expect(feeHistory.nextBlockBaseFee()).to.be.undefined;
    });

    it('should report a zero base fee as is', () => {
      const feeHistory = new FeeHistory({ baseFeePerGas: [BigInt(0), BigInt(0)] });

      expect(feeHistory.latestBlockBaseFee()).to.eq(BigInt(0));
      expect(feeHistory.nextBlockBaseFee()).to.eq(BigInt(0));
    });
  });

  describe('blob base fee accessors', () => {
    it('should read the newest requested block second to last and the next block last', () => {
      const feeHistory = new FeeHistory({ baseFeePerBlobGas: [BigInt(1), BigInt(2), BigInt(3)] });

      expect(feeHistory.latestBlockBlobBaseFee()).to.eq(BigInt(2));
      expect(feeHistory.nextBlockBlobBaseFee()).to.eq(BigInt(3));
    });

    it('should treat zero as a block without blob fee market', () => {
      const feeHistory = new FeeHistory({ baseFeePerBlobGas: [BigInt(0), BigInt(0)] });

      expect(feeHistory.latestBlockBlobBaseFee()).to.be.undefined;
      expect(feeHistory.nextBlockBlobBaseFee()).to.be.undefined;
    });

    it('should filter zero on each side independently', () => {
      const activated = new FeeHistory({ baseFeePerBlobGas: [BigInt(0), BigInt(1)] });
      expect(activated.latestBlockBlobBaseFee()).to.be.undefined;
      expect(activated.nextBlockBlobBaseFee()).to.eq(BigInt(1));

      const trailingZero = new FeeHistory({ baseFeePerBlobGas: [BigInt(5), BigInt(0)] });
      expect(trailingZero.latestBlockBlobBaseFee()).to.eq(BigInt(5));
      expect(trailingZero.nextBlockBlobBaseFee()).to.be.undefined;
    });

    it('should not depend on the other fields', () => {
      const feeHistory = new FeeHistory({
        baseFeePerGas: [BigInt(10), BigInt(11)],
        gasUsedRatio: [0.5],
        baseFeePerBlobGas: [BigInt(0), BigInt(0)],
        blobGasUsedRatio: [0.5],
        oldestBlock: BigInt(100),
        reward: [[BigInt(1)]],
      });

      expect(feeHistory.latestBlockBlobBaseFee()).to.be.undefined;
      expect(feeHistory.nextBlockBlobBaseFee()).to.be.undefined;
    });

    it('should return nothing when there are too few entries', () => {
      expect(new FeeHistory().nextBlockBlobBaseFee()).to.be.undefined;
      expect(new FeeHistory({ baseFeePerBlobGas: [BigInt(4)] }).latestBlockBlobBaseFee()).to.be.undefined;
      expect(new FeeHistory({ baseFeePerBlobGas: [BigInt(4)] }).nextBlockBlobBaseFee()).to.eq(BigInt(4));
    });
  });

  describe('equals', () => {
    const args = {
      baseFeePerGas: [BigInt(10), BigInt(11)],
      gasUsedRatio: [0.5],
      baseFeePerBlobGas: [BigInt(1), BigInt(1)],
      blobGasUsedRatio: [0],
      oldestBlock: BigInt(3),
      reward: [[BigInt(0), BigInt(2)]],
    };

    it('should compare every field', () => {
      expect(new FeeHistory(args).equals(new FeeHistory(args))).to.be.true;
      expect(new FeeHistory(args).equals(new FeeHistory({ ...args, oldestBlock: BigInt(4) }))).to.be.false;
      expect(new FeeHistory(args).equals(new FeeHistory({ ...args, gasUsedRatio: [0.25] }))).to.be.false;
      expect(new FeeHistory(args).equals(new FeeHistory({ ...args, reward: [[BigInt(0), BigInt(3)]] }))).to.be.false;
    });

    it('should tell an absent reward from an empty one', () => {
      const absent = new FeeHistory({ ...args, reward: undefined });

      expect(absent.equals(new FeeHistory({ ...args, reward: [] }))).to.be.false;
      expect(absent.equals(new FeeHistory({ ...args, reward: undefined }))).to.be.true;
    });

    it('should compare ratios numerically', () => {
      expect(new FeeHistory({ gasUsedRatio: [NaN] }).equals(new FeeHistory({ gasUsedRatio: [NaN] }))).to.be.false;
      expect(new FeeHistory({ gasUsedRatio: [0] }).equals(new FeeHistory({ gasUsedRatio: [-0] }))).to.be.true;
      expect(new FeeHistory({ blobGasUsedRatio: [-0] }).equals(new FeeHistory({ blobGasUsedRatio: [0] }))).to.be.true;
    });
  });
});
