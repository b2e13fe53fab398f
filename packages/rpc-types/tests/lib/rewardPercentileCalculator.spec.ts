// SPDX-License-Identifier: Apache-2.0

import { expect } from 'chai';
import sinon from 'sinon';

import { JsonRpcError } from '../../src/lib/errors/JsonRpcError';
import { TxGasAndReward } from '../../src/lib/models/txGasAndReward';
import { RewardPercentileCalculator } from '../../src/lib/rewardPercentileCalculator';
import { mutedLogger } from '../helpers';

const tx = (gasUsed: number, reward: number) =>
  new TxGasAndReward({ gasUsed: BigInt(gasUsed), reward: BigInt(reward) });

describe('@feeHistory RewardPercentileCalculator', function () {
  const logger = mutedLogger('trace');
  const calculator = new RewardPercentileCalculator(logger);

  afterEach(() => {
    sinon.restore();
  });

  it('should pick the reward at which cumulative gas reaches each percentile', () => {
    const txs = [tx(21000, 2), tx(50000, 1), tx(29000, 3)];

    const rewards = calculator.calculate([25, 50, 60, 75, 100], BigInt(100000), txs);

    expect(rewards).to.deep.equal([BigInt(1), BigInt(1), BigInt(2), BigInt(3), BigInt(3)]);
  });

  it('should leave the input order untouched', () => {
    const txs = [tx(21000, 2), tx(50000, 1), tx(29000, 3)];

    calculator.calculate([50], BigInt(100000), txs);

    expect(txs.map((t) => t.reward)).to.deep.equal([BigInt(2), BigInt(1), BigInt(3)]);
  });

  it('should keep equal rewards in input order while walking', () => {
    const first = tx(10000, 5);
    const second = tx(30000, 5);
    const cheapest = tx(60000, 1);

    const rewards = calculator.calculate([50, 70, 95], BigInt(100000), [first, second, cheapest]);

    expect(rewards).to.deep.equal([BigInt(1), BigInt(5), BigInt(5)]);
    expect(TxGasAndReward.sortByReward([first, second, cheapest])).to.deep.equal([cheapest, first, second]);
  });

  it('should floor fractional thresholds', () => {
    // thresholds: 99.5% of 1000 -> 995, 99.9% -> 999
    const txs = [tx(995, 1), tx(5, 9)];

    expect(calculator.calculate([99.5, 99.9], BigInt(1000), txs)).to.deep.equal([BigInt(1), BigInt(9)]);
  });

  it('should stop at the most expensive transaction when gas never reaches the threshold', () => {
    expect(calculator.calculate([100], BigInt(100), [tx(10, 7), tx(20, 4)])).to.deep.equal([BigInt(7)]);
  });

  it('should return zeroes for a block without transactions', () => {
    expect(calculator.calculate([10, 90], BigInt(0), [])).to.deep.equal([BigInt(0), BigInt(0)]);
  });

  it('should return nothing when no percentiles are requested', () => {
    expect(calculator.calculate([], BigInt(21000), [tx(21000, 1)])).to.deep.equal([]);
  });

  it('should refuse decreasing percentiles even for empty blocks', () => {
    expect(() => calculator.calculate([50, 10], BigInt(0), [])).to.throw(
      JsonRpcError,
      'Invalid parameter rewardPercentiles[1]: Expected non-decreasing values, 10 follows 50',
    );
  });

  it('should trace the computed rewards', () => {
    const traceSpy = sinon.spy(logger, 'trace');

    calculator.calculate([25, 50], BigInt(100000), [tx(21000, 2), tx(50000, 1), tx(29000, 3)]);

    expect(traceSpy.calledOnceWithExactly('calculate(percentiles=25,50, blockGasUsed=100000, txs=3): 1,1')).to.be
      .true;
  });
});
