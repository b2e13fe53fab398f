// SPDX-License-Identifier: Apache-2.0

export { assertFeeHistoryInvariants } from './feeHistoryInvariants';
export { validateRewardPercentiles } from './rewardPercentiles';
