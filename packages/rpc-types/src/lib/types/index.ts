// SPDX-License-Identifier: Apache-2.0

import type { IFeeHistory } from './IFeeHistory';

export type { IFeeHistory };
