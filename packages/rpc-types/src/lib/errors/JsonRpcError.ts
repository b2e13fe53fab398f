// SPDX-License-Identifier: Apache-2.0

import constants from '../constants';

export class JsonRpcError extends Error {
  public code: number;
  public data?: string;

  constructor(args: { code: number; message: string; data?: string }, requestId?: string) {
    super(requestId ? `[${constants.REQUEST_ID_STRING}${requestId}] ` + args.message : args.message);
    this.name = 'JsonRpcError';
    this.code = args.code;
    this.data = args.data;
  }
}

export const predefined = {
  INTERNAL_ERROR: (message = '') =>
    new JsonRpcError({
      code: -32603,
      message: message === '' ? 'Unknown error invoking RPC' : `Error invoking RPC: ${message}`,
    }),
  INVALID_FEE_HISTORY: (reason: string) =>
    new JsonRpcError({
      code: -32602,
      message: `Invalid fee history: ${reason}`,
    }),
  INVALID_FIELD: (path: string, reason: string) =>
    new JsonRpcError({
      code: -32602,
      message: `Invalid field '${path}': ${reason}`,
    }),
  INVALID_PARAMETER: (index: number | string, message: string) =>
    new JsonRpcError({
      code: -32602,
      message: `Invalid parameter ${index}: ${message}`,
    }),
  MISSING_FIELD: (path: string) =>
    new JsonRpcError({
      code: -32602,
      message: `Missing value for required field '${path}'`,
    }),
  PARSE_ERROR: (reason: string) =>
    new JsonRpcError({
      code: -32700,
      message: `Unable to parse JSON: ${reason}`,
    }),
};
