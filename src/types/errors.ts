export const ErrorCodes = {
  BAD_CHECKSUM: 1001,
  BAD_NETWORK: 1002,
  NOT_COMPACT: 1003,
  MALFORMED_BINARY: 1004,
  INVALID_ENCODING: 1005,
  INVALID_POINT: 1006,
  KEY_TYPE_MISMATCH: 1007,
  INVALID_VERSION: 1008,
  INVALID_KEY: 1009,
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export interface KeyErrorData {
  code: number;
  message: string;
  data?: Record<string, unknown>;
}
