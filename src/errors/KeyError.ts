import { ErrorCodes, type KeyErrorData } from '../types/errors.js';
import type { KeyType, Network } from '../types/keys.js';

export class KeyError extends Error {
  readonly code: number;
  readonly data?: Record<string, unknown>;

  constructor(code: number, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = 'KeyError';
    this.code = code;
    this.data = data;
  }

  toJSON(): KeyErrorData {
    return {
      code: this.code,
      message: this.message,
      ...(this.data !== undefined ? { data: this.data } : {}),
    };
  }

  static badChecksum(): KeyError {
    return new KeyError(ErrorCodes.BAD_CHECKSUM, 'Base58 checksum mismatch');
  }

  static badNetwork(actual: Network, expected: Network): KeyError {
    return new KeyError(ErrorCodes.BAD_NETWORK, `Key is on ${actual}, expected ${expected}`, {
      actual,
      expected,
    });
  }

  static notCompact(): KeyError {
    return new KeyError(ErrorCodes.NOT_COMPACT, 'Public key is not compact');
  }

  static malformedBinary(reason: string, length?: number): KeyError {
    return new KeyError(
      ErrorCodes.MALFORMED_BINARY,
      reason,
      length !== undefined ? { length } : undefined,
    );
  }

  static invalidEncoding(reason: string): KeyError {
    return new KeyError(ErrorCodes.INVALID_ENCODING, reason);
  }

  static invalidPoint(): KeyError {
    return new KeyError(ErrorCodes.INVALID_POINT, 'Point is not on the curve');
  }

  static keyTypeMismatch(expected: KeyType, actual: KeyType): KeyError {
    return new KeyError(ErrorCodes.KEY_TYPE_MISMATCH, `Expected ${expected} key, got ${actual}`, {
      expected,
      actual,
    });
  }

  static invalidVersion(version: number): KeyError {
    return new KeyError(ErrorCodes.INVALID_VERSION, 'Version must be an integer in 0..255', { version });
  }

  static invalidKey(reason: string): KeyError {
    return new KeyError(ErrorCodes.INVALID_KEY, reason);
  }
}
