import { describe, it, expect } from 'vitest';
import { KeyError } from '../../src/errors/KeyError.js';
import { ErrorCodes } from '../../src/types/errors.js';

describe('KeyError', () => {
  describe('constructor', () => {
    it('creates error with code and message', () => {
      const err = new KeyError(1004, 'Something went wrong');
      expect(err).toBeInstanceOf(Error);
      expect(err).toBeInstanceOf(KeyError);
      expect(err.code).toBe(1004);
      expect(err.message).toBe('Something went wrong');
      expect(err.name).toBe('KeyError');
      expect(err.data).toBeUndefined();
    });

    it('preserves stack trace', () => {
      const err = new KeyError(1001, 'checksum');
      expect(err.stack).toContain('KeyError');
    });
  });

  describe('toJSON', () => {
    it('serializes without data when data is undefined', () => {
      const json = KeyError.badChecksum().toJSON();
      expect(json).toEqual({ code: 1001, message: 'Base58 checksum mismatch' });
      expect('data' in json).toBe(false);
    });

    it('serializes with data when data is present', () => {
      expect(KeyError.badNetwork('testnet', 'mainnet').toJSON()).toEqual({
        code: 1002,
        message: 'Key is on testnet, expected mainnet',
        data: { actual: 'testnet', expected: 'mainnet' },
      });
    });
  });

  describe('static factory methods', () => {
    it('notCompact()', () => {
      const err = KeyError.notCompact();
      expect(err.code).toBe(ErrorCodes.NOT_COMPACT);
      expect(err.message).toBe('Public key is not compact');
    });

    it('malformedBinary() records the length when given', () => {
      expect(KeyError.malformedBinary('bad layout', 12).data).toEqual({ length: 12 });
      expect(KeyError.malformedBinary('bad layout').data).toBeUndefined();
    });

    it('invalidEncoding()', () => {
      const err = KeyError.invalidEncoding('Not a p2p address: /ip4');
      expect(err.code).toBe(ErrorCodes.INVALID_ENCODING);
      expect(err.message).toBe('Not a p2p address: /ip4');
    });

    it('invalidPoint()', () => {
      expect(KeyError.invalidPoint().code).toBe(ErrorCodes.INVALID_POINT);
    });

    it('keyTypeMismatch()', () => {
      const err = KeyError.keyTypeMismatch('ed25519', 'ecc_compact');
      expect(err.code).toBe(ErrorCodes.KEY_TYPE_MISMATCH);
      expect(err.message).toBe('Expected ed25519 key, got ecc_compact');
      expect(err.data).toEqual({ expected: 'ed25519', actual: 'ecc_compact' });
    });

    it('invalidVersion()', () => {
      const err = KeyError.invalidVersion(300);
      expect(err.code).toBe(ErrorCodes.INVALID_VERSION);
      expect(err.data).toEqual({ version: 300 });
    });

    it('invalidKey()', () => {
      expect(KeyError.invalidKey('bad seed').code).toBe(ErrorCodes.INVALID_KEY);
    });
  });

  describe('ErrorCodes values', () => {
    it('has the expected codes', () => {
      expect(ErrorCodes).toEqual({
        BAD_CHECKSUM: 1001,
        BAD_NETWORK: 1002,
        NOT_COMPACT: 1003,
        MALFORMED_BINARY: 1004,
        INVALID_ENCODING: 1005,
        INVALID_POINT: 1006,
        KEY_TYPE_MISMATCH: 1007,
        INVALID_VERSION: 1008,
        INVALID_KEY: 1009,
      });
    });
  });
});
