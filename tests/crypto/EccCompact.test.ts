import { describe, it, expect } from 'vitest';
import { p256 } from '@noble/curves/nist.js';
import { bytesToHex, hexToBytes } from '@noble/hashes/utils';
import { EccCompact } from '../../src/crypto/EccCompact.js';
import { KeyError } from '../../src/errors/KeyError.js';
import { ErrorCodes } from '../../src/types/errors.js';
import { loadKeyBinaryVectors } from '../helpers/loadVectors.js';
import { catchKeyError } from '../helpers/errors.js';

const { legacy, shortScalar } = loadKeyBinaryVectors();
const eccVector = legacy.find((v) => v.keyType === 'ecc_compact');

function scalar(n: number): Uint8Array {
  const bytes = new Uint8Array(32);
  bytes[31] = n;
  return bytes;
}

describe('EccCompact', () => {
  describe('recover', () => {
    it('rebuilds the full point from the x-coordinate', () => {
      const point = eccVector?.point ?? '';
      expect(bytesToHex(EccCompact.recover(hexToBytes(point.slice(2, 66))))).toBe(point);
    });

    it('rebuilds the short-scalar fixture point', () => {
      expect(bytesToHex(EccCompact.recover(hexToBytes(shortScalar.compact)))).toBe(shortScalar.point);
    });

    it('rejects an x-coordinate with no point on the curve', () => {
      expect(() => EccCompact.recover(scalar(1))).toThrow(KeyError);
    });

    it('rejects input that is not 32 bytes', () => {
      expect(() => EccCompact.recover(new Uint8Array(33))).toThrow('Point is not on the curve');
    });
  });

  describe('isCompact', () => {
    it('returns the x-coordinate of a compact point', () => {
      expect(bytesToHex(EccCompact.isCompact(hexToBytes(shortScalar.point)) ?? new Uint8Array())).toBe(
        shortScalar.compact,
      );
    });

    it('returns undefined for the mirrored point', () => {
      const mirrored = p256.ProjectivePoint.fromHex(hexToBytes(shortScalar.point)).negate().toRawBytes(false);
      expect(EccCompact.isCompact(mirrored)).toBeUndefined();
    });

    it('throws on bytes that are not a point', () => {
      expect(catchKeyError(() => EccCompact.isCompact(new Uint8Array(65)))?.code).toBe(ErrorCodes.INVALID_POINT);
    });
  });

  describe('fromScalar', () => {
    it('keeps a scalar whose point is already compact', () => {
      // 1·G has y below p/2; the scalar's leading zero byte is dropped
      const { privateKey, publicKey } = EccCompact.fromScalar(scalar(1));
      expect(privateKey.length).toBe(31);
      expect(privateKey[30]).toBe(1);
      expect(bytesToHex(publicKey)).toBe(bytesToHex(p256.ProjectivePoint.BASE.toRawBytes(false)));
    });

    it('replaces the scalar by n - d when d·G is not compact', () => {
      const { privateKey, publicKey } = EccCompact.fromScalar(scalar(3));
      expect(bytesToHex(privateKey)).toBe('ffffffff00000000ffffffffffffffffbce6faada7179e84f3b9cac2fc63254e');
      expect(bytesToHex(publicKey)).toBe(
        bytesToHex(p256.ProjectivePoint.BASE.multiply(3n).negate().toRawBytes(false)),
      );
      expect(EccCompact.isCompact(publicKey)).toBeDefined();
    });

    it('rejects zero and out-of-range scalars', () => {
      expect(() => EccCompact.fromScalar(new Uint8Array(32))).toThrow('P-256 scalar out of range');
      expect(() => EccCompact.fromScalar(new Uint8Array(32).fill(0xff))).toThrow('P-256 scalar out of range');
    });

    it('rejects scalars of the wrong length', () => {
      expect(() => EccCompact.fromScalar(new Uint8Array(16))).toThrow(
        'P-256 scalar must be 31 or 32 bytes, got 16',
      );
    });
  });

  describe('generate', () => {
    it('always yields a compact public point matching the scalar', () => {
      for (let i = 0; i < 10; i++) {
        const { privateKey, publicKey } = EccCompact.generate();
        expect([31, 32]).toContain(privateKey.length);
        expect(EccCompact.isCompact(publicKey)).toBeDefined();

        const padded = new Uint8Array(32);
        padded.set(privateKey, 32 - privateKey.length);
        expect(bytesToHex(p256.getPublicKey(padded, false))).toBe(bytesToHex(publicKey));
      }
    });
  });

  describe('sign / verify / agree', () => {
    it('verifies its own DER signatures', () => {
      const { privateKey, publicKey } = EccCompact.generate();
      const message = new TextEncoder().encode('sign me please');
      const signature = EccCompact.sign(message, privateKey);
      expect(signature[0]).toBe(0x30);
      expect(EccCompact.verify(message, signature, publicKey)).toBe(true);
    });

    it('signs with a 31-byte scalar', () => {
      const { privateKey, publicKey } = EccCompact.fromScalar(scalar(1));
      const message = new TextEncoder().encode('short scalar');
      expect(EccCompact.verify(message, EccCompact.sign(message, privateKey), publicKey)).toBe(true);
    });

    it('returns false for garbage signatures', () => {
      const { publicKey } = EccCompact.generate();
      expect(EccCompact.verify(new Uint8Array(4), new Uint8Array(10), publicKey)).toBe(false);
    });

    it('produces the same 32-byte secret on both sides', () => {
      const a = EccCompact.generate();
      const b = EccCompact.generate();
      const ab = EccCompact.agree(a.privateKey, b.publicKey);
      expect(ab.length).toBe(32);
      expect(bytesToHex(ab)).toBe(bytesToHex(EccCompact.agree(b.privateKey, a.publicKey)));
    });
  });
});
