import { p256 } from '@noble/curves/nist.js';
import { sha256 } from '@noble/hashes/sha256';
import { KeyError } from '../errors/KeyError.js';
import { bigIntToBytes, bytesToBigInt } from '../utils/bytes.js';
import type { EccCurve } from '../types/keys.js';

type Point = InstanceType<typeof p256.ProjectivePoint>;

export const ECC_CURVE: EccCurve = 'secp256r1';
export const SCALAR_LENGTH = 32;
export const COMPACT_LENGTH = 32;
/** Uncompressed SEC1 point: 0x04 || x || y. */
export const POINT_LENGTH = 65;

export interface EccKeyMaterial {
  /** 32 bytes, or 31 when the scalar's leading byte is zero. */
  privateKey: Uint8Array;
  publicKey: Uint8Array;
}

/**
 * Compact P-256 keys: a point is compact when its y-coordinate is the smaller
 * of y and p - y, so the x-coordinate alone identifies it.
 */
export class EccCompact {
  static isCompactPoint(point: Point): boolean {
    const { y } = point.toAffine();
    return y <= p256.CURVE.Fp.ORDER - y;
  }

  /**
   * Returns the 32-byte x-coordinate when the point is compact, otherwise undefined.
   * @throws KeyError when the bytes are not a point on the curve.
   */
  static isCompact(point: Uint8Array): Uint8Array | undefined {
    const parsed = EccCompact.parsePoint(point);
    if (!EccCompact.isCompactPoint(parsed)) return undefined;
    return bigIntToBytes(parsed.toAffine().x, COMPACT_LENGTH);
  }

  /**
   * Rebuild the full uncompressed point from a compact x-coordinate.
   * @throws KeyError when x is not the x-coordinate of a curve point.
   */
  static recover(compact: Uint8Array): Uint8Array {
    if (compact.length !== COMPACT_LENGTH) {
      throw KeyError.invalidPoint();
    }
    const even = EccCompact.parsePoint(Uint8Array.of(0x02, ...compact));
    const { x, y } = even.toAffine();
    const p = p256.CURVE.Fp.ORDER;
    const point = p256.ProjectivePoint.fromAffine({ x, y: y <= p - y ? y : p - y });
    return point.toRawBytes(false);
  }

  /**
   * Derive compact key material from a scalar. When d·G is not compact the
   * scalar is replaced by n - d, whose point is the compact mirror.
   */
  static fromScalar(scalar: Uint8Array): EccKeyMaterial {
    if (scalar.length !== SCALAR_LENGTH && scalar.length !== SCALAR_LENGTH - 1) {
      throw KeyError.invalidKey(`P-256 scalar must be 31 or 32 bytes, got ${scalar.length}`);
    }
    const n = p256.CURVE.n;
    let d = bytesToBigInt(scalar);
    if (d <= 0n || d >= n) {
      throw KeyError.invalidKey('P-256 scalar out of range');
    }

    let point = p256.ProjectivePoint.BASE.multiply(d);
    if (!EccCompact.isCompactPoint(point)) {
      d = n - d;
      point = point.negate();
    }

    const bytes = bigIntToBytes(d, SCALAR_LENGTH);
    return {
      privateKey: bytes[0] === 0 ? bytes.slice(1) : bytes,
      publicKey: point.toRawBytes(false),
    };
  }

  static generate(): EccKeyMaterial {
    return EccCompact.fromScalar(p256.utils.randomPrivateKey());
  }

  /** DER-encoded ECDSA signature over sha256(message). */
  static sign(message: Uint8Array, privateKey: Uint8Array): Uint8Array {
    return p256.sign(sha256(message), EccCompact.padScalar(privateKey)).toDERRawBytes();
  }

  static verify(message: Uint8Array, signature: Uint8Array, point: Uint8Array): boolean {
    try {
      return p256.verify(signature, sha256(message), point);
    } catch {
      return false;
    }
  }

  /** ECDH: the 32-byte x-coordinate of privateKey·peer. */
  static agree(privateKey: Uint8Array, peerPoint: Uint8Array): Uint8Array {
    EccCompact.parsePoint(peerPoint);
    return p256.getSharedSecret(EccCompact.padScalar(privateKey), peerPoint, true).slice(1);
  }

  private static padScalar(privateKey: Uint8Array): Uint8Array {
    if (privateKey.length === SCALAR_LENGTH) return privateKey;
    const padded = new Uint8Array(SCALAR_LENGTH);
    padded.set(privateKey, SCALAR_LENGTH - privateKey.length);
    return padded;
  }

  private static parsePoint(bytes: Uint8Array): Point {
    try {
      return p256.ProjectivePoint.fromHex(bytes);
    } catch {
      throw KeyError.invalidPoint();
    }
  }
}
