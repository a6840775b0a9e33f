import { EccCompact } from './EccCompact.js';
import { Ed25519 } from './Ed25519.js';
import type { KeyType, PrivateKey, PublicKey } from '../types/keys.js';

/**
 * Signs with a private key it holds exclusively. The key is copied on
 * construction and never handed back out.
 */
export class Signer {
  private readonly privateKey: PrivateKey;

  constructor(privateKey: PrivateKey) {
    this.privateKey = copyPrivateKey(privateKey);
  }

  get keyType(): KeyType {
    return this.privateKey.type;
  }

  /**
   * ecc_compact: DER-encoded ECDSA over SHA-256.
   * ed25519: 64-byte detached signature.
   */
  sign(message: Uint8Array): Uint8Array {
    const key = this.privateKey;
    if (key.type === 'ecc_compact') {
      return EccCompact.sign(message, key.privateKey);
    }
    return Ed25519.sign(message, key.secretKey);
  }

  /**
   * Verify a signature produced by `sign`. Malformed signatures or keys
   * verify as false.
   */
  static verify(message: Uint8Array, signature: Uint8Array, publicKey: PublicKey): boolean {
    if (publicKey.type === 'ecc_compact') {
      return EccCompact.verify(message, signature, publicKey.point);
    }
    return Ed25519.verify(message, signature, publicKey.publicKey);
  }
}

export function copyPrivateKey(key: PrivateKey): PrivateKey {
  if (key.type === 'ecc_compact') {
    return { ...key, privateKey: key.privateKey.slice(), publicKey: key.publicKey.slice() };
  }
  return { type: 'ed25519', secretKey: key.secretKey.slice() };
}
