import { EccCompact } from './EccCompact.js';
import { Ed25519 } from './Ed25519.js';
import { KeyAgreement } from './KeyAgreement.js';
import { Signer } from './Signer.js';
import { eccKeyBundle, ed25519KeyBundle } from './bundle.js';
import type { KeyBundle, KeyType, Network, PrivateKey, PublicKey } from '../types/keys.js';

export class KeyManager {
  /**
   * Generate a fresh key bundle. P-256 keys always have a compact public point.
   */
  static generateKeys(keyType: KeyType, network: Network = 'mainnet'): KeyBundle {
    if (keyType === 'ecc_compact') {
      const { privateKey, publicKey } = EccCompact.generate();
      return eccKeyBundle(network, privateKey, publicKey);
    }
    const { secretKey, publicKey } = Ed25519.generate();
    return ed25519KeyBundle(network, secretKey, publicKey);
  }

  /**
   * Derive a bundle from a 32-byte P-256 scalar or Ed25519 seed.
   * For P-256 the stored scalar may be n - secret, see EccCompact.fromScalar.
   */
  static deriveKeyBundle(secret: Uint8Array, keyType: KeyType, network: Network = 'mainnet'): KeyBundle {
    if (keyType === 'ecc_compact') {
      const { privateKey, publicKey } = EccCompact.fromScalar(secret);
      return eccKeyBundle(network, privateKey, publicKey);
    }
    const { secretKey, publicKey } = Ed25519.fromSeed(secret);
    return ed25519KeyBundle(network, secretKey, publicKey);
  }

  static makeSigner(privateKey: PrivateKey): Signer {
    return new Signer(privateKey);
  }

  static makeKeyAgreement(privateKey: PrivateKey): KeyAgreement {
    return new KeyAgreement(privateKey);
  }

  static verify(message: Uint8Array, signature: Uint8Array, publicKey: PublicKey): boolean {
    return Signer.verify(message, signature, publicKey);
  }
}
