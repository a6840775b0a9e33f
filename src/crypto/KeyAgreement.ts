import { EccCompact } from './EccCompact.js';
import { Ed25519 } from './Ed25519.js';
import { copyPrivateKey } from './Signer.js';
import { KeyError } from '../errors/KeyError.js';
import type { KeyType, PrivateKey, PublicKey } from '../types/keys.js';

/**
 * Diffie-Hellman against peer public keys of the same type. The result is raw
 * shared key material; run it through a KDF before using it as a key.
 */
export class KeyAgreement {
  private readonly privateKey: PrivateKey;

  constructor(privateKey: PrivateKey) {
    this.privateKey = copyPrivateKey(privateKey);
  }

  get keyType(): KeyType {
    return this.privateKey.type;
  }

  /** @throws KeyError when the peer key is of another type. */
  agree(peer: PublicKey): Uint8Array {
    const key = this.privateKey;
    if (key.type === 'ecc_compact') {
      if (peer.type !== 'ecc_compact') {
        throw KeyError.keyTypeMismatch(key.type, peer.type);
      }
      return EccCompact.agree(key.privateKey, peer.point);
    }
    if (peer.type !== 'ed25519') {
      throw KeyError.keyTypeMismatch(key.type, peer.type);
    }
    return Ed25519.agree(key.secretKey, peer.publicKey);
  }
}
