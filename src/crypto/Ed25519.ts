import {
  ed25519,
  edwardsToMontgomeryPriv,
  edwardsToMontgomeryPub,
  x25519,
} from '@noble/curves/ed25519.js';
import { hsalsa } from '@noble/ciphers/salsa';
import { concatBytes, utf8ToBytes } from '@noble/hashes/utils';
import { KeyError } from '../errors/KeyError.js';

export const SEED_LENGTH = 32;
export const SECRET_LENGTH = 64;
export const PUBLIC_LENGTH = 32;

const SIGMA = u32le(utf8ToBytes('expand 32-byte k'));
const ZERO_NONCE = new Uint32Array(4);

export interface Ed25519KeyMaterial {
  /** seed || public key */
  secretKey: Uint8Array;
  publicKey: Uint8Array;
}

export class Ed25519 {
  static fromSeed(seed: Uint8Array): Ed25519KeyMaterial {
    if (seed.length !== SEED_LENGTH) {
      throw KeyError.invalidKey(`Ed25519 seed must be ${SEED_LENGTH} bytes, got ${seed.length}`);
    }
    const publicKey = ed25519.getPublicKey(seed);
    return { secretKey: concatBytes(seed, publicKey), publicKey };
  }

  static generate(): Ed25519KeyMaterial {
    return Ed25519.fromSeed(ed25519.utils.randomPrivateKey());
  }

  /** Detached 64-byte signature. Only the seed half of the secret is read. */
  static sign(message: Uint8Array, secretKey: Uint8Array): Uint8Array {
    return ed25519.sign(message, Ed25519.seedOf(secretKey));
  }

  static verify(message: Uint8Array, signature: Uint8Array, publicKey: Uint8Array): boolean {
    try {
      return ed25519.verify(signature, message, publicKey);
    } catch {
      return false;
    }
  }

  /**
   * NaCl box precomputation (crypto_box_beforenm): HSalsa20 with a zero nonce
   * over the X25519 secret of both keys mapped to Montgomery form.
   */
  static agree(secretKey: Uint8Array, peerPublicKey: Uint8Array): Uint8Array {
    let peer: Uint8Array;
    try {
      peer = edwardsToMontgomeryPub(peerPublicKey);
    } catch {
      throw KeyError.invalidPoint();
    }
    const shared = x25519.getSharedSecret(edwardsToMontgomeryPriv(Ed25519.seedOf(secretKey)), peer);
    const key = new Uint32Array(8);
    hsalsa(SIGMA, u32le(shared), ZERO_NONCE, key);
    return bytesLe(key);
  }

  private static seedOf(secretKey: Uint8Array): Uint8Array {
    if (secretKey.length !== SECRET_LENGTH) {
      throw KeyError.invalidKey(`Ed25519 secret key must be ${SECRET_LENGTH} bytes, got ${secretKey.length}`);
    }
    return secretKey.subarray(0, SEED_LENGTH);
  }
}

function u32le(bytes: Uint8Array): Uint32Array {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const words = new Uint32Array(bytes.length / 4);
  for (let i = 0; i < words.length; i++) words[i] = view.getUint32(i * 4, true);
  return words;
}

function bytesLe(words: Uint32Array): Uint8Array {
  const bytes = new Uint8Array(words.length * 4);
  const view = new DataView(bytes.buffer);
  words.forEach((word, i) => view.setUint32(i * 4, word, true));
  return bytes;
}
