import { concatBytes } from '@noble/hashes/utils';
import { KeyError } from '../errors/KeyError.js';
import { EccCompact, ECC_CURVE, COMPACT_LENGTH } from '../crypto/EccCompact.js';
import { PUBLIC_LENGTH } from '../crypto/Ed25519.js';
import { TagByte } from './TagByte.js';
import type { Network, PublicKey, PubkeyBinary } from '../types/keys.js';

const PUBKEY_BINARY_LENGTH = 1 + COMPACT_LENGTH;

export class PubkeyCodec {
  /**
   * Encode a public key as `tag || 32 bytes`.
   * @throws KeyError when a P-256 point is not compact.
   */
  static encode(network: Network, publicKey: PublicKey): PubkeyBinary {
    const tag = Uint8Array.of(TagByte.encode(network, publicKey.type));
    if (publicKey.type === 'ecc_compact') {
      const compact = EccCompact.isCompact(publicKey.point);
      if (compact === undefined) {
        throw KeyError.notCompact();
      }
      return concatBytes(tag, compact);
    }
    if (publicKey.publicKey.length !== PUBLIC_LENGTH) {
      throw KeyError.malformedBinary('Ed25519 public key must be 32 bytes', publicKey.publicKey.length);
    }
    return concatBytes(tag, publicKey.publicKey);
  }

  /**
   * Decode a public key binary, asserting it belongs to `network`.
   * @throws KeyError with BAD_NETWORK when the tag names another network.
   */
  static decode(network: Network, bin: PubkeyBinary): PublicKey {
    if (bin.length !== PUBKEY_BINARY_LENGTH) {
      throw KeyError.malformedBinary(`Public key binary must be ${PUBKEY_BINARY_LENGTH} bytes`, bin.length);
    }
    const tag = TagByte.decode(bin[0]);
    if (tag.network !== network) {
      throw KeyError.badNetwork(tag.network, network);
    }

    const material = bin.slice(1);
    if (tag.keyType === 'ecc_compact') {
      return { type: 'ecc_compact', curve: ECC_CURVE, point: EccCompact.recover(material) };
    }
    return { type: 'ed25519', publicKey: material };
  }
}
