import { KeyError } from '../errors/KeyError.js';
import type { KeyType, Network } from '../types/keys.js';

const NETWORK_NIBBLES: Record<Network, number> = {
  mainnet: 0,
  testnet: 1,
};

const KEY_TYPE_NIBBLES: Record<KeyType, number> = {
  ecc_compact: 0,
  ed25519: 1,
};

export interface Tag {
  network: Network;
  keyType: KeyType;
}

/**
 * Leading byte of every binary key: network in the high nibble, key type in
 * the low nibble.
 */
export class TagByte {
  static encode(network: Network, keyType: KeyType): number {
    return (NETWORK_NIBBLES[network] << 4) | KEY_TYPE_NIBBLES[keyType];
  }

  /** @throws KeyError when either nibble is unknown. */
  static decode(byte: number): Tag {
    const tag = TagByte.tryDecode(byte);
    if (tag === undefined) {
      throw KeyError.malformedBinary(`Unknown tag byte 0x${byte.toString(16).padStart(2, '0')}`);
    }
    return tag;
  }

  /** Like decode, but returns undefined for unknown nibbles. */
  static tryDecode(byte: number): Tag | undefined {
    const network = TagByte.networkOf(byte >> 4);
    const keyType = TagByte.keyTypeOf(byte & 0x0f);
    return network !== undefined && keyType !== undefined ? { network, keyType } : undefined;
  }

  private static networkOf(nibble: number): Network | undefined {
    if (nibble === NETWORK_NIBBLES.mainnet) return 'mainnet';
    if (nibble === NETWORK_NIBBLES.testnet) return 'testnet';
    return undefined;
  }

  private static keyTypeOf(nibble: number): KeyType | undefined {
    if (nibble === KEY_TYPE_NIBBLES.ecc_compact) return 'ecc_compact';
    if (nibble === KEY_TYPE_NIBBLES.ed25519) return 'ed25519';
    return undefined;
  }
}
