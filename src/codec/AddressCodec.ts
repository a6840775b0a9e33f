import { Base58Check } from '../crypto/Base58Check.js';
import { KeyError } from '../errors/KeyError.js';
import { PubkeyCodec } from './PubkeyCodec.js';
import type {
  Base58CheckString,
  Network,
  P2PAddress,
  PubkeyBinary,
  PublicKey,
  VersionedPayload,
} from '../types/keys.js';

/** Version byte used for every public key address. */
export const ADDRESS_VERSION = 0x00;

const P2P_PROTOCOL = 'p2p';

export class AddressCodec {
  static binToB58(bin: Uint8Array, version: number = ADDRESS_VERSION): Base58CheckString {
    return Base58Check.encode(version, bin);
  }

  /** Decode base-58-check text, ignoring its version byte. */
  static b58ToBin(text: Base58CheckString): Uint8Array {
    return Base58Check.stripVersion(text);
  }

  static b58ToVersionBin(text: Base58CheckString): VersionedPayload {
    return Base58Check.decode(text);
  }

  static pubkeyToB58(network: Network, publicKey: PublicKey): Base58CheckString {
    return AddressCodec.binToB58(PubkeyCodec.encode(network, publicKey));
  }

  static b58ToPubkey(network: Network, text: Base58CheckString): PublicKey {
    return PubkeyCodec.decode(network, AddressCodec.b58ToBin(text));
  }

  static pubkeyBinToP2p(bin: PubkeyBinary): P2PAddress {
    return `/${P2P_PROTOCOL}/${AddressCodec.binToB58(bin)}`;
  }

  /**
   * Extract the public key binary from a `/p2p/<base58>` address.
   * @throws KeyError unless the address is exactly one p2p component.
   */
  static p2pToPubkeyBin(address: P2PAddress): PubkeyBinary {
    const parts = address.split('/');
    // leading '' from the initial slash, then protocol and value
    if (parts.length !== 3 || parts[0] !== '' || parts[1] !== P2P_PROTOCOL || parts[2] === '') {
      throw KeyError.invalidEncoding(`Not a p2p address: ${address}`);
    }
    return AddressCodec.b58ToBin(parts[2]);
  }
}
