import { AddressCodec } from '../codec/AddressCodec.js';
import { PubkeyCodec } from '../codec/PubkeyCodec.js';
import type { EncodableKeys } from '../codec/KeyBinaryCodec.js';
import { KeyManager } from '../crypto/KeyManager.js';
import { NetworkContext } from '../network/NetworkContext.js';
import { KeyFile } from '../storage/KeyFile.js';
import type {
  Base58CheckString,
  KeyBundle,
  KeyType,
  Network,
  PubkeyBinary,
  PublicKey,
} from '../types/keys.js';
import type { KeyLogger } from '../types/logger.js';

export interface KeyRingConfig {
  /** A network to start on, or a context shared with other components. */
  network?: Network | NetworkContext;
  /** Network used while the context holds none. Default: 'mainnet'. */
  defaultNetwork?: Network;
  /** Optional logger for diagnostic events. */
  logger?: KeyLogger;
}

/** Key operations bound to one network context. */
export class KeyRing {
  readonly context: NetworkContext;

  private readonly config: Required<Pick<KeyRingConfig, 'defaultNetwork'>> & { logger?: KeyLogger };

  constructor(config?: KeyRingConfig) {
    const network = config?.network;
    this.context = network instanceof NetworkContext ? network : new NetworkContext(network);
    this.config = {
      defaultNetwork: config?.defaultNetwork ?? 'mainnet',
      logger: config?.logger,
    };
  }

  /** Network currently in effect. */
  get network(): Network {
    return this.context.get(this.config.defaultNetwork);
  }

  setNetwork(network: Network): void {
    this.context.set(network);
    this.config.logger?.('debug', `Network set to ${network}`);
  }

  generateKeys(keyType: KeyType): KeyBundle {
    const network = this.network;
    this.config.logger?.('debug', `Generating ${keyType} keys on ${network}`);
    return KeyManager.generateKeys(keyType, network);
  }

  pubkeyToBin(publicKey: PublicKey): PubkeyBinary {
    return PubkeyCodec.encode(this.network, publicKey);
  }

  /** @throws KeyError when the binary is for another network. */
  binToPubkey(bin: PubkeyBinary): PublicKey {
    return PubkeyCodec.decode(this.network, bin);
  }

  pubkeyToB58(publicKey: PublicKey): Base58CheckString {
    return AddressCodec.pubkeyToB58(this.network, publicKey);
  }

  b58ToPubkey(text: Base58CheckString): PublicKey {
    return AddressCodec.b58ToPubkey(this.network, text);
  }

  async saveKeys(keys: EncodableKeys, path: string): Promise<void> {
    await KeyFile.save(keys, path);
    this.config.logger?.('debug', `Saved ${keys.secret.type} keys to ${path}`);
  }

  async loadKeys(path: string): Promise<KeyBundle> {
    const { keys, format } = await KeyFile.loadWithFormat(path);
    this.config.logger?.('debug', `Loaded ${format} keys from ${path}`);
    if (format.startsWith('legacy-')) {
      this.config.logger?.('warn', `Key file ${path} uses the legacy dual-tag layout`, {
        format,
      });
    }
    return keys;
  }
}
