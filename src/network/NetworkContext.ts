import type { Network } from '../types/keys.js';

/**
 * Holds the network that keys are generated and encoded for when a caller
 * does not name one. Each instance is independent; there is no shared default.
 *
 * Reads and writes are plain loads and stores (last write wins). Callers that
 * need a consistent network across several steps should read it once and pass
 * the value along.
 */
export class NetworkContext {
  private current?: Network;

  constructor(network?: Network) {
    this.current = network;
  }

  /** Stored network, or `defaultNetwork` when none has been set. */
  get(defaultNetwork: Network): Network {
    return this.current ?? defaultNetwork;
  }

  set(network: Network): void {
    this.current = network;
  }

  /** Forget the stored network. */
  clear(): void {
    this.current = undefined;
  }

  get isSet(): boolean {
    return this.current !== undefined;
  }
}
