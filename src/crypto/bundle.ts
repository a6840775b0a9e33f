import { ECC_CURVE } from './EccCompact.js';
import type { KeyBundle, Network } from '../types/keys.js';

/** Bundle for a compact P-256 key; the point is shared by the secret and public halves. */
export function eccKeyBundle(network: Network, privateKey: Uint8Array, point: Uint8Array): KeyBundle {
  return {
    secret: { type: 'ecc_compact', curve: ECC_CURVE, privateKey, publicKey: point },
    public: { type: 'ecc_compact', curve: ECC_CURVE, point },
    network,
  };
}

export function ed25519KeyBundle(network: Network, secretKey: Uint8Array, publicKey: Uint8Array): KeyBundle {
  return {
    secret: { type: 'ed25519', secretKey },
    public: { type: 'ed25519', publicKey },
    network,
  };
}
