export type Network = 'mainnet' | 'testnet';

export type KeyType = 'ecc_compact' | 'ed25519';

/** Named curve behind `ecc_compact` keys (NIST P-256). */
export type EccCurve = 'secp256r1';

export interface EccPrivateKey {
  readonly type: 'ecc_compact';
  readonly curve: EccCurve;
  /** Big-endian scalar, 32 bytes or (when its leading byte is zero) 31 bytes. */
  readonly privateKey: Uint8Array;
  /** 65-byte uncompressed SEC1 point. */
  readonly publicKey: Uint8Array;
}

export interface Ed25519PrivateKey {
  readonly type: 'ed25519';
  /**
   * 64 bytes: 32-byte seed followed by the 32-byte public key. The public
   * half is assumed to match the seed; signing and agreement read only the seed.
   */
  readonly secretKey: Uint8Array;
}

export type PrivateKey = EccPrivateKey | Ed25519PrivateKey;

export interface EccPublicKey {
  readonly type: 'ecc_compact';
  readonly curve: EccCurve;
  /** 65-byte uncompressed SEC1 point. */
  readonly point: Uint8Array;
}

export interface Ed25519PublicKey {
  readonly type: 'ed25519';
  readonly publicKey: Uint8Array;
}

export type PublicKey = EccPublicKey | Ed25519PublicKey;

export interface KeyBundle {
  readonly secret: PrivateKey;
  readonly public: PublicKey;
  readonly network: Network;
}

/** Tag byte followed by 32 bytes of key material. */
export type PubkeyBinary = Uint8Array;

/** base58(version || payload || checksum). */
export type Base58CheckString = string;

/** `/p2p/` followed by a base-58-check string. */
export type P2PAddress = string;

export interface VersionedPayload {
  version: number;
  payload: Uint8Array;
}
