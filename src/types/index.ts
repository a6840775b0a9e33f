export type {
  Network,
  KeyType,
  EccCurve,
  EccPrivateKey,
  Ed25519PrivateKey,
  PrivateKey,
  EccPublicKey,
  Ed25519PublicKey,
  PublicKey,
  KeyBundle,
  PubkeyBinary,
  Base58CheckString,
  P2PAddress,
  VersionedPayload,
} from './keys.js';

export type { KeyErrorData, ErrorCode } from './errors.js';
export { ErrorCodes } from './errors.js';

export type { KeyLogger } from './logger.js';
