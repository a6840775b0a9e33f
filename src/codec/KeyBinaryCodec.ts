import { concatBytes } from '@noble/hashes/utils';
import { KeyError } from '../errors/KeyError.js';
import { EccCompact, COMPACT_LENGTH, POINT_LENGTH, SCALAR_LENGTH } from '../crypto/EccCompact.js';
import { PUBLIC_LENGTH, SECRET_LENGTH } from '../crypto/Ed25519.js';
import { eccKeyBundle, ed25519KeyBundle } from '../crypto/bundle.js';
import { TagByte, type Tag } from './TagByte.js';
import type { KeyBundle, Network } from '../types/keys.js';

/** Which stored layout a key file was read from. */
export type KeyBinaryFormat =
  | 'legacy-ecc-compact'
  | 'legacy-ed25519'
  | 'ecc-compact-padded'
  | 'ecc-compact'
  | 'ed25519';

export interface DecodedKeys {
  keys: KeyBundle;
  format: KeyBinaryFormat;
}

/** A bundle to encode; a missing network is written as mainnet. */
export type EncodableKeys = Pick<KeyBundle, 'secret' | 'public'> & { readonly network?: Network };

interface DecodeRule {
  format: KeyBinaryFormat;
  matches(bin: Uint8Array, tag: Tag): boolean;
  decode(bin: Uint8Array, tag: Tag): KeyBundle;
}

// tag || priv(32) || tag || compact x(32), written by an older wallet
const LEGACY_ECC_LENGTH = 1 + SCALAR_LENGTH + 1 + COMPACT_LENGTH;
// tag || secret(64) || tag || public(32)
const LEGACY_ED25519_LENGTH = 1 + SECRET_LENGTH + 1 + PUBLIC_LENGTH;
// tag || priv(32) || point(65), or tag || 0x00 || priv(31) || point(65)
const ECC_LENGTH = 1 + SCALAR_LENGTH + POINT_LENGTH;
// tag || secret(64) || public(32)
const ED25519_LENGTH = 1 + SECRET_LENGTH + PUBLIC_LENGTH;

/*
 * Evaluated in order. The dual-tag layouts must be tried before the canonical
 * ones: a legacy ed25519 file has the same length as a canonical ecc_compact one.
 */
const RULES: readonly DecodeRule[] = [
  {
    format: 'legacy-ecc-compact',
    matches: (bin, tag) =>
      tag.keyType === 'ecc_compact' && bin.length === LEGACY_ECC_LENGTH && bin[1 + SCALAR_LENGTH] === bin[0],
    decode: (bin) => {
      const point = EccCompact.recover(bin.subarray(2 + SCALAR_LENGTH));
      return decodeCanonical(concatBytes(bin.subarray(0, 1 + SCALAR_LENGTH), point));
    },
  },
  {
    format: 'legacy-ed25519',
    matches: (bin, tag) =>
      tag.keyType === 'ed25519' && bin.length === LEGACY_ED25519_LENGTH && bin[1 + SECRET_LENGTH] === bin[0],
    decode: (bin) =>
      decodeCanonical(concatBytes(bin.subarray(0, 1 + SECRET_LENGTH), bin.subarray(2 + SECRET_LENGTH))),
  },
  {
    format: 'ecc-compact-padded',
    matches: (bin, tag) => tag.keyType === 'ecc_compact' && bin.length === ECC_LENGTH && bin[1] === 0,
    decode: (bin, tag) =>
      eccKeyBundle(tag.network, bin.slice(2, 1 + SCALAR_LENGTH), bin.slice(1 + SCALAR_LENGTH)),
  },
  {
    format: 'ecc-compact',
    matches: (bin, tag) => tag.keyType === 'ecc_compact' && bin.length === ECC_LENGTH,
    decode: (bin, tag) =>
      eccKeyBundle(tag.network, bin.slice(1, 1 + SCALAR_LENGTH), bin.slice(1 + SCALAR_LENGTH)),
  },
  {
    format: 'ed25519',
    matches: (bin, tag) => tag.keyType === 'ed25519' && bin.length === ED25519_LENGTH,
    decode: (bin, tag) =>
      ed25519KeyBundle(tag.network, bin.slice(1, 1 + SECRET_LENGTH), bin.slice(1 + SECRET_LENGTH)),
  },
];

const CANONICAL_RULES = RULES.filter((rule) => !rule.format.startsWith('legacy-'));

function decodeWith(rules: readonly DecodeRule[], bin: Uint8Array): DecodedKeys {
  const tag = bin.length > 0 ? TagByte.tryDecode(bin[0]) : undefined;
  if (tag !== undefined) {
    for (const rule of rules) {
      if (rule.matches(bin, tag)) {
        return { keys: rule.decode(bin, tag), format: rule.format };
      }
    }
  }
  throw KeyError.malformedBinary('Unrecognized key binary layout', bin.length);
}

function decodeCanonical(bin: Uint8Array): KeyBundle {
  return decodeWith(CANONICAL_RULES, bin).keys;
}

export class KeyBinaryCodec {
  /**
   * Serialize a key bundle for storage.
   *
   * A 31-byte P-256 scalar is written behind an explicit zero byte so both
   * scalar sizes occupy the same 32-byte slot.
   */
  static encode(keys: EncodableKeys): Uint8Array {
    const network = keys.network ?? 'mainnet';
    const { secret, public: publicKey } = keys;
    if (secret.type !== publicKey.type) {
      throw KeyError.keyTypeMismatch(secret.type, publicKey.type);
    }
    const tag = TagByte.encode(network, secret.type);

    if (secret.type === 'ecc_compact') {
      if (secret.publicKey.length !== POINT_LENGTH) {
        throw KeyError.malformedBinary('P-256 public point must be uncompressed', secret.publicKey.length);
      }
      switch (secret.privateKey.length) {
        case SCALAR_LENGTH:
          return concatBytes(Uint8Array.of(tag), secret.privateKey, secret.publicKey);
        case SCALAR_LENGTH - 1:
          return concatBytes(Uint8Array.of(tag, 0), secret.privateKey, secret.publicKey);
        default:
          throw KeyError.malformedBinary('P-256 scalar must be 31 or 32 bytes', secret.privateKey.length);
      }
    }

    if (publicKey.type !== 'ed25519') {
      throw KeyError.keyTypeMismatch(secret.type, publicKey.type);
    }
    if (secret.secretKey.length !== SECRET_LENGTH || publicKey.publicKey.length !== PUBLIC_LENGTH) {
      throw KeyError.malformedBinary('Ed25519 keys must be 64 + 32 bytes');
    }
    return concatBytes(Uint8Array.of(tag), secret.secretKey, publicKey.publicKey);
  }

  /** @throws KeyError when the bytes match no known layout. */
  static decode(bin: Uint8Array): KeyBundle {
    return decodeWith(RULES, bin).keys;
  }

  /** Decode and report which layout matched. */
  static decodeWithFormat(bin: Uint8Array): DecodedKeys {
    return decodeWith(RULES, bin);
  }
}
