import { equalBytes } from '@noble/curves/abstract/utils';
import { base58 } from '@scure/base';
import { sha256 } from '@noble/hashes/sha256';
import { concatBytes } from '@noble/hashes/utils';
import { KeyError } from '../errors/KeyError.js';
import type { Base58CheckString, VersionedPayload } from '../types/keys.js';

const CHECKSUM_LENGTH = 4;

export class Base58Check {
  /**
   * First four bytes of sha256(sha256(version || payload)).
   */
  static checksum(versionedPayload: Uint8Array): Uint8Array {
    return sha256(sha256(versionedPayload)).slice(0, CHECKSUM_LENGTH);
  }

  /**
   * Encode `version || payload || checksum` as base-58 text.
   * @throws KeyError when version is not an integer in 0..255.
   */
  static encode(version: number, payload: Uint8Array): Base58CheckString {
    if (!Number.isInteger(version) || version < 0 || version > 0xff) {
      throw KeyError.invalidVersion(version);
    }
    const versioned = concatBytes(Uint8Array.of(version), payload);
    return base58.encode(concatBytes(versioned, Base58Check.checksum(versioned)));
  }

  /**
   * Decode base-58-check text into its version byte and payload.
   * @throws KeyError when the text is not base-58 or the checksum does not match.
   */
  static decode(text: Base58CheckString): VersionedPayload {
    let raw: Uint8Array;
    try {
      raw = base58.decode(text);
    } catch (err) {
      throw KeyError.invalidEncoding(
        `Invalid base58 string: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
    if (raw.length < 1 + CHECKSUM_LENGTH) {
      throw KeyError.invalidEncoding('Base58 check string is too short');
    }

    const versioned = raw.subarray(0, raw.length - CHECKSUM_LENGTH);
    const checksum = raw.subarray(raw.length - CHECKSUM_LENGTH);
    if (!equalBytes(checksum, Base58Check.checksum(versioned))) {
      throw KeyError.badChecksum();
    }
    return { version: versioned[0], payload: versioned.slice(1) };
  }

  /** Decode and drop the version byte. */
  static stripVersion(text: Base58CheckString): Uint8Array {
    return Base58Check.decode(text).payload;
  }
}
