import { readFile, writeFile } from 'node:fs/promises';
import { KeyBinaryCodec, type DecodedKeys, type EncodableKeys } from '../codec/KeyBinaryCodec.js';
import type { KeyBundle } from '../types/keys.js';

/**
 * Key files hold the raw output of KeyBinaryCodec.encode, with no header.
 * File system errors are passed through as-is.
 */
export class KeyFile {
  static async save(keys: EncodableKeys, path: string): Promise<void> {
    await writeFile(path, KeyBinaryCodec.encode(keys));
  }

  static async load(path: string): Promise<KeyBundle> {
    return (await KeyFile.loadWithFormat(path)).keys;
  }

  static async loadWithFormat(path: string): Promise<DecodedKeys> {
    const bin = await readFile(path);
    return KeyBinaryCodec.decodeWithFormat(new Uint8Array(bin.buffer, bin.byteOffset, bin.byteLength));
  }
}
