export { TagByte } from './TagByte.js';
export type { Tag } from './TagByte.js';
export { KeyBinaryCodec } from './KeyBinaryCodec.js';
export type { KeyBinaryFormat, DecodedKeys, EncodableKeys } from './KeyBinaryCodec.js';
export { PubkeyCodec } from './PubkeyCodec.js';
export { AddressCodec, ADDRESS_VERSION } from './AddressCodec.js';
