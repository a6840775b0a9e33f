export { KeyManager } from './KeyManager.js';
export { Signer } from './Signer.js';
export { KeyAgreement } from './KeyAgreement.js';
export { Base58Check } from './Base58Check.js';
export { EccCompact, ECC_CURVE } from './EccCompact.js';
export type { EccKeyMaterial } from './EccCompact.js';
export { Ed25519 } from './Ed25519.js';
export type { Ed25519KeyMaterial } from './Ed25519.js';
