// Key operations
export * from './crypto/index.js';

// Codecs
export * from './codec/index.js';

// Network
export { NetworkContext } from './network/NetworkContext.js';

// Storage
export { KeyFile } from './storage/KeyFile.js';

// Facade
export { KeyRing } from './keyring/KeyRing.js';
export type { KeyRingConfig } from './keyring/KeyRing.js';

// Errors
export { KeyError } from './errors/KeyError.js';

// Types
export * from './types/index.js';
