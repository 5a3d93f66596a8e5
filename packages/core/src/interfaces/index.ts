export type { CacheLookup, IKeyCache } from './key-cache.interface.js';
export type { IKmsProvider } from './kms-provider.interface.js';
