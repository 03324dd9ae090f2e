export { parseKeySet, fetchKeySet } from './key-set.js';
export type { FetchKeySetOptions } from './key-set.js';
export { createKeyStore } from './key-store.js';
export type { KeyStore, KeyStoreOptions, KeySetFetcher } from './key-store.js';
