/**
 * Crypto module - key store and sealing envelope
 */

export { KeyStore } from './keyStore.js';
export type { MasterKeyResult } from './keyStore.js';

export { sealFile, unsealFile, readSealHeader, isSealedFile } from './envelope.js';
export type { SealHeader, SealRecipient } from './envelope.js';
