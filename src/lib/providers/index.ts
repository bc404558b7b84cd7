/**
 * Provider implementations and their contracts
 */

export * from './types.js';
export { CryptsetupProvider, parseKeyslots, parseMappingList } from './cryptsetup.js';
export { NodeKeyWrappingProvider } from './keyWrapping.js';
export { LinuxSystemProvider, parseMountTable, parseDfAvailable, parseFuserPids } from './system.js';
