export { HashCache } from './hash-cache.js';
export type { TrustedRecordResult } from './hash-cache.js';
export { hashFile, hashBuffer } from './file-hasher.js';
export {
  sidecarPathFor,
  computeIntegrityTag,
  createHashRecord,
  verifyHashRecord,
  parseHashRecord,
  readHashRecord,
  writeHashRecord,
} from './sidecar.js';
export type { SidecarReadResult } from './sidecar.js';
export type { HashRecord, FileHashResult, HashFileOptions, SidecarStatus } from './types.js';
