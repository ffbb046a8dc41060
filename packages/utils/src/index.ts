// packages/utils/src/index.ts
//
// Shared helpers for @cmsync packages.

export { utf8ToBytes, bytesToHex, bytesToBase64 } from './bytes.js';
export { sha256, hmacSha256 } from './hash.js';
export { TimeoutError, withTimeout } from './async.js';
export { toError, errorCode, isRecord } from './errors.js';
