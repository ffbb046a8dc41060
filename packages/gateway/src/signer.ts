// packages/gateway/src/signer.ts
import { bytesToBase64, hmacSha256, sha256, utf8ToBytes } from '@cmsync/utils';

import type { OutboundRequest, RequestSigner } from './types.js';

/**
 * HMAC-SHA256 request signer.
 * key = SHA-256(projectSecret); signature = base64(HMAC(key, message)).
 */
export class HmacRequestSigner implements RequestSigner {
  private readonly key: Uint8Array;

  constructor(secret: string) {
    if (!secret) throw new Error('HmacRequestSigner: secret is required');
    this.key = sha256(utf8ToBytes(secret));
  }

  sign(message: string): string {
    return bytesToBase64(hmacSha256(this.key, utf8ToBytes(message)));
  }
}

/** `METHOD\nPATH\nBODY`, the string covered by `X-Signature`. */
export function canonicalRequestString(req: Pick<OutboundRequest, 'method' | 'path' | 'body'>): string {
  return `${req.method}\n${req.path}\n${req.body ?? ''}`;
}
