import { createHash } from 'node:crypto';

import type { DigestAlgorithm } from '../types/options.js';

/** Lowercase hex digest of the UTF-8 bytes of `text`. */
export function digestHex(text: string, algorithm: DigestAlgorithm): string {
  return createHash(algorithm).update(text, 'utf8').digest('hex');
}

export function normalizeDigest(digest: string): string {
  return digest.trim().toLowerCase();
}
