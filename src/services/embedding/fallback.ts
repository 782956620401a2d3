/**
 * HashEmbeddingStrategy - deterministic embedding with no model
 *
 * SHA-256 digest of the UTF-8 text, each byte scaled to [0, 1], the 32-byte
 * digest repeated until the configured dimension is filled. Similar texts do
 * not get similar vectors; this keeps the pipeline answering when no model
 * is available.
 *
 * @module services/embedding/fallback
 */

import { sha256Digest } from '../../utils/hash.js';
import { ok, type BackendResult } from '../../utils/result.js';
import type { EmbeddingStrategy } from './types.js';

export function hashEmbedding(text: string, dimension: number): number[] {
  const digest = sha256Digest(text);
  const vector = new Array<number>(dimension);
  for (let i = 0; i < dimension; i++) {
    vector[i] = digest[i % digest.length] / 255;
  }
  return vector;
}

export class HashEmbeddingStrategy implements EmbeddingStrategy {
  readonly name = 'hash';

  constructor(readonly dimension: number) {}

  async embed(text: string): Promise<BackendResult<number[]>> {
    return ok(hashEmbedding(text, this.dimension));
  }

  async close(): Promise<void> {}
}
