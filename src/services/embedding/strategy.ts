/**
 * Embedding strategy resolution
 *
 * @module services/embedding/strategy
 */

import type { RagConfig } from '../../server/config.js';
import { HashEmbeddingStrategy } from './fallback.js';
import { SentenceEmbeddingStrategy } from './sentence.js';
import type { EmbeddingStrategy } from './types.js';

/**
 * Resolve EMBEDDING_STRATEGY once into a strategy object.
 */
export function resolveEmbeddingStrategy(config: RagConfig['embedding']): EmbeddingStrategy {
  switch (config.strategy) {
    case 'model':
      return new SentenceEmbeddingStrategy({
        model: config.model,
        dimension: config.dimension,
        timeoutMs: config.timeoutMs,
        pythonPath: config.pythonPath,
      });
    case 'fallback':
      return new HashEmbeddingStrategy(config.dimension);
  }
}
