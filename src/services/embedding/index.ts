export { EmbeddingError, type EmbeddingStrategy } from './types.js';
export { HashEmbeddingStrategy, hashEmbedding } from './fallback.js';
export { SentenceEmbeddingStrategy, EmbeddingWorker, DEFAULT_WORKER_PATH } from './sentence.js';
export { resolveEmbeddingStrategy } from './strategy.js';
