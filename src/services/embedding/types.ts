/**
 * Embedding strategy contract
 *
 * @module services/embedding/types
 */

import type { BackendResult } from '../../utils/result.js';

export interface EmbeddingStrategy {
  /** Provider name used in logs and the one-shot fallback key */
  readonly name: string;
  /** Configured vector dimension */
  readonly dimension: number;
  embed(text: string): Promise<BackendResult<number[]>>;
  /** Release worker processes, if any */
  close(): Promise<void>;
}

type EmbeddingErrorCode = 'WORKER_START_FAILED' | 'WORKER_ERROR' | 'TIMEOUT' | 'PARSE_ERROR' | 'EMBEDDING_FAILED';

export class EmbeddingError extends Error {
  constructor(
    message: string,
    public readonly code: EmbeddingErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'EmbeddingError';
    Error.captureStackTrace?.(this, EmbeddingError);
  }
}
