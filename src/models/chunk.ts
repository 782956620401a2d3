/**
 * Retrieval data models
 *
 * Candidates come from the vector index; content chunks are candidates joined
 * with their document and assignment rows. Both are request-scoped values.
 *
 * @module models/chunk
 */

/**
 * Nearest-neighbour hit from the vector index.
 * Ordered by descending score; ties keep index order.
 */
export interface Candidate {
  /** Raw `document_id` payload value. May be missing or not a UUID. */
  external_id: string | null;
  /** Cosine similarity, higher = closer */
  score: number;
  topic: string | null;
  source: string | null;
}

/**
 * A candidate hydrated from the relational store
 */
export interface ContentChunk {
  /** documents.id (lower-case UUID) */
  id: string;
  /** assignments.title of the parent assignment */
  assignment_title: string;
  topic: string | null;
  source: string | null;
  chunk_number: number | null;
  content: string;
  /** Score carried over from the candidate */
  score: number;
}
