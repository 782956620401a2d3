/**
 * Chat request/response models
 *
 * @module models/chat
 */

import type { ContentChunk } from './chunk.js';
import type { GraphContext } from './graph.js';

/** Validated question */
export interface ChatQuery {
  text: string;
  /** 1..8 */
  limit: number;
}

export interface ChatResponse {
  /** Markdown answer with highlights or generated prose, sources and a closing note */
  answer: string;
  /** Chunks used for the answer, in candidate order */
  sources: ContentChunk[];
  graph?: GraphContext;
}
