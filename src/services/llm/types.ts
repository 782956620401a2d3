/**
 * Generative backend contract
 *
 * @module services/llm/types
 */

import type { BackendResult } from '../../utils/result.js';

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface GenerationOptions {
  temperature: number;
  maxOutputTokens: number;
}

export interface GenerativeBackend {
  readonly name: string;
  /** Ordered role-tagged messages in, generated text out. Failures come back as a failed result. */
  generate(messages: ChatMessage[], options: GenerationOptions): Promise<BackendResult<string>>;
}
