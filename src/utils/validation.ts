/**
 * Course RAG - Zod Validation Schemas
 *
 * Input schemas for the MCP tools. Each schema trims, bounds and defaults
 * what a client sends before it reaches the pipeline.
 *
 * @module utils/validation
 */

import { z } from 'zod';
import { MAX_CHUNK_LIMIT } from '../server/config.js';

// ═══════════════════════════════════════════════════════════════════════════════
// CUSTOM ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Custom validation error with descriptive message
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @throws ValidationError listing every failing path
 */
export function validateInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const errors = result.error.errors.map((e) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    });
    throw new ValidationError(errors.join('; '));
  }
  return result.data;
}

// ═══════════════════════════════════════════════════════════════════════════════
// CHAT SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Chunk limit: integer in [1, MAX_CHUNK_LIMIT]. Omitted means the configured default.
 */
export const ChunkLimit = z
  .number()
  .int('limit must be an integer')
  .min(1, 'limit must be at least 1')
  .max(MAX_CHUNK_LIMIT, `limit must be at most ${MAX_CHUNK_LIMIT}`);

/**
 * Schema for course_ask
 */
export const ChatInput = z.object({
  message: z
    .string()
    .trim()
    .min(1, 'message must not be empty'),
  limit: ChunkLimit.optional(),
});

export type ChatInputType = z.infer<typeof ChatInput>;
