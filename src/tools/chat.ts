/**
 * Chat MCP Tools
 *
 * Tools: course_ask, course_examples
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/chat
 */

import { z } from 'zod';
import type { ServiceContext } from '../server/context.js';
import { MAX_CHUNK_LIMIT } from '../server/config.js';
import { successResult } from '../server/types.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

/** Example prompts offered to new users */
export const EXAMPLE_PROMPTS = [
  'How should I prepare the RAG pipeline for the course?',
  'What does the knowledge graph cover for the machine learning topics?',
  'What is the best way to explain a vector store to a student?',
] as const;

// ═══════════════════════════════════════════════════════════════════════════════
// HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Handle course_ask - answer a question from the course materials.
 * Validation happens in the pipeline so every caller gets the same rules.
 */
async function handleAsk(ctx: ServiceContext, params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const message = typeof params.message === 'string' ? params.message : '';
    const limit = typeof params.limit === 'number' ? params.limit : undefined;
    const response = await ctx.pipeline.answer(message, limit);
    return formatResponse(successResult(response));
  } catch (error) {
    return handleError(error);
  }
}

async function handleExamples(): Promise<ToolResponse> {
  return formatResponse(successResult({ examples: EXAMPLE_PROMPTS }));
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

export function createChatTools(ctx: ServiceContext): Record<string, ToolDefinition> {
  return {
    course_ask: {
      description:
        'Answer a question about the course materials. Returns a Markdown answer, the source chunks it used, and related concepts from the knowledge graph when available.',
      inputSchema: {
        message: z.string().describe('The question to answer'),
        limit: z
          .number()
          .int()
          .optional()
          .describe(`Number of context chunks to use (1-${MAX_CHUNK_LIMIT}, default ${ctx.config.chat.defaultLimit})`),
      },
      handler: (params) => handleAsk(ctx, params),
    },
    course_examples: {
      description: 'List example questions to ask about the course materials',
      inputSchema: {},
      handler: handleExamples,
    },
  };
}
