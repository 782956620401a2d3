/**
 * Health MCP Tool
 *
 * Tools: course_health
 *
 * Reports configured strategies, the vector collection and which optional
 * backends are enabled. Opening the vector index is the only backend call.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/health
 */

import type { ServiceContext } from '../server/context.js';
import { successResult } from '../server/types.js';
import { OllamaChatClient } from '../services/llm/ollama.js';
import type { CollectionInfo } from '../services/storage/vector.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

export interface HealthReport {
  status: 'ok' | 'degraded';
  embedding: { strategy: string; provider: string; dimension: number };
  vector: ({ available: true } & CollectionInfo) | { available: false; error: string };
  dimension_match: boolean | null;
  graph: { enabled: boolean };
  generation: {
    backend: string;
    model: string | null;
    circuit_state: string | null;
  };
  chat: { default_limit: number };
}

export async function buildHealthReport(ctx: ServiceContext): Promise<HealthReport> {
  const { config } = ctx;

  let vector: HealthReport['vector'];
  try {
    const index = await ctx.vectorIndex.get();
    vector = { available: true, ...(await index.describe()) };
  } catch (error) {
    vector = { available: false, error: error instanceof Error ? error.message : String(error) };
  }

  const dimensionMatch = vector.available ? vector.dimension === config.embedding.dimension : null;
  const generative = ctx.generative;

  return {
    status: vector.available && dimensionMatch === true ? 'ok' : 'degraded',
    embedding: {
      strategy: config.embedding.strategy,
      provider: ctx.embedding.name,
      dimension: ctx.embedding.dimension,
    },
    vector,
    dimension_match: dimensionMatch,
    graph: { enabled: ctx.graphStore !== undefined },
    generation: {
      backend: config.llm.backend,
      model: generative ? config.llm.model : null,
      circuit_state:
        generative instanceof OllamaChatClient ? generative.getCircuitBreakerStatus().state : null,
    },
    chat: { default_limit: config.chat.defaultLimit },
  };
}

async function handleHealth(ctx: ServiceContext): Promise<ToolResponse> {
  try {
    return formatResponse(successResult(await buildHealthReport(ctx)));
  } catch (error) {
    return handleError(error);
  }
}

export function createHealthTools(ctx: ServiceContext): Record<string, ToolDefinition> {
  return {
    course_health: {
      description:
        'Report the embedding strategy, vector collection size and dimension, and which optional backends (graph store, generative model) are enabled',
      inputSchema: {},
      handler: () => handleHealth(ctx),
    },
  };
}
