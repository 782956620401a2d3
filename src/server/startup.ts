/**
 * Startup Validation
 *
 * Warns about optional backends that are switched off and fails when the
 * vector collection's dimension differs from EMBEDDING_DIM.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module server/startup
 */

import type { ServiceContext } from './context.js';
import { configurationError } from './errors.js';

/**
 * Warnings for optional backends that are disabled by configuration
 */
export function collectStartupWarnings(ctx: ServiceContext): string[] {
  const { config } = ctx;
  const warnings: string[] = [];

  if (config.embedding.strategy === 'fallback') {
    warnings.push(
      'EMBEDDING_STRATEGY=fallback: questions are embedded with a deterministic hash, not a model. Set EMBEDDING_STRATEGY=model for semantic search.'
    );
  }
  if (!config.graph.uri) {
    warnings.push('NEO4J_URI is not set. Answers will not include graph context.');
  }
  if (config.llm.backend === 'none') {
    warnings.push('LLM_BACKEND=none: answers are extractive summaries. Set LLM_BACKEND=ollama for generated answers.');
  }
  return warnings;
}

/**
 * Check the vector collection against the configured embedding dimension.
 *
 * @throws RagError CONFIGURATION_ERROR on a dimension mismatch. A missing
 * database or collection is only a warning; ingestion may not have run yet.
 */
export async function checkVectorCollection(ctx: ServiceContext): Promise<void> {
  const expected = ctx.config.embedding.dimension;
  let dimension: number;
  try {
    const index = await ctx.vectorIndex.get();
    const info = await index.describe();
    dimension = info.dimension;
    console.error(
      `[Startup] Vector collection "${info.collection}": ${info.pointCount} points, dimension ${info.dimension}`
    );
  } catch (error) {
    // Probe only: release what was opened and let the first request open the index again
    await ctx.vectorIndex.close();
    console.error(
      `[Startup] Vector index not available yet: ${error instanceof Error ? error.message : String(error)}`
    );
    return;
  }

  if (dimension !== expected) {
    throw configurationError(
      `Vector collection "${ctx.config.vector.collection}" has dimension ${dimension}, but EMBEDDING_DIM is ${expected}`,
      { collectionDimension: dimension, embeddingDimension: expected }
    );
  }
}

export async function validateStartup(ctx: ServiceContext): Promise<void> {
  const warnings = collectStartupWarnings(ctx);
  if (warnings.length > 0) {
    console.error('=== STARTUP WARNINGS ===');
    for (const w of warnings) {
      console.error(`  - ${w}`);
    }
    console.error('========================');
  }

  await checkVectorCollection(ctx);
}
