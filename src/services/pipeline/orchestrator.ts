/**
 * Pipeline Orchestrator
 *
 * Received -> Embedded -> Searched -> Hydrated -> (GraphEnriched || Synthesized) -> Responded
 *
 * with early terminals NotFound (no candidates) and NoMatch (no candidate
 * resolved to a stored document). Every external call is attempted once per
 * request. Optional backends degrade instead of failing: the embedding model
 * falls back to the hash embedding, generation to extractive answers, and
 * graph enrichment to no graph.
 *
 * @module services/pipeline/orchestrator
 */

import type { ChatQuery, ChatResponse } from '../../models/chat.js';
import {
  RagError,
  documentsNotMatchedError,
  materialsNotFoundError,
  validationError,
} from '../../server/errors.js';
import { OneShotLog } from '../../utils/log-once.js';
import { attempt, flatten } from '../../utils/result.js';
import { ChatInput, ValidationError, validateInput } from '../../utils/validation.js';
import { hashEmbedding } from '../embedding/fallback.js';
import type { EmbeddingStrategy } from '../embedding/types.js';
import type { GraphContextBuilder } from '../graph/context-builder.js';
import type { RelationalHydrator } from '../storage/hydrator.js';
import type { VectorSearchClient } from '../storage/vector.js';
import type { AnswerSynthesizer, SynthesisTier } from '../synthesis/synthesizer.js';

export type PipelineState =
  | 'Received'
  | 'Embedded'
  | 'Searched'
  | 'Hydrated'
  | 'Responded'
  | 'NotFound'
  | 'NoMatch'
  | 'Failed';

export interface PipelineDependencies {
  embedding: EmbeddingStrategy;
  getVectorIndex: () => Promise<VectorSearchClient>;
  getHydrator: () => Promise<RelationalHydrator>;
  graph: GraphContextBuilder;
  synthesizer: AnswerSynthesizer;
  /** Chunk limit when the caller gives none */
  defaultLimit: number;
}

interface RunStats {
  state: PipelineState;
  candidates: number;
  sources: number;
  graphNodes: number;
  embedding: string;
  tier: SynthesisTier | null;
}

export class PipelineOrchestrator {
  private readonly fallbackLog = new OneShotLog();

  constructor(private readonly deps: PipelineDependencies) {}

  /**
   * Answer a question from the course materials.
   *
   * @throws RagError VALIDATION_ERROR, MATERIALS_NOT_FOUND or DOCUMENTS_NOT_MATCHED
   * for request errors; infrastructure failures of the vector index or the
   * relational store surface with their own categories.
   */
  async answer(question: string, limit?: number): Promise<ChatResponse> {
    const startedAt = Date.now();
    const stats: RunStats = {
      state: 'Received',
      candidates: 0,
      sources: 0,
      graphNodes: 0,
      embedding: this.deps.embedding.name,
      tier: null,
    };

    try {
      const query = this.validate(question, limit);

      const vector = await this.embed(query.text, stats);
      stats.state = 'Embedded';

      const index = await this.deps.getVectorIndex();
      const candidates = await index.search(vector, query.limit);
      stats.candidates = candidates.length;
      if (candidates.length === 0) {
        stats.state = 'NotFound';
        throw materialsNotFoundError(query.text);
      }
      stats.state = 'Searched';

      const hydrator = await this.deps.getHydrator();
      const chunks = await hydrator.hydrate(candidates, query.limit);
      stats.sources = chunks.length;
      if (chunks.length === 0) {
        stats.state = 'NoMatch';
        console.error(
          `[Pipeline] ${candidates.length} vector candidates matched no stored documents; the vector index and relational store may be out of sync`
        );
        throw documentsNotMatchedError(candidates.length);
      }
      stats.state = 'Hydrated';

      const topics = new Set<string>();
      for (const chunk of chunks) {
        if (chunk.topic) topics.add(chunk.topic);
      }

      const [graph, synthesis] = await Promise.all([
        this.deps.graph.build(topics),
        this.deps.synthesizer.synthesizeWithTier(query.text, chunks),
      ]);
      stats.tier = synthesis.tier;
      stats.graphNodes = graph?.nodes.length ?? 0;

      stats.state = 'Responded';
      return {
        answer: synthesis.answer,
        sources: chunks,
        ...(graph && { graph }),
      };
    } catch (error) {
      if (stats.state !== 'NotFound' && stats.state !== 'NoMatch') {
        stats.state = 'Failed';
      }
      throw RagError.fromUnknown(error);
    } finally {
      console.error(
        `[Pipeline] state=${stats.state} embedding=${stats.embedding} candidates=${stats.candidates} sources=${stats.sources} graph_nodes=${stats.graphNodes} tier=${stats.tier ?? '-'} elapsed_ms=${Date.now() - startedAt}`
      );
    }
  }

  private validate(question: string, limit: number | undefined): ChatQuery {
    try {
      const input = validateInput(ChatInput, { message: question, limit });
      return { text: input.message, limit: input.limit ?? this.deps.defaultLimit };
    } catch (error) {
      if (error instanceof ValidationError) {
        throw validationError(error.message);
      }
      throw error;
    }
  }

  private async embed(text: string, stats: RunStats): Promise<number[]> {
    const { embedding } = this.deps;
    const result = flatten(await attempt('embedding', () => embedding.embed(text)));
    if (result.ok) {
      return result.value;
    }
    this.fallbackLog.warn(
      embedding.name,
      `[Pipeline] Embedding provider "${embedding.name}" failed, using deterministic fallback: ${result.error.message}`
    );
    stats.embedding = 'hash';
    return hashEmbedding(text, embedding.dimension);
  }
}
