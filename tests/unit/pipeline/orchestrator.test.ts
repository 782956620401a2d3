/**
 * Unit tests for PipelineOrchestrator
 *
 * Every backend is an in-process stand-in.
 *
 * @module tests/unit/pipeline/orchestrator
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import type { Candidate } from '../../../src/models/chunk.js';
import { RagError } from '../../../src/server/errors.js';
import { HashEmbeddingStrategy, hashEmbedding } from '../../../src/services/embedding/fallback.js';
import type { EmbeddingStrategy } from '../../../src/services/embedding/types.js';
import { GraphContextBuilder } from '../../../src/services/graph/context-builder.js';
import type { GenerativeBackend } from '../../../src/services/llm/types.js';
import { PipelineOrchestrator } from '../../../src/services/pipeline/orchestrator.js';
import { RelationalHydrator } from '../../../src/services/storage/hydrator.js';
import {
  RelationalStoreError,
  RelationalStoreErrorCode,
  type DocumentLookup,
  type DocumentRecord,
} from '../../../src/services/storage/relational.js';
import { VectorError, VectorErrorCode, type VectorSearchClient } from '../../../src/services/storage/vector.js';
import { composeAnswer } from '../../../src/services/synthesis/extractive.js';
import { AnswerSynthesizer } from '../../../src/services/synthesis/synthesizer.js';
import { fail, ok } from '../../../src/utils/result.js';
import {
  DOC_A,
  DOC_B,
  DOC_C,
  DOC_D,
  FakeDocumentLookup,
  FakeGraphStore,
  FakeVectorClient,
  makeCandidate,
  makeRecord,
  type FakeGraphData,
} from '../helpers.js';

const CANDIDATES = [makeCandidate(DOC_A, 0.9), makeCandidate(DOC_B, 0.8), makeCandidate(DOC_C, 0.7)];
const RECORDS = [
  makeRecord(DOC_A),
  makeRecord(DOC_B, { topic: 'embeddings', assignment_title: 'Embeddings lab' }),
  makeRecord(DOC_C, { topic: null }),
];
const GRAPH: FakeGraphData = {
  edges: [['rag-pipeline', 'embeddings']],
  labels: { 'rag-pipeline': 'RAG pipeline', embeddings: 'Embeddings' },
  titles: { embeddings: ['Embeddings lab'] },
};

interface Setup {
  embedding?: EmbeddingStrategy;
  candidates?: Candidate[];
  searchClient?: VectorSearchClient;
  records?: DocumentRecord[];
  lookup?: DocumentLookup;
  graph?: FakeGraphStore;
  backend?: GenerativeBackend;
}

function createPipeline(setup: Setup = {}) {
  const vector = new FakeVectorClient(setup.candidates ?? CANDIDATES);
  const lookup = new FakeDocumentLookup(setup.records ?? RECORDS);
  const searchClient = setup.searchClient ?? vector;
  const documents = setup.lookup ?? lookup;
  const graphStore = setup.graph;
  const orchestrator = new PipelineOrchestrator({
    embedding: setup.embedding ?? new HashEmbeddingStrategy(4),
    getVectorIndex: async () => searchClient,
    getHydrator: async () => new RelationalHydrator(documents),
    graph: new GraphContextBuilder(graphStore ? async () => graphStore : undefined, {
      maxEdges: 40,
      titlesPerTopic: 3,
    }),
    synthesizer: new AnswerSynthesizer(setup.backend, {
      temperature: 0.2,
      maxOutputTokens: 512,
      snippetChars: 600,
    }),
    defaultLimit: 6,
  });
  return { orchestrator, vector, lookup };
}

async function rejection(promise: Promise<unknown>): Promise<RagError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof RagError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected the pipeline to reject');
}

class ThrowingVectorClient implements VectorSearchClient {
  constructor(private readonly error: Error) {}

  async search(): Promise<never> {
    throw this.error;
  }

  async describe(): Promise<never> {
    throw this.error;
  }
}

describe('PipelineOrchestrator', () => {
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    errorSpy.mockRestore();
  });

  function summaryLines(): string[] {
    return errorSpy.mock.calls
      .map(([line]) => String(line))
      .filter((line) => line.startsWith('[Pipeline] state='));
  }

  describe('answered requests', () => {
    it('returns the extractive answer, the sources in search order and the graph', async () => {
      const { orchestrator } = createPipeline({ graph: new FakeGraphStore(GRAPH) });

      const response = await orchestrator.answer('What is RAG?');

      expect(response.sources.map((s) => [s.id, s.score])).toEqual([
        [DOC_A, 0.9],
        [DOC_B, 0.8],
        [DOC_C, 0.7],
      ]);
      expect(response.answer).toBe(composeAnswer('What is RAG?', response.sources));
      expect(response.graph).toEqual({
        nodes: [
          { topic_id: 'rag-pipeline', label: 'RAG pipeline', related_assignment_titles: [], is_primary: true },
          { topic_id: 'embeddings', label: 'Embeddings', related_assignment_titles: ['Embeddings lab'], is_primary: true },
        ],
        edges: [{ source_topic_id: 'rag-pipeline', target_topic_id: 'embeddings' }],
      });
    });

    it('marks only topics of the hydrated chunks as primary', async () => {
      const { orchestrator } = createPipeline({
        candidates: [makeCandidate(DOC_A, 0.9), makeCandidate(DOC_B, 0.8)],
        records: [makeRecord(DOC_A), makeRecord(DOC_B)],
        graph: new FakeGraphStore({ edges: [['rag-pipeline', 'embeddings']] }),
      });

      const response = await orchestrator.answer('How do I build the pipeline?');

      expect(response.sources).toHaveLength(2);
      expect(response.answer).toContain('#### Sources used');
      expect(response.graph?.nodes.map((n) => [n.topic_id, n.is_primary])).toEqual([
        ['rag-pipeline', true],
        ['embeddings', false],
      ]);
      expect(response.graph?.edges).toHaveLength(1);
    });

    it('omits the graph key when no graph store is configured', async () => {
      const { orchestrator } = createPipeline();

      const response = await orchestrator.answer('What is RAG?');

      expect('graph' in response).toBe(false);
      expect(response.sources).toHaveLength(3);
    });

    it('omits the graph key when the graph store fails', async () => {
      const { orchestrator } = createPipeline({
        graph: new FakeGraphStore({ failWith: new Error('ServiceUnavailable') }),
      });

      const response = await orchestrator.answer('What is RAG?');

      expect('graph' in response).toBe(false);
      expect(response.sources).toHaveLength(3);
    });

    it('trims the question before embedding and answering', async () => {
      const { orchestrator, vector } = createPipeline();

      const response = await orchestrator.answer('   What is RAG?  ');

      expect(vector.calls[0].vector).toEqual(hashEmbedding('What is RAG?', 4));
      expect(response.answer.startsWith('### Answer to "What is RAG?"\n')).toBe(true);
    });

    it('uses the default limit when none is given', async () => {
      const { orchestrator, vector } = createPipeline();
      await orchestrator.answer('What is RAG?');
      expect(vector.calls[0].limit).toBe(6);
    });

    it('passes an explicit limit to search and hydration', async () => {
      const { orchestrator, vector } = createPipeline();

      const response = await orchestrator.answer('What is RAG?', 2);

      expect(vector.calls[0].limit).toBe(2);
      expect(response.sources.map((s) => s.id)).toEqual([DOC_A, DOC_B]);
    });

    it('uses the generative answer when a backend replies', async () => {
      const backend: GenerativeBackend = {
        name: 'scripted',
        generate: async () => ok('- Retrieval first [1].'),
      };
      const { orchestrator } = createPipeline({ backend });

      const response = await orchestrator.answer('What is RAG?');

      expect(response.answer).toBe(composeAnswer('What is RAG?', response.sources, '- Retrieval first [1].'));
      expect(summaryLines()[0]).toContain(' tier=generative ');
    });

    it('falls back to extractive answers when the backend fails', async () => {
      const backend: GenerativeBackend = {
        name: 'scripted',
        generate: async () => fail('generation', new Error('connection refused')),
      };
      const { orchestrator } = createPipeline({ backend });

      const response = await orchestrator.answer('What is RAG?');

      expect(response.answer).toBe(composeAnswer('What is RAG?', response.sources));
    });

    it('falls back to the hash embedding when the provider fails, warning once', async () => {
      const broken: EmbeddingStrategy = {
        name: 'broken-model',
        dimension: 4,
        embed: async () => fail('embedding', new Error('worker exited')),
        close: async () => {},
      };
      const { orchestrator, vector } = createPipeline({ embedding: broken });

      await orchestrator.answer('What is RAG?');
      await orchestrator.answer('What is RAG?');

      expect(vector.calls[0].vector).toEqual(hashEmbedding('What is RAG?', 4));
      const warning =
        '[Pipeline] Embedding provider "broken-model" failed, using deterministic fallback: worker exited';
      expect(errorSpy.mock.calls.filter(([line]) => line === warning)).toHaveLength(1);
      expect(summaryLines()[0]).toContain(' embedding=hash ');
    });

    it('falls back to the hash embedding when the provider rejects', async () => {
      const throwing: EmbeddingStrategy = {
        name: 'throwing-model',
        dimension: 4,
        embed: async () => {
          throw new Error('worker crashed');
        },
        close: async () => {},
      };
      const { orchestrator, vector } = createPipeline({ embedding: throwing });

      const response = await orchestrator.answer('What is RAG?');

      expect(vector.calls[0].vector).toEqual(hashEmbedding('What is RAG?', 4));
      expect(response.sources).toHaveLength(3);
      expect(errorSpy).toHaveBeenCalledWith(
        '[Pipeline] Embedding provider "throwing-model" failed, using deterministic fallback: worker crashed'
      );
    });

    it('logs one summary line per request', async () => {
      const { orchestrator } = createPipeline({ graph: new FakeGraphStore(GRAPH) });

      await orchestrator.answer('What is RAG?');

      const lines = summaryLines();
      expect(lines).toHaveLength(1);
      expect(lines[0]).toMatch(
        /^\[Pipeline\] state=Responded embedding=hash candidates=3 sources=3 graph_nodes=2 tier=extractive elapsed_ms=\d+$/
      );
    });
  });

  describe('request errors', () => {
    it('rejects an empty message without searching', async () => {
      const { orchestrator, vector } = createPipeline();

      const error = await rejection(orchestrator.answer('   '));

      expect(error.category).toBe('VALIDATION_ERROR');
      expect(error.message).toBe('message: message must not be empty');
      expect(vector.calls).toHaveLength(0);
    });

    it.each([
      [0, 'limit: limit must be at least 1'],
      [9, 'limit: limit must be at most 8'],
      [2.5, 'limit: limit must be an integer'],
    ])('rejects limit %s', async (limit, message) => {
      const { orchestrator } = createPipeline();

      const error = await rejection(orchestrator.answer('What is RAG?', limit));

      expect(error.category).toBe('VALIDATION_ERROR');
      expect(error.message).toBe(message);
    });

    it('reports MATERIALS_NOT_FOUND when search returns nothing', async () => {
      const { orchestrator, lookup } = createPipeline({ candidates: [] });

      const error = await rejection(orchestrator.answer('What is RAG?'));

      expect(error.category).toBe('MATERIALS_NOT_FOUND');
      expect(error.message).toBe('No course materials found for this query.');
      expect(error.details).toEqual({ question: 'What is RAG?' });
      expect(lookup.calls).toHaveLength(0);
      expect(summaryLines()[0]).toContain('state=NotFound ');
    });

    it('reports DOCUMENTS_NOT_MATCHED when no candidate resolves', async () => {
      const { orchestrator } = createPipeline({
        candidates: [makeCandidate(DOC_D, 0.9), makeCandidate('not-a-uuid', 0.8)],
      });

      const error = await rejection(orchestrator.answer('What is RAG?'));

      expect(error.category).toBe('DOCUMENTS_NOT_MATCHED');
      expect(error.message).toBe('Could not match the search results to stored documents.');
      expect(error.details).toEqual({ candidateCount: 2 });
      expect(summaryLines()[0]).toContain('state=NoMatch ');
    });
  });

  describe('infrastructure errors', () => {
    it('surfaces a failed search as VECTOR_INDEX_ERROR', async () => {
      const { orchestrator } = createPipeline({
        searchClient: new ThrowingVectorClient(
          new VectorError('Vector search failed', VectorErrorCode.SEARCH_FAILED, { collection: 'course_materials' })
        ),
      });

      const error = await rejection(orchestrator.answer('What is RAG?'));

      expect(error.category).toBe('VECTOR_INDEX_ERROR');
      expect(error.details?.errorCode).toBe('SEARCH_FAILED');
      expect(summaryLines()[0]).toContain('state=Failed ');
    });

    it('surfaces a dimension mismatch as CONFIGURATION_ERROR', async () => {
      const { orchestrator } = createPipeline({
        searchClient: new ThrowingVectorClient(
          new VectorError('Query vector has 4 dimensions', VectorErrorCode.DIMENSION_MISMATCH)
        ),
      });

      const error = await rejection(orchestrator.answer('What is RAG?'));

      expect(error.category).toBe('CONFIGURATION_ERROR');
    });

    it('surfaces a failed document lookup as RELATIONAL_STORE_ERROR', async () => {
      const lookup: DocumentLookup = {
        fetchDocuments: async () => {
          throw new RelationalStoreError('Document lookup failed', RelationalStoreErrorCode.QUERY_FAILED);
        },
      };
      const { orchestrator } = createPipeline({ lookup });

      const error = await rejection(orchestrator.answer('What is RAG?'));

      expect(error.category).toBe('RELATIONAL_STORE_ERROR');
      expect(error.message).toBe('Document lookup failed');
    });
  });
});
