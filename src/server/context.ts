/**
 * ServiceContext - process-wide backend handles
 *
 * Built once at startup from the loaded configuration and passed to the
 * tools. Each backend connection is a LazyHandle: opened on first use,
 * shared afterwards, released by close().
 *
 * @module server/context
 */

import type { RagConfig } from './config.js';
import { resolveEmbeddingStrategy } from '../services/embedding/strategy.js';
import type { EmbeddingStrategy } from '../services/embedding/types.js';
import { GraphContextBuilder } from '../services/graph/context-builder.js';
import { Neo4jGraphStore, type GraphStore } from '../services/graph/store.js';
import { resolveGenerativeBackend } from '../services/llm/ollama.js';
import type { GenerativeBackend } from '../services/llm/types.js';
import { PipelineOrchestrator } from '../services/pipeline/orchestrator.js';
import { RelationalHydrator } from '../services/storage/hydrator.js';
import { RelationalStore, type DocumentLookup } from '../services/storage/relational.js';
import { SqliteVecIndex, type VectorSearchClient } from '../services/storage/vector.js';
import { AnswerSynthesizer } from '../services/synthesis/synthesizer.js';
import { LazyHandle } from '../utils/lazy.js';

/** A backend connection that can be released */
type Closeable<T> = T & { close(): void | Promise<void> };

/**
 * Backend factories. Defaults open the configured SQLite files, Neo4j and
 * Ollama; tests substitute in-process stand-ins.
 */
export interface ServiceBackends {
  embedding: EmbeddingStrategy;
  openVectorIndex: () => Closeable<VectorSearchClient> | Promise<Closeable<VectorSearchClient>>;
  openRelationalStore: () => Closeable<DocumentLookup> | Promise<Closeable<DocumentLookup>>;
  /** Undefined when no graph store is configured */
  connectGraphStore?: () => GraphStore | Promise<GraphStore>;
  /** Undefined when LLM_BACKEND=none */
  generative?: GenerativeBackend;
}

export function defaultBackends(config: RagConfig): ServiceBackends {
  const graphUri = config.graph.uri;
  return {
    embedding: resolveEmbeddingStrategy(config.embedding),
    openVectorIndex: () =>
      SqliteVecIndex.open(config.vector.databasePath, {
        collection: config.vector.collection,
        scoreThreshold: config.vector.scoreThreshold,
      }),
    openRelationalStore: () => RelationalStore.open(config.relational.databasePath),
    connectGraphStore:
      graphUri === undefined ? undefined : () => Neo4jGraphStore.connect({ ...config.graph, uri: graphUri }),
    generative: resolveGenerativeBackend(config.llm),
  };
}

export class ServiceContext {
  readonly embedding: EmbeddingStrategy;
  readonly generative: GenerativeBackend | undefined;
  readonly vectorIndex: LazyHandle<Closeable<VectorSearchClient>>;
  readonly relationalStore: LazyHandle<Closeable<DocumentLookup>>;
  readonly graphStore: LazyHandle<GraphStore> | undefined;
  readonly pipeline: PipelineOrchestrator;

  constructor(
    readonly config: RagConfig,
    backends: ServiceBackends = defaultBackends(config)
  ) {
    this.embedding = backends.embedding;
    this.generative = backends.generative;

    this.vectorIndex = new LazyHandle('vector index', backends.openVectorIndex, (index) => index.close());
    this.relationalStore = new LazyHandle('relational store', backends.openRelationalStore, (store) =>
      store.close()
    );
    const connectGraphStore = backends.connectGraphStore;
    this.graphStore = connectGraphStore
      ? new LazyHandle('graph store', connectGraphStore, (store) => store.close())
      : undefined;

    const graphStore = this.graphStore;
    const graph = new GraphContextBuilder(graphStore ? () => graphStore.get() : undefined, {
      maxEdges: config.graph.maxEdges,
      titlesPerTopic: config.graph.titlesPerTopic,
    });
    const synthesizer = new AnswerSynthesizer(backends.generative, {
      temperature: config.llm.temperature,
      maxOutputTokens: config.llm.maxOutputTokens,
      snippetChars: config.llm.snippetChars,
    });

    this.pipeline = new PipelineOrchestrator({
      embedding: this.embedding,
      getVectorIndex: () => this.vectorIndex.get(),
      getHydrator: async () => new RelationalHydrator(await this.relationalStore.get()),
      graph,
      synthesizer,
      defaultLimit: config.chat.defaultLimit,
    });
  }

  /**
   * Release every initialized handle. Errors are logged so one failing
   * backend does not keep the others open.
   */
  async close(): Promise<void> {
    const closers: Array<[string, () => Promise<void>]> = [
      ['embedding', () => this.embedding.close()],
      ['vector index', () => this.vectorIndex.close()],
      ['relational store', () => this.relationalStore.close()],
    ];
    const graphStore = this.graphStore;
    if (graphStore) {
      closers.push(['graph store', () => graphStore.close()]);
    }

    for (const [name, close] of closers) {
      try {
        await close();
      } catch (error) {
        console.error(
          `[ServiceContext] Failed to close ${name}: ${error instanceof Error ? error.message : String(error)}`
        );
      }
    }
  }
}
