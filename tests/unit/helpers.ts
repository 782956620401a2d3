/**
 * Shared test helpers: in-process stand-ins for the backends.
 *
 * @module tests/unit/helpers
 */

import Database from 'better-sqlite3';
import * as sqliteVec from 'sqlite-vec';
import { readFileSync } from 'fs';
import type { Candidate, ContentChunk } from '../../src/models/chunk.js';
import { RagConfigSchema, type RagConfig } from '../../src/server/config.js';
import { ServiceContext, type ServiceBackends } from '../../src/server/context.js';
import { HashEmbeddingStrategy } from '../../src/services/embedding/fallback.js';
import type { GraphEdgeRow, GraphSession, GraphStore, TopicTitlesRow } from '../../src/services/graph/store.js';
import type { DocumentLookup, DocumentRecord } from '../../src/services/storage/relational.js';
import type { CollectionInfo, VectorSearchClient } from '../../src/services/storage/vector.js';

// ═══════════════════════════════════════════════════════════════════════════════
// IDS
// ═══════════════════════════════════════════════════════════════════════════════

export const DOC_A = '11111111-1111-4111-8111-111111111111';
export const DOC_B = '22222222-2222-4222-8222-222222222222';
export const DOC_C = '33333333-3333-4333-8333-333333333333';
export const DOC_D = '44444444-4444-4444-8444-444444444444';
export const DOC_E = '55555555-5555-4555-8555-555555555555';
export const ASSIGNMENT_1 = 'aaaaaaaa-aaaa-4aaa-8aaa-aaaaaaaaaaaa';
export const ASSIGNMENT_2 = 'bbbbbbbb-bbbb-4bbb-8bbb-bbbbbbbbbbbb';

// ═══════════════════════════════════════════════════════════════════════════════
// SQLITE-VEC AVAILABILITY CHECK
// ═══════════════════════════════════════════════════════════════════════════════

function checkSqliteVec(): boolean {
  try {
    const db = new Database(':memory:');
    try {
      sqliteVec.load(db);
    } finally {
      db.close();
    }
    return true;
  } catch {
    return false;
  }
}

export const sqliteVecAvailable = checkSqliteVec();

if (!sqliteVecAvailable) {
  console.warn('WARNING: sqlite-vec extension not available. Vector index tests will be skipped.');
}

// ═══════════════════════════════════════════════════════════════════════════════
// FACTORIES
// ═══════════════════════════════════════════════════════════════════════════════

export function makeCandidate(externalId: string | null, score: number, topic: string | null = null): Candidate {
  return { external_id: externalId, score, topic, source: null };
}

export function makeChunk(overrides: Partial<ContentChunk> = {}): ContentChunk {
  return {
    id: DOC_A,
    assignment_title: 'Intro to RAG',
    topic: 'rag-pipeline',
    source: 'lecture-01.md',
    chunk_number: 1,
    content: 'Retrieval augmented generation combines search with a language model.',
    score: 0.9,
    ...overrides,
  };
}

export function makeRecord(id: string, overrides: Partial<DocumentRecord> = {}): DocumentRecord {
  return {
    id,
    assignment_id: ASSIGNMENT_1,
    assignment_title: 'Intro to RAG',
    topic: 'rag-pipeline',
    source: 'lecture-01.md',
    chunk_number: 1,
    content: `Content of ${id} explains one step of the retrieval pipeline.`,
    ...overrides,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// RELATIONAL STORE
// ═══════════════════════════════════════════════════════════════════════════════

const RELATIONAL_SCHEMA = readFileSync(new URL('../fixtures/relational-schema.sql', import.meta.url), 'utf8');

export interface SeedAssignment {
  id: string;
  title: string;
  topic: string | null;
}

export interface SeedDocument {
  id: string;
  assignment_id: string;
  source: string | null;
  chunk_number: number | null;
  content: string;
}

/**
 * In-memory relational database with the assignments/documents schema
 */
export function createRelationalDb(assignments: SeedAssignment[] = [], documents: SeedDocument[] = []): Database.Database {
  const db = new Database(':memory:');
  db.exec(RELATIONAL_SCHEMA);
  const insertAssignment = db.prepare('INSERT INTO assignments (id, title, topic) VALUES (?, ?, ?)');
  const insertDocument = db.prepare(
    'INSERT INTO documents (id, assignment_id, source, chunk_number, content) VALUES (?, ?, ?, ?, ?)'
  );
  for (const a of assignments) insertAssignment.run(a.id, a.title, a.topic);
  for (const d of documents) insertDocument.run(d.id, d.assignment_id, d.source, d.chunk_number, d.content);
  return db;
}

/**
 * DocumentLookup over a fixed set of records
 */
export class FakeDocumentLookup implements DocumentLookup {
  readonly calls: string[][] = [];
  private readonly records: Map<string, DocumentRecord>;

  constructor(records: DocumentRecord[]) {
    this.records = new Map(records.map((r) => [r.id, r]));
  }

  async fetchDocuments(ids: string[]): Promise<Map<string, DocumentRecord>> {
    this.calls.push([...ids]);
    const found = new Map<string, DocumentRecord>();
    for (const id of ids) {
      const record = this.records.get(id);
      if (record) found.set(id, record);
    }
    return found;
  }

  close(): void {}
}

// ═══════════════════════════════════════════════════════════════════════════════
// VECTOR INDEX
// ═══════════════════════════════════════════════════════════════════════════════

export class FakeVectorClient implements VectorSearchClient {
  readonly calls: Array<{ vector: number[]; limit: number }> = [];
  closed = false;

  constructor(
    private readonly candidates: Candidate[],
    private readonly info: CollectionInfo = { collection: 'course_materials', dimension: 4, pointCount: candidates.length }
  ) {}

  async search(vector: number[], limit: number): Promise<Candidate[]> {
    this.calls.push({ vector, limit });
    return this.candidates.slice(0, limit);
  }

  async describe(): Promise<CollectionInfo> {
    return this.info;
  }

  close(): void {
    this.closed = true;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// GRAPH STORE
// ═══════════════════════════════════════════════════════════════════════════════

export interface FakeGraphData {
  edges?: Array<[string, string]>;
  labels?: Record<string, string>;
  titles?: Record<string, string[]>;
  failWith?: Error;
}

export class FakeGraphStore implements GraphStore {
  sessionsOpened = 0;
  sessionsClosed = 0;
  closed = false;

  constructor(private readonly data: FakeGraphData = {}) {}

  async withSession<T>(fn: (session: GraphSession) => Promise<T>): Promise<T> {
    this.sessionsOpened++;
    try {
      if (this.data.failWith) {
        throw this.data.failWith;
      }
      return await fn({
        relatedEdges: async (topics, maxEdges) => this.relatedEdges(topics, maxEdges),
        assignmentTitles: async (topicIds, perTopic) => this.assignmentTitles(topicIds, perTopic),
      });
    } finally {
      this.sessionsClosed++;
    }
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private label(id: string): string {
    return this.data.labels?.[id] ?? id;
  }

  private relatedEdges(topics: string[], maxEdges: number): GraphEdgeRow[] {
    return (this.data.edges ?? [])
      .filter(([source]) => topics.includes(source))
      .slice(0, maxEdges)
      .map(([source, target]) => ({
        source_id: source,
        source_label: this.label(source),
        target_id: target,
        target_label: this.label(target),
      }));
  }

  private assignmentTitles(topicIds: string[], perTopic: number): TopicTitlesRow[] {
    return topicIds.map((id) => ({
      topic_id: id,
      label: this.label(id),
      titles: (this.data.titles?.[id] ?? []).slice(0, perTopic),
    }));
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVICE CONTEXT
// ═══════════════════════════════════════════════════════════════════════════════

export interface TestContextOptions {
  config?: unknown;
  candidates?: Candidate[];
  records?: DocumentRecord[];
  graph?: FakeGraphData;
  backends?: Partial<ServiceBackends>;
}

export interface TestContext {
  ctx: ServiceContext;
  config: RagConfig;
  vector: FakeVectorClient;
  lookup: FakeDocumentLookup;
  graphStore: FakeGraphStore | undefined;
}

/**
 * ServiceContext over in-process backends. The embedding dimension defaults
 * to 4 to match FakeVectorClient.
 */
export function createTestContext(options: TestContextOptions = {}): TestContext {
  const config = RagConfigSchema.parse(options.config ?? { embedding: { dimension: 4 } });
  const vector = new FakeVectorClient(options.candidates ?? []);
  const lookup = new FakeDocumentLookup(options.records ?? []);
  const graphData = options.graph;
  const graphStore = graphData ? new FakeGraphStore(graphData) : undefined;

  const ctx = new ServiceContext(config, {
    embedding: new HashEmbeddingStrategy(config.embedding.dimension),
    openVectorIndex: () => vector,
    openRelationalStore: () => lookup,
    connectGraphStore: graphStore ? () => graphStore : undefined,
    ...options.backends,
  });
  return { ctx, config, vector, lookup, graphStore };
}
