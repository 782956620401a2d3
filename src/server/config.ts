/**
 * Course RAG Configuration
 *
 * One zod schema for every backend the pipeline talks to. Optional backends
 * (embedding model, graph store, generative model) are switched off by default,
 * so a bare checkout answers questions with the deterministic embedding and the
 * extractive synthesizer.
 *
 * @module server/config
 */

import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';

/** Default location of the SQLite files shared by the vector index and the relational store */
export const DEFAULT_DATABASE_PATH = join(homedir(), '.course-rag', 'course.db');

export const EMBEDDING_STRATEGIES = ['fallback', 'model'] as const;
export type EmbeddingStrategyKind = (typeof EMBEDDING_STRATEGIES)[number];

export const LLM_BACKENDS = ['none', 'ollama'] as const;
export type LlmBackendKind = (typeof LLM_BACKENDS)[number];

/** Upper bound for the number of context chunks per answer */
export const MAX_CHUNK_LIMIT = 8;

export const RagConfigSchema = z.object({
  embedding: z
    .object({
      strategy: z.enum(EMBEDDING_STRATEGIES).default('fallback'),
      dimension: z.number().int().positive().default(384),
      // sentence-transformers model id loaded by python/embedding_worker.py
      model: z.string().default('sentence-transformers/all-MiniLM-L6-v2'),
      pythonPath: z.string().optional(),
      timeoutMs: z.number().int().positive().default(30_000),
    })
    .default({}),

  vector: z
    .object({
      databasePath: z.string().default(DEFAULT_DATABASE_PATH),
      collection: z
        .string()
        .regex(/^[A-Za-z0-9_]+$/, 'Collection name may only contain letters, digits and underscores')
        .default('course_materials'),
      // 0 disables the threshold
      scoreThreshold: z.number().min(0).max(1).default(0),
    })
    .default({}),

  relational: z
    .object({
      databasePath: z.string().default(DEFAULT_DATABASE_PATH),
    })
    .default({}),

  graph: z
    .object({
      // Graph enrichment is disabled when no URI is configured
      uri: z.string().optional(),
      user: z.string().default('neo4j'),
      password: z.string().default(''),
      database: z.string().optional(),
      maxEdges: z.number().int().positive().default(40),
      titlesPerTopic: z.number().int().positive().default(3),
    })
    .default({}),

  llm: z
    .object({
      backend: z.enum(LLM_BACKENDS).default('none'),
      baseUrl: z.string().default('http://localhost:11434'),
      model: z.string().default('llama3.1'),
      temperature: z.number().min(0).max(2).default(0.2),
      maxOutputTokens: z.number().int().positive().default(512),
      timeoutMs: z.number().int().positive().default(60_000),
      snippetChars: z.number().int().positive().default(600),
      circuitBreaker: z
        .object({
          failureThreshold: z.number().default(5),
          recoveryTimeMs: z.number().default(60_000),
        })
        .default({}),
    })
    .default({}),

  chat: z
    .object({
      defaultLimit: z.number().int().min(1).max(MAX_CHUNK_LIMIT).default(6),
    })
    .default({}),
});

export type RagConfig = z.infer<typeof RagConfigSchema>;

/** Partial overrides accepted by loadRagConfig, one level deep per section */
export type RagConfigOverrides = {
  [K in keyof RagConfig]?: Partial<RagConfig[K]>;
};

function readEnv(name: string): string | undefined {
  const raw = process.env[name];
  return raw === undefined || raw.trim() === '' ? undefined : raw.trim();
}

export function parseIntEnv(name: string): number | undefined {
  const raw = readEnv(name);
  if (raw === undefined) return undefined;
  const parsed = Number.parseInt(raw, 10);
  if (Number.isNaN(parsed)) {
    throw new Error(`Invalid numeric env var ${name}: "${raw}"`);
  }
  return parsed;
}

export function parseFloatEnv(name: string): number | undefined {
  const raw = readEnv(name);
  if (raw === undefined) return undefined;
  const parsed = Number.parseFloat(raw);
  if (Number.isNaN(parsed)) {
    throw new Error(`Invalid numeric env var ${name}: "${raw}"`);
  }
  return parsed;
}

/** Drop undefined entries so zod defaults apply */
function defined(section: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(section).filter(([, value]) => value !== undefined));
}

/**
 * Load configuration from environment variables, then apply overrides.
 *
 * Environment variables:
 *   EMBEDDING_STRATEGY     - fallback | model (default: fallback)
 *   EMBEDDING_DIM          - vector dimension of the collection (default: 384)
 *   EMBEDDING_MODEL        - sentence-transformers model id
 *   EMBEDDING_PYTHON_PATH  - python interpreter for the embedding worker
 *   EMBEDDING_TIMEOUT_MS   - per-request worker timeout (default: 30000)
 *   VECTOR_DB_PATH         - SQLite file holding the sqlite-vec collection
 *   VECTOR_COLLECTION      - collection name (default: course_materials)
 *   VECTOR_SCORE_THRESHOLD - minimum cosine similarity, 0 disables (default: 0)
 *   RELATIONAL_DB_PATH     - SQLite file holding assignments/documents
 *   NEO4J_URI, NEO4J_USER, NEO4J_PASSWORD, NEO4J_DATABASE
 *   LLM_BACKEND            - none | ollama (default: none)
 *   OLLAMA_BASE_URL, OLLAMA_MODEL
 *   LLM_TEMPERATURE, LLM_MAX_OUTPUT_TOKENS, LLM_TIMEOUT_MS, LLM_SNIPPET_CHARS
 *   CHAT_CHUNK_LIMIT       - default number of context chunks (default: 6)
 */
export function loadRagConfig(overrides: RagConfigOverrides = {}): RagConfig {
  const sharedDbPath = readEnv('COURSE_RAG_DB_PATH');

  const envConfig = {
    embedding: defined({
      strategy: readEnv('EMBEDDING_STRATEGY'),
      dimension: parseIntEnv('EMBEDDING_DIM'),
      model: readEnv('EMBEDDING_MODEL'),
      pythonPath: readEnv('EMBEDDING_PYTHON_PATH'),
      timeoutMs: parseIntEnv('EMBEDDING_TIMEOUT_MS'),
    }),
    vector: defined({
      databasePath: readEnv('VECTOR_DB_PATH') ?? sharedDbPath,
      collection: readEnv('VECTOR_COLLECTION'),
      scoreThreshold: parseFloatEnv('VECTOR_SCORE_THRESHOLD'),
    }),
    relational: defined({
      databasePath: readEnv('RELATIONAL_DB_PATH') ?? sharedDbPath,
    }),
    graph: defined({
      uri: readEnv('NEO4J_URI'),
      user: readEnv('NEO4J_USER'),
      password: readEnv('NEO4J_PASSWORD'),
      database: readEnv('NEO4J_DATABASE'),
    }),
    llm: defined({
      backend: readEnv('LLM_BACKEND'),
      baseUrl: readEnv('OLLAMA_BASE_URL'),
      model: readEnv('OLLAMA_MODEL'),
      temperature: parseFloatEnv('LLM_TEMPERATURE'),
      maxOutputTokens: parseIntEnv('LLM_MAX_OUTPUT_TOKENS'),
      timeoutMs: parseIntEnv('LLM_TIMEOUT_MS'),
      snippetChars: parseIntEnv('LLM_SNIPPET_CHARS'),
    }),
    chat: defined({
      defaultLimit: parseIntEnv('CHAT_CHUNK_LIMIT'),
    }),
  };

  return RagConfigSchema.parse({
    embedding: { ...envConfig.embedding, ...overrides.embedding },
    vector: { ...envConfig.vector, ...overrides.vector },
    relational: { ...envConfig.relational, ...overrides.relational },
    graph: { ...envConfig.graph, ...overrides.graph },
    llm: { ...envConfig.llm, ...overrides.llm },
    chat: { ...envConfig.chat, ...overrides.chat },
  });
}
