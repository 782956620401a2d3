/**
 * Course RAG - library entry point
 *
 * The pipeline without the MCP server, for embedding in another process:
 *
 *   const ctx = new ServiceContext(loadRagConfig());
 *   const response = await ctx.pipeline.answer('What is a vector store?');
 *   await ctx.close();
 *
 * @module lib
 */

export * from './models/index.js';
export * from './services/embedding/index.js';
export * from './services/storage/index.js';
export * from './services/graph/index.js';
export * from './services/llm/index.js';
export * from './services/synthesis/index.js';
export * from './services/pipeline/index.js';

export {
  RagConfigSchema,
  loadRagConfig,
  MAX_CHUNK_LIMIT,
  type RagConfig,
  type RagConfigOverrides,
} from './server/config.js';
export { ServiceContext, defaultBackends, type ServiceBackends } from './server/context.js';
export {
  RagError,
  formatErrorResponse,
  getRecoveryHint,
  type ErrorCategory,
  type RecoveryHint,
} from './server/errors.js';
export { BackendError, type BackendResult, type BackendName } from './utils/result.js';
export { LazyHandle } from './utils/lazy.js';
