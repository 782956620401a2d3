/**
 * Storage Service Module
 *
 * Read-only access to the vector index and the relational store, and the
 * hydrator that joins the two.
 */

export {
  SqliteVecIndex,
  VectorError,
  VectorErrorCode,
  loadVecExtension,
  type VectorSearchClient,
  type CollectionInfo,
  type VectorIndexOptions,
} from './vector.js';

export {
  RelationalStore,
  RelationalStoreError,
  RelationalStoreErrorCode,
  type DocumentLookup,
  type DocumentRecord,
} from './relational.js';

export { RelationalHydrator, normalizeDocumentId } from './hydrator.js';
