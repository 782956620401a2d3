/**
 * SqliteVecIndex - sqlite-vec nearest-neighbour search over one collection
 *
 * A collection named `course_materials` is two tables:
 *   vec_course_materials      vec0 virtual table (point_id TEXT PRIMARY KEY, vector FLOAT[dim])
 *   course_materials_payloads (point_id, document_id, assignment_id, topic, source, chunk_number)
 *
 * Both are provisioned by ingestion. This module only reads them.
 *
 * Uses vec_distance_cosine() for all similarity calculations; score = 1 - distance.
 *
 * @module services/storage/vector
 */

import Database from 'better-sqlite3';
import * as sqliteVec from 'sqlite-vec';
import type { Candidate } from '../../models/chunk.js';

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR HANDLING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Error codes for vector operations
 */
export enum VectorErrorCode {
  DATABASE_OPEN_FAILED = 'DATABASE_OPEN_FAILED',
  VEC_EXTENSION_NOT_LOADED = 'VEC_EXTENSION_NOT_LOADED',
  COLLECTION_NOT_FOUND = 'COLLECTION_NOT_FOUND',
  DIMENSION_MISMATCH = 'DIMENSION_MISMATCH',
  SEARCH_FAILED = 'SEARCH_FAILED',
}

/**
 * Custom error class for vector operations
 * Includes error code and optional details for debugging
 */
export class VectorError extends Error {
  constructor(
    message: string,
    public readonly code: VectorErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'VectorError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// INTERFACES
// ═══════════════════════════════════════════════════════════════════════════════

export interface VectorSearchClient {
  /** At most `limit` candidates in descending score order; [] when nothing matches */
  search(vector: number[], limit: number): Promise<Candidate[]>;
  describe(): Promise<CollectionInfo>;
}

export interface CollectionInfo {
  collection: string;
  dimension: number;
  pointCount: number;
}

export interface VectorIndexOptions {
  collection: string;
  /** Minimum similarity 0-1. 0 disables the threshold */
  scoreThreshold?: number;
}

interface SearchRow {
  point_id: string;
  document_id: string | null;
  topic: string | null;
  source: string | null;
  distance: number;
}

const DIMENSION_PATTERN = /float\[(\d+)\]/i;

// ═══════════════════════════════════════════════════════════════════════════════
// SQLITE-VEC INDEX
// ═══════════════════════════════════════════════════════════════════════════════

export class SqliteVecIndex implements VectorSearchClient {
  private readonly collection: string;
  private readonly vectorTable: string;
  private readonly payloadTable: string;
  private readonly scoreThreshold: number;
  private dimension: number | null = null;

  /**
   * @param db - connection with sqlite-vec already loaded (see loadVecExtension)
   */
  constructor(
    private readonly db: Database.Database,
    options: VectorIndexOptions
  ) {
    if (!/^[A-Za-z0-9_]+$/.test(options.collection)) {
      throw new VectorError(
        `Invalid collection name "${options.collection}"`,
        VectorErrorCode.COLLECTION_NOT_FOUND,
        { collection: options.collection }
      );
    }
    this.collection = options.collection;
    this.vectorTable = `vec_${options.collection}`;
    this.payloadTable = `${options.collection}_payloads`;
    this.scoreThreshold = Math.max(0, Math.min(1, options.scoreThreshold ?? 0));
  }

  /**
   * Open the vector database read-only and load sqlite-vec
   * @throws VectorError if the file is missing or the extension cannot load
   */
  static open(databasePath: string, options: VectorIndexOptions): SqliteVecIndex {
    let db: Database.Database;
    try {
      db = new Database(databasePath, { readonly: true, fileMustExist: true });
    } catch (error) {
      throw new VectorError(
        `Failed to open vector database at ${databasePath}: ${String(error)}`,
        VectorErrorCode.DATABASE_OPEN_FAILED,
        { databasePath }
      );
    }

    try {
      loadVecExtension(db);
    } catch (error) {
      db.close();
      throw error;
    }
    return new SqliteVecIndex(db, options);
  }

  /**
   * Dimension and point count of the collection
   * @throws VectorError COLLECTION_NOT_FOUND when the vec0 table is missing
   */
  async describe(): Promise<CollectionInfo> {
    const dimension = this.getDimension();
    const row = this.db
      .prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM ${this.vectorTable}`)
      .get();
    return {
      collection: this.collection,
      dimension,
      pointCount: row?.count ?? 0,
    };
  }

  /**
   * Nearest neighbours by cosine distance
   *
   * @throws VectorError DIMENSION_MISMATCH when the query length differs from the collection
   */
  async search(vector: number[], limit: number): Promise<Candidate[]> {
    const dimension = this.getDimension();
    if (vector.length !== dimension) {
      throw new VectorError(
        `Query vector has ${vector.length} dimensions, collection "${this.collection}" has ${dimension}`,
        VectorErrorCode.DIMENSION_MISMATCH,
        { actualDimensions: vector.length, expectedDimensions: dimension }
      );
    }
    if (limit < 1) {
      return [];
    }

    // Convert to Float32 bytes for sqlite-vec
    const queryBuffer = Buffer.from(new Float32Array(vector).buffer);
    // Cosine distance = 1 - cosine_similarity
    const maxDistance = 1 - this.scoreThreshold;

    let rows: SearchRow[];
    try {
      rows = this.db
        .prepare<[Buffer, number], SearchRow>(
          `
          SELECT
            v.point_id,
            p.document_id,
            p.topic,
            p.source,
            vec_distance_cosine(v.vector, ?) AS distance
          FROM ${this.vectorTable} v
          LEFT JOIN ${this.payloadTable} p ON p.point_id = v.point_id
          ORDER BY distance ASC
          LIMIT ?
        `
        )
        .all(queryBuffer, limit);
    } catch (error) {
      throw new VectorError('Vector search failed', VectorErrorCode.SEARCH_FAILED, {
        collection: this.collection,
        error: String(error),
      });
    }

    return rows
      .filter((row) => this.scoreThreshold === 0 || row.distance <= maxDistance)
      .map((row) => ({
        external_id: row.document_id,
        score: 1 - row.distance,
        topic: row.topic,
        source: row.source,
      }));
  }

  close(): void {
    this.db.close();
  }

  private getDimension(): number {
    if (this.dimension !== null) {
      return this.dimension;
    }
    const row = this.db
      .prepare<[string], { sql: string | null }>(
        `SELECT sql FROM sqlite_master WHERE name = ? AND type = 'table'`
      )
      .get(this.vectorTable);
    if (!row) {
      throw new VectorError(
        `Collection "${this.collection}" not found (missing table ${this.vectorTable})`,
        VectorErrorCode.COLLECTION_NOT_FOUND,
        { collection: this.collection }
      );
    }
    const match = DIMENSION_PATTERN.exec(row.sql ?? '');
    if (!match) {
      throw new VectorError(
        `Could not read the vector dimension of ${this.vectorTable}`,
        VectorErrorCode.COLLECTION_NOT_FOUND,
        { collection: this.collection, sql: row.sql }
      );
    }
    this.dimension = Number.parseInt(match[1], 10);
    return this.dimension;
  }
}

/**
 * Load sqlite-vec into a connection
 * FAIL FAST if not available - no workarounds
 */
export function loadVecExtension(db: Database.Database): void {
  try {
    sqliteVec.load(db);
  } catch (error) {
    throw new VectorError(
      'sqlite-vec extension failed to load. Install: npm install sqlite-vec',
      VectorErrorCode.VEC_EXTENSION_NOT_LOADED,
      { error: String(error) }
    );
  }
}
