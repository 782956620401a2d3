/**
 * RelationalStore - read-only access to assignments and documents
 *
 * Tables (provisioned by ingestion):
 *   assignments(id, title, description, topic, created_at)
 *   documents(id, assignment_id, source, chunk_number, content, created_at)
 *
 * @module services/storage/relational
 */

import Database from 'better-sqlite3';

export enum RelationalStoreErrorCode {
  DATABASE_OPEN_FAILED = 'DATABASE_OPEN_FAILED',
  QUERY_FAILED = 'QUERY_FAILED',
}

export class RelationalStoreError extends Error {
  constructor(
    message: string,
    public readonly code: RelationalStoreErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'RelationalStoreError';
  }
}

/**
 * One content record joined with its grouping record
 */
export interface DocumentRecord {
  id: string;
  assignment_id: string;
  assignment_title: string;
  topic: string | null;
  source: string | null;
  chunk_number: number | null;
  content: string;
}

export interface DocumentLookup {
  /** Records keyed by document id; ids with no row are absent from the map */
  fetchDocuments(ids: string[]): Promise<Map<string, DocumentRecord>>;
}

export class RelationalStore implements DocumentLookup {
  constructor(private readonly db: Database.Database) {}

  /**
   * Open the relational database read-only
   * @throws RelationalStoreError if the file is missing or cannot be opened
   */
  static open(databasePath: string): RelationalStore {
    try {
      return new RelationalStore(new Database(databasePath, { readonly: true, fileMustExist: true }));
    } catch (error) {
      throw new RelationalStoreError(
        `Failed to open relational database at ${databasePath}: ${String(error)}`,
        RelationalStoreErrorCode.DATABASE_OPEN_FAILED,
        { databasePath }
      );
    }
  }

  /**
   * Run fn inside a deferred read transaction.
   * COMMIT on return, ROLLBACK when fn throws.
   */
  withReadSession<T>(fn: (db: Database.Database) => T): T {
    const session = this.db.transaction(() => fn(this.db));
    return session.deferred();
  }

  async fetchDocuments(ids: string[]): Promise<Map<string, DocumentRecord>> {
    const records = new Map<string, DocumentRecord>();
    if (ids.length === 0) {
      return records;
    }

    const placeholders = ids.map(() => '?').join(', ');
    let rows: DocumentRecord[];
    try {
      rows = this.withReadSession((db) =>
        db
          .prepare<string[], DocumentRecord>(
            `
            SELECT
              d.id,
              d.assignment_id,
              a.title AS assignment_title,
              a.topic,
              d.source,
              d.chunk_number,
              d.content
            FROM documents d
            JOIN assignments a ON d.assignment_id = a.id
            WHERE lower(d.id) IN (${placeholders})
          `
          )
          .all(...ids)
      );
    } catch (error) {
      throw new RelationalStoreError('Document lookup failed', RelationalStoreErrorCode.QUERY_FAILED, {
        count: ids.length,
        error: String(error),
      });
    }

    for (const row of rows) {
      records.set(row.id.toLowerCase(), row);
    }
    return records;
  }

  close(): void {
    this.db.close();
  }
}
