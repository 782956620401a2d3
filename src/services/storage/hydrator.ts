/**
 * Relational Hydrator
 *
 * Resolves vector-search candidates into content chunks. Output order is a
 * sub-order of candidate order; candidates with a malformed id or no stored
 * record are dropped.
 *
 * @module services/storage/hydrator
 */

import { validate as isUuid } from 'uuid';
import type { Candidate, ContentChunk } from '../../models/chunk.js';
import type { DocumentLookup } from './relational.js';

/**
 * Lower-cased document id, or null when the payload id is missing or not a UUID
 */
export function normalizeDocumentId(externalId: string | null): string | null {
  if (externalId === null) {
    return null;
  }
  const trimmed = externalId.trim();
  return isUuid(trimmed) ? trimmed.toLowerCase() : null;
}

export class RelationalHydrator {
  constructor(private readonly store: DocumentLookup) {}

  async hydrate(candidates: Candidate[], limit: number): Promise<ContentChunk[]> {
    const ids = new Set<string>();
    for (const candidate of candidates) {
      const id = normalizeDocumentId(candidate.external_id);
      if (id !== null) {
        ids.add(id);
      }
    }
    if (ids.size === 0) {
      return [];
    }

    const records = await this.store.fetchDocuments([...ids]);

    const chunks: ContentChunk[] = [];
    for (const candidate of candidates) {
      if (chunks.length >= limit) {
        break;
      }
      const id = normalizeDocumentId(candidate.external_id);
      const record = id === null ? undefined : records.get(id);
      if (id === null || !record) {
        continue;
      }
      chunks.push({
        id,
        assignment_title: record.assignment_title,
        topic: record.topic,
        source: record.source,
        chunk_number: record.chunk_number,
        content: record.content,
        score: candidate.score,
      });
    }
    return chunks;
  }
}
