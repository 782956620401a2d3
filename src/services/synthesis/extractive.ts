/**
 * Extractive answer composition
 *
 * Pure functions of the hydrated chunks. Used on its own when no generative
 * backend is configured or the backend fails, and for the source listing of
 * every answer.
 *
 * @module services/synthesis/extractive
 */

import type { ContentChunk } from '../../models/chunk.js';

export const MAX_HIGHLIGHTS = 5;
export const MIN_HIGHLIGHT_LENGTH = 20;

export const PLACEHOLDER_HIGHLIGHT =
  'The retrieved materials cover the basic definitions and steps of this topic.';

export const CLOSING_NOTE =
  'If you need a step-by-step plan or want to dig into a specific step, ask a follow-up question and I will pick more materials.';

const SENTENCE_BREAK = /[.!?…]+/;
const EDGE_PUNCTUATION = /^[\s;:,\-]+|[\s;:,\-]+$/g;

/**
 * Up to five distinct sentences of at least 20 characters, in chunk order
 */
export function highlights(chunks: ContentChunk[]): string[] {
  const result: string[] = [];
  const seen = new Set<string>();

  for (const chunk of chunks) {
    for (const segment of chunk.content.split(SENTENCE_BREAK)) {
      const normalized = segment.replace(EDGE_PUNCTUATION, '');
      if (normalized.length < MIN_HIGHLIGHT_LENGTH) continue;

      const key = normalized.toLowerCase();
      if (seen.has(key)) continue;

      seen.add(key);
      result.push(normalized);
      if (result.length >= MAX_HIGHLIGHTS) {
        return result;
      }
    }
  }
  return result;
}

/**
 * `title · topic` with the topic omitted when absent
 */
export function chunkTitle(chunk: ContentChunk): string {
  return chunk.topic ? `${chunk.assignment_title} · ${chunk.topic}` : chunk.assignment_title;
}

/**
 * ` (source, chunk #k)`, ` (source)`, or empty when the chunk has no source
 */
export function chunkLocation(chunk: ContentChunk): string {
  if (!chunk.source) return '';
  return chunk.chunk_number === null
    ? ` (${chunk.source})`
    : ` (${chunk.source}, chunk #${chunk.chunk_number})`;
}

export function renderSourceEntry(chunk: ContentChunk, index: number): string {
  const quote = chunk.content
    .trim()
    .split('\n')
    .map((line) => `   > ${line}`.trimEnd());
  return [`${index}. **${chunkTitle(chunk)}**${chunkLocation(chunk)}`, ...quote].join('\n');
}

/**
 * Full Markdown answer. `body` replaces the key-points section when a
 * generative backend produced text.
 */
export function composeAnswer(question: string, chunks: ContentChunk[], body?: string): string {
  // One line, so a multi-line question cannot open sections of its own
  const heading = question.replace(/\s+/g, ' ').trim();
  const lines: string[] = [`### Answer to "${heading}"`, ''];

  if (body !== undefined) {
    lines.push(body);
  } else {
    const points = highlights(chunks);
    lines.push('#### Key points', '');
    if (points.length > 0) {
      lines.push(...points.map((point) => `- ${point}`));
    } else {
      lines.push(`- ${PLACEHOLDER_HIGHLIGHT}`);
    }
  }

  lines.push('', '#### Sources used', '');
  chunks.forEach((chunk, i) => lines.push(renderSourceEntry(chunk, i + 1)));

  lines.push('', '#### What next?', CLOSING_NOTE);
  return lines.join('\n');
}
