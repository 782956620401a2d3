/**
 * Prompts for the generative tier
 *
 * One fixed system instruction and one worked example precede the live
 * question, so small local models keep the expected shape.
 *
 * @module services/synthesis/prompts
 */

import type { ContentChunk } from '../../models/chunk.js';
import type { ChatMessage } from '../llm/types.js';
import { chunkLocation, chunkTitle } from './extractive.js';

export const SYSTEM_INSTRUCTION = `You are a teaching assistant for a course. Answer the student's question using only the numbered context fragments.
Rules:
- Write 3 to 6 short Markdown bullet points, most important first.
- Cite fragments by number in square brackets, e.g. [1] or [2][3].
- If the fragments do not answer the question, say so in one bullet and suggest what to ask instead.
- Do not add headings; the caller adds them.`;

const EXAMPLE_QUESTION = 'What does a vector store do in a RAG pipeline?';

const EXAMPLE_CONTEXT = `[1] Intro to retrieval · rag-pipeline (lecture-03.md, chunk #2)
A vector store keeps an embedding for every chunk of the course materials and returns the chunks closest to the question embedding.

[2] Embeddings lab · embeddings (lab-02.md, chunk #1)
Cosine similarity compares the direction of two vectors, so chunks about the same idea score close to 1.`;

const EXAMPLE_ANSWER = `- The vector store holds one embedding per chunk of course material [1].
- At question time it returns the chunks whose embeddings are closest to the question's embedding [1].
- Closeness is usually measured with cosine similarity, where related chunks score near 1 [2].`;

/**
 * Trim to `maxChars`, marking the cut with an ellipsis
 */
export function snippet(content: string, maxChars: number): string {
  const text = content.trim();
  return text.length <= maxChars ? text : `${text.slice(0, maxChars).trimEnd()}…`;
}

export function buildContextBlock(chunks: ContentChunk[], snippetChars: number): string {
  return chunks
    .map(
      (chunk, i) =>
        `[${i + 1}] ${chunkTitle(chunk)}${chunkLocation(chunk)}\n${snippet(chunk.content, snippetChars)}`
    )
    .join('\n\n');
}

function userMessage(question: string, context: string): string {
  return `Question: ${question}\n\nContext:\n${context}`;
}

export function buildMessages(
  question: string,
  chunks: ContentChunk[],
  snippetChars: number
): ChatMessage[] {
  return [
    { role: 'system', content: SYSTEM_INSTRUCTION },
    { role: 'user', content: userMessage(EXAMPLE_QUESTION, EXAMPLE_CONTEXT) },
    { role: 'assistant', content: EXAMPLE_ANSWER },
    { role: 'user', content: userMessage(question, buildContextBlock(chunks, snippetChars)) },
  ];
}
