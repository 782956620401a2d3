/**
 * Course RAG - Data Models
 *
 * Barrel export for all model interfaces.
 */

export * from './chunk.js';
export * from './graph.js';
export * from './chat.js';
