/**
 * Answer Synthesizer
 *
 * Generative tier when a backend is configured, extractive tier otherwise or
 * on any generative failure. synthesize() never rejects.
 *
 * @module services/synthesis/synthesizer
 */

import type { ContentChunk } from '../../models/chunk.js';
import { OneShotLog } from '../../utils/log-once.js';
import { attempt, flatten } from '../../utils/result.js';
import type { GenerativeBackend } from '../llm/types.js';
import { composeAnswer } from './extractive.js';
import { buildMessages } from './prompts.js';

export interface SynthesizerOptions {
  temperature: number;
  maxOutputTokens: number;
  snippetChars: number;
}

export type SynthesisTier = 'generative' | 'extractive';

export interface Synthesis {
  answer: string;
  tier: SynthesisTier;
}

export class AnswerSynthesizer {
  private readonly warnings = new OneShotLog();

  constructor(
    private readonly backend: GenerativeBackend | undefined,
    private readonly options: SynthesizerOptions
  ) {}

  async synthesize(question: string, chunks: ContentChunk[]): Promise<string> {
    return (await this.synthesizeWithTier(question, chunks)).answer;
  }

  /**
   * Same as synthesize(), also reporting which tier produced the answer
   */
  async synthesizeWithTier(question: string, chunks: ContentChunk[]): Promise<Synthesis> {
    const backend = this.backend;
    if (backend && chunks.length > 0) {
      // A backend that rejects instead of returning a failed result is treated the same way
      const result = flatten(
        await attempt('generation', () =>
          backend.generate(buildMessages(question, chunks, this.options.snippetChars), {
            temperature: this.options.temperature,
            maxOutputTokens: this.options.maxOutputTokens,
          })
        )
      );
      if (result.ok) {
        return { answer: composeAnswer(question, chunks, result.value), tier: 'generative' };
      }
      this.warnings.warn(
        backend.name,
        `[Synthesizer] ${backend.name} generation failed, using extractive answers: ${result.error.message}`
      );
    }
    return { answer: composeAnswer(question, chunks), tier: 'extractive' };
  }
}
