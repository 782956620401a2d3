/**
 * Ollama chat client
 *
 * Connects to a locally running Ollama instance, no API key required:
 *   ollama serve
 *   ollama pull llama3.1
 *
 * Every call is attempted once. The circuit breaker skips a dead server
 * instead of retrying it.
 *
 * @module services/llm/ollama
 */

import { z } from 'zod';
import type { RagConfig } from '../../server/config.js';
import { attempt, type BackendResult } from '../../utils/result.js';
import { CircuitBreaker, CircuitBreakerOpenError } from './circuit-breaker.js';
import type { ChatMessage, GenerationOptions, GenerativeBackend } from './types.js';

// Re-export error type for callers
export { CircuitBreakerOpenError };

/**
 * Ollama /api/chat response shape (non-streaming)
 */
const OllamaChatResponse = z.object({
  model: z.string().optional(),
  message: z.object({
    role: z.string(),
    content: z.string(),
  }),
  done: z.boolean().optional(),
  eval_count: z.number().optional(),
  prompt_eval_count: z.number().optional(),
});

export type OllamaClientConfig = Pick<
  RagConfig['llm'],
  'baseUrl' | 'model' | 'timeoutMs' | 'circuitBreaker'
>;

export class OllamaChatClient implements GenerativeBackend {
  readonly name = 'ollama';
  private readonly circuitBreaker: CircuitBreaker;

  constructor(private readonly config: OllamaClientConfig) {
    this.circuitBreaker = new CircuitBreaker({
      failureThreshold: config.circuitBreaker.failureThreshold,
      recoveryTimeMs: config.circuitBreaker.recoveryTimeMs,
    });
  }

  generate(messages: ChatMessage[], options: GenerationOptions): Promise<BackendResult<string>> {
    return attempt('generation', () =>
      this.circuitBreaker.execute(() => this.callOllamaChat(messages, options))
    );
  }

  getCircuitBreakerStatus(): ReturnType<CircuitBreaker['getStatus']> {
    return this.circuitBreaker.getStatus();
  }

  /**
   * Call Ollama /api/chat
   *
   * @throws Error on timeout, non-2xx status, malformed body or empty text
   */
  private async callOllamaChat(messages: ChatMessage[], options: GenerationOptions): Promise<string> {
    const url = `${this.config.baseUrl.replace(/\/+$/, '')}/api/chat`;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeoutMs);

    let rawResponse: Response;
    let body: unknown;
    try {
      rawResponse = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: this.config.model,
          messages,
          stream: false,
          options: {
            temperature: options.temperature,
            num_predict: options.maxOutputTokens,
          },
        }),
        signal: controller.signal,
      });

      if (!rawResponse.ok) {
        const text = await rawResponse.text().catch(() => '');
        throw new Error(
          `Ollama API error ${rawResponse.status}: ${rawResponse.statusText}. ${text.slice(0, 200)}`
        );
      }

      body = await rawResponse.json();
    } finally {
      clearTimeout(timeoutId);
    }

    const parsed = OllamaChatResponse.safeParse(body);
    if (!parsed.success) {
      throw new Error(`Ollama returned a malformed chat response: ${parsed.error.message}`);
    }

    const text = parsed.data.message.content.trim();
    if (text.length === 0) {
      throw new Error('Ollama returned an empty message');
    }

    console.error(
      `[OllamaClient] ${this.config.model}: ${parsed.data.prompt_eval_count ?? 0} prompt tokens, ${parsed.data.eval_count ?? 0} output tokens`
    );
    return text;
  }
}

/**
 * Resolve LLM_BACKEND once into a backend object, or undefined for 'none'
 */
export function resolveGenerativeBackend(config: RagConfig['llm']): GenerativeBackend | undefined {
  switch (config.backend) {
    case 'ollama':
      return new OllamaChatClient(config);
    case 'none':
      return undefined;
  }
}
