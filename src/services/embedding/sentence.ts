/**
 * SentenceEmbeddingStrategy - TypeScript bridge to python/embedding_worker.py
 *
 * The worker is a long-lived sentence-transformers process speaking
 * line-delimited JSON over stdio:
 *
 *   worker -> {"ready": true, "dimension": 384, "model": "..."}
 *   client -> {"id": 1, "text": "..."}
 *   worker -> {"id": 1, "embedding": [...]}   or   {"id": 1, "error": "..."}
 *
 * It is started on the first embed() call and reused afterwards. Failures are
 * returned as BackendResult errors; the caller chooses the fallback.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 *
 * @module services/embedding/sentence
 */

import { PythonShell, type Options as PythonShellOptions } from 'python-shell';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { LazyHandle } from '../../utils/lazy.js';
import { OneShotLog } from '../../utils/log-once.js';
import { attempt, type BackendResult } from '../../utils/result.js';
import { EmbeddingError, type EmbeddingStrategy } from './types.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const DEFAULT_WORKER_PATH = path.resolve(__dirname, '../../../python/embedding_worker.py');

/** Max stderr accumulation: 10KB */
const MAX_STDERR_LENGTH = 10_240;

const ReadyMessage = z.object({
  ready: z.boolean(),
  dimension: z.number().int().positive().optional(),
  model: z.string().optional(),
  error: z.string().optional(),
});

const ResponseMessage = z.object({
  id: z.number().int(),
  embedding: z.array(z.number()).optional(),
  error: z.string().optional(),
});

export interface SentenceEmbeddingOptions {
  model: string;
  dimension: number;
  timeoutMs: number;
  pythonPath?: string;
  workerPath?: string;
}

interface PendingRequest {
  resolve: (vector: number[]) => void;
  reject: (error: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

// ═══════════════════════════════════════════════════════════════════════════════
// WORKER PROCESS
// ═══════════════════════════════════════════════════════════════════════════════

export class EmbeddingWorker {
  private readonly pending = new Map<number, PendingRequest>();
  private nextId = 1;
  private stderr = '';
  private exited = false;
  private nativeDimension: number | undefined;

  private constructor(
    private readonly shell: PythonShell,
    private readonly timeoutMs: number
  ) {}

  /**
   * Spawn the worker and wait for its ready message.
   *
   * @throws EmbeddingError WORKER_START_FAILED when the model cannot load or the
   * process exits before reporting ready
   */
  static start(options: SentenceEmbeddingOptions): Promise<EmbeddingWorker> {
    const shellOptions: PythonShellOptions = {
      mode: 'json',
      pythonPath: options.pythonPath,
      pythonOptions: ['-u'],
      args: ['--model', options.model],
    };
    const shell = new PythonShell(options.workerPath ?? DEFAULT_WORKER_PATH, shellOptions);
    const worker = new EmbeddingWorker(shell, options.timeoutMs);

    return new Promise((resolve, reject) => {
      let ready = false;

      const startupTimer = setTimeout(() => {
        if (ready) return;
        ready = true;
        worker.kill();
        reject(
          new EmbeddingError(
            `Embedding worker did not become ready within ${options.timeoutMs}ms`,
            'WORKER_START_FAILED',
            { stderr: worker.stderr.substring(0, 1000) }
          )
        );
      }, options.timeoutMs);

      shell.on('message', (raw: unknown) => {
        if (ready) {
          worker.handleResponse(raw);
          return;
        }
        const parsed = ReadyMessage.safeParse(raw);
        if (!parsed.success) {
          console.error('[EmbeddingWorker] Ignoring non-protocol output before ready');
          return;
        }
        ready = true;
        clearTimeout(startupTimer);
        if (!parsed.data.ready) {
          worker.kill();
          reject(
            new EmbeddingError(
              parsed.data.error ?? 'Embedding worker failed to load the model',
              'WORKER_START_FAILED',
              { model: options.model }
            )
          );
          return;
        }
        worker.nativeDimension = parsed.data.dimension;
        console.error(
          `[EmbeddingWorker] Ready: model=${parsed.data.model ?? options.model}, dimension=${parsed.data.dimension ?? 'unknown'}`
        );
        resolve(worker);
      });

      shell.on('stderr', (line: string) => {
        if (worker.stderr.length < MAX_STDERR_LENGTH) {
          worker.stderr += line + '\n';
        }
      });

      shell.on('error', (err: Error) => {
        console.error('[EmbeddingWorker] Process error:', err.message);
        if (!ready) {
          ready = true;
          clearTimeout(startupTimer);
          reject(new EmbeddingError(`Worker error: ${err.message}`, 'WORKER_START_FAILED'));
        }
      });

      shell.on('pythonError', (err: Error) => {
        console.error('[EmbeddingWorker] Python traceback:', err.message);
      });

      shell.on('close', () => {
        worker.exited = true;
        worker.rejectAll(
          new EmbeddingError('Embedding worker exited', 'WORKER_ERROR', {
            stderr: worker.stderr.substring(0, 1000),
          })
        );
        if (!ready) {
          ready = true;
          clearTimeout(startupTimer);
          reject(
            new EmbeddingError('Embedding worker exited before it was ready', 'WORKER_START_FAILED', {
              stderr: worker.stderr.substring(0, 1000),
            })
          );
        }
      });
    });
  }

  /** Dimension reported by the worker's ready message */
  get dimension(): number | undefined {
    return this.nativeDimension;
  }

  embed(text: string): Promise<number[]> {
    if (this.exited) {
      return Promise.reject(new EmbeddingError('Embedding worker is not running', 'WORKER_ERROR'));
    }

    const id = this.nextId++;
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(id);
        reject(
          new EmbeddingError(`Embedding request timed out after ${this.timeoutMs}ms`, 'TIMEOUT', {
            id,
          })
        );
      }, this.timeoutMs);

      this.pending.set(id, { resolve, reject, timer });
      this.shell.send({ id, text });
    });
  }

  private handleResponse(raw: unknown): void {
    const parsed = ResponseMessage.safeParse(raw);
    if (!parsed.success) {
      console.error('[EmbeddingWorker] Unexpected message from worker, ignoring');
      return;
    }
    const request = this.pending.get(parsed.data.id);
    if (!request) {
      // Late reply to a request that already timed out
      return;
    }
    this.pending.delete(parsed.data.id);
    clearTimeout(request.timer);

    if (parsed.data.error !== undefined || parsed.data.embedding === undefined) {
      request.reject(
        new EmbeddingError(parsed.data.error ?? 'Worker reply had no embedding', 'EMBEDDING_FAILED', {
          id: parsed.data.id,
        })
      );
      return;
    }
    request.resolve(parsed.data.embedding);
  }

  private rejectAll(error: EmbeddingError): void {
    for (const request of this.pending.values()) {
      clearTimeout(request.timer);
      request.reject(error);
    }
    this.pending.clear();
  }

  private kill(): void {
    try {
      this.shell.kill();
    } catch (error) {
      console.error(
        '[EmbeddingWorker] Failed to kill worker (may already be gone):',
        error instanceof Error ? error.message : String(error)
      );
    }
  }

  close(): Promise<void> {
    if (this.exited) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.shell.end((err) => {
        if (err) {
          console.error('[EmbeddingWorker] Worker ended with error:', err.message);
        }
        resolve();
      });
    });
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// STRATEGY
// ═══════════════════════════════════════════════════════════════════════════════

export class SentenceEmbeddingStrategy implements EmbeddingStrategy {
  readonly name = 'sentence-transformers';
  readonly dimension: number;
  private readonly worker: LazyHandle<EmbeddingWorker>;
  private readonly warnings = new OneShotLog();

  constructor(options: SentenceEmbeddingOptions) {
    this.dimension = options.dimension;
    this.worker = new LazyHandle(
      'embedding worker',
      () => EmbeddingWorker.start(options),
      (worker) => worker.close()
    );
  }

  embed(text: string): Promise<BackendResult<number[]>> {
    return attempt('embedding', async () => {
      const worker = await this.worker.get();
      const vector = await worker.embed(text);
      if (vector.length !== this.dimension) {
        // Native vector is returned unchanged; the index rejects it if it really mismatches
        this.warnings.warn(
          'dimension',
          `[SentenceEmbedding] Model returned ${vector.length}-dim vectors, configured EMBEDDING_DIM is ${this.dimension}`
        );
      }
      return vector;
    });
  }

  close(): Promise<void> {
    return this.worker.close();
  }
}
