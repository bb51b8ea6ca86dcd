/**
 * Embedding Providers
 *
 * Every vector in one index comes from a single provider, identified by its
 * `modelId`. Two providers ship:
 * - HashingEmbedder: local, deterministic feature hashing over content tokens
 * - OllamaEmbedder: a model served by a local Ollama instance
 *
 * The EmbeddingBatcher sits in front of either one and folds concurrent
 * single-text calls into one batch call.
 */

import { IOllamaClient, OllamaError, OllamaErrorCode } from '../clients/ollamaClient';
import { EmbeddingFailedError, RequestCancelledError, throwIfCancelled } from '../errors';
import { logger } from '../logger';
import { contentTokens } from './textAnalysis';

/**
 * Contract shared by every embedding model.
 */
export interface EmbeddingProvider {
  /** Identifies model and version; stored with the persisted index */
  readonly modelId: string;
  readonly dimension: number;
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
  embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

/**
 * Rejects text the models cannot encode.
 */
export function assertEncodable(text: string): void {
  if (LONE_SURROGATE.test(text)) {
    throw new EmbeddingFailedError('Text contains invalid UTF-16', { reason: 'encoding' });
  }
}

/**
 * Checks that a vector can take part in cosine search: expected dimension,
 * finite components and a non-zero norm.
 */
export function assertUsableVector(vector: number[], dimension: number): void {
  if (vector.length !== dimension) {
    throw new EmbeddingFailedError(
      `Embedding has dimension ${vector.length}, expected ${dimension}`,
      { reason: 'dimension', actual: vector.length, expected: dimension }
    );
  }
  let norm = 0;
  for (const value of vector) {
    if (!Number.isFinite(value)) {
      throw new EmbeddingFailedError('Embedding contains a non-finite value', {
        reason: 'nonFinite',
      });
    }
    norm += value * value;
  }
  if (norm === 0) {
    throw new EmbeddingFailedError('Embedding is the zero vector', { reason: 'zeroVector' });
  }
}

// ============================================================================
// Hashing embedder
// ============================================================================

export interface HashingEmbedderConfig {
  dimension: number;
}

export const DEFAULT_HASHING_CONFIG: HashingEmbedderConfig = {
  dimension: 384,
};

/**
 * 32-bit FNV-1a over UTF-16 code units.
 */
export function fnv1a(text: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

/**
 * Bag-of-words feature hashing. Each content token adds to one bucket,
 * repeated tokens are damped with `1 + ln(count)` and the result is
 * L2-normalised. Text without content tokens fails with EmbeddingFailed.
 */
export class HashingEmbedder implements EmbeddingProvider {
  readonly modelId: string;
  readonly dimension: number;

  constructor(config: Partial<HashingEmbedderConfig> = {}) {
    const { dimension } = { ...DEFAULT_HASHING_CONFIG, ...config };
    if (!Number.isInteger(dimension) || dimension < 1) {
      throw new Error(`Invalid embedding dimension: ${dimension}`);
    }
    this.dimension = dimension;
    this.modelId = `hashing-fnv1a-v1/${dimension}`;
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    throwIfCancelled(signal);
    return this.embedSync(text);
  }

  async embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    throwIfCancelled(signal);
    return texts.map((text) => this.embedSync(text));
  }

  private embedSync(text: string): number[] {
    assertEncodable(text);

    const counts = new Map<string, number>();
    for (const token of contentTokens(text)) {
      counts.set(token, (counts.get(token) ?? 0) + 1);
    }

    const vector = new Array<number>(this.dimension).fill(0);
    for (const [token, count] of counts) {
      const bucket = fnv1a(token) % this.dimension;
      vector[bucket] = (vector[bucket] ?? 0) + 1 + Math.log(count);
    }

    const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
    if (norm === 0) {
      throw new EmbeddingFailedError('Text has no content tokens to embed', {
        reason: 'zeroVector',
      });
    }
    return vector.map((value) => value / norm);
  }
}

// ============================================================================
// Ollama embedder
// ============================================================================

export interface OllamaEmbedderConfig {
  dimension: number;
}

export const DEFAULT_OLLAMA_EMBEDDER_CONFIG: OllamaEmbedderConfig = {
  dimension: 768,
};

/**
 * Embeds through an Ollama model. Vectors of the wrong dimension are
 * rejected so one index never mixes shapes.
 */
export class OllamaEmbedder implements EmbeddingProvider {
  readonly modelId: string;
  readonly dimension: number;

  constructor(
    private readonly client: IOllamaClient,
    config: Partial<OllamaEmbedderConfig> = {}
  ) {
    this.dimension = { ...DEFAULT_OLLAMA_EMBEDDER_CONFIG, ...config }.dimension;
    this.modelId = `ollama/${client.embeddingModel}`;
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    assertEncodable(text);
    try {
      const vector = await this.client.generateEmbedding(text, signal);
      assertUsableVector(vector, this.dimension);
      return vector;
    } catch (error) {
      throw this.translateError(error);
    }
  }

  async embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    texts.forEach(assertEncodable);
    try {
      const vectors = await this.client.generateEmbeddings(texts, signal);
      for (const vector of vectors) {
        assertUsableVector(vector, this.dimension);
      }
      return vectors;
    } catch (error) {
      throw this.translateError(error);
    }
  }

  private translateError(error: unknown): Error {
    if (error instanceof OllamaError) {
      if (error.code === OllamaErrorCode.ABORTED) {
        return new RequestCancelledError();
      }
      return new EmbeddingFailedError(error.message, { ollamaCode: error.code }, error);
    }
    if (error instanceof Error) {
      return error;
    }
    return new EmbeddingFailedError(String(error));
  }
}

// ============================================================================
// Batching
// ============================================================================

export interface BatcherConfig {
  /** Largest number of texts sent in one call */
  maxBatchSize: number;
  /** How long the first queued text waits for company */
  flushDelayMs: number;
}

export const DEFAULT_BATCHER_CONFIG: BatcherConfig = {
  maxBatchSize: 32,
  flushDelayMs: 5,
};

interface PendingEmbedding {
  text: string;
  signal?: AbortSignal;
  resolve: (vector: number[]) => void;
  reject: (error: Error) => void;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new EmbeddingFailedError(String(error));
}

/**
 * Coalesces concurrent `embed` calls into `embedBatch` calls on the wrapped
 * provider. When a batch fails, its texts are retried one by one so each
 * caller gets its own result or error.
 */
export class EmbeddingBatcher implements EmbeddingProvider {
  private readonly config: BatcherConfig;
  private queue: PendingEmbedding[] = [];
  private timer: ReturnType<typeof setTimeout> | null = null;

  constructor(
    private readonly provider: EmbeddingProvider,
    config: Partial<BatcherConfig> = {}
  ) {
    this.config = { ...DEFAULT_BATCHER_CONFIG, ...config };
  }

  get modelId(): string {
    return this.provider.modelId;
  }

  get dimension(): number {
    return this.provider.dimension;
  }

  get pending(): number {
    return this.queue.length;
  }

  embed(text: string, signal?: AbortSignal): Promise<number[]> {
    return new Promise<number[]>((resolve, reject) => {
      throwIfCancelled(signal);
      const onAbort = (): void => {
        const position = this.queue.indexOf(item);
        if (position !== -1) {
          this.queue.splice(position, 1);
        }
        reject(new RequestCancelledError());
      };
      const item: PendingEmbedding = {
        text,
        signal,
        resolve: (vector) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(vector);
        },
        reject: (error) => {
          signal?.removeEventListener('abort', onAbort);
          reject(error);
        },
      };
      this.queue.push(item);
      signal?.addEventListener('abort', onAbort, { once: true });

      if (this.queue.length >= this.config.maxBatchSize) {
        this.flushNow();
      } else if (this.timer === null) {
        this.timer = setTimeout(() => this.flushNow(), this.config.flushDelayMs);
      }
    });
  }

  embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    return this.provider.embedBatch(texts, signal);
  }

  /**
   * Sends everything queued so far without waiting for the delay.
   */
  flushNow(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    while (this.queue.length > 0) {
      const batch = this.queue.splice(0, this.config.maxBatchSize);
      void this.runBatch(batch);
    }
  }

  private async runBatch(batch: PendingEmbedding[]): Promise<void> {
    const live = batch.filter((item) => !item.signal?.aborted);
    if (live.length === 0) return;

    try {
      const vectors = await this.provider.embedBatch(live.map((item) => item.text));
      live.forEach((item, i) => {
        const vector = vectors[i];
        if (vector) {
          item.resolve(vector);
        } else {
          item.reject(new EmbeddingFailedError('Batch returned too few vectors'));
        }
      });
    } catch (error) {
      if (live.length === 1) {
        live[0]?.reject(toError(error));
        return;
      }
      logger.debug(`Embedding batch of ${live.length} failed, retrying individually`);
      await Promise.all(
        live.map(async (item) => {
          try {
            item.resolve(await this.provider.embed(item.text, item.signal));
          } catch (itemError) {
            item.reject(toError(itemError));
          }
        })
      );
    }
  }
}
