/**
 * Embedding Indexer
 *
 * Owns the vector index: embeds chunks with the configured provider, keeps
 * the entries in a vector store and persists them as a snapshot.
 *
 * Embedding is split from committing. Ingestion embeds all chunks of a
 * document first (async, may fail per chunk) and then replaces the
 * document's entries in one synchronous step, so searches never see a mix
 * of old and new entries for the same document.
 */

import { Chunk, IndexEntry, SearchFilter, SearchHit } from '../../shared/types';
import {
  AssistantError,
  EmbeddingFailedError,
  IndexUnavailableError,
  RequestCancelledError,
  throwIfCancelled,
} from '../errors';
import { logger } from '../logger';
import { IndexSnapshotFile } from '../storage/indexSnapshot';
import { assertUsableVector, EmbeddingProvider } from './embeddingProvider';
import { KeyedMutex } from './keyedMutex';
import { createVectorStore, IVectorStore } from './vectorStore';

export interface EmbeddingIndexerConfig {
  /** Where the snapshot lives; null keeps the index in memory only */
  snapshotPath: string | null;
  /** Start empty instead of failing when the snapshot is unreadable */
  rebuildOnCorruption: boolean;
}

export const DEFAULT_INDEXER_CONFIG: EmbeddingIndexerConfig = {
  snapshotPath: null,
  rebuildOnCorruption: false,
};

export interface SkippedChunk {
  chunkId: string;
  reason: string;
}

export interface EmbedOutcome {
  entries: IndexEntry[];
  skipped: SkippedChunk[];
}

export interface IndexingResult {
  indexed: string[];
  skipped: SkippedChunk[];
}

/**
 * `loaded`: entries restored from the snapshot.
 * `rebuildRequired`: no usable snapshot; the caller re-embeds every chunk.
 */
export type IndexInitOutcome = 'loaded' | 'rebuildRequired';

export interface IndexStats {
  ready: boolean;
  modelId: string;
  dimension: number;
  entries: number;
  dirty: boolean;
}

type IndexState = 'created' | 'ready' | 'closed';

function entryFor(chunk: Chunk, vector: number[]): IndexEntry {
  return {
    chunkId: chunk.id,
    documentId: chunk.documentId,
    vector,
    language: chunk.metadata.language,
    category: chunk.metadata.category,
    ingestedAt: chunk.metadata.ingestedAt,
  };
}

function describeFailure(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export class EmbeddingIndexer {
  private readonly config: EmbeddingIndexerConfig;
  private readonly snapshot: IndexSnapshotFile | null;
  private readonly flushLock = new KeyedMutex();
  private state: IndexState = 'created';
  private dirty = false;

  constructor(
    private readonly provider: EmbeddingProvider,
    config: Partial<EmbeddingIndexerConfig> = {},
    private readonly store: IVectorStore = createVectorStore()
  ) {
    this.config = { ...DEFAULT_INDEXER_CONFIG, ...config };
    this.snapshot = this.config.snapshotPath ? new IndexSnapshotFile(this.config.snapshotPath) : null;
  }

  get modelId(): string {
    return this.provider.modelId;
  }

  get dimension(): number {
    return this.provider.dimension;
  }

  get ready(): boolean {
    return this.state === 'ready';
  }

  /**
   * Loads the snapshot, if any, and opens the index for use.
   *
   * @throws IndexCorruptedError when the snapshot is unreadable and
   *         `rebuildOnCorruption` is off
   */
  init(): IndexInitOutcome {
    if (this.state === 'ready') {
      return 'loaded';
    }
    this.store.clear();

    let outcome: IndexInitOutcome = 'rebuildRequired';
    if (this.snapshot) {
      try {
        const result = this.snapshot.load({ modelId: this.modelId, dimension: this.dimension });
        if (result.status === 'loaded') {
          this.store.addMany(result.entries);
          outcome = 'loaded';
          logger.info(`Loaded ${result.entries.length} index entries from ${this.snapshot.path}`);
        } else if (result.status === 'incompatible') {
          logger.warn(
            `Index snapshot was built with ${result.found.modelId}/${result.found.dimension}, ` +
              `current model is ${this.modelId}/${this.dimension}; re-indexing`
          );
        }
      } catch (error) {
        if (!this.config.rebuildOnCorruption) {
          throw error;
        }
        logger.warn('Index snapshot is corrupted; rebuilding from documents', error);
      }
    }

    this.state = 'ready';
    // A rebuilt index must be written even if it ends up empty
    this.dirty = outcome === 'rebuildRequired' && this.snapshot !== null;
    return outcome;
  }

  /**
   * Embeds chunks without touching the index. Chunks that cannot be embedded
   * are reported in `skipped`; cancellation aborts the whole call.
   */
  async embedChunks(chunks: Chunk[], signal?: AbortSignal): Promise<EmbedOutcome> {
    this.assertReady();
    if (chunks.length === 0) {
      return { entries: [], skipped: [] };
    }

    try {
      const vectors = await this.provider.embedBatch(
        chunks.map((chunk) => chunk.text),
        signal
      );
      const outcome: EmbedOutcome = { entries: [], skipped: [] };
      chunks.forEach((chunk, i) => {
        const vector = vectors[i];
        try {
          if (!vector) {
            throw new EmbeddingFailedError('Provider returned no vector');
          }
          assertUsableVector(vector, this.dimension);
          outcome.entries.push(entryFor(chunk, vector));
        } catch (error) {
          outcome.skipped.push(this.skip(chunk, error));
        }
      });
      return outcome;
    } catch (error) {
      if (error instanceof RequestCancelledError) throw error;
      if (chunks.length > 1) {
        logger.debug(`Batch embedding of ${chunks.length} chunks failed, retrying one by one`);
      }
    }

    const outcome: EmbedOutcome = { entries: [], skipped: [] };
    for (const chunk of chunks) {
      throwIfCancelled(signal);
      try {
        const vector = await this.provider.embed(chunk.text, signal);
        assertUsableVector(vector, this.dimension);
        outcome.entries.push(entryFor(chunk, vector));
      } catch (error) {
        if (error instanceof RequestCancelledError) throw error;
        outcome.skipped.push(this.skip(chunk, error));
      }
    }
    return outcome;
  }

  /**
   * Replaces every entry of a document in one step.
   */
  commitDocument(documentId: string, entries: IndexEntry[]): void {
    this.assertReady();
    this.store.deleteByDocumentId(documentId);
    this.store.addMany(entries);
    this.dirty = true;
  }

  /**
   * Adds or replaces one chunk's entry.
   *
   * @throws EmbeddingFailedError when the chunk cannot be embedded
   */
  async embedAndIndex(chunk: Chunk, signal?: AbortSignal): Promise<void> {
    const { entries, skipped } = await this.embedChunks([chunk], signal);
    const entry = entries[0];
    if (!entry) {
      throw new EmbeddingFailedError(`Chunk ${chunk.id} could not be embedded`, {
        chunkId: chunk.id,
        reason: skipped[0]?.reason,
      });
    }
    this.store.add(entry);
    this.dirty = true;
  }

  /**
   * Adds or replaces entries for many chunks, skipping the ones that fail.
   */
  async embedAndIndexMany(chunks: Chunk[], signal?: AbortSignal): Promise<IndexingResult> {
    const { entries, skipped } = await this.embedChunks(chunks, signal);
    this.store.addMany(entries);
    if (entries.length > 0) {
      this.dirty = true;
    }
    return { indexed: entries.map((entry) => entry.chunkId), skipped };
  }

  remove(chunkId: string): boolean {
    this.assertReady();
    const removed = this.store.delete(chunkId);
    if (removed) this.dirty = true;
    return removed;
  }

  removeDocument(documentId: string): number {
    this.assertReady();
    const removed = this.store.deleteByDocumentId(documentId);
    if (removed > 0) this.dirty = true;
    return removed;
  }

  /**
   * Nearest chunks by cosine similarity, best first.
   *
   * @throws IndexUnavailableError before init or after close
   */
  search(queryVector: number[], k: number, filter?: SearchFilter): SearchHit[] {
    this.assertReady();
    if (queryVector.length !== this.dimension) {
      throw new EmbeddingFailedError(
        `Query vector has dimension ${queryVector.length}, expected ${this.dimension}`
      );
    }
    return this.store.search(queryVector, k, filter);
  }

  /**
   * Embeds query text with the index's model.
   */
  async embedQuery(text: string, signal?: AbortSignal): Promise<number[]> {
    this.assertReady();
    try {
      const vector = await this.provider.embed(text, signal);
      assertUsableVector(vector, this.dimension);
      return vector;
    } catch (error) {
      if (error instanceof AssistantError) throw error;
      throw new EmbeddingFailedError(describeFailure(error), {}, error instanceof Error ? error : undefined);
    }
  }

  has(chunkId: string): boolean {
    return this.store.get(chunkId) !== undefined;
  }

  chunkIds(): string[] {
    return this.store.entries().map((entry) => entry.chunkId);
  }

  get size(): number {
    return this.store.size();
  }

  /**
   * Writes the snapshot if anything changed since the last write.
   */
  async flush(): Promise<void> {
    if (!this.snapshot) return;
    const snapshot = this.snapshot;
    await this.flushLock.runExclusive('snapshot', async () => {
      if (!this.dirty) return;
      this.dirty = false;
      try {
        snapshot.save({ modelId: this.modelId, dimension: this.dimension }, this.store.entries());
        logger.debug(`Index snapshot written (${this.store.size()} entries)`);
      } catch (error) {
        this.dirty = true;
        throw error;
      }
    });
  }

  /**
   * Flushes and closes the index. Later calls fail with IndexUnavailable.
   */
  async close(): Promise<void> {
    if (this.state !== 'ready') {
      this.state = 'closed';
      return;
    }
    await this.flush();
    this.state = 'closed';
  }

  stats(): IndexStats {
    return {
      ready: this.ready,
      modelId: this.modelId,
      dimension: this.dimension,
      entries: this.store.size(),
      dirty: this.dirty,
    };
  }

  private assertReady(): void {
    if (this.state !== 'ready') {
      throw new IndexUnavailableError(
        this.state === 'closed' ? 'Vector index has been closed' : 'Vector index is not initialised'
      );
    }
  }

  private skip(chunk: Chunk, error: unknown): SkippedChunk {
    const reason = describeFailure(error);
    logger.warn(`Skipping chunk ${chunk.id}: ${reason}`);
    return { chunkId: chunk.id, reason };
  }
}

export function createEmbeddingIndexer(
  provider: EmbeddingProvider,
  config?: Partial<EmbeddingIndexerConfig>
): EmbeddingIndexer {
  return new EmbeddingIndexer(provider, config);
}
