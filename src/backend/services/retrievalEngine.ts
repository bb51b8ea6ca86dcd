/**
 * Retrieval Engine
 *
 * Turns an expanded query into ranked evidence:
 * 1. Embed the query with the index's model
 * 2. Fetch the top-k nearest chunks (language-filtered when the caller
 *    states the language)
 * 3. Drop hits below `minRelevance`
 * 4. Re-rank survivors by similarity plus metadata boosts
 *
 * An empty result is not an error. Timeouts, an unavailable index and
 * embedding failures come back as a status with no items so the Response
 * Synthesizer can say why there is no answer.
 */

import {
  Chunk,
  LanguageCode,
  RetrievalResult,
  RetrievedChunk,
  SearchFilter,
} from '../../shared/types';
import {
  EmbeddingFailedError,
  IndexUnavailableError,
  RetrievalTimeoutError,
  withTimeout,
} from '../errors';
import { logger } from '../logger';
import { EmbeddingIndexer } from './embeddingIndexer';
import { contentTokens, detectCategory, detectLanguage, tokenize } from './textAnalysis';
import { compareIds } from './vectorStore';

/**
 * Configuration for the retrieval engine.
 */
export interface RetrievalConfig {
  /** Budget for embedding plus search */
  timeoutMs: number;
  /** Added when the chunk's category matches the query's detected category */
  categoryBoost: number;
  /** Scaled by the share of query terms found in the document title */
  titleBoost: number;
  /** Added when the chunk's language matches the query language */
  languageBoost: number;
  /** Scaled by the chunk's relative age among the candidates, newest = full */
  recencyBoost: number;
}

export const DEFAULT_RETRIEVAL_CONFIG: RetrievalConfig = {
  timeoutMs: 2000,
  categoryBoost: 0.1,
  titleBoost: 0.1,
  languageBoost: 0.05,
  recencyBoost: 0.02,
};

export interface RetrieveOptions {
  /** Stated query language; restricts the search to that language */
  language?: LanguageCode;
  signal?: AbortSignal;
}

/**
 * Where hits are hydrated from.
 */
export interface ChunkSource {
  getChunk(chunkId: string): Chunk | undefined;
}

interface Candidate {
  chunk: Chunk;
  similarity: number;
}

/**
 * Final ordering: score, then similarity, then newer document, then chunk id.
 */
export function compareRetrieved(a: RetrievedChunk, b: RetrievedChunk): number {
  return (
    b.score - a.score ||
    b.similarity - a.similarity ||
    b.chunk.metadata.ingestedAt.getTime() - a.chunk.metadata.ingestedAt.getTime() ||
    compareIds(a.chunkId, b.chunkId)
  );
}

export class RetrievalEngine {
  private readonly config: RetrievalConfig;

  constructor(
    private readonly indexer: EmbeddingIndexer,
    private readonly chunks: ChunkSource,
    config: Partial<RetrievalConfig> = {}
  ) {
    this.config = { ...DEFAULT_RETRIEVAL_CONFIG, ...config };
  }

  /**
   * Retrieves ranked chunks for an expanded query.
   *
   * @throws RequestCancelledError when the caller's signal fires
   */
  async retrieve(
    queryText: string,
    k: number,
    minRelevance: number,
    options: RetrieveOptions = {}
  ): Promise<RetrievalResult> {
    if (k <= 0) {
      return { status: 'empty', items: [] };
    }

    const filter: SearchFilter | undefined = options.language
      ? { language: options.language }
      : undefined;

    let candidates: Candidate[];
    try {
      candidates = await withTimeout(
        async (signal) => {
          const vector = await this.indexer.embedQuery(queryText, signal);
          // Search and hydration run in one synchronous step
          return this.indexer
            .search(vector, k, filter)
            .filter((hit) => hit.similarity >= minRelevance)
            .flatMap((hit) => {
              const chunk = this.chunks.getChunk(hit.chunkId);
              return chunk ? [{ chunk, similarity: hit.similarity }] : [];
            });
        },
        this.config.timeoutMs,
        options.signal
      );
    } catch (error) {
      if (error instanceof RetrievalTimeoutError) {
        logger.warn(`Retrieval timed out after ${this.config.timeoutMs}ms`);
        return { status: 'timeout', items: [] };
      }
      if (error instanceof IndexUnavailableError) {
        return { status: 'indexUnavailable', items: [] };
      }
      if (error instanceof EmbeddingFailedError) {
        logger.warn(`Query embedding failed: ${error.message}`);
        return { status: 'embeddingFailed', items: [] };
      }
      throw error;
    }

    if (candidates.length === 0) {
      return { status: 'empty', items: [] };
    }

    return { status: 'ok', items: this.rerank(queryText, candidates, options.language) };
  }

  /**
   * score = similarity + boosts. Ranks are 1-based.
   */
  private rerank(
    queryText: string,
    candidates: Candidate[],
    statedLanguage?: LanguageCode
  ): RetrievedChunk[] {
    const queryCategory = detectCategory(queryText);
    const queryLanguage = statedLanguage ?? detectLanguage(queryText);
    const queryTerms = new Set(contentTokens(queryText));

    const times = candidates.map((candidate) => candidate.chunk.metadata.ingestedAt.getTime());
    const oldest = Math.min(...times);
    const span = Math.max(...times) - oldest;

    const scored = candidates.map(({ chunk, similarity }): RetrievedChunk => {
      let score = similarity;

      if (queryCategory !== undefined && chunk.metadata.category === queryCategory) {
        score += this.config.categoryBoost;
      }

      if (chunk.metadata.title && queryTerms.size > 0) {
        const titleTerms = new Set(tokenize(chunk.metadata.title));
        let shared = 0;
        for (const term of queryTerms) {
          if (titleTerms.has(term)) shared++;
        }
        score += this.config.titleBoost * (shared / queryTerms.size);
      }

      if (queryLanguage !== undefined && chunk.metadata.language === queryLanguage) {
        score += this.config.languageBoost;
      }

      if (span > 0) {
        const age = (chunk.metadata.ingestedAt.getTime() - oldest) / span;
        score += this.config.recencyBoost * age;
      }

      return {
        chunkId: chunk.id,
        documentId: chunk.documentId,
        similarity,
        score,
        rank: 0,
        chunk,
      };
    });

    return scored.sort(compareRetrieved).map((item, i) => ({ ...item, rank: i + 1 }));
  }
}

export function createRetrievalEngine(
  indexer: EmbeddingIndexer,
  chunks: ChunkSource,
  config?: Partial<RetrievalConfig>
): RetrievalEngine {
  return new RetrievalEngine(indexer, chunks, config);
}
