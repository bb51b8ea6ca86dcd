/**
 * Vector Store Service
 *
 * In-memory vector store with exact cosine search.
 *
 * Every entry is compared against the query, so recall is always 1. The
 * store keeps a secondary index from document id to chunk ids for
 * document-level removal.
 */

import { IndexEntry, SearchFilter, SearchHit } from '../../shared/types';

/**
 * Interface for vector store operations.
 * This abstraction allows swapping implementations (e.g., to a persistent store).
 */
export interface IVectorStore {
  add(entry: IndexEntry): void;
  addMany(entries: IndexEntry[]): void;
  search(queryVector: number[], limit: number, filter?: SearchFilter): SearchHit[];
  delete(chunkId: string): boolean;
  deleteByDocumentId(documentId: string): number;
  get(chunkId: string): IndexEntry | undefined;
  getByDocumentId(documentId: string): IndexEntry[];
  entries(): IndexEntry[];
  size(): number;
  clear(): void;
}

/**
 * Calculate cosine similarity between two vectors.
 *
 * Formula: cos(θ) = (A · B) / (||A|| × ||B||)
 *
 * Zero vectors have similarity 0 with everything.
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector dimension mismatch: ${a.length} vs ${b.length}`);
  }

  if (a.length === 0) {
    return 0;
  }

  let dotProduct = 0;
  let magnitudeA = 0;
  let magnitudeB = 0;

  for (let i = 0; i < a.length; i++) {
    const aVal = a[i] ?? 0;
    const bVal = b[i] ?? 0;
    dotProduct += aVal * bVal;
    magnitudeA += aVal * aVal;
    magnitudeB += bVal * bVal;
  }

  const magnitude = Math.sqrt(magnitudeA) * Math.sqrt(magnitudeB);

  // Handle zero vectors (avoid division by zero)
  if (magnitude === 0) {
    return 0;
  }

  return dotProduct / magnitude;
}

/**
 * Code-unit order, independent of locale.
 */
export function compareIds(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function matchesFilter(entry: IndexEntry, filter?: SearchFilter): boolean {
  if (!filter) return true;
  if (filter.language !== undefined && entry.language !== filter.language) return false;
  if (filter.category !== undefined && entry.category !== filter.category) return false;
  return true;
}

/**
 * In-memory Vector Store implementation.
 *
 * Brute-force O(n) search; fine for the corpus sizes a single assistant
 * instance holds.
 */
export class InMemoryVectorStore implements IVectorStore {
  private byChunk: Map<string, IndexEntry> = new Map();
  private documentIndex: Map<string, Set<string>> = new Map(); // documentId -> chunk IDs

  /**
   * Add a single entry, replacing any entry with the same chunk id.
   */
  add(entry: IndexEntry): void {
    const previous = this.byChunk.get(entry.chunkId);
    if (previous && previous.documentId !== entry.documentId) {
      this.delete(entry.chunkId);
    }

    this.byChunk.set(entry.chunkId, entry);

    let chunkIds = this.documentIndex.get(entry.documentId);
    if (!chunkIds) {
      chunkIds = new Set();
      this.documentIndex.set(entry.documentId, chunkIds);
    }
    chunkIds.add(entry.chunkId);
  }

  addMany(entries: IndexEntry[]): void {
    for (const entry of entries) {
      this.add(entry);
    }
  }

  /**
   * Search for entries most similar to the query vector.
   *
   * @param queryVector - The embedding vector to search for
   * @param limit - Maximum number of results to return
   * @param filter - Only entries matching every given field are considered
   * @returns Hits sorted by similarity (highest first), ties by chunk id
   */
  search(queryVector: number[], limit: number, filter?: SearchFilter): SearchHit[] {
    if (limit <= 0) {
      return [];
    }

    const results: SearchHit[] = [];

    for (const entry of this.byChunk.values()) {
      if (!matchesFilter(entry, filter)) continue;
      const similarity = cosineSimilarity(queryVector, entry.vector);
      results.push({ chunkId: entry.chunkId, similarity });
    }

    results.sort((a, b) => b.similarity - a.similarity || compareIds(a.chunkId, b.chunkId));

    return results.slice(0, limit);
  }

  /**
   * Delete an entry by chunk id.
   * @returns true if entry was found and deleted
   */
  delete(chunkId: string): boolean {
    const entry = this.byChunk.get(chunkId);
    if (!entry) {
      return false;
    }

    this.byChunk.delete(chunkId);

    const docEntries = this.documentIndex.get(entry.documentId);
    if (docEntries) {
      docEntries.delete(chunkId);
      if (docEntries.size === 0) {
        this.documentIndex.delete(entry.documentId);
      }
    }

    return true;
  }

  /**
   * Delete all entries for a document.
   *
   * @returns Number of entries deleted
   */
  deleteByDocumentId(documentId: string): number {
    const chunkIds = this.documentIndex.get(documentId);
    if (!chunkIds) {
      return 0;
    }

    let count = 0;
    for (const chunkId of chunkIds) {
      if (this.byChunk.delete(chunkId)) {
        count++;
      }
    }

    this.documentIndex.delete(documentId);
    return count;
  }

  get(chunkId: string): IndexEntry | undefined {
    return this.byChunk.get(chunkId);
  }

  getByDocumentId(documentId: string): IndexEntry[] {
    const chunkIds = this.documentIndex.get(documentId);
    if (!chunkIds) {
      return [];
    }

    const entries: IndexEntry[] = [];
    for (const chunkId of chunkIds) {
      const entry = this.byChunk.get(chunkId);
      if (entry) {
        entries.push(entry);
      }
    }

    return entries;
  }

  entries(): IndexEntry[] {
    return [...this.byChunk.values()];
  }

  size(): number {
    return this.byChunk.size;
  }

  clear(): void {
    this.byChunk.clear();
    this.documentIndex.clear();
  }
}

/**
 * Factory function to create a vector store.
 */
export function createVectorStore(): IVectorStore {
  return new InMemoryVectorStore();
}
