/**
 * Document Store Service
 *
 * Holds the knowledge base: documents, their chunks, and (through the
 * Embedding Indexer) their vectors. Documents are persisted as one JSON file
 * each, containing the document and its chunks.
 *
 * Key responsibilities:
 * - Validate and chunk incoming documents
 * - Replace a document wholesale on re-ingestion
 * - Serve chunks by id for retrieval
 * - Restore persisted documents at startup
 */

import * as path from 'path';
import { z } from 'zod';
import {
    Chunk,
    Document,
    DocumentCategory,
    DocumentInput,
    DOCUMENT_CATEGORIES,
    LanguageCode,
} from '../../shared/types';
import { ErrorCode, IngestionError, throwIfCancelled } from '../errors';
import { logger } from '../logger';
import {
    ensureDirectory,
    fileNameForId,
    listJsonFiles,
    readJson,
    removeFile,
    writeJsonAtomic,
} from '../storage/jsonFile';
import { ChunkingConfig, DocumentChunker } from './documentChunker';
import { EmbeddingIndexer, SkippedChunk } from './embeddingIndexer';
import { KeyedMutex } from './keyedMutex';

/**
 * Configuration for the document store.
 */
export interface DocumentStoreConfig {
    /** Directory for document files; null keeps documents in memory only */
    storagePath: string | null;
    /** Languages accepted at ingestion */
    supportedLanguages: LanguageCode[];
    /** Minimum trimmed text length */
    minDocumentLength: number;
    chunking: Partial<ChunkingConfig>;
}

export const DEFAULT_DOCUMENT_STORE_CONFIG: DocumentStoreConfig = {
    storagePath: null,
    supportedLanguages: ['nb', 'en'],
    minDocumentLength: 20,
    chunking: {},
};

export interface IngestionResult {
    documentId: string;
    chunkIds: string[];
    skipped: SkippedChunk[];
}

export interface StoreCounts {
    documents: number;
    chunks: number;
}

/**
 * Interface for document store operations.
 */
export interface IDocumentStore {
    ingest(input: DocumentInput, signal?: AbortSignal): Promise<IngestionResult>;
    remove(documentId: string): Promise<boolean>;
    getChunk(chunkId: string): Chunk | undefined;
    getDocument(documentId: string): Document | undefined;
    listDocuments(): Document[];
    listChunks(documentId?: string): Chunk[];
    counts(): StoreCounts;
}

const metadataSchema = z.object({
    language: z.enum(['nb', 'en']),
    category: z.enum(['regulation', 'project', 'other']),
    title: z.string().optional(),
    tags: z.array(z.string()),
    ingestedAt: z.string().datetime(),
});

/**
 * Stored document format (JSON serialization).
 */
const storedDocumentSchema = z.object({
    document: z.object({
        id: z.string().min(1),
        language: z.enum(['nb', 'en']),
        category: z.enum(['regulation', 'project', 'other']),
        title: z.string().optional(),
        tags: z.array(z.string()),
        text: z.string(),
        ingestedAt: z.string().datetime(),
    }),
    chunks: z.array(
        z.object({
            id: z.string().min(1),
            documentId: z.string().min(1),
            index: z.number().int().nonnegative(),
            start: z.number().int().nonnegative(),
            end: z.number().int().nonnegative(),
            text: z.string(),
            metadata: metadataSchema,
        })
    ),
});

type StoredDocument = z.infer<typeof storedDocumentSchema>;

function isCategory(value: string): value is DocumentCategory {
    return DOCUMENT_CATEGORIES.some((category) => category === value);
}

/**
 * Document Store implementation.
 */
export class DocumentStore implements IDocumentStore {
    private readonly config: DocumentStoreConfig;
    private readonly chunker: DocumentChunker;
    private readonly locks = new KeyedMutex();
    private documents: Map<string, Document> = new Map();
    private chunks: Map<string, Chunk> = new Map();
    private chunkIdsByDocument: Map<string, string[]> = new Map();

    constructor(
        private readonly indexer: EmbeddingIndexer,
        config: Partial<DocumentStoreConfig> = {},
        private readonly now: () => Date = () => new Date()
    ) {
        this.config = { ...DEFAULT_DOCUMENT_STORE_CONFIG, ...config };
        this.chunker = new DocumentChunker(this.config.chunking);
    }

    /**
     * Validates, chunks, embeds and commits a document, replacing any
     * document with the same id. Nothing is committed when validation or
     * the document file write fails.
     *
     * Chunks whose embedding fails are stored but not indexed; they are
     * listed in `skipped`.
     *
     * @throws IngestionError for invalid input
     */
    async ingest(input: DocumentInput, signal?: AbortSignal): Promise<IngestionResult> {
        const document = this.validate(input);

        return this.locks.runExclusive(document.id, async () => {
            throwIfCancelled(signal);
            const chunks = this.chunker.chunkDocument(document);
            const { entries, skipped } = await this.indexer.embedChunks(chunks, signal);
            throwIfCancelled(signal);

            // A failed write leaves the previous version live
            this.persist(document, chunks);

            // Chunks and vectors of the document change together
            this.commit(document, chunks);
            this.indexer.commitDocument(document.id, entries);
            await this.flushIndex();

            logger.info(
                `Ingested document ${document.id}: ${chunks.length} chunks, ${skipped.length} skipped`
            );
            return {
                documentId: document.id,
                chunkIds: chunks.map((chunk) => chunk.id),
                skipped,
            };
        });
    }

    /**
     * Removes a document with its chunks and vectors.
     * @returns false if the document was not present
     */
    async remove(documentId: string): Promise<boolean> {
        return this.locks.runExclusive(documentId, async () => {
            if (!this.documents.has(documentId)) {
                return false;
            }

            if (this.config.storagePath) {
                removeFile(this.documentFilePath(documentId));
            }

            this.uncommit(documentId);
            this.indexer.removeDocument(documentId);
            await this.flushIndex();

            logger.info(`Removed document ${documentId}`);
            return true;
        });
    }

    getChunk(chunkId: string): Chunk | undefined {
        return this.chunks.get(chunkId);
    }

    getDocument(documentId: string): Document | undefined {
        return this.documents.get(documentId);
    }

    /**
     * All documents, newest first.
     */
    listDocuments(): Document[] {
        return [...this.documents.values()].sort(
            (a, b) => b.ingestedAt.getTime() - a.ingestedAt.getTime() || (a.id < b.id ? -1 : 1)
        );
    }

    /**
     * Chunks of one document in order, or of every document.
     */
    listChunks(documentId?: string): Chunk[] {
        const documentIds = documentId === undefined ? [...this.chunkIdsByDocument.keys()] : [documentId];
        const result: Chunk[] = [];
        for (const id of documentIds) {
            for (const chunkId of this.chunkIdsByDocument.get(id) ?? []) {
                const chunk = this.chunks.get(chunkId);
                if (chunk) result.push(chunk);
            }
        }
        return result;
    }

    counts(): StoreCounts {
        return { documents: this.documents.size, chunks: this.chunks.size };
    }

    /**
     * Restores persisted documents. Unreadable files are logged and skipped.
     * @returns number of documents loaded
     */
    load(): number {
        const storagePath = this.config.storagePath;
        if (!storagePath) return 0;
        ensureDirectory(storagePath);

        let loaded = 0;
        for (const filePath of listJsonFiles(storagePath)) {
            try {
                const parsed = storedDocumentSchema.safeParse(readJson(filePath));
                if (!parsed.success) {
                    logger.warn(`Ignoring malformed document file ${path.basename(filePath)}`);
                    continue;
                }
                const { document, chunks } = this.deserialize(parsed.data);
                this.commit(document, chunks);
                loaded++;
            } catch (error) {
                logger.warn(`Error reading document file ${path.basename(filePath)}:`, error);
            }
        }
        if (loaded > 0) {
            logger.info(`Loaded ${loaded} documents from ${storagePath}`);
        }
        return loaded;
    }

    /**
     * Checks input and builds the immutable document.
     */
    private validate(input: DocumentInput): Document {
        const id = input.id.trim();
        if (id.length === 0) {
            throw new IngestionError('Document id must not be empty', ErrorCode.MALFORMED_DOCUMENT, {
                field: 'id',
            });
        }

        const language = this.config.supportedLanguages.find((code) => code === input.language);
        if (!language) {
            throw new IngestionError(
                `Unsupported language "${input.language}" for document ${id}`,
                ErrorCode.UNSUPPORTED_LANGUAGE,
                { documentId: id, language: input.language, supported: this.config.supportedLanguages }
            );
        }

        if (!isCategory(input.category)) {
            throw new IngestionError(
                `Unknown category "${input.category}" for document ${id}`,
                ErrorCode.MALFORMED_DOCUMENT,
                { documentId: id, field: 'category', category: input.category }
            );
        }

        const length = input.text.trim().length;
        if (length < this.config.minDocumentLength) {
            throw new IngestionError(
                `Document ${id} is too short (${length} < ${this.config.minDocumentLength} characters)`,
                ErrorCode.DOCUMENT_TOO_SHORT,
                { documentId: id, length, minLength: this.config.minDocumentLength }
            );
        }

        const title = input.title?.trim();
        return {
            id,
            language,
            category: input.category,
            title: title ? title : undefined,
            tags: (input.tags ?? []).map((tag) => tag.trim()).filter((tag) => tag.length > 0),
            text: input.text,
            ingestedAt: this.now(),
        };
    }

    /**
     * Swaps a document's chunks in the in-memory maps. Synchronous.
     */
    private commit(document: Document, chunks: Chunk[]): void {
        this.uncommit(document.id);
        this.documents.set(document.id, document);
        for (const chunk of chunks) {
            this.chunks.set(chunk.id, chunk);
        }
        this.chunkIdsByDocument.set(
            document.id,
            chunks.map((chunk) => chunk.id)
        );
    }

    private uncommit(documentId: string): void {
        for (const chunkId of this.chunkIdsByDocument.get(documentId) ?? []) {
            this.chunks.delete(chunkId);
        }
        this.chunkIdsByDocument.delete(documentId);
        this.documents.delete(documentId);
    }

    private documentFilePath(documentId: string): string {
        return path.join(this.config.storagePath ?? '', fileNameForId(documentId));
    }

    private persist(document: Document, chunks: Chunk[]): void {
        if (!this.config.storagePath) return;
        writeJsonAtomic(this.documentFilePath(document.id), this.serialize(document, chunks));
    }

    /**
     * The snapshot stays dirty after a failed write and is retried on the
     * next flush; startup re-embeds whatever it is missing.
     */
    private async flushIndex(): Promise<void> {
        try {
            await this.indexer.flush();
        } catch (error) {
            logger.warn('Index snapshot write failed, will retry on the next flush:', error);
        }
    }

    private serialize(document: Document, chunks: Chunk[]): StoredDocument {
        return {
            document: { ...document, ingestedAt: document.ingestedAt.toISOString() },
            chunks: chunks.map((chunk) => ({
                ...chunk,
                metadata: { ...chunk.metadata, ingestedAt: chunk.metadata.ingestedAt.toISOString() },
            })),
        };
    }

    private deserialize(stored: StoredDocument): { document: Document; chunks: Chunk[] } {
        const ingestedAt = new Date(stored.document.ingestedAt);
        return {
            document: { ...stored.document, ingestedAt },
            chunks: stored.chunks.map((chunk) => ({
                ...chunk,
                metadata: { ...chunk.metadata, ingestedAt: new Date(chunk.metadata.ingestedAt) },
            })),
        };
    }
}

/**
 * Factory function to create a DocumentStore instance.
 */
export function createDocumentStore(
    indexer: EmbeddingIndexer,
    config?: Partial<DocumentStoreConfig>
): DocumentStore {
    return new DocumentStore(indexer, config);
}
