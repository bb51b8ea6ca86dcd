/**
 * Assistant runtime
 *
 * Wires every component from an `AppConfig` and owns their lifecycle:
 *
 *   Document Store -> Embedding Indexer -> Intent Classifier
 *   -> Context Manager -> Retrieval Engine -> Response Synthesizer
 *
 * `init()` restores persisted documents, loads or rebuilds the vector index,
 * ingests the seed directory and starts the session sweeper. `close()`
 * stops the sweeper and writes the index snapshot.
 */

import * as path from 'path';
import { Document, DocumentInput, HealthResponse, StatsResponse } from '../shared/types';
import { createOllamaClient, IOllamaClient } from './clients/ollamaClient';
import { AppConfig } from './config';
import { logger } from './logger';
import { ContextManager } from './services/contextManager';
import { DocumentStore, IngestionResult } from './services/documentStore';
import {
    EmbeddingBatcher,
    EmbeddingProvider,
    HashingEmbedder,
    OllamaEmbedder,
} from './services/embeddingProvider';
import { EmbeddingIndexer, IndexInitOutcome } from './services/embeddingIndexer';
import { IntentClassifier } from './services/intentClassifier';
import { QueryOutcome, QueryProcessor, QueryRequest } from './services/queryProcessor';
import { ResponseSynthesizer } from './services/responseSynthesizer';
import { RetrievalEngine } from './services/retrievalEngine';
import { loadSeedDirectory, SeedResult } from './services/seedLoader';

/**
 * Replacements for the parts tests want to control.
 */
export interface AssistantOverrides {
    provider?: EmbeddingProvider;
    ollamaClient?: IOllamaClient;
    now?: () => Date;
}

export type AssistantState = 'created' | 'starting' | 'ready' | 'failed' | 'closed';

export interface InitReport {
    index: IndexInitOutcome;
    documents: number;
    reindexedChunks: number;
    droppedEntries: number;
    seed: SeedResult | null;
}

export class Assistant {
    readonly documents: DocumentStore;
    readonly indexer: EmbeddingIndexer;
    readonly contexts: ContextManager;
    readonly processor: QueryProcessor;
    private readonly ollamaClient: IOllamaClient | null;
    private _state: AssistantState = 'created';

    constructor(
        private readonly config: AppConfig,
        overrides: AssistantOverrides = {}
    ) {
        const now = overrides.now ?? (() => new Date());
        const dataDir = config.dataDir;

        this.ollamaClient =
            config.embedding.provider === 'ollama'
                ? overrides.ollamaClient ??
                  createOllamaClient({
                      baseUrl: config.embedding.ollamaBaseUrl,
                      embeddingModel: config.embedding.ollamaModel,
                  })
                : null;
        const provider = overrides.provider ?? this.buildProvider();

        this.indexer = new EmbeddingIndexer(provider, {
            snapshotPath: path.join(dataDir, 'index.json'),
            rebuildOnCorruption: config.rebuildIndex,
        });
        this.documents = new DocumentStore(
            this.indexer,
            {
                storagePath: path.join(dataDir, 'documents'),
                supportedLanguages: config.supportedLanguages,
                minDocumentLength: config.minDocumentLength,
                chunking: config.chunking,
            },
            now
        );
        this.contexts = new ContextManager(
            {
                maxTurns: config.session.maxTurns,
                idleTimeoutMs: config.session.idleTimeoutMs,
                storagePath: config.session.persist ? path.join(dataDir, 'sessions') : null,
            },
            now
        );

        this.processor = new QueryProcessor(
            {
                documents: this.documents,
                classifier: new IntentClassifier(this.indexer, {
                    precheckMinRelevance: config.precheckMinRelevance,
                    precheckTimeoutMs: config.retrievalTimeoutMs,
                }),
                contexts: this.contexts,
                retrieval: new RetrievalEngine(this.indexer, this.documents, {
                    timeoutMs: config.retrievalTimeoutMs,
                }),
                synthesizer: new ResponseSynthesizer(),
            },
            {
                topK: config.topK,
                minRelevance: config.minRelevance,
                defaultLanguage: config.defaultLanguage,
            }
        );
    }

    get state(): AssistantState {
        return this._state;
    }

    get ready(): boolean {
        return this._state === 'ready' && this.indexer.ready;
    }

    /**
     * Brings the knowledge base up.
     *
     * @throws IndexCorruptedError when the snapshot is unreadable and
     *         REBUILD_INDEX is off
     */
    async init(): Promise<InitReport> {
        if (this._state !== 'created') {
            throw new Error(`Assistant cannot be started from state "${this._state}"`);
        }
        this._state = 'starting';

        try {
            if (this.ollamaClient && !(await this.ollamaClient.isAvailable())) {
                logger.warn(
                    `Ollama is not reachable at ${this.config.embedding.ollamaBaseUrl}; ` +
                        'embedding will fail until it is'
                );
            }

            const documents = this.documents.load();
            const index = this.indexer.init();
            const { reindexed, dropped } = await this.reconcileIndex(index);
            await this.indexer.flush();

            const seed = this.config.seedDir
                ? await loadSeedDirectory(this.documents, this.config.seedDir)
                : null;

            this.contexts.load();
            this.contexts.start();
            this._state = 'ready';

            const counts = this.documents.counts();
            logger.info(
                `Knowledge base ready: ${counts.documents} documents, ${counts.chunks} chunks, ` +
                    `${this.indexer.size} indexed (${this.indexer.modelId})`
            );
            return { index, documents, reindexedChunks: reindexed, droppedEntries: dropped, seed };
        } catch (error) {
            this._state = 'failed';
            throw error;
        }
    }

    query(request: QueryRequest): Promise<QueryOutcome> {
        return this.processor.handleQuery(request);
    }

    ingest(input: DocumentInput, signal?: AbortSignal): Promise<IngestionResult> {
        return this.documents.ingest(input, signal);
    }

    removeDocument(documentId: string): Promise<boolean> {
        return this.documents.remove(documentId);
    }

    health(): HealthResponse {
        const counts = this.documents.counts();
        let status: HealthResponse['status'] = 'error';
        if (this.ready) {
            status = 'ok';
        } else if (this._state === 'created' || this._state === 'starting') {
            status = 'starting';
        }
        return {
            status,
            indexReady: this.indexer.ready,
            embeddingModel: this.indexer.modelId,
            documents: counts.documents,
            chunks: counts.chunks,
            indexedChunks: this.indexer.size,
            sessions: this.contexts.sessionCount,
        };
    }

    /**
     * Documents newest first, at most `limit` of them.
     */
    listDocuments(limit?: number): Document[] {
        const documents = this.documents.listDocuments();
        return limit === undefined ? documents : documents.slice(0, limit);
    }

    stats(): StatsResponse {
        const counts = this.documents.counts();
        const languages: StatsResponse['languages'] = {};
        const categories: StatsResponse['categories'] = {};
        for (const document of this.documents.listDocuments()) {
            languages[document.language] = (languages[document.language] ?? 0) + 1;
            categories[document.category] = (categories[document.category] ?? 0) + 1;
        }
        return {
            total_documents: counts.documents,
            total_chunks: counts.chunks,
            indexed_chunks: this.indexer.size,
            languages,
            categories,
            embedding_model: this.indexer.modelId,
            index_ready: this.indexer.ready,
            sessions: this.contexts.sessionCount,
        };
    }

    async close(): Promise<void> {
        if (this._state === 'closed') return;
        this.contexts.stop();
        await this.indexer.close();
        this._state = 'closed';
        logger.info('Assistant closed');
    }

    private buildProvider(): EmbeddingProvider {
        const { dimension } = this.config.embedding;
        if (this.ollamaClient) {
            return new EmbeddingBatcher(new OllamaEmbedder(this.ollamaClient, { dimension }));
        }
        return new HashingEmbedder({ dimension });
    }

    /**
     * Makes the index match the stored chunks: a rebuild embeds everything;
     * otherwise orphaned entries are dropped and missing chunks embedded.
     */
    private async reconcileIndex(
        outcome: IndexInitOutcome
    ): Promise<{ reindexed: number; dropped: number }> {
        let reindexed = 0;
        let dropped = 0;

        if (outcome === 'rebuildRequired') {
            for (const document of this.documents.listDocuments()) {
                const { indexed } = await this.indexer.embedAndIndexMany(
                    this.documents.listChunks(document.id)
                );
                reindexed += indexed.length;
            }
            if (reindexed > 0) {
                logger.info(`Re-indexed ${reindexed} chunks`);
            }
            return { reindexed, dropped };
        }

        for (const chunkId of this.indexer.chunkIds()) {
            if (!this.documents.getChunk(chunkId)) {
                this.indexer.remove(chunkId);
                dropped++;
            }
        }
        const missing = this.documents.listChunks().filter((chunk) => !this.indexer.has(chunk.id));
        if (missing.length > 0) {
            const { indexed } = await this.indexer.embedAndIndexMany(missing);
            reindexed = indexed.length;
        }
        if (dropped > 0 || reindexed > 0) {
            logger.info(`Index reconciled: ${dropped} orphaned entries dropped, ${reindexed} chunks embedded`);
        }
        return { reindexed, dropped };
    }
}

export function createAssistant(config: AppConfig, overrides?: AssistantOverrides): Assistant {
    return new Assistant(config, overrides);
}
