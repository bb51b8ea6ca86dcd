/**
 * Backend services
 *
 * Knowledge base:
 * - DocumentStore: validates, chunks and stores documents
 * - EmbeddingIndexer: embeds chunks and owns the vector index
 *
 * Query pipeline:
 * - IntentClassifier -> ContextManager -> RetrievalEngine -> ResponseSynthesizer,
 *   orchestrated per session by the QueryProcessor
 */

export {
    DocumentChunker,
    createDocumentChunker,
    splitIntoChunks,
    overlapWindow,
    chunkIdFor,
    DEFAULT_CHUNKING_CONFIG,
} from './documentChunker';
export type { ChunkingConfig, TextSpan } from './documentChunker';

export { InMemoryVectorStore, createVectorStore, cosineSimilarity, compareIds } from './vectorStore';
export type { IVectorStore } from './vectorStore';

export {
    HashingEmbedder,
    OllamaEmbedder,
    EmbeddingBatcher,
    assertEncodable,
    assertUsableVector,
    DEFAULT_HASHING_CONFIG,
    DEFAULT_OLLAMA_EMBEDDER_CONFIG,
    DEFAULT_BATCHER_CONFIG,
} from './embeddingProvider';
export type {
    EmbeddingProvider,
    HashingEmbedderConfig,
    OllamaEmbedderConfig,
    BatcherConfig,
} from './embeddingProvider';

export { EmbeddingIndexer, createEmbeddingIndexer, DEFAULT_INDEXER_CONFIG } from './embeddingIndexer';
export type {
    EmbeddingIndexerConfig,
    EmbedOutcome,
    IndexingResult,
    IndexInitOutcome,
    IndexStats,
    SkippedChunk,
} from './embeddingIndexer';

export { DocumentStore, createDocumentStore, DEFAULT_DOCUMENT_STORE_CONFIG } from './documentStore';
export type { DocumentStoreConfig, IDocumentStore, IngestionResult, StoreCounts } from './documentStore';

export { loadSeedDirectory, documentInputSchema } from './seedLoader';
export type { SeedResult, SeedFailure } from './seedLoader';

export { KeyedMutex } from './keyedMutex';

export {
    ContextManager,
    createContextManager,
    resolveReferencesIn,
    DEFAULT_CONTEXT_CONFIG,
} from './contextManager';
export type { ContextManagerConfig, NewTurn } from './contextManager';

export { IntentClassifier, createIntentClassifier, matchRules, DEFAULT_INTENT_CONFIG } from './intentClassifier';
export type { IntentClassifierConfig, ClassifyOptions } from './intentClassifier';

export {
    RetrievalEngine,
    createRetrievalEngine,
    compareRetrieved,
    DEFAULT_RETRIEVAL_CONFIG,
} from './retrievalEngine';
export type { RetrievalConfig, RetrieveOptions, ChunkSource } from './retrievalEngine';

export {
    ResponseSynthesizer,
    createResponseSynthesizer,
    fillTemplate,
    splitSentences,
    selectSentences,
    DEFAULT_SYNTHESIZER_CONFIG,
} from './responseSynthesizer';
export type { SynthesizerConfig, SynthesisContext, ConfidenceBand } from './responseSynthesizer';

export {
    QueryProcessor,
    createQueryProcessor,
    validateQuery,
    citedEntities,
    DEFAULT_QUERY_CONFIG,
} from './queryProcessor';
export type {
    QueryProcessorConfig,
    QueryRequest,
    QueryOutcome,
    QueryProcessorDeps,
    KnowledgeBaseCounts,
} from './queryProcessor';

export {
    tokenize,
    contentTokens,
    isStopword,
    detectLanguage,
    detectCategory,
    extractEntities,
    consumePhrases,
    normalizeForMatching,
} from './textAnalysis';
