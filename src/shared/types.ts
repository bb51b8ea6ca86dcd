/**
 * Shared type definitions for the Rail Knowledge Assistant
 *
 * These types define the contract between the request layer and the core.
 * They're organized by domain:
 * - Documents: Knowledge base content and its chunks
 * - Index: Vector entries and search hits
 * - Intents: Closed classification of user queries
 * - Conversation: Turns and per-session context
 * - Retrieval: Ranked evidence for a query
 * - API: Request/response shapes
 */

// ============================================================================
// Document Types
// ============================================================================

/**
 * Language tags understood by the assistant.
 * The set actually accepted at ingestion is configurable.
 */
export type LanguageCode = 'nb' | 'en';

export const LANGUAGE_CODES: readonly LanguageCode[] = ['nb', 'en'];

export type DocumentCategory = 'regulation' | 'project' | 'other';

export const DOCUMENT_CATEGORIES: readonly DocumentCategory[] = [
    'regulation',
    'project',
    'other',
];

/**
 * Input accepted by the Document Store.
 */
export interface DocumentInput {
    id: string;
    text: string;
    language: string;
    category: string;
    title?: string;
    tags?: string[];
}

/**
 * An ingested document. Never mutated; re-ingestion replaces it.
 */
export interface Document {
    id: string;
    language: LanguageCode;
    category: DocumentCategory;
    title?: string;
    tags: string[];
    text: string;
    ingestedAt: Date;
}

/**
 * Metadata copied from the parent document onto each chunk.
 */
export interface ChunkMetadata {
    language: LanguageCode;
    category: DocumentCategory;
    title?: string;
    tags: string[];
    ingestedAt: Date;
}

/**
 * A bounded span of a document's text: the unit of embedding and retrieval.
 * `text` is exactly `document.text.slice(start, end)`.
 */
export interface Chunk {
    id: string;
    documentId: string;
    index: number;
    start: number;
    end: number;
    text: string;
    metadata: ChunkMetadata;
}

// ============================================================================
// Index Types
// ============================================================================

/**
 * Entry in the vector index.
 */
export interface IndexEntry {
    chunkId: string;
    documentId: string;
    vector: number[];
    language: LanguageCode;
    category: DocumentCategory;
    ingestedAt: Date;
}

/**
 * Restricts a search to entries matching every given field.
 */
export interface SearchFilter {
    language?: LanguageCode;
    category?: DocumentCategory;
}

export interface SearchHit {
    chunkId: string;
    similarity: number;
}

// ============================================================================
// Intent Types
// ============================================================================

/**
 * Subject areas a bare keyword ("etcs", "kostnad") can point at. Listed in
 * the order they win when a text touches several.
 */
export type Topic = 'signalling' | 'cost' | 'safety' | 'schedule' | 'competence' | 'project';

export const TOPICS: readonly Topic[] = [
    'signalling',
    'cost',
    'safety',
    'schedule',
    'competence',
    'project',
];

/**
 * Classified purpose of a query. The `kind` tag is closed: every consumer
 * switches over it exhaustively.
 *
 * A query made of a single topic keyword is a `help` request for that
 * topic: the user is asked what they want to know about it.
 */
export type Intent =
    | { kind: 'greeting'; variant: 'hello' | 'farewell' }
    | { kind: 'help'; variant: 'capabilities' | 'identity' }
    | { kind: 'help'; variant: 'topic'; topic: Topic }
    | { kind: 'technical'; precheckSimilarity: number }
    | {
          kind: 'outOfScope';
          reason: 'lowRelevance' | 'embeddingFailed' | 'emptyIndex' | 'unavailable';
      };

export type IntentKind = Intent['kind'];

// ============================================================================
// Conversation Types
// ============================================================================

/**
 * One question/answer exchange within a session.
 */
export interface ConversationTurn {
    id: string;
    query: string;
    expandedQuery: string;
    intent: IntentKind;
    answer: string;
    citedChunkIds: string[];
    /** Entities the answer cited, most relevant first */
    entities: string[];
    language: LanguageCode;
    timestamp: Date;
}

/**
 * Rolling history of one session, oldest turn first.
 */
export interface ConversationContext {
    sessionId: string;
    turns: ConversationTurn[];
    createdAt: Date;
    lastActivityAt: Date;
}

// ============================================================================
// Retrieval Types
// ============================================================================

export type RetrievalStatus =
    | 'ok'
    | 'empty'
    | 'timeout'
    | 'indexUnavailable'
    | 'embeddingFailed';

export interface RetrievedChunk {
    chunkId: string;
    documentId: string;
    /** Cosine similarity to the query */
    similarity: number;
    /** Similarity plus metadata boosts; the ranking key */
    score: number;
    /** 1-based position after re-ranking */
    rank: number;
    chunk: Chunk;
}

export interface RetrievalResult {
    status: RetrievalStatus;
    items: RetrievedChunk[];
}

// ============================================================================
// Query Types
// ============================================================================

/**
 * Result of query validation.
 */
export interface ValidationResult {
    valid: boolean;
    error?: string;
}

// ============================================================================
// Answer Types
// ============================================================================

export interface Answer {
    text: string;
    citedChunkIds: string[];
    confidence: number;
}

// ============================================================================
// Session Storage Types (JSON serialization)
// ============================================================================

/**
 * Session format for JSON persistence.
 * Dates are stored as ISO strings.
 */
export interface StoredSession {
    sessionId: string;
    createdAt: string; // ISO date
    lastActivityAt: string; // ISO date
    turns: StoredTurn[];
}

export interface StoredTurn extends Omit<ConversationTurn, 'timestamp'> {
    timestamp: string; // ISO date
}

// ============================================================================
// API Types
// ============================================================================

/**
 * Response body for POST /api/query
 */
export interface QueryResponse {
    session_id: string;
    text: string;
    cited_chunk_ids: string[];
    confidence: number;
    intent: IntentKind;
}

/**
 * Response body for POST /api/ingest
 */
export interface IngestResponse {
    document_id: string;
    chunk_ids: string[];
    skipped_chunk_ids: string[];
}

/**
 * Response body for GET /api/health
 */
export interface HealthResponse {
    status: 'ok' | 'starting' | 'error';
    indexReady: boolean;
    embeddingModel: string;
    documents: number;
    chunks: number;
    indexedChunks: number;
    sessions: number;
}

/**
 * One entry of GET /api/documents
 */
export interface DocumentSummary {
    document_id: string;
    title: string | null;
    language: LanguageCode;
    category: DocumentCategory;
    tags: string[];
    chunk_count: number;
    ingested_at: string;
}

/**
 * Response body for GET /api/documents
 */
export interface DocumentListResponse {
    total: number;
    documents: DocumentSummary[];
}

/**
 * Response body for GET /api/stats
 */
export interface StatsResponse {
    total_documents: number;
    total_chunks: number;
    indexed_chunks: number;
    languages: Partial<Record<LanguageCode, number>>;
    categories: Partial<Record<DocumentCategory, number>>;
    embedding_model: string;
    index_ready: boolean;
    sessions: number;
}

/**
 * Error body returned by every endpoint.
 */
export interface ErrorResponse {
    error: string;
    code: string;
    details?: Record<string, unknown>;
}
