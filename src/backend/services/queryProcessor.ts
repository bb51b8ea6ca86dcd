/**
 * Query Processor Service
 *
 * Runs one query through the pipeline:
 * classify -> resolve references -> retrieve -> synthesize -> record turn.
 *
 * Requests for the same session run one at a time in arrival order, so a
 * follow-up always sees the turn of the question before it. Different
 * sessions never wait on each other.
 */

import { v4 as uuidv4 } from 'uuid';
import {
    Answer,
    Intent,
    LanguageCode,
    RetrievalResult,
    RetrievedChunk,
    ValidationResult,
} from '../../shared/types';
import { InvalidQueryError, throwIfCancelled } from '../errors';
import { logger } from '../logger';
import { ContextManager, resolveReferencesIn } from './contextManager';
import { StoreCounts } from './documentStore';
import { IntentClassifier } from './intentClassifier';
import { KeyedMutex } from './keyedMutex';
import { RetrievalEngine } from './retrievalEngine';
import { ResponseSynthesizer } from './responseSynthesizer';
import { detectLanguage, extractEntities } from './textAnalysis';

/**
 * Configuration for query handling.
 */
export interface QueryProcessorConfig {
    /** Chunks fetched per retrieval */
    topK: number;
    /** Similarity a chunk must reach to count as evidence */
    minRelevance: number;
    /** Answer language when neither the request nor the text settles it */
    defaultLanguage: LanguageCode;
    maxQueryLength: number;
}

export const DEFAULT_QUERY_CONFIG: QueryProcessorConfig = {
    topK: 5,
    minRelevance: 0.3,
    defaultLanguage: 'nb',
    maxQueryLength: 2000,
};

export interface QueryRequest {
    sessionId: string;
    text: string;
    /** Stated language; also restricts retrieval to that language */
    language?: LanguageCode;
    signal?: AbortSignal;
}

export interface QueryOutcome {
    sessionId: string;
    turnId: string;
    intent: Intent;
    expandedQuery: string;
    language: LanguageCode;
    answer: Answer;
}

/**
 * Collaborators the processor needs from the knowledge base.
 */
export interface KnowledgeBaseCounts {
    counts(): StoreCounts;
}

export interface QueryProcessorDeps {
    documents: KnowledgeBaseCounts;
    classifier: IntentClassifier;
    contexts: ContextManager;
    retrieval: RetrievalEngine;
    synthesizer: ResponseSynthesizer;
}

/**
 * Validates a user query before processing.
 *
 * @param query - The user's input query string
 * @param maxLength - Longest accepted query
 * @returns ValidationResult indicating if the query is valid
 */
export function validateQuery(
    query: string | null | undefined,
    maxLength: number = DEFAULT_QUERY_CONFIG.maxQueryLength
): ValidationResult {
    if (query === null || query === undefined) {
        return {
            valid: false,
            error: 'Query is required',
        };
    }

    // trim() covers spaces, tabs, newlines and other whitespace
    const trimmedQuery = query.trim();

    if (trimmedQuery.length === 0) {
        return {
            valid: false,
            error: 'Query cannot be empty or contain only whitespace',
        };
    }

    if (trimmedQuery.length > maxLength) {
        return {
            valid: false,
            error: `Query cannot be longer than ${maxLength} characters`,
        };
    }

    return {
        valid: true,
    };
}

/**
 * Entities to remember for the next turn's reference resolution: entities
 * of the cited chunks, those the query itself names first. Falls back to
 * the cited documents' titles.
 */
export function citedEntities(queryText: string, cited: RetrievedChunk[]): string[] {
    const fromChunks: string[] = [];
    for (const item of cited) {
        for (const entity of extractEntities(item.chunk.text)) {
            if (!fromChunks.includes(entity)) fromChunks.push(entity);
        }
    }

    if (fromChunks.length === 0) {
        const titles: string[] = [];
        for (const item of cited) {
            const title = item.chunk.metadata.title;
            if (title && !titles.includes(title)) titles.push(title);
        }
        return titles;
    }

    const named = new Set(extractEntities(queryText));
    return [
        ...fromChunks.filter((entity) => named.has(entity)),
        ...fromChunks.filter((entity) => !named.has(entity)),
    ];
}

const NO_RETRIEVAL: RetrievalResult = { status: 'empty', items: [] };

export class QueryProcessor {
    private readonly config: QueryProcessorConfig;
    private readonly sessionLocks = new KeyedMutex();

    constructor(
        private readonly deps: QueryProcessorDeps,
        config: Partial<QueryProcessorConfig> = {}
    ) {
        this.config = { ...DEFAULT_QUERY_CONFIG, ...config };
    }

    /**
     * Answers a query and records the turn in the session.
     *
     * @throws InvalidQueryError for empty or oversized text
     * @throws RequestCancelledError when the signal fires; no turn is recorded
     */
    async handleQuery(request: QueryRequest): Promise<QueryOutcome> {
        const validation = validateQuery(request.text, this.config.maxQueryLength);
        if (!validation.valid) {
            throw new InvalidQueryError(validation.error ?? 'Invalid query');
        }
        const text = request.text.trim();
        const { sessionId, signal } = request;

        return this.sessionLocks.runExclusive(sessionId, async () => {
            throwIfCancelled(signal);
            const { contexts, classifier, retrieval, synthesizer, documents } = this.deps;

            const context = contexts.getContext(sessionId);
            const intent = await classifier.classify(text, context, { signal });

            const expandedQuery =
                intent.kind === 'technical' ? resolveReferencesIn(text, context) : text;
            const language =
                request.language ??
                detectLanguage(expandedQuery) ??
                context.turns.at(-1)?.language ??
                this.config.defaultLanguage;

            const result =
                intent.kind === 'technical'
                    ? await retrieval.retrieve(expandedQuery, this.config.topK, this.config.minRelevance, {
                          language: request.language,
                          signal,
                      })
                    : NO_RETRIEVAL;
            throwIfCancelled(signal);

            const answer = synthesizer.synthesize(intent, result, {
                conversation: context,
                language,
                queryText: expandedQuery,
                documentCount: documents.counts().documents,
            });

            const cited = result.items.filter((item) => answer.citedChunkIds.includes(item.chunkId));
            const turnId = uuidv4();
            contexts.appendTurn(sessionId, {
                id: turnId,
                query: text,
                expandedQuery,
                intent: intent.kind,
                answer: answer.text,
                citedChunkIds: answer.citedChunkIds,
                entities: citedEntities(expandedQuery, cited),
                language,
            });

            if (expandedQuery !== text) {
                logger.debug(`Session ${sessionId}: expanded "${text}" to "${expandedQuery}"`);
            }
            logger.debug(
                `Session ${sessionId}: intent=${intent.kind} retrieval=${result.status} ` +
                    `cited=${answer.citedChunkIds.length} confidence=${answer.confidence.toFixed(2)}`
            );

            return { sessionId, turnId, intent, expandedQuery, language, answer };
        });
    }
}

export function createQueryProcessor(
    deps: QueryProcessorDeps,
    config?: Partial<QueryProcessorConfig>
): QueryProcessor {
    return new QueryProcessor(deps, config);
}
