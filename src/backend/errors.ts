/**
 * Error taxonomy for the assistant core.
 *
 * Every error carries an `ErrorCode` so the request layer and the query
 * pipeline can branch on the failure kind without string matching.
 */

import { logger } from './logger';

export enum ErrorCode {
    /** Document text is below the minimum length */
    DOCUMENT_TOO_SHORT = 'DOCUMENT_TOO_SHORT',
    /** Document language is not in the configured set */
    UNSUPPORTED_LANGUAGE = 'UNSUPPORTED_LANGUAGE',
    /** Document is missing an id or carries an unknown category */
    MALFORMED_DOCUMENT = 'MALFORMED_DOCUMENT',
    /** The embedding model could not encode a text */
    EMBEDDING_FAILED = 'EMBEDDING_FAILED',
    /** The vector index is not loaded or has been closed */
    INDEX_UNAVAILABLE = 'INDEX_UNAVAILABLE',
    /** The persisted index could not be read back */
    INDEX_CORRUPTED = 'INDEX_CORRUPTED',
    /** Embedding or search exceeded the configured duration */
    RETRIEVAL_TIMEOUT = 'RETRIEVAL_TIMEOUT',
    /** The caller aborted the request */
    REQUEST_CANCELLED = 'REQUEST_CANCELLED',
    /** Query text is empty or too long */
    INVALID_QUERY = 'INVALID_QUERY',
}

/**
 * Base class for all assistant errors.
 */
export class AssistantError extends Error {
    constructor(
        message: string,
        public readonly code: ErrorCode,
        public readonly details: Record<string, unknown> = {},
        public readonly cause?: Error
    ) {
        super(message);
        this.name = 'AssistantError';
    }
}

export type IngestionErrorCode =
    | ErrorCode.DOCUMENT_TOO_SHORT
    | ErrorCode.UNSUPPORTED_LANGUAGE
    | ErrorCode.MALFORMED_DOCUMENT;

/**
 * A document was rejected before any chunk was committed.
 */
export class IngestionError extends AssistantError {
    constructor(
        message: string,
        code: IngestionErrorCode,
        details: Record<string, unknown> = {}
    ) {
        super(message, code, details);
        this.name = 'IngestionError';
    }
}

export class EmbeddingFailedError extends AssistantError {
    constructor(message: string, details: Record<string, unknown> = {}, cause?: Error) {
        super(message, ErrorCode.EMBEDDING_FAILED, details, cause);
        this.name = 'EmbeddingFailedError';
    }
}

export class IndexUnavailableError extends AssistantError {
    constructor(message = 'Vector index is not available') {
        super(message, ErrorCode.INDEX_UNAVAILABLE);
        this.name = 'IndexUnavailableError';
    }
}

export class IndexCorruptedError extends AssistantError {
    constructor(message: string, details: Record<string, unknown> = {}, cause?: Error) {
        super(message, ErrorCode.INDEX_CORRUPTED, details, cause);
        this.name = 'IndexCorruptedError';
    }
}

export class RetrievalTimeoutError extends AssistantError {
    constructor(timeoutMs: number) {
        super(`Retrieval timed out after ${timeoutMs}ms`, ErrorCode.RETRIEVAL_TIMEOUT, {
            timeoutMs,
        });
        this.name = 'RetrievalTimeoutError';
    }
}

export class RequestCancelledError extends AssistantError {
    constructor(message = 'Request was cancelled') {
        super(message, ErrorCode.REQUEST_CANCELLED);
        this.name = 'RequestCancelledError';
    }
}

export class InvalidQueryError extends AssistantError {
    constructor(message: string) {
        super(message, ErrorCode.INVALID_QUERY);
        this.name = 'InvalidQueryError';
    }
}

/**
 * Throws `RequestCancelledError` when the signal has fired.
 */
export function throwIfCancelled(signal?: AbortSignal): void {
    if (signal?.aborted) {
        throw new RequestCancelledError();
    }
}

/**
 * Races `work` against a timer and an optional caller signal.
 *
 * The timer fires `RetrievalTimeoutError`; the caller's signal fires
 * `RequestCancelledError`. The signal handed to `work` aborts in both cases
 * so downstream fetches stop as well.
 */
export async function withTimeout<T>(
    work: (signal: AbortSignal) => Promise<T>,
    timeoutMs: number,
    callerSignal?: AbortSignal
): Promise<T> {
    throwIfCancelled(callerSignal);

    const controller = new AbortController();
    let rejectTimeout: (error: Error) => void = () => undefined;
    let rejectCancelled: (error: Error) => void = () => undefined;
    const timeout = new Promise<never>((_, reject) => {
        rejectTimeout = reject;
    });
    const cancelled = new Promise<never>((_, reject) => {
        rejectCancelled = reject;
    });

    const timeoutId = setTimeout(() => {
        controller.abort();
        rejectTimeout(new RetrievalTimeoutError(timeoutMs));
    }, timeoutMs);
    const onAbort = (): void => {
        controller.abort();
        rejectCancelled(new RequestCancelledError());
    };
    callerSignal?.addEventListener('abort', onAbort, { once: true });

    const running = work(controller.signal);
    // A late rejection from work that already lost the race is only logged.
    void running.catch((error: unknown) => {
        if (controller.signal.aborted) {
            logger.debug('Abandoned retrieval work failed', error);
        }
    });

    try {
        return await Promise.race([running, timeout, cancelled]);
    } finally {
        clearTimeout(timeoutId);
        callerSignal?.removeEventListener('abort', onAbort);
    }
}
