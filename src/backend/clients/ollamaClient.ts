/**
 * Ollama Client
 *
 * Wrapper for computing embeddings on a local Ollama instance.
 *
 * Ollama API endpoints used:
 * - GET /api/tags - List available models (used for health check)
 * - POST /api/embed - Embed a batch of texts in one call
 * - POST /api/embeddings - Embed a single text
 */

/**
 * Configuration for the Ollama client.
 */
export interface OllamaClientConfig {
    /** Base URL for Ollama API (default: http://localhost:11434) */
    baseUrl: string;
    /** Model used for embeddings */
    embeddingModel: string;
    /** Request timeout in milliseconds */
    timeoutMs: number;
}

export const DEFAULT_OLLAMA_CONFIG: OllamaClientConfig = {
    baseUrl: 'http://localhost:11434',
    embeddingModel: 'nomic-embed-text',
    timeoutMs: 30000,
};

/**
 * Custom error class for Ollama-specific errors.
 */
export class OllamaError extends Error {
    constructor(
        message: string,
        public readonly code: OllamaErrorCode,
        public readonly cause?: Error
    ) {
        super(message);
        this.name = 'OllamaError';
    }
}

/**
 * Error codes for different failure scenarios.
 */
export enum OllamaErrorCode {
    /** Ollama service is not running or unreachable */
    CONNECTION_REFUSED = 'CONNECTION_REFUSED',
    /** Request took too long */
    TIMEOUT = 'TIMEOUT',
    /** The caller aborted the request */
    ABORTED = 'ABORTED',
    /** Requested model is not available */
    MODEL_NOT_FOUND = 'MODEL_NOT_FOUND',
    /** Ollama returned an error response */
    API_ERROR = 'API_ERROR',
    /** Response body did not have the expected shape */
    INVALID_RESPONSE = 'INVALID_RESPONSE',
    /** Unexpected error during communication */
    UNKNOWN = 'UNKNOWN',
}

/**
 * Interface defining the Ollama client contract.
 */
export interface IOllamaClient {
    readonly embeddingModel: string;
    isAvailable(): Promise<boolean>;
    generateEmbedding(text: string, signal?: AbortSignal): Promise<number[]>;
    generateEmbeddings(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}

function isNumberArray(value: unknown): value is number[] {
    return Array.isArray(value) && value.every((n) => typeof n === 'number');
}

function readErrorField(body: unknown): string | undefined {
    if (typeof body === 'object' && body !== null && 'error' in body) {
        const { error } = body;
        return typeof error === 'string' ? error : undefined;
    }
    return undefined;
}

/**
 * Ollama Client Implementation
 */
export class OllamaClient implements IOllamaClient {
    private readonly config: OllamaClientConfig;

    constructor(config: Partial<OllamaClientConfig> = {}) {
        this.config = { ...DEFAULT_OLLAMA_CONFIG, ...config };
    }

    get embeddingModel(): string {
        return this.config.embeddingModel;
    }

    /**
     * Check if Ollama is available and responding.
     *
     * @returns true if Ollama is available, false otherwise
     */
    async isAvailable(): Promise<boolean> {
        try {
            const response = await this.fetchWithTimeout(
                `${this.config.baseUrl}/api/tags`,
                { method: 'GET' },
                5000 // Short timeout for health checks
            );
            return response.ok;
        } catch {
            // Any error means Ollama is not available
            return false;
        }
    }

    /**
     * Generate an embedding vector for the given text.
     *
     * @throws OllamaError if embedding generation fails
     */
    async generateEmbedding(text: string, signal?: AbortSignal): Promise<number[]> {
        try {
            const response = await this.fetchWithTimeout(
                `${this.config.baseUrl}/api/embeddings`,
                {
                    method: 'POST',
                    headers: { 'Content-Type': 'application/json' },
                    body: JSON.stringify({
                        model: this.config.embeddingModel,
                        prompt: text,
                    }),
                },
                this.config.timeoutMs,
                signal
            );

            if (!response.ok) {
                await this.handleErrorResponse(response);
            }

            const data: unknown = await response.json();
            if (
                typeof data !== 'object' ||
                data === null ||
                !('embedding' in data) ||
                !isNumberArray(data.embedding)
            ) {
                throw new OllamaError(
                    'Ollama returned no embedding',
                    OllamaErrorCode.INVALID_RESPONSE
                );
            }
            return data.embedding;
        } catch (error) {
            throw this.wrapError(error, 'Failed to generate embedding');
        }
    }

    /**
     * Embed several texts with one request to /api/embed.
     * The returned vectors are in input order.
     */
    async generateEmbeddings(texts: string[], signal?: AbortSignal): Promise<number[][]> {
        if (texts.length === 0) {
            return [];
        }

        try {
            const response = await this.fetchWithTimeout(
                `${this.config.baseUrl}/api/embed`,
                {
                    method: 'POST',
                    headers: { 'Content-Type': 'application/json' },
                    body: JSON.stringify({
                        model: this.config.embeddingModel,
                        input: texts,
                    }),
                },
                this.config.timeoutMs,
                signal
            );

            if (!response.ok) {
                await this.handleErrorResponse(response);
            }

            const data: unknown = await response.json();
            if (
                typeof data !== 'object' ||
                data === null ||
                !('embeddings' in data) ||
                !Array.isArray(data.embeddings) ||
                data.embeddings.length !== texts.length ||
                !data.embeddings.every(isNumberArray)
            ) {
                throw new OllamaError(
                    `Ollama returned an unexpected batch for ${texts.length} inputs`,
                    OllamaErrorCode.INVALID_RESPONSE
                );
            }
            return data.embeddings;
        } catch (error) {
            throw this.wrapError(error, 'Failed to generate embeddings');
        }
    }

    /**
     * Fetch with timeout support, also honouring a caller's abort signal.
     */
    private async fetchWithTimeout(
        url: string,
        options: RequestInit,
        timeoutMs: number,
        signal?: AbortSignal
    ): Promise<Response> {
        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
        const onCallerAbort = (): void => controller.abort();
        signal?.addEventListener('abort', onCallerAbort, { once: true });

        try {
            return await fetch(url, {
                ...options,
                signal: controller.signal,
            });
        } catch (error) {
            if (error instanceof Error && error.name === 'AbortError') {
                if (signal?.aborted) {
                    throw new OllamaError('Request aborted by caller', OllamaErrorCode.ABORTED);
                }
                throw new OllamaError(
                    `Request timed out after ${timeoutMs}ms`,
                    OllamaErrorCode.TIMEOUT
                );
            }
            throw error;
        } finally {
            clearTimeout(timeoutId);
            signal?.removeEventListener('abort', onCallerAbort);
        }
    }

    /**
     * Handle non-OK HTTP responses from Ollama.
     */
    private async handleErrorResponse(response: Response): Promise<never> {
        let errorMessage: string;

        try {
            const errorBody: unknown = await response.json();
            errorMessage = readErrorField(errorBody) ?? `HTTP ${response.status}`;
        } catch {
            errorMessage = `HTTP ${response.status}: ${response.statusText}`;
        }

        const model = this.config.embeddingModel;
        if (response.status === 404 || errorMessage.includes('not found')) {
            throw new OllamaError(
                `Model "${model}" not found. Please run: ollama pull ${model}`,
                OllamaErrorCode.MODEL_NOT_FOUND
            );
        }

        throw new OllamaError(`Ollama API error: ${errorMessage}`, OllamaErrorCode.API_ERROR);
    }

    /**
     * Wrap errors in OllamaError for consistent error handling.
     */
    private wrapError(error: unknown, context: string): OllamaError {
        if (error instanceof OllamaError) {
            return error;
        }

        // Connection errors (Ollama not running)
        if (error instanceof TypeError && error.message.includes('fetch')) {
            return new OllamaError(
                'Cannot connect to Ollama. Please ensure Ollama is running (ollama serve)',
                OllamaErrorCode.CONNECTION_REFUSED,
                error
            );
        }

        const message = error instanceof Error ? error.message : String(error);
        return new OllamaError(
            `${context}: ${message}`,
            OllamaErrorCode.UNKNOWN,
            error instanceof Error ? error : undefined
        );
    }
}

/**
 * Factory function to create an Ollama client with default configuration.
 */
export function createOllamaClient(config?: Partial<OllamaClientConfig>): OllamaClient {
    return new OllamaClient(config);
}
