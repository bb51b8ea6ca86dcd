/**
 * Application configuration
 *
 * Environment variables are parsed once with a zod schema into an
 * `AppConfig`. `.env` is loaded by `loadEnvFile()` at bootstrap; tests pass
 * their own env object to `loadConfig()` instead.
 */

import dotenv from 'dotenv';
import * as path from 'path';
import { z } from 'zod';
import { LanguageCode } from '../shared/types';
import { LogLevel } from './logger';

// Unset and empty variables both fall back to the default
const blankAsUndefined = (value: unknown): unknown =>
    typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalString = z.preprocess(blankAsUndefined, z.string().trim().optional());

const booleanFlag = (fallback: boolean) =>
    z.preprocess(
        blankAsUndefined,
        z
            .enum(['true', 'false', '1', '0', 'yes', 'no', 'on', 'off'])
            .optional()
            .transform((value) =>
                value === undefined ? fallback : ['true', '1', 'yes', 'on'].includes(value)
            )
    );

const number = (schema: z.ZodNumber, fallback: number) =>
    z.preprocess(blankAsUndefined, z.coerce.number().pipe(schema).default(fallback));

const languageSchema = z.enum(['nb', 'en']);

const languageList = z.preprocess(
    blankAsUndefined,
    z
        .string()
        .default('nb,en')
        .transform((value) =>
            value
                .split(',')
                .map((code) => code.trim())
                .filter((code) => code.length > 0)
        )
        .pipe(z.array(languageSchema).min(1))
);

export const envSchema = z.object({
    PORT: number(z.number().int().min(0).max(65535), 3001),
    CORS_ORIGIN: optionalString,
    DATA_DIR: optionalString,
    SUPPORTED_LANGUAGES: languageList,
    DEFAULT_LANGUAGE: z.preprocess(blankAsUndefined, languageSchema.default('nb')),
    EMBEDDING_PROVIDER: z.preprocess(blankAsUndefined, z.enum(['hashing', 'ollama']).default('hashing')),
    OLLAMA_BASE_URL: z.preprocess(blankAsUndefined, z.string().url().default('http://localhost:11434')),
    OLLAMA_EMBEDDING_MODEL: z.preprocess(blankAsUndefined, z.string().default('nomic-embed-text')),
    EMBEDDING_DIMENSION: optionalString.pipe(
        z.coerce.number().int().positive().optional()
    ),
    CHUNK_SIZE: number(z.number().int().min(100).max(20000), 1500),
    CHUNK_OVERLAP_RATIO: number(z.number().min(0).max(0.5), 0.15),
    MIN_DOCUMENT_LENGTH: number(z.number().int().min(1), 20),
    TOP_K: number(z.number().int().min(1).max(100), 5),
    MIN_RELEVANCE: number(z.number().min(-1).max(1), 0.3),
    PRECHECK_MIN_RELEVANCE: number(z.number().min(-1).max(1), 0.15),
    RETRIEVAL_TIMEOUT_MS: number(z.number().int().positive(), 2000),
    SESSION_MAX_TURNS: number(z.number().int().min(1), 10),
    SESSION_IDLE_TIMEOUT_MS: number(z.number().int().positive(), 30 * 60 * 1000),
    PERSIST_SESSIONS: booleanFlag(false),
    SEED_DIR: optionalString,
    REBUILD_INDEX: booleanFlag(false),
    LOG_LEVEL: z.preprocess(
        blankAsUndefined,
        z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info')
    ),
});

export type EnvConfig = z.infer<typeof envSchema>;

export type EmbeddingProviderKind = 'hashing' | 'ollama';

export interface AppConfig {
    port: number;
    corsOrigin: string;
    dataDir: string;
    supportedLanguages: LanguageCode[];
    defaultLanguage: LanguageCode;
    embedding: {
        provider: EmbeddingProviderKind;
        dimension: number;
        ollamaBaseUrl: string;
        ollamaModel: string;
    };
    chunking: {
        chunkSize: number;
        overlapRatio: number;
    };
    minDocumentLength: number;
    topK: number;
    minRelevance: number;
    precheckMinRelevance: number;
    retrievalTimeoutMs: number;
    session: {
        maxTurns: number;
        idleTimeoutMs: number;
        persist: boolean;
    };
    seedDir: string | null;
    rebuildIndex: boolean;
    logLevel: LogLevel;
}

/**
 * Raised when the environment does not satisfy the schema.
 */
export class ConfigError extends Error {
    constructor(public readonly problems: string[]) {
        super(`Invalid environment variables:\n${problems.map((p) => `  - ${p}`).join('\n')}`);
        this.name = 'ConfigError';
    }
}

/**
 * Loads `.env` from the working directory into `process.env`.
 * Variables already set in the environment win.
 */
export function loadEnvFile(): void {
    dotenv.config();
}

/**
 * Parses environment variables into the application configuration.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const result = envSchema.safeParse(env);
    if (!result.success) {
        throw new ConfigError(
            result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        );
    }
    const e = result.data;

    if (!e.SUPPORTED_LANGUAGES.includes(e.DEFAULT_LANGUAGE)) {
        throw new ConfigError([
            `DEFAULT_LANGUAGE: "${e.DEFAULT_LANGUAGE}" is not in SUPPORTED_LANGUAGES`,
        ]);
    }

    return {
        port: e.PORT,
        corsOrigin: e.CORS_ORIGIN ?? '*',
        dataDir: path.resolve(e.DATA_DIR ?? path.join(process.cwd(), 'data')),
        supportedLanguages: e.SUPPORTED_LANGUAGES,
        defaultLanguage: e.DEFAULT_LANGUAGE,
        embedding: {
            provider: e.EMBEDDING_PROVIDER,
            dimension: e.EMBEDDING_DIMENSION ?? (e.EMBEDDING_PROVIDER === 'ollama' ? 768 : 384),
            ollamaBaseUrl: e.OLLAMA_BASE_URL,
            ollamaModel: e.OLLAMA_EMBEDDING_MODEL,
        },
        chunking: {
            chunkSize: e.CHUNK_SIZE,
            overlapRatio: e.CHUNK_OVERLAP_RATIO,
        },
        minDocumentLength: e.MIN_DOCUMENT_LENGTH,
        topK: e.TOP_K,
        minRelevance: e.MIN_RELEVANCE,
        precheckMinRelevance: e.PRECHECK_MIN_RELEVANCE,
        retrievalTimeoutMs: e.RETRIEVAL_TIMEOUT_MS,
        session: {
            maxTurns: e.SESSION_MAX_TURNS,
            idleTimeoutMs: e.SESSION_IDLE_TIMEOUT_MS,
            persist: e.PERSIST_SESSIONS,
        },
        seedDir: e.SEED_DIR ? path.resolve(e.SEED_DIR) : null,
        rebuildIndex: e.REBUILD_INDEX,
        logLevel: e.LOG_LEVEL,
    };
}
