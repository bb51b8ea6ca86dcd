/**
 * Configuration Tests
 */

import * as path from 'path';
import { ConfigError, loadConfig } from '../config';

function problemsOf(env: NodeJS.ProcessEnv): string[] {
    try {
        loadConfig(env);
    } catch (error) {
        if (error instanceof ConfigError) return error.problems;
        throw error;
    }
    throw new Error('expected a ConfigError');
}

describe('loadConfig', () => {
    it('should apply defaults for an empty environment', () => {
        expect(loadConfig({})).toEqual({
            port: 3001,
            corsOrigin: '*',
            dataDir: path.resolve(process.cwd(), 'data'),
            supportedLanguages: ['nb', 'en'],
            defaultLanguage: 'nb',
            embedding: {
                provider: 'hashing',
                dimension: 384,
                ollamaBaseUrl: 'http://localhost:11434',
                ollamaModel: 'nomic-embed-text',
            },
            chunking: { chunkSize: 1500, overlapRatio: 0.15 },
            minDocumentLength: 20,
            topK: 5,
            minRelevance: 0.3,
            precheckMinRelevance: 0.15,
            retrievalTimeoutMs: 2000,
            session: { maxTurns: 10, idleTimeoutMs: 1800000, persist: false },
            seedDir: null,
            rebuildIndex: false,
            logLevel: 'info',
        });
    });

    it('should treat blank variables as unset', () => {
        const config = loadConfig({ PORT: '', LOG_LEVEL: '  ', SEED_DIR: '' });

        expect(config.port).toBe(3001);
        expect(config.logLevel).toBe('info');
        expect(config.seedDir).toBeNull();
    });

    it('should coerce numbers, flags and lists', () => {
        const config = loadConfig({
            PORT: '8080',
            TOP_K: '3',
            MIN_RELEVANCE: '0.4',
            PERSIST_SESSIONS: 'yes',
            REBUILD_INDEX: '0',
            SUPPORTED_LANGUAGES: ' en , nb ',
            DEFAULT_LANGUAGE: 'en',
            SEED_DIR: 'seed',
        });

        expect(config.port).toBe(8080);
        expect(config.topK).toBe(3);
        expect(config.minRelevance).toBe(0.4);
        expect(config.session.persist).toBe(true);
        expect(config.rebuildIndex).toBe(false);
        expect(config.supportedLanguages).toEqual(['en', 'nb']);
        expect(config.defaultLanguage).toBe('en');
        expect(config.seedDir).toBe(path.resolve('seed'));
    });

    it('should size the embedding for the provider unless told otherwise', () => {
        expect(loadConfig({ EMBEDDING_PROVIDER: 'ollama' }).embedding.dimension).toBe(768);
        expect(loadConfig({ EMBEDDING_DIMENSION: '1024' }).embedding.dimension).toBe(1024);
    });

    it('should list every invalid variable', () => {
        const problems = problemsOf({ PORT: 'abc', TOP_K: '0', PERSIST_SESSIONS: 'maybe' });

        expect(problems).toHaveLength(3);
        expect(problems.map((problem) => problem.split(':')[0]).sort()).toEqual([
            'PERSIST_SESSIONS',
            'PORT',
            'TOP_K',
        ]);
    });

    it('should reject unknown languages', () => {
        expect(problemsOf({ SUPPORTED_LANGUAGES: 'nb,de' })[0]).toMatch(/^SUPPORTED_LANGUAGES/);
    });

    it('should require the default language to be supported', () => {
        expect(problemsOf({ SUPPORTED_LANGUAGES: 'en' })).toEqual([
            'DEFAULT_LANGUAGE: "nb" is not in SUPPORTED_LANGUAGES',
        ]);
    });
});
