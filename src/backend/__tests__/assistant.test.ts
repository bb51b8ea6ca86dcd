/**
 * Assistant Runtime Tests
 *
 * Startup against a data directory: restoring, rebuilding and reconciling
 * the index, seeding, and shutdown.
 */

import * as fs from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { IOllamaClient } from '../clients/ollamaClient';
import { Assistant, createAssistant } from '../assistant';
import { loadConfig } from '../config';
import { IndexCorruptedError } from '../errors';
import { createDocumentStore } from '../services/documentStore';
import { EmbeddingIndexer } from '../services/embeddingIndexer';
import { HashingEmbedder } from '../services/embeddingProvider';

const REGULATION = {
    id: 'doc',
    text: 'Regulation ETCS-12: minimum braking distance is 400m.',
    language: 'en',
    category: 'regulation',
};

describe('Assistant', () => {
    let dataDir: string;
    const started: Assistant[] = [];

    function assistant(env: NodeJS.ProcessEnv = {}, ollamaClient?: IOllamaClient): Assistant {
        const created = createAssistant(loadConfig({ DATA_DIR: dataDir, ...env }), { ollamaClient });
        started.push(created);
        return created;
    }

    beforeEach(() => {
        dataDir = path.join(process.cwd(), 'data', 'test-assistant', uuidv4());
    });

    afterEach(async () => {
        await Promise.all(started.splice(0).map((created) => created.close()));
        fs.rmSync(dataDir, { recursive: true, force: true });
    });

    describe('init', () => {
        it('should start with an empty knowledge base', async () => {
            const a = assistant();
            expect(a.health().status).toBe('starting');

            const report = await a.init();

            expect(report).toEqual({
                index: 'rebuildRequired',
                documents: 0,
                reindexedChunks: 0,
                droppedEntries: 0,
                seed: null,
            });
            expect(a.state).toBe('ready');
            expect(a.health()).toEqual({
                status: 'ok',
                indexReady: true,
                embeddingModel: 'hashing-fnv1a-v1/384',
                documents: 0,
                chunks: 0,
                indexedChunks: 0,
                sessions: 0,
            });
            expect(fs.existsSync(path.join(dataDir, 'index.json'))).toBe(true);
        });

        it('should refuse to start twice', async () => {
            const a = assistant();
            await a.init();

            await expect(a.init()).rejects.toThrow('Assistant cannot be started from state "ready"');
        });

        it('should restore documents and the index after a restart', async () => {
            const first = assistant();
            await first.init();
            await first.ingest(REGULATION);
            await first.close();

            const second = assistant();
            const report = await second.init();

            expect(report).toMatchObject({ index: 'loaded', documents: 1, reindexedChunks: 0, droppedEntries: 0 });
            expect(second.health()).toMatchObject({ documents: 1, chunks: 1, indexedChunks: 1 });

            const outcome = await second.query({ sessionId: 's1', text: 'What is the minimum braking distance under ETCS-12?' });
            expect(outcome.answer.citedChunkIds).toEqual(['doc#0']);
        });

        it('should re-embed everything when the model changes', async () => {
            const first = assistant();
            await first.init();
            await first.ingest(REGULATION);
            await first.close();

            const second = assistant({ EMBEDDING_DIMENSION: '64' });
            const report = await second.init();

            expect(report).toMatchObject({ index: 'rebuildRequired', reindexedChunks: 1 });
            expect(second.health().embeddingModel).toBe('hashing-fnv1a-v1/64');
        });

        it('should drop entries of documents that are gone and embed chunks that are missing', async () => {
            const first = assistant();
            await first.init();
            await first.ingest(REGULATION);
            await first.close();

            const documentsDir = path.join(dataDir, 'documents');
            fs.rmSync(path.join(documentsDir, 'doc.json'));
            const scratchIndexer = new EmbeddingIndexer(new HashingEmbedder());
            scratchIndexer.init();
            await createDocumentStore(scratchIndexer, { storagePath: documentsDir }).ingest({
                ...REGULATION,
                id: 'added',
            });

            const second = assistant();
            const report = await second.init();

            expect(report).toMatchObject({ index: 'loaded', documents: 1, reindexedChunks: 1, droppedEntries: 1 });
            expect(second.indexer.chunkIds()).toEqual(['added#0']);
        });

        it('should fail on a corrupted index unless rebuilding is allowed', async () => {
            fs.mkdirSync(dataDir, { recursive: true });
            fs.writeFileSync(path.join(dataDir, 'index.json'), 'garbage');

            const strict = assistant();
            await expect(strict.init()).rejects.toBeInstanceOf(IndexCorruptedError);
            expect(strict.state).toBe('failed');
            expect(strict.health().status).toBe('error');

            const lenient = assistant({ REBUILD_INDEX: 'true' });
            expect((await lenient.init()).index).toBe('rebuildRequired');
        });

        it('should ingest the seed directory once', async () => {
            const seedDir = path.join(dataDir, 'seed');
            fs.mkdirSync(seedDir, { recursive: true });
            fs.writeFileSync(path.join(seedDir, 'regulations.json'), JSON.stringify([REGULATION]));

            const first = assistant({ SEED_DIR: seedDir });
            expect((await first.init()).seed).toEqual({ ingested: ['doc'], unchanged: [], failed: [] });
            await first.close();

            const second = assistant({ SEED_DIR: seedDir });
            expect((await second.init()).seed).toEqual({ ingested: [], unchanged: ['doc'], failed: [] });
        });

        it('should start while Ollama is unreachable', async () => {
            const offline: IOllamaClient = {
                embeddingModel: 'nomic-embed-text',
                isAvailable: async () => false,
                generateEmbedding: async () => [],
                generateEmbeddings: async () => [],
            };

            const a = assistant({ EMBEDDING_PROVIDER: 'ollama' }, offline);
            await a.init();

            expect(a.health()).toMatchObject({ status: 'ok', embeddingModel: 'ollama/nomic-embed-text' });
        });
    });

    describe('sessions', () => {
        it('should keep sessions across a restart when persistence is on', async () => {
            const first = assistant({ PERSIST_SESSIONS: 'true' });
            await first.init();
            await first.query({ sessionId: 's1', text: 'hello' });
            await first.close();

            const second = assistant({ PERSIST_SESSIONS: 'true' });
            await second.init();

            expect(second.health().sessions).toBe(1);
            expect(second.contexts.getContext('s1').turns).toHaveLength(1);
        });
    });

    describe('close', () => {
        it('should make the assistant unavailable', async () => {
            const a = assistant();
            await a.init();
            await a.close();
            await a.close();

            expect(a.state).toBe('closed');
            expect(a.health()).toMatchObject({ status: 'error', indexReady: false });
        });
    });
});
