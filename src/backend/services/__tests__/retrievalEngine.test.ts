/**
 * Retrieval Engine Tests
 *
 * Threshold, ordering, language filtering, metadata boosts and the failure
 * statuses.
 */

import { Chunk } from '../../../shared/types';
import { RequestCancelledError } from '../../errors';
import { EmbeddingIndexer } from '../embeddingIndexer';
import { compareRetrieved, createRetrievalEngine, RetrievalConfig } from '../retrievalEngine';
import { makeChunk, ScriptedProvider } from './helpers';

const NO_BOOSTS: Partial<RetrievalConfig> = {
    categoryBoost: 0,
    titleBoost: 0,
    languageBoost: 0,
    recencyBoost: 0,
};

const VECTORS: Record<string, number[]> = {
    query: [1, 0, 0],
    'braking regulation': [1, 0, 0],
    'braking distance': [1, 0, 0],
    'what is the gauge': [1, 0, 0],
    exact: [1, 0, 0],
    'exact again': [1, 0, 0],
    close: [0.8, 0.6, 0],
    unrelated: [0, 1, 0],
};

const JAN = new Date('2024-01-01T00:00:00.000Z');
const JUN = new Date('2024-06-01T00:00:00.000Z');

describe('RetrievalEngine', () => {
    let provider: ScriptedProvider;
    let indexer: EmbeddingIndexer;
    let chunks: Map<string, Chunk>;

    beforeEach(() => {
        provider = new ScriptedProvider(VECTORS);
        indexer = new EmbeddingIndexer(provider);
        indexer.init();
        chunks = new Map();
    });

    async function add(...added: Chunk[]): Promise<void> {
        for (const chunk of added) {
            chunks.set(chunk.id, chunk);
        }
        await indexer.embedAndIndexMany(added);
    }

    function engine(config: Partial<RetrievalConfig> = NO_BOOSTS) {
        return createRetrievalEngine(indexer, { getChunk: (id) => chunks.get(id) }, config);
    }

    describe('ranking', () => {
        beforeEach(async () => {
            await add(
                makeChunk({ documentId: 'a', index: 0, text: 'exact' }),
                makeChunk({ documentId: 'b', index: 0, text: 'close' }),
                makeChunk({ documentId: 'c', index: 0, text: 'unrelated' })
            );
        });

        it('should return chunks above the threshold, best first, with ranks', async () => {
            const result = await engine().retrieve('query', 5, 0.3);

            expect(result.status).toBe('ok');
            expect(result.items.map((item) => [item.chunkId, item.rank])).toEqual([
                ['a#0', 1],
                ['b#0', 2],
            ]);
            expect(result.items[0]?.similarity).toBeCloseTo(1, 10);
            expect(result.items[1]?.similarity).toBeCloseTo(0.8, 10);
            expect(result.items[1]?.chunk.text).toBe('close');
        });

        it('should return at most k chunks', async () => {
            const result = await engine().retrieve('query', 1, 0);

            expect(result.items.map((item) => item.chunkId)).toEqual(['a#0']);
        });

        it('should report empty when nothing reaches the threshold', async () => {
            expect(await engine().retrieve('query', 5, 1.01)).toEqual({ status: 'empty', items: [] });
        });

        it('should report empty for k <= 0 without embedding', async () => {
            expect(await engine().retrieve('query', 0, 0)).toEqual({ status: 'empty', items: [] });
            expect(provider.embedCalls).toEqual([]);
        });

        it('should drop hits whose chunk is no longer stored', async () => {
            chunks.delete('a#0');

            const result = await engine().retrieve('query', 5, 0.3);

            expect(result.items.map((item) => item.chunkId)).toEqual(['b#0']);
        });
    });

    describe('tie-breaks', () => {
        it('should order equal scores by newer document, then chunk id', async () => {
            await add(
                makeChunk({ documentId: 'a', index: 0, text: 'exact' }, { ingestedAt: JAN }),
                makeChunk({ documentId: 'a', index: 1, text: 'exact again' }, { ingestedAt: JAN }),
                makeChunk({ documentId: 'z', index: 0, text: 'exact' }, { ingestedAt: JUN })
            );

            const result = await engine().retrieve('query', 5, 0.3);

            expect(result.items.map((item) => item.chunkId)).toEqual(['z#0', 'a#0', 'a#1']);
        });

        it('should compare by score before similarity', () => {
            const base = makeChunk();
            const item = (chunkId: string, similarity: number, score: number) => ({
                chunkId,
                documentId: 'doc-1',
                similarity,
                score,
                rank: 0,
                chunk: base,
            });

            expect(compareRetrieved(item('x', 0.5, 0.9), item('y', 0.8, 0.8))).toBeLessThan(0);
            expect(compareRetrieved(item('x', 0.5, 0.8), item('y', 0.8, 0.8))).toBeGreaterThan(0);
            expect(compareRetrieved(item('x', 0.8, 0.8), item('y', 0.8, 0.8))).toBeLessThan(0);
        });
    });

    describe('language filter', () => {
        it('should search only the stated language', async () => {
            await add(
                makeChunk({ documentId: 'en-doc', index: 0, text: 'exact' }, { language: 'en' }),
                makeChunk({ documentId: 'nb-doc', index: 0, text: 'close' }, { language: 'nb' })
            );

            const result = await engine().retrieve('query', 5, 0.3, { language: 'nb' });

            expect(result.items.map((item) => item.chunkId)).toEqual(['nb-doc#0']);
        });

        it('should report empty when the stated language has no documents', async () => {
            await add(makeChunk({ documentId: 'en-doc', index: 0, text: 'exact' }, { language: 'en' }));

            expect(await engine().retrieve('query', 5, 0.3, { language: 'nb' })).toEqual({
                status: 'empty',
                items: [],
            });
        });
    });

    describe('boosts', () => {
        it('should boost the category the query is about', async () => {
            await add(
                makeChunk({ documentId: 'p', index: 0, text: 'exact' }, { category: 'project' }),
                makeChunk({ documentId: 'r', index: 0, text: 'close' }, { category: 'regulation' })
            );

            const result = await engine({ ...NO_BOOSTS, categoryBoost: 0.3 }).retrieve('braking regulation', 5, 0.3);

            expect(result.items.map((item) => item.chunkId)).toEqual(['r#0', 'p#0']);
            expect(result.items[0]?.score).toBeCloseTo(1.1, 10);
            expect(result.items[1]?.score).toBeCloseTo(1, 10);
        });

        it('should boost by the share of query terms in the title', async () => {
            await add(makeChunk({ documentId: 't', index: 0, text: 'exact' }, { title: 'Braking rules' }));

            const result = await engine({ ...NO_BOOSTS, titleBoost: 0.4 }).retrieve('braking distance', 5, 0.3);

            expect(result.items[0]?.score).toBeCloseTo(1.2, 10);
        });

        it('should boost the detected query language', async () => {
            await add(
                makeChunk({ documentId: 'a', index: 0, text: 'exact' }, { language: 'nb' }),
                makeChunk({ documentId: 'b', index: 0, text: 'exact again' }, { language: 'en' })
            );

            const result = await engine({ ...NO_BOOSTS, languageBoost: 0.05 }).retrieve('what is the gauge', 5, 0.3);

            expect(result.items.map((item) => item.chunkId)).toEqual(['b#0', 'a#0']);
            expect(result.items[0]?.score).toBeCloseTo(1.05, 10);
        });

        it('should boost newer documents relative to the candidates', async () => {
            await add(
                makeChunk({ documentId: 'a', index: 0, text: 'exact' }, { ingestedAt: JAN }),
                makeChunk({ documentId: 'z', index: 0, text: 'exact again' }, { ingestedAt: JUN })
            );

            const result = await engine({ ...NO_BOOSTS, recencyBoost: 0.02 }).retrieve('query', 5, 0.3);

            expect(result.items.map((item) => [item.chunkId, item.score])).toEqual([
                ['z#0', 1.02],
                ['a#0', 1],
            ]);
        });
    });

    describe('failures', () => {
        beforeEach(async () => {
            await add(makeChunk({ documentId: 'a', index: 0, text: 'exact' }));
        });

        it('should report a timeout', async () => {
            provider.delayMs = 50;

            expect(await engine({ ...NO_BOOSTS, timeoutMs: 5 }).retrieve('query', 5, 0.3)).toEqual({
                status: 'timeout',
                items: [],
            });
        });

        it('should report an embedding failure', async () => {
            expect(await engine().retrieve('no vector', 5, 0.3)).toEqual({ status: 'embeddingFailed', items: [] });
        });

        it('should report an unavailable index', async () => {
            await indexer.close();

            expect(await engine().retrieve('query', 5, 0.3)).toEqual({ status: 'indexUnavailable', items: [] });
        });

        it('should throw when the caller cancels', async () => {
            const controller = new AbortController();
            controller.abort();

            await expect(engine().retrieve('query', 5, 0.3, { signal: controller.signal })).rejects.toBeInstanceOf(
                RequestCancelledError
            );
        });
    });
});
