/**
 * Intent Classifier Tests
 */

import { ConversationContext } from '../../../shared/types';
import { RequestCancelledError } from '../../errors';
import { EmbeddingIndexer } from '../embeddingIndexer';
import { createIntentClassifier, matchRules } from '../intentClassifier';
import { makeChunk, ScriptedProvider } from './helpers';

const VECTORS: Record<string, number[]> = {
    'signal spacing': [1, 0, 0],
    'track gauge': [0, 1, 0],
    'signal spacing rules': [0.1, 0.995, 0],
};

function emptyContext(): ConversationContext {
    const now = new Date('2024-05-01T08:00:00.000Z');
    return { sessionId: 's1', turns: [], createdAt: now, lastActivityAt: now };
}

function contextCiting(entity: string): ConversationContext {
    const context = emptyContext();
    context.turns.push({
        id: 'turn-1',
        query: 'q',
        expandedQuery: 'q',
        intent: 'technical',
        answer: 'a',
        citedChunkIds: ['doc-1#0'],
        entities: [entity],
        language: 'en',
        timestamp: context.createdAt,
    });
    return context;
}

describe('matchRules', () => {
    it.each([
        ['Hello!', { kind: 'greeting', variant: 'hello' }],
        ['God morgen', { kind: 'greeting', variant: 'hello' }],
        ['hi there', { kind: 'greeting', variant: 'hello' }],
        ['thanks for the help', { kind: 'greeting', variant: 'farewell' }],
        ['Ha det bra!', { kind: 'greeting', variant: 'farewell' }],
        ['Who are you?', { kind: 'help', variant: 'identity' }],
        ['hva kan du hjelpe med?', { kind: 'help', variant: 'capabilities' }],
        ['Hi, what can you do?', { kind: 'help', variant: 'capabilities' }],
        ['etcs', { kind: 'help', variant: 'topic', topic: 'signalling' }],
        ['Kostnad?', { kind: 'help', variant: 'topic', topic: 'cost' }],
        ['RAMS', { kind: 'help', variant: 'topic', topic: 'safety' }],
        ['tidsplan', { kind: 'help', variant: 'topic', topic: 'schedule' }],
    ])('should classify "%s"', (query, intent) => {
        expect(matchRules(query)).toEqual(intent);
    });

    it.each([
        'help with ETCS-12 braking',
        'What is ETCS-12?',
        'hello, what is the track gauge?',
        'ETCS-12?',
        'etcs budget',
        'ballast',
        '',
    ])(
        'should not match "%s"',
        (query) => {
            expect(matchRules(query)).toBeUndefined();
        }
    );
});

describe('IntentClassifier', () => {
    let provider: ScriptedProvider;
    let indexer: EmbeddingIndexer;

    beforeEach(async () => {
        provider = new ScriptedProvider(VECTORS);
        indexer = new EmbeddingIndexer(provider);
        indexer.init();
        await indexer.embedAndIndexMany([makeChunk({ documentId: 'doc-1', index: 0, text: 'signal spacing' })]);
    });

    it('should answer rules without touching the index', async () => {
        const classifier = createIntentClassifier(indexer);

        expect(await classifier.classify('hello', emptyContext())).toEqual({ kind: 'greeting', variant: 'hello' });
        expect(await classifier.classify('ERTMS', emptyContext())).toEqual({
            kind: 'help',
            variant: 'topic',
            topic: 'signalling',
        });
        expect(provider.embedCalls).toEqual([]);
    });

    it('should classify a relevant query as technical', async () => {
        const classifier = createIntentClassifier(indexer);

        expect(await classifier.classify('signal spacing', emptyContext())).toEqual({
            kind: 'technical',
            precheckSimilarity: 1,
        });
    });

    it('should classify an unrelated query as out of scope', async () => {
        const classifier = createIntentClassifier(indexer);

        expect(await classifier.classify('track gauge', emptyContext())).toEqual({
            kind: 'outOfScope',
            reason: 'lowRelevance',
        });
    });

    it('should run the precheck with references resolved', async () => {
        const classifier = createIntentClassifier(indexer);

        await classifier.classify('that', contextCiting('signal spacing'));

        expect(provider.embedCalls).toEqual(['signal spacing']);
    });

    it('should report an embedding failure as out of scope', async () => {
        const classifier = createIntentClassifier(indexer);

        expect(await classifier.classify('no vector here', emptyContext())).toEqual({
            kind: 'outOfScope',
            reason: 'embeddingFailed',
        });
    });

    it('should report an empty index', async () => {
        const empty = new EmbeddingIndexer(provider);
        empty.init();

        expect(await createIntentClassifier(empty).classify('signal spacing', emptyContext())).toEqual({
            kind: 'outOfScope',
            reason: 'emptyIndex',
        });
    });

    it('should report an index that is not ready', async () => {
        const uninitialised = new EmbeddingIndexer(provider);

        expect(await createIntentClassifier(uninitialised).classify('signal spacing', emptyContext())).toEqual({
            kind: 'outOfScope',
            reason: 'unavailable',
        });
    });

    it('should pass a precheck timeout on to retrieval as technical', async () => {
        provider.delayMs = 50;
        const classifier = createIntentClassifier(indexer, { precheckTimeoutMs: 5 });

        expect(await classifier.classify('signal spacing', emptyContext())).toEqual({
            kind: 'technical',
            precheckSimilarity: 0,
        });
    });

    it('should stop when the caller cancels', async () => {
        provider.delayMs = 50;
        const controller = new AbortController();
        setTimeout(() => controller.abort(), 5);

        await expect(
            createIntentClassifier(indexer).classify('signal spacing', emptyContext(), { signal: controller.signal })
        ).rejects.toBeInstanceOf(RequestCancelledError);
    });

    it('should use the configured threshold', async () => {
        const strict = createIntentClassifier(indexer, { precheckMinRelevance: 0.2 });
        const lenient = createIntentClassifier(indexer, { precheckMinRelevance: 0.05 });

        // cosine([0.1, 0.995, 0], [1, 0, 0]) is just under 0.1
        expect((await strict.classify('signal spacing rules', emptyContext())).kind).toBe('outOfScope');
        expect((await lenient.classify('signal spacing rules', emptyContext())).kind).toBe('technical');
    });
});
