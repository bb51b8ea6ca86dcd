/**
 * Document Chunker Tests
 *
 * Chunks must cover the text contiguously, overlap by at most the overlap
 * window, and come out the same every time for the same input.
 */

import * as fc from 'fast-check';
import {
    chunkIdFor,
    createDocumentChunker,
    DEFAULT_CHUNKING_CONFIG,
    overlapWindow,
    splitIntoChunks,
} from '../documentChunker';
import { makeDocument } from './helpers';

function numberedWords(count: number): string {
    return Array.from({ length: count }, (_, i) => `w${String(i).padStart(3, '0')}`).join(' ');
}

describe('splitIntoChunks', () => {
    it('should return no chunks for whitespace-only text', () => {
        expect(splitIntoChunks('')).toEqual([]);
        expect(splitIntoChunks('  \n\t ')).toEqual([]);
    });

    it('should return a single chunk for text shorter than chunkSize', () => {
        const text = 'Regulation ETCS-12: minimum braking distance is 400m.';
        expect(splitIntoChunks(text)).toEqual([{ index: 0, start: 0, end: text.length, text }]);
    });

    it('should break at word boundaries and start the next chunk one overlap window back', () => {
        // 100 five-character words: word i starts at offset 5i
        const text = numberedWords(100);
        const spans = splitIntoChunks(text, { chunkSize: 50, overlapRatio: 0.2, minChunkSize: 10 });

        expect(spans[0]).toMatchObject({ start: 0, end: 50 });
        expect(spans[1]?.start).toBe(40);
        expect(spans[1]?.text.startsWith('w008 w009 ')).toBe(true);
    });

    it('should fold a short tail into the last chunk', () => {
        const text = numberedWords(12); // 59 characters
        const spans = splitIntoChunks(text, { chunkSize: 50, overlapRatio: 0.2, minChunkSize: 20 });

        expect(spans).toHaveLength(1);
        expect(spans[0]?.end).toBe(text.length);
    });

    it('should prefer a paragraph break in the second half of the window', () => {
        const first = 'Track gauge is 1435mm on all lines in the network.';
        const text = `${first}\n\n${numberedWords(40)}`;
        const spans = splitIntoChunks(text, { chunkSize: 80, overlapRatio: 0, minChunkSize: 10 });

        expect(spans[0]?.text).toBe(`${first}\n\n`);
        expect(spans[1]?.start).toBe(first.length + 2);
    });

    it('should reject a non-positive chunk size', () => {
        expect(() => splitIntoChunks('some text', { chunkSize: 0, overlapRatio: 0, minChunkSize: 0 })).toThrow(
            'chunkSize must be positive'
        );
    });

    describe('Property: contiguous cover with bounded overlap', () => {
        const word = fc.stringOf(fc.constantFrom('a', 'b', 'e', 'k', 'r', 'T', 'S', '1', '.'), {
            minLength: 1,
            maxLength: 12,
        });
        const separator = fc.constantFrom(' ', ' ', ' ', '\n', '\n\n', '. ');
        const text = fc
            .array(fc.tuple(word, separator), { minLength: 1, maxLength: 120 })
            .map((parts) => parts.map(([w, s]) => w + s).join(''));
        const config = fc.record({
            chunkSize: fc.integer({ min: 10, max: 200 }),
            overlapRatio: fc.double({ min: 0, max: 0.5, noNaN: true }),
            minChunkSize: fc.integer({ min: 0, max: 40 }),
        });

        it('should cover the text from 0 to its length with exact slices', () => {
            fc.assert(
                fc.property(text, config, (input, cfg) => {
                    const spans = splitIntoChunks(input, cfg);
                    if (input.trim().length === 0) {
                        expect(spans).toEqual([]);
                        return;
                    }

                    const overlap = Math.min(overlapWindow(cfg), cfg.chunkSize - 1);
                    expect(spans[0]?.start).toBe(0);
                    expect(spans[spans.length - 1]?.end).toBe(input.length);

                    spans.forEach((span, i) => {
                        expect(span.index).toBe(i);
                        expect(span.end).toBeGreaterThan(span.start);
                        expect(span.text).toBe(input.slice(span.start, span.end));

                        const previous = spans[i - 1];
                        if (previous) {
                            expect(span.start).toBeGreaterThan(previous.start);
                            expect(span.start).toBeLessThanOrEqual(previous.end);
                            expect(span.start).toBeGreaterThanOrEqual(previous.end - overlap);
                        }
                    });
                }),
                { numRuns: 200 }
            );
        });

        it('should be deterministic', () => {
            fc.assert(
                fc.property(text, config, (input, cfg) => {
                    expect(splitIntoChunks(input, cfg)).toEqual(splitIntoChunks(input, cfg));
                }),
                { numRuns: 50 }
            );
        });
    });
});

describe('DocumentChunker', () => {
    it('should use the default configuration', () => {
        expect(DEFAULT_CHUNKING_CONFIG).toEqual({ chunkSize: 1500, overlapRatio: 0.15, minChunkSize: 150 });
        expect(createDocumentChunker().overlap).toBe(225);
    });

    it('should give chunks deterministic ids and copy the document metadata', () => {
        const document = makeDocument({
            id: 'tsi-ccs',
            title: 'TSI CCS',
            tags: ['etcs'],
            text: numberedWords(100),
        });
        const chunker = createDocumentChunker({ chunkSize: 200, overlapRatio: 0.1, minChunkSize: 20 });

        const chunks = chunker.chunkDocument(document);

        expect(chunks.length).toBeGreaterThan(1);
        chunks.forEach((chunk, i) => {
            expect(chunk.id).toBe(chunkIdFor('tsi-ccs', i));
            expect(chunk.documentId).toBe('tsi-ccs');
            expect(chunk.metadata).toEqual({
                language: 'en',
                category: 'regulation',
                title: 'TSI CCS',
                tags: ['etcs'],
                ingestedAt: document.ingestedAt,
            });
        });
        expect(chunks[0]?.id).toBe('tsi-ccs#0');
    });

    it('should produce identical chunks when the same document is chunked twice', () => {
        const document = makeDocument({ text: numberedWords(300) });
        const chunker = createDocumentChunker({ chunkSize: 120 });

        expect(chunker.chunkDocument(document)).toEqual(chunker.chunkDocument(document));
    });
});
