/**
 * Shared fixtures for the service tests.
 */

import * as fs from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { Chunk, Document, IndexEntry } from '../../../shared/types';
import { EmbeddingFailedError, RequestCancelledError } from '../../errors';
import { EmbeddingProvider } from '../embeddingProvider';

/**
 * Fresh directory under data/<area>/ for one test; remove with removeTestDir.
 */
export function makeTestDir(area: string): string {
    return path.join(process.cwd(), 'data', area, uuidv4());
}

export function removeTestDir(dirPath: string): void {
    fs.rmSync(dirPath, { recursive: true, force: true });
}

export function makeDocument(overrides: Partial<Document> = {}): Document {
    return {
        id: 'doc-1',
        language: 'en',
        category: 'regulation',
        tags: [],
        text: 'Regulation ETCS-12: minimum braking distance is 400m.',
        ingestedAt: new Date('2024-01-01T00:00:00.000Z'),
        ...overrides,
    };
}

export function makeChunk(overrides: Partial<Chunk> = {}, metadata: Partial<Chunk['metadata']> = {}): Chunk {
    const documentId = overrides.documentId ?? 'doc-1';
    const index = overrides.index ?? 0;
    const text = overrides.text ?? 'Regulation ETCS-12: minimum braking distance is 400m.';
    return {
        id: `${documentId}#${index}`,
        documentId,
        index,
        start: 0,
        end: text.length,
        text,
        ...overrides,
        metadata: {
            language: 'en',
            category: 'regulation',
            tags: [],
            ingestedAt: new Date('2024-01-01T00:00:00.000Z'),
            ...metadata,
        },
    };
}

export function makeEntry(chunkId: string, vector: number[], overrides: Partial<IndexEntry> = {}): IndexEntry {
    return {
        chunkId,
        documentId: chunkId.split('#')[0] ?? chunkId,
        vector,
        language: 'en',
        category: 'regulation',
        ingestedAt: new Date('2024-01-01T00:00:00.000Z'),
        ...overrides,
    };
}

function waitFor(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        const timer = setTimeout(resolve, ms);
        signal?.addEventListener(
            'abort',
            () => {
                clearTimeout(timer);
                reject(new RequestCancelledError());
            },
            { once: true }
        );
    });
}

/**
 * Provider whose vectors come from a lookup table. Unknown texts fail with
 * EmbeddingFailed; `delayMs` makes every call slow.
 */
export class ScriptedProvider implements EmbeddingProvider {
    readonly modelId: string;
    readonly dimension: number;
    delayMs = 0;
    failBatches = false;
    readonly embedCalls: string[] = [];
    readonly batchCalls: string[][] = [];

    constructor(
        private readonly vectors: Record<string, number[]>,
        dimension = 3,
        modelId = 'scripted-v1'
    ) {
        this.dimension = dimension;
        this.modelId = modelId;
    }

    async embed(text: string, signal?: AbortSignal): Promise<number[]> {
        this.embedCalls.push(text);
        if (this.delayMs > 0) await waitFor(this.delayMs, signal);
        return this.lookup(text);
    }

    async embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]> {
        this.batchCalls.push(texts);
        if (this.delayMs > 0) await waitFor(this.delayMs, signal);
        if (this.failBatches) {
            throw new EmbeddingFailedError('batch endpoint down');
        }
        return texts.map((text) => this.lookup(text));
    }

    private lookup(text: string): number[] {
        const vector = this.vectors[text];
        if (!vector) {
            throw new EmbeddingFailedError(`no vector for "${text}"`);
        }
        return vector;
    }
}
