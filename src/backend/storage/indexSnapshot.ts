/**
 * Index Snapshot
 *
 * Persists the vector index as one JSON file together with the model id and
 * dimension it was built with, so a restart can tell whether the vectors are
 * still comparable with the configured embedding model.
 */

import { z } from 'zod';
import { IndexEntry } from '../../shared/types';
import { IndexCorruptedError } from '../errors';
import { readJson, writeJsonAtomic } from './jsonFile';

export const SNAPSHOT_VERSION = 1;

const entrySchema = z.object({
    chunkId: z.string().min(1),
    documentId: z.string().min(1),
    vector: z.array(z.number()),
    language: z.enum(['nb', 'en']),
    category: z.enum(['regulation', 'project', 'other']),
    ingestedAt: z.string().datetime(),
});

const snapshotSchema = z.object({
    version: z.literal(SNAPSHOT_VERSION),
    meta: z.object({
        modelId: z.string().min(1),
        dimension: z.number().int().positive(),
        savedAt: z.string().datetime(),
    }),
    entries: z.array(entrySchema),
});

export type IndexSnapshot = z.infer<typeof snapshotSchema>;

export interface SnapshotMeta {
    modelId: string;
    dimension: number;
}

export type SnapshotLoadResult =
    | { status: 'missing' }
    | { status: 'incompatible'; found: SnapshotMeta }
    | { status: 'loaded'; entries: IndexEntry[]; savedAt: Date };

export class IndexSnapshotFile {
    constructor(private readonly filePath: string) {}

    get path(): string {
        return this.filePath;
    }

    /**
     * Reads the snapshot.
     *
     * @throws IndexCorruptedError when the file exists but cannot be parsed
     *         or a vector does not match the recorded dimension
     */
    load(expected: SnapshotMeta): SnapshotLoadResult {
        let raw: unknown;
        try {
            raw = readJson(this.filePath);
        } catch (error) {
            throw new IndexCorruptedError(
                `Index snapshot ${this.filePath} is not valid JSON`,
                { path: this.filePath },
                error instanceof Error ? error : undefined
            );
        }
        if (raw === undefined) {
            return { status: 'missing' };
        }

        const parsed = snapshotSchema.safeParse(raw);
        if (!parsed.success) {
            throw new IndexCorruptedError(`Index snapshot ${this.filePath} has an invalid shape`, {
                path: this.filePath,
                issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
            });
        }

        const { meta, entries } = parsed.data;
        if (meta.modelId !== expected.modelId || meta.dimension !== expected.dimension) {
            return { status: 'incompatible', found: { modelId: meta.modelId, dimension: meta.dimension } };
        }

        const bad = entries.find((entry) => entry.vector.length !== meta.dimension);
        if (bad) {
            throw new IndexCorruptedError(
                `Index entry ${bad.chunkId} has dimension ${bad.vector.length}, expected ${meta.dimension}`,
                { path: this.filePath, chunkId: bad.chunkId }
            );
        }

        return {
            status: 'loaded',
            savedAt: new Date(meta.savedAt),
            entries: entries.map((entry) => ({
                ...entry,
                ingestedAt: new Date(entry.ingestedAt),
            })),
        };
    }

    save(meta: SnapshotMeta, entries: IndexEntry[], savedAt: Date = new Date()): void {
        const snapshot: IndexSnapshot = {
            version: SNAPSHOT_VERSION,
            meta: { ...meta, savedAt: savedAt.toISOString() },
            entries: entries.map((entry) => ({
                ...entry,
                ingestedAt: entry.ingestedAt.toISOString(),
            })),
        };
        writeJsonAtomic(this.filePath, snapshot);
    }
}
