/**
 * Seed Loader
 *
 * Bulk-ingests JSON documents from a directory at startup. Each file holds
 * one document object or an array of them:
 *
 *   { "id": "tsi-cce", "text": "...", "language": "en", "category": "regulation",
 *     "title": "TSI CCS", "tags": ["etcs"] }
 *
 * Documents already stored with the same content are left alone, so a
 * restart does not re-embed the seed corpus.
 */

import * as path from 'path';
import { z } from 'zod';
import { Document, DocumentInput } from '../../shared/types';
import { AssistantError } from '../errors';
import { logger } from '../logger';
import { listJsonFiles, readJson } from '../storage/jsonFile';
import { IDocumentStore } from './documentStore';

export const documentInputSchema = z.object({
    id: z.string().min(1),
    text: z.string(),
    language: z.string(),
    category: z.string(),
    title: z.string().optional(),
    tags: z.array(z.string()).optional(),
});

const seedFileSchema = z.union([documentInputSchema, z.array(documentInputSchema)]);

export interface SeedFailure {
    file: string;
    documentId?: string;
    error: string;
}

export interface SeedResult {
    ingested: string[];
    unchanged: string[];
    failed: SeedFailure[];
}

function sameContent(existing: Document, input: DocumentInput): boolean {
    return (
        existing.text === input.text &&
        existing.language === input.language &&
        existing.category === input.category &&
        (existing.title ?? '') === (input.title?.trim() ?? '') &&
        existing.tags.join('\n') ===
            (input.tags ?? [])
                .map((tag) => tag.trim())
                .filter((tag) => tag.length > 0)
                .join('\n')
    );
}

/**
 * Reads every `*.json` file in `seedDir` (sorted by name) and ingests the
 * documents it contains. Invalid files and rejected documents are reported,
 * not thrown.
 */
export async function loadSeedDirectory(store: IDocumentStore, seedDir: string): Promise<SeedResult> {
    const result: SeedResult = { ingested: [], unchanged: [], failed: [] };

    for (const filePath of listJsonFiles(seedDir)) {
        const file = path.basename(filePath);
        let inputs: DocumentInput[];
        try {
            const parsed = seedFileSchema.safeParse(readJson(filePath));
            if (!parsed.success) {
                result.failed.push({ file, error: 'File does not contain document objects' });
                continue;
            }
            inputs = Array.isArray(parsed.data) ? parsed.data : [parsed.data];
        } catch (error) {
            result.failed.push({ file, error: error instanceof Error ? error.message : String(error) });
            continue;
        }

        for (const input of inputs) {
            const existing = store.getDocument(input.id.trim());
            if (existing && sameContent(existing, input)) {
                result.unchanged.push(existing.id);
                continue;
            }
            try {
                const { documentId } = await store.ingest(input);
                result.ingested.push(documentId);
            } catch (error) {
                if (!(error instanceof AssistantError)) throw error;
                result.failed.push({ file, documentId: input.id, error: error.message });
            }
        }
    }

    for (const failure of result.failed) {
        logger.warn(
            `Seed ${failure.file}${failure.documentId ? ` (${failure.documentId})` : ''}: ${failure.error}`
        );
    }
    logger.info(
        `Seed directory ${seedDir}: ${result.ingested.length} ingested, ` +
            `${result.unchanged.length} unchanged, ${result.failed.length} failed`
    );
    return result;
}
