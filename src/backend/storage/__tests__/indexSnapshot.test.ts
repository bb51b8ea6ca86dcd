/**
 * Index Snapshot and JSON File Tests
 */

import * as fs from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { IndexCorruptedError } from '../../errors';
import { IndexSnapshotFile } from '../indexSnapshot';
import { fileNameForId, listJsonFiles, readJson, removeFile, writeJsonAtomic } from '../jsonFile';

const META = { modelId: 'hashing-fnv1a-v1/3', dimension: 3 };

describe('jsonFile', () => {
    let dir: string;

    beforeEach(() => {
        dir = path.join(process.cwd(), 'data', 'test-storage', uuidv4());
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should write atomically and read back', () => {
        const file = path.join(dir, 'nested', 'value.json');
        writeJsonAtomic(file, { a: 1 });

        expect(readJson(file)).toEqual({ a: 1 });
        expect(fs.readdirSync(path.dirname(file))).toEqual(['value.json']);
    });

    it('should return undefined for a missing file and throw for bad JSON', () => {
        expect(readJson(path.join(dir, 'missing.json'))).toBeUndefined();

        fs.mkdirSync(dir, { recursive: true });
        const bad = path.join(dir, 'bad.json');
        fs.writeFileSync(bad, '{ not json');
        expect(() => readJson(bad)).toThrow(SyntaxError);
    });

    it('should list only JSON files, sorted by name', () => {
        fs.mkdirSync(dir, { recursive: true });
        for (const name of ['b.json', 'a.json', 'notes.txt']) {
            fs.writeFileSync(path.join(dir, name), '{}');
        }
        expect(listJsonFiles(dir)).toEqual([path.join(dir, 'a.json'), path.join(dir, 'b.json')]);
        expect(listJsonFiles(path.join(dir, 'absent'))).toEqual([]);
    });

    it('should remove files and report whether one existed', () => {
        const file = path.join(dir, 'x.json');
        writeJsonAtomic(file, []);
        expect(removeFile(file)).toBe(true);
        expect(removeFile(file)).toBe(false);
    });

    it('should encode ids into safe file names', () => {
        expect(fileNameForId('tsi/ccs#2')).toBe('tsi%2Fccs%232.json');
    });

    it('should keep file names of long non-ASCII ids short and distinct', () => {
        const id = 'forskrift-' + 'ø'.repeat(60);
        const name = fileNameForId(id);

        expect(name).toMatch(/^forskrift-(%C3%B8)+-[0-9a-f]{16}\.json$/);
        expect(name.length).toBe(122);
        expect(fileNameForId(id + 'ø')).not.toBe(name);

        writeJsonAtomic(path.join(dir, name), { id });
        expect(readJson(path.join(dir, name))).toEqual({ id });
    });

    it('should not cut an escape sequence in half', () => {
        expect(fileNameForId('a'.repeat(101) + 'ø'.repeat(10))).toMatch(/^a{101}-[0-9a-f]{16}\.json$/);
    });
});

describe('IndexSnapshotFile', () => {
    let dir: string;
    let snapshot: IndexSnapshotFile;

    beforeEach(() => {
        dir = path.join(process.cwd(), 'data', 'test-snapshots', uuidv4());
        snapshot = new IndexSnapshotFile(path.join(dir, 'index.json'));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should report a missing snapshot', () => {
        expect(snapshot.load(META)).toEqual({ status: 'missing' });
    });

    it('should round-trip entries with their dates', () => {
        const ingestedAt = new Date('2024-03-01T12:00:00.000Z');
        const savedAt = new Date('2024-03-02T08:30:00.000Z');
        snapshot.save(
            META,
            [
                {
                    chunkId: 'doc-1#0',
                    documentId: 'doc-1',
                    vector: [0.6, 0.8, 0],
                    language: 'nb',
                    category: 'project',
                    ingestedAt,
                },
            ],
            savedAt
        );

        expect(snapshot.load(META)).toEqual({
            status: 'loaded',
            savedAt,
            entries: [
                {
                    chunkId: 'doc-1#0',
                    documentId: 'doc-1',
                    vector: [0.6, 0.8, 0],
                    language: 'nb',
                    category: 'project',
                    ingestedAt,
                },
            ],
        });
    });

    it('should flag a snapshot built by another model', () => {
        snapshot.save(META, []);
        expect(snapshot.load({ modelId: 'ollama/nomic-embed-text', dimension: 768 })).toEqual({
            status: 'incompatible',
            found: META,
        });
    });

    it('should throw IndexCorrupted for unparsable JSON', () => {
        fs.mkdirSync(dir, { recursive: true });
        fs.writeFileSync(snapshot.path, '{"version": 1, "meta": ');
        expect(() => snapshot.load(META)).toThrow(IndexCorruptedError);
    });

    it('should throw IndexCorrupted for a wrong shape', () => {
        fs.mkdirSync(dir, { recursive: true });
        fs.writeFileSync(snapshot.path, JSON.stringify({ version: 1, entries: 'none' }));
        expect(() => snapshot.load(META)).toThrow('has an invalid shape');
    });

    it('should throw IndexCorrupted when a vector has the wrong dimension', () => {
        fs.mkdirSync(dir, { recursive: true });
        fs.writeFileSync(
            snapshot.path,
            JSON.stringify({
                version: 1,
                meta: { ...META, savedAt: '2024-03-02T08:30:00.000Z' },
                entries: [
                    {
                        chunkId: 'doc-1#0',
                        documentId: 'doc-1',
                        vector: [1, 0],
                        language: 'en',
                        category: 'regulation',
                        ingestedAt: '2024-03-01T12:00:00.000Z',
                    },
                ],
            })
        );
        expect(() => snapshot.load(META)).toThrow('Index entry doc-1#0 has dimension 2, expected 3');
    });
});
