/**
 * JSON file helpers shared by the document, index and session stores.
 *
 * Writes go to a temp file first and are renamed over the target so a crash
 * never leaves a half-written file behind.
 */

import { createHash } from 'crypto';
import * as fs from 'fs';
import * as path from 'path';

/** Longest encoded id used verbatim as a file name */
const MAX_ENCODED_ID_LENGTH = 120;

/**
 * Creates the directory (and parents) if it doesn't exist.
 */
export function ensureDirectory(dirPath: string): void {
    if (!fs.existsSync(dirPath)) {
        fs.mkdirSync(dirPath, { recursive: true });
    }
}

/**
 * Serializes `value` and atomically replaces `filePath` with it.
 */
export function writeJsonAtomic(filePath: string, value: unknown): void {
    ensureDirectory(path.dirname(filePath));
    const tempPath = `${filePath}.${process.pid}.tmp`;
    fs.writeFileSync(tempPath, JSON.stringify(value, null, 2));
    fs.renameSync(tempPath, filePath);
}

/**
 * Reads and parses a JSON file. Returns undefined when the file is absent;
 * a file that exists but does not parse throws.
 */
export function readJson(filePath: string): unknown {
    if (!fs.existsSync(filePath)) {
        return undefined;
    }
    const content = fs.readFileSync(filePath, 'utf-8');
    const parsed: unknown = JSON.parse(content);
    return parsed;
}

/**
 * Removes a file if present.
 * @returns true if a file was deleted
 */
export function removeFile(filePath: string): boolean {
    if (!fs.existsSync(filePath)) {
        return false;
    }
    fs.unlinkSync(filePath);
    return true;
}

/**
 * Lists `*.json` files in a directory, sorted by name.
 */
export function listJsonFiles(dirPath: string): string[] {
    if (!fs.existsSync(dirPath)) {
        return [];
    }
    return fs
        .readdirSync(dirPath)
        .filter((file) => file.endsWith('.json'))
        .sort()
        .map((file) => path.join(dirPath, file));
}

/**
 * File name for an arbitrary id. Ids may contain `/` or `#`.
 *
 * Percent-encoding triples the length of non-ASCII ids, so long ids keep a
 * readable prefix and end in a hash of the full id. Names stay well under
 * the 255-byte limit of common file systems.
 */
export function fileNameForId(id: string): string {
    const encoded = encodeURIComponent(id);
    if (encoded.length <= MAX_ENCODED_ID_LENGTH) {
        return `${encoded}.json`;
    }
    const digest = createHash('sha256').update(id).digest('hex').slice(0, 16);
    const budget = MAX_ENCODED_ID_LENGTH - digest.length - 1;
    let prefix = '';
    // Whole characters only, so no escape sequence is cut
    for (const char of id) {
        const piece = encodeURIComponent(char);
        if (prefix.length + piece.length > budget) break;
        prefix += piece;
    }
    return `${prefix}-${digest}.json`;
}
