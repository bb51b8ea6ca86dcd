/**
 * Data storage modules
 *
 * Persistence layer components:
 * - jsonFile: atomic JSON file helpers used for documents and sessions
 * - IndexSnapshotFile: the persisted vector index with its model metadata
 */

export {
    ensureDirectory,
    writeJsonAtomic,
    readJson,
    removeFile,
    listJsonFiles,
    fileNameForId,
} from './jsonFile';

export { IndexSnapshotFile, SNAPSHOT_VERSION } from './indexSnapshot';
export type { IndexSnapshot, SnapshotMeta, SnapshotLoadResult } from './indexSnapshot';
