/**
 * Context Manager Service
 *
 * Keeps per-session conversation state: a rolling window of the latest turns
 * and the time of the last appended turn. Sessions are created on first use
 * and dropped after an idle timeout.
 *
 * Optionally mirrors sessions to JSON files (one per session) so they survive
 * a restart.
 */

import * as path from 'path';
import { z } from 'zod';
import {
    ConversationContext,
    ConversationTurn,
    StoredSession,
    StoredTurn,
} from '../../shared/types';
import { logger } from '../logger';
import {
    ensureDirectory,
    fileNameForId,
    listJsonFiles,
    readJson,
    removeFile,
    writeJsonAtomic,
} from '../storage/jsonFile';
import { extractEntities, phrasesFor } from './textAnalysis';

/**
 * Configuration options for the ContextManager.
 */
export interface ContextManagerConfig {
    /** Turns kept per session; the oldest is dropped first */
    maxTurns: number;
    /** A session with no turn appended for this long is discarded */
    idleTimeoutMs: number;
    /** How often the background sweep runs */
    sweepIntervalMs: number;
    /** Directory for session files; null keeps sessions in memory only */
    storagePath: string | null;
}

export const DEFAULT_CONTEXT_CONFIG: ContextManagerConfig = {
    maxTurns: 10,
    idleTimeoutMs: 30 * 60 * 1000,
    sweepIntervalMs: 60 * 1000,
    storagePath: null,
};

export type NewTurn = Omit<ConversationTurn, 'timestamp'> & { timestamp?: Date };

const storedTurnSchema = z.object({
    id: z.string(),
    query: z.string(),
    expandedQuery: z.string(),
    intent: z.enum(['greeting', 'help', 'technical', 'outOfScope']),
    answer: z.string(),
    citedChunkIds: z.array(z.string()),
    entities: z.array(z.string()),
    language: z.enum(['nb', 'en']),
    timestamp: z.string().datetime(),
});

const storedSessionSchema = z.object({
    sessionId: z.string().min(1),
    createdAt: z.string().datetime(),
    lastActivityAt: z.string().datetime(),
    turns: z.array(storedTurnSchema),
});

const ANAPHORA = phrasesFor('anaphora');

function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const ANAPHOR_PATTERNS: RegExp[] = ANAPHORA.map(
    (phrase) => new RegExp(`(?<![\\p{L}\\p{N}])${escapeRegExp(phrase)}(?![\\p{L}\\p{N}])`, 'iu')
);

/**
 * Substitutes the first anaphor in `queryText` ("it", "that regulation",
 * "denne forskriften", ...) with the most recent cited entity of the last
 * turn. Queries that name an entity of their own, or have nothing to refer
 * back to, come back unchanged.
 */
export function resolveReferencesIn(queryText: string, context: ConversationContext): string {
    const lastTurn = context.turns.at(-1);
    const antecedent = lastTurn?.entities[0];
    if (!antecedent) {
        return queryText;
    }
    if (extractEntities(queryText).length > 0) {
        return queryText;
    }

    // Earliest anaphor wins; at the same position the longer phrase does
    let best: { index: number; length: number } | undefined;
    for (const pattern of ANAPHOR_PATTERNS) {
        const match = pattern.exec(queryText);
        if (!match) continue;
        if (
            !best ||
            match.index < best.index ||
            (match.index === best.index && match[0].length > best.length)
        ) {
            best = { index: match.index, length: match[0].length };
        }
    }
    if (!best) {
        return queryText;
    }

    return (
        queryText.slice(0, best.index) + antecedent + queryText.slice(best.index + best.length)
    );
}

/**
 * ContextManager keeps conversation state per session id.
 */
export class ContextManager {
    private readonly config: ContextManagerConfig;
    private sessions: Map<string, ConversationContext> = new Map();
    private sweeper: ReturnType<typeof setInterval> | null = null;

    constructor(
        config: Partial<ContextManagerConfig> = {},
        private readonly now: () => Date = () => new Date()
    ) {
        this.config = { ...DEFAULT_CONTEXT_CONFIG, ...config };
        if (this.config.maxTurns < 1) {
            throw new Error(`maxTurns must be at least 1, got ${this.config.maxTurns}`);
        }
    }

    /**
     * Returns the session's context, creating an empty one for an unknown or
     * expired session id. The returned object is a copy.
     */
    getContext(sessionId: string): ConversationContext {
        return this.snapshot(this.live(sessionId));
    }

    /**
     * Appends a turn, dropping the oldest turns beyond `maxTurns`, and marks
     * the session active.
     */
    appendTurn(sessionId: string, turn: NewTurn): ConversationContext {
        const context = this.live(sessionId);
        const timestamp = turn.timestamp ?? this.now();

        context.turns.push({ ...turn, timestamp });
        if (context.turns.length > this.config.maxTurns) {
            context.turns.splice(0, context.turns.length - this.config.maxTurns);
        }
        context.lastActivityAt = timestamp;

        this.persist(context);
        return this.snapshot(context);
    }

    /**
     * Expands anaphoric references using the session's last turn.
     */
    resolveReferences(sessionId: string, queryText: string): string {
        const context = this.sessions.get(sessionId);
        if (!context || this.isExpired(context)) {
            return queryText;
        }
        return resolveReferencesIn(queryText, context);
    }

    deleteSession(sessionId: string): boolean {
        const existed = this.sessions.delete(sessionId);
        if (this.config.storagePath) {
            try {
                removeFile(this.sessionFilePath(sessionId));
            } catch (error) {
                logger.warn(`Could not remove session file for ${sessionId}:`, error);
            }
        }
        return existed;
    }

    /**
     * Drops every idle session.
     * @returns number of sessions removed
     */
    sweepExpired(): number {
        let removed = 0;
        for (const context of [...this.sessions.values()]) {
            if (this.isExpired(context)) {
                this.deleteSession(context.sessionId);
                removed++;
            }
        }
        if (removed > 0) {
            logger.debug(`Expired ${removed} idle sessions`);
        }
        return removed;
    }

    get sessionCount(): number {
        return this.sessions.size;
    }

    /**
     * Starts the periodic sweep. The timer does not keep the process alive.
     */
    start(): void {
        if (this.sweeper) return;
        this.sweeper = setInterval(() => this.sweepExpired(), this.config.sweepIntervalMs);
        this.sweeper.unref();
    }

    stop(): void {
        if (this.sweeper) {
            clearInterval(this.sweeper);
            this.sweeper = null;
        }
    }

    /**
     * Restores persisted sessions that have not expired.
     * @returns number of sessions loaded
     */
    load(): number {
        const storagePath = this.config.storagePath;
        if (!storagePath) return 0;
        ensureDirectory(storagePath);

        let loaded = 0;
        for (const filePath of listJsonFiles(storagePath)) {
            try {
                const parsed = storedSessionSchema.safeParse(readJson(filePath));
                if (!parsed.success) {
                    logger.warn(`Ignoring malformed session file ${path.basename(filePath)}`);
                    continue;
                }
                const context = this.deserializeSession(parsed.data);
                if (this.isExpired(context)) {
                    removeFile(filePath);
                    continue;
                }
                this.sessions.set(context.sessionId, context);
                loaded++;
            } catch (error) {
                logger.warn(`Error reading session file ${path.basename(filePath)}:`, error);
            }
        }
        return loaded;
    }

    private live(sessionId: string): ConversationContext {
        const existing = this.sessions.get(sessionId);
        if (existing && !this.isExpired(existing)) {
            return existing;
        }
        if (existing) {
            this.deleteSession(sessionId);
        }

        const now = this.now();
        const context: ConversationContext = {
            sessionId,
            turns: [],
            createdAt: now,
            lastActivityAt: now,
        };
        this.sessions.set(sessionId, context);
        return context;
    }

    private isExpired(context: ConversationContext): boolean {
        return this.now().getTime() - context.lastActivityAt.getTime() >= this.config.idleTimeoutMs;
    }

    private snapshot(context: ConversationContext): ConversationContext {
        return {
            ...context,
            turns: context.turns.map((turn) => ({
                ...turn,
                citedChunkIds: [...turn.citedChunkIds],
                entities: [...turn.entities],
            })),
        };
    }

    private sessionFilePath(sessionId: string): string {
        return path.join(this.config.storagePath ?? '', fileNameForId(sessionId));
    }

    /**
     * Session files are best effort: the in-memory session stays
     * authoritative when a write fails.
     */
    private persist(context: ConversationContext): void {
        if (!this.config.storagePath) return;
        try {
            writeJsonAtomic(this.sessionFilePath(context.sessionId), this.serializeSession(context));
        } catch (error) {
            logger.warn(`Could not write session file for ${context.sessionId}:`, error);
        }
    }

    private serializeSession(context: ConversationContext): StoredSession {
        return {
            sessionId: context.sessionId,
            createdAt: context.createdAt.toISOString(),
            lastActivityAt: context.lastActivityAt.toISOString(),
            turns: context.turns.map((turn) => this.serializeTurn(turn)),
        };
    }

    private serializeTurn(turn: ConversationTurn): StoredTurn {
        return { ...turn, timestamp: turn.timestamp.toISOString() };
    }

    private deserializeSession(stored: StoredSession): ConversationContext {
        return {
            sessionId: stored.sessionId,
            createdAt: new Date(stored.createdAt),
            lastActivityAt: new Date(stored.lastActivityAt),
            turns: stored.turns.map((turn) => ({ ...turn, timestamp: new Date(turn.timestamp) })),
        };
    }
}

/**
 * Factory function to create a ContextManager instance.
 */
export function createContextManager(
    config?: Partial<ContextManagerConfig>,
    now?: () => Date
): ContextManager {
    return new ContextManager(config, now);
}
