/**
 * Session storage
 *
 * Sessions are read and written whole: the last write wins and concurrent
 * updates are never merged. Stored sessions are copied in and out so a
 * request's working copy stays private until it is written back.
 */

import { v4 as uuidv4 } from 'uuid';
import { cloneSession, createSessionContext } from './conversation-context';
import type { SessionContext } from './types';

export interface SessionStore {
    get(id: string): Promise<SessionContext | null>;
    set(session: SessionContext): Promise<void>;
    create(): Promise<SessionContext>;
}

export interface InMemorySessionStoreOptions {
    idleTtlMs: number;
    now?: () => number;
}

interface StoredSession {
    session: SessionContext;
    touchedAt: number;
}

export class InMemorySessionStore implements SessionStore {
    private readonly sessions = new Map<string, StoredSession>();
    private readonly idleTtlMs: number;
    private readonly now: () => number;

    constructor(options: InMemorySessionStoreOptions) {
        this.idleTtlMs = options.idleTtlMs;
        this.now = options.now ?? Date.now;
    }

    async get(id: string): Promise<SessionContext | null> {
        this.sweep();
        const stored = this.sessions.get(id);
        if (!stored) {
            return null;
        }
        stored.touchedAt = this.now();
        return cloneSession(stored.session);
    }

    async set(session: SessionContext): Promise<void> {
        this.sessions.set(session.id, { session: cloneSession(session), touchedAt: this.now() });
    }

    async create(): Promise<SessionContext> {
        this.sweep();
        const session = createSessionContext(uuidv4(), this.now());
        await this.set(session);
        return cloneSession(session);
    }

    get size(): number {
        return this.sessions.size;
    }

    /**
     * Drop sessions idle for longer than the TTL
     */
    sweep(): number {
        const cutoff = this.now() - this.idleTtlMs;
        let removed = 0;
        for (const [id, stored] of this.sessions) {
            if (stored.touchedAt <= cutoff) {
                this.sessions.delete(id);
                removed++;
            }
        }
        return removed;
    }
}
