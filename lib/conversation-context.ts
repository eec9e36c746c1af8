/**
 * Conversation Context
 *
 * Short-lived memory of the last suggestion in a session, used to resolve
 * follow-ups like "what about computer there?". Expiry is a fixed inactivity
 * window; an expired context behaves exactly like an absent one.
 */

import { countOverlap, recordTokens, tokenize } from './text';
import type { CollegeRecord, SessionContext, SuggestionBucket } from './types';

export interface ConversationOptions {
    ttlMs: number;
    now?: () => number;
}

export function createSessionContext(id: string, now: number = Date.now()): SessionContext {
    return {
        id,
        lastSuggestion: null,
        lastRankOrPercentile: null,
        lastMentionedColleges: new Set(),
        createdAt: now,
        expiresAt: now,
    };
}

/**
 * Copy a session so a request can work on it without touching the stored one
 */
export function cloneSession(session: SessionContext): SessionContext {
    return {
        ...session,
        lastMentionedColleges: new Set(session.lastMentionedColleges),
    };
}

function distinctColleges(records: Iterable<CollegeRecord>): string[] {
    return Array.from(new Set(Array.from(records, (record) => record.collegeName)));
}

/**
 * Keep only the records with the largest overlap with the named terms
 */
function narrowBucket(bucket: SuggestionBucket, terms: ReadonlySet<string>): SuggestionBucket {
    const overlapOf = (record: CollegeRecord) => countOverlap(terms, recordTokens(record));
    const best = Math.max(0, ...bucket.safe.map(overlapOf), ...bucket.ambitious.map(overlapOf));
    if (best === 0) {
        return { safe: [], ambitious: [] };
    }
    return {
        safe: bucket.safe.filter((record) => overlapOf(record) === best),
        ambitious: bucket.ambitious.filter((record) => overlapOf(record) === best),
    };
}

export class ConversationContext {
    private readonly session: SessionContext;
    private readonly ttlMs: number;
    private readonly now: () => number;

    constructor(session: SessionContext, options: ConversationOptions) {
        this.session = session;
        this.ttlMs = options.ttlMs;
        this.now = options.now ?? Date.now;
    }

    isLive(): boolean {
        return this.now() < this.session.expiresAt;
    }

    /**
     * Store the latest suggestion and refresh the inactivity window
     */
    update(bucket: SuggestionBucket, rankOrPercentile: number): void {
        this.session.lastSuggestion = bucket;
        this.session.lastRankOrPercentile = rankOrPercentile;
        this.session.lastMentionedColleges = new Set(distinctColleges([...bucket.safe, ...bucket.ambitious]));
        this.touch();
    }

    /**
     * Record the colleges the latest answer was about
     */
    remember(records: Iterable<CollegeRecord>, rankOrPercentile?: number): void {
        this.session.lastMentionedColleges = new Set(distinctColleges(records));
        if (rankOrPercentile !== undefined) {
            this.session.lastRankOrPercentile = rankOrPercentile;
        }
        this.touch();
    }

    /**
     * The college a bare percentile refers to, when exactly one was mentioned last
     */
    mentionedCollege(): string | null {
        if (!this.isLive() || this.session.lastMentionedColleges.size !== 1) {
            return null;
        }
        const [college] = this.session.lastMentionedColleges;
        return college ?? null;
    }

    /**
     * Re-use the last suggestion for a follow-up question. Null when there is
     * no live context, when the query carries its own number, or when it names
     * a college or branch the last suggestion does not contain.
     */
    resolveFollowUp(query: string, vocabulary: ReadonlySet<string>): SuggestionBucket | null {
        const last = this.session.lastSuggestion;
        if (!last || !this.isLive()) {
            return null;
        }
        if (/\d/.test(query)) {
            return null;
        }

        const named = new Set(tokenize(query).filter((token) => vocabulary.has(token)));
        if (named.size === 0) {
            return last;
        }

        const narrowed = narrowBucket(last, named);
        if (narrowed.safe.length === 0 && narrowed.ambitious.length === 0) {
            return null;
        }
        return narrowed;
    }

    private touch(): void {
        this.session.expiresAt = this.now() + this.ttlMs;
    }
}
