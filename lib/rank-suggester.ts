/**
 * Rank-based college suggestions
 *
 * A college is "safe" when its cutoff rank is at or beyond the student's rank,
 * and "ambitious" when its cutoff is tighter than the student's rank by at
 * most `margin` positions.
 */

import { DEFAULT_AMBITIOUS_MARGIN, ESTIMATED_CANDIDATES } from './config';
import { InvalidInputError } from './errors';
import { compareByCutoffRank, type KnowledgeSnapshot } from './knowledge-store';
import type { CollegeRecord, SuggestionBucket } from './types';

export interface SuggestOptions {
    category?: string; // restrict to one seat category
}

function compareSuggestions(a: CollegeRecord, b: CollegeRecord): number {
    return compareByCutoffRank(a, b) || a.collegeName.localeCompare(b.collegeName);
}

export function suggest(
    snapshot: KnowledgeSnapshot,
    rank: number,
    margin: number = DEFAULT_AMBITIOUS_MARGIN,
    options: SuggestOptions = {}
): SuggestionBucket {
    if (!Number.isSafeInteger(rank) || rank <= 0) {
        throw new InvalidInputError(`A rank has to be a positive whole number, but I got "${rank}". What is your MHT-CET rank?`);
    }
    if (!Number.isSafeInteger(margin) || margin < 0) {
        throw new InvalidInputError(`The ambitious margin must be a non-negative whole number, got ${margin}.`);
    }

    const category = options.category?.trim().toLowerCase();
    const safe: CollegeRecord[] = [];
    const ambitious: CollegeRecord[] = [];

    for (const record of snapshot.allRecords()) {
        if (record.cutoffRank === null) continue;
        if (category && record.category.toLowerCase() !== category) continue;

        if (record.cutoffRank >= rank) {
            safe.push(record);
        } else if (record.cutoffRank >= rank - margin) {
            ambitious.push(record);
        }
    }

    return {
        safe: safe.sort(compareSuggestions),
        ambitious: ambitious.sort(compareSuggestions),
    };
}

/**
 * Approximate percentile for a rank, given the size of the candidate pool
 */
export function rankToPercentile(rank: number, totalCandidates: number = ESTIMATED_CANDIDATES): number {
    if (rank <= 0) return 100;
    const percentile = (1 - rank / totalCandidates) * 100;
    return Math.round(Math.max(0, Math.min(100, percentile)) * 10000) / 10000;
}

export function bucketSize(bucket: SuggestionBucket): number {
    return bucket.safe.length + bucket.ambitious.length;
}
