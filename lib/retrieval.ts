/**
 * Keyword Retrieval over the knowledge snapshot
 *
 * Scores each record by token-set overlap between the query and the record's
 * college name, branch and location. An exact college-name match outranks
 * any partial overlap.
 */

import { DEFAULT_RETRIEVAL_LIMIT } from './config';
import { compareByCutoffRank, type KnowledgeSnapshot } from './knowledge-store';
import { countOverlap, normalizeText, tokenize } from './text';
import type { CollegeRecord } from './types';

export interface ScoredRecord {
    record: CollegeRecord;
    score: number;
}

function compareScored(a: ScoredRecord, b: ScoredRecord): number {
    return (
        b.score - a.score ||
        compareByCutoffRank(a.record, b.record) ||
        a.record.collegeName.localeCompare(b.record.collegeName) ||
        a.record.branch.localeCompare(b.record.branch) ||
        a.record.category.localeCompare(b.record.category)
    );
}

/**
 * Score every record against the query; only records scoring above zero are returned
 */
export function scoreRecords(snapshot: KnowledgeSnapshot, query: string): ScoredRecord[] {
    const queryTokens = new Set(tokenize(query));
    const normalizedQuery = normalizeText(query);
    if (queryTokens.size === 0 && !normalizedQuery) {
        return [];
    }

    // Strictly above the largest possible partial overlap
    const exactMatchBonus = queryTokens.size + 1;

    const scored: ScoredRecord[] = [];
    for (const record of snapshot.allRecords()) {
        let score = countOverlap(queryTokens, snapshot.tokensFor(record));
        if (normalizeText(record.collegeName) === normalizedQuery) {
            score += exactMatchBonus;
        }
        if (score > 0) {
            scored.push({ record, score });
        }
    }

    return scored.sort(compareScored);
}

/**
 * Top `limit` records for a free-text query. An empty result means no
 * grounding was found; it is not an error.
 */
export function search(
    snapshot: KnowledgeSnapshot,
    query: string,
    limit: number = DEFAULT_RETRIEVAL_LIMIT
): CollegeRecord[] {
    if (limit <= 0) {
        return [];
    }
    return scoreRecords(snapshot, query)
        .slice(0, limit)
        .map((scored) => scored.record);
}
