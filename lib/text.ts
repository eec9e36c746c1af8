/**
 * Query and record tokenization shared by retrieval and follow-up resolution
 */

import stopWordList from '../data/stop-words.json';
import type { CollegeRecord } from './types';

const STOP_WORDS: ReadonlySet<string> = new Set(stopWordList);

/**
 * Lowercase, replace punctuation with spaces and collapse whitespace
 */
export function normalizeText(text: string): string {
    return text
        .toLowerCase()
        .replace(/[^a-z0-9\s]/g, ' ')
        .replace(/\s+/g, ' ')
        .trim();
}

/**
 * Split text into meaningful tokens (no stop words, no single characters)
 */
export function tokenize(text: string): string[] {
    const normalized = normalizeText(text);
    if (!normalized) {
        return [];
    }
    return normalized.split(' ').filter((token) => token.length > 1 && !STOP_WORDS.has(token));
}

/**
 * Token set a record can be matched on: college name, branch and location
 */
export function recordTokens(record: CollegeRecord): Set<string> {
    return new Set(tokenize(`${record.collegeName} ${record.branch} ${record.location}`));
}

export function countOverlap(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
    let overlap = 0;
    for (const token of a) {
        if (b.has(token)) overlap++;
    }
    return overlap;
}
