/**
 * Query classification
 *
 * Precedence:
 *   1. digits only (or "my rank is 5000")           -> rank
 *   2. a leading number marked as a percentile, a bare decimal, or a number
 *      followed by words naming a known college       -> percentile (+ college)
 *   3. anything else                                 -> free-text question
 *
 * "10 colleges in pune" stays a question: none of its words names a college.
 */

import { InvalidInputError } from './errors';
import { tokenize } from './text';
import type { QueryIntent } from './types';

const RANK_ONLY = /^\d+$/;
const RANK_PHRASE = /^(?:my\s+)?(?:mht[\s-]?cet\s+)?rank\s*(?:is|=|:)?\s*(\d+)\s*[.!]?$/i;
const LEADING_NUMBER = /^(\d+(?:\.\d+)?|\.\d+)\s*(%|percentile\b|pct\b)?\s*(.*)$/i;
const CONNECTIVE = /^(?:(?:for|at|in|of|to|with|and|about)\b|[-,:@])\s*/i;

function stripConnectives(text: string): string {
    let rest = text.trim();
    while (CONNECTIVE.test(rest)) {
        rest = rest.replace(CONNECTIVE, '').trim();
    }
    return rest.replace(/[?.!]+$/, '').trim();
}

function namesCollege(text: string, collegeTerms: ReadonlySet<string>): boolean {
    return tokenize(text).some((token) => collegeTerms.has(token));
}

/**
 * `collegeTerms` are the words that identify a college (see KnowledgeSnapshot.collegeTerms)
 */
export function classifyQuery(raw: string, collegeTerms: ReadonlySet<string>): QueryIntent {
    const text = raw.trim();
    if (!text) {
        throw new InvalidInputError('Please type your rank, your percentile with a college name, or a question.');
    }

    if (RANK_ONLY.test(text)) {
        return { kind: 'rank', rank: Number(text) };
    }

    const rankPhrase = RANK_PHRASE.exec(text);
    if (rankPhrase) {
        return { kind: 'rank', rank: Number(rankPhrase[1]) };
    }

    const leading = LEADING_NUMBER.exec(text);
    if (leading) {
        const [, numberText, marker, rest] = leading;
        const value = Number(numberText);
        const remainder = stripConnectives(rest);
        const collegeName = remainder && namesCollege(remainder, collegeTerms) ? remainder : null;
        const isDecimal = numberText.includes('.');

        if (marker || (isDecimal && !remainder) || (collegeName && (isDecimal || value <= 100))) {
            return { kind: 'percentile', percentile: value, collegeName };
        }
    }

    return { kind: 'question', text };
}
