/**
 * Answer validation ("double approval")
 *
 * A generated answer reaches the student only if every number in it also
 * appears in the ContextBundle it was generated from. Rejected answers are
 * replaced by a deterministic rendering of the bundle itself.
 */

import { CHANCE_LABELS } from './admission-predictor';
import { NO_DATA_REPLY } from './prompt-builder';
import type { CollegeRecord, ContextBundle } from './types';

export interface ValidationResult {
    approved: boolean;
    rejectedNumbers: string[];
}

// Every digit run, wherever it sits: "Rs.185000", "B2", "1500th" and "12k" are all claims.
// Groups: integer part, fraction, magnitude suffix (glued or spaced word), ordinal suffix.
const NUMBER_PATTERN = /(\d{1,3}(?:,\d{3})+|\d+)(\.\d+)?(?:(k|l|cr)\b|\s?(lakhs?|lacs?|crores?)\b|(st|nd|rd|th)\b)?/gi;
// "1. ", "2) " at the start of a line
const LIST_MARKER = /^(\s*)\d+[.)]\s+/gm;

const MAGNITUDES: Record<string, number> = {
    k: 1_000,
    l: 100_000,
    lakh: 100_000,
    lakhs: 100_000,
    lac: 100_000,
    lacs: 100_000,
    cr: 10_000_000,
    crore: 10_000_000,
    crores: 10_000_000,
};

const FALLBACK_LIST_LIMIT = 7;

export interface NumericClaim {
    raw: string; // as written, suffix included
    value: number;
}

function numericKey(value: number): string {
    return (Math.round(Math.abs(value) * 10000) / 10000).toString();
}

/**
 * Numeric claims in free text. Magnitude suffixes scale the value ("12k" is 12000);
 * ordinals keep it ("1500th" is 1500).
 */
export function extractClaims(text: string): NumericClaim[] {
    const claims: NumericClaim[] = [];
    for (const match of text.replace(LIST_MARKER, '$1').matchAll(NUMBER_PATTERN)) {
        const [raw, integer, fraction, shortMagnitude, wordMagnitude] = match;
        const magnitude = (shortMagnitude ?? wordMagnitude)?.toLowerCase();
        const base = Number(`${integer.replace(/,/g, '')}${fraction ?? ''}`);
        claims.push({ raw, value: magnitude ? base * (MAGNITUDES[magnitude] ?? 1) : base });
    }
    return claims;
}

/**
 * Numbers mentioned in free text, as written
 */
export function extractNumbers(text: string): string[] {
    return extractClaims(text).map((claim) => claim.raw);
}

function bundleRecords(bundle: ContextBundle): CollegeRecord[] {
    const records = [...bundle.retrievedRecords];
    if (bundle.suggestion) records.push(...bundle.suggestion.safe, ...bundle.suggestion.ambitious);
    if (bundle.prediction) records.push(bundle.prediction.record);
    return records;
}

/**
 * Every value an answer may legitimately mention for this bundle
 */
export function allowedValues(bundle: ContextBundle): Set<string> {
    const values: number[] = [];

    for (const record of bundleRecords(bundle)) {
        if (record.cutoffRank !== null) values.push(record.cutoffRank);
        if (record.cutoffPercentile !== null) values.push(record.cutoffPercentile);
        // digits inside names ("Government Polytechnic 2") appear in the fallback rendering
        const text = `${record.collegeName} ${record.branch} ${record.location}`;
        values.push(...extractClaims(text).map((claim) => claim.value));
    }
    if (bundle.prediction) values.push(bundle.prediction.delta);
    if (bundle.estimatedPercentile !== null) values.push(bundle.estimatedPercentile);
    if (bundle.suggestion) values.push(bundle.suggestion.safe.length, bundle.suggestion.ambitious.length);
    values.push(bundle.retrievedRecords.length);
    values.push(...extractClaims(bundle.rawQuery).map((claim) => claim.value));

    return new Set(values.map(numericKey));
}

export function validateAnswer(answer: string, bundle: ContextBundle): ValidationResult {
    const allowed = allowedValues(bundle);
    const rejectedNumbers = extractClaims(answer)
        .filter((claim) => !allowed.has(numericKey(claim.value)))
        .map((claim) => claim.raw);

    return {
        approved: rejectedNumbers.length === 0,
        rejectedNumbers,
    };
}

function describeRecord(record: CollegeRecord): string {
    const cutoffs: string[] = [];
    if (record.cutoffRank !== null) cutoffs.push(`cutoff rank ${record.cutoffRank}`);
    if (record.cutoffPercentile !== null) cutoffs.push(`cutoff percentile ${record.cutoffPercentile}`);
    return `- **${record.collegeName}**, ${record.branch} (${record.category}): ${cutoffs.join(', ')}`;
}

function describeList(title: string, records: readonly CollegeRecord[]): string {
    if (records.length === 0) {
        return `**${title}:** none in my records.`;
    }
    const lines = records.slice(0, FALLBACK_LIST_LIMIT).map(describeRecord);
    return `**${title}:**\n${lines.join('\n')}`;
}

/**
 * Deterministic answer built only from bundle values
 */
export function renderGroundedFallback(bundle: ContextBundle): string {
    if (!bundle.grounded) {
        return `${NO_DATA_REPLY} Try asking about a specific college or branch, or type your MHT-CET rank for suggestions.`;
    }

    if (bundle.prediction) {
        const { prediction } = bundle;
        return [
            'Here is what the cutoff records say:',
            describeRecord(prediction.record),
            `Your chance of admission: **${CHANCE_LABELS[prediction.category]}**.`,
        ].join('\n');
    }

    if (bundle.suggestion) {
        const intro = bundle.followUp
            ? 'From the suggestions earlier in our conversation:'
            : 'Based on the cutoff records for your rank:';
        return [
            intro,
            describeList('Safe options', bundle.suggestion.safe),
            describeList('Ambitious options', bundle.suggestion.ambitious),
        ].join('\n\n');
    }

    return ['Here is what the cutoff records say:', ...bundle.retrievedRecords.map(describeRecord)].join('\n');
}
