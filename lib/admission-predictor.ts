/**
 * Admission chance prediction
 *
 * A fixed step function over delta = percentile - cutoffPercentile.
 * Bands are closed at the lower bound and open at the upper bound:
 *
 *   delta >= 5        VeryHigh
 *   1 <= delta < 5    High
 *   -1 <= delta < 1   Medium
 *   -5 <= delta < -1  Low
 *   delta < -5        Unlikely
 */

import { PREDICTION_THRESHOLDS } from './config';
import { InvalidInputError } from './errors';
import type { ChanceCategory, CollegeRecord, PredictionResult } from './types';

export interface PredictionThresholds {
    veryHigh: number;
    high: number;
    medium: number;
    low: number;
}

export const CHANCE_LABELS: Record<ChanceCategory, string> = {
    VeryHigh: 'Very High',
    High: 'High',
    Medium: 'Medium (Borderline)',
    Low: 'Low',
    Unlikely: 'Unlikely',
};

// Percentiles carry at most 4 decimals; rounding keeps 99.2 - 94.2 exactly 5
function roundDelta(delta: number): number {
    return Math.round(delta * 10000) / 10000;
}

export function categorize(delta: number, thresholds: PredictionThresholds = PREDICTION_THRESHOLDS): ChanceCategory {
    if (delta >= thresholds.veryHigh) return 'VeryHigh';
    if (delta >= thresholds.high) return 'High';
    if (delta >= thresholds.medium) return 'Medium';
    if (delta >= thresholds.low) return 'Low';
    return 'Unlikely';
}

export function predict(
    percentile: number,
    record: CollegeRecord,
    thresholds: PredictionThresholds = PREDICTION_THRESHOLDS
): PredictionResult {
    if (!Number.isFinite(percentile) || percentile <= 0 || percentile > 100) {
        throw new InvalidInputError(`A percentile has to be above 0 and at most 100, but I got "${percentile}". What is your percentile?`);
    }
    if (record.cutoffPercentile === null) {
        throw new InvalidInputError(
            `I have no percentile cutoff on record for ${record.collegeName} (${record.branch}). Could you share your rank instead?`
        );
    }

    const delta = roundDelta(percentile - record.cutoffPercentile);
    return {
        category: categorize(delta, thresholds),
        delta,
        record,
    };
}
