/**
 * Shared data model for the grounding and scoring engine
 */

// ── Knowledge base ──────────────────────────────────────────────
export interface CollegeRecord {
    readonly collegeName: string;
    readonly branch: string;
    readonly cutoffRank: number | null; // lower is better
    readonly cutoffPercentile: number | null; // (0, 100]
    readonly category: string;
    readonly location: string;
}

// ── Derived results ─────────────────────────────────────────────
export interface SuggestionBucket {
    safe: readonly CollegeRecord[];
    ambitious: readonly CollegeRecord[];
}

export type ChanceCategory = 'VeryHigh' | 'High' | 'Medium' | 'Low' | 'Unlikely';

export interface PredictionResult {
    category: ChanceCategory;
    delta: number; // percentile - cutoffPercentile
    record: CollegeRecord;
}

// ── Session ─────────────────────────────────────────────────────
export interface SessionContext {
    id: string;
    lastSuggestion: SuggestionBucket | null;
    lastRankOrPercentile: number | null;
    lastMentionedColleges: Set<string>;
    createdAt: number; // epoch ms
    expiresAt: number; // epoch ms
}

// ── Query classification and grounding ──────────────────────────
export type QueryIntent =
    | { kind: 'rank'; rank: number }
    | { kind: 'percentile'; percentile: number; collegeName: string | null }
    | { kind: 'question'; text: string };

export interface ContextBundle {
    rawQuery: string;
    intent: QueryIntent;
    retrievedRecords: readonly CollegeRecord[];
    suggestion: SuggestionBucket | null;
    prediction: PredictionResult | null;
    estimatedPercentile: number | null;
    grounded: boolean;
    followUp: boolean;
    snapshotVersion: number;
}

// ── Generation ──────────────────────────────────────────────────
export interface GenerationRequest {
    systemPrompt: string;
    userPrompt: string;
}

export interface GenerationService {
    generate(request: GenerationRequest): Promise<string>;
}
