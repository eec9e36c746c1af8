/**
 * Runtime configuration
 *
 * Tuning constants are exported by name so they can be adjusted without
 * touching the algorithms; deployment settings come from the environment.
 */

import type { PredictionThresholds } from './admission-predictor';

// How far (in rank positions) above a student's rank a college may sit and still be "ambitious"
export const DEFAULT_AMBITIOUS_MARGIN = 5000;

// Lower bounds of each chance band, as percentile deltas. Intervals are closed-open.
export const PREDICTION_THRESHOLDS: PredictionThresholds = {
    veryHigh: 5,
    high: 1,
    medium: -1,
    low: -5,
};

// Approximate PCM candidate pool, used only for rank -> percentile estimates
export const ESTIMATED_CANDIDATES = 350000;

export const DEFAULT_RETRIEVAL_LIMIT = 5;
export const DEFAULT_SESSION_TTL_MINUTES = 30;
export const DEFAULT_GENERATION_TIMEOUT_MS = 30000;
export const DEFAULT_MAX_CONTEXT_TOKENS = 3000;
export const DEFAULT_MODEL = 'anthropic/claude-3.5-sonnet';

export interface SupabaseSettings {
    url: string;
    serviceRoleKey: string;
}

export interface OpenRouterSettings {
    apiKeys: string[];
    model: string;
    appUrl: string;
}

export interface MentorConfig {
    knowledgeBasePath: string;
    ambitiousMargin: number;
    retrievalLimit: number;
    sessionTtlMs: number;
    generationTimeoutMs: number;
    maxContextTokens: number;
    feedbackLogPath: string;
    adminToken: string | null; // guards POST /api/knowledge/reload when set
    supabase: SupabaseSettings | null;
    openRouter: OpenRouterSettings;
}

function readNumber(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
    const raw = env[name];
    if (!raw) {
        return fallback;
    }

    const value = Number(raw);
    if (!Number.isFinite(value) || value < 0) {
        console.warn(`[Config] Ignoring invalid ${name}=${raw}, using ${fallback}`);
        return fallback;
    }
    return value;
}

/**
 * Read configuration from the environment
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): MentorConfig {
    const supabaseUrl = env.NEXT_PUBLIC_SUPABASE_URL;
    const supabaseKey = env.SUPABASE_SERVICE_ROLE_KEY;

    return {
        knowledgeBasePath: env.KNOWLEDGE_BASE_PATH || 'data/mht_cet_data.json',
        ambitiousMargin: Math.floor(readNumber(env, 'AMBITIOUS_MARGIN', DEFAULT_AMBITIOUS_MARGIN)),
        retrievalLimit: Math.floor(readNumber(env, 'RETRIEVAL_LIMIT', DEFAULT_RETRIEVAL_LIMIT)),
        sessionTtlMs: readNumber(env, 'SESSION_TTL_MINUTES', DEFAULT_SESSION_TTL_MINUTES) * 60 * 1000,
        generationTimeoutMs: readNumber(env, 'GENERATION_TIMEOUT_MS', DEFAULT_GENERATION_TIMEOUT_MS),
        maxContextTokens: readNumber(env, 'MAX_CONTEXT_TOKENS', DEFAULT_MAX_CONTEXT_TOKENS),
        feedbackLogPath: env.FEEDBACK_LOG_PATH || 'feedback_log.csv',
        adminToken: env.ADMIN_TOKEN || null,
        supabase: supabaseUrl && supabaseKey ? { url: supabaseUrl, serviceRoleKey: supabaseKey } : null,
        openRouter: {
            apiKeys: [env.OPENROUTER_KEY_1, env.OPENROUTER_KEY_2, env.OPENROUTER_KEY_3].filter(
                (key): key is string => Boolean(key)
            ),
            model: env.OPENROUTER_MODEL || DEFAULT_MODEL,
            appUrl: env.NEXT_PUBLIC_APP_URL || 'http://localhost:3000',
        },
    };
}
