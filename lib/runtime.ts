/**
 * Process-wide service wiring for the route handlers
 *
 * Built lazily on first use from environment configuration. A failed
 * startup load is not cached, so the next request retries it.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { ChatService } from './chat-service';
import { loadConfig, type MentorConfig } from './config';
import { CsvFeedbackSink, FallbackFeedbackSink, SupabaseFeedbackSink, type FeedbackSink } from './feedback-sink';
import { GroundedAnswerAssembler } from './grounded-answer';
import {
    FallbackKnowledgeSource,
    FileKnowledgeSource,
    KnowledgeBase,
    SupabaseKnowledgeSource,
    type KnowledgeSnapshot,
    type KnowledgeSource,
} from './knowledge-store';
import { OpenRouterClient } from './openrouter-client';
import { InMemorySessionStore } from './session-store';

export interface MentorRuntime {
    config: MentorConfig;
    knowledge: KnowledgeBase;
    generator: OpenRouterClient;
    chat: ChatService;
    reload(): Promise<KnowledgeSnapshot>;
}

let runtimePromise: Promise<MentorRuntime> | null = null;

/**
 * Supabase first when configured, the local JSON file otherwise (or on failure)
 */
function createKnowledgeSource(config: MentorConfig, supabase: SupabaseClient | null): KnowledgeSource {
    const file = new FileKnowledgeSource(config.knowledgeBasePath);
    return supabase ? new FallbackKnowledgeSource(new SupabaseKnowledgeSource(supabase), file) : file;
}

function createFeedbackSink(config: MentorConfig, supabase: SupabaseClient | null): FeedbackSink {
    const csv = new CsvFeedbackSink(config.feedbackLogPath);
    return supabase ? new FallbackFeedbackSink([new SupabaseFeedbackSink(supabase), csv]) : csv;
}

export async function createRuntime(config: MentorConfig = loadConfig()): Promise<MentorRuntime> {
    const supabase = config.supabase ? createClient(config.supabase.url, config.supabase.serviceRoleKey) : null;
    const source = createKnowledgeSource(config, supabase);

    const knowledge = new KnowledgeBase();
    await knowledge.reload(source);

    const generator = new OpenRouterClient({
        apiKeys: config.openRouter.apiKeys,
        model: config.openRouter.model,
        appUrl: config.openRouter.appUrl,
        timeoutMs: config.generationTimeoutMs,
    });

    const chat = new ChatService({
        assembler: new GroundedAnswerAssembler(knowledge, {
            ambitiousMargin: config.ambitiousMargin,
            retrievalLimit: config.retrievalLimit,
            sessionTtlMs: config.sessionTtlMs,
        }),
        generator,
        sessions: new InMemorySessionStore({ idleTtlMs: config.sessionTtlMs }),
        feedback: createFeedbackSink(config, supabase),
        maxContextTokens: config.maxContextTokens,
    });

    return {
        config,
        knowledge,
        generator,
        chat,
        reload: () => knowledge.reload(source),
    };
}

export function getRuntime(): Promise<MentorRuntime> {
    if (!runtimePromise) {
        runtimePromise = createRuntime().catch((error: unknown) => {
            runtimePromise = null;
            throw error;
        });
    }
    return runtimePromise;
}
