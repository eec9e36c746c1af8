/**
 * OpenRouter API Client with Key Rotation
 *
 * Rotates between the configured API keys when one is rate limited or
 * rejected (429/401/403). Each attempt is aborted after the configured timeout.
 * Responses are returned whole: answers are validated before anyone sees them.
 */

import { z } from 'zod';
import { DEFAULT_GENERATION_TIMEOUT_MS } from './config';
import { UpstreamGenerationError } from './errors';
import type { GenerationRequest, GenerationService } from './types';

const OPENROUTER_API_URL = 'https://openrouter.ai/api/v1/chat/completions';

export interface ChatMessage {
    role: 'system' | 'user' | 'assistant';
    content: string;
}

export interface OpenRouterRequest {
    model: string;
    messages: ChatMessage[];
    temperature?: number;
    max_tokens?: number;
}

const completionSchema = z.object({
    id: z.string().optional(),
    choices: z
        .array(
            z.object({
                message: z.object({
                    role: z.string(),
                    content: z.string().nullable(),
                }),
                finish_reason: z.string().nullable().optional(),
            })
        )
        .min(1),
    usage: z
        .object({
            prompt_tokens: z.number(),
            completion_tokens: z.number(),
            total_tokens: z.number(),
        })
        .optional(),
});

export type OpenRouterResponse = z.infer<typeof completionSchema>;

// Track key usage stats for monitoring
export interface KeyStats {
    requests: number;
    failures: number;
    lastUsed: Date | null;
}

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface OpenRouterClientOptions {
    apiKeys: string[];
    model: string;
    appUrl?: string;
    timeoutMs?: number;
    temperature?: number;
    maxTokens?: number;
    fetchImpl?: FetchLike;
}

/**
 * Check if response indicates rate limiting or auth failure
 */
function shouldRotateKey(status: number): boolean {
    return status === 429 || status === 401 || status === 403;
}

export class OpenRouterClient implements GenerationService {
    private readonly apiKeys: string[];
    private readonly model: string;
    private readonly appUrl: string;
    private readonly timeoutMs: number;
    private readonly temperature: number;
    private readonly maxTokens: number;
    private readonly fetchImpl: FetchLike;
    private readonly keyStats: Map<number, KeyStats>;

    // Track current key index (rotates on failure)
    private currentKeyIndex = 0;

    constructor(options: OpenRouterClientOptions) {
        this.apiKeys = options.apiKeys;
        this.model = options.model;
        this.appUrl = options.appUrl ?? 'http://localhost:3000';
        this.timeoutMs = options.timeoutMs ?? DEFAULT_GENERATION_TIMEOUT_MS;
        this.temperature = options.temperature ?? 0.5;
        this.maxTokens = options.maxTokens ?? 700;
        this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init));
        this.keyStats = new Map(
            this.apiKeys.map((_, i): [number, KeyStats] => [i, { requests: 0, failures: 0, lastUsed: null }])
        );
    }

    async generate(request: GenerationRequest): Promise<string> {
        const response = await this.chatCompletion({
            model: this.model,
            messages: [
                { role: 'system', content: request.systemPrompt },
                { role: 'user', content: request.userPrompt },
            ],
            temperature: this.temperature,
            max_tokens: this.maxTokens,
        });

        const content = response.choices[0]?.message.content?.trim();
        if (!content) {
            throw new UpstreamGenerationError('OpenRouter returned an empty completion');
        }
        return content;
    }

    /**
     * Make a chat completion request with automatic key rotation
     */
    async chatCompletion(payload: OpenRouterRequest): Promise<OpenRouterResponse> {
        if (this.apiKeys.length === 0) {
            throw new UpstreamGenerationError('No OpenRouter API keys configured');
        }

        const maxAttempts = this.apiKeys.length;
        let lastError: unknown = null;

        for (let attempt = 0; attempt < maxAttempts; attempt++) {
            const keyIndex = this.currentKeyIndex;
            const stats = this.keyStats.get(keyIndex);

            try {
                const response = await this.fetchImpl(OPENROUTER_API_URL, {
                    method: 'POST',
                    headers: {
                        Authorization: `Bearer ${this.apiKeys[keyIndex]}`,
                        'Content-Type': 'application/json',
                        'HTTP-Referer': this.appUrl,
                        'X-Title': 'CET-Mentor',
                    },
                    body: JSON.stringify({ ...payload, stream: false }),
                    signal: AbortSignal.timeout(this.timeoutMs),
                });

                if (shouldRotateKey(response.status)) {
                    console.log(`[OpenRouter] Key ${keyIndex + 1} returned ${response.status}, rotating...`);
                    lastError = new Error(`OpenRouter API error: ${response.status}`);
                    this.rotateKey();
                    continue;
                }

                if (!response.ok) {
                    const errorText = await response.text();
                    console.error(`[OpenRouter] API error: ${response.status} - ${errorText}`);
                    throw new Error(`OpenRouter API error: ${response.status}`);
                }

                const parsed = completionSchema.safeParse(await response.json());
                if (!parsed.success) {
                    throw new Error(`Unexpected OpenRouter response shape: ${parsed.error.issues[0]?.message}`);
                }

                // Update stats
                if (stats) {
                    stats.requests++;
                    stats.lastUsed = new Date();
                }

                return parsed.data;
            } catch (error) {
                console.error(`[OpenRouter] Request failed with key ${keyIndex + 1}:`, error);
                lastError = error;

                // Only rotate on errors if we haven't exhausted all keys
                if (attempt < maxAttempts - 1) {
                    this.rotateKey();
                }
            }
        }

        throw new UpstreamGenerationError('All OpenRouter API keys exhausted or failed', { cause: lastError });
    }

    /**
     * Get current key usage statistics (for monitoring)
     */
    getKeyStats(): { keyIndex: number; stats: KeyStats }[] {
        return Array.from(this.keyStats.entries()).map(([keyIndex, stats]) => ({
            keyIndex,
            stats: { ...stats },
        }));
    }

    /**
     * Rotate to the next API key
     */
    private rotateKey(): void {
        const stats = this.keyStats.get(this.currentKeyIndex);
        if (stats) {
            stats.failures++;
        }

        this.currentKeyIndex = (this.currentKeyIndex + 1) % this.apiKeys.length;
        console.log(`[OpenRouter] Rotating to key ${this.currentKeyIndex + 1}/${this.apiKeys.length}`);
    }
}
