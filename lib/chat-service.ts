/**
 * Chat Service
 *
 * Runs one chat turn:
 * 1. Load (or create) the session and take a working copy
 * 2. Assemble the grounded ContextBundle
 * 3. Build the prompt and call the generation service
 * 4. Validate the answer against the bundle, falling back to a deterministic rendering
 * 5. Write the session back and emit a feedback record
 *
 * A generation failure leaves the stored session untouched.
 */

import { v4 as uuidv4 } from 'uuid';
import { renderGroundedFallback, validateAnswer, type ValidationResult } from './answer-validator';
import { cloneSession } from './conversation-context';
import { CetMentorError, InvalidInputError, UpstreamGenerationError } from './errors';
import type { FeedbackRating, FeedbackSink } from './feedback-sink';
import type { GroundedAnswerAssembler } from './grounded-answer';
import { buildPrompt } from './prompt-builder';
import type { SessionStore } from './session-store';
import type { CollegeRecord, ContextBundle, GenerationService, SessionContext } from './types';

export type ChatTurnKind = 'answer' | 'fallback' | 'clarification';

export interface ChatTurn {
    turnId: string;
    sessionId: string;
    kind: ChatTurnKind;
    answer: string;
    bundle: ContextBundle | null;
    validation: ValidationResult | null;
    sources: CollegeRecord[];
}

export interface ChatRequest {
    message: string;
    sessionId?: string;
}

export interface RatingRequest {
    turnId: string;
    sessionId: string;
    query: string;
    answer: string;
    rating: FeedbackRating;
    correction?: string;
}

export interface ChatServiceDeps {
    assembler: GroundedAnswerAssembler;
    generator: GenerationService;
    sessions: SessionStore;
    feedback: FeedbackSink;
    maxContextTokens?: number;
    now?: () => number;
}

export class ChatService {
    private readonly assembler: GroundedAnswerAssembler;
    private readonly generator: GenerationService;
    private readonly sessions: SessionStore;
    private readonly feedback: FeedbackSink;
    private readonly maxContextTokens: number | undefined;
    private readonly now: () => number;

    constructor(deps: ChatServiceDeps) {
        this.assembler = deps.assembler;
        this.generator = deps.generator;
        this.sessions = deps.sessions;
        this.feedback = deps.feedback;
        this.maxContextTokens = deps.maxContextTokens;
        this.now = deps.now ?? Date.now;
    }

    async respond(request: ChatRequest): Promise<ChatTurn> {
        const session = await this.resolveSession(request.sessionId);
        const draft = cloneSession(session);
        const turnId = uuidv4();

        let bundle: ContextBundle;
        try {
            bundle = this.assembler.assemble(request.message, draft);
        } catch (error) {
            if (error instanceof InvalidInputError) {
                const turn: ChatTurn = {
                    turnId,
                    sessionId: session.id,
                    kind: 'clarification',
                    answer: error.message,
                    bundle: null,
                    validation: null,
                    sources: [],
                };
                await this.emit(turn, request.message);
                return turn;
            }
            throw error;
        }

        const prompt = buildPrompt(bundle, { maxContextTokens: this.maxContextTokens });
        const generated = await this.generate(prompt.systemPrompt, prompt.userPrompt);

        const validation = validateAnswer(generated, bundle);
        if (!validation.approved) {
            console.warn(`[Chat] Rejected generated answer with ungrounded numbers: ${validation.rejectedNumbers.join(', ')}`);
        }

        const turn: ChatTurn = {
            turnId,
            sessionId: session.id,
            kind: validation.approved ? 'answer' : 'fallback',
            answer: validation.approved ? generated : renderGroundedFallback(bundle),
            bundle,
            validation,
            sources: prompt.contextUsed,
        };

        await this.sessions.set(draft);
        await this.emit(turn, request.message);
        return turn;
    }

    /**
     * Record a thumbs up / down for an earlier turn
     */
    async rate(request: RatingRequest): Promise<void> {
        await this.feedback.append({
            turnId: request.turnId,
            sessionId: request.sessionId,
            query: request.query,
            answer: request.answer,
            rating: request.rating,
            correction: request.correction ?? '',
            timestamp: new Date(this.now()).toISOString(),
        });
    }

    private async resolveSession(sessionId: string | undefined): Promise<SessionContext> {
        if (sessionId) {
            const existing = await this.sessions.get(sessionId);
            if (existing) {
                return existing;
            }
        }
        return this.sessions.create();
    }

    private async generate(systemPrompt: string, userPrompt: string): Promise<string> {
        try {
            return await this.generator.generate({ systemPrompt, userPrompt });
        } catch (error) {
            if (error instanceof CetMentorError) {
                throw error;
            }
            throw new UpstreamGenerationError('Answer generation failed', { cause: error });
        }
    }

    /**
     * Feedback durability belongs to the sink; a failed append is logged, not fatal to the turn
     */
    private async emit(turn: ChatTurn, query: string): Promise<void> {
        try {
            await this.feedback.append({
                turnId: turn.turnId,
                sessionId: turn.sessionId,
                query,
                answer: turn.answer,
                rating: null,
                correction: '',
                timestamp: new Date(this.now()).toISOString(),
            });
        } catch (error) {
            console.error(`[Chat] Feedback record for turn ${turn.turnId} not stored:`, error);
        }
    }
}
