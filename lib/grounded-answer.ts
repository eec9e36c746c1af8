/**
 * Grounded Answer Assembler
 *
 * Turns a raw query into a ContextBundle before any text generation happens:
 * 1. Classify the query (rank / percentile / free text)
 * 2. Suggest, predict or retrieve against one knowledge snapshot
 * 3. Update the session's conversation context
 *
 * Every fact in the bundle traces back to a CollegeRecord of that snapshot.
 */

import { predict } from './admission-predictor';
import { DEFAULT_AMBITIOUS_MARGIN, DEFAULT_RETRIEVAL_LIMIT, DEFAULT_SESSION_TTL_MINUTES } from './config';
import { ConversationContext } from './conversation-context';
import { InvalidInputError } from './errors';
import type { KnowledgeBase, KnowledgeSnapshot } from './knowledge-store';
import { bucketSize, rankToPercentile, suggest } from './rank-suggester';
import { classifyQuery } from './query-classifier';
import { search } from './retrieval';
import type { ContextBundle, QueryIntent, SessionContext } from './types';

export interface AssemblerOptions {
    ambitiousMargin?: number;
    retrievalLimit?: number;
    sessionTtlMs?: number;
    category?: string; // seat category used for rank suggestions
    now?: () => number;
}

type Intent<K extends QueryIntent['kind']> = Extract<QueryIntent, { kind: K }>;

export class GroundedAnswerAssembler {
    private readonly knowledge: KnowledgeBase;
    private readonly ambitiousMargin: number;
    private readonly retrievalLimit: number;
    private readonly sessionTtlMs: number;
    private readonly category: string | undefined;
    private readonly now: () => number;

    constructor(knowledge: KnowledgeBase, options: AssemblerOptions = {}) {
        this.knowledge = knowledge;
        this.ambitiousMargin = options.ambitiousMargin ?? DEFAULT_AMBITIOUS_MARGIN;
        this.retrievalLimit = options.retrievalLimit ?? DEFAULT_RETRIEVAL_LIMIT;
        this.sessionTtlMs = options.sessionTtlMs ?? DEFAULT_SESSION_TTL_MINUTES * 60 * 1000;
        this.category = options.category;
        this.now = options.now ?? Date.now;
    }

    /**
     * Build the bundle for one turn. Mutates `session` (pass a copy when the
     * turn may still fail). Throws InvalidInputError for malformed numbers.
     */
    assemble(rawQuery: string, session: SessionContext): ContextBundle {
        const snapshot = this.knowledge.current();
        const intent = classifyQuery(rawQuery, snapshot.collegeTerms());
        const context = new ConversationContext(session, { ttlMs: this.sessionTtlMs, now: this.now });

        const base: ContextBundle = {
            rawQuery,
            intent,
            retrievedRecords: [],
            suggestion: null,
            prediction: null,
            estimatedPercentile: null,
            grounded: false,
            followUp: false,
            snapshotVersion: snapshot.version,
        };

        switch (intent.kind) {
            case 'rank':
                return this.assembleRank(base, intent, snapshot, context);
            case 'percentile':
                return this.assemblePrediction(base, intent, snapshot, context);
            case 'question':
                return this.assembleQuestion(base, intent, snapshot, context);
        }
    }

    private assembleRank(
        base: ContextBundle,
        intent: Intent<'rank'>,
        snapshot: KnowledgeSnapshot,
        context: ConversationContext
    ): ContextBundle {
        const suggestion = suggest(snapshot, intent.rank, this.ambitiousMargin, { category: this.category });
        context.update(suggestion, intent.rank);

        return {
            ...base,
            suggestion,
            estimatedPercentile: rankToPercentile(intent.rank),
            grounded: bucketSize(suggestion) > 0,
        };
    }

    private assemblePrediction(
        base: ContextBundle,
        intent: Intent<'percentile'>,
        snapshot: KnowledgeSnapshot,
        context: ConversationContext
    ): ContextBundle {
        const { percentile } = intent;
        if (!(percentile > 0 && percentile <= 100)) {
            throw new InvalidInputError(
                `A percentile has to be above 0 and at most 100, but I got "${percentile}". What is your percentile?`
            );
        }

        const collegeName = intent.collegeName ?? context.mentionedCollege();
        if (!collegeName) {
            throw new InvalidInputError(`Which college should I check a percentile of ${percentile} against?`);
        }

        // Best-scoring match that has a percentile cutoff; a rank-only branch cannot be compared
        const matches = search(snapshot, collegeName, snapshot.size);
        const record = matches.find((candidate) => candidate.cutoffPercentile !== null) ?? matches[0];
        if (!record) {
            return base;
        }

        const prediction = predict(percentile, record);
        context.remember([record], percentile);

        return {
            ...base,
            retrievedRecords: [record],
            prediction,
            grounded: true,
        };
    }

    private assembleQuestion(
        base: ContextBundle,
        intent: Intent<'question'>,
        snapshot: KnowledgeSnapshot,
        context: ConversationContext
    ): ContextBundle {
        const followUp = context.resolveFollowUp(intent.text, snapshot.vocabulary());
        if (followUp) {
            context.remember([...followUp.safe, ...followUp.ambitious]);
            return {
                ...base,
                suggestion: followUp,
                grounded: true,
                followUp: true,
            };
        }

        const retrievedRecords = search(snapshot, intent.text, this.retrievalLimit);
        if (retrievedRecords.length > 0) {
            context.remember(retrievedRecords);
        }

        return {
            ...base,
            retrievedRecords,
            grounded: retrievedRecords.length > 0,
        };
    }
}
