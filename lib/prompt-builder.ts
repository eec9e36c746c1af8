/**
 * Prompt Builder for grounded answers
 *
 * Renders a ContextBundle into system and user prompts with strict
 * no-hallucination rules. The model only rephrases the verified context.
 */

import { CHANCE_LABELS } from './admission-predictor';
import { DEFAULT_MAX_CONTEXT_TOKENS } from './config';
import type { CollegeRecord, ContextBundle } from './types';

export interface BuiltPrompt {
    systemPrompt: string;
    userPrompt: string;
    contextUsed: CollegeRecord[];
    tokenEstimate: number;
}

export interface PromptOptions {
    maxContextTokens?: number;
}

// System prompt with strict grounding rules
const SYSTEM_PROMPT = `You are **CET-Mentor**, an assistant for MHT-CET admissions to Maharashtra engineering colleges.

## STRICT RULES (NEVER VIOLATE):

1. **ONLY use facts from the VERIFIED CONTEXT below.** It is the single source of truth for cutoffs, ranks and percentiles.

2. **NEVER write a number that is not in the VERIFIED CONTEXT or in the student's message.** Do not estimate, round, average or invent cutoffs, ranks, percentiles, fees or seat counts. Answers containing other numbers are discarded.

3. **Stay within MHT-CET.** Politely decline questions about IITs, NITs, BITS, JEE or other exam systems.

4. **Be encouraging but realistic.** Explain what "safe" and "ambitious" mean when you present suggestions.

## RESPONSE FORMATTING:

- Use markdown bullet points and **bold** college names
- Mention the branch and seat category next to every cutoff
- Keep answers short and scannable`;

export const NO_DATA_REPLY = "I don't have data on that in my MHT-CET cutoff records.";

/**
 * Estimate token count (rough approximation: ~4 chars per token)
 */
export function estimateTokens(text: string): number {
    return Math.ceil(text.length / 4);
}

export function formatRecord(record: CollegeRecord): string {
    const parts = [
        `College: ${record.collegeName}`,
        `Branch: ${record.branch}`,
        `Category: ${record.category}`,
    ];
    if (record.location) parts.push(`Location: ${record.location}`);
    if (record.cutoffRank !== null) parts.push(`Cutoff rank: ${record.cutoffRank}`);
    if (record.cutoffPercentile !== null) parts.push(`Cutoff percentile: ${record.cutoffPercentile}`);
    return `- ${parts.join(' | ')}`;
}

/**
 * Add record lines until the token budget runs out
 */
function takeWithinBudget(
    records: readonly CollegeRecord[],
    budget: { remaining: number },
    used: CollegeRecord[]
): string[] {
    const lines: string[] = [];
    for (const record of records) {
        const line = formatRecord(record);
        const cost = estimateTokens(line);
        if (cost > budget.remaining) break;
        budget.remaining -= cost;
        lines.push(line);
        used.push(record);
    }
    return lines;
}

/**
 * Build the verified context block and the records it includes
 */
function buildContextBlock(bundle: ContextBundle, maxContextTokens: number): { block: string; used: CollegeRecord[] } {
    const budget = { remaining: maxContextTokens };
    const used: CollegeRecord[] = [];
    const sections: string[] = [];

    if (bundle.prediction) {
        const { prediction } = bundle;
        sections.push(
            [
                '**Admission estimate**',
                formatRecord(prediction.record),
                `- Student percentile minus cutoff percentile: ${prediction.delta}`,
                `- Chance: ${CHANCE_LABELS[prediction.category]}`,
            ].join('\n')
        );
        used.push(prediction.record);
    }

    if (bundle.suggestion) {
        const heading = bundle.followUp ? ' (from the earlier suggestion in this conversation)' : '';
        if (bundle.intent.kind === 'rank') {
            sections.push(`**Student rank:** ${bundle.intent.rank}`);
        }
        if (bundle.estimatedPercentile !== null) {
            sections.push(`**Approximate percentile for that rank:** ${bundle.estimatedPercentile}`);
        }

        const safe = takeWithinBudget(bundle.suggestion.safe, budget, used);
        sections.push(`**Safe options${heading}** (cutoff rank at or beyond the student's rank):\n${safe.join('\n') || '- none'}`);

        const ambitious = takeWithinBudget(bundle.suggestion.ambitious, budget, used);
        sections.push(
            `**Ambitious options${heading}** (cutoff rank slightly better than the student's rank):\n${ambitious.join('\n') || '- none'}`
        );
    }

    if (bundle.retrievedRecords.length > 0 && !bundle.prediction) {
        const lines = takeWithinBudget(bundle.retrievedRecords, budget, used);
        sections.push(`**Matching records:**\n${lines.join('\n')}`);
    }

    return { block: sections.join('\n\n'), used };
}

/**
 * Build the complete prompt for the LLM
 */
export function buildPrompt(bundle: ContextBundle, options: PromptOptions = {}): BuiltPrompt {
    if (!bundle.grounded) {
        return buildNoContextPrompt(bundle.rawQuery);
    }

    const { block, used } = buildContextBlock(bundle, options.maxContextTokens ?? DEFAULT_MAX_CONTEXT_TOKENS);

    const fullSystemPrompt = `${SYSTEM_PROMPT}

## VERIFIED CONTEXT (MHT-CET cutoff records):

${block}

## END OF CONTEXT

Remember: ONLY use the numbers above. If the answer is not there, say "${NO_DATA_REPLY}"`;

    return {
        systemPrompt: fullSystemPrompt,
        userPrompt: bundle.rawQuery,
        contextUsed: used,
        tokenEstimate: estimateTokens(fullSystemPrompt) + estimateTokens(bundle.rawQuery),
    };
}

/**
 * Build a prompt for when nothing in the knowledge base matched
 */
export function buildNoContextPrompt(userMessage: string): BuiltPrompt {
    const noContextSystem = `${SYSTEM_PROMPT}

## IMPORTANT: NO VERIFIED CONTEXT FOUND

Nothing in the cutoff records matched this question.

You MUST start your reply with: "${NO_DATA_REPLY}" Then suggest asking about a specific college or branch, or typing an MHT-CET rank for suggestions. Do not state any cutoff, rank or percentile.`;

    return {
        systemPrompt: noContextSystem,
        userPrompt: userMessage,
        contextUsed: [],
        tokenEstimate: estimateTokens(noContextSystem) + estimateTokens(userMessage),
    };
}

