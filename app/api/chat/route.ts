/**
 * Chat API Route
 *
 * Handles one chat turn through the grounded pipeline:
 * 1. Assemble verified context from the cutoff records
 * 2. Build the prompt and generate an answer via OpenRouter
 * 3. Validate the answer; unapproved answers are replaced by a rendering of the context
 */

import { NextRequest, NextResponse } from 'next/server';
import { z } from 'zod';
import { errorResponse } from '@/lib/http-errors';
import { getRuntime } from '@/lib/runtime';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

const chatRequestSchema = z.object({
    message: z.string().trim().min(1, 'Message is required').max(2000),
    sessionId: z.string().uuid().optional(),
});

export async function POST(request: NextRequest) {
    try {
        const parsed = chatRequestSchema.safeParse(await request.json().catch(() => null));
        if (!parsed.success) {
            return NextResponse.json(
                { error: parsed.error.issues[0]?.message ?? 'Invalid request body' },
                { status: 400 }
            );
        }

        const { message, sessionId } = parsed.data;
        console.log('[Chat API] Handling message:', message.slice(0, 50));

        const { chat } = await getRuntime();
        const turn = await chat.respond({ message, sessionId });

        console.log(`[Chat API] Turn ${turn.turnId} finished as ${turn.kind} with ${turn.sources.length} sources`);

        return NextResponse.json({
            turnId: turn.turnId,
            sessionId: turn.sessionId,
            kind: turn.kind,
            answer: turn.answer,
            grounded: turn.bundle?.grounded ?? false,
            sources: turn.sources.map((record) => ({
                collegeName: record.collegeName,
                branch: record.branch,
                category: record.category,
                cutoffRank: record.cutoffRank,
                cutoffPercentile: record.cutoffPercentile,
            })),
        });
    } catch (error) {
        return errorResponse(error, 'Chat API');
    }
}
