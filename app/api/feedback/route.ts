import { NextRequest, NextResponse } from 'next/server';
import { z } from 'zod';
import { errorResponse } from '@/lib/http-errors';
import { getRuntime } from '@/lib/runtime';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

const feedbackSchema = z.object({
    turnId: z.string().uuid(),
    sessionId: z.string().uuid(),
    query: z.string().max(2000),
    answer: z.string().max(20000),
    rating: z.enum(['up', 'down']),
    correction: z.string().max(2000).optional(),
});

export async function POST(request: NextRequest) {
    try {
        const parsed = feedbackSchema.safeParse(await request.json().catch(() => null));
        if (!parsed.success) {
            return NextResponse.json(
                { error: parsed.error.issues[0]?.message ?? 'Invalid request body' },
                { status: 400 }
            );
        }

        const { chat } = await getRuntime();
        await chat.rate(parsed.data);
        console.log(`[Feedback API] Stored ${parsed.data.rating} rating for turn ${parsed.data.turnId}`);

        return NextResponse.json({ status: 'ok' });
    } catch (error) {
        return errorResponse(error, 'Feedback API');
    }
}
