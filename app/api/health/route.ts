import { NextResponse } from 'next/server';
import { errorResponse } from '@/lib/http-errors';
import { getRuntime } from '@/lib/runtime';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

export async function GET() {
    try {
        const { knowledge, generator } = await getRuntime();
        const snapshot = knowledge.current();

        return NextResponse.json({
            status: 'ok',
            knowledge: { version: snapshot.version, records: snapshot.size, loadedAt: snapshot.loadedAt.toISOString() },
            keys: generator.getKeyStats(),
        });
    } catch (error) {
        return errorResponse(error, 'Health API');
    }
}
