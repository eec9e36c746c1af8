/**
 * Rebuilds the knowledge snapshot from its source. Requests keep reading the
 * previous snapshot until the new one is complete; a failed reload keeps it live.
 */

import { NextRequest, NextResponse } from 'next/server';
import { errorResponse } from '@/lib/http-errors';
import { getRuntime } from '@/lib/runtime';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

export async function POST(request: NextRequest) {
    try {
        const { config, reload } = await getRuntime();

        if (config.adminToken && request.headers.get('authorization') !== `Bearer ${config.adminToken}`) {
            return NextResponse.json({ error: 'Unauthorized' }, { status: 401 });
        }

        const snapshot = await reload();
        return NextResponse.json({
            status: 'ok',
            version: snapshot.version,
            records: snapshot.size,
            loadedAt: snapshot.loadedAt.toISOString(),
            diagnostics: snapshot.diagnostics,
        });
    } catch (error) {
        return errorResponse(error, 'Reload API');
    }
}
