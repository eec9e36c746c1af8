import { NextResponse } from 'next/server';
import { CetMentorError, InvalidInputError } from './errors';

// Data and generation failures are both retryable outages
function statusFor(error: CetMentorError): number {
    return error instanceof InvalidInputError ? 400 : 503;
}

/**
 * Map a thrown error onto the JSON error body the routes return
 */
export function errorResponse(error: unknown, tag: string): NextResponse {
    if (error instanceof CetMentorError) {
        console.error(`[${tag}] ${error.code}: ${error.message}`);
        return NextResponse.json(error.toJSON(), { status: statusFor(error) });
    }

    console.error(`[${tag}] Error:`, error);
    return NextResponse.json(
        { status: 'error', error_code: 'INTERNAL', message: 'Internal server error', retryable: false },
        { status: 500 }
    );
}
