/**
 * Feedback sinks
 *
 * Append-only log of {query, answer, rating} per turn. One record is emitted
 * when a turn completes (rating null) and another when the student rates it.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import type { SupabaseClient } from '@supabase/supabase-js';

export const FEEDBACK_TABLE = 'feedback';

export type FeedbackRating = 'up' | 'down';

export interface FeedbackRecord {
    turnId: string;
    sessionId: string;
    query: string;
    answer: string;
    rating: FeedbackRating | null;
    correction: string;
    timestamp: string; // ISO 8601
}

export interface FeedbackSink {
    readonly name: string;
    append(record: FeedbackRecord): Promise<void>;
}

const CSV_COLUMNS = ['timestamp', 'turn_id', 'session_id', 'rating', 'user_message', 'bot_response', 'correction'] as const;

function csvCell(value: string): string {
    return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function toCsvRow(record: FeedbackRecord): string {
    const cells = [
        record.timestamp,
        record.turnId,
        record.sessionId,
        record.rating ?? '',
        record.query,
        record.answer,
        record.correction,
    ];
    return cells.map(csvCell).join(',');
}

/**
 * Local CSV log; writes the header when it creates the file
 */
export class CsvFeedbackSink implements FeedbackSink {
    readonly name = 'csv';
    private readonly filePath: string;
    private pending: Promise<void> = Promise.resolve();

    constructor(filePath: string) {
        this.filePath = filePath;
    }

    append(record: FeedbackRecord): Promise<void> {
        // Serialize writes so two first appends cannot both write the header
        const write = this.pending.then(() => this.write(record));
        this.pending = write.catch((error: unknown) => {
            console.error('[Feedback] CSV append failed:', error);
        });
        return write;
    }

    private async write(record: FeedbackRecord): Promise<void> {
        await fs.mkdir(path.dirname(path.resolve(this.filePath)), { recursive: true });

        const exists = await fs.access(this.filePath).then(
            () => true,
            () => false
        );
        const header = exists ? '' : `${CSV_COLUMNS.join(',')}\n`;
        await fs.appendFile(this.filePath, `${header}${toCsvRow(record)}\n`, 'utf-8');
    }
}

export class SupabaseFeedbackSink implements FeedbackSink {
    readonly name = 'supabase';
    private readonly client: SupabaseClient;
    private readonly table: string;

    constructor(client: SupabaseClient, table: string = FEEDBACK_TABLE) {
        this.client = client;
        this.table = table;
    }

    async append(record: FeedbackRecord): Promise<void> {
        const { error } = await this.client.from(this.table).insert({
            turn_id: record.turnId,
            session_id: record.sessionId,
            user_message: record.query,
            bot_response: record.answer,
            rating: record.rating,
            correction: record.correction,
            created_at: record.timestamp,
        });

        if (error) {
            throw new Error(`Supabase insert into ${this.table} failed: ${error.message}`);
        }
    }
}

/**
 * Tries each sink in order until one accepts the record
 */
export class FallbackFeedbackSink implements FeedbackSink {
    readonly name: string;
    private readonly sinks: FeedbackSink[];

    constructor(sinks: FeedbackSink[]) {
        this.sinks = sinks;
        this.name = sinks.map((sink) => sink.name).join(' -> ');
    }

    async append(record: FeedbackRecord): Promise<void> {
        let lastError: unknown = new Error('No feedback sinks configured');

        for (const sink of this.sinks) {
            try {
                await sink.append(record);
                return;
            } catch (error) {
                console.error(`[Feedback] ${sink.name} sink failed:`, error);
                lastError = error;
            }
        }

        throw lastError;
    }
}
