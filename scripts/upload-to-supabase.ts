/**
 * Upload Cutoff Records to Supabase
 *
 * Reads the knowledge base file, validates it the same way the server does,
 * and upserts it into the college_cutoffs table.
 * Run with: npx tsx scripts/upload-to-supabase.ts
 */

import * as fs from 'fs';
import * as path from 'path';
import * as dotenv from 'dotenv';
import { createClient } from '@supabase/supabase-js';
import { buildSnapshot, CUTOFF_TABLE } from '../lib/knowledge-store';
import type { CollegeRecord } from '../lib/types';

dotenv.config({ path: '.env.local' });

const DATA_FILE = path.resolve(process.env.KNOWLEDGE_BASE_PATH || path.join('data', 'mht_cet_data.json'));
const BATCH_SIZE = 50;

const SUPABASE_URL = process.env.NEXT_PUBLIC_SUPABASE_URL || '';
const SUPABASE_KEY = process.env.SUPABASE_SERVICE_ROLE_KEY || '';

interface CutoffRow {
    college_name: string;
    branch: string;
    category: string;
    location: string;
    cutoff_rank: number | null;
    cutoff_percentile: number | null;
    scraped_at: string;
}

function toRow(record: CollegeRecord, scrapedAt: string): CutoffRow {
    return {
        college_name: record.collegeName,
        branch: record.branch,
        category: record.category,
        location: record.location,
        cutoff_rank: record.cutoffRank,
        cutoff_percentile: record.cutoffPercentile,
        scraped_at: scrapedAt,
    };
}

async function uploadToSupabase(rows: CutoffRow[]): Promise<{ success: number; failed: number }> {
    const supabase = createClient(SUPABASE_URL, SUPABASE_KEY);
    const batches = Math.ceil(rows.length / BATCH_SIZE);
    let success = 0;
    let failed = 0;

    for (let i = 0; i < rows.length; i += BATCH_SIZE) {
        const batch = rows.slice(i, i + BATCH_SIZE);
        const batchNumber = Math.floor(i / BATCH_SIZE) + 1;

        try {
            const { error } = await supabase
                .from(CUTOFF_TABLE)
                .upsert(batch, { onConflict: 'college_name,branch,category' });

            if (error) {
                console.error(`Batch ${batchNumber} failed:`, error.message);
                failed += batch.length;
            } else {
                success += batch.length;
                console.log(`Uploaded batch ${batchNumber}/${batches} (${success}/${rows.length})`);
            }
        } catch (err) {
            console.error(`Batch ${batchNumber} error:`, err);
            failed += batch.length;
        }

        await new Promise((resolve) => setTimeout(resolve, 100));
    }

    return { success, failed };
}

async function main(): Promise<void> {
    console.log('🚀 Starting Supabase upload...\n');

    if (!SUPABASE_URL || !SUPABASE_KEY) {
        console.error('❌ NEXT_PUBLIC_SUPABASE_URL or SUPABASE_SERVICE_ROLE_KEY not set!');
        console.log('\n📝 Please update your .env.local file with:');
        console.log('NEXT_PUBLIC_SUPABASE_URL=<your-project-url>');
        console.log('SUPABASE_SERVICE_ROLE_KEY=<your-service-role-key>');
        process.exit(1);
    }

    console.log(`📖 Reading records from: ${DATA_FILE}`);
    if (!fs.existsSync(DATA_FILE)) {
        console.error('❌ Knowledge base file not found! Run `npm run ingest` first.');
        process.exit(1);
    }

    const raw: unknown = JSON.parse(fs.readFileSync(DATA_FILE, 'utf-8'));
    const snapshot = buildSnapshot(Array.isArray(raw) ? raw : []);
    console.log(`   ${snapshot.size} valid records (${snapshot.diagnostics.invalid} invalid skipped)`);

    const scrapedAt = new Date().toISOString();
    const rows = snapshot.allRecords().map((record) => toRow(record, scrapedAt));

    console.log('\n⬆️  Uploading to Supabase...');
    const result = await uploadToSupabase(rows);

    console.log('\n✅ Upload Complete!');
    console.log('─'.repeat(50));
    console.log(`   Successful: ${result.success}`);
    console.log(`   Failed:     ${result.failed}`);
    console.log('─'.repeat(50));
}

main().catch(console.error);
