/**
 * Cutoff Ingestion Script
 *
 * Reads a raw scraper dump (JSON array), standardizes branch names, validates and
 * de-duplicates the rows, and writes the knowledge base the server loads.
 * Run with: npx tsx scripts/ingest-cutoffs.ts [data/raw/cutoffs.json]
 */

import * as fs from 'fs';
import * as path from 'path';
import * as dotenv from 'dotenv';
import { standardizeBranchName } from '../lib/branch-names';
import { buildSnapshot, canonicalizeRow, type LoadDiagnostics } from '../lib/knowledge-store';
import type { CollegeRecord } from '../lib/types';

dotenv.config({ path: '.env.local' });

const INPUT_FILE = path.resolve(process.argv[2] ?? path.join('data', 'raw', 'cutoffs.json'));
const OUTPUT_FILE = path.resolve(process.env.KNOWLEDGE_BASE_PATH || path.join('data', 'mht_cet_data.json'));
const REPORT_FILE = path.join(path.dirname(OUTPUT_FILE), 'ingest_report.json');

interface IngestReport {
    input_file: string;
    diagnostics: LoadDiagnostics;
    colleges: number;
    branches: Record<string, number>;
    timestamp: string;
}

/**
 * Highest cutoff percentile first, then college and branch
 */
function compareForOutput(a: CollegeRecord, b: CollegeRecord): number {
    const byPercentile = (b.cutoffPercentile ?? -1) - (a.cutoffPercentile ?? -1);
    if (byPercentile !== 0) return byPercentile;
    return a.collegeName.localeCompare(b.collegeName) || a.branch.localeCompare(b.branch);
}

function standardizeRows(rows: unknown[]): unknown[] {
    return rows.map((row) => {
        const canonical = canonicalizeRow(row);
        if (!canonical || typeof canonical.branch !== 'string') {
            return row; // left for the validator to count as invalid
        }
        return { ...canonical, branch: standardizeBranchName(canonical.branch) };
    });
}

function countBranches(records: readonly CollegeRecord[]): Record<string, number> {
    const counts: Record<string, number> = {};
    for (const record of records) {
        counts[record.branch] = (counts[record.branch] ?? 0) + 1;
    }
    return counts;
}

async function main(): Promise<void> {
    console.log('🚀 Starting cutoff ingestion...\n');

    console.log(`📖 Reading raw rows from: ${INPUT_FILE}`);
    if (!fs.existsSync(INPUT_FILE)) {
        console.error('❌ Input file not found! Pass the scraper dump path as the first argument.');
        process.exit(1);
    }

    const raw: unknown = JSON.parse(fs.readFileSync(INPUT_FILE, 'utf-8'));
    if (!Array.isArray(raw)) {
        console.error('❌ Input file must contain a JSON array of rows.');
        process.exit(1);
    }
    console.log(`   Found ${raw.length} rows`);

    console.log('\n🧹 Standardizing and validating...');
    const scrapedAt = new Date().toISOString();
    const snapshot = buildSnapshot(standardizeRows(raw));
    const records = [...snapshot.allRecords()].sort(compareForOutput);

    if (records.length === 0) {
        console.error('❌ No valid records survived validation; leaving the existing knowledge base untouched.');
        process.exit(1);
    }

    fs.mkdirSync(path.dirname(OUTPUT_FILE), { recursive: true });
    fs.writeFileSync(OUTPUT_FILE, JSON.stringify(records.map((record) => ({ ...record, scrapedAt })), null, 2));

    const report: IngestReport = {
        input_file: INPUT_FILE,
        diagnostics: snapshot.diagnostics,
        colleges: new Set(records.map((record) => record.collegeName)).size,
        branches: countBranches(records),
        timestamp: scrapedAt,
    };
    fs.writeFileSync(REPORT_FILE, JSON.stringify(report, null, 2));

    console.log('\n✅ Ingestion Complete!');
    console.log('─'.repeat(50));
    console.log(`   Accepted:       ${snapshot.diagnostics.accepted}`);
    console.log(`   Invalid:        ${snapshot.diagnostics.invalid}`);
    console.log(`   Missing cutoff: ${snapshot.diagnostics.missingCutoff}`);
    console.log(`   Duplicates:     ${snapshot.diagnostics.duplicates}`);
    console.log(`   Output:         ${OUTPUT_FILE}`);
    console.log('─'.repeat(50));
}

main().catch(console.error);
