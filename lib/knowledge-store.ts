/**
 * Knowledge Store
 *
 * Immutable snapshots of the college cutoff table. Rows are validated and
 * de-duplicated on load; a KnowledgeBase swaps in a new snapshot only after
 * it has been built completely, so readers never see a half-loaded table.
 */

import * as fs from 'fs/promises';
import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { DataUnavailableError } from './errors';
import { recordTokens, tokenize } from './text';
import type { CollegeRecord } from './types';

export const CUTOFF_TABLE = 'college_cutoffs';
const SUPABASE_PAGE_SIZE = 1000;
const DEFAULT_CATEGORY = 'General';

// ── Sources ─────────────────────────────────────────────────────

export interface KnowledgeSource {
    readonly description: string;
    fetchRows(): Promise<unknown[]>;
}

/**
 * JSON array file written by the scraper / ingest script
 */
export class FileKnowledgeSource implements KnowledgeSource {
    readonly description: string;
    private readonly filePath: string;

    constructor(filePath: string) {
        this.filePath = filePath;
        this.description = `file:${filePath}`;
    }

    async fetchRows(): Promise<unknown[]> {
        let content: string;
        try {
            content = await fs.readFile(this.filePath, 'utf-8');
        } catch (error) {
            throw new DataUnavailableError(`Knowledge base file not readable: ${this.filePath}`, { cause: error });
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(content);
        } catch (error) {
            throw new DataUnavailableError(`Knowledge base file is not valid JSON: ${this.filePath}`, { cause: error });
        }

        if (!Array.isArray(parsed)) {
            throw new DataUnavailableError(`Knowledge base file must contain a JSON array: ${this.filePath}`);
        }
        return parsed;
    }
}

/**
 * The `college_cutoffs` table, read page by page
 */
export class SupabaseKnowledgeSource implements KnowledgeSource {
    readonly description: string;
    private readonly client: SupabaseClient;
    private readonly table: string;

    constructor(client: SupabaseClient, table: string = CUTOFF_TABLE) {
        this.client = client;
        this.table = table;
        this.description = `supabase:${table}`;
    }

    async fetchRows(): Promise<unknown[]> {
        const rows: unknown[] = [];

        for (let from = 0; ; from += SUPABASE_PAGE_SIZE) {
            const { data, error } = await this.client
                .from(this.table)
                .select('*')
                .range(from, from + SUPABASE_PAGE_SIZE - 1);

            if (error) {
                throw new DataUnavailableError(`Supabase query on ${this.table} failed: ${error.message}`, {
                    cause: error,
                });
            }

            const page: unknown[] = data ?? [];
            rows.push(...page);
            if (page.length < SUPABASE_PAGE_SIZE) break;
        }

        return rows;
    }
}

/**
 * Tries the primary source, falls back to the secondary when it fails or is empty
 */
export class FallbackKnowledgeSource implements KnowledgeSource {
    readonly description: string;
    private readonly primary: KnowledgeSource;
    private readonly secondary: KnowledgeSource;

    constructor(primary: KnowledgeSource, secondary: KnowledgeSource) {
        this.primary = primary;
        this.secondary = secondary;
        this.description = `${primary.description} -> ${secondary.description}`;
    }

    async fetchRows(): Promise<unknown[]> {
        try {
            const rows = await this.primary.fetchRows();
            if (rows.length > 0) {
                return rows;
            }
            console.warn(`[KnowledgeStore] ${this.primary.description} returned no rows, falling back`);
        } catch (error) {
            console.error(`[KnowledgeStore] ${this.primary.description} failed, falling back:`, error);
        }
        return this.secondary.fetchRows();
    }
}

// ── Row validation ──────────────────────────────────────────────

// Field names the scraper and the Supabase table use for each record field
const FIELD_ALIASES = {
    collegeName: ['collegeName', 'college_name', 'college'],
    branch: ['branch', 'branch_name'],
    cutoffRank: ['cutoffRank', 'cutoff_rank', 'closing_rank'],
    cutoffPercentile: ['cutoffPercentile', 'cutoff_percentile', 'closing_percentile'],
    category: ['category'],
    location: ['location'],
    scrapedAt: ['scrapedAt', 'scraped_at'],
} as const;

export type CanonicalRow = Record<string, unknown>;

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Resolve field aliases into the record's own field names. Null for non-objects.
 */
export function canonicalizeRow(row: unknown): CanonicalRow | null {
    if (!isPlainObject(row)) {
        return null;
    }

    const canonical: CanonicalRow = {};
    for (const [field, aliases] of Object.entries(FIELD_ALIASES)) {
        const alias = aliases.find((name) => row[name] !== undefined && row[name] !== null);
        if (alias !== undefined) {
            canonical[field] = row[alias];
        }
    }
    return canonical;
}

/**
 * Numeric strings ("1,234", "99.2%") become numbers, blanks become null.
 * Garbage becomes NaN so the schema rejects it.
 */
function toNumeric(value: unknown): unknown {
    if (value === undefined || value === null) {
        return null;
    }
    if (typeof value === 'string') {
        const cleaned = value.replace(/,/g, '').replace(/%$/, '').trim();
        return cleaned === '' ? null : Number(cleaned);
    }
    return value;
}

const collegeRowSchema = z.object({
    collegeName: z.string().trim().min(1),
    branch: z.string().trim().min(1),
    cutoffRank: z.preprocess(toNumeric, z.number().int().positive().nullable()),
    cutoffPercentile: z.preprocess(toNumeric, z.number().gt(0).lte(100).nullable()),
    category: z.string().trim().optional(),
    location: z.string().trim().optional(),
    scrapedAt: z.string().optional(),
});

/**
 * "Walchand College of Engineering, Sangli" -> "Sangli"
 */
export function locationFromName(collegeName: string): string {
    const comma = collegeName.lastIndexOf(',');
    if (comma === -1) {
        return '';
    }
    return collegeName
        .slice(comma + 1)
        .replace(/\(.*?\)/g, '')
        .trim();
}

function recordKey(record: CollegeRecord): string {
    return [record.collegeName, record.branch, record.category].map((part) => part.toLowerCase()).join('\u0000');
}

function scrapedTime(scrapedAt: string | undefined): number {
    if (!scrapedAt) {
        return Number.NEGATIVE_INFINITY;
    }
    const time = Date.parse(scrapedAt);
    return Number.isNaN(time) ? Number.NEGATIVE_INFINITY : time;
}

/**
 * Lower cutoff rank first; records without a rank sort last
 */
export function compareByCutoffRank(a: CollegeRecord, b: CollegeRecord): number {
    if (a.cutoffRank === b.cutoffRank) return 0;
    if (a.cutoffRank === null) return 1;
    if (b.cutoffRank === null) return -1;
    return a.cutoffRank - b.cutoffRank;
}

// ── Snapshot ────────────────────────────────────────────────────

export interface LoadDiagnostics {
    totalRows: number;
    accepted: number;
    invalid: number; // malformed rows and non-numeric garbage
    missingCutoff: number; // neither rank nor percentile
    duplicates: number;
}

export class KnowledgeSnapshot {
    readonly version: number;
    readonly loadedAt: Date;
    readonly diagnostics: Readonly<LoadDiagnostics>;

    private readonly records: readonly CollegeRecord[];
    private readonly collegeIndex: ReadonlyMap<string, readonly CollegeRecord[]>;
    private readonly tokenIndex: WeakMap<CollegeRecord, ReadonlySet<string>>;
    private readonly terms: ReadonlySet<string>;
    private readonly nameTerms: ReadonlySet<string>;

    constructor(records: readonly CollegeRecord[], diagnostics: LoadDiagnostics, version: number, loadedAt: Date) {
        this.records = Object.freeze([...records]);
        this.diagnostics = Object.freeze({ ...diagnostics });
        this.version = version;
        this.loadedAt = loadedAt;

        const collegeIndex = new Map<string, CollegeRecord[]>();
        const tokenIndex = new WeakMap<CollegeRecord, ReadonlySet<string>>();
        const terms = new Set<string>();
        const nameTokens = new Set<string>();
        const sharedTokens = new Set<string>(); // branch and location words

        for (const record of this.records) {
            const key = record.collegeName.toLowerCase();
            const existing = collegeIndex.get(key);
            if (existing) {
                existing.push(record);
            } else {
                collegeIndex.set(key, [record]);
            }

            const tokens = recordTokens(record);
            tokenIndex.set(record, tokens);
            for (const token of tokens) terms.add(token);
            for (const token of tokenize(record.collegeName)) nameTokens.add(token);
            for (const token of tokenize(`${record.branch} ${record.location}`)) sharedTokens.add(token);
        }

        this.collegeIndex = collegeIndex;
        this.tokenIndex = tokenIndex;
        this.terms = terms;
        this.nameTerms = new Set([...nameTokens].filter((token) => !sharedTokens.has(token)));
    }

    get size(): number {
        return this.records.length;
    }

    allRecords(): readonly CollegeRecord[] {
        return this.records;
    }

    /**
     * Case-insensitive exact match on the college name
     */
    byCollege(name: string): readonly CollegeRecord[] {
        return this.collegeIndex.get(name.trim().toLowerCase()) ?? [];
    }

    /**
     * Search tokens of a record (college name, branch, location)
     */
    tokensFor(record: CollegeRecord): ReadonlySet<string> {
        return this.tokenIndex.get(record) ?? recordTokens(record);
    }

    /**
     * Every token that appears in some college name, branch or location
     */
    vocabulary(): ReadonlySet<string> {
        return this.terms;
    }

    /**
     * Tokens that only occur in college names ("coep", "walchand"), never in a
     * branch or location, so they identify a college on their own
     */
    collegeTerms(): ReadonlySet<string> {
        return this.nameTerms;
    }
}

/**
 * Validate and de-duplicate raw rows into a snapshot. Never throws; an empty
 * snapshot is the caller's decision to reject.
 */
export function buildSnapshot(rows: readonly unknown[], version: number = 1, loadedAt: Date = new Date()): KnowledgeSnapshot {
    const diagnostics: LoadDiagnostics = {
        totalRows: rows.length,
        accepted: 0,
        invalid: 0,
        missingCutoff: 0,
        duplicates: 0,
    };

    const latest = new Map<string, { record: CollegeRecord; scrapedAt: number }>();

    for (const row of rows) {
        const canonical = canonicalizeRow(row);
        const parsed = canonical ? collegeRowSchema.safeParse(canonical) : null;
        if (!parsed || !parsed.success) {
            diagnostics.invalid++;
            continue;
        }

        const { data } = parsed;
        if (data.cutoffRank === null && data.cutoffPercentile === null) {
            diagnostics.missingCutoff++;
            continue;
        }

        const record: CollegeRecord = Object.freeze({
            collegeName: data.collegeName,
            branch: data.branch,
            cutoffRank: data.cutoffRank,
            cutoffPercentile: data.cutoffPercentile,
            category: data.category || DEFAULT_CATEGORY,
            location: data.location || locationFromName(data.collegeName),
        });

        const key = recordKey(record);
        const scrapedAt = scrapedTime(data.scrapedAt);
        const existing = latest.get(key);

        if (existing) {
            diagnostics.duplicates++;
            // Later rows win ties, so an undated re-scrape replaces an undated original
            if (scrapedAt >= existing.scrapedAt) {
                latest.set(key, { record, scrapedAt });
            }
        } else {
            latest.set(key, { record, scrapedAt });
        }
    }

    const records = Array.from(latest.values(), (entry) => entry.record);
    diagnostics.accepted = records.length;

    return new KnowledgeSnapshot(records, diagnostics, version, loadedAt);
}

/**
 * Load a snapshot from a source. Fails with DataUnavailableError when the
 * source is unreadable or yields no valid records.
 */
export async function loadKnowledgeStore(source: KnowledgeSource, version: number = 1): Promise<KnowledgeSnapshot> {
    const rows = await source.fetchRows();
    const snapshot = buildSnapshot(rows, version);
    const { diagnostics } = snapshot;

    if (diagnostics.invalid > 0 || diagnostics.missingCutoff > 0) {
        console.warn(
            `[KnowledgeStore] Skipped ${diagnostics.invalid} invalid and ${diagnostics.missingCutoff} cutoff-less rows from ${source.description}`
        );
    }

    if (snapshot.size === 0) {
        throw new DataUnavailableError(`No valid college records in ${source.description}`, {
            details: { ...diagnostics },
        });
    }

    console.log(`[KnowledgeStore] Loaded ${snapshot.size} records (v${version}) from ${source.description}`);
    return snapshot;
}

/**
 * Holds the live snapshot. Reloads build a complete snapshot first and swap
 * the reference only on success; a failed reload leaves the prior snapshot live.
 */
export class KnowledgeBase {
    private snapshot: KnowledgeSnapshot | null = null;
    private nextVersion = 1;

    async reload(source: KnowledgeSource): Promise<KnowledgeSnapshot> {
        const version = this.nextVersion++;
        const next = await loadKnowledgeStore(source, version);

        // An older reload finishing late must not replace a newer snapshot
        if (!this.snapshot || next.version > this.snapshot.version) {
            this.snapshot = next;
        }
        return this.snapshot;
    }

    current(): KnowledgeSnapshot {
        if (!this.snapshot) {
            throw new DataUnavailableError('Knowledge base has not been loaded');
        }
        return this.snapshot;
    }
}

