import fs from 'fs/promises';
import path from 'path';
import NodeCache from 'node-cache';
import Papa from 'papaparse';
import { encodeAll, type EmbeddingProvider } from './embeddings';
import type { TrendPhase } from './phases';

// Types
export interface KeywordTrendRecord {
    keyword: string;
    phase: TrendPhase | string; // labels outside the five phases pass through
    velocity: number;           // mentions per month, 3-month slope
    engagement_rate: number;    // (likes + comments + shares) / views
}

export type DatasetLookup =
    | { status: 'found'; records: readonly KeywordTrendRecord[] }
    | { status: 'missing' }
    | { status: 'empty' };

interface CachedDataset {
    records: readonly KeywordTrendRecord[];
    vectors?: readonly (readonly number[])[];
}

interface RawRow {
    keyword?: string;
    phase?: string;
    velocity?: string;
    engagement_rate?: string;
}

export function datasetFileName(category: string): string {
    return `${category}_keyword_trend_phases.csv`;
}

function toNumber(value: string | undefined): number {
    const parsed = Number.parseFloat(value ?? '');
    return Number.isFinite(parsed) ? parsed : 0;
}

export function parseTrendCsv(text: string): KeywordTrendRecord[] {
    const result = Papa.parse<RawRow>(text, {
        header: true,
        skipEmptyLines: true,
        transformHeader: header => header.trim()
    });

    return result.data.map(row => ({
        keyword: (row.keyword ?? '').trim(),
        phase: (row.phase ?? '').trim(),
        velocity: toNumber(row.velocity),
        engagement_rate: toNumber(row.engagement_rate)
    }));
}

/**
 * Per-category keyword tables, read from
 * <dataDir>/third_layer_data/<category>_keyword_trend_phases.csv on first use.
 *
 * The cache never expires and never clones. Two requests racing on the same
 * uncached category both load it; the last `set` wins with identical data.
 */
export class TrendRecordStore {
    private cache = new NodeCache({ stdTTL: 0, checkperiod: 0, useClones: false });
    private datasetDir: string;

    constructor(dataDir: string) {
        this.datasetDir = path.join(dataDir, 'third_layer_data');
    }

    datasetPath(category: string): string {
        return path.join(this.datasetDir, datasetFileName(category));
    }

    async lookup(category: string): Promise<DatasetLookup> {
        const cached = this.cache.get<CachedDataset>(category);
        if (cached) {
            return cached.records.length > 0
                ? { status: 'found', records: cached.records }
                : { status: 'empty' };
        }

        let text: string;
        try {
            text = await fs.readFile(this.datasetPath(category), 'utf8');
        } catch (error) {
            if (isNotFound(error)) {
                console.warn(`[TrendStore] No dataset for category: ${category}`);
                return { status: 'missing' };
            }
            throw error;
        }

        const records = Object.freeze(parseTrendCsv(text).map(r => Object.freeze(r)));
        this.cache.set<CachedDataset>(category, { records });
        console.log(`[TrendStore] Loaded ${records.length} keywords for ${category}`);

        return records.length > 0 ? { status: 'found', records } : { status: 'empty' };
    }

    /**
     * Keyword vectors for a loaded category, encoded once and cached beside
     * the table. Index i of the result belongs to row i.
     */
    async keywordVectors(
        category: string,
        records: readonly KeywordTrendRecord[],
        provider: EmbeddingProvider
    ): Promise<readonly (readonly number[])[]> {
        const cached = this.cache.get<CachedDataset>(category);
        if (cached?.vectors && cached.records === records) {
            return cached.vectors;
        }

        const vectors = Object.freeze(await encodeAll(provider, records.map(r => r.keyword)));
        this.cache.set<CachedDataset>(category, { records, vectors });
        return vectors;
    }

    /**
     * The text a category is embedded under: its label followed by every
     * keyword of its dataset. A missing or empty dataset leaves the label.
     */
    async categoryProfile(category: string): Promise<string> {
        const dataset = await this.lookup(category);
        if (dataset.status !== 'found') {
            return category;
        }
        return [category, ...dataset.records.map(r => r.keyword)].join(' ');
    }

    clear(): void {
        this.cache.flushAll();
    }
}

function isNotFound(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
