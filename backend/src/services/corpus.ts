import fs from 'fs/promises';
import path from 'path';
import Papa from 'papaparse';

// Types
export interface CategorySummary {
    category: string;
    viewCount: number;
    likeCount: number;
    commentCount: number;
    engagement_rate: number;
}

export type GrowthDirection = 'up' | 'down' | 'stable';

export interface KeywordGrowth {
    keyword: string;
    growth_rate: number;
    trend: GrowthDirection;
}

export interface KeywordGrowthInsight {
    category: string;
    keywords: KeywordGrowth[];
}

export interface Corpus {
    categories: string[];
    categorySummaries: CategorySummary[];
    keywordInsights: KeywordGrowthInsight[];
    // keyword_trend_insights.json exactly as read, for clients that want the labels untouched
    rawKeywordInsights: unknown;
}

async function readOptional(filePath: string): Promise<string | null> {
    try {
        return await fs.readFile(filePath, 'utf8');
    } catch (error) {
        console.error(`[Corpus] Error loading ${filePath}:`, error instanceof Error ? error.message : error);
        return null;
    }
}

function parseRows(text: string): Record<string, string>[] {
    return Papa.parse<Record<string, string>>(text, {
        header: true,
        skipEmptyLines: true,
        transformHeader: header => header.trim()
    }).data;
}

function toNumber(value: unknown): number {
    const parsed = typeof value === 'number' ? value : Number.parseFloat(String(value ?? ''));
    return Number.isFinite(parsed) ? parsed : 0;
}

function toDirection(value: unknown): GrowthDirection {
    return value === 'up' || value === 'down' ? value : 'stable';
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseCategoryList(text: string): string[] {
    return parseRows(text)
        .map(row => (row.category ?? '').trim())
        .filter(Boolean);
}

export function parseCategorySummaries(text: string): CategorySummary[] {
    return parseRows(text)
        .filter(row => (row.category ?? '').trim() !== '')
        .map(row => ({
            category: row.category.trim(),
            viewCount: Math.trunc(toNumber(row.viewCount)),
            likeCount: Math.trunc(toNumber(row.likeCount)),
            commentCount: Math.trunc(toNumber(row.commentCount)),
            engagement_rate: toNumber(row.engagement_rate)
        }));
}

export function parseKeywordInsights(json: unknown): KeywordGrowthInsight[] {
    if (!Array.isArray(json)) return [];

    return json.filter(isRecord).map(entry => ({
        category: typeof entry.category === 'string' ? entry.category : '',
        keywords: (Array.isArray(entry.keywords) ? entry.keywords : [])
            .filter(isRecord)
            .map(kw => ({
                keyword: typeof kw.keyword === 'string' ? kw.keyword : '',
                growth_rate: toNumber(kw.growth_rate),
                trend: toDirection(kw.trend)
            }))
    }));
}

/**
 * Loads <dataDir>/outputs/{category.csv, category_trends.csv,
 * keyword_trend_insights.json}. A missing or broken file reads as empty.
 */
export async function loadCorpus(dataDir: string): Promise<Corpus> {
    const outputs = path.join(dataDir, 'outputs');

    const [categoryText, summaryText, insightsText] = await Promise.all([
        readOptional(path.join(outputs, 'category.csv')),
        readOptional(path.join(outputs, 'category_trends.csv')),
        readOptional(path.join(outputs, 'keyword_trend_insights.json'))
    ]);

    let keywordInsights: KeywordGrowthInsight[] = [];
    let rawKeywordInsights: unknown = [];
    if (insightsText) {
        try {
            rawKeywordInsights = JSON.parse(insightsText);
            keywordInsights = parseKeywordInsights(rawKeywordInsights);
        } catch (error) {
            console.error('[Corpus] Error parsing keyword trend insights:', error);
        }
    }

    const corpus: Corpus = {
        categories: categoryText ? parseCategoryList(categoryText) : [],
        categorySummaries: summaryText ? parseCategorySummaries(summaryText) : [],
        keywordInsights,
        rawKeywordInsights
    };

    console.log(`[Corpus] Loaded ${corpus.categories.length} categories, ${corpus.categorySummaries.length} summaries, ${corpus.keywordInsights.length} keyword groups`);
    return corpus;
}
