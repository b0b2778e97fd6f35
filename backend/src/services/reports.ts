/**
 * Read-only aggregate reports over the precomputed corpus.
 * Every function here is pure; the server calls them per request.
 */
import type { Corpus, GrowthDirection, KeywordGrowth, KeywordGrowthInsight } from './corpus';

// --- Thresholds ---

export const CATEGORY_TREND_THRESHOLD = 2;   // mean growth %, above = up, below -x = down
export const HOT_KEYWORD_THRESHOLD = 10;     // growth % above which a keyword is "hot"
const TOP_TRENDING_LIMIT = 20;
const TOP_KEYWORDS_PER_CATEGORY = 5;
const CHART_KEYWORDS_PER_CATEGORY = 3;

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

const CATEGORY_ICONS: Record<string, string> = {
    'Beauty Reviews & Brands': '⭐',
    'General Beauty & Buzzwords': '🎯',
    'Facial Care & Exercises': '✨',
    'Hair Coloring & Transformation': '🎨',
    "Hair Styling & Men's Grooming": '✂️',
    'Hair Transformations & Makeovers': '💇',
    'Makeup & Cosmetics': '💄',
    "Men's Fashion & Style": '👔',
    'Skincare & Anti-Aging': '🧴',
    'Vlogs & Lifestyle': '📹'
};

export function categoryIcon(category: string): string {
    return CATEGORY_ICONS[category] ?? '📊';
}

/**
 * "+12.3%" for zero and above, "-4.5%" below zero.
 */
export function formatGrowth(value: number): string {
    return value >= 0 ? `+${value.toFixed(1)}%` : `${value.toFixed(1)}%`;
}

function meanGrowth(keywords: KeywordGrowth[]): number {
    if (keywords.length === 0) return 0;
    return keywords.reduce((sum, kw) => sum + kw.growth_rate, 0) / keywords.length;
}

function byGrowthDesc(a: KeywordGrowth, b: KeywordGrowth): number {
    return b.growth_rate - a.growth_rate;
}

export function classifyCategoryTrend(avgGrowth: number): GrowthDirection {
    if (avgGrowth > CATEGORY_TREND_THRESHOLD) return 'up';
    if (avgGrowth < -CATEGORY_TREND_THRESHOLD) return 'down';
    return 'stable';
}

// ============================================================================
// REPORTS
// ============================================================================

export interface TrendingKeyword extends KeywordGrowth {
    category: string;
}

export function trendingKeywords(insights: KeywordGrowthInsight[]): TrendingKeyword[] {
    return insights
        .flatMap(group => group.keywords.map(kw => ({ ...kw, category: group.category })))
        .sort(byGrowthDesc)
        .slice(0, TOP_TRENDING_LIMIT);
}

export interface OverviewMetrics {
    total_keywords: number;
    trending_up: number;
    trending_down: number;
    top_growth_rate: string;
    top_keyword: string;
}

export function overviewMetrics(insights: KeywordGrowthInsight[]): OverviewMetrics {
    const all = insights.flatMap(group => group.keywords);

    let topGrowth = 0;
    let topKeyword = 'N/A';
    for (const kw of all) {
        if (kw.growth_rate > topGrowth) {
            topGrowth = kw.growth_rate;
            topKeyword = kw.keyword || 'N/A';
        }
    }

    return {
        total_keywords: all.length,
        trending_up: all.filter(kw => kw.trend === 'up').length,
        trending_down: all.filter(kw => kw.trend === 'down').length,
        top_growth_rate: formatGrowth(topGrowth),
        top_keyword: topKeyword
    };
}

export interface CategoryBreakdownItem {
    name: string;
    count: number;
    percentage: number;
    growth: string;
    trend: 'up' | 'down';
    icon: string;
    viewCount: number;
    likeCount: number;
    commentCount: number;
    engagement_rate: number;
}

export function categoryBreakdown(corpus: Pick<Corpus, 'categorySummaries' | 'keywordInsights'>): CategoryBreakdownItem[] {
    return corpus.categorySummaries
        .map(summary => {
            const keywords = corpus.keywordInsights.find(g => g.category === summary.category)?.keywords ?? [];
            const growth = meanGrowth(keywords);

            return {
                name: summary.category,
                count: keywords.length,
                // engagement rates sit around 0.01-0.1, scaled into a 0-100 bar
                percentage: Math.min(100, Math.max(0, Math.trunc(summary.engagement_rate * 1000))),
                growth: formatGrowth(growth),
                trend: growth > 0 ? 'up' as const : 'down' as const,
                icon: categoryIcon(summary.category),
                viewCount: summary.viewCount,
                likeCount: summary.likeCount,
                commentCount: summary.commentCount,
                engagement_rate: summary.engagement_rate
            };
        })
        .sort((a, b) => b.percentage - a.percentage);
}

export interface TrendAnalysisKeyword {
    keyword: string;
    growth: string;
    trend: GrowthDirection;
    isHot: boolean;
}

export interface CategoryTrendAnalysis {
    category: string;
    trend: GrowthDirection;
    change: string;
    icon: string;
    rank: number;
    keywords: TrendAnalysisKeyword[];
    avg_growth: number;
    trending_up_count: number;
    trending_down_count: number;
}

export function trendAnalysis(insights: KeywordGrowthInsight[]): CategoryTrendAnalysis[] {
    const analysis = insights
        .filter(group => group.keywords.length > 0)
        .map(group => {
            const avgGrowth = meanGrowth(group.keywords);

            return {
                category: group.category,
                trend: classifyCategoryTrend(avgGrowth),
                change: formatGrowth(avgGrowth),
                icon: categoryIcon(group.category),
                rank: 0,
                keywords: [...group.keywords]
                    .sort(byGrowthDesc)
                    .slice(0, TOP_KEYWORDS_PER_CATEGORY)
                    .map(kw => ({
                        keyword: kw.keyword,
                        growth: formatGrowth(kw.growth_rate),
                        trend: kw.trend,
                        isHot: kw.growth_rate > HOT_KEYWORD_THRESHOLD
                    })),
                avg_growth: avgGrowth,
                trending_up_count: group.keywords.filter(kw => kw.trend === 'up').length,
                trending_down_count: group.keywords.filter(kw => kw.trend === 'down').length
            };
        })
        .sort((a, b) => b.avg_growth - a.avg_growth);

    return analysis.map((item, i) => ({ ...item, rank: i + 1 }));
}

export interface TrendSummary {
    categories_trending_up_percentage: string;
    highest_growth: string;
    hot_keywords_count: number;
    avg_category_growth: string;
}

export function trendSummary(insights: KeywordGrowthInsight[]): TrendSummary {
    const populated = insights.filter(group => group.keywords.length > 0);
    const averages = populated.map(group => meanGrowth(group.keywords));
    const all = populated.flatMap(group => group.keywords);

    const trendingUp = averages.filter(avg => avg > CATEGORY_TREND_THRESHOLD).length;
    const percentageUp = insights.length > 0 ? (trendingUp / insights.length) * 100 : 0;
    const highest = all.length > 0 ? Math.max(...all.map(kw => kw.growth_rate)) : 0;
    const avgCategoryGrowth = averages.length > 0
        ? averages.reduce((sum, avg) => sum + avg, 0) / averages.length
        : 0;

    return {
        categories_trending_up_percentage: `${percentageUp.toFixed(0)}%`,
        highest_growth: formatGrowth(highest),
        hot_keywords_count: all.filter(kw => kw.growth_rate > HOT_KEYWORD_THRESHOLD).length,
        avg_category_growth: formatGrowth(avgCategoryGrowth)
    };
}

export interface GrowthChartPoint {
    month: string;
    keywords: number;
    engagement: number;
    reach: number;
}

/**
 * A year of chart points: a linear baseline of 100 + 10 per month, shifted by
 * a tenth of the summed growth of each category's first three keywords.
 * Values are truncated to integers and never drop below 0.
 */
export function growthChart(insights: KeywordGrowthInsight[]): GrowthChartPoint[] {
    const variation = insights
        .flatMap(group => group.keywords.slice(0, CHART_KEYWORDS_PER_CATEGORY))
        .reduce((sum, kw) => sum + kw.growth_rate, 0) / 10;

    const point = (value: number) => Math.max(0, Math.trunc(value));

    return MONTHS.map((month, i) => {
        const base = 100 + i * 10;
        return {
            month,
            keywords: point(base + variation + i * 2),
            engagement: point(base * 0.8 + variation + i * 1.5),
            reach: point(base * 1.2 + variation + i * 3)
        };
    });
}
