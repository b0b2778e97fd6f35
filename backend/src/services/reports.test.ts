import { beforeAll, describe, expect, it } from 'vitest';
import { loadCorpus, type Corpus } from './corpus';
import {
    categoryBreakdown,
    categoryIcon,
    classifyCategoryTrend,
    formatGrowth,
    growthChart,
    overviewMetrics,
    trendAnalysis,
    trendingKeywords,
    trendSummary
} from './reports';
import { FIXTURE_DIR } from './__fixtures__/fakes';

let corpus: Corpus;

beforeAll(async () => {
    corpus = await loadCorpus(FIXTURE_DIR);
});

describe('formatGrowth', () => {
    it('signs non-negative values explicitly', () => {
        expect(formatGrowth(7)).toBe('+7.0%');
        expect(formatGrowth(0)).toBe('+0.0%');
    });

    it('keeps the bare minus for negative values', () => {
        expect(formatGrowth(-3.21)).toBe('-3.2%');
    });
});

describe('classifyCategoryTrend', () => {
    it('uses a ±2 band for stable', () => {
        expect(classifyCategoryTrend(2)).toBe('stable');
        expect(classifyCategoryTrend(2.01)).toBe('up');
        expect(classifyCategoryTrend(-2)).toBe('stable');
        expect(classifyCategoryTrend(-2.5)).toBe('down');
    });
});

describe('categoryIcon', () => {
    it('falls back to a chart icon', () => {
        expect(categoryIcon('Makeup & Cosmetics')).toBe('💄');
        expect(categoryIcon('Nail Art')).toBe('📊');
    });
});

describe('trendingKeywords', () => {
    it('ranks every keyword by growth with its category', () => {
        const ranked = trendingKeywords(corpus.keywordInsights);

        expect(ranked.map(k => k.keyword)).toEqual([
            'peptide serum',
            'retinol',
            'vanity tour',
            'snail mucin',
            'soft glam',
            'cut crease'
        ]);
        expect(ranked[0].category).toBe('Skincare & Anti-Aging');
    });
});

describe('overviewMetrics', () => {
    it('counts keywords and finds the top grower', () => {
        expect(overviewMetrics(corpus.keywordInsights)).toEqual({
            total_keywords: 6,
            trending_up: 2,
            trending_down: 2,
            top_growth_rate: '+12.5%',
            top_keyword: 'peptide serum'
        });
    });

    it('reports N/A when nothing grows', () => {
        const metrics = overviewMetrics([{ category: 'Makeup & Cosmetics', keywords: [{ keyword: 'cut crease', growth_rate: -6, trend: 'down' }] }]);
        expect(metrics.top_keyword).toBe('N/A');
        expect(metrics.top_growth_rate).toBe('+0.0%');
    });
});

describe('categoryBreakdown', () => {
    it('scales engagement into a capped percentage and sorts by it', () => {
        const breakdown = categoryBreakdown(corpus);

        expect(breakdown.map(b => [b.name, b.percentage])).toEqual([
            ['Hair Coloring & Transformation', 100],
            ['Makeup & Cosmetics', 82],
            ['Skincare & Anti-Aging', 50]
        ]);
    });

    it('averages keyword growth per category', () => {
        const skincare = categoryBreakdown(corpus).find(b => b.name === 'Skincare & Anti-Aging');

        expect(skincare).toMatchObject({ count: 3, growth: '+5.0%', trend: 'up', icon: '🧴', viewCount: 2000 });
    });

    it('treats a category without keywords as flat and down', () => {
        const hair = categoryBreakdown(corpus).find(b => b.name === 'Hair Coloring & Transformation');
        expect(hair).toMatchObject({ count: 0, growth: '+0.0%', trend: 'down' });
    });
});

describe('trendAnalysis', () => {
    it('ranks populated categories by mean growth', () => {
        const analysis = trendAnalysis(corpus.keywordInsights);

        expect(analysis.map(a => [a.rank, a.category, a.trend, a.change])).toEqual([
            [1, 'Skincare & Anti-Aging', 'up', '+5.0%'],
            [2, 'Vlogs & Lifestyle', 'stable', '+1.0%'],
            [3, 'Makeup & Cosmetics', 'down', '-4.0%']
        ]);
    });

    it('lists top keywords with hot flags', () => {
        const [skincare] = trendAnalysis(corpus.keywordInsights);

        expect(skincare.keywords).toEqual([
            { keyword: 'peptide serum', growth: '+12.5%', trend: 'up', isHot: true },
            { keyword: 'retinol', growth: '+4.0%', trend: 'up', isHot: false },
            { keyword: 'snail mucin', growth: '-1.5%', trend: 'stable', isHot: false }
        ]);
        expect(skincare.trending_up_count).toBe(2);
        expect(skincare.trending_down_count).toBe(0);
    });
});

describe('trendSummary', () => {
    it('summarises category and keyword growth', () => {
        expect(trendSummary(corpus.keywordInsights)).toEqual({
            categories_trending_up_percentage: '25%',
            highest_growth: '+12.5%',
            hot_keywords_count: 1,
            avg_category_growth: '+0.7%'
        });
    });

    it('handles an empty corpus', () => {
        expect(trendSummary([])).toEqual({
            categories_trending_up_percentage: '0%',
            highest_growth: '+0.0%',
            hot_keywords_count: 0,
            avg_category_growth: '+0.0%'
        });
    });
});

describe('growthChart', () => {
    it('plots twelve months from the first three keywords of each category', () => {
        const chart = growthChart(corpus.keywordInsights);

        // (4 + 12.5 - 1.5) + (-6 - 2) + 0 + 1 = 8, so every point shifts by 0.8
        expect(chart).toHaveLength(12);
        expect(chart[0]).toEqual({ month: 'Jan', keywords: 100, engagement: 80, reach: 120 });
        expect(chart[11]).toEqual({ month: 'Dec', keywords: 232, engagement: 185, reach: 285 });
    });

    it('ignores keywords past the third of a category', () => {
        const chart = growthChart([{
            category: 'Makeup & Cosmetics',
            keywords: [
                { keyword: 'lip oil', growth_rate: 10, trend: 'up' },
                { keyword: 'soft glam', growth_rate: 10, trend: 'up' },
                { keyword: 'cut crease', growth_rate: 10, trend: 'up' },
                { keyword: 'blush draping', growth_rate: 1000, trend: 'up' }
            ]
        }]);
        expect(chart[0]).toEqual({ month: 'Jan', keywords: 103, engagement: 83, reach: 123 });
    });

    it('clamps negative values at zero', () => {
        const chart = growthChart([{
            category: 'Makeup & Cosmetics',
            keywords: [{ keyword: 'cut crease', growth_rate: -2000, trend: 'down' }]
        }]);

        expect(chart[0]).toEqual({ month: 'Jan', keywords: 0, engagement: 0, reach: 0 });
        expect(chart[11]).toEqual({ month: 'Dec', keywords: 32, engagement: 0, reach: 85 });
    });

    it('draws the plain baseline without insights', () => {
        expect(growthChart([]).map(p => p.keywords)).toEqual([100, 112, 124, 136, 148, 160, 172, 184, 196, 208, 220, 232]);
    });
});
