import path from 'path';
import { describe, expect, it } from 'vitest';
import { loadCorpus, parseKeywordInsights } from './corpus';
import { FIXTURE_DIR } from './__fixtures__/fakes';

describe('loadCorpus', () => {
    it('reads categories, summaries and keyword insights', async () => {
        const corpus = await loadCorpus(FIXTURE_DIR);

        expect(corpus.categories).toEqual([
            'Skincare & Anti-Aging',
            'Makeup & Cosmetics',
            'Hair Coloring & Transformation'
        ]);
        expect(corpus.categorySummaries[1]).toEqual({
            category: 'Makeup & Cosmetics',
            viewCount: 1000,
            likeCount: 70,
            commentCount: 12,
            engagement_rate: 0.082
        });
        expect(corpus.keywordInsights.map(g => g.category)).toEqual([
            'Skincare & Anti-Aging',
            'Makeup & Cosmetics',
            'Hair Coloring & Transformation',
            'Vlogs & Lifestyle'
        ]);
    });

    it('normalises loosely typed keyword entries', async () => {
        const corpus = await loadCorpus(FIXTURE_DIR);
        expect(corpus.keywordInsights[3].keywords).toEqual([
            { keyword: 'vanity tour', growth_rate: 1, trend: 'stable' }
        ]);
    });

    it('keeps the insights document as written beside the normalised copy', async () => {
        const corpus = await loadCorpus(FIXTURE_DIR);

        expect(Array.isArray(corpus.rawKeywordInsights)).toBe(true);
        if (!Array.isArray(corpus.rawKeywordInsights)) return;
        expect(corpus.rawKeywordInsights).toHaveLength(5);
        expect(corpus.rawKeywordInsights[3]).toEqual({
            category: 'Vlogs & Lifestyle',
            keywords: [{ keyword: 'vanity tour', growth_rate: '1.0', trend: 'sideways' }]
        });
        expect(corpus.rawKeywordInsights[4]).toBe('not an entry');
    });

    it('reads a missing data directory as an empty corpus', async () => {
        const corpus = await loadCorpus(path.join(FIXTURE_DIR, 'does-not-exist'));
        expect(corpus).toEqual({ categories: [], categorySummaries: [], keywordInsights: [], rawKeywordInsights: [] });
    });
});

describe('parseKeywordInsights', () => {
    it('returns nothing for a non-array document', () => {
        expect(parseKeywordInsights({ category: 'Makeup & Cosmetics' })).toEqual([]);
    });
});
