import { beforeAll, describe, expect, it } from 'vitest';
import { buildIndex } from './embeddings';
import { KeywordChecker, describeEngagement, describeVelocity } from './keywordChecker';
import type { MatchContext } from './matcher';
import { NarrativeGenerator, SERVICE_FAILED_ANALYSIS, SERVICE_UNAVAILABLE_ANALYSIS } from './narrative';
import { TrendRecordStore } from './trendStore';
import { FakeEmbeddingProvider, FakeLlmClient, FIXTURE_DIR, WELL_FORMED_RESPONSE } from './__fixtures__/fakes';

let context: MatchContext;

beforeAll(async () => {
    const embedder = new FakeEmbeddingProvider();
    context = {
        index: await buildIndex(embedder, ['Skincare & Anti-Aging', 'Makeup & Cosmetics']),
        embedder,
        store: new TrendRecordStore(FIXTURE_DIR)
    };
});

describe('metric descriptions', () => {
    it('formats velocity to one decimal', () => {
        expect(describeVelocity(12.3)).toBe('12.3 mentions per month (past 3 months)');
        expect(describeVelocity(-4.75)).toBe('-4.8 mentions per month (past 3 months)');
    });

    it('formats engagement to three decimals', () => {
        expect(describeEngagement(0.045)).toBe('Popularity score: 0.045');
        expect(describeEngagement(0.07349)).toBe('Popularity score: 0.073');
    });
});

describe('KeywordChecker', () => {
    it('assembles the full result for a matched keyword', async () => {
        const narrative = new NarrativeGenerator(new FakeLlmClient(async () => WELL_FORMED_RESPONSE), 1000);
        const result = await new KeywordChecker(context, narrative).check('dewy glow serum');

        expect(result).toMatchObject({
            user_keyword: 'dewy glow serum',
            matched_category: 'Skincare & Anti-Aging',
            category_similarity: 0.994,
            matched_keyword: 'hyaluronic acid',
            keyword_similarity: 1,
            phase: 'Growing',
            velocity: 12.3,
            engagement_rate: 0.045,
            velocity_description: '12.3 mentions per month (past 3 months)',
            engagement_description: 'Popularity score: 0.045',
            phase_description: 'This keyword is gaining momentum and popularity rapidly.'
        });
        expect(result.future_trend).toBe('Hyaluronic acid will keep climbing through the next two quarters as hydration routines spread.');
        expect(result.insights).toHaveLength(3);
        expect(result.recommendations).toHaveLength(3);
    });

    it('substitutes the service-failed analysis when the LLM call throws', async () => {
        const narrative = new NarrativeGenerator(
            new FakeLlmClient(async () => {
                throw new Error('upstream 500');
            }),
            1000
        );
        const result = await new KeywordChecker(context, narrative).check('dewy glow serum');

        expect(result.future_trend).toBe(SERVICE_FAILED_ANALYSIS.future_trend);
        expect(result.insights).toEqual(SERVICE_FAILED_ANALYSIS.insights);
        expect(result.recommendations).toEqual(SERVICE_FAILED_ANALYSIS.recommendations);
        expect(result.future_trend).not.toBe(SERVICE_UNAVAILABLE_ANALYSIS.future_trend);
    });

    it('substitutes the unavailable analysis without an LLM client', async () => {
        const result = await new KeywordChecker(context, new NarrativeGenerator(null, 1000)).check('dewy glow serum');

        expect(result.future_trend).toBe(SERVICE_UNAVAILABLE_ANALYSIS.future_trend);
        expect(result.matched_keyword).toBe('hyaluronic acid');
    });
});
