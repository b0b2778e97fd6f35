import { findBestMatch, type MatchContext } from './matcher';
import type { NarrativeGenerator } from './narrative';
import { describePhase, type TrendPhase } from './phases';

export interface KeywordCheckResult {
    user_keyword: string;
    matched_category: string;
    category_similarity: number;
    matched_keyword: string;
    keyword_similarity: number;
    phase: TrendPhase | string;
    velocity: number;
    engagement_rate: number;
    velocity_description: string;
    engagement_description: string;
    phase_description: string;
    future_trend: string;
    insights: string[];
    recommendations: string[];
}

function round3(value: number): number {
    return Math.round(value * 1000) / 1000;
}

export function describeVelocity(velocity: number): string {
    return `${velocity.toFixed(1)} mentions per month (past 3 months)`;
}

export function describeEngagement(engagementRate: number): string {
    return `Popularity score: ${engagementRate.toFixed(3)}`;
}

/**
 * Keyword → category → keyword record → narrative analysis.
 * Match errors propagate; narrative problems never do.
 */
export class KeywordChecker {
    constructor(
        private context: MatchContext,
        private narrative: NarrativeGenerator
    ) {}

    async check(keyword: string): Promise<KeywordCheckResult> {
        const match = await findBestMatch(keyword, this.context);
        const { record } = match;

        const narrative = await this.narrative.analyze({
            keyword: match.user_keyword,
            category: match.matched_category,
            matchedKeyword: match.matched_keyword,
            phase: record.phase,
            velocity: record.velocity,
            engagementRate: record.engagement_rate
        });

        console.log(`[KeywordChecker] '${match.user_keyword}' -> ${match.matched_category} / ${match.matched_keyword} (analysis: ${narrative.source})`);

        return {
            user_keyword: match.user_keyword,
            matched_category: match.matched_category,
            category_similarity: round3(match.category_similarity),
            matched_keyword: match.matched_keyword,
            keyword_similarity: round3(match.keyword_similarity),
            phase: record.phase,
            velocity: record.velocity,
            engagement_rate: record.engagement_rate,
            velocity_description: describeVelocity(record.velocity),
            engagement_description: describeEngagement(record.engagement_rate),
            phase_description: describePhase(record.phase),
            future_trend: narrative.analysis.future_trend,
            insights: narrative.analysis.insights,
            recommendations: narrative.analysis.recommendations
        };
    }
}
