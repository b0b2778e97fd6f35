import Groq from 'groq-sdk';
import { ServiceError } from './errors';
import type { TrendPhase } from './phases';
import { cloneAnalysis, parseNarrativeResponse, type AnalysisResult } from './responseParser';

// Types
export interface LlmClient {
    readonly model: string;
    generate(prompt: string): Promise<string>;
}

export interface NarrativeInput {
    keyword: string;
    category: string;
    matchedKeyword: string;
    phase: TrendPhase | string;
    velocity: number;
    engagementRate: number;
}

export type NarrativeSource = 'llm' | 'unavailable' | 'failed' | 'parse_failed';

export interface NarrativeResult {
    source: NarrativeSource;
    analysis: AnalysisResult;
}

// ============================================================================
// FALLBACKS
// ============================================================================

// No LLM client configured
export const SERVICE_UNAVAILABLE_ANALYSIS: AnalysisResult = {
    future_trend: 'AI analysis temporarily unavailable',
    insights: [
        'Manual trend analysis required',
        'Data shows current engagement patterns',
        'Phase classification reflects recent mention velocity'
    ],
    recommendations: [
        'Monitor velocity changes',
        'Track engagement trends',
        'Revisit this keyword once AI analysis is available'
    ]
};

// Client configured but the call failed or timed out
export const SERVICE_FAILED_ANALYSIS: AnalysisResult = {
    future_trend: 'Trend analysis indicates potential market evolution based on current metrics',
    insights: [
        'Current engagement levels suggest active audience interest',
        'Velocity patterns indicate momentum changes in market attention',
        'Category positioning shows competitive landscape dynamics'
    ],
    recommendations: [
        'Monitor weekly mention patterns for early trend detection',
        'Track competitor engagement strategies in this category',
        'Adjust content strategy based on audience engagement feedback'
    ]
};

// ============================================================================
// PROMPT
// ============================================================================

export function buildNarrativePrompt(input: NarrativeInput): string {
    return `You are a beauty industry trend analyst. Analyze the following keyword data and provide clear, actionable insights.

KEYWORD DATA:
- User Input: "${input.keyword}"
- Best Category Match: "${input.category.replace(/_/g, ' ')}"
- Similar Keyword: "${input.matchedKeyword}"
- Trend Phase: ${input.phase}
- Velocity: ${input.velocity.toFixed(1)} mentions/month (3-month trend)
- Engagement Rate: ${input.engagementRate.toFixed(4)}

METRICS EXPLAINED:
- Velocity: Slope of mentions over last 3 months (positive = increasing, negative = decreasing)
- Engagement Rate: Average user interaction score (likes + comments + shares) / views
- Phase Classification:
  * Emerging: Rising mentions, low engagement
  * Growing: Rising mentions, high engagement
  * Peaking: Slowing mentions, high engagement
  * Decaying: Slowing mentions, low engagement

RESPONSE FORMAT:
Provide exactly 3 sections with clean, professional language:

FUTURE TREND:
[One clear sentence about expected trend direction for next 3-6 months based on the metrics]

KEY INSIGHTS:
- [Business insight 1]
- [Business insight 2]
- [Business insight 3]

RECOMMENDATIONS:
- [Actionable recommendation 1]
- [Actionable recommendation 2]
- [Actionable recommendation 3]

Keep language professional, avoid asterisks, and focus on practical business value for beauty brands.`;
}

// ============================================================================
// GROQ CLIENT
// ============================================================================

export class GroqLlmClient implements LlmClient {
    private groq: Groq;

    constructor(
        apiKey: string,
        readonly model: string,
        private temperature: number,
        private timeoutMs: number
    ) {
        this.groq = new Groq({ apiKey, maxRetries: 1 });
    }

    async generate(prompt: string): Promise<string> {
        try {
            const completion = await this.groq.chat.completions.create(
                {
                    model: this.model,
                    messages: [{ role: 'user', content: prompt }],
                    temperature: this.temperature
                },
                { timeout: this.timeoutMs }
            );
            return completion.choices[0]?.message?.content ?? '';
        } catch (error) {
            throw new ServiceError(`Groq request failed for model ${this.model}`, error);
        }
    }
}

// Groq client
export function createLlmClient(
    apiKey: string | null,
    model: string,
    temperature: number,
    timeoutMs: number
): LlmClient | null {
    if (!apiKey) {
        console.log('[Narrative] No Groq API key, narrative analysis runs in fallback mode');
        return null;
    }
    return new GroqLlmClient(apiKey, model, temperature, timeoutMs);
}

// ============================================================================
// GENERATOR
// ============================================================================

function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new ServiceError(`LLM call timed out after ${timeoutMs}ms`)), timeoutMs);
    });
    return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

export class NarrativeGenerator {
    constructor(
        private client: LlmClient | null,
        private timeoutMs: number
    ) {}

    get available(): boolean {
        return this.client !== null;
    }

    async analyze(input: NarrativeInput): Promise<NarrativeResult> {
        if (!this.client) {
            return { source: 'unavailable', analysis: cloneAnalysis(SERVICE_UNAVAILABLE_ANALYSIS) };
        }

        let text: string;
        try {
            console.log(`[Narrative] Getting LLM analysis for keyword: ${input.keyword}`);
            text = await withTimeout(this.client.generate(buildNarrativePrompt(input)), this.timeoutMs);
        } catch (error) {
            console.error('[Narrative] LLM request failed:', error instanceof Error ? error.message : error);
            return { source: 'failed', analysis: cloneAnalysis(SERVICE_FAILED_ANALYSIS) };
        }

        const parsed = parseNarrativeResponse(text);
        return {
            source: parsed.status === 'parsed' ? 'llm' : 'parse_failed',
            analysis: parsed.analysis
        };
    }
}
