/**
 * ============================================================================
 * NARRATIVE RESPONSE PARSER
 * ============================================================================
 *
 * Turns the LLM's free text into one future-trend sentence, up to 3 insights
 * and up to 3 recommendations. The text is read line by line through a small
 * state machine:
 *
 *   NONE ──"future trend"──▶ TREND
 *   any  ──"key insight" / "insights:"──▶ INSIGHTS
 *   any  ──"recommend"──▶ RECOMMENDATIONS
 *
 * Header lines only switch state. Every other line goes to the extractor of
 * the current state. Afterwards a quality gate fills whatever is missing from
 * canned content, so the result is always complete.
 * ============================================================================
 */

// ============================================================================
// TYPES
// ============================================================================

export interface AnalysisResult {
    future_trend: string;
    insights: string[];
    recommendations: string[];
}

export type SectionState = 'NONE' | 'TREND' | 'INSIGHTS' | 'RECOMMENDATIONS';

interface NarrativeSections {
    state: SectionState;
    trend: string;
    insights: string[];
    recommendations: string[];
}

export type ParseOutcome = { status: 'parsed' | 'parse_failed'; analysis: AnalysisResult };

// ============================================================================
// THRESHOLDS
// ============================================================================

export const MIN_TREND_LENGTH = 15;
export const MIN_BULLET_LENGTH = 10;
export const MIN_PLAIN_LINE_LENGTH = 15;
export const MAX_ITEMS = 3;
export const MIN_ITEMS_BEFORE_TOP_UP = 2;

const BULLET_MARKERS = ['-', '•'];

const LOW_INFORMATION_TRENDS = [
    'based on current metrics, expect continued trend evolution'
];

// ============================================================================
// CANNED CONTENT
// ============================================================================

const PHASE_TREND_SENTENCES: { marker: string; sentence: string }[] = [
    { marker: 'peaking', sentence: 'This keyword is approaching market saturation and may see declining momentum in the coming months' },
    { marker: 'growing', sentence: 'Strong upward trajectory suggests continued growth and increased market interest over the next quarter' },
    { marker: 'emerging', sentence: 'Early-stage trend with potential for significant growth as market awareness increases' },
    { marker: 'decaying', sentence: 'Downward trend indicates declining market interest and reduced content engagement' }
];

const GENERIC_TREND_SENTENCE = 'Market dynamics suggest evolving consumer interest patterns requiring strategic monitoring';

const DEFAULT_INSIGHTS = [
    'Current engagement metrics indicate measurable audience interaction levels',
    'Velocity patterns reveal important momentum shifts in market attention',
    'Category positioning demonstrates competitive landscape opportunities'
];

const DEFAULT_RECOMMENDATIONS = [
    'Implement weekly monitoring of mention patterns and engagement rates',
    'Develop targeted content strategies aligned with current trend phase',
    'Analyze competitor activities within this keyword category'
];

export const PARSE_FAILED_ANALYSIS: AnalysisResult = {
    future_trend: 'Market analysis suggests dynamic trend patterns requiring continued observation',
    insights: [
        'Data indicates active engagement within target audience segments',
        'Velocity measurements show significant momentum characteristics',
        'Category metrics reveal competitive positioning opportunities'
    ],
    recommendations: [
        'Establish systematic monitoring protocols for trend detection',
        'Develop adaptive content strategies based on engagement feedback',
        'Monitor competitive landscape for strategic positioning opportunities'
    ]
};

// ============================================================================
// STATE MACHINE
// ============================================================================

// Checked in order; the first matching tag wins
const SECTION_TRANSITIONS: { matches: (lower: string) => boolean; next: SectionState }[] = [
    { matches: lower => lower.includes('future trend'), next: 'TREND' },
    { matches: lower => lower.includes('key insight') || lower.includes('insights:'), next: 'INSIGHTS' },
    { matches: lower => lower.includes('recommend'), next: 'RECOMMENDATIONS' }
];

function detectSection(line: string): SectionState | null {
    const lower = line.toLowerCase();
    const transition = SECTION_TRANSITIONS.find(t => t.matches(lower));
    return transition ? transition.next : null;
}

function startsWithBullet(line: string): boolean {
    return BULLET_MARKERS.some(marker => line.startsWith(marker));
}

function stripBullet(line: string): string {
    return line.slice(1).trim();
}

/**
 * Shared rule for the two bulleted sections. Bullets are always taken (the
 * cap is applied later); plain lines only while the list is short and only
 * if they do not look like a mislabelled header.
 */
function collectListItem(items: string[], line: string): void {
    if (startsWithBullet(line)) {
        const item = stripBullet(line);
        if (item.length > MIN_BULLET_LENGTH) {
            items.push(item);
        }
        return;
    }

    const lower = line.toLowerCase();
    if (
        items.length < MAX_ITEMS &&
        line.length > MIN_PLAIN_LINE_LENGTH &&
        !lower.includes('insight') &&
        !lower.includes('recommendation')
    ) {
        items.push(line);
    }
}

const EXTRACTORS: Record<SectionState, (sections: NarrativeSections, line: string) => void> = {
    NONE: () => undefined,
    TREND: (sections, line) => {
        if (!sections.trend && line.length > MIN_TREND_LENGTH && !startsWithBullet(line)) {
            sections.trend = line;
        }
    },
    INSIGHTS: (sections, line) => collectListItem(sections.insights, line),
    RECOMMENDATIONS: (sections, line) => collectListItem(sections.recommendations, line)
};

function readSections(lines: string[]): NarrativeSections {
    const sections: NarrativeSections = { state: 'NONE', trend: '', insights: [], recommendations: [] };

    for (const line of lines) {
        const next = detectSection(line);
        if (next) {
            sections.state = next;
            continue;
        }
        EXTRACTORS[sections.state](sections, line);
    }

    return sections;
}

// ============================================================================
// QUALITY GATE
// ============================================================================

function isLowInformation(trend: string): boolean {
    const lower = trend.toLowerCase();
    return LOW_INFORMATION_TRENDS.some(template => lower.includes(template));
}

function cannedTrendSentence(rawText: string): string {
    const lower = rawText.toLowerCase();
    const phase = PHASE_TREND_SENTENCES.find(p => lower.includes(p.marker));
    return phase ? phase.sentence : GENERIC_TREND_SENTENCE;
}

function topUp(items: string[], defaults: readonly string[]): string[] {
    if (items.length >= MIN_ITEMS_BEFORE_TOP_UP) {
        return items;
    }
    return [...items, ...defaults.slice(0, MAX_ITEMS - items.length)];
}

// ============================================================================
// PUBLIC API
// ============================================================================

export function stripEmphasis(rawText: string): string {
    return rawText.replace(/\*/g, '');
}

export function cleanLines(text: string): string[] {
    return text
        .split('\n')
        .map(line => line.trim())
        .filter(line => line.length > 0);
}

export function parseNarrativeResponse(rawText: string): ParseOutcome {
    try {
        const text = stripEmphasis(rawText);
        const sections = readSections(cleanLines(text));

        const trend = sections.trend && !isLowInformation(sections.trend)
            ? sections.trend
            : cannedTrendSentence(text);

        return {
            status: 'parsed',
            analysis: {
                future_trend: trend.trim(),
                insights: topUp(sections.insights, DEFAULT_INSIGHTS).slice(0, MAX_ITEMS),
                recommendations: topUp(sections.recommendations, DEFAULT_RECOMMENDATIONS).slice(0, MAX_ITEMS)
            }
        };
    } catch (error) {
        console.error('[Parser] Failed to parse narrative response:', error);
        return { status: 'parse_failed', analysis: cloneAnalysis(PARSE_FAILED_ANALYSIS) };
    }
}

export function cloneAnalysis(analysis: AnalysisResult): AnalysisResult {
    return {
        future_trend: analysis.future_trend,
        insights: [...analysis.insights],
        recommendations: [...analysis.recommendations]
    };
}
