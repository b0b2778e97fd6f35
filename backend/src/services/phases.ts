export type TrendPhase = 'Emerging' | 'Growing' | 'Peaking' | 'Decaying' | 'Stable';

const PHASE_DESCRIPTIONS: Record<TrendPhase, string> = {
    Emerging: 'This keyword is in its early adoption phase with growing interest.',
    Growing: 'This keyword is gaining momentum and popularity rapidly.',
    Peaking: 'This keyword has reached its peak popularity and is widely discussed.',
    Decaying: 'This keyword is declining in popularity and mentions.',
    Stable: 'This keyword maintains consistent engagement over time.'
};

export function isTrendPhase(value: string): value is TrendPhase {
    return Object.prototype.hasOwnProperty.call(PHASE_DESCRIPTIONS, value);
}

export function describePhase(phase: string): string {
    return isTrendPhase(phase) ? PHASE_DESCRIPTIONS[phase] : `This keyword is in the ${phase} phase.`;
}
