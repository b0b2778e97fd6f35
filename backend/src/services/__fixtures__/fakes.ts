import type { EmbeddingProvider } from '../embeddings';
import type { LlmClient } from '../narrative';

export const FIXTURE_DIR = __dirname;

export const FIXTURE_VECTORS: Record<string, number[]> = {
    'Skincare & Anti-Aging': [1, 0, 0],
    'Makeup & Cosmetics': [0, 1, 0],
    'Hair Coloring & Transformation': [0, 0, 1],
    'dewy glow serum': [0.9, 0.1, 0],
    'bold lipstick': [0.1, 1, 0],
    'copper hair': [0, 0.1, 1],
    retinol: [0.2, 0.9, 0],
    'hyaluronic acid': [0.9, 0.1, 0],
    'snail mucin': [0, 0.2, 1]
};

/**
 * Looks vectors up by exact text; unknown text embeds to the zero vector.
 */
export class FakeEmbeddingProvider implements EmbeddingProvider {
    readonly name = 'fake';
    readonly calls: string[][] = [];

    constructor(private vectors: Record<string, number[]> = FIXTURE_VECTORS) {}

    async embed(texts: string[]): Promise<number[][]> {
        this.calls.push([...texts]);
        return texts.map(text => this.vectors[text] ?? [0, 0, 0]);
    }
}

export class FakeLlmClient implements LlmClient {
    readonly model = 'fake-model';
    readonly prompts: string[] = [];

    constructor(private respond: (prompt: string) => Promise<string>) {}

    generate(prompt: string): Promise<string> {
        this.prompts.push(prompt);
        return this.respond(prompt);
    }
}

export const WELL_FORMED_RESPONSE = `**FUTURE TREND:**
Hyaluronic acid will keep climbing through the next two quarters as hydration routines spread.

**KEY INSIGHTS:**
- Hydration claims drive most of the recent mentions
- Engagement is above the category average
- Short-form tutorials convert best for this keyword

**RECOMMENDATIONS:**
- Feature hyaluronic acid in upcoming serum launches
- Partner with creators who post hydration routines
- Track mention velocity weekly for early saturation signs`;
