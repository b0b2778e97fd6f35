/**
 * ============================================================================
 * EMBEDDING INDEX
 * ============================================================================
 *
 * Category labels are embedded ONCE at startup and kept in a read-only,
 * parallel-indexed set: index i of `categories` is index i of `vectors`.
 *
 * PROVIDERS:
 * - Gemini text-embedding-004 when GEMINI_API_KEY is set
 * - Local hashed words + character trigrams otherwise (deterministic, offline)
 * ============================================================================
 */

import { GoogleGenerativeAI, type GenerativeModel } from '@google/generative-ai';

// ============================================================================
// TYPES
// ============================================================================

export interface EmbeddingProvider {
    readonly name: string;
    embed(texts: string[]): Promise<number[][]>;
}

export interface Category {
    name: string;
}

export interface CategoryEmbeddingSet {
    readonly categories: readonly Category[];
    readonly vectors: readonly (readonly number[])[];
}

// ============================================================================
// PROVIDERS
// ============================================================================

const GEMINI_EMBEDDING_MODEL = 'text-embedding-004';
const GEMINI_BATCH_LIMIT = 100;

export class GeminiEmbeddingProvider implements EmbeddingProvider {
    readonly name = 'gemini';
    private model: GenerativeModel;

    constructor(apiKey: string) {
        this.model = new GoogleGenerativeAI(apiKey).getGenerativeModel({ model: GEMINI_EMBEDDING_MODEL });
    }

    async embed(texts: string[]): Promise<number[][]> {
        const vectors: number[][] = [];

        for (let start = 0; start < texts.length; start += GEMINI_BATCH_LIMIT) {
            const batch = texts.slice(start, start + GEMINI_BATCH_LIMIT);
            const result = await this.model.batchEmbedContents({
                requests: batch.map(text => ({
                    content: { role: 'user', parts: [{ text }] }
                }))
            });
            vectors.push(...result.embeddings.map(e => e.values));
        }

        return vectors;
    }
}

const LOCAL_DIMENSIONS = 4096;

/**
 * Keyword-based pseudo-embedding. Every lower-cased word contributes one
 * word feature plus one feature per character trigram of the space-padded
 * word, each hashed (FNV-1a) into one of LOCAL_DIMENSIONS buckets. Trigrams
 * let "hydrating" and "hydration" score above zero without sharing a word.
 */
export class LocalEmbeddingProvider implements EmbeddingProvider {
    readonly name = 'local';

    async embed(texts: string[]): Promise<number[][]> {
        return texts.map(text => this.embedOne(text));
    }

    private embedOne(text: string): number[] {
        const vector: number[] = new Array(LOCAL_DIMENSIONS).fill(0);
        const words = text.toLowerCase().split(/[^\p{L}\p{N}]+/u).filter(Boolean);

        for (const word of words) {
            vector[hashFeature(`w:${word}`) % LOCAL_DIMENSIONS] += 1;

            const padded = ` ${word} `;
            for (let i = 0; i + 3 <= padded.length; i++) {
                vector[hashFeature(`t:${padded.slice(i, i + 3)}`) % LOCAL_DIMENSIONS] += 1;
            }
        }
        return vector;
    }
}

function hashFeature(feature: string): number {
    let hash = 0x811c9dc5;
    for (let i = 0; i < feature.length; i++) {
        hash ^= feature.charCodeAt(i);
        hash = Math.imul(hash, 0x01000193) >>> 0;
    }
    return hash;
}

export function createEmbeddingProvider(geminiApiKey: string | null): EmbeddingProvider {
    if (geminiApiKey) {
        return new GeminiEmbeddingProvider(geminiApiKey);
    }
    console.log('[Embeddings] No Gemini API key, using local keyword embeddings');
    return new LocalEmbeddingProvider();
}

// ============================================================================
// SIMILARITY
// ============================================================================

/**
 * Calculate cosine similarity between two vectors
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
    if (a.length !== b.length) return 0;

    let dotProduct = 0;
    let normA = 0;
    let normB = 0;

    for (let i = 0; i < a.length; i++) {
        dotProduct += a[i] * b[i];
        normA += a[i] * a[i];
        normB += b[i] * b[i];
    }

    if (normA === 0 || normB === 0) return 0;
    const similarity = dotProduct / (Math.sqrt(normA) * Math.sqrt(normB));
    // Float error can push identical vectors just past 1
    return Math.max(-1, Math.min(1, similarity));
}

// ============================================================================
// INDEX
// ============================================================================

export async function encode(provider: EmbeddingProvider, text: string): Promise<number[]> {
    const [vector] = await provider.embed([text]);
    return vector;
}

export async function encodeAll(provider: EmbeddingProvider, texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    const vectors = await provider.embed(texts);
    if (vectors.length !== texts.length) {
        throw new Error(`Embedding provider returned ${vectors.length} vectors for ${texts.length} texts`);
    }
    return vectors;
}

/**
 * `documents[i]` is the text embedded for `labels[i]`; it defaults to the
 * label itself.
 */
export async function buildIndex(
    provider: EmbeddingProvider,
    labels: string[],
    documents: string[] = labels
): Promise<CategoryEmbeddingSet> {
    if (documents.length !== labels.length) {
        throw new Error(`Got ${documents.length} documents for ${labels.length} category labels`);
    }
    const vectors = await encodeAll(provider, documents);

    return Object.freeze({
        categories: Object.freeze(labels.map(name => Object.freeze({ name }))),
        vectors: Object.freeze(vectors.map(v => Object.freeze([...v])))
    });
}

export const EMPTY_INDEX: CategoryEmbeddingSet = Object.freeze({
    categories: Object.freeze([]),
    vectors: Object.freeze([])
});
