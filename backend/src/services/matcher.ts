import {
    cosineSimilarity,
    encode,
    type Category,
    type CategoryEmbeddingSet,
    type EmbeddingProvider
} from './embeddings';
import {
    CategoryDataMissingError,
    EmptyCategoryDatasetError,
    EmptyKeywordError,
    NoCategoryAvailableError
} from './errors';
import type { KeywordTrendRecord, TrendRecordStore } from './trendStore';

// Types
export interface MatchContext {
    readonly index: CategoryEmbeddingSet;
    readonly embedder: EmbeddingProvider;
    readonly store: TrendRecordStore;
}

export interface CategoryMatch {
    category: Category;
    similarity: number;
}

export interface KeywordMatch {
    keyword: string;
    similarity: number;
    record: KeywordTrendRecord;
}

export interface MatchResult {
    user_keyword: string;
    matched_category: string;
    category_similarity: number;
    matched_keyword: string;
    keyword_similarity: number;
    record: KeywordTrendRecord;
}

/**
 * Index of the highest score. Only a strictly greater score replaces the
 * current best, so ties resolve to the lowest index.
 */
export function argmax(scores: readonly number[]): number {
    let best = -1;
    let bestScore = -Infinity;

    for (let i = 0; i < scores.length; i++) {
        if (best === -1 || scores[i] > bestScore) {
            best = i;
            bestScore = scores[i];
        }
    }
    return best;
}

export function matchCategory(queryVector: readonly number[], index: CategoryEmbeddingSet): CategoryMatch {
    if (index.categories.length === 0) {
        throw new NoCategoryAvailableError();
    }

    const similarities = index.vectors.map(v => cosineSimilarity(queryVector, v));
    const best = argmax(similarities);

    return { category: index.categories[best], similarity: similarities[best] };
}

export async function matchKeyword(
    queryVector: readonly number[],
    categoryMatch: CategoryMatch,
    context: Pick<MatchContext, 'embedder' | 'store'>
): Promise<KeywordMatch> {
    const { category, similarity } = categoryMatch;
    const dataset = await context.store.lookup(category.name);

    if (dataset.status === 'missing') {
        throw new CategoryDataMissingError(category.name, similarity);
    }
    if (dataset.status === 'empty') {
        throw new EmptyCategoryDatasetError(category.name, similarity);
    }

    const vectors = await context.store.keywordVectors(category.name, dataset.records, context.embedder);
    const similarities = vectors.map(v => cosineSimilarity(queryVector, v));
    const best = argmax(similarities);
    const record = dataset.records[best];

    return { keyword: record.keyword, similarity: similarities[best], record };
}

/**
 * Two-stage search: nearest category, then nearest keyword inside that
 * category's dataset. The user keyword is encoded exactly once.
 */
export async function findBestMatch(userKeyword: string, context: MatchContext): Promise<MatchResult> {
    const keyword = userKeyword.trim();
    if (!keyword) {
        throw new EmptyKeywordError();
    }
    if (context.index.categories.length === 0) {
        throw new NoCategoryAvailableError();
    }

    const queryVector = await encode(context.embedder, keyword);

    const categoryMatch = matchCategory(queryVector, context.index);
    console.log(`[Matcher] Best category for '${keyword}': ${categoryMatch.category.name} (similarity: ${categoryMatch.similarity.toFixed(3)})`);

    const keywordMatch = await matchKeyword(queryVector, categoryMatch, context);

    return {
        user_keyword: keyword,
        matched_category: categoryMatch.category.name,
        category_similarity: categoryMatch.similarity,
        matched_keyword: keywordMatch.keyword,
        keyword_similarity: keywordMatch.similarity,
        record: keywordMatch.record
    };
}
