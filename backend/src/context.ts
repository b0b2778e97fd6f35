import type { AppConfig } from './config';
import { loadCorpus, type Corpus } from './services/corpus';
import { buildIndex, createEmbeddingProvider, EMPTY_INDEX, type CategoryEmbeddingSet } from './services/embeddings';
import { KeywordChecker } from './services/keywordChecker';
import type { MatchContext } from './services/matcher';
import { createLlmClient, NarrativeGenerator } from './services/narrative';
import { TrendRecordStore } from './services/trendStore';

export interface AppContext {
    corpus: Corpus;
    match: MatchContext;
    narrative: NarrativeGenerator;
    checker: KeywordChecker;
}

/**
 * Builds everything the request handlers share. Runs once at startup; the
 * result is never mutated afterwards.
 */
export async function createAppContext(config: AppConfig): Promise<AppContext> {
    const corpus = await loadCorpus(config.dataDir);
    const embedder = createEmbeddingProvider(config.geminiApiKey);

    const store = new TrendRecordStore(config.dataDir);

    let index: CategoryEmbeddingSet = EMPTY_INDEX;
    if (corpus.categories.length === 0) {
        console.error('[Startup] Category list is missing or empty; keyword matching is disabled');
    } else {
        try {
            console.log(`[Startup] Embedding ${corpus.categories.length} categories with ${embedder.name} provider...`);
            const profiles = await Promise.all(corpus.categories.map(category => store.categoryProfile(category)));
            index = await buildIndex(embedder, corpus.categories, profiles);
        } catch (error) {
            console.error('[Startup] Failed to embed categories; keyword matching is disabled:', error);
        }
    }

    const match: MatchContext = Object.freeze({
        index,
        embedder,
        store
    });

    const narrative = new NarrativeGenerator(
        createLlmClient(config.groqApiKey, config.groqModel, config.llmTemperature, config.llmTimeoutMs),
        config.llmTimeoutMs
    );

    return {
        corpus,
        match,
        narrative,
        checker: new KeywordChecker(match, narrative)
    };
}
