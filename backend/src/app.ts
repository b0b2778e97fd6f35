import express from 'express';
import cors from 'cors';
import helmet from 'helmet';

import type { AppContext } from './context';
import { CategoryDatasetError, TrendCheckerError } from './services/errors';
import {
    categoryBreakdown,
    growthChart,
    overviewMetrics,
    trendAnalysis,
    trendingKeywords,
    trendSummary
} from './services/reports';

export function createApp(ctx: AppContext): express.Express {
    const app = express();

    // Middleware
    app.use(cors());
    app.use(helmet({
        contentSecurityPolicy: false,
    }));
    app.use(express.json());

    // --- Routes ---

    app.get('/api/health', (_req, res) => {
        res.json({
            status: 'ok',
            categories: ctx.match.index.categories.length,
            embeddings: ctx.match.embedder.name,
            llm: ctx.narrative.available
        });
    });

    // Precomputed corpus reports
    app.get('/api/categories', (_req, res) => {
        res.json(ctx.corpus.categorySummaries);
    });

    app.get('/api/trending-keywords', (_req, res) => {
        res.json(trendingKeywords(ctx.corpus.keywordInsights));
    });

    app.get('/api/metrics', (_req, res) => {
        res.json(overviewMetrics(ctx.corpus.keywordInsights));
    });

    app.get('/api/category-breakdown', (_req, res) => {
        res.json(categoryBreakdown(ctx.corpus));
    });

    app.get('/api/keyword-trends-by-category', (_req, res) => {
        res.json(ctx.corpus.rawKeywordInsights);
    });

    app.get('/api/trend-analysis', (_req, res) => {
        res.json(trendAnalysis(ctx.corpus.keywordInsights));
    });

    app.get('/api/trend-summary', (_req, res) => {
        res.json(trendSummary(ctx.corpus.keywordInsights));
    });

    app.get('/api/growth-chart', (_req, res) => {
        res.json(growthChart(ctx.corpus.keywordInsights));
    });

    // Keyword Checker
    app.post('/api/keyword-checker', async (req, res) => {
        try {
            const keyword: unknown = req.body?.keyword;
            if (typeof keyword !== 'string') {
                return res.status(400).json({ error: 'Keyword is required' });
            }

            const result = await ctx.checker.check(keyword);
            res.json(result);
        } catch (error) {
            if (error instanceof CategoryDatasetError) {
                return res.status(error.status).json({
                    error: error.message,
                    category: error.category,
                    category_similarity: error.categorySimilarity
                });
            }
            if (error instanceof TrendCheckerError) {
                return res.status(error.status).json({ error: error.message });
            }

            console.error('[KeywordChecker] Unexpected error:', error);
            res.status(500).json({ error: 'Internal server error' });
        }
    });

    return app;
}
