import dotenv from 'dotenv';
import path from 'path';

import { loadConfig } from '../config';
import { createAppContext } from '../context';

// Load env vars from project root
dotenv.config({ path: path.join(__dirname, '../../../.env') });

const keywords = process.argv.slice(2);
if (keywords.length === 0) {
    console.error('Usage: npm run check-keyword -- "<keyword>" ["<keyword>" ...]');
    process.exit(1);
}

async function checkKeyword(ctx: Awaited<ReturnType<typeof createAppContext>>, keyword: string) {
    console.log(`\nChecking keyword: ${keyword}...`);
    try {
        const result = await ctx.checker.check(keyword);
        console.log(`✅ ${result.matched_category} / ${result.matched_keyword}`);
        console.log(`   Similarity: category ${result.category_similarity}, keyword ${result.keyword_similarity}`);
        console.log(`   Phase: ${result.phase} (${result.phase_description})`);
        console.log(`   Velocity: ${result.velocity_description}`);
        console.log(`   Engagement: ${result.engagement_description}`);
        console.log(`   Future trend: ${result.future_trend}`);
        result.insights.forEach(i => console.log(`   • ${i}`));
        result.recommendations.forEach(r => console.log(`   → ${r}`));
    } catch (error) {
        console.error(`❌ FAILED for ${keyword}`);
        console.error(`   ${error instanceof Error ? `${error.name}: ${error.message}` : String(error)}`);
    }
}

async function run() {
    const config = loadConfig();
    console.log('--- Keyword Checker Diagnostic ---');
    console.log(`Data dir: ${config.dataDir}`);
    console.log(`Groq key present: ${!!config.groqApiKey}, Gemini key present: ${!!config.geminiApiKey}`);

    const ctx = await createAppContext(config);
    for (const keyword of keywords) {
        await checkKeyword(ctx, keyword);
    }
}

run().catch(error => {
    console.error(error);
    process.exit(1);
});
