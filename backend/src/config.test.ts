import { describe, expect, it } from 'vitest';
import { loadConfig } from './config';

describe('loadConfig', () => {
    it('applies defaults to an empty environment', () => {
        expect(loadConfig({})).toEqual({
            port: 3000,
            dataDir: 'data',
            groqApiKey: null,
            groqModel: 'llama-3.3-70b-versatile',
            geminiApiKey: null,
            llmTimeoutMs: 20000,
            llmTemperature: 0.7
        });
    });

    it('treats the placeholder key as missing', () => {
        expect(loadConfig({ GROQ_API_KEY: 'dummy_key', GEMINI_API_KEY: '  ' })).toMatchObject({
            groqApiKey: null,
            geminiApiKey: null
        });
    });

    it('reads keys and numbers, ignoring unparsable numbers', () => {
        const config = loadConfig({ GROQ_API_KEY: 'test-secret', PORT: '8080', LLM_TIMEOUT_MS: 'soon' });
        expect(config.groqApiKey).toBe('test-secret');
        expect(config.port).toBe(8080);
        expect(config.llmTimeoutMs).toBe(20000);
    });

    it.each(['0', '-5'])('falls back to the default timeout for LLM_TIMEOUT_MS=%s', value => {
        expect(loadConfig({ LLM_TIMEOUT_MS: value }).llmTimeoutMs).toBe(20000);
    });

    it.each(['-1', '0', '80.5', '70000'])('falls back to the default port for PORT=%s', value => {
        expect(loadConfig({ PORT: value }).port).toBe(3000);
    });

    it('accepts a positive timeout and a temperature of 0', () => {
        const config = loadConfig({ LLM_TIMEOUT_MS: '1500', LLM_TEMPERATURE: '0' });
        expect(config.llmTimeoutMs).toBe(1500);
        expect(config.llmTemperature).toBe(0);
    });
});
