// --- Constants & Config ---

export interface AppConfig {
    port: number;
    dataDir: string;
    groqApiKey: string | null;
    groqModel: string;
    geminiApiKey: string | null;
    llmTimeoutMs: number;
    llmTemperature: number;
}

// Placeholder keys ship in .env.example; treat them as missing
function readKey(value: string | undefined): string | null {
    if (!value || value === 'dummy_key' || value.trim() === '') {
        return null;
    }
    return value.trim();
}

function readNumber(value: string | undefined, fallback: number): number {
    if (value === undefined || value.trim() === '') return fallback;
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : fallback;
}

// Timeouts and ports of zero or below are never usable
function readPositive(value: string | undefined, fallback: number): number {
    const parsed = readNumber(value, fallback);
    return parsed > 0 ? parsed : fallback;
}

function readPort(value: string | undefined, fallback: number): number {
    const parsed = readPositive(value, fallback);
    return Number.isInteger(parsed) && parsed <= 65535 ? parsed : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    return {
        port: readPort(env.PORT, 3000),
        dataDir: env.DATA_DIR || 'data',
        groqApiKey: readKey(env.GROQ_API_KEY),
        groqModel: env.GROQ_MODEL || 'llama-3.3-70b-versatile',
        geminiApiKey: readKey(env.GEMINI_API_KEY),
        llmTimeoutMs: readPositive(env.LLM_TIMEOUT_MS, 20000),
        llmTemperature: readNumber(env.LLM_TEMPERATURE, 0.7)
    };
}
