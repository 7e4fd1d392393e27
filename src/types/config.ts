/**
 * Log level options.
 */
export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

/**
 * OpenAI-compatible chat-completions endpoint used for summaries.
 */
export interface LlmConfig {
    baseUrl: string;
    model: string;
    /** Name of the environment variable holding the API key */
    apiKeyEnv: string;
    temperature: number;
    maxTokens: number;
    /** Hard timeout per completion request */
    timeoutMs: number;
    /** Fixed wait before the single retry after a throttling response */
    rateLimitBackoffMs: number;
    /** Completion requests allowed in flight at once */
    concurrency: number;
}

/**
 * Optional LLM relevance scoring that reorders fetched papers.
 */
export interface ScoringConfig {
    enabled: boolean;
    /** Reader's interests in free text; falls back to the keyword list */
    profile: string;
    maxTokens: number;
}

/**
 * Static site settings.
 */
export interface SiteConfig {
    title: string;
    description: string;
    /** Public URL of the deployed site, used in notifications */
    baseUrl?: string;
}

/**
 * Full digest configuration merged from CLI flags and the config file.
 * Resolved once at startup and frozen.
 */
export interface DigestConfig {
    // Selection
    categories: string[];
    keywords: string[];
    maxResults: number;
    maxPapersPerDay?: number;
    lookbackDays: number;
    excludePrevious: boolean;
    /** Drop papers listed in any earlier digest */
    excludeSeen: boolean;

    /** Cron expression read by the external scheduler; unused by the program */
    schedule: string;

    // Storage & output
    dataDir: string;
    outDir: string;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;

    llm: LlmConfig;
    scoring: ScoringConfig;
    site: SiteConfig;
}

/**
 * Default configuration values. `categories` has no default.
 */
export const DEFAULT_CONFIG: Omit<DigestConfig, 'categories'> = {
    keywords: [],
    maxResults: 300,
    lookbackDays: 2,
    excludePrevious: false,
    excludeSeen: false,
    schedule: '0 1 * * *',
    dataDir: 'data/papers',
    outDir: 'public',
    logLevel: 'info',
    jsonLogs: false,
    llm: {
        baseUrl: 'https://api.deepseek.com',
        model: 'deepseek-chat',
        apiKeyEnv: 'DEEPSEEK_API_KEY',
        temperature: 0.3,
        maxTokens: 500,
        timeoutMs: 60000,
        rateLimitBackoffMs: 10000,
        concurrency: 1,
    },
    scoring: {
        enabled: false,
        profile: '',
        maxTokens: 64,
    },
    site: {
        title: 'ArXiv Daily Digest',
        description: '每日论文精选',
    },
};
