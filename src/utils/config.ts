import { dirname, resolve } from 'node:path';
import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { DEFAULT_CONFIG, type DigestConfig, type LogLevel } from '../types/index.js';
import { ConfigError, describeError } from './errors.js';
import { getLogger } from './logger.js';

const MODULE_NAME = 'arxivdigest';

const SEARCH_PLACES = [
    `${MODULE_NAME}.config.json`,
    `${MODULE_NAME}.config.yaml`,
    `${MODULE_NAME}.config.yml`,
    'config.yaml',
];

const nonEmpty = z.string().trim().min(1);

const llmSchema = z
    .object({
        baseUrl: z.string().url().default(DEFAULT_CONFIG.llm.baseUrl),
        model: nonEmpty.default(DEFAULT_CONFIG.llm.model),
        apiKeyEnv: nonEmpty.default(DEFAULT_CONFIG.llm.apiKeyEnv),
        temperature: z.number().min(0).max(2).default(DEFAULT_CONFIG.llm.temperature),
        maxTokens: z.number().int().positive().default(DEFAULT_CONFIG.llm.maxTokens),
        timeoutMs: z.number().int().positive().default(DEFAULT_CONFIG.llm.timeoutMs),
        rateLimitBackoffMs: z.number().int().nonnegative().default(DEFAULT_CONFIG.llm.rateLimitBackoffMs),
        concurrency: z.number().int().min(1).max(16).default(DEFAULT_CONFIG.llm.concurrency),
    })
    .default({});

const scoringSchema = z
    .object({
        enabled: z.boolean().default(DEFAULT_CONFIG.scoring.enabled),
        profile: z.string().trim().default(DEFAULT_CONFIG.scoring.profile),
        maxTokens: z.number().int().positive().default(DEFAULT_CONFIG.scoring.maxTokens),
    })
    .default({});

const siteSchema = z
    .object({
        title: nonEmpty.default(DEFAULT_CONFIG.site.title),
        description: z.string().default(DEFAULT_CONFIG.site.description),
        baseUrl: z.string().url().optional(),
    })
    .default({});

const configSchema = z.object({
    categories: z.array(nonEmpty).min(1, 'at least one arXiv category is required'),
    keywords: z.array(nonEmpty).default(DEFAULT_CONFIG.keywords),
    maxResults: z.number().int().positive().default(DEFAULT_CONFIG.maxResults),
    maxPapersPerDay: z.number().int().positive().optional(),
    lookbackDays: z.number().int().min(1).max(30).default(DEFAULT_CONFIG.lookbackDays),
    excludePrevious: z.boolean().default(DEFAULT_CONFIG.excludePrevious),
    excludeSeen: z.boolean().default(DEFAULT_CONFIG.excludeSeen),
    schedule: z.string().default(DEFAULT_CONFIG.schedule),
    dataDir: nonEmpty.default(DEFAULT_CONFIG.dataDir),
    outDir: nonEmpty.default(DEFAULT_CONFIG.outDir),
    logLevel: z.enum(['silent', 'error', 'warn', 'info', 'debug']).default(DEFAULT_CONFIG.logLevel),
    jsonLogs: z.boolean().default(DEFAULT_CONFIG.jsonLogs),
    llm: llmSchema,
    scoring: scoringSchema,
    site: siteSchema,
});

/**
 * Values the CLI may override on top of the config file.
 */
export interface ConfigOverrides {
    logLevel?: LogLevel;
    jsonLogs?: boolean;
}

interface LoadedFile {
    config: Record<string, unknown>;
    filepath: string;
}

/**
 * Load the config file, either the explicit `--config` path or the first
 * search place found walking up from `searchFrom`.
 */
async function loadConfigFile(configPath?: string, searchFrom?: string): Promise<LoadedFile> {
    const explorer = cosmiconfig(MODULE_NAME, {
        searchPlaces: SEARCH_PLACES,
    });

    let result: Awaited<ReturnType<typeof explorer.search>>;
    try {
        result = configPath ? await explorer.load(configPath) : await explorer.search(searchFrom);
    } catch (error) {
        throw new ConfigError(`Failed to read config file: ${describeError(error)}`, { configPath });
    }

    if (!result || result.isEmpty) {
        throw new ConfigError(
            configPath ? `Config file is empty: ${configPath}` : `No config file found (looked for ${SEARCH_PLACES.join(', ')})`
        );
    }

    const raw: unknown = result.config;
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
        throw new ConfigError('Config file must contain an object', { path: result.filepath });
    }

    getLogger().debug({ path: result.filepath }, 'Loaded config file');
    return { config: { ...raw }, filepath: result.filepath };
}

/**
 * Validate a raw configuration object and apply defaults.
 * Relative directories are resolved against `baseDir`.
 */
export function parseConfig(raw: unknown, baseDir: string = process.cwd()): Readonly<DigestConfig> {
    const result = configSchema.safeParse(raw);
    if (!result.success) {
        const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
        throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, { issues });
    }

    const config: DigestConfig = {
        ...result.data,
        dataDir: resolve(baseDir, result.data.dataDir),
        outDir: resolve(baseDir, result.data.outDir),
    };

    return deepFreeze(config);
}

/**
 * Merge configuration from the config file and CLI flags.
 * Precedence: CLI flags > config file > defaults
 */
export async function resolveConfig(
    cliFlags: ConfigOverrides,
    options: { configPath?: string; searchFrom?: string } = {}
): Promise<Readonly<DigestConfig>> {
    const file = await loadConfigFile(options.configPath, options.searchFrom);

    const merged: Record<string, unknown> = { ...file.config };
    if (cliFlags.logLevel !== undefined) merged['logLevel'] = cliFlags.logLevel;
    if (cliFlags.jsonLogs !== undefined) merged['jsonLogs'] = cliFlags.jsonLogs;

    return parseConfig(merged, dirname(file.filepath));
}

/**
 * Read the LLM API key named by the config. Absence is fatal.
 */
export function requireApiKey(
    config: Readonly<DigestConfig>,
    env: NodeJS.ProcessEnv = process.env
): string {
    const key = env[config.llm.apiKeyEnv]?.trim();
    if (!key) {
        throw new ConfigError(`${config.llm.apiKeyEnv} environment variable not set`, {
            apiKeyEnv: config.llm.apiKeyEnv,
        });
    }
    return key;
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
    for (const child of Object.values(value)) {
        if (typeof child === 'object' && child !== null && !Object.isFrozen(child)) {
            deepFreeze(child);
        }
    }
    return Object.freeze(value);
}
