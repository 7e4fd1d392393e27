import { requireApiKey, resolveConfig } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { getHttpClient } from '../utils/http-client.js';
import { ConfigError, FileSystemError, ParseError } from '../utils/errors.js';
import { isIsoDate, today } from '../utils/dates.js';
import { runPipeline } from '../pipeline/pipeline.js';
import { createStages } from '../pipeline/stages.js';
import { resolveSiteUrl } from '../notify/serverchan.js';
import type { DigestConfig, LogLevel } from '../types/index.js';

export const VERSION = '1.0.0';

export interface CliOptions {
    date?: string;
    dryRun?: boolean;
    config?: string;
    logLevel?: LogLevel;
    jsonLogs?: boolean;
}

/**
 * One CLI invocation. Resolves to the process exit code.
 *
 * The logger follows the CLI flags from the start, so configuration errors
 * are reported in the requested format; it is rebuilt once the config file
 * has been read if that changes the level or format.
 */
export async function run(opts: CliOptions, env: NodeJS.ProcessEnv = process.env): Promise<number> {
    const flagLevel = opts.logLevel ?? 'info';
    const flagJson = opts.jsonLogs ?? false;
    initLogger({ level: flagLevel, jsonLogs: flagJson });

    let config: Readonly<DigestConfig>;
    let apiKey: string;

    try {
        if (opts.date !== undefined && !isIsoDate(opts.date)) {
            throw new ConfigError(`Invalid --date: ${opts.date} (expected YYYY-MM-DD)`);
        }

        config = await resolveConfig(
            { logLevel: opts.logLevel, jsonLogs: opts.jsonLogs },
            { configPath: opts.config }
        );
        if (config.logLevel !== flagLevel || config.jsonLogs !== flagJson) {
            initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
        }
        apiKey = requireApiKey(config, env);
    } catch (error) {
        if (error instanceof ConfigError) {
            getLogger().error({ ...error.context, error: error.message }, 'Configuration error');
            return 1;
        }
        throw error;
    }

    const logger = getLogger();
    const date = opts.date ?? today();
    const httpClient = getHttpClient({ timeout: 30000, version: VERSION });

    try {
        const report = await runPipeline(config, createStages(config, { apiKey, httpClient, env }), {
            date,
            dryRun: opts.dryRun ?? false,
            siteUrl: resolveSiteUrl(config, env),
        });

        if (report.status === 'aborted') {
            logger.warn({ date }, 'No digest published; previous site left untouched');
        }
        return 0;
    } catch (error) {
        if (error instanceof FileSystemError || error instanceof ParseError) {
            logger.error({ ...error.context, error: error.message, kind: error.name }, 'Run failed');
            return 1;
        }
        throw error;
    }
}
