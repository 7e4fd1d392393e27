import { join } from 'node:path';
import type { DigestConfig } from '../types/index.js';
import { ArxivFetcher } from '../sources/arxiv.js';
import { OpenAiCompatibleProvider } from '../llm/openai-compatible.js';
import { Summarizer } from '../summarizer/summarizer.js';
import { ArchiveStore } from '../storage/archive-store.js';
import { ScoreCache } from '../storage/score-cache.js';
import { RelevanceScorer } from '../ranking/relevance-scorer.js';
import { describeInterests } from '../ranking/prompt.js';
import { PageGenerator } from '../site/page-generator.js';
import { ServerChanNotifier } from '../notify/serverchan.js';
import type { HttpClient } from '../utils/http-client.js';
import type { PipelineStages } from './pipeline.js';

export const SCORE_CACHE_FILE = 'scores.json';

/**
 * Wire the production stages from the resolved configuration.
 */
export function createStages(
    config: Readonly<DigestConfig>,
    options: { apiKey: string; httpClient: HttpClient; env?: NodeJS.ProcessEnv }
): PipelineStages {
    const env = options.env ?? process.env;

    const provider = new OpenAiCompatibleProvider(
        { apiKey: options.apiKey, baseUrl: config.llm.baseUrl, model: config.llm.model },
        options.httpClient
    );

    const sendKey = env['SERVERCHAN_KEY']?.trim();

    const ranker = config.scoring.enabled
        ? new RelevanceScorer(
              provider,
              {
                  ...config.llm,
                  interests: describeInterests(config.scoring.profile, config.keywords),
                  maxTokens: config.scoring.maxTokens,
              },
              new ScoreCache(join(config.dataDir, SCORE_CACHE_FILE))
          )
        : null;

    return {
        fetcher: new ArxivFetcher({ httpClient: options.httpClient }),
        ranker,
        summarizer: new Summarizer(provider, config.llm),
        archive: new ArchiveStore(config.dataDir),
        site: new PageGenerator(config.outDir, config.site),
        notifier: sendKey ? new ServerChanNotifier(sendKey, options.httpClient) : null,
    };
}
