import pLimit from 'p-limit';
import type { LlmConfig, LlmProvider, Paper, PaperRanker } from '../types/index.js';
import { ApiError } from '../utils/errors.js';
import { sleep } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { retryOnceAfterRateLimit } from '../llm/retry.js';
import type { ScoreCache } from '../storage/score-cache.js';
import { RANK_SYSTEM_PROMPT, buildRelevancePrompt, parseRelevanceResponse } from './prompt.js';

export type RelevanceScorerOptions = Pick<LlmConfig, 'model' | 'timeoutMs' | 'rateLimitBackoffMs' | 'concurrency'> & {
    /** Reader interests inserted into every prompt */
    interests: string;
    maxTokens: number;
};

/**
 * Highest relevance first. Unscored papers count as 0; ties keep their incoming order.
 */
export function rankByRelevance<T extends Pick<Paper, 'relevance'>>(papers: readonly T[]): T[] {
    return [...papers].sort((a, b) => (b.relevance ?? 0) - (a.relevance ?? 0));
}

/**
 * Asks the LLM how well each paper fits the reader, caching scores by arXiv ID.
 *
 * A paper whose call fails stays unscored for this run and is asked again next time.
 */
export class RelevanceScorer implements PaperRanker {
    readonly name = 'llm-relevance';
    private readonly logger = getLogger();

    constructor(
        private readonly provider: LlmProvider,
        private readonly options: RelevanceScorerOptions,
        private readonly cache: ScoreCache,
        private readonly wait: (ms: number) => Promise<void> = sleep
    ) {}

    async rank(papers: Paper[]): Promise<Paper[]> {
        const scores = this.cache.load();
        const pending = papers.filter((p) => !scores.has(p.id));

        const limit = pLimit(this.options.concurrency);
        const results = await Promise.all(pending.map((paper) => limit(() => this.scoreOne(paper))));

        let scored = 0;
        for (const { id, score } of results) {
            if (score === null) continue;
            scores.set(id, score);
            scored++;
        }
        if (scored > 0) {
            this.cache.save(scores);
        }

        this.logger.info(
            { papers: papers.length, cached: papers.length - pending.length, scored, failed: pending.length - scored },
            'Relevance scoring complete'
        );

        return rankByRelevance(
            papers.map((paper) => {
                const relevance = scores.get(paper.id);
                return relevance === undefined ? paper : { ...paper, relevance };
            })
        );
    }

    private async scoreOne(paper: Paper): Promise<{ id: string; score: number | null }> {
        try {
            const score = await retryOnceAfterRateLimit(
                async () => {
                    const result = await this.provider.complete(buildRelevancePrompt(paper, this.options.interests), {
                        model: this.options.model,
                        temperature: 0,
                        maxTokens: this.options.maxTokens,
                        timeoutMs: this.options.timeoutMs,
                        systemPrompt: RANK_SYSTEM_PROMPT,
                        jsonMode: this.provider.supportsStructuredOutput,
                    });
                    return parseRelevanceResponse(result.text);
                },
                { backoffMs: this.options.rateLimitBackoffMs, wait: this.wait, context: { id: paper.id } }
            );
            this.logger.debug({ id: paper.id, score }, 'Paper scored');
            return { id: paper.id, score };
        } catch (error) {
            if (error instanceof ApiError) {
                this.logger.warn({ id: paper.id, status: error.status, error: error.message }, 'Scoring failed, paper left unscored');
                return { id: paper.id, score: null };
            }
            throw error;
        }
    }
}
