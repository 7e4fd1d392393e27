import pLimit from 'p-limit';
import type { LlmConfig, LlmProvider, Paper, PaperSummarizer, SummaryOutcome } from '../types/index.js';
import { ApiError } from '../utils/errors.js';
import { sleep } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { retryOnceAfterRateLimit } from '../llm/retry.js';
import { buildSummaryPrompt, parseSummaryResponse, SYSTEM_PROMPT } from './prompt.js';

export type SummarizerOptions = Pick<
    LlmConfig,
    'model' | 'temperature' | 'maxTokens' | 'timeoutMs' | 'rateLimitBackoffMs' | 'concurrency'
>;

/**
 * Produces one Chinese summary per paper.
 *
 * Papers are independent: a failed call marks only that paper. A throttled call
 * waits `rateLimitBackoffMs` and is retried once.
 */
export class Summarizer implements PaperSummarizer {
    private readonly logger = getLogger();

    constructor(
        private readonly provider: LlmProvider,
        private readonly options: SummarizerOptions,
        private readonly wait: (ms: number) => Promise<void> = sleep
    ) {}

    async summarize(papers: Paper[]): Promise<SummaryOutcome[]> {
        const limit = pLimit(this.options.concurrency);
        const outcomes = await Promise.all(
            papers.map((paper, index) => limit(() => this.summarizeOne(paper, index, papers.length)))
        );

        const failed = outcomes.filter((o) => o.summary === null).length;
        const tokens = outcomes.reduce((sum, o) => sum + (o.tokens ?? 0), 0);
        this.logger.info({ total: papers.length, failed, tokens, provider: this.provider.name }, 'Summarization complete');

        return outcomes;
    }

    private async summarizeOne(paper: Paper, index: number, total: number): Promise<SummaryOutcome> {
        this.logger.info({ id: paper.id, progress: `${index + 1}/${total}` }, `Summarizing: ${paper.title.slice(0, 60)}`);

        let tokens = 0;
        try {
            const summary = await retryOnceAfterRateLimit(
                async () => {
                    const result = await this.provider.complete(buildSummaryPrompt(paper), {
                        model: this.options.model,
                        temperature: this.options.temperature,
                        maxTokens: this.options.maxTokens,
                        timeoutMs: this.options.timeoutMs,
                        systemPrompt: SYSTEM_PROMPT,
                        jsonMode: this.provider.supportsStructuredOutput,
                    });
                    tokens += result.usage.totalTokens;
                    this.logger.debug(
                        { id: paper.id, model: result.model, promptTokens: result.usage.promptTokens, completionTokens: result.usage.completionTokens },
                        'Summary completion received'
                    );
                    return parseSummaryResponse(result.text);
                },
                { backoffMs: this.options.rateLimitBackoffMs, wait: this.wait, context: { id: paper.id } }
            );
            return { id: paper.id, summary, tokens };
        } catch (error) {
            if (error instanceof ApiError) {
                this.logger.warn(
                    { id: paper.id, status: error.status, error: error.message, ...error.context },
                    'Summary failed, paper kept without summary'
                );
                return { id: paper.id, summary: null, error: error.message, tokens };
            }
            throw error;
        }
    }
}
