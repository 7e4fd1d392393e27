/**
 * Barrel export for all shared types.
 */
export type { Paper, Summary, SummaryStatus, DigestEntry } from './paper.js';
export type { DailyDigest, ArchiveIndex, ArchiveWriteResult, RunStatus, RunReport } from './digest.js';
export { DEFAULT_CONFIG } from './config.js';
export type { DigestConfig, LogLevel, LlmConfig, ScoringConfig, SiteConfig } from './config.js';
export type {
    FetchRequest,
    PaperFetcher,
    SummaryOutcome,
    PaperSummarizer,
    PaperRanker,
    DigestArchive,
    SiteGenerator,
    Notifier,
    NotifyPayload,
} from './pipeline.js';
export type {
    LlmProvider,
    LlmCompletionParams,
    LlmCompletionResult,
    LlmProviderOptions,
} from './llm-provider.js';
