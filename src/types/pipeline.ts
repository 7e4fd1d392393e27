import type { Paper, Summary } from './paper.js';
import type { ArchiveIndex, ArchiveWriteResult, DailyDigest } from './digest.js';

/**
 * Query for one fetch step. Dates are inclusive, YYYY-MM-DD.
 */
export interface FetchRequest {
    categories: string[];
    keywords: string[];
    from: string;
    to: string;
    maxResults: number;
}

/**
 * Source of newly announced papers.
 * Implementations return only papers matching at least one keyword,
 * unique by ID and ordered by relevance.
 */
export interface PaperFetcher {
    readonly name: string;
    fetch(request: FetchRequest): Promise<Paper[]>;
}

/**
 * Optional reordering of fetched papers, e.g. by LLM relevance.
 * Resolves with the same papers, possibly annotated and reordered.
 */
export interface PaperRanker {
    readonly name: string;
    rank(papers: Paper[]): Promise<Paper[]>;
}

/**
 * Per-paper result of the summarize step. `summary` is null on failure.
 */
export interface SummaryOutcome {
    id: string;
    summary: Summary | null;
    error?: string;
    /** Tokens billed for this paper, retries included */
    tokens?: number;
}

export interface PaperSummarizer {
    /** Resolves with one outcome per paper, in input order. Never rejects for a single paper's failure. */
    summarize(papers: Paper[]): Promise<SummaryOutcome[]>;
}

/**
 * Persistent store of daily digests.
 */
export interface DigestArchive {
    read(date: string): DailyDigest | null;
    readAll(): DailyDigest[];
    /** Newest digest strictly before `date` */
    previousDigest(date: string): DailyDigest | null;
    write(digest: DailyDigest): Exclude<ArchiveWriteResult, 'skipped'>;
    writeIndex(): ArchiveIndex;
}

export interface SiteGenerator {
    /** Renders and writes the whole site; returns written file paths. */
    generate(digests: DailyDigest[]): string[];
}

export interface NotifyPayload {
    date: string;
    count: number;
    siteUrl: string | null;
}

export interface Notifier {
    readonly name: string;
    notify(payload: NotifyPayload): Promise<void>;
}
