import type { DigestEntry } from './paper.js';

/**
 * One day's published set of papers. Written once, never rewritten.
 */
export interface DailyDigest {
    /** ISO date, YYYY-MM-DD */
    date: string;
    papers: DigestEntry[];
}

/**
 * Dates of every persisted digest, ascending.
 */
export interface ArchiveIndex {
    dates: string[];
}

export type ArchiveWriteResult = 'written' | 'exists' | 'skipped';

export type RunStatus = 'completed' | 'partial' | 'aborted';

/**
 * Outcome of one pipeline invocation.
 */
export interface RunReport {
    date: string;
    status: RunStatus;
    /** Papers kept after keyword filtering and selection */
    fetched: number;
    /** Summaries produced by the LLM in this run */
    summarized: number;
    /** Summaries carried over from an earlier digest */
    reused: number;
    failed: number;
    archive: ArchiveWriteResult;
    /** Paths of generated site files */
    pages: string[];
}
