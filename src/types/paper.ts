/**
 * Paper interface: the core data model for an arXiv listing entry.
 * Normalized from the Atom feed into this shape; never mutated after fetch.
 */
export interface Paper {
    /** arXiv identifier without version suffix (e.g., "2401.01234") */
    id: string;

    /** Paper title, whitespace collapsed */
    title: string;

    /** Author names in listing order */
    authors: string[];

    /** Abstract text, whitespace collapsed */
    abstract: string;

    /** Primary arXiv category (e.g., "cs.CV") */
    category: string;

    /** Every category term attached to the entry */
    categories: string[];

    /** Publication date of the first version, YYYY-MM-DD */
    date: string;

    /** Abstract page URL */
    url: string;

    /** PDF URL */
    pdfUrl: string;

    /** Keyword relevance score computed at fetch time */
    score: number;

    /** LLM relevance score, 0-100; absent when scoring is off or failed */
    relevance?: number;
}

/**
 * AI-generated Chinese summary attached to a paper.
 */
export interface Summary {
    /** Chinese translation of the title */
    titleZh?: string;
    contribution: string;
    method: string;
    finding: string;
}

export type SummaryStatus = 'ok' | 'failed';

/**
 * A paper as published in a daily digest.
 * `summary` is null when the LLM call failed; the paper is still listed.
 */
export interface DigestEntry extends Paper {
    summary: Summary | null;
    summaryStatus: SummaryStatus;
}
