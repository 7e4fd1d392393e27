/**
 * Shared utilities for paper sources.
 */
import type { Paper } from '../types/index.js';

/**
 * Relevance weights: a keyword in the title counts more than one in the abstract.
 */
export const RELEVANCE_WEIGHTS = {
    keywordInTitle: 3,
    keywordInAbstract: 1,
    primaryCategory: 2,
} as const;

/**
 * Extract a versionless arXiv ID from the formats arXiv uses.
 * "http://arxiv.org/abs/2401.01234v2" → "2401.01234"
 * "arXiv:2401.01234" → "2401.01234"
 * "http://arxiv.org/abs/hep-th/9901001v1" → "hep-th/9901001"
 */
export function extractArxivId(input: string | null | undefined): string | null {
    if (!input) return null;

    const patterns = [
        /arxiv\.org\/abs\/(\d{4}\.\d{4,5})(?:v\d+)?$/i,
        /arxiv\.org\/abs\/([a-z-]+(?:\.[A-Z]{2})?\/\d{7})(?:v\d+)?$/i,
        /arxiv:(\d{4}\.\d{4,5})(?:v\d+)?$/i,
        /^(\d{4}\.\d{4,5})(?:v\d+)?$/,
    ];

    for (const pattern of patterns) {
        const match = input.trim().match(pattern);
        if (match?.[1]) return match[1];
    }

    return null;
}

/**
 * Collapse the line breaks and runs of spaces arXiv leaves in titles and abstracts.
 */
export function cleanText(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
}

/**
 * Case-insensitive substring match against title or abstract.
 * An empty keyword list matches everything.
 */
export function matchesKeywords(paper: Pick<Paper, 'title' | 'abstract'>, keywords: readonly string[]): boolean {
    if (keywords.length === 0) return true;

    const title = paper.title.toLowerCase();
    const abstract = paper.abstract.toLowerCase();

    return keywords.some((keyword) => {
        const needle = keyword.toLowerCase();
        return title.includes(needle) || abstract.includes(needle);
    });
}

/**
 * Score a paper against the configured keywords and categories.
 */
export function relevanceScore(
    paper: Pick<Paper, 'title' | 'abstract' | 'category'>,
    keywords: readonly string[],
    categories: readonly string[]
): number {
    const title = paper.title.toLowerCase();
    const abstract = paper.abstract.toLowerCase();
    let score = 0;

    for (const keyword of keywords) {
        const needle = keyword.toLowerCase();
        if (title.includes(needle)) score += RELEVANCE_WEIGHTS.keywordInTitle;
        if (abstract.includes(needle)) score += RELEVANCE_WEIGHTS.keywordInAbstract;
    }

    if (categories.includes(paper.category)) {
        score += RELEVANCE_WEIGHTS.primaryCategory;
    }

    return score;
}

/**
 * Keep the first occurrence of each ID.
 */
export function dedupeById<T extends { id: string }>(items: readonly T[]): T[] {
    const seen = new Set<string>();
    const result: T[] = [];
    for (const item of items) {
        if (seen.has(item.id)) continue;
        seen.add(item.id);
        result.push(item);
    }
    return result;
}

/**
 * Order by score desc, then newest first, then ID for a stable total order.
 */
export function rankPapers<T extends Pick<Paper, 'id' | 'score' | 'date'>>(papers: readonly T[]): T[] {
    return [...papers].sort((a, b) => {
        if (b.score !== a.score) return b.score - a.score;
        if (a.date !== b.date) return a.date < b.date ? 1 : -1;
        return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
    });
}
