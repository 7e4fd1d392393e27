import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { z } from 'zod';
import type { FetchRequest, Paper, PaperFetcher } from '../types/index.js';
import { getHttpClient, HttpError, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { NetworkError, ParseError } from '../utils/errors.js';
import { toArxivTimestamp } from '../utils/dates.js';
import { cleanText, dedupeById, extractArxivId, matchesKeywords, rankPapers, relevanceScore } from './utils.js';

const ARXIV_API = 'https://export.arxiv.org/api/query';

/** arXiv caps a single page at 2000 but recommends far smaller slices */
const DEFAULT_PAGE_SIZE = 100;

const xmlParser = new XMLParser({
    ignoreAttributes: false, // category terms live in attributes
    attributeNamePrefix: '@_',
    parseTagValue: false,
    isArray: (_name: string, jpath: string) => /^feed\.entry(\.author|\.category)?$/.test(jpath),
});

/**
 * Element text, whether or not the element carried attributes.
 */
const textSchema = z.union([
    z.string(),
    z.object({ '#text': z.string() }).transform((node) => node['#text']),
]);

const termSchema = z.object({ '@_term': z.string() });

/**
 * Atom entry fields we rely on (subset of what arXiv sends).
 */
const entrySchema = z.object({
    id: textSchema,
    title: textSchema.transform(cleanText).pipe(z.string().min(1)),
    summary: textSchema.transform(cleanText),
    published: textSchema.refine((value) => /^\d{4}-\d{2}-\d{2}/.test(value), 'published is not an ISO timestamp'),
    author: z.array(z.object({ name: textSchema.transform(cleanText) })).min(1),
    category: z.array(termSchema).default([]),
    'arxiv:primary_category': termSchema.optional(),
});

type ArxivEntry = z.infer<typeof entrySchema>;

const feedSchema = z.object({
    feed: z.object({
        'opensearch:totalResults': textSchema.optional(),
        entry: z.array(z.unknown()).default([]),
    }),
});

/**
 * One parsed page of the Atom feed.
 */
export interface ArxivPage {
    papers: Paper[];
    /** Entries in the page, malformed ones included */
    entryCount: number;
    totalResults: number | null;
    skipped: number;
}

/**
 * Build the `search_query` for categories within a submission-date window.
 */
export function buildSearchQuery(categories: readonly string[], from: string, to: string): string {
    const catClause = categories.map((cat) => `cat:${cat}`).join(' OR ');
    const dateClause = `submittedDate:[${toArxivTimestamp(from, '0000')} TO ${toArxivTimestamp(to, '2359')}]`;
    return `(${catClause}) AND ${dateClause}`;
}

/**
 * Parse one Atom response. Malformed entries are logged and skipped;
 * a document that is not an Atom feed throws `ParseError`.
 */
export function parseFeed(xml: string): ArxivPage {
    const logger = getLogger();

    const validation = XMLValidator.validate(xml);
    if (validation !== true) {
        throw new ParseError(`arXiv response is not well-formed XML: ${validation.err.msg}`, {
            line: validation.err.line,
        });
    }

    const feedResult = feedSchema.safeParse(xmlParser.parse(xml));
    if (!feedResult.success) {
        throw new ParseError('arXiv response is not an Atom feed', { issues: feedResult.error.issues.length });
    }

    const { entry: rawEntries } = feedResult.data.feed;
    const totalRaw = feedResult.data.feed['opensearch:totalResults'];
    const total = totalRaw !== undefined ? parseInt(totalRaw, 10) : NaN;

    const papers: Paper[] = [];
    let skipped = 0;

    for (const raw of rawEntries) {
        const parsed = entrySchema.safeParse(raw);
        if (!parsed.success) {
            skipped++;
            const error = new ParseError('Malformed arXiv entry', { rawId: rawIdOf(raw) });
            logger.warn({ ...error.context, issues: parsed.error.issues.map((i) => i.path.join('.')) }, error.message);
            continue;
        }

        if (parsed.data.id.includes('/api/errors')) {
            throw new ParseError(`arXiv API error: ${parsed.data.summary}`, { id: parsed.data.id });
        }

        const paper = toPaper(parsed.data);
        if (!paper) {
            skipped++;
            logger.warn({ rawId: parsed.data.id }, 'Unrecognised arXiv identifier');
            continue;
        }
        papers.push(paper);
    }

    return {
        papers,
        entryCount: rawEntries.length,
        totalResults: isNaN(total) ? null : total,
        skipped,
    };
}

function toPaper(entry: ArxivEntry): Paper | null {
    const id = extractArxivId(entry.id);
    if (!id) return null;

    const categories = entry.category.map((c) => c['@_term']);

    return {
        id,
        title: entry.title,
        authors: entry.author.map((a) => a.name).filter((name) => name.length > 0),
        abstract: entry.summary,
        category: entry['arxiv:primary_category']?.['@_term'] ?? categories[0] ?? '',
        categories,
        date: entry.published.slice(0, 10),
        url: `https://arxiv.org/abs/${id}`,
        pdfUrl: `https://arxiv.org/pdf/${id}`,
        score: 0,
    };
}

function rawIdOf(raw: unknown): string | null {
    if (typeof raw === 'object' && raw !== null && 'id' in raw && typeof raw.id === 'string') {
        return raw.id;
    }
    return null;
}

export interface ArxivFetcherOptions {
    httpClient?: HttpClient;
    pageSize?: number;
}

/**
 * arXiv listing source.
 * Paginates the export API for a submission window, then keeps keyword matches.
 *
 * @see https://info.arxiv.org/help/api/user-manual.html
 */
export class ArxivFetcher implements PaperFetcher {
    readonly name = 'arXiv';
    private readonly httpClient: HttpClient;
    private readonly pageSize: number;
    private readonly logger = getLogger();

    constructor(options: ArxivFetcherOptions = {}) {
        this.httpClient = options.httpClient ?? getHttpClient();
        this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    }

    async fetch(request: FetchRequest): Promise<Paper[]> {
        const query = buildSearchQuery(request.categories, request.from, request.to);
        const collected: Paper[] = [];
        let start = 0;
        let skipped = 0;

        while (start < request.maxResults) {
            const pageSize = Math.min(this.pageSize, request.maxResults - start);
            const page = await this.fetchPage(query, start, pageSize);

            collected.push(...page.papers);
            skipped += page.skipped;
            start += page.entryCount;

            if (page.entryCount < pageSize) break;
            if (page.totalResults !== null && start >= page.totalResults) break;
        }

        const inWindow = collected.filter((p) => p.date >= request.from && p.date <= request.to);
        const matched = inWindow
            .filter((p) => matchesKeywords(p, request.keywords))
            .map((p) => ({ ...p, score: relevanceScore(p, request.keywords, request.categories) }));
        const papers = rankPapers(dedupeById(matched));

        this.logger.info(
            { read: collected.length, skipped, inWindow: inWindow.length, matched: papers.length, from: request.from, to: request.to },
            'arXiv fetch complete'
        );

        return papers;
    }

    private async fetchPage(query: string, start: number, maxResults: number): Promise<ArxivPage> {
        const params = new URLSearchParams({
            search_query: query,
            start: String(start),
            max_results: String(maxResults),
            sortBy: 'submittedDate',
            sortOrder: 'descending',
        });

        const url = `${ARXIV_API}?${params.toString()}`;
        this.logger.debug({ url }, 'arXiv page request');

        let body: unknown;
        try {
            const response = await this.httpClient.get(url, {
                source: 'arxiv',
                headers: { Accept: 'application/atom+xml,application/xml' },
            });
            body = response.data;
        } catch (error) {
            if (error instanceof HttpError) {
                throw new NetworkError(`arXiv request failed: ${error.message}`, { url, status: error.status }, { cause: error });
            }
            throw error;
        }

        if (typeof body !== 'string') {
            throw new ParseError('arXiv response was not XML text', { url });
        }

        return parseFeed(body);
    }
}
