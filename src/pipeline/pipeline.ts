import type {
    DailyDigest,
    DigestArchive,
    DigestConfig,
    DigestEntry,
    Notifier,
    Paper,
    PaperFetcher,
    PaperRanker,
    PaperSummarizer,
    RunReport,
    SiteGenerator,
    Summary,
    SummaryOutcome,
} from '../types/index.js';
import { NetworkError, ParseError } from '../utils/errors.js';
import { addDays } from '../utils/dates.js';
import { getLogger } from '../utils/logger.js';

/**
 * The replaceable parts of a run. Tests swap in fakes with the same contracts.
 */
export interface PipelineStages {
    fetcher: PaperFetcher;
    /** Reorders fetched papers before the per-day cap; absent keeps keyword order */
    ranker?: PaperRanker | null;
    summarizer: PaperSummarizer;
    archive: DigestArchive;
    site: SiteGenerator;
    notifier?: Notifier | null;
}

export type PipelineConfig = Pick<
    DigestConfig,
    'categories' | 'keywords' | 'maxResults' | 'maxPapersPerDay' | 'lookbackDays' | 'excludePrevious' | 'excludeSeen'
>;

export interface PipelineOptions {
    /** Run date, YYYY-MM-DD */
    date: string;
    /** Skip every write: archive, index, pages, notification */
    dryRun: boolean;
    siteUrl?: string | null;
}

/**
 * Submission window for a run: from the previous digest's day (inclusive)
 * up to the run date, never reaching back more than `lookbackDays`.
 */
export function fetchWindow(
    date: string,
    lookbackDays: number,
    previousDate: string | null
): { from: string; to: string } {
    const earliest = addDays(date, -(lookbackDays - 1));
    const from = previousDate && previousDate > earliest ? previousDate : earliest;
    return { from, to: date };
}

/**
 * IDs a run must leave out: every paper in `history` with `excludeSeen`,
 * the previous digest's papers with `excludePrevious`, otherwise none.
 */
export function excludedIds(
    previous: DailyDigest | null,
    history: readonly DailyDigest[],
    options: Pick<PipelineConfig, 'excludePrevious' | 'excludeSeen'>
): Set<string> {
    const source = options.excludeSeen ? history : options.excludePrevious && previous ? [previous] : [];
    return new Set(source.flatMap((digest) => digest.papers.map((p) => p.id)));
}

/**
 * Successful summaries from earlier digests, keyed by paper ID.
 * Earlier entries in `digests` win.
 */
export function collectReusableSummaries(digests: ReadonlyArray<DailyDigest | null>): Map<string, Summary> {
    const reusable = new Map<string, Summary>();
    for (const digest of digests) {
        for (const entry of digest?.papers ?? []) {
            if (entry.summary && !reusable.has(entry.id)) {
                reusable.set(entry.id, entry.summary);
            }
        }
    }
    return reusable;
}

export function assembleDigest(
    date: string,
    papers: readonly Paper[],
    reusable: ReadonlyMap<string, Summary>,
    outcomes: readonly SummaryOutcome[]
): DailyDigest {
    const byId = new Map(outcomes.map((o) => [o.id, o.summary]));

    const entries: DigestEntry[] = papers.map((paper) => {
        const summary = reusable.get(paper.id) ?? byId.get(paper.id) ?? null;
        return { ...paper, summary, summaryStatus: summary ? 'ok' : 'failed' };
    });

    return { date, papers: entries };
}

/**
 * Run fetch → summarize → archive → render → notify once.
 *
 * A fetch failure aborts before anything is written. Summary failures
 * degrade the digest but never stop it from being published.
 */
export async function runPipeline(
    config: PipelineConfig,
    stages: PipelineStages,
    options: PipelineOptions
): Promise<RunReport> {
    const logger = getLogger();
    const { date, dryRun } = options;
    const startTime = Date.now();

    const existing = stages.archive.read(date);
    if (existing) {
        return republish(existing, stages, options, startTime);
    }

    const previous = stages.archive.previousDigest(date);
    const window = fetchWindow(date, config.lookbackDays, previous?.date ?? null);

    logger.info(
        { date, ...window, previous: previous?.date ?? null, dryRun, source: stages.fetcher.name },
        'Starting digest run'
    );

    // ──────────────────────────────────────────────────
    // Step 1: Fetch
    // ──────────────────────────────────────────────────
    let fetched: Paper[];
    try {
        fetched = await stages.fetcher.fetch({
            categories: config.categories,
            keywords: config.keywords,
            from: window.from,
            to: window.to,
            maxResults: config.maxResults,
        });
    } catch (error) {
        if (error instanceof NetworkError || error instanceof ParseError) {
            logger.error({ ...error.context, error: error.message, kind: error.name }, 'Fetch failed, run aborted before any write');
            return {
                date,
                status: 'aborted',
                fetched: 0,
                summarized: 0,
                reused: 0,
                failed: 0,
                archive: 'skipped',
                pages: [],
            };
        }
        throw error;
    }

    const history = config.excludeSeen ? stages.archive.readAll().filter((d) => d.date < date) : [];
    const excluded = excludedIds(previous, history, config);
    const candidates = fetched.filter((p) => !excluded.has(p.id));
    const ranked = stages.ranker && candidates.length > 0 ? await stages.ranker.rank(candidates) : candidates;
    const papers = config.maxPapersPerDay !== undefined ? ranked.slice(0, config.maxPapersPerDay) : ranked;
    logger.info({ fetched: fetched.length, excluded: fetched.length - candidates.length, selected: papers.length }, 'Papers selected');

    // ──────────────────────────────────────────────────
    // Step 2: Summarize what has no summary yet
    // ──────────────────────────────────────────────────
    const reusable = collectReusableSummaries([previous]);
    const pending = papers.filter((p) => !reusable.has(p.id));
    const reused = papers.length - pending.length;
    if (reused > 0) {
        logger.info({ reused }, 'Reusing summaries from the previous digest');
    }

    const outcomes = pending.length > 0 ? await stages.summarizer.summarize(pending) : [];
    const digest = assembleDigest(date, papers, reusable, outcomes);

    const failed = digest.papers.filter((p) => p.summaryStatus === 'failed').length;
    const report: RunReport = {
        date,
        status: failed > 0 ? 'partial' : 'completed',
        fetched: papers.length,
        summarized: outcomes.filter((o) => o.summary !== null).length,
        reused,
        failed,
        archive: 'skipped',
        pages: [],
    };

    if (dryRun) {
        logger.info({ ...report, elapsedMs: Date.now() - startTime }, 'Dry run: nothing written');
        return report;
    }

    // ──────────────────────────────────────────────────
    // Step 3: Persist, then render from the whole archive
    // ──────────────────────────────────────────────────
    report.archive = stages.archive.write(digest);
    stages.archive.writeIndex();
    report.pages = stages.site.generate(stages.archive.readAll());

    // ──────────────────────────────────────────────────
    // Step 4: Notify (new digests only)
    // ──────────────────────────────────────────────────
    if (!stages.notifier) {
        logger.debug('No notifier configured');
    } else if (report.archive === 'written') {
        await stages.notifier.notify({
            date,
            count: digest.papers.length,
            siteUrl: options.siteUrl ?? null,
        });
    }

    logger.info(
        { ...report, pages: report.pages.length, elapsed: `${((Date.now() - startTime) / 1000).toFixed(1)}s` },
        'Digest run complete'
    );

    return report;
}

/**
 * A date that is already archived is never fetched or summarized again.
 * Only the index and pages are rebuilt, and no notification is sent.
 */
function republish(
    existing: DailyDigest,
    stages: PipelineStages,
    options: PipelineOptions,
    startTime: number
): RunReport {
    const logger = getLogger();
    const failed = existing.papers.filter((p) => p.summaryStatus === 'failed').length;

    logger.info({ date: existing.date, papers: existing.papers.length }, 'Digest already archived, rebuilding index and pages only');

    const report: RunReport = {
        date: existing.date,
        status: failed > 0 ? 'partial' : 'completed',
        fetched: existing.papers.length,
        summarized: 0,
        reused: 0,
        failed,
        archive: 'exists',
        pages: [],
    };

    if (options.dryRun) {
        logger.info({ ...report, elapsedMs: Date.now() - startTime }, 'Dry run: nothing written');
        return report;
    }

    stages.archive.writeIndex();
    report.pages = stages.site.generate(stages.archive.readAll());

    logger.info(
        { ...report, pages: report.pages.length, elapsed: `${((Date.now() - startTime) / 1000).toFixed(1)}s` },
        'Digest run complete'
    );
    return report;
}
