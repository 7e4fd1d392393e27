import { existsSync, readdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import type { ArchiveIndex, DailyDigest, DigestArchive, DigestEntry } from '../types/index.js';
import { FileSystemError, ParseError, describeError } from '../utils/errors.js';
import { isIsoDate } from '../utils/dates.js';
import { getLogger } from '../utils/logger.js';
import { writeFileAtomic } from './files.js';
import { digestSchema } from './schema.js';

const DIGEST_FILE = /^(\d{4}-\d{2}-\d{2})\.json$/;
const INDEX_FILE = 'index.json';

/**
 * Flat-file archive: one `YYYY-MM-DD.json` per digest plus a regenerated `index.json`.
 *
 * Writes never replace an existing day, so re-running a date is a no-op.
 */
export class ArchiveStore implements DigestArchive {
    private readonly logger = getLogger();

    constructor(private readonly dir: string) {}

    get directory(): string {
        return this.dir;
    }

    pathFor(date: string): string {
        return join(this.dir, `${date}.json`);
    }

    has(date: string): boolean {
        return existsSync(this.pathFor(date));
    }

    /**
     * Dates with a persisted digest, ascending.
     */
    listDates(): string[] {
        if (!existsSync(this.dir)) return [];

        const files = this.fs(this.dir, 'list archive', () => readdirSync(this.dir));
        return files
            .map((name) => DIGEST_FILE.exec(name)?.[1])
            .filter((date): date is string => date !== undefined && isIsoDate(date))
            .sort();
    }

    read(date: string): DailyDigest | null {
        const path = this.pathFor(date);
        if (!existsSync(path)) return null;

        const raw = this.fs(path, 'read digest', () => readFileSync(path, 'utf-8'));

        let json: unknown;
        try {
            json = JSON.parse(raw);
        } catch (error) {
            throw new ParseError(`Digest file is not valid JSON: ${describeError(error)}`, { path }, { cause: error });
        }

        const result = digestSchema.safeParse(json);
        if (!result.success) {
            const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
            throw new ParseError('Digest file failed validation', { path, issues });
        }
        if (result.data.date !== date) {
            throw new ParseError(`Digest file holds date ${result.data.date}`, { path });
        }

        return result.data;
    }

    /**
     * Every persisted digest, oldest first.
     */
    readAll(): DailyDigest[] {
        const digests: DailyDigest[] = [];
        for (const date of this.listDates()) {
            const digest = this.read(date);
            if (digest) digests.push(digest);
        }
        return digests;
    }

    previousDigest(date: string): DailyDigest | null {
        const earlier = this.listDates().filter((d) => d < date);
        const latest = earlier[earlier.length - 1];
        return latest ? this.read(latest) : null;
    }

    write(digest: DailyDigest): 'written' | 'exists' {
        const path = this.pathFor(digest.date);

        if (existsSync(path)) {
            this.logger.info({ date: digest.date, path }, 'Digest already archived, leaving it untouched');
            return 'exists';
        }

        const validation = digestSchema.safeParse(digest);
        if (!validation.success) {
            throw new ParseError('Refusing to archive an invalid digest', {
                date: digest.date,
                issues: validation.error.issues.map((i) => i.message),
            });
        }

        writeFileAtomic(path, serializeDigest(digest));
        this.logger.info({ date: digest.date, papers: digest.papers.length, path }, 'Digest archived');
        return 'written';
    }

    buildIndex(): ArchiveIndex {
        return { dates: this.listDates() };
    }

    /**
     * Regenerate `index.json` from the files present.
     */
    writeIndex(): ArchiveIndex {
        const index = this.buildIndex();
        writeFileAtomic(join(this.dir, INDEX_FILE), `${JSON.stringify(index, null, 2)}\n`);
        this.logger.debug({ days: index.dates.length }, 'Archive index written');
        return index;
    }

    private fs<T>(path: string, action: string, fn: () => T): T {
        try {
            return fn();
        } catch (error) {
            throw new FileSystemError(`Failed to ${action}: ${describeError(error)}`, path, { cause: error });
        }
    }
}

/**
 * Stable field order for digest files.
 */
export function serializeDigest(digest: DailyDigest): string {
    const record = {
        date: digest.date,
        papers: digest.papers.map(toRecord),
    };
    return `${JSON.stringify(record, null, 2)}\n`;
}

function toRecord(entry: DigestEntry): DigestEntry {
    return {
        id: entry.id,
        title: entry.title,
        authors: entry.authors,
        abstract: entry.abstract,
        category: entry.category,
        categories: entry.categories,
        date: entry.date,
        url: entry.url,
        pdfUrl: entry.pdfUrl,
        score: entry.score,
        ...(entry.relevance !== undefined ? { relevance: entry.relevance } : {}),
        summary: entry.summary
            ? {
                  ...(entry.summary.titleZh !== undefined ? { titleZh: entry.summary.titleZh } : {}),
                  contribution: entry.summary.contribution,
                  method: entry.summary.method,
                  finding: entry.summary.finding,
              }
            : null,
        summaryStatus: entry.summaryStatus,
    };
}
