import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import type { DailyDigest, DigestEntry, SiteConfig, SiteGenerator } from '../types/index.js';
import { FileSystemError, describeError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { STYLESHEET } from './styles.js';

/**
 * Chinese labels for common categories; unknown ones render as the raw term.
 */
export const CATEGORY_NAMES: Readonly<Record<string, string>> = {
    'cs.CV': '计算机视觉',
    'cs.CL': '自然语言处理',
    'cs.LG': '机器学习',
    'cs.AI': '人工智能',
    'cs.GR': '图形学',
    'cs.HC': '人机交互',
    'cs.MM': '多媒体',
    'cs.RO': '机器人',
    'cs.NE': '神经与进化计算',
    'stat.ML': '统计机器学习',
};

const MAX_LISTED_AUTHORS = 5;

export function escapeHtml(text: string): string {
    return text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&#39;');
}

export function categoryLabel(category: string): string {
    return CATEGORY_NAMES[category] ?? category;
}

export function formatAuthors(authors: readonly string[]): string {
    const listed = authors.slice(0, MAX_LISTED_AUTHORS).join(', ');
    return authors.length > MAX_LISTED_AUTHORS ? `${listed} 等 (${authors.length} 位作者)` : listed;
}

export function dayPageName(date: string): string {
    return `${date}.html`;
}

// ─── Page templates ──────────────────────────────────────

function layout(title: string, body: string): string {
    return `<!DOCTYPE html>
<html lang="zh-CN">
<head>
<meta charset="UTF-8">
<meta name="viewport" content="width=device-width, initial-scale=1.0">
<title>${escapeHtml(title)}</title>
<link rel="stylesheet" href="styles.css">
</head>
<body>
${body}
<footer>
  <p>数据来源: <a href="https://arxiv.org">arXiv.org</a> | AI 总结自动生成</p>
</footer>
</body>
</html>
`;
}

function renderSummary(entry: DigestEntry): string {
    if (!entry.summary) {
        return `<div class="paper-summary summary-failed">摘要生成失败</div>`;
    }

    const sections: Array<[string, string]> = [
        ['核心贡献', entry.summary.contribution],
        ['方法', entry.summary.method],
        ['关键发现', entry.summary.finding],
    ];

    const html = sections
        .filter(([, text]) => text.length > 0)
        .map(([label, text]) => `    <div class="summary-section"><strong>${label}:</strong> ${escapeHtml(text)}</div>`)
        .join('\n');

    return `<div class="paper-summary">\n${html}\n  </div>`;
}

export function renderPaperCard(entry: DigestEntry): string {
    const titleZh = entry.summary?.titleZh
        ? `\n  <p class="paper-title-zh">${escapeHtml(entry.summary.titleZh)}</p>`
        : '';
    const relevance = entry.relevance !== undefined
        ? `\n    <span class="score-badge">相关性 ${entry.relevance}/100</span>`
        : '';

    return `<article class="paper-card" id="${escapeHtml(entry.id)}">
  <div class="paper-header">
    <span class="category-badge">${escapeHtml(categoryLabel(entry.category))}</span>${relevance}
    <span class="paper-id">${escapeHtml(entry.id)}</span>
  </div>
  <h3 class="paper-title"><a href="${escapeHtml(entry.url)}" target="_blank" rel="noopener">${escapeHtml(entry.title)}</a></h3>${titleZh}
  <p class="paper-authors">${escapeHtml(formatAuthors(entry.authors))}</p>
  ${renderSummary(entry)}
  <details class="paper-abstract">
    <summary>查看原文摘要</summary>
    <p>${escapeHtml(entry.abstract)}</p>
  </details>
  <div class="paper-links">
    <a href="${escapeHtml(entry.url)}" target="_blank" rel="noopener" class="link-btn">arXiv</a>
    <a href="${escapeHtml(entry.pdfUrl || entry.url)}" target="_blank" rel="noopener" class="link-btn">PDF</a>
  </div>
</article>`;
}

function categoryStats(papers: readonly DigestEntry[]): string {
    const counts = new Map<string, number>();
    for (const paper of papers) {
        const key = paper.category || 'other';
        counts.set(key, (counts.get(key) ?? 0) + 1);
    }
    return [...counts.entries()]
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([cat, count]) => `${escapeHtml(categoryLabel(cat))}: ${count}`)
        .join(' | ');
}

export function renderDayPage(
    digest: DailyDigest,
    nav: { prev: string | null; next: string | null },
    site: SiteConfig
): string {
    const stats = categoryStats(digest.papers);
    const links = [
        nav.prev ? `<a href="${dayPageName(nav.prev)}">← ${nav.prev}</a>` : '',
        `<a href="index.html">归档首页</a>`,
        nav.next ? `<a href="${dayPageName(nav.next)}">${nav.next} →</a>` : '',
    ].filter((link) => link.length > 0);

    const main = digest.papers.length > 0
        ? digest.papers.map(renderPaperCard).join('\n')
        : `<p class="empty">今天没有符合筛选条件的论文。</p>`;

    const body = `<header>
  <h1>${escapeHtml(site.title)}</h1>
  <p class="subtitle">${escapeHtml(site.description)}</p>
  <p class="date">${digest.date}</p>
  <p class="stats">共 ${digest.papers.length} 篇论文${stats ? ` | ${stats}` : ''}</p>
  <nav class="day-nav">${links.join(' ')}</nav>
</header>
<main>
${main}
</main>`;

    return layout(`${digest.date} - ${site.title}`, body);
}

/**
 * Archive index: every digest, newest first.
 */
export function renderIndexPage(digests: readonly DailyDigest[], site: SiteConfig): string {
    const newestFirst = [...digests].sort((a, b) => (a.date < b.date ? 1 : a.date > b.date ? -1 : 0));

    const items = newestFirst
        .map(
            (d) =>
                `  <a class="archive-link" href="${dayPageName(d.date)}"><span class="archive-date">${d.date}</span><span class="archive-count">${d.papers.length} 篇</span></a>`
        )
        .join('\n');

    const body = `<header>
  <h1>${escapeHtml(site.title)}</h1>
  <p class="subtitle">${escapeHtml(site.description)}</p>
</header>
<main class="archive">
${items || '  <p class="empty">暂无归档。</p>'}
</main>`;

    return layout(site.title, body);
}

/**
 * Static site writer. `render` is pure; `generate` writes its output.
 */
export class PageGenerator implements SiteGenerator {
    private readonly logger = getLogger();

    constructor(
        private readonly outDir: string,
        private readonly site: SiteConfig
    ) {}

    /**
     * File name → content for the whole site.
     */
    render(digests: readonly DailyDigest[]): Map<string, string> {
        const ordered = [...digests].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
        const files = new Map<string, string>();

        files.set('styles.css', STYLESHEET);
        files.set('index.html', renderIndexPage(ordered, this.site));

        ordered.forEach((digest, i) => {
            const nav = {
                prev: ordered[i - 1]?.date ?? null,
                next: ordered[i + 1]?.date ?? null,
            };
            files.set(dayPageName(digest.date), renderDayPage(digest, nav, this.site));
        });

        return files;
    }

    generate(digests: DailyDigest[]): string[] {
        const files = this.render(digests);
        const written: string[] = [];

        try {
            mkdirSync(this.outDir, { recursive: true });
        } catch (error) {
            throw new FileSystemError(`Failed to create site directory: ${describeError(error)}`, this.outDir, { cause: error });
        }

        for (const [name, content] of files) {
            const path = join(this.outDir, name);
            try {
                writeFileSync(path, content, 'utf-8');
            } catch (error) {
                throw new FileSystemError(`Failed to write page: ${describeError(error)}`, path, { cause: error });
            }
            written.push(path);
        }

        this.logger.info({ outDir: this.outDir, pages: written.length, days: digests.length }, 'Site generated');
        return written;
    }
}
