import type { DailyDigest, DigestEntry, LlmCompletionParams, LlmCompletionResult, LlmProvider, Paper } from '../types/index.js';
import { ApiError, RateLimitError } from '../utils/errors.js';
import { HttpClient } from '../utils/http-client.js';

export interface AtomEntryInput {
    id: string;
    title: string;
    summary: string;
    published: string;
    authors?: string[];
    primary?: string;
    categories?: string[];
}

export function atomEntry(entry: AtomEntryInput): string {
    const authors = (entry.authors ?? ['Alice Zhang']).map((name) => `    <author><name>${name}</name></author>`).join('\n');
    const categories = (entry.categories ?? [entry.primary ?? 'cs.CV'])
        .map((term) => `    <category term="${term}" scheme="http://arxiv.org/schemas/atom"/>`)
        .join('\n');
    const primary = entry.primary
        ? `    <arxiv:primary_category xmlns:arxiv="http://arxiv.org/schemas/atom" term="${entry.primary}" scheme="http://arxiv.org/schemas/atom"/>\n`
        : '';

    return `  <entry>
    <id>http://arxiv.org/abs/${entry.id}v1</id>
    <updated>${entry.published}</updated>
    <published>${entry.published}</published>
    <title>${entry.title}</title>
    <summary>${entry.summary}</summary>
${authors}
    <link href="http://arxiv.org/abs/${entry.id}v1" rel="alternate" type="text/html"/>
    <link title="pdf" href="http://arxiv.org/pdf/${entry.id}v1" rel="related" type="application/pdf"/>
${primary}${categories}
  </entry>`;
}

export function atomFeed(entries: string[], totalResults: number = entries.length): string {
    return `<?xml version="1.0" encoding="UTF-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <link href="http://arxiv.org/api/query" rel="self" type="application/atom+xml"/>
  <title type="html">ArXiv Query: test</title>
  <id>http://arxiv.org/api/test</id>
  <updated>2024-05-02T00:00:00-04:00</updated>
  <opensearch:totalResults xmlns:opensearch="http://a9.com/-/spec/opensearch/1.1/">${totalResults}</opensearch:totalResults>
  <opensearch:startIndex xmlns:opensearch="http://a9.com/-/spec/opensearch/1.1/">0</opensearch:startIndex>
${entries.join('\n')}
</feed>`;
}

export function xmlResponse(body: string, status = 200): Response {
    return new Response(body, { status, headers: { 'content-type': 'application/atom+xml; charset=utf-8' } });
}

export function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

/**
 * HTTP client without rate-limit waits or retry backoff.
 */
export function fastHttpClient(): HttpClient {
    const unlimited = { tokensPerSecond: 1000, maxBurst: 1000 };
    return new HttpClient({
        timeout: 2000,
        retries: 0,
        rateLimits: { arxiv: unlimited, llm: unlimited, serverchan: unlimited, default: unlimited },
    });
}

export function makePaper(overrides: Partial<Paper> = {}): Paper {
    const id = overrides.id ?? '2405.00001';
    return {
        id,
        title: 'Diffusion Models for Layout Generation',
        authors: ['Alice Zhang', 'Bob Li'],
        abstract: 'We study diffusion models for graphic layout generation.',
        category: 'cs.CV',
        categories: ['cs.CV'],
        date: '2024-05-02',
        url: `https://arxiv.org/abs/${id}`,
        pdfUrl: `https://arxiv.org/pdf/${id}`,
        score: 0,
        ...overrides,
    };
}

export function makeEntry(overrides: Partial<DigestEntry> = {}): DigestEntry {
    return {
        ...makePaper(overrides),
        summary: {
            titleZh: '用于布局生成的扩散模型',
            contribution: '提出了一种新的布局生成方法。',
            method: '基于扩散模型。',
            finding: '效果优于基线。',
        },
        summaryStatus: 'ok',
        ...overrides,
    };
}

export function makeDigest(date: string, papers: DigestEntry[]): DailyDigest {
    return { date, papers };
}

export const SUMMARY_JSON = JSON.stringify({
    title_zh: '中文标题',
    contribution: '核心贡献',
    method: '方法概述',
    finding: '关键发现',
});

type Behaviour = 'ok' | 'api-error' | 'rate-limit';

/**
 * Scripted LLM provider. `script` picks the behaviour per call; the reply may depend on the prompt.
 */
export class FakeLlmProvider implements LlmProvider {
    readonly name = 'fake';
    readonly supportsStructuredOutput = true;
    readonly prompts: string[] = [];
    readonly params: LlmCompletionParams[] = [];

    constructor(
        private readonly script: (prompt: string, call: number) => Behaviour = () => 'ok',
        private readonly responseText: string | ((prompt: string) => string) = SUMMARY_JSON
    ) {}

    async complete(prompt: string, params: LlmCompletionParams = {}): Promise<LlmCompletionResult> {
        this.prompts.push(prompt);
        this.params.push(params);
        const behaviour = this.script(prompt, this.prompts.length);

        if (behaviour === 'rate-limit') {
            throw new RateLimitError('fake rate limit exceeded');
        }
        if (behaviour === 'api-error') {
            throw new ApiError('fake request failed: HTTP 500', 500);
        }

        return {
            text: typeof this.responseText === 'string' ? this.responseText : this.responseText(prompt),
            usage: { promptTokens: 10, completionTokens: 20, totalTokens: 30 },
            model: params.model ?? 'fake-model',
            provider: this.name,
        };
    }
}
