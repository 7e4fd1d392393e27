import { describe, it, expect, vi, afterEach } from 'vitest';
import { ServerChanNotifier, buildMessage, resolveSiteUrl } from '../notify/serverchan.js';
import { fastHttpClient, jsonResponse } from './fixtures.js';

type FetchFn = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

describe('buildMessage', () => {
    it('should announce the paper count and link the site', () => {
        expect(buildMessage({ date: '2024-05-02', count: 7, siteUrl: 'https://example.github.io/digest/' })).toEqual({
            title: 'ArXiv Daily Digest 2024-05-02 已更新 (7 篇)',
            body: '今日共 7 篇符合筛选条件的论文。\n\n点击查看：https://example.github.io/digest/',
        });
    });

    it('should report an empty day without a link', () => {
        expect(buildMessage({ date: '2024-05-02', count: 0, siteUrl: null })).toEqual({
            title: 'ArXiv Daily Digest 2024-05-02 暂无新论文',
            body: '今天没有符合筛选条件的论文。',
        });
    });
});

describe('resolveSiteUrl', () => {
    const site = { title: 'T', description: 'D' };

    it('should prefer the configured base URL', () => {
        expect(resolveSiteUrl({ site: { ...site, baseUrl: 'https://papers.example.com//' } }, {})).toBe('https://papers.example.com/');
    });

    it('should derive a GitHub Pages URL from the repository', () => {
        expect(resolveSiteUrl({ site }, { GITHUB_REPOSITORY: 'someone/daily-papers' })).toBe('https://someone.github.io/daily-papers/');
    });

    it('should return null when nothing is known', () => {
        expect(resolveSiteUrl({ site }, {})).toBeNull();
        expect(resolveSiteUrl({ site }, { GITHUB_REPOSITORY: 'no-slash' })).toBeNull();
    });
});

describe('ServerChanNotifier', () => {
    afterEach(() => {
        vi.unstubAllGlobals();
    });

    it('should post the message as a form', async () => {
        const fetchMock = vi.fn<FetchFn>().mockImplementation(async () => jsonResponse({ code: 0 }));
        vi.stubGlobal('fetch', fetchMock);

        await new ServerChanNotifier('test-key', fastHttpClient()).notify({ date: '2024-05-02', count: 2, siteUrl: null });

        const call = fetchMock.mock.calls[0];
        const url = call?.[0];
        const init = call?.[1];
        expect(url).toBe('https://sctapi.ftqq.com/test-key.send');
        expect(init?.method).toBe('POST');
        const form = new URLSearchParams(String(init?.body));
        expect(form.get('title')).toBe('ArXiv Daily Digest 2024-05-02 已更新 (2 篇)');
        expect(form.get('desp')).toBe('今日共 2 篇符合筛选条件的论文。');
    });

    it('should not fail the run when the push service errors', async () => {
        vi.stubGlobal('fetch', vi.fn<FetchFn>().mockImplementation(async () => jsonResponse({ code: 40001 }, 400)));

        await expect(
            new ServerChanNotifier('test-key', fastHttpClient()).notify({ date: '2024-05-02', count: 0, siteUrl: null })
        ).resolves.toBeUndefined();
    });
});
