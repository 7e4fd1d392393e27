import { describe, it, expect, vi, afterEach } from 'vitest';
import {
    extractArxivId,
    cleanText,
    matchesKeywords,
    relevanceScore,
    rankPapers,
    dedupeById,
} from '../sources/utils.js';
import { ArxivFetcher, buildSearchQuery, parseFeed } from '../sources/arxiv.js';
import { NetworkError, ParseError } from '../utils/errors.js';
import { atomEntry, atomFeed, fastHttpClient, makePaper, xmlResponse } from './fixtures.js';

describe('Source Utils', () => {
    describe('extractArxivId', () => {
        it('should strip the version from abs URLs', () => {
            expect(extractArxivId('http://arxiv.org/abs/2401.01234v2')).toBe('2401.01234');
        });

        it('should extract from arxiv: prefix', () => {
            expect(extractArxivId('arXiv:2401.01234')).toBe('2401.01234');
        });

        it('should accept bare IDs', () => {
            expect(extractArxivId('2401.01234v3')).toBe('2401.01234');
        });

        it('should handle old-style identifiers', () => {
            expect(extractArxivId('http://arxiv.org/abs/hep-th/9901001v1')).toBe('hep-th/9901001');
        });

        it('should return null for unrecognised input', () => {
            expect(extractArxivId('http://arxiv.org/api/errors#bad')).toBeNull();
            expect(extractArxivId(null)).toBeNull();
        });
    });

    describe('cleanText', () => {
        it('should collapse line breaks and runs of spaces', () => {
            expect(cleanText('  Diffusion\n   Models  for\tLayout ')).toBe('Diffusion Models for Layout');
        });
    });

    describe('matchesKeywords', () => {
        const paper = { title: 'Latent Diffusion for Posters', abstract: 'We generate graphic layouts.' };

        it('should match case-insensitively in the title', () => {
            expect(matchesKeywords(paper, ['DIFFUSION'])).toBe(true);
        });

        it('should match substrings in the abstract', () => {
            expect(matchesKeywords(paper, ['layout'])).toBe(true);
        });

        it('should reject papers with no keyword', () => {
            expect(matchesKeywords(paper, ['reinforcement', 'robot'])).toBe(false);
        });

        it('should accept everything when no keywords are configured', () => {
            expect(matchesKeywords(paper, [])).toBe(true);
        });
    });

    describe('relevanceScore', () => {
        it('should weight title hits over abstract hits and add the category bonus', () => {
            const paper = { title: 'Diffusion Layouts', abstract: 'A diffusion model.', category: 'cs.CV' };
            // diffusion: title 3 + abstract 1, layout: title 3, category 2
            expect(relevanceScore(paper, ['diffusion', 'layout'], ['cs.CV'])).toBe(9);
        });

        it('should give no category bonus for other categories', () => {
            const paper = { title: 'Robots', abstract: 'Grasping.', category: 'cs.RO' };
            expect(relevanceScore(paper, ['diffusion'], ['cs.CV'])).toBe(0);
        });
    });

    describe('rankPapers', () => {
        it('should order by score, then newest date, then id', () => {
            const ranked = rankPapers([
                makePaper({ id: 'b', score: 1, date: '2024-05-01' }),
                makePaper({ id: 'c', score: 4, date: '2024-05-01' }),
                makePaper({ id: 'a', score: 1, date: '2024-05-01' }),
                makePaper({ id: 'd', score: 1, date: '2024-05-02' }),
            ]);
            expect(ranked.map((p) => p.id)).toEqual(['c', 'd', 'a', 'b']);
        });
    });

    describe('dedupeById', () => {
        it('should keep the first occurrence', () => {
            const result = dedupeById([
                makePaper({ id: 'x', title: 'first' }),
                makePaper({ id: 'y' }),
                makePaper({ id: 'x', title: 'second' }),
            ]);
            expect(result.map((p) => p.title)).toEqual(['first', 'Diffusion Models for Layout Generation']);
        });
    });
});

describe('arXiv Atom parsing', () => {
    it('should build a category and date-window query', () => {
        expect(buildSearchQuery(['cs.CV', 'cs.GR'], '2024-05-01', '2024-05-02')).toBe(
            '(cat:cs.CV OR cat:cs.GR) AND submittedDate:[202405010000 TO 202405022359]'
        );
    });

    it('should normalize entries into papers', () => {
        const xml = atomFeed([
            atomEntry({
                id: '2405.01234',
                title: 'Diffusion   Models\n  for Layouts',
                summary: 'A study\n of diffusion.',
                published: '2024-05-02T17:59:01Z',
                authors: ['Alice Zhang', 'Bob Li'],
                primary: 'cs.CV',
                categories: ['cs.CV', 'cs.GR'],
            }),
        ]);

        const page = parseFeed(xml);

        expect(page.entryCount).toBe(1);
        expect(page.totalResults).toBe(1);
        expect(page.skipped).toBe(0);
        expect(page.papers).toEqual([
            {
                id: '2405.01234',
                title: 'Diffusion Models for Layouts',
                authors: ['Alice Zhang', 'Bob Li'],
                abstract: 'A study of diffusion.',
                category: 'cs.CV',
                categories: ['cs.CV', 'cs.GR'],
                date: '2024-05-02',
                url: 'https://arxiv.org/abs/2405.01234',
                pdfUrl: 'https://arxiv.org/pdf/2405.01234',
                score: 0,
            },
        ]);
    });

    it('should fall back to the first category when primary_category is missing', () => {
        const xml = atomFeed([
            atomEntry({ id: '2405.00002', title: 'T', summary: 'S', published: '2024-05-02T00:00:00Z', categories: ['cs.LG', 'cs.AI'] }),
        ]);
        expect(parseFeed(xml).papers[0]?.category).toBe('cs.LG');
    });

    it('should skip a malformed entry and keep the rest', () => {
        const broken = `  <entry>
    <id>http://arxiv.org/abs/2405.00003v1</id>
    <title>No authors or dates</title>
  </entry>`;
        const xml = atomFeed([
            broken,
            atomEntry({ id: '2405.00004', title: 'Good', summary: 'Fine', published: '2024-05-02T00:00:00Z' }),
        ]);

        const page = parseFeed(xml);

        expect(page.entryCount).toBe(2);
        expect(page.skipped).toBe(1);
        expect(page.papers.map((p) => p.id)).toEqual(['2405.00004']);
    });

    it('should return no papers for an empty feed', () => {
        const page = parseFeed(atomFeed([], 0));
        expect(page.papers).toEqual([]);
        expect(page.entryCount).toBe(0);
        expect(page.totalResults).toBe(0);
    });

    it('should throw ParseError for text that is not XML', () => {
        expect(() => parseFeed('<feed><entry></feed>')).toThrow(ParseError);
    });

    it('should throw ParseError for XML that is not an Atom feed', () => {
        expect(() => parseFeed('<html><body>Service unavailable</body></html>')).toThrow(ParseError);
    });

    it('should surface arXiv API error entries', () => {
        const xml = atomFeed([
            `  <entry>
    <id>http://arxiv.org/api/errors#incorrect_id_format</id>
    <title>Error</title>
    <summary>incorrect id format</summary>
    <published>2024-05-02T00:00:00Z</published>
    <author><name>arXiv api core</name></author>
  </entry>`,
        ]);
        expect(() => parseFeed(xml)).toThrow('arXiv API error: incorrect id format');
    });
});

describe('ArxivFetcher', () => {
    afterEach(() => {
        vi.unstubAllGlobals();
    });

    const request = {
        categories: ['cs.CV'],
        keywords: ['diffusion'],
        from: '2024-05-01',
        to: '2024-05-02',
        maxResults: 300,
    };

    it('should paginate until a short page and keep only keyword matches', async () => {
        const page1 = atomFeed(
            [
                atomEntry({ id: '2405.00010', title: 'Diffusion Posters', summary: 'Layouts.', published: '2024-05-02T10:00:00Z', primary: 'cs.CV' }),
                atomEntry({ id: '2405.00011', title: 'Robot Grasping', summary: 'Manipulation.', published: '2024-05-02T09:00:00Z', primary: 'cs.RO' }),
            ],
            3
        );
        const page2 = atomFeed(
            [atomEntry({ id: '2405.00012', title: 'Video Models', summary: 'A video diffusion prior.', published: '2024-05-01T08:00:00Z', primary: 'cs.CV' })],
            3
        );

        const fetchMock = vi
            .fn<(input: string | URL | Request) => Promise<Response>>()
            .mockResolvedValueOnce(xmlResponse(page1))
            .mockResolvedValueOnce(xmlResponse(page2));
        vi.stubGlobal('fetch', fetchMock);

        const fetcher = new ArxivFetcher({ httpClient: fastHttpClient(), pageSize: 2 });
        const papers = await fetcher.fetch(request);

        expect(fetchMock).toHaveBeenCalledTimes(2);
        const secondUrl = new URL(String(fetchMock.mock.calls[1]?.[0]));
        expect(secondUrl.searchParams.get('start')).toBe('2');
        expect(secondUrl.searchParams.get('max_results')).toBe('2');
        expect(secondUrl.searchParams.get('search_query')).toBe(
            '(cat:cs.CV) AND submittedDate:[202405010000 TO 202405022359]'
        );

        // title hit (3) + category (2) beats abstract hit (1) + category (2)
        expect(papers.map((p) => [p.id, p.score])).toEqual([
            ['2405.00010', 5],
            ['2405.00012', 3],
        ]);
        for (const paper of papers) {
            expect(`${paper.title} ${paper.abstract}`.toLowerCase()).toContain('diffusion');
        }
    });

    it('should stop at maxResults', async () => {
        const fullPage = atomFeed(
            [
                atomEntry({ id: '2405.00020', title: 'Diffusion A', summary: 'x', published: '2024-05-02T00:00:00Z' }),
                atomEntry({ id: '2405.00021', title: 'Diffusion B', summary: 'x', published: '2024-05-02T00:00:00Z' }),
            ],
            50
        );
        const fetchMock = vi.fn<(input: string | URL | Request) => Promise<Response>>().mockImplementation(async () => xmlResponse(fullPage));
        vi.stubGlobal('fetch', fetchMock);

        const fetcher = new ArxivFetcher({ httpClient: fastHttpClient(), pageSize: 2 });
        await fetcher.fetch({ ...request, maxResults: 4 });

        expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it('should drop papers published outside the window', async () => {
        const xml = atomFeed([
            atomEntry({ id: '2404.00030', title: 'Old diffusion', summary: 'x', published: '2024-04-20T00:00:00Z' }),
            atomEntry({ id: '2405.00031', title: 'New diffusion', summary: 'x', published: '2024-05-01T00:00:00Z' }),
        ]);
        vi.stubGlobal('fetch', vi.fn<(input: string | URL | Request) => Promise<Response>>().mockImplementation(async () => xmlResponse(xml)));

        const papers = await new ArxivFetcher({ httpClient: fastHttpClient() }).fetch(request);

        expect(papers.map((p) => p.id)).toEqual(['2405.00031']);
    });

    it('should raise NetworkError when the request fails', async () => {
        vi.stubGlobal('fetch', vi.fn<(input: string | URL | Request) => Promise<Response>>().mockRejectedValue(new TypeError('fetch failed')));

        await expect(new ArxivFetcher({ httpClient: fastHttpClient() }).fetch(request)).rejects.toBeInstanceOf(NetworkError);
    });

    it('should raise NetworkError on a non-success status', async () => {
        vi.stubGlobal('fetch', vi.fn<(input: string | URL | Request) => Promise<Response>>().mockImplementation(async () => xmlResponse('unavailable', 503)));

        await expect(new ArxivFetcher({ httpClient: fastHttpClient() }).fetch(request)).rejects.toBeInstanceOf(NetworkError);
    });
});
