import { describe, it, expect, vi, afterEach } from 'vitest';
import { OpenAiCompatibleProvider } from '../llm/openai-compatible.js';
import { ApiError, RateLimitError } from '../utils/errors.js';
import { fastHttpClient, jsonResponse } from './fixtures.js';

type FetchFn = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

function provider(): OpenAiCompatibleProvider {
    return new OpenAiCompatibleProvider(
        { apiKey: 'test-secret', baseUrl: 'https://llm.example.com/', model: 'test-model' },
        fastHttpClient()
    );
}

const completion = {
    model: 'test-model-0501',
    choices: [{ message: { content: '  {"contribution":"贡献"}  ' } }],
    usage: { prompt_tokens: 12, completion_tokens: 8, total_tokens: 20 },
};

describe('OpenAiCompatibleProvider', () => {
    afterEach(() => {
        vi.unstubAllGlobals();
    });

    it('should post a chat completion and return the trimmed text', async () => {
        const fetchMock = vi.fn<FetchFn>().mockImplementation(async () => jsonResponse(completion));
        vi.stubGlobal('fetch', fetchMock);

        const result = await provider().complete('总结这篇论文', {
            systemPrompt: 'system',
            jsonMode: true,
            temperature: 0.2,
            maxTokens: 300,
        });

        expect(result).toEqual({
            text: '{"contribution":"贡献"}',
            usage: { promptTokens: 12, completionTokens: 8, totalTokens: 20 },
            model: 'test-model-0501',
            provider: 'llm.example.com',
        });

        const call = fetchMock.mock.calls[0];
        const url = call?.[0];
        const init = call?.[1];
        expect(url).toBe('https://llm.example.com/chat/completions');
        expect(init?.method).toBe('POST');
        expect(init?.headers).toMatchObject({
            Authorization: 'Bearer test-secret',
            'Content-Type': 'application/json',
        });
        expect(JSON.parse(String(init?.body))).toEqual({
            model: 'test-model',
            messages: [
                { role: 'system', content: 'system' },
                { role: 'user', content: '总结这篇论文' },
            ],
            temperature: 0.2,
            max_tokens: 300,
            response_format: { type: 'json_object' },
        });
    });

    it('should leave out response_format without JSON mode', async () => {
        const fetchMock = vi.fn<FetchFn>().mockImplementation(async () => jsonResponse(completion));
        vi.stubGlobal('fetch', fetchMock);

        await provider().complete('hi');

        const body: unknown = JSON.parse(String(fetchMock.mock.calls[0]?.[1]?.body));
        expect(body).not.toHaveProperty('response_format');
        expect(body).toMatchObject({ temperature: 0.3, max_tokens: 500, messages: [{ role: 'user', content: 'hi' }] });
    });

    it('should raise RateLimitError on 429', async () => {
        vi.stubGlobal('fetch', vi.fn<FetchFn>().mockImplementation(async () => jsonResponse({ error: 'slow down' }, 429)));

        await expect(provider().complete('hi')).rejects.toBeInstanceOf(RateLimitError);
    });

    it('should raise ApiError with the status on other failures and not retry', async () => {
        const fetchMock = vi.fn<FetchFn>().mockImplementation(async () => jsonResponse({ error: 'down' }, 500));
        vi.stubGlobal('fetch', fetchMock);

        const error: unknown = await provider().complete('hi').catch((e: unknown) => e);

        expect(error).toBeInstanceOf(ApiError);
        expect(error).not.toBeInstanceOf(RateLimitError);
        expect(error instanceof ApiError ? error.status : null).toBe(500);
        expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('should abort a hanging request after timeoutMs and raise ApiError', async () => {
        vi.stubGlobal(
            'fetch',
            vi.fn<FetchFn>().mockImplementation(
                (_input, init) =>
                    new Promise<Response>((_resolve, reject) => {
                        init?.signal?.addEventListener('abort', () => {
                            const aborted = new Error('This operation was aborted');
                            aborted.name = 'AbortError';
                            reject(aborted);
                        });
                    })
            )
        );

        const start = Date.now();
        const error: unknown = await provider().complete('hi', { timeoutMs: 100 }).catch((e: unknown) => e);
        const elapsed = Date.now() - start;

        expect(error).toBeInstanceOf(ApiError);
        expect(error instanceof ApiError ? [error.status, error.message] : null).toEqual([
            0,
            'llm.example.com request failed: Request timeout after 100ms: https://llm.example.com/chat/completions',
        ]);
        expect(elapsed).toBeGreaterThanOrEqual(90);
        expect(elapsed).toBeLessThan(2000);
    });

    it('should raise ApiError for an unexpected payload', async () => {
        vi.stubGlobal('fetch', vi.fn<FetchFn>().mockImplementation(async () => jsonResponse({ choices: [] })));

        await expect(provider().complete('hi')).rejects.toThrow('llm.example.com returned an unexpected completion payload');
    });
});
