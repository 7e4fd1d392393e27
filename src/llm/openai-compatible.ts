import { z } from 'zod';
import type { LlmCompletionParams, LlmCompletionResult, LlmProvider, LlmProviderOptions } from '../types/index.js';
import { getHttpClient, HttpError, type HttpClient } from '../utils/http-client.js';
import { ApiError, RateLimitError } from '../utils/errors.js';

const completionSchema = z.object({
    model: z.string().optional(),
    choices: z
        .array(
            z.object({
                message: z.object({ content: z.string().nullable() }),
            })
        )
        .min(1),
    usage: z
        .object({
            prompt_tokens: z.number().default(0),
            completion_tokens: z.number().default(0),
            total_tokens: z.number().default(0),
        })
        .optional(),
});

/**
 * Chat-completions client for DeepSeek and any other OpenAI-compatible endpoint.
 */
export class OpenAiCompatibleProvider implements LlmProvider {
    readonly name: string;
    readonly supportsStructuredOutput = true;
    private readonly endpoint: string;

    constructor(
        private readonly options: LlmProviderOptions,
        private readonly httpClient: HttpClient = getHttpClient()
    ) {
        this.endpoint = `${options.baseUrl.replace(/\/+$/, '')}/chat/completions`;
        this.name = new URL(options.baseUrl).hostname;
    }

    async complete(prompt: string, params: LlmCompletionParams = {}): Promise<LlmCompletionResult> {
        const model = params.model ?? this.options.model;

        const messages: Array<{ role: 'system' | 'user'; content: string }> = [];
        if (params.systemPrompt) {
            messages.push({ role: 'system', content: params.systemPrompt });
        }
        messages.push({ role: 'user', content: prompt });

        const body: Record<string, unknown> = {
            model,
            messages,
            temperature: params.temperature ?? 0.3,
            max_tokens: params.maxTokens ?? 500,
        };
        if (params.jsonMode) {
            body['response_format'] = { type: 'json_object' };
        }

        let data: unknown;
        try {
            const response = await this.httpClient.post(this.endpoint, body, {
                source: 'llm',
                timeout: params.timeoutMs,
                headers: { Authorization: `Bearer ${this.options.apiKey}` },
                retries: 0,
            });
            data = response.data;
        } catch (error) {
            if (error instanceof HttpError) {
                const context = { endpoint: this.endpoint, status: error.status };
                if (error.status === 429) {
                    throw new RateLimitError(`${this.name} rate limit exceeded`, context, { cause: error });
                }
                throw new ApiError(`${this.name} request failed: ${error.message}`, error.status, context, { cause: error });
            }
            throw error;
        }

        const parsed = completionSchema.safeParse(data);
        if (!parsed.success) {
            throw new ApiError(`${this.name} returned an unexpected completion payload`, 200, { endpoint: this.endpoint });
        }

        const first = parsed.data.choices[0];
        const usage = parsed.data.usage;

        return {
            text: first?.message.content?.trim() ?? '',
            usage: {
                promptTokens: usage?.prompt_tokens ?? 0,
                completionTokens: usage?.completion_tokens ?? 0,
                totalTokens: usage?.total_tokens ?? 0,
            },
            model: parsed.data.model ?? model,
            provider: this.name,
        };
    }
}
