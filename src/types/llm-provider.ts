/**
 * Interface for LLM provider adapters (DeepSeek, OpenAI, any compatible endpoint).
 */
export interface LlmProvider {
    /** Provider name */
    readonly name: string;

    /** Whether this provider supports structured JSON output */
    readonly supportsStructuredOutput: boolean;

    /**
     * Send a completion request to the LLM.
     * Throws `RateLimitError` on throttling and `ApiError` on any other failure.
     */
    complete(prompt: string, params?: LlmCompletionParams): Promise<LlmCompletionResult>;
}

/**
 * Parameters for LLM completion requests.
 */
export interface LlmCompletionParams {
    /** Model to use (overrides default) */
    model?: string;
    /** Temperature (0.0 to 2.0) */
    temperature?: number;
    /** Maximum tokens in response */
    maxTokens?: number;
    /** Whether to request JSON response format */
    jsonMode?: boolean;
    /** System prompt */
    systemPrompt?: string;
    /** Request timeout in milliseconds */
    timeoutMs?: number;
}

/**
 * Result from an LLM completion request.
 */
export interface LlmCompletionResult {
    /** Raw response text */
    text: string;
    /** Token usage */
    usage: {
        promptTokens: number;
        completionTokens: number;
        totalTokens: number;
    };
    /** Model used */
    model: string;
    /** Provider name */
    provider: string;
}

/**
 * LLM provider initialization options.
 */
export interface LlmProviderOptions {
    apiKey: string;
    baseUrl: string;
    /** Default model */
    model: string;
}
