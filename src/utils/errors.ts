/**
 * Error taxonomy for a digest run.
 *
 * ConfigError and FileSystemError are fatal. NetworkError and ParseError abort
 * the fetch step. ApiError and RateLimitError only fail the paper being
 * summarized.
 */
export class DigestError extends Error {
    constructor(
        message: string,
        public readonly context: Record<string, unknown> = {},
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'DigestError';
    }
}

export class ConfigError extends DigestError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, context);
        this.name = 'ConfigError';
    }
}

export class NetworkError extends DigestError {
    constructor(message: string, context?: Record<string, unknown>, options?: { cause?: unknown }) {
        super(message, context, options);
        this.name = 'NetworkError';
    }
}

export class ParseError extends DigestError {
    constructor(message: string, context?: Record<string, unknown>, options?: { cause?: unknown }) {
        super(message, context, options);
        this.name = 'ParseError';
    }
}

/**
 * Non-success response from the LLM provider, or content that is not a usable summary.
 */
export class ApiError extends DigestError {
    constructor(
        message: string,
        public readonly status: number,
        context?: Record<string, unknown>,
        options?: { cause?: unknown }
    ) {
        super(message, context, options);
        this.name = 'ApiError';
    }
}

/**
 * The provider signalled throttling (HTTP 429).
 */
export class RateLimitError extends ApiError {
    constructor(message: string, context?: Record<string, unknown>, options?: { cause?: unknown }) {
        super(message, 429, context, options);
        this.name = 'RateLimitError';
    }
}

export class FileSystemError extends DigestError {
    constructor(message: string, public readonly path: string, options?: { cause?: unknown }) {
        super(message, { path }, options);
        this.name = 'FileSystemError';
    }
}

/**
 * Short description of any thrown value, for log fields.
 */
export function describeError(error: unknown): string {
    return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}
