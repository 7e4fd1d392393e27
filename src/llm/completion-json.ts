import { ApiError } from '../utils/errors.js';

/**
 * Pull the first JSON object out of a completion.
 * Tolerates code fences and chatter around it; anything else is an `ApiError`.
 */
export function extractJsonObject(text: string): unknown {
    let content = text.trim();

    const fenced = content.match(/```(?:json)?\s*([\s\S]*?)```/i);
    if (fenced?.[1]) {
        content = fenced[1];
    }

    const start = content.indexOf('{');
    const end = content.lastIndexOf('}');
    if (start === -1 || end <= start) {
        throw new ApiError('Completion contained no JSON object', 200, { excerpt: text.slice(0, 120) });
    }

    try {
        return JSON.parse(content.slice(start, end + 1));
    } catch (error) {
        throw new ApiError('Completion JSON could not be parsed', 200, { excerpt: text.slice(0, 120) }, { cause: error });
    }
}
