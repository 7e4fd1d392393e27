import { z } from 'zod';
import type { Paper } from '../types/index.js';
import { ApiError } from '../utils/errors.js';
import { extractJsonObject } from '../llm/completion-json.js';

export const RANK_SYSTEM_PROMPT = '你是一个论文筛选助手，只输出合法的 JSON 对象。';

/**
 * Reader profile for the scoring prompt. An empty profile falls back to the keyword list.
 */
export function describeInterests(profile: string, keywords: readonly string[]): string {
    if (profile.trim()) return profile.trim();
    return keywords.length > 0 ? `关注以下方向的论文：${keywords.join('、')}` : '关注本领域最有价值的新论文';
}

export function buildRelevancePrompt(paper: Pick<Paper, 'title' | 'abstract'>, interests: string): string {
    return `请根据读者的研究兴趣，为下面这篇论文的相关性打分（0-100 的整数）。

读者兴趣：
${interests}

评分标准：
- 80-100：与读者兴趣直接相关，值得优先阅读
- 50-79：部分相关，方法或结论可能有参考价值
- 20-49：关联较弱
- 0-19：基本无关

论文标题: ${paper.title}

论文摘要:
${paper.abstract}

请只返回 JSON 对象，例如 {"score": 75}，不要添加任何其他内容。`;
}

const scoreResponseSchema = z.object({
    score: z.coerce.number().finite(),
});

/**
 * Integer score in 0..100 from a completion. Failures are `ApiError`s.
 */
export function parseRelevanceResponse(text: string): number {
    const parsed = scoreResponseSchema.safeParse(extractJsonObject(text));
    if (!parsed.success) {
        throw new ApiError('Completion JSON has no numeric score', 200, { excerpt: text.slice(0, 120) });
    }
    return Math.min(100, Math.max(0, Math.trunc(parsed.data.score)));
}
