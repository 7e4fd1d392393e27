import { z } from 'zod';
import type { Paper, Summary } from '../types/index.js';
import { ApiError } from '../utils/errors.js';
import { extractJsonObject } from '../llm/completion-json.js';

export const SYSTEM_PROMPT = '你是一个学术论文总结助手，只输出合法的 JSON 对象。';

/**
 * Chinese summarization prompt. The model must answer with a single JSON object.
 */
export function buildSummaryPrompt(paper: Pick<Paper, 'title' | 'abstract'>): string {
    return `请用中文总结以下论文，包含:

1. 标题翻译: 将英文标题翻译成中文
2. 核心贡献: 用1-2句话概括论文的主要贡献
3. 方法概述: 简要描述所用方法(3-4句)
4. 关键发现: 主要实验结果或结论

论文标题: ${paper.title}

论文摘要:
${paper.abstract}

请只返回如下格式的 JSON 对象，不要添加任何其他内容:
{
    "title_zh": "中文标题",
    "contribution": "核心贡献",
    "method": "方法概述",
    "finding": "关键发现"
}`;
}

const summaryResponseSchema = z.object({
    title_zh: z.string().trim().optional(),
    contribution: z.string().trim().min(1),
    method: z.string().trim().default(''),
    finding: z.string().trim().default(''),
});

/**
 * Validate the summary object in a completion. Failures are `ApiError`s.
 */
export function parseSummaryResponse(text: string): Summary {
    const parsed = summaryResponseSchema.safeParse(extractJsonObject(text));
    if (!parsed.success) {
        const fields = parsed.error.issues.map((issue) => issue.path.join('.'));
        throw new ApiError('Completion JSON is missing summary fields', 200, { fields });
    }

    const { title_zh: titleZh, contribution, method, finding } = parsed.data;
    return titleZh ? { titleZh, contribution, method, finding } : { contribution, method, finding };
}
