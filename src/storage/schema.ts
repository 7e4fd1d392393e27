import { z } from 'zod';
import type { DailyDigest } from '../types/index.js';
import { isIsoDate } from '../utils/dates.js';

const isoDate = z.string().refine(isIsoDate, 'expected YYYY-MM-DD');

const summarySchema = z.object({
    titleZh: z.string().optional(),
    contribution: z.string(),
    method: z.string(),
    finding: z.string(),
});

const entrySchema = z.object({
    id: z.string().min(1),
    title: z.string(),
    authors: z.array(z.string()),
    abstract: z.string(),
    category: z.string(),
    categories: z.array(z.string()).default([]),
    date: isoDate,
    url: z.string(),
    pdfUrl: z.string().default(''),
    score: z.number().default(0),
    relevance: z.number().int().min(0).max(100).optional(),
    summary: summarySchema.nullable(),
    summaryStatus: z.enum(['ok', 'failed']),
});

/**
 * On-disk shape of one daily digest file.
 */
export const digestSchema: z.ZodType<DailyDigest, z.ZodTypeDef, unknown> = z
    .object({
        date: isoDate,
        papers: z.array(entrySchema),
    })
    .superRefine((digest, ctx) => {
        const seen = new Set<string>();
        for (const paper of digest.papers) {
            if (seen.has(paper.id)) {
                ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duplicate paper id ${paper.id}`, path: ['papers'] });
            }
            seen.add(paper.id);
        }
    });
