import { existsSync, readFileSync } from 'node:fs';
import { z } from 'zod';
import { FileSystemError, ParseError, describeError } from '../utils/errors.js';
import { writeFileAtomic } from './files.js';

const scoresSchema = z.record(z.number().int().min(0).max(100));

/**
 * Flat `{ "<arxiv id>": score }` file kept beside the digests.
 * A paper is scored once and the result reused on every later run.
 */
export class ScoreCache {
    constructor(private readonly path: string) {}

    get location(): string {
        return this.path;
    }

    load(): Map<string, number> {
        if (!existsSync(this.path)) return new Map();

        let raw: string;
        try {
            raw = readFileSync(this.path, 'utf-8');
        } catch (error) {
            throw new FileSystemError(`Failed to read score cache: ${describeError(error)}`, this.path, { cause: error });
        }

        let json: unknown;
        try {
            json = JSON.parse(raw);
        } catch (error) {
            throw new ParseError(`Score cache is not valid JSON: ${describeError(error)}`, { path: this.path }, { cause: error });
        }

        const result = scoresSchema.safeParse(json);
        if (!result.success) {
            throw new ParseError('Score cache failed validation', {
                path: this.path,
                issues: result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
            });
        }

        return new Map(Object.entries(result.data));
    }

    save(scores: ReadonlyMap<string, number>): void {
        const sorted = Object.fromEntries([...scores].sort(([a], [b]) => a.localeCompare(b)));
        writeFileAtomic(this.path, `${JSON.stringify(sorted, null, 2)}\n`);
    }
}
