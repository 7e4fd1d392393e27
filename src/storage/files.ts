import { mkdirSync, renameSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { FileSystemError, describeError } from '../utils/errors.js';

/**
 * Write through a sibling temp file and rename, so readers never see a partial file.
 */
export function writeFileAtomic(path: string, content: string): void {
    const tmp = `${path}.tmp`;
    try {
        mkdirSync(dirname(path), { recursive: true });
        writeFileSync(tmp, content, 'utf-8');
        renameSync(tmp, path);
    } catch (error) {
        throw new FileSystemError(`Failed to write: ${describeError(error)}`, path, { cause: error });
    }
}
