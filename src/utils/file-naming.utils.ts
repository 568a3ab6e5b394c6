// src/utils/file-naming.utils.ts
import { promises as fs } from 'fs';
import * as path from 'path';
import { format } from 'date-fns';

const UNSAFE_CHARS = /[^A-Za-z0-9_.-]/g;
const MAX_SUFFIX = 10_000;

/**
 * Reduces an untrusted client filename to ASCII letters, digits, `_`, `.` and `-`.
 * Path separators and whitespace runs become `_`; leading and trailing dots and
 * underscores are stripped. May return an empty string.
 */
export function secureFilename(name: string): string {
    const ascii = name.normalize('NFKD').replace(/[^\x00-\x7F]/g, '');
    const joined = ascii
        .replace(/[\\/]/g, ' ')
        .split(/\s+/)
        .filter(Boolean)
        .join('_');
    return joined.replace(UNSAFE_CHARS, '').replace(/^[._]+|[._]+$/g, '');
}

/** Lower-cased text after the last dot, or '' when there is none. */
export function extensionOf(name: string): string {
    const dot = name.lastIndexOf('.');
    return dot === -1 ? '' : name.slice(dot + 1).toLowerCase();
}

export function fileStamp(date: Date = new Date()): string {
    return format(date, 'yyyyMMdd_HHmmss');
}

/** True for a bare file name that cannot climb out of the directory it is joined to. */
export function isPlainFileName(name: string): boolean {
    return name.length > 0 && name !== '.' && name !== '..' && path.basename(name) === name && !name.includes('\\');
}

// fs errors may come from another realm, so match on the code rather than the class
const isAlreadyExists = (error: unknown): boolean =>
    typeof error === 'object' && error !== null && 'code' in error && error.code === 'EEXIST';

/**
 * Claims `<stem><ext>` in every directory/extension pair with exclusive create,
 * appending `_1`, `_2`, ... to the stem until all of them are free. The claimed
 * files exist, empty, when this resolves.
 */
export async function claimUniqueStem(
    stem: string,
    targets: Array<{ dir: string; ext: string }>,
): Promise<string> {
    for (let n = 0; n < MAX_SUFFIX; n++) {
        const candidate = n === 0 ? stem : `${stem}_${n}`;
        const claimed: string[] = [];
        let collided = false;

        for (const { dir, ext } of targets) {
            const filePath = path.join(dir, `${candidate}${ext}`);
            try {
                const handle = await fs.open(filePath, 'wx');
                await handle.close();
                claimed.push(filePath);
            } catch (error) {
                if (!isAlreadyExists(error)) {
                    await removeQuietly(claimed);
                    throw error;
                }
                collided = true;
                break;
            }
        }

        if (!collided) return candidate;
        await removeQuietly(claimed);
    }
    throw new Error(`No free file name for ${stem}`);
}

/** Deletes the given files, treating an already missing file as deleted. */
export async function removeQuietly(paths: string[]): Promise<void> {
    await Promise.all(paths.map((filePath) => fs.rm(filePath, { force: true })));
}
