import {
    type CodebaseSnapshot,
    type CodebaseSummary,
    type FileEntry,
    type InvalidRepositoryError,
    errorMessage,
    invalidRepository,
} from '@code-inquiry/shared';
import { errAsync, okAsync, ResultAsync } from 'neverthrow';
import { createHash } from 'node:crypto';
import { readdir, readFile, stat } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { isDefaultIgnored, isPriorityPath, matchesAnyGlob } from '../lib/glob.js';
import { detectLanguage } from '../lib/languages.js';
import { scanSymbols } from '../lib/symbols.js';

export interface SnapshotOptions {
    includeGlobs: string[];
    excludeGlobs: string[];
    maxFileBytes: number;
    maxTotalBytes: number;
}

const BINARY_SNIFF_BYTES = 8192;
const OVERVIEW_MAX_FILES = 200;
const OVERVIEW_MAX_SYMBOLS = 20;

const utf8 = new TextDecoder('utf-8', { fatal: true });

function compareOrdinal(a: string, b: string): number {
    if (a < b) return -1;
    return a > b ? 1 : 0;
}

function decodeUtf8(bytes: Uint8Array): string | null {
    try {
        return utf8.decode(bytes);
    } catch {
        return null;
    }
}

function isBinary(bytes: Uint8Array): boolean {
    return bytes.subarray(0, BINARY_SNIFF_BYTES).includes(0);
}

/**
 * Priority group first, the rest after; each group in ordinal order.
 */
export function orderByPriority(paths: string[]): string[] {
    const priority = paths.filter((p) => isPriorityPath(p)).sort(compareOrdinal);
    const rest = paths.filter((p) => !isPriorityPath(p)).sort(compareOrdinal);
    return [...priority, ...rest];
}

export class SnapshotService {
    constructor(private defaults: SnapshotOptions) {}

    /**
     * Build a bounded snapshot of `root`. Fails only when `root` is not a readable directory;
     * unreadable files and directories are skipped.
     */
    build(root: string, overrides: Partial<SnapshotOptions> = {}): ResultAsync<CodebaseSnapshot, InvalidRepositoryError> {
        const options: SnapshotOptions = { ...this.defaults, ...overrides };
        const absRoot = resolve(root);

        return ResultAsync.fromPromise(stat(absRoot), () => invalidRepository(absRoot))
            .andThen((stats) => (stats.isDirectory() ? okAsync(stats) : errAsync(invalidRepository(absRoot))))
            .andThen(() => ResultAsync.fromSafePromise(this.collect(absRoot, options)));
    }

    private async collect(root: string, options: SnapshotOptions): Promise<CodebaseSnapshot> {
        const matched: string[] = [];
        for await (const relPath of this.walk(root, '', options)) {
            matched.push(relPath);
        }

        const ordered = orderByPriority(matched);
        const files = new Map<string, FileEntry>();
        const languages: Record<string, number> = {};
        let totalBytes = 0;

        for (const relPath of ordered) {
            const absPath = join(root, relPath);

            let size: number;
            let bytes: Buffer;
            try {
                size = (await stat(absPath)).size;
                if (size > options.maxFileBytes) continue;
                bytes = await readFile(absPath);
            } catch (e) {
                console.error(`[snapshot] Skipping ${relPath}: ${errorMessage(e)}`);
                continue;
            }

            size = bytes.byteLength;
            if (size > options.maxFileBytes) continue;
            if (totalBytes + size > options.maxTotalBytes) break;

            if (isBinary(bytes)) continue;
            const text = decodeUtf8(bytes);
            if (text === null) continue;

            const language = detectLanguage(relPath);
            files.set(relPath, {
                path: relPath,
                language,
                size_bytes: size,
                sha1: createHash('sha1').update(bytes).digest('hex'),
                text_lines: text.split('\n'),
                symbols: scanSymbols(text, language),
            });
            languages[language] = (languages[language] ?? 0) + 1;
            totalBytes += size;
        }

        return { root, file_tree: ordered, files, languages, total_bytes: totalBytes };
    }

    private async *walk(root: string, relDir: string, options: SnapshotOptions): AsyncGenerator<string> {
        const dir = relDir ? join(root, relDir) : root;

        let entries;
        try {
            entries = await readdir(dir, { withFileTypes: true });
        } catch (e) {
            console.error(`[snapshot] Skipping unreadable directory ${dir}: ${errorMessage(e)}`);
            return;
        }

        for (const entry of entries) {
            const relPath = relDir ? `${relDir}/${entry.name}` : entry.name;
            if (isDefaultIgnored(relPath) || matchesAnyGlob(relPath, options.excludeGlobs)) continue;

            if (entry.isDirectory()) {
                yield* this.walk(root, relPath, options);
            } else if (entry.isFile()) {
                if (options.includeGlobs.length > 0 && !matchesAnyGlob(relPath, options.includeGlobs)) continue;
                yield relPath;
            }
        }
    }
}

export function toCodebaseSummary(snapshot: CodebaseSnapshot): CodebaseSummary {
    return {
        root: snapshot.root,
        file_tree: snapshot.file_tree,
        included: [...snapshot.files.keys()],
        languages: snapshot.languages,
        total_files: snapshot.files.size,
        total_bytes: snapshot.total_bytes,
    };
}

/** `path → content` map injected into the sandbox as `codebase`. */
export function toCodebaseData(snapshot: CodebaseSnapshot): Record<string, string> {
    const data: Record<string, string> = {};
    for (const [path, entry] of snapshot.files) {
        data[path] = entry.text_lines.join('\n');
    }
    return data;
}

export function renderSnapshotOverview(snapshot: CodebaseSnapshot): string {
    const entries = [...snapshot.files.values()];
    const languages = Object.entries(snapshot.languages)
        .sort(([a, x], [b, y]) => y - x || compareOrdinal(a, b))
        .map(([language, count]) => `${language} (${count})`)
        .join(', ');

    const lines = [
        `Repository: ${snapshot.root}`,
        `Files included: ${entries.length} of ${snapshot.file_tree.length} matched (${snapshot.total_bytes} bytes)`,
        `Languages: ${languages || 'none'}`,
        '',
        '## Files',
    ];
    for (const entry of entries.slice(0, OVERVIEW_MAX_FILES)) {
        lines.push(`${entry.path} (${entry.language}, ${entry.text_lines.length} lines)`);
    }
    if (entries.length > OVERVIEW_MAX_FILES) {
        lines.push(`... and ${entries.length - OVERVIEW_MAX_FILES} more (see codebase keys)`);
    }

    const tagged = entries.filter((entry) => entry.symbols.length > 0);
    if (tagged.length > 0) {
        lines.push('', '## Symbols');
        for (const entry of tagged.slice(0, OVERVIEW_MAX_FILES)) {
            const shown = entry.symbols
                .slice(0, OVERVIEW_MAX_SYMBOLS)
                .map((tag) => `${tag.kind} ${tag.name}@${tag.line}`);
            const more = entry.symbols.length > OVERVIEW_MAX_SYMBOLS ? ', ...' : '';
            lines.push(`${entry.path}: ${shown.join(', ')}${more}`);
        }
    }

    return lines.join('\n');
}
