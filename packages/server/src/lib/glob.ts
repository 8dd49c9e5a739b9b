import { minimatch } from 'minimatch';
import { z } from 'zod';
import { loadDataFile } from './data-files.js';

const DEFAULT_IGNORE_PATTERNS = loadDataFile('default-ignore.json', z.array(z.string().min(1)));

const PRIORITY_PATTERNS = loadDataFile(
    'priority-patterns.json',
    z.object({
        anyDepth: z.array(z.string().min(1)),
        relative: z.array(z.string().min(1)),
    }),
);

function basename(relPath: string): string {
    return relPath.slice(relPath.lastIndexOf('/') + 1);
}

/**
 * Default deny list check. A pattern hits when it matches any single path segment
 * or the whole relative path.
 */
export function isDefaultIgnored(relPath: string, patterns: readonly string[] = DEFAULT_IGNORE_PATTERNS): boolean {
    const segments = relPath.split('/');
    return patterns.some(
        (pattern) =>
            segments.some((segment) => minimatch(segment, pattern, { dot: true })) ||
            minimatch(relPath, pattern, { dot: true }),
    );
}

/** User-supplied globs. Slash-less patterns match the basename at any depth. */
export function matchesAnyGlob(relPath: string, globs: readonly string[]): boolean {
    return globs.some((glob) => minimatch(relPath, glob, { dot: true, matchBase: true }));
}

/**
 * Docs, manifests and build files count at any depth; source globs such as `*.py`
 * only match at the root, and directory globs such as `src/**` match beneath it.
 */
export function isPriorityPath(relPath: string): boolean {
    const name = basename(relPath);
    return (
        PRIORITY_PATTERNS.anyDepth.some((pattern) => minimatch(name, pattern, { dot: true })) ||
        PRIORITY_PATTERNS.relative.some((pattern) => minimatch(relPath, pattern, { dot: true }))
    );
}
