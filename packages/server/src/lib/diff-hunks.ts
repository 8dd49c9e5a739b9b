/** Line numbers shown to the model for one file, per side of the diff. */
export interface VisibleLines {
    additions: Set<number>;
    deletions: Set<number>;
}

/** path → visible lines. Paths with no entry showed no line content at all. */
export type VisibleIndex = Map<string, VisibleLines>;

const HUNK_HEADER = /^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@/;

export function emptyVisibleLines(): VisibleLines {
    return { additions: new Set(), deletions: new Set() };
}

/**
 * Collect the line numbers a unified-diff patch displays. `+` lines count on the new side,
 * `-` lines on the old side and context lines on both. Text before the first hunk header
 * and lines past a hunk's declared length are ignored.
 */
export function parsePatchLines(patch: string): VisibleLines {
    const visible = emptyVisibleLines();
    let oldLine = 0;
    let newLine = 0;
    let oldLeft = 0;
    let newLeft = 0;

    for (const line of patch.split('\n')) {
        const header = HUNK_HEADER.exec(line);
        if (header) {
            oldLine = Number(header[1]);
            oldLeft = header[2] === undefined ? 1 : Number(header[2]);
            newLine = Number(header[3]);
            newLeft = header[4] === undefined ? 1 : Number(header[4]);
            continue;
        }
        if (oldLeft <= 0 && newLeft <= 0) continue;

        const marker = line.charAt(0);
        if (marker === '+') {
            visible.additions.add(newLine++);
            newLeft--;
        } else if (marker === '-') {
            visible.deletions.add(oldLine++);
            oldLeft--;
        } else if (marker === ' ' || line === '') {
            visible.additions.add(newLine++);
            visible.deletions.add(oldLine++);
            newLeft--;
            oldLeft--;
        }
    }

    return visible;
}

/** Lines 1..n of a rendered text, where n is its line count. */
export function lineRange(text: string): Set<number> {
    const count = text === '' ? 0 : text.split('\n').length;
    return new Set(Array.from({ length: count }, (_, i) => i + 1));
}

/** Added and removed line counts of a patch that carries hunks only, no `---`/`+++` file headers. */
export function countDiffLines(diff: string): { additions: number; deletions: number } {
    let additions = 0;
    let deletions = 0;
    for (const line of diff.split('\n')) {
        if (line.startsWith('+')) additions++;
        else if (line.startsWith('-')) deletions++;
    }
    return { additions, deletions };
}
