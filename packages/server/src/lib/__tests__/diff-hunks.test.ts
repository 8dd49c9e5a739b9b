import { countDiffLines, lineRange, parsePatchLines } from '../diff-hunks.js';

describe('parsePatchLines', () => {
    it('numbers additions, deletions and context lines from the hunk header', () => {
        const visible = parsePatchLines('@@ -10,3 +10,4 @@\n context\n-old\n+new1\n+new2\n tail\n');

        expect([...visible.additions]).toEqual([10, 11, 12, 13]);
        expect([...visible.deletions]).toEqual([10, 11, 12]);
    });

    it('handles a patch that only adds lines', () => {
        const visible = parsePatchLines('@@ -1,2 +1,3 @@\n+line');

        expect([...visible.additions]).toEqual([1]);
        expect(visible.deletions.size).toBe(0);
    });

    it('skips file headers before the first hunk and defaults counts to 1', () => {
        const visible = parsePatchLines('diff --git a/x b/x\n--- a/x\n+++ b/x\n@@ -1 +1 @@\n-a\n+b');

        expect([...visible.additions]).toEqual([1]);
        expect([...visible.deletions]).toEqual([1]);
    });

    it('tracks several hunks and ignores no-newline markers', () => {
        const visible = parsePatchLines(
            '@@ -1,1 +1,1 @@\n-a\n+b\n\\ No newline at end of file\n@@ -20,1 +20,2 @@\n x\n+y',
        );

        expect([...visible.additions]).toEqual([1, 20, 21]);
        expect([...visible.deletions]).toEqual([1, 20]);
    });

    it('returns empty sets for text without hunks', () => {
        const visible = parsePatchLines('Binary files differ');
        expect(visible.additions.size + visible.deletions.size).toBe(0);
    });
});

describe('lineRange', () => {
    it('covers every line of the text', () => {
        expect([...lineRange('a\nb\nc')]).toEqual([1, 2, 3]);
        expect([...lineRange('a\n')]).toEqual([1, 2]);
        expect(lineRange('').size).toBe(0);
    });
});

describe('countDiffLines', () => {
    it('counts added and removed lines, not context or headers', () => {
        expect(countDiffLines('@@ -1,3 +1,3 @@\n keep\n-old\n+new\n+more')).toEqual({ additions: 2, deletions: 1 });
    });

    it('returns zeros for an empty patch', () => {
        expect(countDiffLines('')).toEqual({ additions: 0, deletions: 0 });
    });
});
