import { formatCitation, parseCitationToken, parseCitations } from '../../utils/citations.js';

describe('parseCitationToken', () => {
    it('parses a line range', () => {
        expect(parseCitationToken('a/b.py:10-20')).toEqual({
            path: 'a/b.py',
            side: 'unified',
            start_line: 10,
            end_line: 20,
        });
    });

    it('parses a single line', () => {
        expect(parseCitationToken('a/b.py:5')).toEqual({ path: 'a/b.py', side: 'unified', start_line: 5, end_line: 5 });
    });

    it('splits on the last colon', () => {
        expect(parseCitationToken('C:/repo/x.ts:3')?.path).toBe('C:/repo/x.ts');
    });

    it('swaps a reversed range', () => {
        expect(parseCitationToken('x.ts:9-4')).toMatchObject({ start_line: 4, end_line: 9 });
    });

    it.each(['no-colon.py', 'a.py:ten', 'a.py:1-x', ':12', 'a.py:', 'a.py:0'])('returns null for %s', (token) => {
        expect(parseCitationToken(token)).toBeNull();
    });
});

describe('parseCitations', () => {
    it('parses a comma-separated string and drops bad tokens', () => {
        const citations = parseCitations('src/a.ts:1-3, broken, src/b.ts:x, src/c.ts:7');
        expect(citations).toEqual([
            { path: 'src/a.ts', side: 'unified', start_line: 1, end_line: 3 },
            { path: 'src/c.ts', side: 'unified', start_line: 7, end_line: 7 },
        ]);
    });

    it('parses structured records in camelCase and snake_case', () => {
        const citations = parseCitations([
            { path: 'src/a.ts', side: 'additions', startLine: 4, endLine: 6, reason: 'null check' },
            { path: 'src/b.ts', side: 'deletions', start_line: '2', end_line: 2, label: 'old' },
        ]);
        expect(citations).toEqual([
            { path: 'src/a.ts', side: 'additions', start_line: 4, end_line: 6, reason: 'null check' },
            { path: 'src/b.ts', side: 'deletions', start_line: 2, end_line: 2, label: 'old' },
        ]);
    });

    it('defaults an unknown side to unified and a missing end to the start', () => {
        expect(parseCitations([{ path: 'x.go', side: 'left', startLine: 8 }])).toEqual([
            { path: 'x.go', side: 'unified', start_line: 8, end_line: 8 },
        ]);
    });

    it('drops records without a path or with non-numeric lines', () => {
        expect(parseCitations([{ side: 'unified', startLine: 1 }, { path: 'a.ts', startLine: 'one' }, 42])).toEqual(
            [],
        );
    });

    it('mixes tokens and records in one list', () => {
        expect(parseCitations(['a.ts:2', { path: 'b.ts', startLine: 1, endLine: 2 }])).toHaveLength(2);
    });

    it('returns an empty list for other shapes', () => {
        expect(parseCitations(undefined)).toEqual([]);
        expect(parseCitations({ path: 'a.ts' })).toEqual([]);
    });
});

describe('formatCitation', () => {
    it('collapses single-line ranges', () => {
        expect(formatCitation({ path: 'a.ts', side: 'unified', start_line: 3, end_line: 3 })).toBe('a.ts:3');
        expect(formatCitation({ path: 'a.ts', side: 'unified', start_line: 3, end_line: 8 })).toBe('a.ts:3-8');
    });
});
