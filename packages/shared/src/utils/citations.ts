import { z } from 'zod';
import type { Citation } from '../types/answer.js';
import type { DiffSide } from '../types/diff.js';

const LINE_RANGE = /^\s*(\d+)\s*(?:-\s*(\d+)\s*)?$/;

const lineSchema = z.union([
    z.number().int().positive(),
    z
        .string()
        .regex(/^\s*\d+\s*$/)
        .transform((value) => Number.parseInt(value, 10))
        .pipe(z.number().int().positive()),
]);

const citationRecordSchema = z.object({
    path: z.string().trim().min(1),
    side: z.enum(['additions', 'deletions', 'unified']).optional().catch(undefined),
    startLine: lineSchema.optional(),
    start_line: lineSchema.optional(),
    endLine: lineSchema.optional(),
    end_line: lineSchema.optional(),
    label: z.string().optional().catch(undefined),
    reason: z.string().optional().catch(undefined),
});

function makeCitation(path: string, side: DiffSide, start: number, end: number): Citation {
    return start <= end
        ? { path, side, start_line: start, end_line: end }
        : { path, side, start_line: end, end_line: start };
}

/**
 * Parse one `path:line` or `path:start-end` token. The last colon separates the path, so
 * Windows-style or colon-bearing paths survive. Returns null for anything malformed.
 */
export function parseCitationToken(token: string, side: DiffSide = 'unified'): Citation | null {
    const trimmed = token.trim();
    const colon = trimmed.lastIndexOf(':');
    if (colon <= 0) return null;

    const path = trimmed.slice(0, colon).trim();
    const match = LINE_RANGE.exec(trimmed.slice(colon + 1));
    if (!path || !match) return null;

    const start = Number.parseInt(match[1], 10);
    const end = match[2] !== undefined ? Number.parseInt(match[2], 10) : start;
    if (start < 1 || end < 1) return null;

    return makeCitation(path, side, start, end);
}

function parseCitationRecord(value: unknown): Citation | null {
    const parsed = citationRecordSchema.safeParse(value);
    if (!parsed.success) return null;

    const record = parsed.data;
    const start = record.startLine ?? record.start_line ?? 1;
    const end = record.endLine ?? record.end_line ?? start;
    const citation = makeCitation(record.path, record.side ?? 'unified', start, end);
    if (record.label) citation.label = record.label;
    if (record.reason) citation.reason = record.reason;
    return citation;
}

/**
 * Accepts a list of structured records and/or tokens, or a comma-separated token string.
 * Malformed entries are dropped one by one.
 */
export function parseCitations(raw: unknown): Citation[] {
    let items: unknown[];
    if (typeof raw === 'string') {
        items = raw
            .split(',')
            .map((s) => s.trim())
            .filter((s) => s.length > 0);
    } else if (Array.isArray(raw)) {
        items = raw;
    } else {
        return [];
    }

    const citations: Citation[] = [];
    for (const item of items) {
        const citation = typeof item === 'string' ? parseCitationToken(item) : parseCitationRecord(item);
        if (citation) citations.push(citation);
    }
    return citations;
}

export function formatCitation(citation: Citation): string {
    const range =
        citation.start_line === citation.end_line
            ? `${citation.start_line}`
            : `${citation.start_line}-${citation.end_line}`;
    return `${citation.path}:${range}`;
}
