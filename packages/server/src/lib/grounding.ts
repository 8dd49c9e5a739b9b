import type { Citation, CodebaseSnapshot } from '@code-inquiry/shared';
import type { VisibleIndex } from './diff-hunks.js';

export interface GroundingResult {
    grounded: Citation[];
    rejected: Citation[];
}

function partition(citations: Citation[], accept: (citation: Citation) => boolean): GroundingResult {
    const result: GroundingResult = { grounded: [], rejected: [] };
    for (const citation of citations) {
        (accept(citation) ? result.grounded : result.rejected).push(citation);
    }
    return result;
}

/**
 * A diff citation holds only if every line in its range was rendered on the cited side.
 * `unified` accepts a line shown on either side.
 */
export function isDiffCitationGrounded(citation: Citation, index: VisibleIndex): boolean {
    const visible = index.get(citation.path);
    if (!visible) return false;

    const sides =
        citation.side === 'additions'
            ? [visible.additions]
            : citation.side === 'deletions'
              ? [visible.deletions]
              : [visible.additions, visible.deletions];

    const capacity = sides.reduce((sum, side) => sum + side.size, 0);
    if (citation.end_line - citation.start_line + 1 > capacity) return false;

    for (let line = citation.start_line; line <= citation.end_line; line++) {
        if (!sides.some((side) => side.has(line))) return false;
    }
    return true;
}

export function groundDiffCitations(citations: Citation[], index: VisibleIndex): GroundingResult {
    return partition(citations, (citation) => isDiffCitationGrounded(citation, index));
}

/** Codebase citations must name an included file and stay within its line count. */
export function groundCodebaseCitations(citations: Citation[], snapshot: CodebaseSnapshot): GroundingResult {
    return partition(citations, (citation) => {
        const entry = snapshot.files.get(citation.path);
        return entry !== undefined && citation.end_line <= entry.text_lines.length;
    });
}
