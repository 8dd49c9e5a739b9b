import type { DiffFileContext, FileDataEntry, ReviewFile } from '@code-inquiry/shared';
import { emptyVisibleLines, lineRange, parsePatchLines, type VisibleIndex } from '../lib/diff-hunks.js';

export const MAX_VISIBLE_FILES = 50;
export const MAX_CONTENT_CHARS = 10_000;
export const MAX_PATCH_CHARS = 5_000;

const SEPARATOR = '\n---\n';

/** Rendered prompt text plus the lines it shows, for grounding. */
export interface AssembledContext {
    text: string;
    visible: VisibleIndex;
}

type FileHeader = Pick<DiffFileContext, 'path' | 'status' | 'additions' | 'deletions'>;

function listingLine(file: FileHeader): string {
    return `- ${file.path} (${file.status}) +${file.additions} -${file.deletions}`;
}

/**
 * Assembles bounded diff context for the model. Both variants open with a metadata listing of
 * every file, whatever the per-file rendering cap.
 */
export class DiffContextService {
    /** Patch-based variant: header, stats and the raw unified diff per file. */
    buildPatchContext(files: ReviewFile[]): AssembledContext {
        const parts: string[] = [`## Metadata: Analyzing ${files.length} files based on git patches:`];
        parts.push(...files.map(listingLine));
        parts.push('---\n');

        const visible: VisibleIndex = new Map();
        for (const file of files) {
            parts.push(`## File: ${file.path} (${file.status})`);
            parts.push(`Stats: +${file.additions} -${file.deletions}`);

            if (file.patch) {
                parts.push('\n### Diff Patch:');
                parts.push(file.patch);
                visible.set(file.path, parsePatchLines(file.patch));
            } else {
                parts.push('\n(No patch available - likely binary or too large)');
            }

            parts.push(SEPARATOR);
        }

        return { text: parts.join('\n'), visible };
    }

    /**
     * Content-based variant. The first {@link MAX_VISIBLE_FILES} files show their old/new text
     * (each capped); the rest get a header that points at `file_data`.
     */
    buildContentContext(files: DiffFileContext[]): AssembledContext {
        const parts: string[] = [`## Metadata: Found ${files.length} files in this change (listing all):`];
        parts.push(...files.map(listingLine));
        parts.push('\nNOTE: Full content for ALL files is available in the global variable `file_data`.\n');
        parts.push('---\n');

        const visible: VisibleIndex = new Map();
        files.forEach((file, i) => {
            parts.push(`## File: ${file.path} (${file.status})`);

            if (i >= MAX_VISIBLE_FILES) {
                parts.push(`(Content truncated in prompt. Use \`print(file_data[${JSON.stringify(file.path)}].new)\` to read)`);
                parts.push(SEPARATOR);
                return;
            }

            parts.push(`Changes: +${file.additions} -${file.deletions}`);
            const shown = emptyVisibleLines();
            const oldText = file.old_file?.contents.slice(0, MAX_CONTENT_CHARS);
            const newText = file.new_file?.contents.slice(0, MAX_CONTENT_CHARS);

            if (oldText !== undefined && newText !== undefined) {
                parts.push('\n### Old Version:', oldText, '\n### New Version:', newText);
                shown.deletions = lineRange(oldText);
                shown.additions = lineRange(newText);
            } else if (newText !== undefined) {
                parts.push('\n### Added File:', newText);
                shown.additions = lineRange(newText);
            } else if (oldText !== undefined) {
                parts.push('\n### Deleted File:', oldText);
                shown.deletions = lineRange(oldText);
            } else if (file.patch) {
                const patch = file.patch.slice(0, MAX_PATCH_CHARS);
                parts.push('\n### Patch:', patch);
                Object.assign(shown, parsePatchLines(patch));
            }

            visible.set(file.path, shown);
            parts.push(SEPARATOR);
        });

        return { text: parts.join('\n'), visible };
    }

    /** Side-channel map for the sandbox. Absent versions are empty strings. */
    buildFileData(files: DiffFileContext[]): Record<string, FileDataEntry> {
        const data: Record<string, FileDataEntry> = {};
        for (const file of files) {
            data[file.path] = {
                old: file.old_file?.contents ?? '',
                new: file.new_file?.contents ?? '',
                status: file.status,
            };
        }
        return data;
    }
}
