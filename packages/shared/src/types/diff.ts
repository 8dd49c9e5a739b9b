export type DiffFileStatus = 'added' | 'removed' | 'modified' | 'renamed';

export type DiffSide = 'additions' | 'deletions' | 'unified';

export type SelectionMode = 'range' | 'single-line' | 'hunk' | 'file' | 'changeset';

export interface FileContents {
    name: string;
    contents: string;
    hash: string;
}

export interface DiffFileContext {
    path: string;
    old_file?: FileContents;
    new_file?: FileContents;
    patch?: string;
    status: DiffFileStatus;
    additions: number;
    deletions: number;
}

export interface DiffSelection {
    path: string;
    side: DiffSide;
    start_line: number;
    end_line: number;
    mode: SelectionMode;
}

/** Side-channel entry injected into the sandbox; absent versions are empty strings. */
export interface FileDataEntry {
    old: string;
    new: string;
    status: DiffFileStatus;
}
