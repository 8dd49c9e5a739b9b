export type SymbolKind = 'function' | 'class' | 'method' | 'variable' | 'import' | 'export';

export interface SymbolTag {
    name: string;
    kind: SymbolKind;
    line: number;
}

export interface FileEntry {
    path: string;
    language: string;
    size_bytes: number;
    sha1: string;
    text_lines: string[];
    symbols: SymbolTag[];
}

/**
 * Bounded, prioritized view of a directory.
 *
 * `file_tree` lists every path that passed the deny/include filters, in priority order, even
 * when the byte budget kept its content out. `files` preserves inclusion order.
 */
export interface CodebaseSnapshot {
    root: string;
    file_tree: string[];
    files: Map<string, FileEntry>;
    languages: Record<string, number>;
    total_bytes: number;
}

export interface CodebaseSummary {
    root: string;
    file_tree: string[];
    included: string[];
    languages: Record<string, number>;
    total_files: number;
    total_bytes: number;
}

export interface HistoryTurn {
    question: string;
    answer: string;
}

export interface CodebaseSession {
    id: string;
    summary: CodebaseSummary;
    history: HistoryTurn[];
    created_at: string;
}
