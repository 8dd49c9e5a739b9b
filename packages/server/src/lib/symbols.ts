import type { SymbolKind, SymbolTag } from '@code-inquiry/shared';

/** Best-effort tagger for one language. Implementations may be swapped for a real parser. */
export interface SymbolScanner {
    readonly language: string;
    scan(content: string): SymbolTag[];
}

interface LineRule {
    kind: SymbolKind;
    pattern: RegExp;
}

export class RegexSymbolScanner implements SymbolScanner {
    constructor(
        readonly language: string,
        private readonly rules: readonly LineRule[],
    ) {}

    scan(content: string): SymbolTag[] {
        const tags: SymbolTag[] = [];
        content.split('\n').forEach((text, i) => {
            for (const rule of this.rules) {
                const match = rule.pattern.exec(text);
                if (match?.[1]) {
                    tags.push({ name: match[1], kind: rule.kind, line: i + 1 });
                }
            }
        });
        return sortAndDedupe(tags);
    }
}

/** Sort by `(line, name)` and keep the first tag for each key; rule order decides the kind on ties. */
export function sortAndDedupe(tags: SymbolTag[]): SymbolTag[] {
    const sorted = [...tags].sort((a, b) => a.line - b.line || compareOrdinal(a.name, b.name));
    const seen = new Set<string>();
    return sorted.filter((tag) => {
        const key = `${tag.line}:${tag.name}`;
        if (seen.has(key)) return false;
        seen.add(key);
        return true;
    });
}

function compareOrdinal(a: string, b: string): number {
    if (a < b) return -1;
    return a > b ? 1 : 0;
}

const ecmaRules = (extraExports: string): LineRule[] => [
    { kind: 'function', pattern: /^\s*(?:export\s+)?(?:default\s+)?(?:async\s+)?function\s*\*?\s*(\w+)\s*[<(]/ },
    {
        kind: 'function',
        pattern: /^\s*(?:export\s+)?(?:const|let|var)\s+(\w+)\s*(?::\s*\S+\s*)?=\s*(?:async\s+)?(?:\(|\w+\s*=>)/,
    },
    { kind: 'class', pattern: /^\s*(?:export\s+)?(?:default\s+)?(?:abstract\s+)?class\s+(\w+)/ },
    { kind: 'export', pattern: new RegExp(`^\\s*export\\s+(?:default\\s+)?(?:declare\\s+)?(?:const|let|var${extraExports})\\s+(\\w+)`) },
    { kind: 'import', pattern: /^\s*import\s+(?:type\s+)?(\w+)\s+from\b/ },
];

const SCANNERS: SymbolScanner[] = [
    new RegexSymbolScanner('python', [
        { kind: 'function', pattern: /^(?:async\s+)?def\s+(\w+)\s*\(/ },
        { kind: 'method', pattern: /^\s+(?:async\s+)?def\s+(\w+)\s*\(/ },
        { kind: 'class', pattern: /^\s*class\s+(\w+)\s*[:(]/ },
        { kind: 'import', pattern: /^\s*(?:from\s+\S+\s+)?import\s+(\w+)/ },
        { kind: 'variable', pattern: /^([A-Z][A-Z0-9_]*)\s*(?::[^=]+)?=[^=]/ },
    ]),
    new RegexSymbolScanner('javascript', ecmaRules('')),
    new RegexSymbolScanner('typescript', ecmaRules('|interface|type|enum')),
    new RegexSymbolScanner('rust', [
        { kind: 'function', pattern: /^\s*(?:pub(?:\([^)]*\))?\s+)?(?:const\s+)?(?:async\s+)?(?:unsafe\s+)?fn\s+(\w+)/ },
        { kind: 'class', pattern: /^\s*(?:pub(?:\([^)]*\))?\s+)?(?:struct|enum|trait)\s+(\w+)/ },
        { kind: 'variable', pattern: /^\s*(?:pub(?:\([^)]*\))?\s+)?(?:const|static)\s+(?:mut\s+)?(\w+)\s*:/ },
        { kind: 'import', pattern: /^\s*(?:pub\s+)?use\s+(\w+)/ },
    ]),
    new RegexSymbolScanner('go', [
        { kind: 'method', pattern: /^func\s+\([^)]*\)\s*(\w+)\s*[([]/ },
        { kind: 'function', pattern: /^func\s+(\w+)\s*[([]/ },
        { kind: 'class', pattern: /^type\s+(\w+)\s+(?:struct|interface)\b/ },
        { kind: 'variable', pattern: /^(?:var|const)\s+(\w+)/ },
    ]),
];

const registry = new Map(SCANNERS.map((scanner) => [scanner.language, scanner]));

export function getSymbolScanner(language: string): SymbolScanner | undefined {
    return registry.get(language);
}

export function scanSymbols(content: string, language: string): SymbolTag[] {
    return getSymbolScanner(language)?.scan(content) ?? [];
}
