import { extname } from 'node:path';
import { z } from 'zod';
import { loadDataFile } from './data-files.js';

const LANGUAGE_TABLE = loadDataFile(
    'languages.json',
    z.object({
        filenames: z.record(z.string()),
        extensions: z.record(z.string()),
    }),
);

const FALLBACK_LANGUAGE = 'text';

export function detectLanguage(relPath: string): string {
    const name = relPath.slice(relPath.lastIndexOf('/') + 1).toLowerCase();
    const byName = LANGUAGE_TABLE.filenames[name];
    if (byName) return byName;

    return LANGUAGE_TABLE.extensions[extname(name)] ?? FALLBACK_LANGUAGE;
}
