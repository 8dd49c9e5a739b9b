import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import type { z } from 'zod';

/** Read and validate one of the JSON tables under `src/data`. Throws at load time if malformed. */
export function loadDataFile<T extends z.ZodTypeAny>(name: string, schema: T): z.infer<T> {
    const path = fileURLToPath(new URL(`../data/${name}`, import.meta.url));
    return schema.parse(JSON.parse(readFileSync(path, 'utf-8')));
}
