import { jsonrepair } from 'jsonrepair';
import { z } from 'zod';

export interface Action {
    reasoning: string;
    code: string;
}

const actionSchema = z.object({
    reasoning: z.string().catch(''),
    code: z.string().catch(''),
});

const FENCED_BLOCK = /```[\w-]*[ \t]*\n([\s\S]*?)```/;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pull the outermost `{...}` out of a model reply and parse it, repairing the usual damage
 * (fences, trailing commas, single quotes, unescaped newlines). Returns null when nothing parses.
 */
export function parseJsonObject(reply: string): Record<string, unknown> | null {
    const start = reply.indexOf('{');
    const end = reply.lastIndexOf('}');
    if (start === -1 || end <= start) return null;

    const candidate = reply.slice(start, end + 1);
    let parsed: unknown;
    try {
        parsed = JSON.parse(candidate);
    } catch {
        try {
            parsed = JSON.parse(jsonrepair(candidate));
        } catch {
            return null;
        }
    }
    return isRecord(parsed) ? parsed : null;
}

export function stripCodeFences(code: string): string {
    let text = code.trim();
    if (text.startsWith('```')) {
        const newline = text.indexOf('\n');
        text = newline === -1 ? '' : text.slice(newline + 1);
    }
    if (text.endsWith('```')) {
        text = text.slice(0, -3);
    }
    return text.trim();
}

/**
 * Read a `{ reasoning, code }` step from a reply. Falls back to the first fenced block as code
 * with the text before it as reasoning, then to the whole reply as reasoning.
 */
export function parseAction(reply: string): Action {
    const parsed = actionSchema.safeParse(parseJsonObject(reply));
    if (parsed.success && (parsed.data.code || parsed.data.reasoning)) {
        return { reasoning: parsed.data.reasoning.trim(), code: stripCodeFences(parsed.data.code) };
    }

    const fenced = FENCED_BLOCK.exec(reply);
    if (fenced) {
        return { reasoning: reply.slice(0, fenced.index).trim(), code: fenced[1].trim() };
    }

    return { reasoning: reply.trim(), code: '' };
}

/**
 * Read the output fields of a fallback extraction reply. When the reply is not a JSON object
 * the whole text becomes the first field.
 */
export function parseFinalFields(reply: string, fieldNames: string[]): Record<string, unknown> {
    const parsed = parseJsonObject(reply);
    if (!parsed) {
        return fieldNames.length > 0 ? { [fieldNames[0]]: reply.trim() } : {};
    }

    const fields: Record<string, unknown> = {};
    for (const name of fieldNames) {
        if (name in parsed) fields[name] = parsed[name];
    }
    return fields;
}
