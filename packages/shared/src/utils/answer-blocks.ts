import type { AnswerBlock } from '../types/answer.js';

const FENCE = '```';

/**
 * Split answer text into markdown and fenced code blocks.
 *
 * A line starting with a fence opens a code block (the rest of the line is the language tag)
 * unless a code block is already open, in which case it closes it. An unterminated fence
 * still closes at end of text. Blocks with empty content are dropped.
 */
export function parseAnswerBlocks(answer: string): AnswerBlock[] {
    const blocks: AnswerBlock[] = [];
    let current: string[] = [];
    let inCode = false;
    let language: string | undefined;

    const flush = () => {
        const content = current.join('\n');
        current = [];
        if (content === '') return;
        if (inCode) {
            blocks.push(language ? { type: 'code', content, language } : { type: 'code', content });
        } else {
            blocks.push({ type: 'markdown', content });
        }
    };

    for (const line of answer.split('\n')) {
        if (!line.startsWith(FENCE)) {
            current.push(line);
            continue;
        }
        if (inCode) {
            flush();
            inCode = false;
            language = undefined;
        } else {
            flush();
            inCode = true;
            language = line.slice(FENCE.length).trim() || undefined;
        }
    }
    flush();

    return blocks;
}

/**
 * Inverse of {@link parseAnswerBlocks} for text whose fences are balanced. A run of exactly one
 * blank line after a closing fence parses as an empty block and is dropped, so that newline is
 * not reproduced.
 */
export function renderAnswerBlocks(blocks: AnswerBlock[]): string {
    return blocks
        .map((block) =>
            block.type === 'code' ? `${FENCE}${block.language ?? ''}\n${block.content}\n${FENCE}` : block.content,
        )
        .join('\n');
}
