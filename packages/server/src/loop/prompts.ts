import type { IterationRecord } from '@code-inquiry/shared';
import type { ChatMessage } from '../model/chat-model.js';

export interface OutputField {
    name: string;
    description: string;
}

/** What one run of the loop is asked to do. */
export interface LoopTask {
    instructions: string;
    /** Text inputs. Shown in full in every prompt and injected as sandbox globals. */
    inputs: Record<string, string>;
    /** Side-channel data. Injected as sandbox globals, only summarized in prompts. */
    data: Record<string, unknown>;
    outputFields: OutputField[];
}

const MAX_LISTED_KEYS = 50;

function describeData(name: string, value: unknown): string {
    if (typeof value === 'string') return `- \`${name}\`: string of ${value.length} chars`;
    if (Array.isArray(value)) return `- \`${name}\`: array of ${value.length} items`;
    if (typeof value === 'object' && value !== null) {
        const keys = Object.keys(value);
        const listed = keys.slice(0, MAX_LISTED_KEYS).join(', ');
        const more = keys.length > MAX_LISTED_KEYS ? `, ... (${keys.length - MAX_LISTED_KEYS} more)` : '';
        return `- \`${name}\`: object with ${keys.length} keys: ${listed}${more}`;
    }
    return `- \`${name}\`: ${typeof value}`;
}

function renderInputs(task: LoopTask): string {
    const sections = Object.entries(task.inputs).map(([name, value]) => `### ${name}\n${value}`);
    const data = Object.entries(task.data).map(([name, value]) => describeData(name, value));
    return ['## Inputs', ...sections, '', '## Data', ...(data.length > 0 ? data : ['(none)'])].join('\n');
}

export function renderHistory(history: IterationRecord[]): string {
    if (history.length === 0) return '## History\nNo steps yet.';

    const steps = history.map((record) =>
        [
            `### Step ${record.index}`,
            `Reasoning: ${record.reasoning}`,
            'Code:',
            '```js',
            record.code,
            '```',
            'Output:',
            record.output || '(no output)',
        ].join('\n'),
    );
    return ['## History', ...steps].join('\n\n');
}

export function buildSystemPrompt(task: LoopTask): string {
    const fieldNames = task.outputFields.map((field) => field.name).join(', ');
    return [
        'You work step by step. At each step you write JavaScript that runs in a sandbox, then read its output.',
        '',
        'Task:',
        task.instructions,
        '',
        'Sandbox globals:',
        '- every input and data entry, under its own name',
        '- `print(...values)` or `console.log(...)`: text you will see after the step',
        '- `await llm_query(prompt)`: ask a helper model about text you pass it; calls are limited',
        `- \`SUBMIT({ ${fieldNames} })\`: finish with the final result; every field is required`,
        '- `memory`: an object that keeps values between steps; other local variables are lost',
        '',
        'Output fields:',
        ...task.outputFields.map((field) => `- ${field.name}: ${field.description}`),
        '',
        'Reply with one JSON object and nothing else: {"reasoning": "<what you learned and plan to do>", "code": "<JavaScript>"}',
    ].join('\n');
}

export function buildRoundMessages(
    task: LoopTask,
    history: IterationRecord[],
    iteration: number,
    maxIterations: number,
): ChatMessage[] {
    return [
        { role: 'system', content: buildSystemPrompt(task) },
        {
            role: 'user',
            content: [
                renderInputs(task),
                renderHistory(history),
                `Step ${iteration}/${maxIterations}. Reply with JSON.`,
            ].join('\n\n'),
        },
    ];
}

export function buildFallbackMessages(task: LoopTask, history: IterationRecord[]): ChatMessage[] {
    const fields = task.outputFields.map((field) => `- ${field.name}: ${field.description}`);
    return [
        {
            role: 'system',
            content: ['The step budget is spent. Produce the final result from the work so far.', '', 'Task:', task.instructions].join(
                '\n',
            ),
        },
        {
            role: 'user',
            content: [
                renderInputs(task),
                renderHistory(history),
                ['Do not write code. Reply with one JSON object with these fields:', ...fields].join('\n'),
            ].join('\n\n'),
        },
    ];
}
